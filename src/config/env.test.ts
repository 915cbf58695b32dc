import { describe, expect, it } from 'vitest';
import { loadEnv } from './env.js';
import { FIXED_SETTINGS, loadConfig } from './index.js';
import { ConfigurationError } from '../utils/errors.js';

const VALID_ENV = {
  S3_BUCKET: 'test-bucket',
  EMAIL_SENDER: 'sender@example.com',
  EMAIL_RECIPIENT: 'team@example.com',
  EMAIL_PASSWORD: 'test-secret',
};

function configurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadEnv', () => {
  it('applies defaults to optional variables', () => {
    const env = loadEnv(VALID_ENV);

    expect(env.STORAGE_BACKEND).toBe('s3');
    expect(env.SMTP_HOST).toBe('smtp.gmail.com');
    expect(env.SMTP_PORT).toBe(587);
    expect(env.LOG_LEVEL).toBe('info');
  });

  it('names every missing required variable', () => {
    const error = configurationError(() => loadEnv({ S3_BUCKET: 'test-bucket' }));

    expect(error.variables).toEqual(
      expect.arrayContaining(['EMAIL_SENDER', 'EMAIL_RECIPIENT', 'EMAIL_PASSWORD'])
    );
    expect(error.message).toContain('EMAIL_PASSWORD');
  });

  it('treats empty strings as missing', () => {
    const error = configurationError(() => loadEnv({ ...VALID_ENV, EMAIL_PASSWORD: '  ' }));

    expect(error.variables).toEqual(['EMAIL_PASSWORD']);
  });

  it('requires a bucket for the s3 backend', () => {
    const { S3_BUCKET: _unused, ...withoutBucket } = VALID_ENV;
    const error = configurationError(() => loadEnv(withoutBucket));

    expect(error.variables).toEqual(['S3_BUCKET']);
  });

  it('requires a database URL for the postgres backend', () => {
    const error = configurationError(() => loadEnv({ ...VALID_ENV, STORAGE_BACKEND: 'postgres' }));

    expect(error.variables).toEqual(['DATABASE_URL']);
  });
});

describe('loadConfig', () => {
  it('combines environment values with the fixed settings', () => {
    const config = loadConfig({ ...VALID_ENV, AWS_REGION: 'us-east-1' });

    expect(config.storage).toEqual({ backend: 's3', bucket: 'test-bucket', region: 'us-east-1' });
    expect(config.email.recipient).toBe('team@example.com');
    expect(config.email.subject).toBe(FIXED_SETTINGS.email.subject);
    expect(config.sourceUrl).toBe(FIXED_SETTINGS.sourceUrl);
    expect(config.keywords).toEqual(['CFDI 4.0', 'Anexo 20', 'contabilidad electrónica', 'e.firma']);
    expect(config.maxLinksPerRun).toBe(10);
    expect(config.http).toEqual({
      timeoutMs: 30000,
      maxRetries: 3,
      retryDelayMs: 2000,
      userAgent: FIXED_SETTINGS.http.userAgent,
    });
  });

  it('selects the postgres backend', () => {
    const config = loadConfig({
      ...VALID_ENV,
      STORAGE_BACKEND: 'postgres',
      DATABASE_URL: 'postgres://monitor@localhost/monitor',
    });

    expect(config.storage).toEqual({
      backend: 'postgres',
      databaseUrl: 'postgres://monitor@localhost/monitor',
    });
  });
});
