/**
 * Application configuration
 */

import { loadEnv, type Env } from './env.js';
import { BULLETIN_KEYWORDS } from './keywords.js';

/**
 * Parameters that are not taken from the environment
 */
export const FIXED_SETTINGS = {
  sourceUrl: 'http://omawww.sat.gob.mx/sala_prensa/boletin_tecnico/Paginas/default.aspx',
  keywords: BULLETIN_KEYWORDS,
  maxLinksPerRun: 10,
  fallbackDocumentName: 'documento.pdf',

  http: {
    timeoutMs: 30000,
    maxRetries: 3,
    retryDelayMs: 2000,
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  },

  email: {
    subject: 'Actualización en Boletines Técnicos del SAT',
  },
} as const;

export type StorageConfig =
  | { backend: 's3'; bucket: string; region?: string }
  | { backend: 'postgres'; databaseUrl: string };

export interface MonitorConfig {
  readonly app: {
    readonly name: string;
    readonly env: Env['NODE_ENV'];
  };
  readonly sourceUrl: string;
  readonly keywords: readonly string[];
  readonly maxLinksPerRun: number;
  readonly fallbackDocumentName: string;
  readonly http: {
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly retryDelayMs: number;
    readonly userAgent: string;
  };
  readonly storage: StorageConfig;
  readonly email: {
    readonly sender: string;
    readonly recipient: string;
    readonly password: string;
    readonly smtpHost: string;
    readonly smtpPort: number;
    readonly subject: string;
  };
  readonly scheduler: {
    readonly cronExpression: string;
    readonly timezone: string;
  };
}

function storageFromEnv(env: Env): StorageConfig {
  if (env.STORAGE_BACKEND === 'postgres') {
    return { backend: 'postgres', databaseUrl: env.DATABASE_URL ?? '' };
  }
  return { backend: 's3', bucket: env.S3_BUCKET ?? '', region: env.AWS_REGION };
}

/**
 * Build the immutable run configuration from validated environment values
 */
export function buildConfig(env: Env): MonitorConfig {
  return Object.freeze({
    app: { name: 'sat-bulletin-monitor', env: env.NODE_ENV },
    sourceUrl: FIXED_SETTINGS.sourceUrl,
    keywords: FIXED_SETTINGS.keywords,
    maxLinksPerRun: FIXED_SETTINGS.maxLinksPerRun,
    fallbackDocumentName: FIXED_SETTINGS.fallbackDocumentName,
    http: { ...FIXED_SETTINGS.http },
    storage: storageFromEnv(env),
    email: {
      sender: env.EMAIL_SENDER,
      recipient: env.EMAIL_RECIPIENT,
      password: env.EMAIL_PASSWORD,
      smtpHost: env.SMTP_HOST,
      smtpPort: env.SMTP_PORT,
      subject: FIXED_SETTINGS.email.subject,
    },
    scheduler: {
      cronExpression: env.CRON_SCHEDULE,
      timezone: env.TZ,
    },
  });
}

/**
 * Validate the environment and build the configuration.
 * Throws ConfigurationError before any network activity.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): MonitorConfig {
  return buildConfig(loadEnv(source));
}

export { loadEnv, type Env } from './env.js';
export { BULLETIN_KEYWORDS } from './keywords.js';
