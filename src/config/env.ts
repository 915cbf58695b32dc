/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { ConfigurationError } from '../utils/errors.js';

const envSchema = z
  .object({
    // Storage
    STORAGE_BACKEND: z.enum(['s3', 'postgres']).default('s3'),
    S3_BUCKET: z.string().optional(),
    AWS_REGION: z.string().optional(),
    DATABASE_URL: z.string().optional(),

    // Email
    EMAIL_SENDER: z.string({ required_error: 'EMAIL_SENDER is required' }).email(),
    EMAIL_RECIPIENT: z.string({ required_error: 'EMAIL_RECIPIENT is required' }).email(),
    EMAIL_PASSWORD: z.string({ required_error: 'EMAIL_PASSWORD is required' }).min(1, 'EMAIL_PASSWORD is required'),
    SMTP_HOST: z.string().default('smtp.gmail.com'),
    SMTP_PORT: z.coerce.number().int().positive().default(587),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

    // Scheduling
    CRON_SCHEDULE: z.string().default('0 9 * * 1-5'),
    TZ: z.string().default('America/Mexico_City'),

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((value, ctx) => {
    if (value.STORAGE_BACKEND === 's3' && !value.S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET'],
        message: 'S3_BUCKET is required when STORAGE_BACKEND is s3',
      });
    }
    if (value.STORAGE_BACKEND === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_BACKEND is postgres',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Validate environment variables.
 *
 * Empty strings count as missing.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const cleaned: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[name] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    const variables = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigurationError(
      `Missing or invalid environment variables: ${variables.join(', ')}`,
      variables
    );
  }

  return result.data;
}
