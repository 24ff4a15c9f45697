import { z } from 'zod';
import type { R2Settings } from './r2-client.js';

// Blank values (e.g. `R2_BUCKET_NAME=` copied from .env.example) count as unset.
export const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);
const optionalString = z.preprocess(blankAsUnset, z.string().optional());

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  UPLOAD_DIR: z.string().min(1).default('uploads'),
  OUTPUT_DIR: z.string().min(1).default('outputs'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  FILE_RETENTION_MINUTES: z.coerce.number().positive().default(120),
  SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().default(10),
  R2_ACCOUNT_ID: optionalString,
  R2_ACCESS_KEY_ID: optionalString,
  R2_SECRET_ACCESS_KEY: optionalString,
  R2_BUCKET_NAME: optionalString,
  R2_PUBLIC_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
});

export interface AppConfig {
  port: number;
  uploadDir: string;
  outputDir: string;
  maxUploadBytes: number;
  retentionMs: number;
  sweepIntervalMs: number;
  r2: R2Settings;
}

const MINUTE_MS = 60 * 1000;

/**
 * Reads the service configuration from an environment object.
 * Throws when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    uploadDir: data.UPLOAD_DIR,
    outputDir: data.OUTPUT_DIR,
    maxUploadBytes: Math.floor(data.MAX_UPLOAD_MB * 1024 * 1024),
    retentionMs: data.FILE_RETENTION_MINUTES * MINUTE_MS,
    sweepIntervalMs: data.SWEEP_INTERVAL_MINUTES * MINUTE_MS,
    r2: {
      accountId: data.R2_ACCOUNT_ID,
      accessKeyId: data.R2_ACCESS_KEY_ID,
      secretAccessKey: data.R2_SECRET_ACCESS_KEY,
      bucketName: data.R2_BUCKET_NAME,
      publicUrl: data.R2_PUBLIC_URL,
    },
  };
}
