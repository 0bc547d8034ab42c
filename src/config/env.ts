import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform(value => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  BLOB_STORE_PATH: z
    .string()
    .min(1, 'BLOB_STORE_PATH must not be empty')
    .optional()
    .describe('Root directory of the blob store'),
  BLOB_STORE_PUBLISH_MODE: z
    .enum(['link', 'rename'])
    .default('link')
    .describe('How staged blobs are published: hard link, or rename across volumes'),
  BLOB_STORE_VERIFY_STAGED: booleanFlag('true'),
  BLOB_STORE_FSYNC: booleanFlag('true')
});

export type ParsedEnvironment = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const formatted = parseResult.error.flatten();
    const errors = Object.entries(formatted.fieldErrors)
      .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  const data = parseResult.data;

  return {
    ...data,
    isDevelopment: data.NODE_ENV === 'development',
    isProduction: data.NODE_ENV === 'production',
    isTest: data.NODE_ENV === 'test'
  };
}

export const env = parseEnv(process.env);

export type AppEnvironment = typeof env;
