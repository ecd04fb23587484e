/**
 * Application configuration
 * Parsed once from the environment at startup and passed to each service.
 */

import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  COMMON_VECTOR_STORE_ID: optionalString,
  ASSISTANT_MODEL: optionalString,
  DATABASE_URL: optionalString,
  SESSION_SECRET: optionalString,
  MAX_UPLOAD_MB: z.coerce.number().int().positive().default(25),
  UPLOAD_DIR: optionalString,
  REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TRANSCRIPT_TTL_MINUTES: z.coerce.number().int().positive().default(120),
  PORT: z.coerce.number().int().positive().default(5000),
});

export const DEFAULT_ASSISTANT_MODEL = 'gpt-4.1-mini';
const DEVELOPMENT_SESSION_SECRET = 'development-session-secret-only';

export interface AppConfig {
  readonly environment: 'development' | 'production' | 'test';
  readonly openaiApiKey: string;
  readonly openaiBaseUrl?: string;
  readonly commonVectorStoreId?: string;
  readonly assistantModel: string;
  readonly databaseUrl?: string;
  readonly sessionSecret: string;
  readonly maxUploadBytes: number;
  readonly uploadDir: string;
  readonly remoteTimeoutMs: number;
  readonly transcriptTtlMs: number;
  readonly port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue?.path.join('.') ?? 'environment'}: ${issue?.message ?? 'unknown error'}`);
  }
  const vars = parsed.data;
  const isProduction = vars.NODE_ENV === 'production';

  if (!vars.OPENAI_API_KEY) {
    throw new ConfigurationError('OPENAI_API_KEY must be set');
  }
  if (isProduction && !vars.DATABASE_URL) {
    throw new ConfigurationError('DATABASE_URL must be set in production');
  }
  if (isProduction && !vars.SESSION_SECRET) {
    throw new ConfigurationError('SESSION_SECRET must be set in production');
  }
  if (!vars.COMMON_VECTOR_STORE_ID) {
    console.warn('[Config] COMMON_VECTOR_STORE_ID is not set - common course files are disabled');
  }

  return Object.freeze({
    environment: vars.NODE_ENV,
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiBaseUrl: vars.OPENAI_BASE_URL,
    commonVectorStoreId: vars.COMMON_VECTOR_STORE_ID,
    assistantModel: vars.ASSISTANT_MODEL ?? DEFAULT_ASSISTANT_MODEL,
    databaseUrl: vars.DATABASE_URL,
    sessionSecret: vars.SESSION_SECRET ?? DEVELOPMENT_SESSION_SECRET,
    maxUploadBytes: vars.MAX_UPLOAD_MB * 1024 * 1024,
    uploadDir: vars.UPLOAD_DIR ?? path.join(process.cwd(), 'uploads'),
    remoteTimeoutMs: vars.REMOTE_TIMEOUT_MS,
    transcriptTtlMs: vars.TRANSCRIPT_TTL_MINUTES * 60 * 1000,
    port: vars.PORT,
  });
}
