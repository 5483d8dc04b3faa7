import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './logger';
import { MODEL_PROVIDERS } from './types';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o';
export const DEFAULT_MAX_IMAGE_SIZE_MB = 20;
export const DEFAULT_MAX_IMAGE_DIMENSION = 2048;

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  PRIMARY_MODEL: z.enum(['anthropic', 'openai']).default('anthropic'),
  FALLBACK_MODEL: z.enum(MODEL_PROVIDERS).default('openai'),
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_ANTHROPIC_MODEL),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_OPENAI_MODEL),
  MAX_IMAGE_SIZE_MB: z.coerce.number().positive().default(DEFAULT_MAX_IMAGE_SIZE_MB),
  MAX_IMAGE_DIMENSION: z.coerce.number().int().positive().default(DEFAULT_MAX_IMAGE_DIMENSION),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  CORS_ORIGINS: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Env = z.infer<typeof EnvSchema>;

export interface ImgTexConfig {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  primaryModel: Env['PRIMARY_MODEL'];
  fallbackModel: Env['FALLBACK_MODEL'];
  anthropicModel: string;
  openaiModel: string;
  maxImageSizeBytes: number;
  maxImageDimension: number;
  apiHost: string;
  apiPort: number;
  /** Allowed browser origins for the HTTP API; `*` allows any. */
  corsOrigins: string[];
  logLevel: Env['LOG_LEVEL'];
}

/**
 * Build the runtime configuration from environment variables. Empty
 * strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ImgTexConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }

  const data = parsed.data;
  return {
    anthropicApiKey: data.ANTHROPIC_API_KEY,
    openaiApiKey: data.OPENAI_API_KEY,
    primaryModel: data.PRIMARY_MODEL,
    fallbackModel: data.FALLBACK_MODEL,
    anthropicModel: data.ANTHROPIC_MODEL,
    openaiModel: data.OPENAI_MODEL,
    maxImageSizeBytes: Math.round(data.MAX_IMAGE_SIZE_MB * 1024 * 1024),
    maxImageDimension: data.MAX_IMAGE_DIMENSION,
    apiHost: data.API_HOST,
    apiPort: data.API_PORT,
    corsOrigins: data.CORS_ORIGINS,
    logLevel: data.LOG_LEVEL,
  };
}

/** Read `.env` from the working directory (if any), then parse the environment. */
export function loadConfigFromDotenv(path?: string): ImgTexConfig {
  loadDotenv(path ? { path } : undefined);
  return loadConfig(process.env);
}
