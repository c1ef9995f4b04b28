import { z } from 'zod';

// LOG_LEVEL is read by the logger at import time; it is validated here with the rest.
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  DOCINTEL_ENDPOINT: z.string().url().optional(),
  DOCINTEL_KEY: z.string().min(1).optional(),
  DOCINTEL_API_VERSION: z.string().min(1).default('2024-11-30'),
  DOCINTEL_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
  DOCINTEL_MAX_POLLS: z.coerce.number().int().positive().default(30),
  DEFAULT_LANGUAGE: z.string().min(2).default('es'),
  REQUEST_BODY_LIMIT: z.string().min(1).default('25mb'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(100),
});

export interface DocumentIntelligenceConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  locale: string;
  pollIntervalMs: number;
  maxPolls: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  bodyLimit: string;
  rateLimitPerMinute: number;
  documentIntelligence: DocumentIntelligenceConfig | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const documentIntelligence: DocumentIntelligenceConfig | null =
    parsed.DOCINTEL_ENDPOINT && parsed.DOCINTEL_KEY
      ? {
          endpoint: parsed.DOCINTEL_ENDPOINT.replace(/\/$/, ''),
          apiKey: parsed.DOCINTEL_KEY,
          apiVersion: parsed.DOCINTEL_API_VERSION,
          locale: parsed.DEFAULT_LANGUAGE,
          pollIntervalMs: parsed.DOCINTEL_POLL_INTERVAL_MS,
          maxPolls: parsed.DOCINTEL_MAX_POLLS,
        }
      : null;

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    bodyLimit: parsed.REQUEST_BODY_LIMIT,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
    documentIntelligence,
  };
}
