import path from 'path';
import { z } from 'zod';
import type { LogLevel } from '../lib/logger';

export type Environment = 'development' | 'production' | 'test';
export type StorageKind = 'json' | 'memory';

export type AppConfig = Readonly<{
  port: number;
  dataDir: string;
  environment: Environment;
  apiPrefix: string;
  logLevel: LogLevel;
  storage: StorageKind;
  version: string;
}>;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  DATA_DIR: z.string().min(1).default('data'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, 'must start with "/"')
    .default('/api/v1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  STORAGE: z.enum(['json', 'memory']).default('json'),
  APP_VERSION: z.string().min(1).default('0.1.0'),
});

function defaultLogLevel(environment: Environment): LogLevel {
  switch (environment) {
    case 'test':
      return 'silent';
    case 'production':
      return 'info';
    default:
      return 'debug';
  }
}

/**
 * Reads settings from environment variables. Called once at start-up;
 * the result is passed to whatever needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    dataDir: path.resolve(e.DATA_DIR),
    environment: e.NODE_ENV,
    apiPrefix: e.API_PREFIX,
    logLevel: e.LOG_LEVEL ?? defaultLogLevel(e.NODE_ENV),
    storage: e.STORAGE,
    version: e.APP_VERSION,
  });
}
