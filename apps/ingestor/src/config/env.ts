import { z } from 'zod';
import { DEFAULT_LAST_KNOWN_LOCATION_URL } from '@vizvolt/adapters';
import type { DbConnectionSettings } from '@vizvolt/adapters';

export const SERVICE_NAME = 'vizvolt-ingestion';

const requiredString = z.string().trim().min(1);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  API_SECRET: requiredString,
  API_URL: z.string().url().default(DEFAULT_LAST_KNOWN_LOCATION_URL),
  API_TIMEOUT_MS: positiveInt.default(30_000),

  DB_HOST: requiredString,
  DB_NAME: requiredString,
  DB_USER: requiredString,
  DB_PASSWORD: z.string().optional(),
  DB_PORT: positiveInt.max(65_535).default(5432),
  DB_SSL_VERIFY: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
  DB_CONNECT_TIMEOUT_MS: positiveInt.default(10_000),

  POLL_INTERVAL_MS: positiveInt.default(10_000),

  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
});

export interface ApiConfig {
  readonly url: string;
  readonly secretKey: string;
  readonly timeoutMs: number;
}

export interface HttpConfig {
  readonly host: string;
  readonly port: number;
}

export interface AppConfig {
  readonly serviceName: typeof SERVICE_NAME;
  readonly api: ApiConfig;
  readonly database: DbConnectionSettings;
  readonly pollIntervalMs: number;
  readonly http: HttpConfig;
}

/**
 * Build the immutable runtime configuration from environment variables.
 * Called once at startup; throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const config: AppConfig = {
    serviceName: SERVICE_NAME,
    api: {
      url: parsed.API_URL,
      secretKey: parsed.API_SECRET,
      timeoutMs: parsed.API_TIMEOUT_MS,
    },
    database: {
      host: parsed.DB_HOST,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      port: parsed.DB_PORT,
      sslVerify: parsed.DB_SSL_VERIFY,
      connectTimeoutMs: parsed.DB_CONNECT_TIMEOUT_MS,
    },
    pollIntervalMs: parsed.POLL_INTERVAL_MS,
    http: { host: parsed.HOST, port: parsed.PORT },
  };

  Object.freeze(config.api);
  Object.freeze(config.database);
  Object.freeze(config.http);
  return Object.freeze(config);
}
