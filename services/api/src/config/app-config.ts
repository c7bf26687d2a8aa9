import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_PATH: z.string().min(1).default('./data/depin_specs.csv'),
  LOG_LEVEL: logLevelSchema.default('info'),
  NODE_ENV: z.string().default('development'),
  RATE_LIMIT_MAX: z.coerce.number().int().default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60_000),
  CORS_ORIGINS: z.string().default('*'),
  OPENAPI_OUTPUT: z.string().default('openapi.json'),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface AppConfig {
  port: number;
  host: string;
  dataPath: string;
  logLevel: LogLevel;
  nodeEnv: string;
  rateLimit: {
    max: number;
    windowMs: number;
  };
  corsOrigins: '*' | string[];
  openApiOutput: string | null;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function parseOrigins(value: string): '*' | string[] {
  const origins = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (origins.length === 0 || origins.includes('*')) {
    return '*';
  }

  return origins;
}

// Empty strings count as unset so `PORT=` in a .env file falls back to the default.
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    dataPath: values.DATA_PATH,
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
    rateLimit: {
      max: values.RATE_LIMIT_MAX,
      windowMs: values.RATE_LIMIT_WINDOW_MS,
    },
    corsOrigins: parseOrigins(values.CORS_ORIGINS),
    openApiOutput: env.OPENAPI_OUTPUT === '' ? null : values.OPENAPI_OUTPUT,
  };
}
