/**
 * Process configuration, parsed from the environment with zod.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LEDGER_API_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    ADAPTER_TYPE: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
    SUPER_ADMIN_ID: z.string().min(1).optional(),
    PAYMENT_REQUEST_TTL_MINUTES: z.coerce.number().int().positive().default(15),
    API_TOKEN: z.string().min(16).optional(),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  })
  .superRefine((env, ctx) => {
    if (env.ADAPTER_TYPE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when ADAPTER_TYPE=postgres',
      });
    }
    if (env.NODE_ENV === 'production' && !env.API_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['API_TOKEN'],
        message: 'API_TOKEN must be set in production',
      });
    }
  });

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  port: number;
  adapter: 'memory' | 'postgres';
  databaseUrl?: string;
  databaseMaxConnections: number;
  bootstrapAdminId?: string;
  requestTtlMs: number;
  apiToken?: string;
  rateLimit: { max: number; windowMs: number };
}

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse configuration. Empty variables count as unset.
 * @throws ConfigError
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.LEDGER_API_PORT,
    adapter: parsed.ADAPTER_TYPE,
    databaseUrl: parsed.DATABASE_URL,
    databaseMaxConnections: parsed.DATABASE_MAX_CONNECTIONS,
    bootstrapAdminId: parsed.SUPER_ADMIN_ID,
    requestTtlMs: parsed.PAYMENT_REQUEST_TTL_MINUTES * 60_000,
    apiToken: parsed.API_TOKEN,
    rateLimit: { max: parsed.RATE_LIMIT_MAX, windowMs: parsed.RATE_LIMIT_WINDOW_MS },
  };
}
