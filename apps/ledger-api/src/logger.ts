import pino from 'pino';
import { LOG_LEVELS, type AppConfig, type LogLevel } from './config.js';

const env = process.env['NODE_ENV'];

/**
 * Startup level before the config is parsed. An unknown LOG_LEVEL falls back
 * to info here and is reported by loadConfig instead.
 */
export function resolveLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

function resolveOptions(): pino.LoggerOptions {
  const level = resolveLevel(process.env['LOG_LEVEL']);
  if (env === 'production') {
    return { level, base: { service: 'ledger-api' } };
  }
  if (env === 'test') {
    return { level: 'silent' };
  }
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  };
}

export const logger = pino(resolveOptions());

/**
 * Apply the validated level. Test runs stay silent.
 */
export function applyLoggerConfig(config: Pick<AppConfig, 'env' | 'logLevel'>): void {
  if (config.env === 'test') return;
  logger.level = config.logLevel;
}
