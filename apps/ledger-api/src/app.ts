import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { LedgerError, type Ledger, type LedgerErrorCode } from '@scrip/adapters-ledger';
import type { AppConfig } from './config.js';
import { registerAuthHook } from './auth.js';
import { registerRoutes } from './routes.js';
import { logger } from './logger.js';

export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  NOT_FOUND: 404,
  INSUFFICIENT_FUNDS: 409,
  UNAUTHORIZED: 403,
  INVALID_REQUEST: 410,
  INVALID_AMOUNT: 400,
  DUPLICATE_GAME_ID: 409,
  STORE_UNAVAILABLE: 503,
};

export interface AppDeps {
  ledger: Ledger;
  config: Pick<AppConfig, 'env' | 'apiToken' | 'rateLimit'>;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { ledger, config } = deps;
  const app = Fastify({ logger: false });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // JSON API, no HTML
  });

  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
    allowList: ['127.0.0.1', '::1'], // health checks
  });

  if (config.apiToken) {
    registerAuthHook(app, config.apiToken);
  } else {
    logger.warn('API_TOKEN not set, ledger-api is running without authentication');
  }

  // Ledger errors map to fixed statuses; anything else never leaks a stack trace
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    if (error instanceof LedgerError) {
      const statusCode = LEDGER_ERROR_STATUS[error.code];
      if (statusCode >= 500) {
        logger.error({ err: error, code: error.code }, 'Ledger store failure');
      } else {
        logger.warn({ code: error.code, method: request.method, url: request.routeOptions.url }, error.message);
      }
      return reply.status(statusCode).send({ error: error.code, message: error.message });
    }

    const statusCode = error.statusCode ?? 500;
    logger.error({ err: error, statusCode }, 'Request error');

    if (statusCode >= 500) {
      return reply.status(statusCode).send({
        error: 'INTERNAL_ERROR',
        message: config.env === 'production' ? 'An unexpected error occurred' : error.message,
      });
    }

    return reply.status(statusCode).send({
      error: error.name,
      message: error.message,
    });
  });

  registerRoutes(app, { ledger });
  return app;
}
