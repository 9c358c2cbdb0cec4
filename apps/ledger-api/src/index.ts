import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { createLedgerAdapter } from './adapters.js';
import { loadConfig } from './config.js';
import { applyLoggerConfig, logger } from './logger.js';

export { buildApp, LEDGER_ERROR_STATUS, type AppDeps } from './app.js';
export { registerRoutes } from './routes.js';
export { registerAuthHook } from './auth.js';
export { loadConfig, ConfigError, type AppConfig, type LogLevel } from './config.js';
export { createLedgerAdapter } from './adapters.js';

export async function startLedgerApi(): Promise<FastifyInstance> {
  const config = loadConfig();
  applyLoggerConfig(config);
  const ledger = createLedgerAdapter(config);
  const app = await buildApp({ ledger, config });

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port, adapter: config.adapter }, 'Ledger API started');
  return app;
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1])) {
  (async () => {
    const app = await startLedgerApi();

    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Received signal, starting graceful shutdown');
      await app.close();
      logger.info('Fastify server closed');
      process.exit(0);
    };
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  })().catch((err: unknown) => {
    logger.error({ err }, 'Failed to start ledger API');
    process.exit(1);
  });
}
