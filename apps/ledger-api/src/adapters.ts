/**
 * Ledger adapter factory: memory for local development, postgres otherwise.
 */

import { MemoryLedger, createLedger, type Ledger } from '@scrip/adapters-ledger';
import { createDatabase } from '@scrip/database';
import type { AppConfig } from './config.js';
import { logger } from './logger.js';

export function createLedgerAdapter(config: AppConfig): Ledger {
  const ledgerConfig = {
    bootstrapAdminId: config.bootstrapAdminId,
    requestTtlMs: config.requestTtlMs,
  };

  if (config.adapter === 'postgres' && config.databaseUrl) {
    const db = createDatabase({
      connectionString: config.databaseUrl,
      maxConnections: config.databaseMaxConnections,
    });
    logger.info({ adapterType: 'postgres' }, 'Using PostgresLedger');
    return createLedger({ db, ...ledgerConfig });
  }

  logger.info({ adapterType: 'memory' }, 'Using in-memory Ledger');
  return new MemoryLedger(ledgerConfig);
}
