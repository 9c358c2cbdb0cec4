import { drizzle } from 'drizzle-orm/postgres-js';
import type { ExtractTablesWithRelations } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT, PgTransaction } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
}

export type LedgerSchema = typeof schema;

export function createDatabase(config: DatabaseConfig) {
  const queryClient = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });

  return drizzle(queryClient, { schema });
}

/**
 * Any drizzle Postgres database carrying the ledger schema,
 * whichever driver sits underneath (postgres.js, PGlite).
 */
export type Database = PgDatabase<PgQueryResultHKT, LedgerSchema>;

/**
 * Transaction handle passed to `db.transaction` callbacks
 */
export type DatabaseTx = PgTransaction<PgQueryResultHKT, LedgerSchema, ExtractTablesWithRelations<LedgerSchema>>;
