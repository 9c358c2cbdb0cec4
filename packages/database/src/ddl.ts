import { readFile } from 'node:fs/promises';

const SCHEMA_SQL_URL = new URL('../sql/0000_init.sql', import.meta.url);

/**
 * DDL that creates the ledger tables. Idempotent.
 */
export async function loadSchemaSql(): Promise<string> {
  return readFile(SCHEMA_SQL_URL, 'utf8');
}
