export {
  accounts,
  ledgerTx,
  paymentRequests,
  type AccountRow,
  type LedgerTxRow,
  type PaymentRequestRow,
} from './schema.js';
export * as schema from './schema.js';
export {
  createDatabase,
  type Database,
  type DatabaseConfig,
  type DatabaseTx,
  type LedgerSchema,
} from './client.js';
export { loadSchemaSql } from './ddl.js';
