import { pgTable, text, timestamp, bigint, bigserial, boolean, index } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

/**
 * 1. accounts
 * Ledger participants and their current balance (minor units, 2 decimals)
 */
export const accounts = pgTable(
  'accounts',
  {
    id: text('id').primaryKey(),
    externalId: text('external_id').notNull().unique(),
    handle: text('handle'),
    displayName: text('display_name'),
    gameId: text('game_id').unique(),
    registered: boolean('registered').notNull().default(false),
    deleted: boolean('deleted').notNull().default(false), // soft delete by admin
    isAdmin: boolean('is_admin').notNull().default(false),
    balance: bigint('balance', { mode: 'bigint' }).notNull().default(sql`0`),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (t) => ({
    handleIdx: index('accounts_handle_idx').on(sql`lower(regexp_replace(btrim(${t.handle}), '^@', ''))`),
    displayNameIdx: index('accounts_display_name_idx').on(t.displayName),
  })
);

/**
 * 2. ledger_tx
 * Append-only transaction log. Admin kinds leave one side null.
 */
export const ledgerTx = pgTable(
  'ledger_tx',
  {
    id: text('id').primaryKey(),
    seq: bigserial('seq', { mode: 'number' }), // insertion order for history
    fromAccountId: text('from_account_id').references(() => accounts.id),
    toAccountId: text('to_account_id').references(() => accounts.id),
    amount: bigint('amount', { mode: 'bigint' }).notNull(),
    kind: text('kind', { enum: ['transfer', 'admin_credit', 'admin_debit'] }).notNull(),
    note: text('note'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (t) => ({
    fromIdx: index('ledger_tx_from_idx').on(t.fromAccountId, t.createdAt),
    toIdx: index('ledger_tx_to_idx').on(t.toAccountId, t.createdAt),
  })
);

/**
 * 3. payment_requests
 * Single-use, time-limited capability tokens
 */
export const paymentRequests = pgTable('payment_requests', {
  id: text('id').primaryKey(),
  token: text('token').notNull().unique(),
  requesterId: text('requester_id')
    .notNull()
    .references(() => accounts.id),
  amount: bigint('amount', { mode: 'bigint' }), // null = payer chooses
  createdAt: timestamp('created_at').notNull().defaultNow(),
  expiresAt: timestamp('expires_at').notNull(),
  used: boolean('used').notNull().default(false),
});

export type AccountRow = typeof accounts.$inferSelect;
export type LedgerTxRow = typeof ledgerTx.$inferSelect;
export type PaymentRequestRow = typeof paymentRequests.$inferSelect;
