import { describe, it, expect } from 'vitest';
import { getTableName, getTableColumns } from 'drizzle-orm';
import * as schema from './schema.js';
import { loadSchemaSql } from './ddl.js';

describe('Database Schema', () => {
  const EXPECTED_TABLES = ['accounts', 'ledger_tx', 'payment_requests'] as const;

  it('has correct table names', () => {
    expect(getTableName(schema.accounts)).toBe('accounts');
    expect(getTableName(schema.ledgerTx)).toBe('ledger_tx');
    expect(getTableName(schema.paymentRequests)).toBe('payment_requests');
  });

  it('exports exactly the ledger tables', () => {
    const names = [schema.accounts, schema.ledgerTx, schema.paymentRequests].map((t) =>
      getTableName(t)
    );
    expect(names).toEqual([...EXPECTED_TABLES]);
  });

  describe('accounts table columns', () => {
    it('has identity, status and balance columns', () => {
      const cols = getTableColumns(schema.accounts);
      expect(Object.keys(cols).sort()).toEqual(
        [
          'balance',
          'createdAt',
          'deleted',
          'displayName',
          'externalId',
          'gameId',
          'handle',
          'id',
          'isAdmin',
          'registered',
          'updatedAt',
        ].sort()
      );
    });

    it('id is primary key and externalId is unique', () => {
      const cols = getTableColumns(schema.accounts);
      expect(cols.id.primary).toBe(true);
      expect(cols.externalId.isUnique).toBe(true);
      expect(cols.externalId.notNull).toBe(true);
    });

    it('display fields are nullable', () => {
      const cols = getTableColumns(schema.accounts);
      expect(cols.handle.notNull).toBe(false);
      expect(cols.displayName.notNull).toBe(false);
      expect(cols.gameId.notNull).toBe(false);
    });

    it('flags and balance are notNull', () => {
      const cols = getTableColumns(schema.accounts);
      expect(cols.registered.notNull).toBe(true);
      expect(cols.deleted.notNull).toBe(true);
      expect(cols.isAdmin.notNull).toBe(true);
      expect(cols.balance.notNull).toBe(true);
    });
  });

  describe('ledgerTx table columns', () => {
    it('allows either party to be absent for admin adjustments', () => {
      const cols = getTableColumns(schema.ledgerTx);
      expect(cols.fromAccountId.notNull).toBe(false);
      expect(cols.toAccountId.notNull).toBe(false);
    });

    it('financial columns are notNull', () => {
      const cols = getTableColumns(schema.ledgerTx);
      expect(cols.amount.notNull).toBe(true);
      expect(cols.kind.notNull).toBe(true);
      expect(cols.createdAt.notNull).toBe(true);
    });

    it('kind is restricted to the three ledger kinds', () => {
      const cols = getTableColumns(schema.ledgerTx);
      expect(cols.kind.enumValues).toEqual(['transfer', 'admin_credit', 'admin_debit']);
    });
  });

  describe('paymentRequests table columns', () => {
    it('token is unique and required', () => {
      const cols = getTableColumns(schema.paymentRequests);
      expect(cols.token.isUnique).toBe(true);
      expect(cols.token.notNull).toBe(true);
    });

    it('amount is optional (open requests)', () => {
      const cols = getTableColumns(schema.paymentRequests);
      expect(cols.amount.notNull).toBe(false);
    });

    it('expiry and used flag are required', () => {
      const cols = getTableColumns(schema.paymentRequests);
      expect(cols.expiresAt.notNull).toBe(true);
      expect(cols.used.notNull).toBe(true);
    });
  });

  describe('DDL', () => {
    it('creates every table in the drizzle schema', async () => {
      const ddl = await loadSchemaSql();
      for (const table of [schema.accounts, schema.ledgerTx, schema.paymentRequests]) {
        expect(ddl).toContain(`CREATE TABLE IF NOT EXISTS ${getTableName(table)} (`);
      }
    });

    it('declares every drizzle column', async () => {
      const ddl = await loadSchemaSql();
      for (const table of [schema.accounts, schema.ledgerTx, schema.paymentRequests]) {
        for (const column of Object.values(getTableColumns(table))) {
          expect(ddl).toMatch(new RegExp(`^  ${column.name} `, 'm'));
        }
      }
    });
  });
});
