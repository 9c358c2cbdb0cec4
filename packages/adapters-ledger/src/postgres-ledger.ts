import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, gt, inArray, ne, or, sql } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { Database, DatabaseTx, AccountRow, LedgerTxRow } from '@scrip/database';
import { accounts, ledgerTx, paymentRequests } from '@scrip/database';
import {
  type Ledger,
  type LedgerConfig,
  type Account,
  type AdjustDirection,
  type HistoryEntry,
  type PartyRef,
  type PaymentRequest,
  type PaymentRequestView,
  type Redemption,
  type RegistrationInput,
  type TransactionRecord,
  type TxKind,
  DEFAULT_REQUEST_TTL_MS,
  LedgerError,
  LedgerUnavailableError,
  AccountNotFoundError,
  DuplicateGameIdError,
  InsufficientFundsError,
  InvalidAmountError,
  InvalidPaymentRequestError,
  UnauthorizedError,
} from './types.js';
import { assertBalanceInRange, assertPositiveAmount } from './money.js';
import { computeExpiry, generatePaymentToken, paymentRequestStatus } from './payment-token.js';
import {
  adminNote,
  clampHistoryLimit,
  clampListLimit,
  isActive,
  normalizeHandle,
  paymentRequestNote,
  resolveAdminFlag,
  toPartyRef,
} from './account-rules.js';

export interface PostgresLedgerConfig extends LedgerConfig {
  db: Database;
}

// Same normalisation as normalizeHandle: trim, one leading "@", lowercase
const normalizedHandle = sql`lower(regexp_replace(btrim(${accounts.handle}), '^@', ''))`;

const fromAccount = alias(accounts, 'from_account');
const toAccount = alias(accounts, 'to_account');

function single<T>(rows: T[]): T {
  const row = rows[0];
  if (row === undefined) {
    throw new Error('Expected one row, got none');
  }
  return row;
}

function toRecord(row: LedgerTxRow): TransactionRecord {
  return {
    id: row.id,
    fromAccountId: row.fromAccountId,
    toAccountId: row.toAccountId,
    amount: row.amount,
    kind: row.kind,
    note: row.note,
    createdAt: row.createdAt,
  };
}

function toParty(row: AccountRow | null): PartyRef | null {
  return row ? toPartyRef(row) : null;
}

/**
 * Postgres-based ledger
 *
 * Every mutation runs in one transaction. Account rows are locked with
 * SELECT ... FOR UPDATE in ascending id order, so two operations touching
 * the same pair of accounts never deadlock.
 */
export class PostgresLedger implements Ledger {
  private db: Database;
  private readonly bootstrapAdminId: string | undefined;
  private readonly requestTtlMs: number;
  private readonly clock: () => Date;

  constructor(config: PostgresLedgerConfig) {
    this.db = config.db;
    this.bootstrapAdminId = config.bootstrapAdminId;
    this.requestTtlMs = config.requestTtlMs ?? DEFAULT_REQUEST_TTL_MS;
    this.clock = config.clock ?? (() => new Date());
  }

  // ── Balance store ──────────────────────────────────────

  async resolve(externalId: string): Promise<Account | null> {
    return this.read(async () => {
      const rows = await this.db
        .select()
        .from(accounts)
        .where(eq(accounts.externalId, externalId))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async resolveByHandle(handle: string): Promise<Account | null> {
    const wanted = normalizeHandle(handle);
    if (!wanted) return null;

    return this.read(async () => {
      const rows = await this.db
        .select()
        .from(accounts)
        .where(
          and(
            sql`${normalizedHandle} = ${wanted}`,
            eq(accounts.registered, true),
            eq(accounts.deleted, false)
          )
        )
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async resolveByDisplayName(displayName: string): Promise<Account | null> {
    return this.read(async () => {
      const rows = await this.db
        .select()
        .from(accounts)
        .where(
          and(
            eq(accounts.displayName, displayName.trim()),
            eq(accounts.registered, true),
            eq(accounts.deleted, false)
          )
        )
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async resolveByGameId(gameId: string): Promise<Account | null> {
    return this.read(async () => {
      const rows = await this.db
        .select()
        .from(accounts)
        .where(eq(accounts.gameId, gameId.trim()))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async createOrGet(externalId: string, handle?: string | null): Promise<Account> {
    return this.write(async (tx) => {
      const now = this.clock();
      const inserted = await tx
        .insert(accounts)
        .values({
          id: `acc_${randomUUID()}`,
          externalId,
          handle: handle ?? null,
          isAdmin: resolveAdminFlag(false, externalId, this.bootstrapAdminId),
          balance: 0n,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing({ target: accounts.externalId })
        .returning();

      const created = inserted[0];
      if (created) return created;

      const existing = single(
        await tx.select().from(accounts).where(eq(accounts.externalId, externalId)).for('update')
      );
      if (handle === undefined || handle === existing.handle) {
        return existing;
      }
      return single(
        await tx
          .update(accounts)
          .set({ handle, updatedAt: now })
          .where(eq(accounts.id, existing.id))
          .returning()
      );
    });
  }

  async register(externalId: string, input: RegistrationInput): Promise<Account> {
    const gameId = input.gameId.trim();
    const displayName = input.displayName.trim();

    return this.write(async (tx) => {
      const taken = await tx
        .select({ id: accounts.id })
        .from(accounts)
        .where(and(eq(accounts.gameId, gameId), ne(accounts.externalId, externalId)))
        .limit(1);
      if (taken.length > 0) {
        throw new DuplicateGameIdError(gameId);
      }

      const now = this.clock();
      const existing = await tx
        .select()
        .from(accounts)
        .where(eq(accounts.externalId, externalId))
        .for('update');
      const current = existing[0];

      if (!current) {
        return single(
          await tx
            .insert(accounts)
            .values({
              id: `acc_${randomUUID()}`,
              externalId,
              handle: input.handle ?? null,
              displayName,
              gameId,
              registered: true,
              isAdmin: resolveAdminFlag(false, externalId, this.bootstrapAdminId),
              balance: 0n,
              createdAt: now,
              updatedAt: now,
            })
            .returning()
        );
      }

      return single(
        await tx
          .update(accounts)
          .set({
            handle: input.handle === undefined ? current.handle : input.handle,
            displayName,
            gameId,
            registered: true,
            deleted: false,
            isAdmin: resolveAdminFlag(current.isAdmin, externalId, this.bootstrapAdminId),
            updatedAt: now,
          })
          .where(eq(accounts.id, current.id))
          .returning()
      );
    });
  }

  async softDelete(adminExternalId: string, targetExternalId: string): Promise<Account> {
    return this.write(async (tx) => {
      const locked = await this.lockAccounts(tx, [adminExternalId, targetExternalId]);
      this.requireAdmin(locked, adminExternalId);

      const target = locked.get(targetExternalId);
      if (!target) {
        throw new AccountNotFoundError(targetExternalId);
      }

      return single(
        await tx
          .update(accounts)
          .set({ deleted: true, updatedAt: this.clock() })
          .where(eq(accounts.id, target.id))
          .returning()
      );
    });
  }

  async listActiveAccounts(limit?: number): Promise<Account[]> {
    return this.read(() =>
      this.db
        .select()
        .from(accounts)
        .where(and(eq(accounts.registered, true), eq(accounts.deleted, false)))
        .orderBy(asc(accounts.displayName), asc(accounts.id))
        .limit(clampListLimit(limit))
    );
  }

  async getBalance(externalId: string): Promise<bigint> {
    const account = await this.resolve(externalId);
    if (!account) {
      throw new AccountNotFoundError(externalId);
    }
    return account.balance;
  }

  // ── Transaction log ────────────────────────────────────

  async getHistory(externalId: string, limit?: number): Promise<HistoryEntry[]> {
    const account = await this.resolve(externalId);
    if (!account) {
      throw new AccountNotFoundError(externalId);
    }

    const rows = await this.read(() =>
      this.db
        .select({ tx: ledgerTx, from: fromAccount, to: toAccount })
        .from(ledgerTx)
        .leftJoin(fromAccount, eq(ledgerTx.fromAccountId, fromAccount.id))
        .leftJoin(toAccount, eq(ledgerTx.toAccountId, toAccount.id))
        .where(or(eq(ledgerTx.fromAccountId, account.id), eq(ledgerTx.toAccountId, account.id)))
        .orderBy(desc(ledgerTx.seq))
        .limit(clampHistoryLimit(limit))
    );

    return rows.map((row) => ({
      ...toRecord(row.tx),
      from: toParty(row.from),
      to: toParty(row.to),
    }));
  }

  // ── Transfer / adjustment ──────────────────────────────

  async transfer(
    senderExternalId: string,
    recipientExternalId: string,
    amount: bigint,
    note?: string | null
  ): Promise<TransactionRecord> {
    assertPositiveAmount(amount);
    return this.write((tx) =>
      this.transferInTx(tx, senderExternalId, recipientExternalId, amount, note ?? null)
    );
  }

  async adjust(
    adminExternalId: string,
    targetExternalId: string,
    amount: bigint,
    direction: AdjustDirection,
    note?: string | null
  ): Promise<TransactionRecord> {
    return this.write(async (tx) => {
      const locked = await this.lockAccounts(tx, [adminExternalId, targetExternalId]);
      this.requireAdmin(locked, adminExternalId);
      assertPositiveAmount(amount);

      const target = locked.get(targetExternalId);
      if (!target || target.deleted) {
        throw new AccountNotFoundError(targetExternalId);
      }

      const isCredit = direction === 'credit';
      const balance = isCredit ? target.balance + amount : target.balance - amount;
      assertBalanceInRange(balance);

      const now = this.clock();
      await tx
        .update(accounts)
        .set({ balance, updatedAt: now })
        .where(eq(accounts.id, target.id));

      return this.appendTx(
        tx,
        isCredit ? null : target.id,
        isCredit ? target.id : null,
        amount,
        isCredit ? 'admin_credit' : 'admin_debit',
        adminNote(adminExternalId, note),
        now
      );
    });
  }

  // ── Payment requests ───────────────────────────────────

  async createPaymentRequest(
    requesterExternalId: string,
    amount?: bigint | null
  ): Promise<PaymentRequest> {
    if (amount !== undefined && amount !== null) {
      assertPositiveAmount(amount);
    }

    return this.write(async (tx) => {
      const requesters = await tx
        .select()
        .from(accounts)
        .where(eq(accounts.externalId, requesterExternalId))
        .limit(1);
      const requester = requesters[0];
      if (!requester || !isActive(requester)) {
        throw new AccountNotFoundError(requesterExternalId);
      }

      const now = this.clock();
      return single(
        await tx
          .insert(paymentRequests)
          .values({
            id: `pr_${randomUUID()}`,
            token: generatePaymentToken(),
            requesterId: requester.id,
            amount: amount ?? null,
            createdAt: now,
            expiresAt: computeExpiry(now, this.requestTtlMs),
            used: false,
          })
          .returning()
      );
    });
  }

  async validatePaymentRequest(token: string): Promise<PaymentRequest | null> {
    return this.read(async () => {
      const rows = await this.db
        .select()
        .from(paymentRequests)
        .where(
          and(
            eq(paymentRequests.token, token),
            eq(paymentRequests.used, false),
            gt(paymentRequests.expiresAt, this.clock())
          )
        )
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async inspectPaymentRequest(token: string): Promise<PaymentRequestView | null> {
    const rows = await this.read(() =>
      this.db
        .select({ request: paymentRequests, requester: accounts })
        .from(paymentRequests)
        .innerJoin(accounts, eq(paymentRequests.requesterId, accounts.id))
        .where(eq(paymentRequests.token, token))
        .limit(1)
    );

    const row = rows[0];
    if (!row) return null;
    return {
      request: row.request,
      requester: toPartyRef(row.requester),
      status: paymentRequestStatus(row.request, this.clock()),
    };
  }

  async redeemPaymentRequest(
    token: string,
    payerExternalId: string,
    amount?: bigint | null
  ): Promise<Redemption> {
    return this.write(async (tx) => {
      // The conditional update is the only arbiter between concurrent redeemers.
      // Any throw below rolls it back, leaving the request redeemable.
      const claimed = await tx
        .update(paymentRequests)
        .set({ used: true })
        .where(
          and(
            eq(paymentRequests.token, token),
            eq(paymentRequests.used, false),
            gt(paymentRequests.expiresAt, this.clock())
          )
        )
        .returning();

      const request = claimed[0];
      if (!request) {
        throw new InvalidPaymentRequestError();
      }

      const requesters = await tx
        .select()
        .from(accounts)
        .where(eq(accounts.id, request.requesterId))
        .limit(1);
      const requester = requesters[0];
      if (!requester || !isActive(requester)) {
        throw new InvalidPaymentRequestError();
      }

      const effective = request.amount ?? amount;
      if (effective === undefined || effective === null) {
        throw new InvalidAmountError('Amount is required for an open payment request');
      }
      assertPositiveAmount(effective);

      const transaction = await this.transferInTx(
        tx,
        payerExternalId,
        requester.externalId,
        effective,
        paymentRequestNote(request.id)
      );
      return { request, transaction, amount: effective };
    });
  }

  // ── Internals ──────────────────────────────────────────

  private async transferInTx(
    tx: DatabaseTx,
    senderExternalId: string,
    recipientExternalId: string,
    amount: bigint,
    note: string | null
  ): Promise<TransactionRecord> {
    const locked = await this.lockAccounts(tx, [senderExternalId, recipientExternalId]);

    const sender = locked.get(senderExternalId);
    if (!sender || !isActive(sender)) {
      throw new AccountNotFoundError(senderExternalId);
    }
    const recipient = locked.get(recipientExternalId);
    if (!recipient || !isActive(recipient)) {
      throw new AccountNotFoundError(recipientExternalId);
    }

    if (sender.balance < amount) {
      throw new InsufficientFundsError(senderExternalId, amount, sender.balance);
    }

    const now = this.clock();
    if (sender.id !== recipient.id) {
      assertBalanceInRange(recipient.balance + amount);

      await tx
        .update(accounts)
        .set({ balance: sender.balance - amount, updatedAt: now })
        .where(eq(accounts.id, sender.id));

      await tx
        .update(accounts)
        .set({ balance: recipient.balance + amount, updatedAt: now })
        .where(eq(accounts.id, recipient.id));
    }

    return this.appendTx(tx, sender.id, recipient.id, amount, 'transfer', note, now);
  }

  /**
   * Lock the given accounts for the rest of the transaction, lowest id first.
   * Returns them keyed by external id; unknown identities are absent.
   */
  private async lockAccounts(tx: DatabaseTx, externalIds: string[]): Promise<Map<string, Account>> {
    const rows = await tx
      .select()
      .from(accounts)
      .where(inArray(accounts.externalId, [...new Set(externalIds)]))
      .orderBy(asc(accounts.id))
      .for('update');

    return new Map(rows.map((row) => [row.externalId, row]));
  }

  private requireAdmin(locked: Map<string, Account>, adminExternalId: string): void {
    const admin = locked.get(adminExternalId);
    if (!admin || !admin.isAdmin || admin.deleted) {
      throw new UnauthorizedError(adminExternalId);
    }
  }

  private async appendTx(
    tx: DatabaseTx,
    fromAccountId: string | null,
    toAccountId: string | null,
    amount: bigint,
    kind: TxKind,
    note: string | null,
    createdAt: Date
  ): Promise<TransactionRecord> {
    const rows = await tx
      .insert(ledgerTx)
      .values({ id: `tx_${randomUUID()}`, fromAccountId, toAccountId, amount, kind, note, createdAt })
      .returning();
    return toRecord(single(rows));
  }

  /**
   * Run a mutation in one transaction. Domain errors pass through untouched;
   * anything else is a store failure with nothing committed.
   */
  private async write<T>(work: (tx: DatabaseTx) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(work);
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      throw new LedgerUnavailableError(err);
    }
  }

  private async read<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      throw new LedgerUnavailableError(err);
    }
  }
}

export function createLedger(config: PostgresLedgerConfig): Ledger {
  return new PostgresLedger(config);
}
