import {
  type Ledger,
  type LedgerConfig,
  type Account,
  type AdjustDirection,
  type HistoryEntry,
  type PaymentRequest,
  type PaymentRequestView,
  type Redemption,
  type RegistrationInput,
  type TransactionRecord,
  type TxKind,
  DEFAULT_REQUEST_TTL_MS,
  AccountNotFoundError,
  DuplicateGameIdError,
  InsufficientFundsError,
  InvalidAmountError,
  InvalidPaymentRequestError,
  UnauthorizedError,
} from './types.js';
import { assertBalanceInRange, assertPositiveAmount } from './money.js';
import {
  computeExpiry,
  generatePaymentToken,
  isRedeemable,
  paymentRequestStatus,
} from './payment-token.js';
import {
  adminNote,
  clampHistoryLimit,
  clampListLimit,
  compareByDisplayName,
  isActive,
  normalizeHandle,
  paymentRequestNote,
  resolveAdminFlag,
  toPartyRef,
} from './account-rules.js';

/**
 * In-memory ledger
 * Suitable for testing and local development.
 *
 * Every mutating method runs synchronously between its reads and writes,
 * so each operation is one indivisible unit on the event loop.
 */
export class MemoryLedger implements Ledger {
  private accounts = new Map<string, Account>();
  private accountIdsByExternalId = new Map<string, string>();
  private transactions: TransactionRecord[] = [];
  private requests = new Map<string, PaymentRequest>(); // token -> request
  private nextAccountId = 1;
  private nextTxId = 1;
  private nextRequestId = 1;

  private readonly bootstrapAdminId: string | undefined;
  private readonly requestTtlMs: number;
  private readonly clock: () => Date;

  constructor(config: LedgerConfig = {}) {
    this.bootstrapAdminId = config.bootstrapAdminId;
    this.requestTtlMs = config.requestTtlMs ?? DEFAULT_REQUEST_TTL_MS;
    this.clock = config.clock ?? (() => new Date());
  }

  // ── Balance store ──────────────────────────────────────

  async resolve(externalId: string): Promise<Account | null> {
    const account = this.findByExternalId(externalId);
    return account ? { ...account } : null;
  }

  async resolveByHandle(handle: string): Promise<Account | null> {
    const wanted = normalizeHandle(handle);
    if (!wanted) return null;
    return this.findActive((a) => a.handle !== null && normalizeHandle(a.handle) === wanted);
  }

  async resolveByDisplayName(displayName: string): Promise<Account | null> {
    const wanted = displayName.trim();
    return this.findActive((a) => a.displayName === wanted);
  }

  async resolveByGameId(gameId: string): Promise<Account | null> {
    const wanted = gameId.trim();
    for (const account of this.accounts.values()) {
      if (account.gameId === wanted) return { ...account };
    }
    return null;
  }

  private createOrGetSync(externalId: string, handle?: string | null): Account {
    const existing = this.findByExternalId(externalId);
    if (existing) {
      if (handle !== undefined && handle !== existing.handle) {
        return this.save({ ...existing, handle, updatedAt: this.clock() });
      }
      return existing;
    }

    const now = this.clock();
    const account: Account = {
      id: `acc_${this.nextAccountId++}`,
      externalId,
      handle: handle ?? null,
      displayName: null,
      gameId: null,
      registered: false,
      deleted: false,
      isAdmin: resolveAdminFlag(false, externalId, this.bootstrapAdminId),
      balance: 0n,
      createdAt: now,
      updatedAt: now,
    };
    this.accountIdsByExternalId.set(externalId, account.id);
    return this.save(account);
  }

  async createOrGet(externalId: string, handle?: string | null): Promise<Account> {
    return { ...this.createOrGetSync(externalId, handle) };
  }

  async register(externalId: string, input: RegistrationInput): Promise<Account> {
    const gameId = input.gameId.trim();
    for (const other of this.accounts.values()) {
      if (other.gameId === gameId && other.externalId !== externalId) {
        throw new DuplicateGameIdError(gameId);
      }
    }

    const base = this.createOrGetSync(externalId, input.handle);
    return {
      ...this.save({
        ...base,
        displayName: input.displayName.trim(),
        gameId,
        registered: true,
        deleted: false,
        isAdmin: resolveAdminFlag(base.isAdmin, externalId, this.bootstrapAdminId),
        updatedAt: this.clock(),
      }),
    };
  }

  async softDelete(adminExternalId: string, targetExternalId: string): Promise<Account> {
    this.requireAdmin(adminExternalId);
    const target = this.findByExternalId(targetExternalId);
    if (!target) {
      throw new AccountNotFoundError(targetExternalId);
    }
    return { ...this.save({ ...target, deleted: true, updatedAt: this.clock() }) };
  }

  async listActiveAccounts(limit?: number): Promise<Account[]> {
    return Array.from(this.accounts.values())
      .filter(isActive)
      .sort(compareByDisplayName)
      .slice(0, clampListLimit(limit))
      .map((a) => ({ ...a }));
  }

  async getBalance(externalId: string): Promise<bigint> {
    const account = this.findByExternalId(externalId);
    if (!account) {
      throw new AccountNotFoundError(externalId);
    }
    return account.balance;
  }

  // ── Transaction log ────────────────────────────────────

  async getHistory(externalId: string, limit?: number): Promise<HistoryEntry[]> {
    const account = this.findByExternalId(externalId);
    if (!account) {
      throw new AccountNotFoundError(externalId);
    }

    const entries: HistoryEntry[] = [];
    const max = clampHistoryLimit(limit);
    for (let i = this.transactions.length - 1; i >= 0 && entries.length < max; i--) {
      const tx = this.transactions[i];
      if (!tx || (tx.fromAccountId !== account.id && tx.toAccountId !== account.id)) continue;
      entries.push({ ...tx, from: this.partyOf(tx.fromAccountId), to: this.partyOf(tx.toAccountId) });
    }
    return entries;
  }

  // ── Transfer / adjustment ──────────────────────────────

  async transfer(
    senderExternalId: string,
    recipientExternalId: string,
    amount: bigint,
    note?: string | null
  ): Promise<TransactionRecord> {
    return this.applyTransfer(senderExternalId, recipientExternalId, amount, note ?? null);
  }

  async adjust(
    adminExternalId: string,
    targetExternalId: string,
    amount: bigint,
    direction: AdjustDirection,
    note?: string | null
  ): Promise<TransactionRecord> {
    this.requireAdmin(adminExternalId);
    assertPositiveAmount(amount);

    const target = this.findByExternalId(targetExternalId);
    if (!target || target.deleted) {
      throw new AccountNotFoundError(targetExternalId);
    }

    const isCredit = direction === 'credit';
    const delta = isCredit ? amount : -amount;
    assertBalanceInRange(target.balance + delta);
    this.moveBalance(target.id, delta);
    return this.appendTx(
      isCredit ? null : target.id,
      isCredit ? target.id : null,
      amount,
      isCredit ? 'admin_credit' : 'admin_debit',
      adminNote(adminExternalId, note)
    );
  }

  // ── Payment requests ───────────────────────────────────

  async createPaymentRequest(
    requesterExternalId: string,
    amount?: bigint | null
  ): Promise<PaymentRequest> {
    const requester = this.findByExternalId(requesterExternalId);
    if (!requester || !isActive(requester)) {
      throw new AccountNotFoundError(requesterExternalId);
    }
    if (amount !== undefined && amount !== null) {
      assertPositiveAmount(amount);
    }

    let token = generatePaymentToken();
    while (this.requests.has(token)) {
      token = generatePaymentToken();
    }

    const now = this.clock();
    const request: PaymentRequest = {
      id: `pr_${this.nextRequestId++}`,
      token,
      requesterId: requester.id,
      amount: amount ?? null,
      createdAt: now,
      expiresAt: computeExpiry(now, this.requestTtlMs),
      used: false,
    };
    this.requests.set(token, request);
    return { ...request };
  }

  async validatePaymentRequest(token: string): Promise<PaymentRequest | null> {
    const request = this.requests.get(token);
    if (!request || !isRedeemable(request, this.clock())) {
      return null;
    }
    return { ...request };
  }

  async inspectPaymentRequest(token: string): Promise<PaymentRequestView | null> {
    const request = this.requests.get(token);
    const requester = request ? this.accounts.get(request.requesterId) : undefined;
    if (!request || !requester) {
      return null;
    }
    return {
      request: { ...request },
      requester: toPartyRef(requester),
      status: paymentRequestStatus(request, this.clock()),
    };
  }

  async redeemPaymentRequest(
    token: string,
    payerExternalId: string,
    amount?: bigint | null
  ): Promise<Redemption> {
    const request = this.requests.get(token);
    if (!request || !isRedeemable(request, this.clock())) {
      throw new InvalidPaymentRequestError();
    }

    const requester = this.accounts.get(request.requesterId);
    if (!requester || !isActive(requester)) {
      throw new InvalidPaymentRequestError();
    }

    const effective = request.amount ?? amount;
    if (effective === undefined || effective === null) {
      throw new InvalidAmountError('Amount is required for an open payment request');
    }

    // Throws before any mutation, leaving the request redeemable
    const transaction = this.applyTransfer(
      payerExternalId,
      requester.externalId,
      effective,
      paymentRequestNote(request.id)
    );

    const used: PaymentRequest = { ...request, used: true };
    this.requests.set(token, used);
    return { request: { ...used }, transaction, amount: effective };
  }

  // ── Internals ──────────────────────────────────────────

  private applyTransfer(
    senderExternalId: string,
    recipientExternalId: string,
    amount: bigint,
    note: string | null
  ): TransactionRecord {
    assertPositiveAmount(amount);

    const sender = this.findByExternalId(senderExternalId);
    if (!sender || !isActive(sender)) {
      throw new AccountNotFoundError(senderExternalId);
    }
    const recipient = this.findByExternalId(recipientExternalId);
    if (!recipient || !isActive(recipient)) {
      throw new AccountNotFoundError(recipientExternalId);
    }

    if (sender.balance < amount) {
      throw new InsufficientFundsError(senderExternalId, amount, sender.balance);
    }
    if (sender.id !== recipient.id) {
      assertBalanceInRange(recipient.balance + amount);
    }

    this.moveBalance(sender.id, -amount);
    this.moveBalance(recipient.id, amount);
    return this.appendTx(sender.id, recipient.id, amount, 'transfer', note);
  }

  private moveBalance(accountId: string, delta: bigint): void {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new Error(`Account ${accountId} vanished`);
    }
    this.save({ ...account, balance: account.balance + delta, updatedAt: this.clock() });
  }

  private appendTx(
    fromAccountId: string | null,
    toAccountId: string | null,
    amount: bigint,
    kind: TxKind,
    note: string | null
  ): TransactionRecord {
    const tx: TransactionRecord = {
      id: `tx_${this.nextTxId++}`,
      fromAccountId,
      toAccountId,
      amount,
      kind,
      note,
      createdAt: this.clock(),
    };
    this.transactions.push(tx);
    return { ...tx };
  }

  private requireAdmin(adminExternalId: string): Account {
    const admin = this.findByExternalId(adminExternalId);
    if (!admin || !admin.isAdmin || admin.deleted) {
      throw new UnauthorizedError(adminExternalId);
    }
    return admin;
  }

  private findByExternalId(externalId: string): Account | undefined {
    const id = this.accountIdsByExternalId.get(externalId);
    return id === undefined ? undefined : this.accounts.get(id);
  }

  private findActive(predicate: (account: Account) => boolean): Account | null {
    for (const account of this.accounts.values()) {
      if (isActive(account) && predicate(account)) return { ...account };
    }
    return null;
  }

  private partyOf(accountId: string | null): HistoryEntry['from'] {
    if (accountId === null) return null;
    const account = this.accounts.get(accountId);
    return account ? toPartyRef(account) : null;
  }

  private save(account: Account): Account {
    this.accounts.set(account.id, account);
    return account;
  }

  /**
   * Test helper: sum of all account balances
   */
  getTotalBalance(): bigint {
    let total = 0n;
    for (const account of this.accounts.values()) {
      total += account.balance;
    }
    return total;
  }

  /**
   * Test helper: all transactions, oldest first
   */
  getAllTransactions(): TransactionRecord[] {
    return this.transactions.map((tx) => ({ ...tx }));
  }

  /**
   * Test helper: get all accounts
   */
  getAllAccounts(): Account[] {
    return Array.from(this.accounts.values()).map((a) => ({ ...a }));
  }
}
