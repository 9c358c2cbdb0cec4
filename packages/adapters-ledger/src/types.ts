/**
 * Kinds of balance-affecting events
 */
export type TxKind = 'transfer' | 'admin_credit' | 'admin_debit';

export type AdjustDirection = 'credit' | 'debit';

/**
 * Ledger participant. Amounts are bigint minor units (2 decimals).
 */
export interface Account {
  id: string;
  externalId: string;
  handle: string | null;
  displayName: string | null;
  gameId: string | null;
  registered: boolean;
  deleted: boolean;
  isAdmin: boolean;
  balance: bigint;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Immutable transaction record
 */
export interface TransactionRecord {
  id: string;
  fromAccountId: string | null; // null for admin credits
  toAccountId: string | null; // null for admin debits
  amount: bigint; // must be > 0
  kind: TxKind;
  note: string | null;
  createdAt: Date;
}

export interface PartyRef {
  externalId: string;
  handle: string | null;
  displayName: string | null;
}

export interface HistoryEntry extends TransactionRecord {
  from: PartyRef | null;
  to: PartyRef | null;
}

export interface PaymentRequest {
  id: string;
  token: string;
  requesterId: string;
  amount: bigint | null; // null = payer chooses
  createdAt: Date;
  expiresAt: Date;
  used: boolean;
}

export type PaymentRequestStatus = 'open' | 'used' | 'expired';

export interface PaymentRequestView {
  request: PaymentRequest;
  requester: PartyRef;
  status: PaymentRequestStatus;
}

export interface Redemption {
  request: PaymentRequest;
  transaction: TransactionRecord;
  amount: bigint;
}

export interface RegistrationInput {
  displayName: string;
  gameId: string;
  handle?: string | null;
}

export interface LedgerConfig {
  /** External identity granted admin at creation/registration */
  bootstrapAdminId?: string;
  /** Payment request validity window */
  requestTtlMs?: number;
  clock?: () => Date;
}

export const DEFAULT_REQUEST_TTL_MS = 15 * 60 * 1000;
export const DEFAULT_HISTORY_LIMIT = 20;
export const MAX_HISTORY_LIMIT = 100;
export const DEFAULT_ACCOUNT_LIST_LIMIT = 100;

/**
 * Ledger port interface
 * Accounts are addressed by their external identity.
 */
export interface Ledger {
  // ── Balance store ──────────────────────────────────────

  /** Any state, including deleted */
  resolve(externalId: string): Promise<Account | null>;

  /** Active accounts only; leading "@" ignored, case-insensitive */
  resolveByHandle(handle: string): Promise<Account | null>;

  /** Active accounts only */
  resolveByDisplayName(displayName: string): Promise<Account | null>;

  resolveByGameId(gameId: string): Promise<Account | null>;

  /**
   * Idempotent. Refreshes the handle when a different one is given.
   */
  createOrGet(externalId: string, handle?: string | null): Promise<Account>;

  /**
   * Complete registration (creates the account if needed)
   * @throws DuplicateGameIdError if another account holds the game id
   */
  register(externalId: string, input: RegistrationInput): Promise<Account>;

  /**
   * @throws UnauthorizedError unless the actor is an admin
   */
  softDelete(adminExternalId: string, targetExternalId: string): Promise<Account>;

  listActiveAccounts(limit?: number): Promise<Account[]>;

  /**
   * Authoritative stored balance
   * @throws AccountNotFoundError
   */
  getBalance(externalId: string): Promise<bigint>;

  // ── Transaction log ────────────────────────────────────

  /** Most recent first */
  getHistory(externalId: string, limit?: number): Promise<HistoryEntry[]>;

  // ── Transfer / adjustment ──────────────────────────────

  /**
   * Atomic debit/credit between two active accounts
   * @throws InsufficientFundsError, AccountNotFoundError, InvalidAmountError
   */
  transfer(
    senderExternalId: string,
    recipientExternalId: string,
    amount: bigint,
    note?: string | null
  ): Promise<TransactionRecord>;

  /**
   * Unconditional credit/debit by an admin; may drive the balance negative
   * @throws UnauthorizedError, AccountNotFoundError, InvalidAmountError
   */
  adjust(
    adminExternalId: string,
    targetExternalId: string,
    amount: bigint,
    direction: AdjustDirection,
    note?: string | null
  ): Promise<TransactionRecord>;

  // ── Payment requests ───────────────────────────────────

  createPaymentRequest(requesterExternalId: string, amount?: bigint | null): Promise<PaymentRequest>;

  /** null for unknown, expired or used tokens */
  validatePaymentRequest(token: string): Promise<PaymentRequest | null>;

  /** null for unknown tokens */
  inspectPaymentRequest(token: string): Promise<PaymentRequestView | null>;

  /**
   * Claim the request and pay the requester in one atomic unit.
   * The request stays redeemable when the transfer fails.
   * @throws InvalidPaymentRequestError, InsufficientFundsError, AccountNotFoundError, InvalidAmountError
   */
  redeemPaymentRequest(
    token: string,
    payerExternalId: string,
    amount?: bigint | null
  ): Promise<Redemption>;
}

/**
 * Errors
 */
export type LedgerErrorCode =
  | 'NOT_FOUND'
  | 'INSUFFICIENT_FUNDS'
  | 'UNAUTHORIZED'
  | 'INVALID_REQUEST'
  | 'INVALID_AMOUNT'
  | 'DUPLICATE_GAME_ID'
  | 'STORE_UNAVAILABLE';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export class AccountNotFoundError extends LedgerError {
  constructor(externalId: string) {
    super('NOT_FOUND', `Account not found: ${externalId}`);
    this.name = 'AccountNotFoundError';
  }
}

export class InsufficientFundsError extends LedgerError {
  constructor(externalId: string, required: bigint, available: bigint) {
    super(
      'INSUFFICIENT_FUNDS',
      `Insufficient funds for ${externalId}: required ${required}, available ${available}`
    );
    this.name = 'InsufficientFundsError';
  }
}

export class UnauthorizedError extends LedgerError {
  constructor(externalId: string) {
    super('UNAUTHORIZED', `Account ${externalId} is not an admin`);
    this.name = 'UnauthorizedError';
  }
}

export class InvalidPaymentRequestError extends LedgerError {
  constructor() {
    super('INVALID_REQUEST', 'Payment request is unknown, expired or already used');
    this.name = 'InvalidPaymentRequestError';
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(message = 'Amount must be positive') {
    super('INVALID_AMOUNT', message);
    this.name = 'InvalidAmountError';
  }
}

export class DuplicateGameIdError extends LedgerError {
  constructor(gameId: string) {
    super('DUPLICATE_GAME_ID', `Game id already registered: ${gameId}`);
    this.name = 'DuplicateGameIdError';
  }
}

/**
 * Transient store failure (I/O, connectivity). Nothing was committed.
 */
export class LedgerUnavailableError extends LedgerError {
  constructor(cause: unknown) {
    super('STORE_UNAVAILABLE', 'Ledger store unavailable', { cause });
    this.name = 'LedgerUnavailableError';
  }
}
