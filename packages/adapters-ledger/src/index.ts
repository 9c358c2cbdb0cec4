export {
  type Ledger,
  type LedgerConfig,
  type Account,
  type AdjustDirection,
  type TransactionRecord,
  type TxKind,
  type PartyRef,
  type HistoryEntry,
  type PaymentRequest,
  type PaymentRequestStatus,
  type PaymentRequestView,
  type Redemption,
  type RegistrationInput,
  type LedgerErrorCode,
  DEFAULT_REQUEST_TTL_MS,
  DEFAULT_HISTORY_LIMIT,
  MAX_HISTORY_LIMIT,
  LedgerError,
  AccountNotFoundError,
  InsufficientFundsError,
  UnauthorizedError,
  InvalidPaymentRequestError,
  InvalidAmountError,
  DuplicateGameIdError,
  LedgerUnavailableError,
} from './types.js';

export { parseAmount, formatAmount, assertPositiveAmount, assertBalanceInRange, MAX_AMOUNT } from './money.js';
export { isActive } from './account-rules.js';
export { generatePaymentToken, paymentRequestStatus, tokenPreview } from './payment-token.js';
export { MemoryLedger } from './memory-ledger.js';
export { PostgresLedger, createLedger, type PostgresLedgerConfig } from './postgres-ledger.js';
