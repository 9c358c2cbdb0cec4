/**
 * JSON views of ledger entities. Amounts become decimal strings.
 */

import {
  formatAmount,
  type Account,
  type HistoryEntry,
  type PaymentRequest,
  type PartyRef,
  type TransactionRecord,
} from '@scrip/adapters-ledger';

export interface AccountView {
  externalId: string;
  handle: string | null;
  displayName: string | null;
  gameId: string | null;
  registered: boolean;
  deleted: boolean;
  isAdmin: boolean;
  balance: string;
  createdAt: string;
}

export interface TransactionView {
  id: string;
  kind: TransactionRecord['kind'];
  amount: string;
  note: string | null;
  createdAt: string;
}

export interface HistoryEntryView extends TransactionView {
  from: PartyRef | null;
  to: PartyRef | null;
}

export interface PaymentRequestView {
  token: string;
  amount: string | null;
  createdAt: string;
  expiresAt: string;
  used: boolean;
}

export function serializeAccount(account: Account): AccountView {
  return {
    externalId: account.externalId,
    handle: account.handle,
    displayName: account.displayName,
    gameId: account.gameId,
    registered: account.registered,
    deleted: account.deleted,
    isAdmin: account.isAdmin,
    balance: formatAmount(account.balance),
    createdAt: account.createdAt.toISOString(),
  };
}

export function serializeTransaction(tx: TransactionRecord): TransactionView {
  return {
    id: tx.id,
    kind: tx.kind,
    amount: formatAmount(tx.amount),
    note: tx.note,
    createdAt: tx.createdAt.toISOString(),
  };
}

export function serializeHistoryEntry(entry: HistoryEntry): HistoryEntryView {
  return { ...serializeTransaction(entry), from: entry.from, to: entry.to };
}

export function serializePaymentRequest(request: PaymentRequest): PaymentRequestView {
  return {
    token: request.token,
    amount: request.amount === null ? null : formatAmount(request.amount),
    createdAt: request.createdAt.toISOString(),
    expiresAt: request.expiresAt.toISOString(),
    used: request.used,
  };
}
