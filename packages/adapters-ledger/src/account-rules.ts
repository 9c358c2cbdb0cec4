import {
  type Account,
  type PartyRef,
  DEFAULT_HISTORY_LIMIT,
  MAX_HISTORY_LIMIT,
  DEFAULT_ACCOUNT_LIST_LIMIT,
} from './types.js';

/**
 * Registered and not soft-deleted
 */
export function isActive(account: Account): boolean {
  return account.registered && !account.deleted;
}

export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^@/, '').toLowerCase();
}

/**
 * Admin is granted to the bootstrap identity and never revoked
 */
export function resolveAdminFlag(
  current: boolean,
  externalId: string,
  bootstrapAdminId: string | undefined
): boolean {
  return current || (bootstrapAdminId !== undefined && bootstrapAdminId === externalId);
}

export function adminNote(adminExternalId: string, note?: string | null): string {
  const base = `admin:${adminExternalId}`;
  return note ? `${base} ${note}` : base;
}

export function paymentRequestNote(requestId: string): string {
  return `payment_request:${requestId}`;
}

export function toPartyRef(account: Account): PartyRef {
  return {
    externalId: account.externalId,
    handle: account.handle,
    displayName: account.displayName,
  };
}

export function clampHistoryLimit(limit: number | undefined): number {
  if (limit === undefined) return DEFAULT_HISTORY_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_HISTORY_LIMIT);
}

export function clampListLimit(limit: number | undefined): number {
  if (limit === undefined) return DEFAULT_ACCOUNT_LIST_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), DEFAULT_ACCOUNT_LIST_LIMIT);
}

/**
 * Sort key for the registered player list (display name, nulls last)
 */
export function compareByDisplayName(a: Account, b: Account): number {
  if (a.displayName === b.displayName) return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  if (a.displayName === null) return 1;
  if (b.displayName === null) return -1;
  return a.displayName < b.displayName ? -1 : 1;
}
