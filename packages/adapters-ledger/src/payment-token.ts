import { randomBytes } from 'node:crypto';
import type { PaymentRequest, PaymentRequestStatus } from './types.js';

const TOKEN_BYTES = 32;

/**
 * Generate a payment request token: 32 random bytes, base64url (43 chars).
 * The token is the only credential needed to pay the request.
 */
export function generatePaymentToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

export function computeExpiry(createdAt: Date, ttlMs: number): Date {
  return new Date(createdAt.getTime() + ttlMs);
}

export function paymentRequestStatus(request: PaymentRequest, now: Date): PaymentRequestStatus {
  if (request.used) return 'used';
  if (now.getTime() >= request.expiresAt.getTime()) return 'expired';
  return 'open';
}

export function isRedeemable(request: PaymentRequest, now: Date): boolean {
  return paymentRequestStatus(request, now) === 'open';
}

/**
 * Short token prefix safe for logs
 */
export function tokenPreview(token: string): string {
  return `${token.slice(0, 6)}…`;
}
