import { InvalidAmountError } from './types.js';

/**
 * Fixed-point money: bigint minor units, 2 decimal places.
 */
export const AMOUNT_SCALE = 2;
const MINOR_PER_UNIT = 100n;

/** numeric(18,2) ceiling */
export const MAX_AMOUNT = 999_999_999_999_999_999n;

const AMOUNT_PATTERN = /^(\d+)(?:[.,](\d{1,2}))?$/;

/**
 * Parse a user-entered decimal ("30", "30.5", "30,50") into minor units.
 * @throws InvalidAmountError for malformed, non-positive or oversized input
 */
export function parseAmount(input: string): bigint {
  const match = AMOUNT_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidAmountError(`Malformed amount: "${input}"`);
  }

  const units = BigInt(match[1] ?? '0');
  const fraction = BigInt((match[2] ?? '').padEnd(AMOUNT_SCALE, '0'));
  const minor = units * MINOR_PER_UNIT + fraction;

  assertPositiveAmount(minor);
  return minor;
}

export function formatAmount(minor: bigint): string {
  const sign = minor < 0n ? '-' : '';
  const abs = minor < 0n ? -minor : minor;
  const units = abs / MINOR_PER_UNIT;
  const fraction = (abs % MINOR_PER_UNIT).toString().padStart(AMOUNT_SCALE, '0');
  return `${sign}${units}.${fraction}`;
}

export function assertPositiveAmount(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidAmountError();
  }
  if (amount > MAX_AMOUNT) {
    throw new InvalidAmountError(`Amount exceeds maximum of ${formatAmount(MAX_AMOUNT)}`);
  }
}

/**
 * Balances stay within ±MAX_AMOUNT so every stored value fits the int8 column.
 */
export function assertBalanceInRange(balance: bigint): void {
  if (balance > MAX_AMOUNT || balance < -MAX_AMOUNT) {
    throw new InvalidAmountError(`Resulting balance exceeds maximum of ${formatAmount(MAX_AMOUNT)}`);
  }
}
