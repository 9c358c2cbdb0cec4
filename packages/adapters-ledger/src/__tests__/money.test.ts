import { describe, it, expect } from 'vitest';
import { parseAmount, formatAmount, assertPositiveAmount, MAX_AMOUNT, InvalidAmountError } from '../index.js';

describe('money', () => {
  describe('parseAmount', () => {
    it('parses whole units', () => {
      expect(parseAmount('30')).toBe(3000n);
    });

    it('parses one and two fractional digits', () => {
      expect(parseAmount('30.5')).toBe(3050n);
      expect(parseAmount('30.05')).toBe(3005n);
    });

    it('accepts a comma decimal separator and surrounding whitespace', () => {
      expect(parseAmount('30,50')).toBe(3050n);
      expect(parseAmount('  0.01 ')).toBe(1n);
    });

    it('accepts the numeric(18,2) ceiling', () => {
      expect(parseAmount('9999999999999999.99')).toBe(MAX_AMOUNT);
    });

    it.each(['', 'abc', '-5', '1.234', '1e3', '.5', '5.', '1 000'])('rejects malformed "%s"', (input) => {
      expect(() => parseAmount(input)).toThrow(InvalidAmountError);
    });

    it('rejects zero', () => {
      expect(() => parseAmount('0')).toThrow('Amount must be positive');
      expect(() => parseAmount('0.00')).toThrow('Amount must be positive');
    });

    it('rejects amounts above the ceiling', () => {
      expect(() => parseAmount('10000000000000000')).toThrow(InvalidAmountError);
    });
  });

  describe('formatAmount', () => {
    it('always renders two decimals', () => {
      expect(formatAmount(7000n)).toBe('70.00');
      expect(formatAmount(5n)).toBe('0.05');
      expect(formatAmount(0n)).toBe('0.00');
      expect(formatAmount(123456n)).toBe('1234.56');
    });

    it('renders negative balances', () => {
      expect(formatAmount(-500n)).toBe('-5.00');
      expect(formatAmount(-1n)).toBe('-0.01');
    });
  });

  describe('assertPositiveAmount', () => {
    it('passes for positive amounts', () => {
      expect(() => assertPositiveAmount(1n)).not.toThrow();
    });

    it('throws for zero and negatives', () => {
      expect(() => assertPositiveAmount(0n)).toThrow(InvalidAmountError);
      expect(() => assertPositiveAmount(-1n)).toThrow(InvalidAmountError);
    });
  });
});
