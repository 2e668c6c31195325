/**
 * Fixed-point money utility tests
 */

import { describe, it, expect } from 'vitest';
import {
  tryParseAmount,
  parseAmount,
  formatAmount,
  MAX_AMOUNT_CENTS,
} from '../../../src/utils/money.js';

describe('parseAmount()', () => {
  it('parses decimal strings into cents', () => {
    expect(parseAmount('12.50')).toBe(1250);
    expect(parseAmount('-0.99')).toBe(-99);
    expect(parseAmount('+7')).toBe(700);
    expect(parseAmount(' 3.1 ')).toBe(310);
    expect(parseAmount('0012.00')).toBe(1200);
  });

  it('parses numbers through their decimal form', () => {
    expect(parseAmount(12.5)).toBe(1250);
    expect(parseAmount(-0.01)).toBe(-1);
    expect(parseAmount(100)).toBe(10000);
  });

  it('keeps 12345678.90 exact', () => {
    const cents = parseAmount('12345678.90');
    expect(cents).toBe(1234567890);
    expect(formatAmount(cents)).toBe('12345678.90');
    expect(parseAmount(formatAmount(cents))).toBe(cents);
  });

  it('accepts the largest NUMERIC(10, 2) value', () => {
    expect(parseAmount('99999999.99')).toBe(MAX_AMOUNT_CENTS);
    expect(parseAmount('-99999999.99')).toBe(-MAX_AMOUNT_CENTS);
  });

  it('accepts a bare decimal point on either side', () => {
    expect(parseAmount('12.')).toBe(1200);
    expect(parseAmount('.5')).toBe(50);
    expect(parseAmount('-.05')).toBe(-5);
  });

  it('ignores trailing zeros beyond two decimals', () => {
    expect(parseAmount('1.2300')).toBe(123);
  });

  it('never produces negative zero', () => {
    expect(Object.is(parseAmount('-0.00'), 0)).toBe(true);
  });

  it('throws RangeError for invalid amounts', () => {
    expect(() => parseAmount('1.234')).toThrow(RangeError);
    expect(() => parseAmount('abc')).toThrow('Invalid decimal amount "abc"');
  });
});

describe('tryParseAmount()', () => {
  it('rejects more than two significant decimal places', () => {
    expect(tryParseAmount('0.001')).toEqual({
      ok: false,
      reason: 'Amount "0.001" has more than 2 decimal places',
    });
    expect(tryParseAmount(0.1 + 0.2)).toEqual({
      ok: false,
      reason: 'Amount "0.30000000000000004" has more than 2 decimal places',
    });
  });

  it('rejects more than eight integer digits', () => {
    expect(tryParseAmount('123456789')).toEqual({
      ok: false,
      reason: 'Amount "123456789" exceeds 10 total digits',
    });
  });

  it('rejects non-finite numbers and malformed text', () => {
    expect(tryParseAmount(Number.NaN)).toEqual({ ok: false, reason: 'Amount must be a finite number' });
    expect(tryParseAmount('1,000.00')).toEqual({
      ok: false,
      reason: 'Invalid decimal amount "1,000.00"',
    });
    expect(tryParseAmount('.')).toEqual({ ok: false, reason: 'Invalid decimal amount "."' });
    expect(tryParseAmount('-')).toEqual({ ok: false, reason: 'Invalid decimal amount "-"' });
    expect(tryParseAmount('1e3')).toEqual({ ok: false, reason: 'Invalid decimal amount "1e3"' });
  });
});

describe('formatAmount()', () => {
  it('renders exactly two fraction digits', () => {
    expect(formatAmount(0)).toBe('0.00');
    expect(formatAmount(5)).toBe('0.05');
    expect(formatAmount(-50)).toBe('-0.50');
    expect(formatAmount(123400)).toBe('1234.00');
  });

  it('renders aggregates beyond the per-row limit', () => {
    expect(formatAmount(MAX_AMOUNT_CENTS * 3)).toBe('299999999.97');
  });

  it('rejects fractional cents', () => {
    expect(() => formatAmount(1.5)).toThrow('Amount in cents must be a safe integer, got 1.5');
  });
});
