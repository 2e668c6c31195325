/**
 * Fixed-point money utilities.
 *
 * Amounts are NUMERIC(10, 2): at most 10 digits, 2 of them after the decimal
 * point. They are held as integer cents everywhere below the API boundary and
 * rendered as two-decimal strings above it. Parsing works on the decimal text,
 * so no value ever passes through a binary fraction.
 */

/** Total significant digits allowed in an amount */
export const AMOUNT_MAX_DIGITS = 10;

/** Digits allowed after the decimal point */
export const AMOUNT_DECIMAL_PLACES = 2;

const MAX_INTEGER_DIGITS = AMOUNT_MAX_DIGITS - AMOUNT_DECIMAL_PLACES;

/** 99,999,999.99 */
export const MAX_AMOUNT_CENTS = 10 ** AMOUNT_MAX_DIGITS - 1;

const AMOUNT_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

export type AmountParseResult = { ok: true; cents: number } | { ok: false; reason: string };

/**
 * Parse a decimal amount into integer cents without throwing.
 *
 * Strings must look like `-1234.5`, `0.99`, `+10`, `12.` or `.5`. Numbers are read through
 * their shortest decimal form (`String(n)`), so `12.5` is accepted while
 * `0.1 + 0.2` is rejected for carrying more than two decimal places.
 * Trailing zeros past the second decimal place are not significant.
 */
export function tryParseAmount(value: string | number): AmountParseResult {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return { ok: false, reason: 'Amount must be a finite number' };
    }
    text = String(value);
  } else {
    text = value.trim();
  }

  const match = AMOUNT_PATTERN.exec(text);
  const [, sign, intPart = '', rawFraction = ''] = match ?? [];
  if (!match || (intPart === '' && rawFraction === '')) {
    return { ok: false, reason: `Invalid decimal amount "${text}"` };
  }

  const fraction = rawFraction.replace(/0+$/, '');
  if (fraction.length > AMOUNT_DECIMAL_PLACES) {
    return {
      ok: false,
      reason: `Amount "${text}" has more than ${AMOUNT_DECIMAL_PLACES} decimal places`,
    };
  }

  const integerDigits = intPart.replace(/^0+(?=\d)/, '');
  if (integerDigits.length > MAX_INTEGER_DIGITS) {
    return {
      ok: false,
      reason: `Amount "${text}" exceeds ${AMOUNT_MAX_DIGITS} total digits`,
    };
  }

  const cents = Number(integerDigits) * 100 + Number(fraction.padEnd(AMOUNT_DECIMAL_PLACES, '0'));
  return { ok: true, cents: sign === '-' && cents !== 0 ? -cents : cents };
}

/**
 * Parse a decimal amount into integer cents.
 *
 * @throws RangeError when the value is not a valid NUMERIC(10, 2) amount
 */
export function parseAmount(value: string | number): number {
  const result = tryParseAmount(value);
  if (!result.ok) {
    throw new RangeError(result.reason);
  }
  return result.cents;
}

/**
 * Render integer cents as a decimal string with exactly two fraction digits.
 * Also used for aggregates, which may exceed the per-row digit limit.
 */
export function formatAmount(cents: number): string {
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Amount in cents must be a safe integer, got ${String(cents)}`);
  }
  const abs = Math.abs(cents);
  const fraction = abs % 100;
  const whole = (abs - fraction) / 100;
  return `${cents < 0 ? '-' : ''}${whole}.${String(fraction).padStart(2, '0')}`;
}
