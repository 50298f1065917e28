import { Decimal } from 'decimal.js';

// Monetary amounts never approach the limits below; precision stays well above
// the two decimal places we settle in so intermediate products are exact.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/** Number of decimal places amounts are settled and stored in. */
export const MONEY_DECIMAL_PLACES = 2;

/** Smallest currency unit (one cent). */
export const SMALLEST_CURRENCY_UNIT = new Decimal('0.01');

export type RoundingMode = 'half-up' | 'half-even';

const ROUNDING_MODES: Record<RoundingMode, Decimal.Rounding> = {
  'half-up': Decimal.ROUND_HALF_UP,
  'half-even': Decimal.ROUND_HALF_EVEN,
};

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(
  value: string | number | Decimal | undefined | null,
  out?: { value: Decimal }
): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) return false;
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Round a monetary amount to the settlement precision.
 */
export function roundMoney(amount: Decimal, mode: RoundingMode = 'half-up'): Decimal {
  return amount.toDecimalPlaces(MONEY_DECIMAL_PLACES, ROUNDING_MODES[mode]);
}

/**
 * Fixed two-decimal string, the form amounts are stored and hashed in.
 */
export function formatMoney(amount: Decimal, mode: RoundingMode = 'half-up'): string {
  return roundMoney(amount, mode).toFixed(MONEY_DECIMAL_PLACES);
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}
