import { Decimal } from 'decimal.js';

// Coin amounts routinely carry 18 decimal places; keep enough significant digits
// that proration of such amounts does not lose precision.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Try to parse a string, number or Decimal. Empty input parses as zero.
 */
export function tryParseDecimal(value: string | number | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (decimal.isNaN()) {
      return false;
    }
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string, number or Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Sum a list of decimals; the empty sum is zero.
 */
export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Fixed-point string for display, trailing zeros trimmed.
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 8): string {
  const fixed = decimal.toFixed(maxDecimalPlaces);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}
