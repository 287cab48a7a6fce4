/**
 * Prices at or above this are treated as corrupted input
 */
export const MAX_PRICE = 1_000_000_000;

const PRICE_SCALE = 2;

/**
 * Normalizes a raw price string into a numeric amount with two decimals.
 *
 * Handles the separator conventions found on store pages without a locale:
 * - Norwegian: "1 990,-" → 1990
 * - European: "1.990,50 €" → 1990.5
 * - US: "$1,990.50" → 1990.5
 *
 * @param rawValue - Raw price text extracted from the page
 * @returns Amount, or null when no believable price could be parsed
 */
export function cleanPrice(rawValue: string | null | undefined): number | null {
  const amount = parsePriceText(rawValue);

  if (amount === null || amount <= 0 || amount >= MAX_PRICE) {
    return null;
  }

  return roundPrice(amount);
}

/**
 * Same parse as cleanPrice without the magnitude guard or rounding, so callers
 * can tell a zero price from text that holds no number at all and check the
 * bounds on the amount as written.
 */
export function parsePriceText(rawValue: string | null | undefined): number | null {
  if (!rawValue || typeof rawValue !== 'string') {
    return null;
  }

  // Step 1: Strip whitespace (including NBSP), currency tokens and the ",-" suffix
  let processed = rawValue
    .replace(/\s+/g, '')
    .replace(/kr/gi, '')
    .replace(/[$€£]/g, '')
    .replace(/,-/g, '');

  // Step 2: Resolve decimal and thousand separators
  processed = resolveSeparators(processed);

  // Step 3: First integer-or-decimal token
  const match = processed.match(/\d+(?:\.\d+)?/);
  if (!match) {
    return null;
  }

  const numericValue = parseFloat(match[0]);
  if (isNaN(numericValue) || !isFinite(numericValue)) {
    return null;
  }

  return numericValue;
}

/**
 * Canonical text form of an amount ("1990.00"). Sub-cent amounts are written
 * out in full ("0.004").
 */
export function formatPrice(amount: number): string {
  return isSubCent(amount) ? String(amount) : amount.toFixed(PRICE_SCALE);
}

/**
 * Round to two decimals; a positive amount never rounds down to zero
 */
function roundPrice(amount: number): number {
  if (isSubCent(amount)) {
    return amount;
  }

  const multiplier = Math.pow(10, PRICE_SCALE);
  return Math.round(amount * multiplier) / multiplier;
}

function isSubCent(amount: number): boolean {
  return amount > 0 && amount < 0.01;
}

/**
 * With both "," and "." present, whichever comes last is the decimal separator.
 * A lone comma is decimal only when exactly two digits follow it.
 */
function resolveSeparators(value: string): string {
  const lastComma = value.lastIndexOf(',');
  const lastDot = value.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    if (lastComma > lastDot) {
      // European format: 1.990,50
      return value.replace(/\./g, '').replace(/,/g, '.');
    }
    // US format: 1,990.50
    return value.replace(/,/g, '');
  }

  if (lastComma !== -1) {
    const commaCount = value.split(',').length - 1;
    if (commaCount === 1 && /,\d{2}(?!\d)/.test(value)) {
      return value.replace(',', '.');
    }
    return value.replace(/,/g, '');
  }

  return value;
}
