/**
 * Numeric helpers shared by the metrics analyzers
 */

/**
 * Divide, falling back to 0 when the denominator is zero (or not a number).
 * Degenerate ratios are reported as 0 rather than NaN/Infinity.
 */
export function safeDivide(numerator: number, denominator: number): number {
  return denominator ? numerator / denominator : 0;
}

// digits past the requested precision inspected to spot an exact tie
const TIE_GUARD_DIGITS = 25;

/**
 * Fixed-point string rounded half-to-even.
 *
 * `toFixed` already rounds the exact binary value, so only exact ties
 * (6.125, 0.0625 * 100, ...) differ: it breaks them away from zero.
 */
export function toFixedHalfEven(value: number, decimals: number): string {
  const fixed = value.toFixed(decimals);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return fixed;
  }

  const expanded = Math.abs(value).toFixed(decimals + TIE_GUARD_DIGITS);
  const kept = expanded.slice(0, expanded.length - TIE_GUARD_DIGITS);
  const dropped = expanded.slice(expanded.length - TIE_GUARD_DIGITS);
  const lastKeptDigit = Number(kept.replace('.', '').slice(-1));

  if (/^50*$/.test(dropped) && lastKeptDigit % 2 === 0) {
    return `${value < 0 ? '-' : ''}${kept.replace(/\.$/, '')}`;
  }
  return fixed;
}

/**
 * Round to a fixed number of decimal places, ties to even
 */
export function roundTo(value: number, decimals: number): number {
  const rounded = Number(toFixedHalfEven(value, decimals));
  // normalise -0 so reports never carry a signed zero
  return rounded === 0 ? 0 : rounded;
}

/**
 * Format a fraction as a one-decimal percentage, e.g. 0.05 -> "5.0%".
 * Ties round to even: 0.0625 -> "6.2%".
 */
export function formatPercent(fraction: number): string {
  return `${toFixedHalfEven(fraction * 100, 1)}%`;
}

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return currencyFormatter.format(amount);
}

/**
 * Walk a nested record and return the dotted paths of every non-finite number
 */
export function findNonFiniteValues(value: unknown, path = ''): string[] {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? [] : [path];
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).flatMap(([key, child]) =>
      findNonFiniteValues(child, path ? `${path}.${key}` : key)
    );
  }
  return [];
}
