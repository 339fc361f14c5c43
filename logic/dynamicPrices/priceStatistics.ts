export interface PriceStatistics {
  minPrice: number | null;
  maxPrice: number | null;
  avgPrice: number | null;
}

/**
 * Minimum number of decimals the average is rounded to (cents).
 */
export const MIN_AVERAGE_DECIMALS = 2;

const MAX_AVERAGE_DECIMALS = 10;

/**
 * Count the decimals a number is written with, e.g. 0.2345 -> 4.
 */
export function countDecimals(value: number): number {
  if (!Number.isFinite(value) || Number.isInteger(value)) {
    return 0;
  }
  const [mantissa, exponentText] = value.toString().toLowerCase().split('e');
  const fraction = mantissa.split('.')[1] ?? '';
  const exponent = exponentText ? Number(exponentText) : 0;
  return Math.max(0, fraction.length - exponent);
}

/**
 * Round half away from zero to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
}

/**
 * Compute min, max and average over a price series.
 * - min and max are returned verbatim
 * - the average is rounded to cents, or to the finest precision found in the
 *   input so it always stays within [min, max]
 * - an empty series gives nulls for all three
 */
export function calculatePriceStatistics(prices: ReadonlyArray<number>): PriceStatistics {
  if (prices.length === 0) {
    return { minPrice: null, maxPrice: null, avgPrice: null };
  }

  let min = prices[0];
  let max = prices[0];
  let sum = 0;
  let decimals = MIN_AVERAGE_DECIMALS;

  for (const price of prices) {
    if (price < min) min = price;
    if (price > max) max = price;
    sum += price;
    decimals = Math.max(decimals, countDecimals(price));
  }

  const average = roundTo(sum / prices.length, Math.min(decimals, MAX_AVERAGE_DECIMALS));

  return {
    minPrice: min,
    maxPrice: max,
    // Clamp against float drift in the sum
    avgPrice: Math.min(max, Math.max(min, average)),
  };
}
