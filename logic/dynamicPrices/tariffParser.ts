import type { CommodityResult, NormalizedPricePoint } from './types';
import { calculatePriceStatistics } from './priceStatistics';
import { formatInTimeZone, parseIsoInstant } from '../utils/dateUtils';
import { consoleLogger, type PriceLogger } from '../utils/logUtils';

/**
 * Civil timezone all tariff boundaries are expressed in
 */
export const PRICE_TIME_ZONE = 'Europe/Amsterdam';

export function emptyCommodityResult(): CommodityResult {
  return { prices: [], minPrice: null, maxPrice: null, avgPrice: null };
}

type TariffCheck =
  | { ok: true; point: NormalizedPricePoint }
  | { ok: false; reason: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Validate one raw tariff and convert it to a normalized price point.
 * API field names take precedence over the short ones.
 */
export function normalizeTariff(entry: unknown): TariffCheck {
  if (!isRecord(entry)) {
    return { ok: false, reason: 'entry is not an object' };
  }
  const rawStart = entry.startDateTime ?? entry.start;
  const rawEnd = entry.endDateTime ?? entry.end;
  const rawPrice = entry.totalAmount ?? entry.price;

  const start = parseIsoInstant(rawStart);
  if (start === null) {
    return { ok: false, reason: `invalid start ${JSON.stringify(rawStart)}` };
  }
  const end = parseIsoInstant(rawEnd);
  if (end === null) {
    return { ok: false, reason: `invalid end ${JSON.stringify(rawEnd)}` };
  }
  if (start >= end) {
    return { ok: false, reason: `start ${String(rawStart)} is not before end ${String(rawEnd)}` };
  }
  const price = toFiniteNumber(rawPrice);
  if (price === undefined) {
    return { ok: false, reason: `invalid price ${JSON.stringify(rawPrice)}` };
  }

  const priceExVat = toFiniteNumber(entry.totalAmountEx);
  const vat = toFiniteNumber(entry.totalAmountVat);
  const groups = Array.isArray(entry.groups) ? entry.groups.filter(isRecord) : undefined;

  return {
    ok: true,
    point: {
      start: formatInTimeZone(start, PRICE_TIME_ZONE),
      end: formatInTimeZone(end, PRICE_TIME_ZONE),
      price,
      ...(priceExVat !== undefined ? { priceExVat } : {}),
      ...(vat !== undefined ? { vat } : {}),
      ...(groups !== undefined ? { groups } : {}),
    },
  };
}

/**
 * Parse a raw tariff schedule into normalized price points and statistics.
 * - Malformed entries are skipped (and logged), the rest is still parsed
 * - Source order is kept; out-of-order data is left visible, not re-sorted
 * - Anything that is not a non-empty array gives an empty result
 * @param rawEntries - Tariff list as found in the API payload
 * @param logger - Receives a warning per skipped entry
 */
export function parseTariffs(rawEntries: unknown, logger: PriceLogger = consoleLogger): CommodityResult {
  if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
    return emptyCommodityResult();
  }

  const prices: Array<NormalizedPricePoint> = [];
  rawEntries.forEach((entry: unknown, index: number) => {
    const result = normalizeTariff(entry);
    if (result.ok) {
      prices.push(result.point);
    } else {
      logger.warn(`Skipping tariff #${index}: ${result.reason}`);
    }
  });

  return {
    prices,
    ...calculatePriceStatistics(prices.map(({ price }) => price)),
  };
}
