/**
 * Payload and result types for the dynamic prices API.
 */

/**
 * One tariff as delivered by the API. Every field is optional because the
 * payload is untrusted; the short `start`/`end`/`price` names are accepted too.
 */
export interface RawTariff {
  startDateTime?: unknown;
  endDateTime?: unknown;
  totalAmount?: unknown;
  totalAmountEx?: unknown;
  totalAmountVat?: unknown;
  groups?: unknown;
  start?: unknown;
  end?: unknown;
  price?: unknown;
}

export interface RawEnergyBlock {
  tariffs?: unknown;
  unit?: unknown;
  unitOfMeasurement?: unknown;
}

export interface RawPriceDay {
  date?: unknown;
  electricity?: unknown;
  gas?: unknown;
}

export interface RawPriceResponse {
  prices: Array<unknown>;
}

export interface NormalizedPricePoint {
  /** ISO 8601 in Europe/Amsterdam civil time (e.g., "2024-01-01T01:00:00+01:00") */
  readonly start: string;
  readonly end: string;
  /** Total price as published, unit passed through unchanged */
  readonly price: number;
  readonly priceExVat?: number;
  readonly vat?: number;
  /** Price component breakdown, passed through as published */
  readonly groups?: ReadonlyArray<Readonly<Record<string, unknown>>>;
}

export interface CommodityResult {
  readonly prices: ReadonlyArray<NormalizedPricePoint>;
  readonly minPrice: number | null;
  readonly maxPrice: number | null;
  readonly avgPrice: number | null;
}

export interface CommodityPrices extends CommodityResult {
  /**
   * Tomorrow's part of `prices`, empty until the next day is published.
   * `prices` and the statistics cover today and tomorrow together.
   */
  readonly tomorrowPrices: ReadonlyArray<NormalizedPricePoint>;
  /** Normalized unit such as "kWh" or "m³", null when the API gives none */
  readonly unit: string | null;
}

export type Commodity = 'electricity' | 'gas';

export type PricesResult = Readonly<Record<Commodity, CommodityPrices>>;
