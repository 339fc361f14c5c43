/**
 * Dynamic Price Client
 *
 * Fetches the published electricity and gas tariffs and normalizes them.
 * The HTTP transport (a fetch-compatible function) is owned by the caller;
 * the client keeps no per-call state, so one instance can serve concurrent calls.
 */

import type { Commodity, CommodityPrices, PricesResult, RawEnergyBlock, RawPriceDay, RawPriceResponse } from './types';
import { DecodeError, TransportError } from './errors';
import { selectDays } from './daySelection';
import { calculatePriceStatistics } from './priceStatistics';
import { isRecord, parseTariffs } from './tariffParser';
import { normalizeUnit } from './units';
import { extractErrorMessage, truncateErrorMessage } from '../utils/errorUtils';
import { consoleLogger, type PriceLogger } from '../utils/logUtils';

export const DEFAULT_ENDPOINT = 'https://www.essent.nl/api/public/tariffmanagement/dynamic-prices/v1/';

export const DEFAULT_TIMEOUT_MS = 10000;

export type HttpSession = (input: string, init?: RequestInit) => Promise<Response>;

export interface PriceClientOptions {
  /** Endpoint override, e.g. for tests or a regional variant */
  baseUrl?: string;
  timeoutMs?: number;
  logger?: PriceLogger;
  /** Clock used to pick today's prices, in epoch milliseconds */
  now?: () => number;
}

/**
 * Parse response text, rejecting anything that is not `{ prices: [...] }`
 */
export function decodePriceResponse(body: string): RawPriceResponse {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(`Invalid JSON received from dynamic prices API: ${extractErrorMessage(error)}`, { cause: error });
  }

  if (!isRecord(json) || !Array.isArray(json.prices)) {
    throw new DecodeError('Unexpected response structure: missing "prices" list');
  }
  return { prices: json.prices };
}

export class DynamicPriceClient {
  private readonly session: HttpSession;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: PriceLogger;
  private readonly now: () => number;

  constructor(session: HttpSession, options: PriceClientOptions = {}) {
    this.session = session;
    this.baseUrl = options.baseUrl ?? DEFAULT_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fetch today's (and, once published, tomorrow's) prices for both commodities.
   * Exactly one request per call, no retries.
   * @throws TransportError when the request fails or the status is not 2xx
   * @throws DecodeError when the body is not the expected JSON
   */
  async getPrices(): Promise<PricesResult> {
    const body = await this.request();
    const { prices } = decodePriceResponse(body);
    const { today, tomorrow } = selectDays(prices, this.now());

    return {
      electricity: this.normalizeCommodity('electricity', today, tomorrow),
      gas: this.normalizeCommodity('gas', today, tomorrow),
    };
  }

  private async request(): Promise<string> {
    this.logger.log(`Fetching dynamic prices from ${this.baseUrl}`);

    let response: Response;
    try {
      response = await this.session(this.baseUrl, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Network error: ${extractErrorMessage(error)}`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(`Network error: ${extractErrorMessage(error)}`, { cause: error, statusCode: response.status });
    }

    if (!response.ok) {
      throw new TransportError(
        `Dynamic prices request failed ${response.status}: ${truncateErrorMessage(text)}`,
        { statusCode: response.status },
      );
    }
    return text;
  }

  private normalizeCommodity(
    commodity: Commodity,
    today: RawPriceDay | null,
    tomorrow: RawPriceDay | null,
  ): CommodityPrices {
    const todayBlock = getEnergyBlock(today, commodity);
    const tomorrowBlock = getEnergyBlock(tomorrow, commodity);

    const todayTariffs = toList(todayBlock?.tariffs);
    const tomorrowTariffs = toList(tomorrowBlock?.tariffs);
    const todayResult = parseTariffs(todayTariffs, this.logger);
    const tomorrowResult = parseTariffs(tomorrowTariffs, this.logger);

    const prices = [...todayResult.prices, ...tomorrowResult.prices];
    this.logger.log(`${commodity}: ${prices.length} of ${todayTariffs.length + tomorrowTariffs.length} tariffs accepted`);

    return {
      prices,
      ...calculatePriceStatistics(prices.map(({ price }) => price)),
      tomorrowPrices: tomorrowResult.prices,
      unit: readUnit(todayBlock) ?? readUnit(tomorrowBlock),
    };
  }
}

function getEnergyBlock(day: RawPriceDay | null, commodity: Commodity): RawEnergyBlock | null {
  const block = day?.[commodity];
  return isRecord(block) ? block : null;
}

function readUnit(block: RawEnergyBlock | null): string | null {
  return normalizeUnit(block?.unitOfMeasurement) ?? normalizeUnit(block?.unit);
}

function toList(value: unknown): Array<unknown> {
  return Array.isArray(value) ? value : [];
}
