export {
  DynamicPriceClient,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT_MS,
  decodePriceResponse,
  type HttpSession,
  type PriceClientOptions,
} from './logic/dynamicPrices/priceClient';
export { parseTariffs, normalizeTariff, PRICE_TIME_ZONE } from './logic/dynamicPrices/tariffParser';
export { calculatePriceStatistics, type PriceStatistics } from './logic/dynamicPrices/priceStatistics';
export { selectDays } from './logic/dynamicPrices/daySelection';
export { normalizeUnit } from './logic/dynamicPrices/units';
export { PriceClientError, TransportError, DecodeError } from './logic/dynamicPrices/errors';
export { consoleLogger, type PriceLogger } from './logic/utils/logUtils';
export type {
  Commodity,
  CommodityPrices,
  CommodityResult,
  NormalizedPricePoint,
  PricesResult,
  RawTariff,
} from './logic/dynamicPrices/types';
