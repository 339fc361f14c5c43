/**
 * Minimal logger contract accepted by the price client and parser.
 * Anything with `log` and `warn` works, e.g. `console` or the host application's logger.
 */
export interface PriceLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

export const LOG_TAG = '[PRICES]';

export const consoleLogger: PriceLogger = {
  log: (...args: unknown[]) => console.log(LOG_TAG, ...args),
  warn: (...args: unknown[]) => console.warn(LOG_TAG, ...args),
};

