/**
 * Call-level errors raised by the dynamic price client.
 * Entry-level problems never surface here; the parser skips them.
 */

export class PriceClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The request did not complete or the API answered with a non-2xx status.
 */
export class TransportError extends PriceClientError {
  readonly statusCode?: number;

  constructor(message: string, options: { cause?: unknown; statusCode?: number } = {}) {
    super(message, { cause: options.cause });
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }
}

/**
 * The API answered, but not with JSON of the expected top-level shape.
 */
export class DecodeError extends PriceClientError {}
