/**
 * @fileoverview Error taxonomy for Kumo Suite.
 *
 * Every error carries a machine-readable code, a structured data payload and
 * an ISO timestamp so that HTTP handlers and log lines can treat them
 * uniformly.
 *
 * @module @kumo/contracts/errors
 */

/**
 * Base error class for all Kumo errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new KumoError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class KumoError extends Error {
  /** Machine-readable error code (e.g. 'TERMINAL_NOT_CONNECTED'). */
  readonly code: string;

  /** Structured context for logging and error responses. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp of creation. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'KumoError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a component is constructed with invalid settings, such as a
 * non-positive indicator period.
 */
export class InvalidConfigurationError extends KumoError {
  constructor(
    message: string,
    data: {
      setting: string;
      value: unknown;
      [key: string]: unknown;
    }
  ) {
    super('INVALID_CONFIGURATION', message, data);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Thrown when a caller-supplied parameter cannot be parsed
 * (malformed date, unknown timeframe in strict mode).
 *
 * HTTP handlers map this to 400.
 */
export class InvalidParameterError extends KumoError {
  constructor(
    message: string,
    data: {
      parameter: string;
      value: unknown;
      [key: string]: unknown;
    }
  ) {
    super('INVALID_PARAMETER', message, data);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Thrown when the trading terminal session is not established.
 */
export class TerminalConnectionError extends KumoError {
  constructor(
    message: string,
    data: {
      provider: string;
      [key: string]: unknown;
    }
  ) {
    super('TERMINAL_NOT_CONNECTED', message, data);
    this.name = 'TerminalConnectionError';
  }
}

/**
 * Thrown when the terminal answers a quote or symbol request with no data or
 * an error.
 *
 * @example
 * ```typescript
 * throw new QuoteRetrievalError('Failed to get rates for EURUSD', {
 *   provider: 'metatrader',
 *   symbol: 'EURUSD',
 *   lastError: [-2, 'Invalid arguments'],
 * });
 * ```
 */
export class QuoteRetrievalError extends KumoError {
  constructor(
    message: string,
    data: {
      provider: string;
      symbol?: string;
      [key: string]: unknown;
    }
  ) {
    super('QUOTE_RETRIEVAL_FAILED', message, data);
    this.name = 'QuoteRetrievalError';
  }
}

export function isKumoError(error: unknown): error is KumoError {
  return error instanceof KumoError;
}

export function isInvalidConfigurationError(error: unknown): error is InvalidConfigurationError {
  return error instanceof InvalidConfigurationError;
}

export function isInvalidParameterError(error: unknown): error is InvalidParameterError {
  return error instanceof InvalidParameterError;
}

export function isTerminalConnectionError(error: unknown): error is TerminalConnectionError {
  return error instanceof TerminalConnectionError;
}

export function isQuoteRetrievalError(error: unknown): error is QuoteRetrievalError {
  return error instanceof QuoteRetrievalError;
}
