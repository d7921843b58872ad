/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when an environment value is missing or malformed
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly key?: string,
    cause?: Error,
  ) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Validation error - thrown synchronously by the call that received bad input
 * (non-positive amounts, empty leg sets, prices at or below 1, probabilities out of range)
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
  ) {
    super(message, "VALIDATION_ERROR");
  }
}

/**
 * Market error - thrown when a broker cannot quote or report on an order
 */
export class MarketError extends AppError {
  constructor(
    message: string,
    public readonly brokerName?: string,
    cause?: Error,
  ) {
    super(message, "MARKET_ERROR", cause);
  }
}

/**
 * Order submission error - thrown when a broker rejects or fails to accept an order
 */
export class OrderSubmissionError extends MarketError {
  constructor(
    message: string,
    brokerName?: string,
    public readonly stake?: number,
    cause?: Error,
  ) {
    super(message, brokerName, cause);
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
