/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400): malformed method, URL or init fields.
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    details?: Record<string, unknown>,
    code = 'VALIDATION_ERROR'
  ) {
    super(message, 400, code);
    this.details = details;
  }
}

/**
 * Body content that could not be decoded at consumption time.
 */
export class DecodingError extends ValidationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, undefined, 'DECODING_ERROR');
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Contract violation: a used body, a second response decision, a rewind
 * without a retained buffer. Never retried.
 */
export class StateError extends AppError {
  constructor(message: string, isOperational = true) {
    super(message, 500, 'INVALID_STATE', isOperational);
  }
}

/**
 * Transport failure or a redirect chain that cannot be replayed.
 */
export class TransmissionError extends AppError {
  public readonly url: string;
  public readonly retriable = false;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, 502, 'TRANSMISSION_ERROR', true, options);
    this.url = url;
  }
}

/**
 * Operation not supported by the current configuration.
 */
export class CapabilityError extends AppError {
  constructor(message: string) {
    super(message, 501, 'NOT_SUPPORTED');
  }
}

/**
 * An abort signal fired while a read or transport call was in flight.
 */
export class CancellationError extends AppError {
  public readonly reason: unknown;

  constructor(reason: unknown, message = 'The operation was aborted') {
    super(message, 499, 'CANCELED', true, { cause: reason });
    this.reason = reason;
  }
}
