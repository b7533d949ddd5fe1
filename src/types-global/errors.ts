/**
 * @fileoverview Error codes and the application error type shared by every layer.
 * @module src/types-global/errors
 */

/**
 * Stable error codes carried by {@link AppError}.
 */
export enum ErrorCode {
  InvalidParams = 'INVALID_PARAMS',
  ValidationError = 'VALIDATION_ERROR',
  ServiceUnavailable = 'SERVICE_UNAVAILABLE',
  Timeout = 'TIMEOUT',
  ConfigurationError = 'CONFIGURATION_ERROR',
  InternalError = 'INTERNAL_ERROR',
}

/**
 * Error raised by application code. `data` holds structured details
 * (upstream status, url, validation issues) for logging.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}
