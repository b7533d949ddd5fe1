/**
 * @fileoverview Normalizes thrown values into {@link AppError} and maps error
 * codes onto HTTP statuses.
 * @module src/utils/internal/errorHandler
 */
import { AppError, ErrorCode } from '../../types-global/errors.js';
import { logger, type LogContext } from './logger.js';

export interface ErrorHandlerOptions {
  operation: string;
  context?: LogContext | undefined;
  /** Code used when the thrown value is not already an AppError. */
  errorCode?: ErrorCode | undefined;
}

/** HTTP statuses an {@link AppError} can surface as. */
export type ErrorHttpStatus = 400 | 500 | 502 | 504;

const httpStatusByCode: Record<ErrorCode, ErrorHttpStatus> = {
  [ErrorCode.InvalidParams]: 400,
  [ErrorCode.ValidationError]: 502,
  [ErrorCode.ServiceUnavailable]: 502,
  [ErrorCode.Timeout]: 504,
  [ErrorCode.ConfigurationError]: 500,
  [ErrorCode.InternalError]: 500,
};

export class ErrorHandler {
  static toAppError(
    error: unknown,
    fallbackCode: ErrorCode = ErrorCode.InternalError,
  ): AppError {
    if (error instanceof AppError) return error;
    if (error instanceof Error) {
      return new AppError(fallbackCode, error.message, {
        originalName: error.name,
      });
    }
    return new AppError(fallbackCode, String(error));
  }

  /**
   * Logs the error under the given operation and returns it as an AppError.
   */
  static handleError(error: unknown, options: ErrorHandlerOptions): AppError {
    const appError = ErrorHandler.toAppError(error, options.errorCode);
    logger.error(`Error in ${options.operation}: ${appError.message}`, {
      ...options.context,
      operation: options.operation,
      errorCode: appError.code,
      errorData: appError.data,
      error: error instanceof Error ? error : undefined,
    });
    return appError;
  }

  static httpStatusFor(error: AppError): ErrorHttpStatus {
    return httpStatusByCode[error.code];
  }
}
