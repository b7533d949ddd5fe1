export {
  ErrorHandler,
  type ErrorHandlerOptions,
  type ErrorHttpStatus,
} from './internal/errorHandler.js';
export { Logger, logger, type LogContext } from './internal/logger.js';
export {
  requestContextService,
  type RequestContext,
} from './internal/requestContext.js';
export { fetchWithTimeout } from './network/fetchWithTimeout.js';
