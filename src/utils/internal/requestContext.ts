/**
 * @fileoverview Creates the per-request context that travels with every log
 * line and service call.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

export const requestContextService = {
  /**
   * Builds a fresh context. `requestId` is generated unless supplied, so a
   * context can be derived from an incoming correlation id.
   */
  createRequestContext(
    extra: { requestId?: string | undefined; [key: string]: unknown } = {},
  ): RequestContext {
    const { requestId, ...rest } = extra;
    return {
      ...rest,
      requestId: requestId ?? randomUUID(),
      timestamp: new Date().toISOString(),
    };
  },
};
