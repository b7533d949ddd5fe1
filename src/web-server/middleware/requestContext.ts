/**
 * @fileoverview Attaches a request context to every request and logs its completion.
 * @module src/web-server/middleware/requestContext
 */
import { createMiddleware } from 'hono/factory';

import { logger, requestContextService } from '../../utils/index.js';
import type { AppEnv } from '../types.js';

export const requestContextMiddleware = createMiddleware<AppEnv>(
  async (c, next) => {
    const context = requestContextService.createRequestContext({
      requestId: c.req.header('x-request-id'),
      operation: `${c.req.method} ${c.req.path}`,
    });
    c.set('requestContext', context);
    c.header('X-Request-Id', context.requestId);
    const startedAt = performance.now();

    await next();

    logger.info('HTTP request completed', {
      ...context,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Number((performance.now() - startedAt).toFixed(2)),
    });
  },
);
