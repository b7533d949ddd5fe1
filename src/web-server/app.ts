/**
 * @fileoverview Builds the Hono application: middleware, routes and the
 * error and not-found handlers.
 * @module src/web-server/app
 */
import { Hono } from 'hono';
import { html } from 'hono/html';

import { ErrorCode } from '../types-global/errors.js';
import { ErrorHandler } from '../utils/index.js';
import { requestContextMiddleware } from './middleware/requestContext.js';
import { createSearchRoutes } from './routes/search.routes.js';
import type { AppEnv, WebServerDependencies } from './types.js';
import { layout } from './views/layout.js';

export const createApp = (deps: WebServerDependencies): Hono<AppEnv> => {
  const app = new Hono<AppEnv>();

  app.use('*', requestContextMiddleware);

  app.get('/healthz', (c) => c.json({ status: 'ok' }));
  app.route('/', createSearchRoutes(deps));

  app.notFound((c) =>
    c.html(
      layout(
        'Not Found',
        html`<h1>Page not found</h1>
          <p><a href="/">Back to search</a></p>`,
      ),
      404,
    ),
  );

  app.onError((err, c) => {
    const appError = ErrorHandler.handleError(err, {
      operation: `${c.req.method} ${c.req.path}`,
      context: c.get('requestContext'),
      errorCode: ErrorCode.InternalError,
    });
    const status = ErrorHandler.httpStatusFor(appError);
    const message =
      appError.code === ErrorCode.InvalidParams
        ? appError.message
        : `Error fetching results: ${appError.message}`;
    return c.text(message, status);
  });

  return app;
};
