/**
 * @fileoverview Search form, results page and CSV export routes.
 * @module src/web-server/routes/search.routes
 */
import { Hono } from 'hono';

import { AppError, ErrorCode } from '../../types-global/errors.js';
import { ErrorHandler } from '../../utils/index.js';
import { CSV_FILENAME, trialsToCsv } from '../export/trialsCsv.js';
import type { AppEnv, WebServerDependencies } from '../types.js';
import { resultsPage } from '../views/results.js';
import { searchPage } from '../views/searchForm.js';
import {
  hasSearchCriteria,
  MISSING_CRITERIA_MESSAGE,
  parseSearchQuery,
} from './searchQuery.js';

export const createSearchRoutes = ({
  searchService,
  resultsPageSize,
}: WebServerDependencies): Hono<AppEnv> => {
  const routes = new Hono<AppEnv>();

  routes.get('/', (c) => c.html(searchPage()));

  routes.get('/search', async (c) => {
    const context = c.get('requestContext');

    const parsed = parseSearchQuery(c.req);
    if (!parsed.success) {
      return c.html(
        searchPage({
          params: parsed.params,
          alerts: [{ level: 'warning', message: parsed.message }],
        }),
        400,
      );
    }

    const { params } = parsed;
    if (!hasSearchCriteria(params)) {
      return c.html(
        searchPage({
          alerts: [{ level: 'warning', message: MISSING_CRITERIA_MESSAGE }],
        }),
      );
    }

    try {
      const result = await searchService.search(params, context);
      return c.html(
        resultsPage({
          params,
          result,
          maxResults: searchService.maxResults,
          resultsPageSize,
        }),
      );
    } catch (error) {
      const appError = ErrorHandler.handleError(error, {
        operation: 'search',
        context,
        errorCode: ErrorCode.ServiceUnavailable,
      });
      return c.html(
        searchPage({
          params,
          alerts: [
            {
              level: 'danger',
              message: `Error fetching results: ${appError.message}`,
            },
          ],
        }),
      );
    }
  });

  // Upstream failures reach the app-level error handler.
  routes.get('/export', async (c) => {
    const parsed = parseSearchQuery(c.req);
    if (!parsed.success) {
      throw new AppError(ErrorCode.InvalidParams, parsed.message);
    }
    if (!hasSearchCriteria(parsed.params)) {
      throw new AppError(ErrorCode.InvalidParams, MISSING_CRITERIA_MESSAGE);
    }

    const result = await searchService.search(
      parsed.params,
      c.get('requestContext'),
    );

    return c.body(trialsToCsv(result.trials), 200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename=${CSV_FILENAME}`,
    });
  });

  return routes;
};
