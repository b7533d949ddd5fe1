/**
 * @fileoverview Shared types for the HTTP layer.
 * @module src/web-server/types
 */
import type { TrialSearchService } from '../services/clinical-trials-gov/trialSearch.service.js';
import type { RequestContext } from '../utils/index.js';

/** Hono environment: values set by middleware and read by handlers. */
export type AppEnv = {
  Variables: {
    requestContext: RequestContext;
  };
};

/** The part of the search service the routes depend on. */
export type TrialSearcher = Pick<TrialSearchService, 'search' | 'maxResults'>;

export interface WebServerDependencies {
  searchService: TrialSearcher;
  /** Rows per page in the client-side results table. */
  resultsPageSize: number;
}
