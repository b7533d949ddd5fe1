/**
 * @fileoverview Paginated search over ClinicalTrials.gov. Requests pages one
 * after another, flattens each study into a {@link Trial}, and stops at the
 * configured result cap or when the API reports no further page.
 *
 * @module src/services/clinical-trials-gov/trialSearch.service
 */

import { logger, type RequestContext } from '../../utils/index.js';
import type { IClinicalTrialsProvider } from './core/IClinicalTrialsProvider.js';
import { buildStudyQuery } from './queryBuilder.js';
import { toTrial } from './trialMapper.js';
import type { SearchParams, SearchResult, Trial } from './types.js';

export interface TrialSearchOptions {
  /** Upper bound on trials returned by one search. */
  readonly maxResults: number;
  /** Studies requested per API call. */
  readonly pageSize: number;
}

export class TrialSearchService {
  private readonly options: Readonly<TrialSearchOptions>;

  constructor(
    private readonly provider: IClinicalTrialsProvider,
    options: TrialSearchOptions,
  ) {
    this.options = Object.freeze({ ...options });
  }

  get maxResults(): number {
    return this.options.maxResults;
  }

  /**
   * Runs a search. Provider errors propagate unchanged: there is no retry
   * and no partial result.
   */
  async search(
    params: SearchParams,
    context: RequestContext,
  ): Promise<SearchResult> {
    const { maxResults, pageSize } = this.options;
    const query = buildStudyQuery(params);

    logger.debug('Starting trial search', { ...context, query, maxResults });

    const trials: Trial[] = [];
    let totalCount = 0;
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const page = await this.provider.listStudies(
        { query, pageSize, ...(pageToken && { pageToken }) },
        context,
      );
      pages += 1;
      totalCount = page.totalCount ?? 0;
      trials.push(...page.studies.map(toTrial));
      pageToken = page.nextPageToken || undefined;
    } while (pageToken && trials.length < maxResults);

    const truncated = trials.length >= maxResults;
    const result: SearchResult = {
      trials: trials.slice(0, maxResults),
      totalCount,
      truncated,
    };

    logger.info(
      `Trial search fetched ${result.trials.length} of ${totalCount} trials`,
      { ...context, pages, truncated },
    );

    return result;
  }
}
