/**
 * @fileoverview Provider interface for ClinicalTrials.gov API operations.
 * Defines the contract for fetching pages of clinical trial data.
 *
 * @module src/services/clinical-trials-gov/core/IClinicalTrialsProvider
 */

import type { RequestContext } from '../../../utils/index.js';
import type { StudyQuery } from '../queryBuilder.js';
import type { PagedStudies } from '../types.js';

/**
 * Parameters for fetching one page of studies.
 */
export interface ListStudiesParams {
  /**
   * Upstream filter parameters, as produced by `buildStudyQuery`.
   */
  query: StudyQuery;

  /**
   * Maximum number of studies in the page.
   */
  pageSize: number;

  /**
   * Cursor returned as `nextPageToken` by the previous page.
   */
  pageToken?: string | undefined;
}

/**
 * Provider interface for ClinicalTrials.gov API operations.
 * Implementations handle HTTP requests and response validation.
 */
export interface IClinicalTrialsProvider {
  /**
   * Lists one page of studies matching the query. The total match count is
   * always requested.
   *
   * @throws {AppError} If the request fails, times out, or returns an invalid payload
   */
  listStudies(
    params: ListStudiesParams,
    context: RequestContext,
  ): Promise<PagedStudies>;
}
