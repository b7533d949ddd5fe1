/**
 * @fileoverview ClinicalTrials.gov API provider implementation.
 * Handles HTTP requests and response validation.
 *
 * @module src/services/clinical-trials-gov/providers/clinicaltrials-gov.provider
 */

import { AppError, ErrorCode } from '../../../types-global/errors.js';
import {
  fetchWithTimeout,
  logger,
  type RequestContext,
} from '../../../utils/index.js';
import type {
  IClinicalTrialsProvider,
  ListStudiesParams,
} from '../core/IClinicalTrialsProvider.js';
import { PagedStudiesSchema, type PagedStudies } from '../types.js';

export interface ClinicalTrialsGovProviderOptions {
  /** API root, e.g. `https://clinicaltrials.gov/api/v2`. */
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Implementation of IClinicalTrialsProvider for the ClinicalTrials.gov v2 API.
 */
export class ClinicalTrialsGovProvider implements IClinicalTrialsProvider {
  constructor(private readonly options: ClinicalTrialsGovProviderOptions) {}

  /**
   * @inheritdoc
   */
  async listStudies(
    params: ListStudiesParams,
    context: RequestContext,
  ): Promise<PagedStudies> {
    const queryParams = new URLSearchParams();

    for (const [key, value] of Object.entries(params.query)) {
      if (value) {
        queryParams.set(key, value);
      }
    }
    queryParams.set('pageSize', String(params.pageSize));
    if (params.pageToken) {
      queryParams.set('pageToken', params.pageToken);
    }

    // Always count total so the results page can report it
    queryParams.set('countTotal', 'true');

    const url = `${this.options.baseUrl}/studies?${queryParams.toString()}`;
    const data = await this.fetchJson(url, context);

    const result = PagedStudiesSchema.safeParse(data);
    if (!result.success) {
      logger.error('[API] Studies list validation failed', {
        ...context,
        errors: result.error.errors,
      });
      throw new AppError(
        ErrorCode.ValidationError,
        'Invalid studies data received from API',
        { validationErrors: result.error.errors },
      );
    }

    return result.data;
  }

  /**
   * Performs the GET request and parses the body as JSON.
   *
   * @throws {AppError} ServiceUnavailable on a non-OK status, ValidationError on a non-JSON body
   */
  private async fetchJson(
    url: string,
    context: RequestContext,
  ): Promise<unknown> {
    logger.debug(`[API] Fetching from ${url}`, context);

    const response = await fetchWithTimeout(
      url,
      this.options.timeoutMs,
      context,
      {
        headers: { Accept: 'application/json' },
      },
    );

    if (!response.ok) {
      const errorBody = await response.text();
      logger.error(`[API] Error response: ${errorBody}`, context);

      const message =
        response.status === 404
          ? `Resource not found: ${errorBody}`
          : `API request failed with status ${response.status}: ${response.statusText}`;

      throw new AppError(ErrorCode.ServiceUnavailable, message, {
        url,
        status: response.status,
        body: errorBody,
      });
    }

    const responseBody = await response.text();
    logger.debug('[API] Response received', {
      ...context,
      bodyLength: responseBody.length,
    });

    try {
      const parsed: unknown = JSON.parse(responseBody);
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('[API] Response body is not JSON', { ...context, reason });
      throw new AppError(
        ErrorCode.ValidationError,
        'Invalid studies data received from API',
        { url, reason },
      );
    }
  }
}
