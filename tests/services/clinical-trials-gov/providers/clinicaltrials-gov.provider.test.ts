/**
 * @fileoverview Unit tests for the ClinicalTrialsGovProvider class.
 * Tests HTTP request construction, response validation and error handling.
 *
 * @module tests/services/clinical-trials-gov/providers/clinicaltrials-gov.provider.test
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { AppError, ErrorCode } from '@/types-global/errors.js';

// ---------------------------------------------------------------------------
// Mocks — must be declared before the import of the class under test
// ---------------------------------------------------------------------------

const mockFetchWithTimeout = vi.fn<
  (
    url: string,
    timeoutMs: number,
    context: unknown,
    options?: RequestInit,
  ) => Promise<Response>
>();
vi.mock('@/utils/network/fetchWithTimeout.js', () => ({
  fetchWithTimeout: (
    url: string,
    timeoutMs: number,
    context: unknown,
    options?: RequestInit,
  ) => mockFetchWithTimeout(url, timeoutMs, context, options),
}));

// Import after mocks are set up
import { ClinicalTrialsGovProvider } from '@/services/clinical-trials-gov/providers/clinicaltrials-gov.provider.js';
import { requestContextService } from '@/utils/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BASE_URL = 'https://clinicaltrials.gov/api/v2';
const TIMEOUT_MS = 15000;

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

function textResponse(text: string, init: ResponseInit = {}): Response {
  return new Response(text, { status: 200, ...init });
}

const validStudy = {
  protocolSection: {
    identificationModule: { nctId: 'NCT12345678', briefTitle: 'Test Study' },
    statusModule: { overallStatus: 'RECRUITING' },
  },
};

const validPagedStudies = {
  studies: [validStudy],
  totalCount: 1,
  nextPageToken: 'token123',
};

const mockContext = requestContextService.createRequestContext({
  requestId: 'test-req-id',
});

const calledUrl = (): URL => {
  const url = mockFetchWithTimeout.mock.calls[0]?.[0];
  if (!url) throw new Error('fetchWithTimeout was not called');
  return new URL(url);
};

const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ClinicalTrialsGovProvider', () => {
  let provider: ClinicalTrialsGovProvider;

  beforeEach(() => {
    mockFetchWithTimeout.mockReset();
    provider = new ClinicalTrialsGovProvider({
      baseUrl: BASE_URL,
      timeoutMs: TIMEOUT_MS,
    });
  });

  describe('listStudies', () => {
    it('returns validated paged studies on success', async () => {
      mockFetchWithTimeout.mockResolvedValue(jsonResponse(validPagedStudies));

      const result = await provider.listStudies(
        { query: {}, pageSize: 100 },
        mockContext,
      );

      expect(result).toEqual(validPagedStudies);
    });

    it('requests JSON with the configured timeout and context', async () => {
      mockFetchWithTimeout.mockResolvedValue(jsonResponse(validPagedStudies));

      await provider.listStudies({ query: {}, pageSize: 100 }, mockContext);

      expect(mockFetchWithTimeout).toHaveBeenCalledWith(
        `${BASE_URL}/studies?pageSize=100&countTotal=true`,
        TIMEOUT_MS,
        mockContext,
        { headers: { Accept: 'application/json' } },
      );
    });

    it('constructs the URL from the query, page size and token', async () => {
      mockFetchWithTimeout.mockResolvedValue(jsonResponse(validPagedStudies));

      await provider.listStudies(
        {
          query: {
            'query.intr': 'pembrolizumab',
            'query.cond': 'Lung Cancer',
            'query.term': 'AREA[Phase](PHASE2 OR PHASE3)',
            'filter.overallStatus': 'RECRUITING,COMPLETED',
          },
          pageSize: 50,
          pageToken: 'abc123',
        },
        mockContext,
      );

      const url = calledUrl();
      expect(url.pathname).toBe('/api/v2/studies');
      expect(url.searchParams.get('query.intr')).toBe('pembrolizumab');
      expect(url.searchParams.get('query.cond')).toBe('Lung Cancer');
      expect(url.searchParams.get('query.term')).toBe(
        'AREA[Phase](PHASE2 OR PHASE3)',
      );
      expect(url.searchParams.get('filter.overallStatus')).toBe(
        'RECRUITING,COMPLETED',
      );
      expect(url.searchParams.get('pageSize')).toBe('50');
      expect(url.searchParams.get('pageToken')).toBe('abc123');
      expect(url.searchParams.get('countTotal')).toBe('true');
    });

    it('omits the page token on the first page', async () => {
      mockFetchWithTimeout.mockResolvedValue(jsonResponse(validPagedStudies));

      await provider.listStudies(
        { query: { 'query.cond': 'Cancer' }, pageSize: 100 },
        mockContext,
      );

      expect(calledUrl().searchParams.has('pageToken')).toBe(false);
    });

    it('defaults a missing studies array to an empty list', async () => {
      mockFetchWithTimeout.mockResolvedValue(jsonResponse({ totalCount: 0 }));

      const result = await provider.listStudies(
        { query: {}, pageSize: 100 },
        mockContext,
      );

      expect(result.studies).toEqual([]);
      expect(result.totalCount).toBe(0);
    });

    it('keeps a study whose nested fields have unexpected types', async () => {
      mockFetchWithTimeout.mockResolvedValue(
        jsonResponse({
          studies: [
            {
              protocolSection: {
                identificationModule: { nctId: 'NCT00000009' },
                conditionsModule: { conditions: 'not-a-list' },
              },
            },
          ],
        }),
      );

      const result = await provider.listStudies(
        { query: {}, pageSize: 100 },
        mockContext,
      );

      const study = result.studies[0];
      expect(study?.protocolSection?.identificationModule?.nctId).toBe(
        'NCT00000009',
      );
      expect(study?.protocolSection?.conditionsModule?.conditions).toBe(
        undefined,
      );
    });

    it('throws ValidationError on an invalid response shape', async () => {
      mockFetchWithTimeout.mockResolvedValue(
        jsonResponse({ studies: 'not-an-array' }),
      );

      const error = await captureError(
        provider.listStudies({ query: {}, pageSize: 100 }, mockContext),
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: ErrorCode.ValidationError,
        message: 'Invalid studies data received from API',
      });
    });

    it('throws ValidationError when the body is not JSON', async () => {
      mockFetchWithTimeout.mockResolvedValue(textResponse('<html>oops</html>'));

      const error = await captureError(
        provider.listStudies({ query: {}, pageSize: 100 }, mockContext),
      );

      expect(error).toMatchObject({
        code: ErrorCode.ValidationError,
        message: 'Invalid studies data received from API',
        data: { url: expect.stringContaining('/studies?') },
      });
    });

    it('throws ServiceUnavailable on a non-OK response', async () => {
      mockFetchWithTimeout.mockResolvedValue(
        textResponse('Server Error', {
          status: 500,
          statusText: 'Internal Server Error',
        }),
      );

      const error = await captureError(
        provider.listStudies({ query: {}, pageSize: 100 }, mockContext),
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: ErrorCode.ServiceUnavailable,
        message: 'API request failed with status 500: Internal Server Error',
        data: {
          url: `${BASE_URL}/studies?pageSize=100&countTotal=true`,
          status: 500,
          body: 'Server Error',
        },
      });
    });

    it('reports a 404 as a missing resource', async () => {
      mockFetchWithTimeout.mockResolvedValue(
        textResponse('No such endpoint', { status: 404, statusText: 'Not Found' }),
      );

      const error = await captureError(
        provider.listStudies({ query: {}, pageSize: 100 }, mockContext),
      );

      expect(error).toMatchObject({
        code: ErrorCode.ServiceUnavailable,
        message: 'Resource not found: No such endpoint',
      });
    });

    it('propagates transport errors from fetchWithTimeout', async () => {
      const timeout = new AppError(ErrorCode.Timeout, 'timed out');
      mockFetchWithTimeout.mockRejectedValue(timeout);

      await expect(
        provider.listStudies({ query: {}, pageSize: 100 }, mockContext),
      ).rejects.toBe(timeout);
    });
  });
});
