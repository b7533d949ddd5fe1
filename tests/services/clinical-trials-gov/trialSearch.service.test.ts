/**
 * @fileoverview Tests for the paginated trial search.
 * Pages come from an in-process provider stub; no HTTP is involved.
 * @module tests/services/clinical-trials-gov/trialSearch.service.test
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { IClinicalTrialsProvider } from '@/services/clinical-trials-gov/core/IClinicalTrialsProvider.js';
import { TrialSearchService } from '@/services/clinical-trials-gov/trialSearch.service.js';
import { AppError, ErrorCode } from '@/types-global/errors.js';
import { requestContextService } from '@/utils/index.js';

import { makePage, makeStudies, nctIdFor } from '../../fixtures/studies.js';

const context = requestContextService.createRequestContext({
  operation: 'trialSearch.test',
});

describe('TrialSearchService', () => {
  const listStudies = vi.fn<IClinicalTrialsProvider['listStudies']>();
  const provider: IClinicalTrialsProvider = { listStudies };

  const createService = (maxResults = 500, pageSize = 100) =>
    new TrialSearchService(provider, { maxResults, pageSize });

  beforeEach(() => {
    listStudies.mockReset();
  });

  it('returns an empty, untruncated result when nothing matches', async () => {
    listStudies.mockResolvedValueOnce(makePage([], 0));

    const result = await createService().search(
      { compound: 'nonexistent' },
      context,
    );

    expect(result).toEqual({ trials: [], totalCount: 0, truncated: false });
    expect(listStudies).toHaveBeenCalledTimes(1);
  });

  it('requests the first page with the built query, page size and no token', async () => {
    listStudies.mockResolvedValueOnce(makePage([], 0));

    await createService().search({ compound: 'pembrolizumab' }, context);

    const [params, passedContext] = listStudies.mock.calls[0] ?? [];
    expect(params).toEqual({
      query: { 'query.intr': 'pembrolizumab' },
      pageSize: 100,
    });
    expect(params).not.toHaveProperty('pageToken');
    expect(passedContext).toBe(context);
  });

  it('follows page tokens until the last page', async () => {
    listStudies
      .mockResolvedValueOnce(makePage(makeStudies(1, 100), 150, 'token123'))
      .mockResolvedValueOnce(makePage(makeStudies(101, 50), 150));

    const result = await createService().search(
      { condition: 'Cancer' },
      context,
    );

    expect(listStudies).toHaveBeenCalledTimes(2);
    expect(listStudies.mock.calls[1]?.[0].pageToken).toBe('token123');
    expect(result.trials).toHaveLength(150);
    expect(result.totalCount).toBe(150);
    expect(result.truncated).toBe(false);
    expect(result.trials[0]?.nctId).toBe(nctIdFor(1));
    expect(result.trials[149]?.nctId).toBe(nctIdFor(150));
  });

  it('stops at the cap and truncates the overshooting page', async () => {
    let next = 1;
    listStudies.mockImplementation(async () => {
      const studies = makeStudies(next, 100);
      next += 100;
      return makePage(studies, 1000, 'next');
    });

    const result = await createService(250).search(
      { condition: 'Cancer' },
      context,
    );

    expect(listStudies).toHaveBeenCalledTimes(3);
    expect(result.trials).toHaveLength(250);
    expect(result.trials[249]?.nctId).toBe(nctIdFor(250));
    expect(result.totalCount).toBe(1000);
    expect(result.truncated).toBe(true);
  });

  it('marks a result truncated when the cap is reached exactly', async () => {
    listStudies.mockResolvedValueOnce(makePage(makeStudies(1, 100), 100));

    const result = await createService(100).search(
      { condition: 'Cancer' },
      context,
    );

    expect(result.trials).toHaveLength(100);
    expect(result.truncated).toBe(true);
  });

  it('does not mark a result truncated when the API stops paging below the cap', async () => {
    listStudies.mockResolvedValueOnce(makePage(makeStudies(1, 100), 1000));

    const result = await createService().search(
      { condition: 'Cancer' },
      context,
    );

    expect(result.trials).toHaveLength(100);
    expect(result.totalCount).toBe(1000);
    expect(result.truncated).toBe(false);
  });

  it('treats an empty page token as the last page', async () => {
    listStudies.mockResolvedValueOnce(makePage(makeStudies(1, 3), 3, ''));

    const result = await createService().search(
      { condition: 'Cancer' },
      context,
    );

    expect(listStudies).toHaveBeenCalledTimes(1);
    expect(result.trials).toHaveLength(3);
  });

  it('reports a total of 0 when the API omits it', async () => {
    listStudies.mockResolvedValueOnce({ studies: makeStudies(1, 2) });

    const result = await createService().search(
      { condition: 'Cancer' },
      context,
    );

    expect(result.totalCount).toBe(0);
    expect(result.trials).toHaveLength(2);
  });

  it('propagates a failure on the first page', async () => {
    const failure = new AppError(
      ErrorCode.ServiceUnavailable,
      'API request failed with status 500: Internal Server Error',
    );
    listStudies.mockRejectedValueOnce(failure);

    await expect(
      createService().search({ compound: 'test' }, context),
    ).rejects.toBe(failure);
  });

  it('propagates a failure on a later page without returning partial results', async () => {
    const failure = new AppError(ErrorCode.Timeout, 'timed out');
    listStudies
      .mockResolvedValueOnce(makePage(makeStudies(1, 100), 300, 'token123'))
      .mockRejectedValueOnce(failure);

    await expect(
      createService().search({ compound: 'test' }, context),
    ).rejects.toBe(failure);
    expect(listStudies).toHaveBeenCalledTimes(2);
  });

  it('starts every search from the first page', async () => {
    listStudies
      .mockResolvedValueOnce(makePage(makeStudies(1, 100), 200, 'token123'))
      .mockResolvedValueOnce(makePage(makeStudies(101, 100), 200))
      .mockResolvedValueOnce(makePage(makeStudies(1, 100), 200, 'token123'))
      .mockResolvedValueOnce(makePage(makeStudies(101, 100), 200));

    const service = createService();
    await service.search({ condition: 'Cancer' }, context);
    await service.search({ condition: 'Cancer' }, context);

    expect(listStudies.mock.calls[2]?.[0]).not.toHaveProperty('pageToken');
  });

  it('exposes the configured cap', () => {
    expect(createService(42).maxResults).toBe(42);
  });
});
