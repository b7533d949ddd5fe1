/**
 * @fileoverview Translates search filters into ClinicalTrials.gov query parameters.
 * @module src/services/clinical-trials-gov/queryBuilder
 */

import type { SearchParams } from './types.js';

/**
 * Upstream query parameters produced from {@link SearchParams}. Only keys
 * whose source filter is set are present.
 */
export type StudyQuery = {
  'query.intr'?: string;
  'query.cond'?: string;
  'query.term'?: string;
  'filter.overallStatus'?: string;
};

/**
 * Builds the `AREA[Phase]` expression; several phases are OR-ed together.
 *
 * @example
 * buildPhaseExpression(['PHASE3']) // 'AREA[Phase]PHASE3'
 * buildPhaseExpression(['PHASE2', 'PHASE3']) // 'AREA[Phase](PHASE2 OR PHASE3)'
 */
export function buildPhaseExpression(phases: readonly string[]): string {
  return phases.length === 1
    ? `AREA[Phase]${phases[0]}`
    : `AREA[Phase](${phases.join(' OR ')})`;
}

/**
 * Maps search filters onto upstream parameter names. Empty strings and empty
 * lists count as unset, so an empty filter set yields an empty query.
 *
 * @example
 * buildStudyQuery({ compound: 'pembrolizumab' }) // { 'query.intr': 'pembrolizumab' }
 */
export function buildStudyQuery(params: SearchParams): StudyQuery {
  const { compound, condition, phases, statuses } = params;

  return {
    ...(compound && { 'query.intr': compound }),
    ...(condition && { 'query.cond': condition }),
    ...(phases && phases.length > 0 && { 'query.term': buildPhaseExpression(phases) }),
    ...(statuses &&
      statuses.length > 0 && { 'filter.overallStatus': statuses.join(',') }),
  };
}
