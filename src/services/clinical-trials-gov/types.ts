/**
 * @fileoverview Types for the ClinicalTrials.gov API and the search domain.
 * The study schema covers only the modules the search reads. Every nested
 * path is optional and every leaf falls back to `undefined` when the API sends
 * an unexpected shape, so a sparse or odd record never fails a whole page.
 * @module src/services/clinical-trials-gov/types
 */

import { z } from 'zod';

const optionalText = z.string().optional().catch(undefined);
const optionalTextList = z.array(z.string()).optional().catch(undefined);

/**
 * Zod schema for a single study record as returned by `/studies`.
 */
export const StudySchema = z
  .object({
    protocolSection: z
      .object({
        identificationModule: z
          .object({
            nctId: optionalText,
            briefTitle: optionalText,
            officialTitle: optionalText,
          })
          .passthrough()
          .optional()
          .catch(undefined),
        statusModule: z
          .object({
            overallStatus: optionalText,
          })
          .passthrough()
          .optional()
          .catch(undefined),
        sponsorCollaboratorsModule: z
          .object({
            leadSponsor: z
              .object({
                name: optionalText,
                class: optionalText,
              })
              .passthrough()
              .optional()
              .catch(undefined),
          })
          .passthrough()
          .optional()
          .catch(undefined),
        conditionsModule: z
          .object({
            conditions: optionalTextList,
            keywords: optionalTextList,
          })
          .passthrough()
          .optional()
          .catch(undefined),
        armsInterventionsModule: z
          .object({
            interventions: z
              .array(
                z
                  .object({
                    type: optionalText,
                    name: optionalText,
                  })
                  .passthrough(),
              )
              .optional()
              .catch(undefined),
          })
          .passthrough()
          .optional()
          .catch(undefined),
        designModule: z
          .object({
            studyType: optionalText,
            phases: optionalTextList,
          })
          .passthrough()
          .optional()
          .catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

export type Study = z.infer<typeof StudySchema>;

/**
 * Represents one page of studies.
 */
export type PagedStudies = {
  studies: Study[];
  nextPageToken?: string | undefined;
  totalCount?: number | undefined;
  [key: string]: unknown;
};

/**
 * Zod schema for one page of studies.
 * Note: Uses explicit type annotation to keep the inferred type readable.
 */
export const PagedStudiesSchema: z.ZodType<PagedStudies, z.ZodTypeDef, unknown> =
  z
    .object({
      studies: z.array(StudySchema).default([]),
      nextPageToken: z.string().optional(),
      totalCount: z.number().optional(),
    })
    .passthrough();

/** Trial phases accepted by the search form and the `AREA[Phase]` filter. */
export const PhaseSchema = z.enum([
  'EARLY_PHASE1',
  'PHASE1',
  'PHASE2',
  'PHASE3',
  'PHASE4',
]);
export type Phase = z.infer<typeof PhaseSchema>;

/** Overall statuses accepted by `filter.overallStatus`. */
export const OverallStatusSchema = z.enum([
  'RECRUITING',
  'NOT_YET_RECRUITING',
  'ACTIVE_NOT_RECRUITING',
  'COMPLETED',
  'ENROLLING_BY_INVITATION',
  'SUSPENDED',
  'TERMINATED',
  'WITHDRAWN',
]);
export type OverallStatus = z.infer<typeof OverallStatusSchema>;

export const PHASE_LABELS: Record<Phase, string> = {
  EARLY_PHASE1: 'Early Phase 1',
  PHASE1: 'Phase 1',
  PHASE2: 'Phase 2',
  PHASE3: 'Phase 3',
  PHASE4: 'Phase 4',
};

export const STATUS_LABELS: Record<OverallStatus, string> = {
  RECRUITING: 'Recruiting',
  NOT_YET_RECRUITING: 'Not Yet Recruiting',
  ACTIVE_NOT_RECRUITING: 'Active, Not Recruiting',
  COMPLETED: 'Completed',
  ENROLLING_BY_INVITATION: 'Enrolling by Invitation',
  SUSPENDED: 'Suspended',
  TERMINATED: 'Terminated',
  WITHDRAWN: 'Withdrawn',
};

/**
 * User-supplied search filters. Every field is optional; the routing layer
 * refuses a search where none is set.
 */
export interface SearchParams {
  compound?: string | undefined;
  condition?: string | undefined;
  phases?: readonly Phase[] | undefined;
  statuses?: readonly OverallStatus[] | undefined;
}

/**
 * A study flattened to the columns shown in the results table.
 */
export interface Trial {
  readonly nctId: string;
  readonly title: string;
  readonly phase: string;
  readonly status: string;
  readonly sponsor: string;
  readonly conditions: readonly string[];
  readonly interventions: readonly string[];
}

export interface SearchResult {
  readonly trials: readonly Trial[];
  /** Total matches reported by the API, independent of how many were fetched. */
  readonly totalCount: number;
  /** True when the result cap was reached before the API ran out of pages. */
  readonly truncated: boolean;
}
