/**
 * @fileoverview Reads search filters from the query string and writes them back.
 * @module src/web-server/routes/searchQuery
 */
import type { HonoRequest } from 'hono';
import { z } from 'zod';

import {
  OverallStatusSchema,
  PhaseSchema,
  type SearchParams,
} from '../../services/clinical-trials-gov/types.js';

export const MISSING_CRITERIA_MESSAGE =
  'Please enter at least one search criterion.';
export const INVALID_FILTER_MESSAGE = 'Unrecognized phase or status filter.';

const optionalTerm = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const SearchQuerySchema = z.object({
  compound: optionalTerm,
  condition: optionalTerm,
  phases: z.array(PhaseSchema),
  statuses: z.array(OverallStatusSchema),
});

/**
 * On failure, `params` keeps the text filters and the recognised values so
 * the form can be shown again as the user left it.
 */
export type ParsedSearchQuery =
  | { success: true; params: SearchParams }
  | { success: false; message: string; params: SearchParams };

const listParam = (req: HonoRequest, name: string): string[] =>
  (req.queries(name) ?? []).map((value) => value.trim()).filter(Boolean);

const knownValues = <T extends string>(
  options: readonly T[],
  values: readonly string[],
): T[] =>
  values.filter((value): value is T =>
    options.some((option) => option === value),
  );

const toSearchParams = ({
  compound,
  condition,
  phases,
  statuses,
}: z.infer<typeof SearchQuerySchema>): SearchParams => ({
  compound,
  condition,
  phases: phases.length > 0 ? phases : undefined,
  statuses: statuses.length > 0 ? statuses : undefined,
});

/**
 * Parses `compound`, `condition` and the repeated `phases` / `statuses`
 * parameters. Fails only on a phase or status outside the known values.
 */
export function parseSearchQuery(req: HonoRequest): ParsedSearchQuery {
  const raw = {
    compound: req.query('compound'),
    condition: req.query('condition'),
    phases: listParam(req, 'phases'),
    statuses: listParam(req, 'statuses'),
  };
  const parsed = SearchQuerySchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      message: INVALID_FILTER_MESSAGE,
      params: toSearchParams({
        compound: optionalTerm.parse(raw.compound),
        condition: optionalTerm.parse(raw.condition),
        phases: knownValues(PhaseSchema.options, raw.phases),
        statuses: knownValues(OverallStatusSchema.options, raw.statuses),
      }),
    };
  }

  return { success: true, params: toSearchParams(parsed.data) };
}

export function hasSearchCriteria(params: SearchParams): boolean {
  return Boolean(
    params.compound ||
      params.condition ||
      params.phases?.length ||
      params.statuses?.length,
  );
}

/**
 * Serializes filters back into a query string, e.g. for the export link.
 */
export function toQueryString(params: SearchParams): string {
  const query = new URLSearchParams();
  if (params.compound) query.set('compound', params.compound);
  if (params.condition) query.set('condition', params.condition);
  for (const phase of params.phases ?? []) query.append('phases', phase);
  for (const status of params.statuses ?? []) query.append('statuses', status);
  return query.toString();
}
