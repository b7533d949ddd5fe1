/**
 * @fileoverview CSV rendering of search results for the export download.
 * @module src/web-server/export/trialsCsv
 */
import * as CsvWriter from 'csv-writer';

import type { Trial } from '../../services/clinical-trials-gov/types.js';

export const CSV_FILENAME = 'clinical_trials.csv';

/** Separator for list-valued columns (conditions, interventions). */
const LIST_SEPARATOR = '; ';

type CsvRecord = {
  nctId: string;
  title: string;
  phase: string;
  status: string;
  sponsor: string;
  conditions: string;
  interventions: string;
};

const csvStringifier = CsvWriter.createObjectCsvStringifier({
  header: [
    { id: 'nctId', title: 'NCT ID' },
    { id: 'title', title: 'Title' },
    { id: 'phase', title: 'Phase' },
    { id: 'status', title: 'Status' },
    { id: 'sponsor', title: 'Sponsor' },
    { id: 'conditions', title: 'Conditions' },
    { id: 'interventions', title: 'Interventions' },
  ],
});

function toCsvRecord(trial: Trial): CsvRecord {
  return {
    nctId: trial.nctId,
    title: trial.title,
    phase: trial.phase,
    status: trial.status,
    sponsor: trial.sponsor,
    conditions: trial.conditions.join(LIST_SEPARATOR),
    interventions: trial.interventions.join(LIST_SEPARATOR),
  };
}

/**
 * Renders a header row followed by one row per trial, each terminated by `\n`.
 */
export function trialsToCsv(trials: readonly Trial[]): string {
  const header = csvStringifier.getHeaderString() ?? '';
  if (trials.length === 0) {
    return header;
  }
  return header + csvStringifier.stringifyRecords(trials.map(toCsvRecord));
}
