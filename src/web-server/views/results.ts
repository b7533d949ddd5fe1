/**
 * @fileoverview Results page: summary, truncation notice, trial table and export link.
 * @module src/web-server/views/results
 */
import { html } from 'hono/html';

import {
  OverallStatusSchema,
  STATUS_LABELS,
  type SearchParams,
  type SearchResult,
  type Trial,
} from '../../services/clinical-trials-gov/types.js';
import { toQueryString } from '../routes/searchQuery.js';
import { layout, type HtmlContent } from './layout.js';
import { searchForm } from './searchForm.js';

export const STUDY_URL_BASE = 'https://clinicaltrials.gov/study/';

export interface ResultsPageOptions {
  params: SearchParams;
  result: SearchResult;
  maxResults: number;
  resultsPageSize: number;
}

const statusLabel = (status: string): string => {
  const known = OverallStatusSchema.safeParse(status);
  return known.success ? STATUS_LABELS[known.data] : status;
};

const trialRow = (trial: Trial) => html`<tr>
  <td>
    <a href="${STUDY_URL_BASE}${trial.nctId}" target="_blank" rel="noopener"
      >${trial.nctId}</a
    >
  </td>
  <td>${trial.title}</td>
  <td>${trial.phase}</td>
  <td>${statusLabel(trial.status)}</td>
  <td>${trial.sponsor}</td>
  <td>${trial.conditions.join('; ')}</td>
  <td>${trial.interventions.join('; ')}</td>
</tr>`;

const trialTable = (trials: readonly Trial[], pageLength: number) => html`<table
    id="results"
    class="table table-striped table-sm"
    data-page-length="${pageLength}"
  >
    <thead>
      <tr>
        <th>NCT ID</th>
        <th>Title</th>
        <th>Phase</th>
        <th>Status</th>
        <th>Sponsor</th>
        <th>Conditions</th>
        <th>Interventions</th>
      </tr>
    </thead>
    <tbody>
      ${trials.map(trialRow)}
    </tbody>
  </table>
  <script src="https://code.jquery.com/jquery-3.7.1.min.js"></script>
  <script src="https://cdn.datatables.net/1.13.8/js/jquery.dataTables.min.js"></script>
  <script src="https://cdn.datatables.net/1.13.8/js/dataTables.bootstrap5.min.js"></script>
  <script>
    $(function () {
      $('#results').DataTable();
    });
  </script>`;

export const resultsPage = ({
  params,
  result,
  maxResults,
  resultsPageSize,
}: ResultsPageOptions): HtmlContent => {
  const { trials, totalCount, truncated } = result;

  const summary = html`<p class="lead">
    Showing ${trials.length} of ${totalCount} trials
    ${truncated ? html`<span class="badge bg-warning text-dark">(results truncated)</span>` : ''}
  </p>`;

  const truncationNotice = truncated
    ? html`<div class="alert alert-warning" role="alert">
        Results are limited to ${maxResults} trials. Refine your search to
        narrow the ${totalCount} matches.
      </div>`
    : '';

  const body =
    trials.length === 0
      ? html`<p class="text-muted">No trials found matching your search criteria.</p>`
      : html`<p>
            <a class="btn btn-outline-secondary" href="/export?${toQueryString(params)}"
              >Export CSV</a
            >
          </p>
          ${trialTable(trials, resultsPageSize)}`;

  return layout(
    'Clinical Trials Results',
    html`<h1 class="mb-4">Search Clinical Trials</h1>
      ${searchForm(params)} ${summary} ${truncationNotice} ${body}`,
  );
};
