/**
 * @fileoverview Search form, rendered alone on the landing page and above results.
 * @module src/web-server/views/searchForm
 */
import { html } from 'hono/html';

import {
  OverallStatusSchema,
  PhaseSchema,
  PHASE_LABELS,
  STATUS_LABELS,
  type SearchParams,
} from '../../services/clinical-trials-gov/types.js';
import { layout, type Alert, type HtmlContent } from './layout.js';

const option = (value: string, label: string, selected: boolean) =>
  html`<option value="${value}" ${selected ? 'selected' : ''}>${label}</option>`;

export const searchForm = (params: SearchParams = {}): HtmlContent => html`<form
  action="/search"
  method="get"
  class="row g-3 mb-4"
>
  <div class="col-md-6">
    <label for="compound" class="form-label">Compound</label>
    <input
      type="text"
      class="form-control"
      id="compound"
      name="compound"
      placeholder="e.g. pembrolizumab"
      value="${params.compound ?? ''}"
    />
  </div>
  <div class="col-md-6">
    <label for="condition" class="form-label">Condition</label>
    <input
      type="text"
      class="form-control"
      id="condition"
      name="condition"
      placeholder="e.g. lung cancer"
      value="${params.condition ?? ''}"
    />
  </div>
  <div class="col-md-6">
    <label for="phases" class="form-label">Phase</label>
    <select class="form-select" id="phases" name="phases" multiple>
      ${PhaseSchema.options.map((phase) =>
        option(phase, PHASE_LABELS[phase], params.phases?.includes(phase) ?? false),
      )}
    </select>
  </div>
  <div class="col-md-6">
    <label for="statuses" class="form-label">Status</label>
    <select class="form-select" id="statuses" name="statuses" multiple>
      ${OverallStatusSchema.options.map((status) =>
        option(
          status,
          STATUS_LABELS[status],
          params.statuses?.includes(status) ?? false,
        ),
      )}
    </select>
  </div>
  <div class="col-12">
    <button type="submit" class="btn btn-primary">Search</button>
  </div>
</form>`;

export const searchPage = (
  options: { params?: SearchParams; alerts?: readonly Alert[] } = {},
): HtmlContent =>
  layout(
    'Search Clinical Trials',
    html`<h1 class="mb-4">Search Clinical Trials</h1>
      ${searchForm(options.params)}`,
    options.alerts,
  );
