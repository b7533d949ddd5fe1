/**
 * @fileoverview Page shell and shared view helpers.
 * @module src/web-server/views/layout
 */
import { html } from 'hono/html';

export type HtmlContent = ReturnType<typeof html>;

export type AlertLevel = 'info' | 'warning' | 'danger';

export interface Alert {
  level: AlertLevel;
  message: string;
}

const renderAlerts = (alerts: readonly Alert[]) =>
  alerts.map(
    (alert) =>
      html`<div class="alert alert-${alert.level}" role="alert">${alert.message}</div>`,
  );

export const layout = (
  title: string,
  body: HtmlContent,
  alerts: readonly Alert[] = [],
): HtmlContent => html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
    <link
      rel="stylesheet"
      href="https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css"
    />
    <link
      rel="stylesheet"
      href="https://cdn.datatables.net/1.13.8/css/dataTables.bootstrap5.min.css"
    />
  </head>
  <body>
    <main class="container py-4">
      ${renderAlerts(alerts)} ${body}
    </main>
  </body>
</html>`;
