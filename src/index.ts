#!/usr/bin/env node
/**
 * @fileoverview Entry point: composes the container, starts the HTTP server
 * and shuts it down on SIGINT/SIGTERM.
 * @module src/index
 */
import { composeContainer, container } from './container/index.js';
import { AppConfig, TrialSearch } from './container/core/tokens.js';
import { logger, requestContextService } from './utils/index.js';
import { createApp, HttpTransport } from './web-server/index.js';

const start = async (): Promise<void> => {
  composeContainer();
  const cfg = container.resolve(AppConfig);

  const app = createApp({
    searchService: container.resolve(TrialSearch),
    resultsPageSize: cfg.search.resultsPageSize,
  });
  const transport = new HttpTransport(app, cfg.http);
  await transport.start();

  const shutdown = (signal: NodeJS.Signals) => {
    const context = requestContextService.createRequestContext({
      operation: 'shutdown',
      signal,
    });
    logger.info(`Received ${signal}, shutting down.`, context);
    transport
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to stop HTTP server cleanly.', {
          ...context,
          error,
        });
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

start().catch((error: unknown) => {
  logger.crit('Failed to start the application.', { error });
  process.exit(1);
});
