/**
 * @fileoverview Serves the Hono application over Node's HTTP server.
 * @module src/web-server/transports/httpTransport
 */
import type { EventEmitter } from 'node:events';

import { serve, type ServerType } from '@hono/node-server';
import type { Hono } from 'hono';

import { logger, requestContextService } from '../../utils/index.js';
import type { AppEnv } from '../types.js';
import type { ITransport } from './ITransport.js';

export interface HttpTransportOptions {
  host: string;
  port: number;
}

export class HttpTransport implements ITransport {
  private server: ServerType | undefined;

  constructor(
    private readonly app: Hono<AppEnv>,
    private readonly options: HttpTransportOptions,
  ) {}

  start(): Promise<ServerType> {
    const context = requestContextService.createRequestContext({
      operation: 'HttpTransport.start',
    });

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        logger.error('HTTP server failed to start.', {
          ...context,
          host: this.options.host,
          port: this.options.port,
          error,
        });
        reject(error);
      };

      const server = serve(
        {
          fetch: this.app.fetch,
          hostname: this.options.host,
          port: this.options.port,
        },
        (info) => {
          events.off('error', onError);
          this.server = server;
          logger.notice(
            `HTTP server listening on http://${this.options.host}:${info.port}`,
            context,
          );
          resolve(server);
        },
      );
      // Listen failures (e.g. EADDRINUSE) are emitted after serve() returns.
      const events: EventEmitter = server;
      events.once('error', onError);
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = undefined;
        logger.info('HTTP server stopped.');
        resolve();
      });
    });
  }
}
