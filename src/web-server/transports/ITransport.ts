/**
 * @fileoverview Defines transport-related types.
 * @module src/web-server/transports/ITransport
 */
import type { ServerType } from '@hono/node-server';

/**
 * Transport lifecycle contract for the HTTP server.
 */
export interface ITransport {
  start(): Promise<ServerType>;
  stop(): Promise<void>;
}
