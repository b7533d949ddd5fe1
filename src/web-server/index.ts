export { createApp } from './app.js';
export { HttpTransport, type HttpTransportOptions } from './transports/httpTransport.js';
export type { AppEnv, TrialSearcher, WebServerDependencies } from './types.js';
