/**
 * Web Exports
 */

export { createApp, WebServer } from './server';
export type { WebServerConfig, WebServerState } from './server';
export { toErrorResponse } from './http-errors';
export type { ErrorResponse } from './http-errors';
export { formatSseMessage, parseEventCursor } from './routes/run-logs';
