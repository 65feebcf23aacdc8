/**
 * @wetlands/gateway
 *
 * HTTP API and chat page for the document assistant.
 */

export { createApp, defaultGatewayConfig } from './app.js';
export type { CreateAppOptions } from './app.js';
export { startServer, registerLogService } from './server.js';
export type { StartServerOptions, RunningServer } from './server.js';
export { createChatRoutes, createDocumentRoutes, createHealthRoutes, ERROR_CODES } from './routes/index.js';
export type { ErrorCode } from './routes/index.js';
export { createLogService, LogService } from './services/log-service-impl.js';
export type { LogServiceOptions } from './services/log-service-impl.js';
export type * from './types/index.js';
