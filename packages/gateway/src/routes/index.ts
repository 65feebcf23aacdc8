export { createChatRoutes } from './chat.js';
export { createDocumentRoutes } from './documents.js';
export { createHealthRoutes } from './health.js';
export { apiResponse, apiError, appErrorResponse, notFoundError, ERROR_CODES } from './helpers.js';
export type { ErrorCode } from './helpers.js';
