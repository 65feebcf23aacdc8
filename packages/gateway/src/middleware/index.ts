export { requestId } from './request-id.js';
export { timing } from './timing.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
export { validateBody, chatRequestSchema, documentSearchSchema } from './validation.js';
export type { ChatRequest, DocumentSearchRequest } from './validation.js';
