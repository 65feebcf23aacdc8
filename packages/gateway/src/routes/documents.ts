/**
 * Document routes: list the knowledge base and search it without the model.
 */

import { Hono } from 'hono';
import type { RagChatbot } from '@wetlands/core';
import { documentSearchSchema, validateBody } from '../middleware/validation.js';
import { apiError, apiResponse, ERROR_CODES } from './helpers.js';

export function createDocumentRoutes(chatbot: RagChatbot): Hono {
  const routes = new Hono();

  routes.get('/', async (c) => {
    const result = await chatbot.listDocuments();
    if (!result.success) {
      return apiError(c, { code: ERROR_CODES.NO_DOCUMENTS, message: result.error }, 404);
    }
    return apiResponse(c, result);
  });

  routes.post('/search', async (c) => {
    const body = validateBody(documentSearchSchema, await c.req.json());
    const result = await chatbot.searchDocuments(body.query, { document: body.document, topK: body.topK });
    if (!result.success) {
      return apiError(c, { code: ERROR_CODES.INVALID_INPUT, message: result.error }, 400);
    }
    return apiResponse(c, result);
  });

  return routes;
}
