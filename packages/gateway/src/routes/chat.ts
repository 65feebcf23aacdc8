/**
 * Chat routes
 *
 * POST /            ask a question (JSON, or SSE when stream is true)
 * GET  /conversations/:id
 * POST /conversations/:id/reset
 * DELETE /conversations/:id
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import type { Conversation, RagChatbot } from '@wetlands/core';
import type { ConversationInfo } from '../types/index.js';
import { chatRequestSchema, validateBody } from '../middleware/validation.js';
import { apiResponse, appErrorResponse, notFoundError } from './helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('Chat');

function toConversationInfo(conversation: Conversation): ConversationInfo {
  return {
    id: conversation.id,
    messages: conversation.messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role,
        content: message.content,
        ...(message.toolCalls?.length
          ? { toolCalls: message.toolCalls.map((tc) => ({ name: tc.name, arguments: tc.arguments })) }
          : {}),
      })),
    createdAt: conversation.createdAt.toISOString(),
    updatedAt: conversation.updatedAt.toISOString(),
  };
}

export function createChatRoutes(chatbot: RagChatbot): Hono {
  const routes = new Hono();

  routes.post('/', async (c) => {
    const body = validateBody(chatRequestSchema, await c.req.json());

    if (body.stream) {
      return streamSSE(c, async (stream) => {
        for await (const event of chatbot.stream(body.message, { conversationId: body.conversationId })) {
          await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
        }
      });
    }

    const result = await chatbot.ask(body.message, { conversationId: body.conversationId });
    if (!result.ok) {
      log.warn('Chat request failed', { code: result.error.code, error: result.error.message });
      return appErrorResponse(c, result.error);
    }
    return apiResponse(c, result.value);
  });

  routes.get('/conversations/:id', (c) => {
    const id = c.req.param('id');
    const conversation = chatbot.getConversation(id);
    if (!conversation) return notFoundError(c, 'Conversation', id);
    return apiResponse(c, toConversationInfo(conversation));
  });

  routes.post('/conversations/:id/reset', (c) => {
    const id = c.req.param('id');
    if (!chatbot.resetConversation(id)) return notFoundError(c, 'Conversation', id);
    return apiResponse(c, { reset: true });
  });

  routes.delete('/conversations/:id', (c) => {
    const id = c.req.param('id');
    if (!chatbot.deleteConversation(id)) return notFoundError(c, 'Conversation', id);
    return apiResponse(c, { deleted: true });
  });

  return routes;
}
