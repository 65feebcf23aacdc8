/**
 * Route Helpers Tests
 */

import { describe, it, expect } from 'vitest';
import { Hono, type Handler } from 'hono';
import { ConfigurationError, ConversationBusyError, InternalError, RateLimitError, ValidationError } from '@wetlands/core';
import { apiError, apiResponse, appErrorResponse, notFoundError, sanitizeId, toHttpStatus } from './helpers.js';
import { requestId } from '../middleware/request-id.js';

function appWith(handler: Handler) {
  const app = new Hono();
  app.use('*', requestId);
  app.get('/', handler);
  return app;
}

describe('Route Helpers', () => {
  it('apiResponse wraps data with request meta', async () => {
    const app = appWith((c) => apiResponse(c, { answer: 42 }));

    const res = await app.request('/', { headers: { 'X-Request-ID': 'req-1' } });

    expect(await res.json()).toEqual({
      success: true,
      data: { answer: 42 },
      meta: { requestId: 'req-1', timestamp: expect.any(String) },
    });
  });

  it('apiError turns a string into a generic error', async () => {
    const app = appWith((c) => apiError(c, 'Something broke'));

    const res = await app.request('/');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'ERROR', message: 'Something broke' } });
  });

  describe('appErrorResponse', () => {
    it('passes core error codes and statuses through', async () => {
      const app = appWith((c) => appErrorResponse(c, new RateLimitError('Too many requests')));

      const res = await app.request('/');

      expect(res.status).toBe(429);
      expect(await res.json()).toMatchObject({ error: { code: 'RATE_LIMIT', message: 'Too many requests' } });
    });

    it('moves a configuration hint into details and answers 503', async () => {
      const app = appWith((c) => appErrorResponse(c, new ConfigurationError('No key', 'Set GOOGLE_API_KEY.')));

      const res = await app.request('/');

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ error: {
        code: 'CONFIGURATION_ERROR',
        message: 'No key',
        details: { hint: 'Set GOOGLE_API_KEY.' },
      } });
    });

    it('maps a busy conversation to 409', async () => {
      const app = appWith((c) => appErrorResponse(c, new ConversationBusyError('c1')));

      const res = await app.request('/');

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ error: { code: 'CONVERSATION_BUSY' } });
    });

    it('maps by error code, not by message text', async () => {
      const app = appWith((c) =>
        appErrorResponse(c, new ValidationError('Conversation c1 is already processing a request'))
      );

      const res = await app.request('/');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
    });

    it('uses 500 for internal errors', async () => {
      const app = appWith((c) => appErrorResponse(c, new InternalError('boom')));

      expect((await app.request('/')).status).toBe(500);
    });
  });

  it('toHttpStatus falls back to 500', () => {
    expect(toHttpStatus(404)).toBe(404);
    expect(toHttpStatus(418)).toBe(500);
  });

  it('sanitizeId strips unsafe characters', () => {
    expect(sanitizeId('conv-1<script>')).toBe('conv-1script');
    expect(sanitizeId('x'.repeat(250))).toHaveLength(200);
  });

  it('notFoundError names the resource', async () => {
    const app = appWith((c) => notFoundError(c, 'Conversation', 'a/b'));

    const res = await app.request('/');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      error: { code: 'NOT_FOUND', message: 'Conversation not found: ab' },
    });
  });
});
