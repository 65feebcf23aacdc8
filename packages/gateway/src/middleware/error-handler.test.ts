import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { NotFoundError } from '@wetlands/core';
import { errorHandler, notFoundHandler } from './error-handler.js';
import { requestId } from './request-id.js';

function appThrowing(error: Error) {
  const app = new Hono();
  app.use('*', requestId);
  app.get('/boom', () => {
    throw error;
  });
  app.onError(errorHandler);
  app.notFound(notFoundHandler);
  return app;
}

describe('errorHandler', () => {
  it('maps HTTPException status to an error code', async () => {
    const res = await appThrowing(new HTTPException(503, { message: 'Warming up' })).request('/boom');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ error: { code: 'SERVICE_UNAVAILABLE', message: 'Warming up' } });
  });

  it('turns validateBody failures into 400', async () => {
    const res = await appThrowing(new Error('Validation failed: query: Required')).request('/boom');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: 'VALIDATION_ERROR', message: 'Validation failed: query: Required' },
    });
  });

  it('reports JSON syntax errors as bad requests', async () => {
    const res = await appThrowing(new SyntaxError('Unexpected end of JSON input')).request('/boom');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'Invalid JSON in request body' } });
  });

  it('uses the status of core errors', async () => {
    const res = await appThrowing(new NotFoundError('Document', 'ramsar.pdf')).request('/boom');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      error: { code: 'NOT_FOUND', message: 'Document not found: ramsar.pdf' },
    });
  });

  it('hides unexpected error messages', async () => {
    const res = await appThrowing(new Error('secret internals')).request('/boom', {
      headers: { 'X-Request-ID': 'req-9' },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
      meta: { requestId: 'req-9' },
    });
  });
});

describe('notFoundHandler', () => {
  it('names the method and path', async () => {
    const res = await appThrowing(new Error('unused')).request('/api/v1/nothing', { method: 'DELETE' });

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      error: { code: 'NOT_FOUND', message: 'Route not found: DELETE /api/v1/nothing' },
    });
  });
});
