import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestId } from './request-id.js';
import { timing } from './timing.js';

describe('Request ID Middleware', () => {
  const app = new Hono();
  app.use('*', requestId);
  app.get('/test', (c) => c.json({ requestId: c.get('requestId') }));

  it('generates a request ID if none is provided', async () => {
    const res = await app.request('/test');
    const id = res.headers.get('X-Request-ID');

    expect(id).toMatch(/^[0-9a-f-]{36}$/);
    expect(await res.json()).toEqual({ requestId: id });
  });

  it('reuses a well-formed request ID', async () => {
    const res = await app.request('/test', { headers: { 'X-Request-ID': 'trace:abc-123' } });

    expect(await res.json()).toEqual({ requestId: 'trace:abc-123' });
  });

  it('replaces a malformed request ID', async () => {
    const res = await app.request('/test', { headers: { 'X-Request-ID': 'bad id<>' } });

    expect(await res.json()).toEqual({ requestId: expect.stringMatching(/^[0-9a-f-]{36}$/) });
  });
});

describe('Timing Middleware', () => {
  it('adds X-Response-Time', async () => {
    const app = new Hono();
    app.use('*', timing);
    app.get('/test', (c) => c.json({ startTime: c.get('startTime') }));

    const res = await app.request('/test');

    expect(res.headers.get('X-Response-Time')).toMatch(/^\d+\.\d{2}ms$/);
    expect(await res.json()).toEqual({ startTime: expect.any(Number) });
  });
});
