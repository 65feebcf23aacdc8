/**
 * Health Routes Tests
 */

import { describe, it, expect } from 'vitest';
import { VERSION } from '@wetlands/core';
import { createHealthRoutes } from './health.js';
import { createTestApp, createTestChatbot } from '../test-helpers.js';

describe('Health Routes', () => {
  it('is healthy with a key and documents', async () => {
    const { chatbot } = await createTestChatbot();
    const app = createTestApp('/health', createHealthRoutes(chatbot));

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        status: 'healthy',
        version: VERSION,
        uptime: expect.any(Number),
        model: 'gemini-1.5-flash',
        apiKeyConfigured: true,
        documents: 2,
        chunks: 3,
        embeddings: false,
        checks: [
          { name: 'gemini', status: 'pass' },
          { name: 'knowledge', status: 'pass' },
          { name: 'embeddings', status: 'warn' },
        ],
      },
    });
  });

  it('is degraded without an API key', async () => {
    const { chatbot } = await createTestChatbot(undefined, { ready: false });
    const app = createTestApp('/health', createHealthRoutes(chatbot));

    const json = await (await app.request('/health')).json();

    expect(json).toMatchObject({
      data: {
        status: 'degraded',
        checks: expect.arrayContaining([{ name: 'gemini', status: 'fail', message: 'GOOGLE_API_KEY not configured' }]),
      },
    });
  });

  it('is degraded without documents', async () => {
    const { chatbot } = await createTestChatbot(undefined, { pages: [] });
    const app = createTestApp('/health', createHealthRoutes(chatbot));

    const json = await (await app.request('/health')).json();

    expect(json).toMatchObject({
      data: {
        status: 'degraded',
        checks: expect.arrayContaining([{ name: 'knowledge', status: 'warn', message: 'No documents loaded' }]),
      },
    });
  });

  it('answers the liveness check', async () => {
    const { chatbot } = await createTestChatbot();
    const app = createTestApp('/health', createHealthRoutes(chatbot));

    const json = await (await app.request('/health/live')).json();

    expect(json).toMatchObject({ data: { status: 'ok' } });
  });
});
