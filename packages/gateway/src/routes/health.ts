/**
 * Health check routes
 */

import { Hono } from 'hono';
import { VERSION } from '@wetlands/core';
import type { RagChatbot } from '@wetlands/core';
import type { HealthCheck, HealthResponse } from '../types/index.js';
import { apiResponse } from './helpers.js';

const startTime = Date.now();

export function createHealthRoutes(chatbot: RagChatbot): Hono {
  const routes = new Hono();

  routes.get('/', (c) => {
    const apiKeyConfigured = chatbot.isReady();
    const stats = chatbot.knowledge.stats();

    const checks: HealthCheck[] = [
      {
        name: 'gemini',
        status: apiKeyConfigured ? 'pass' : 'fail',
        message: apiKeyConfigured ? `API key configured (model ${chatbot.model})` : 'GOOGLE_API_KEY not configured',
      },
      {
        name: 'knowledge',
        status: stats.chunks > 0 ? 'pass' : 'warn',
        message:
          stats.chunks > 0
            ? `${stats.documents} documents, ${stats.chunks} chunks`
            : 'No documents loaded',
      },
      {
        name: 'embeddings',
        status: stats.embeddings ? 'pass' : 'warn',
        message: stats.embeddings ? 'Hybrid retrieval' : 'Keyword retrieval only',
      },
    ];

    const health: HealthResponse = {
      status: apiKeyConfigured && stats.chunks > 0 ? 'healthy' : 'degraded',
      version: VERSION,
      uptime: (Date.now() - startTime) / 1000,
      model: chatbot.model,
      apiKeyConfigured,
      documents: stats.documents,
      chunks: stats.chunks,
      embeddings: stats.embeddings,
      checks,
    };
    return apiResponse(c, health);
  });

  // Liveness check
  routes.get('/live', (c) => apiResponse(c, { status: 'ok' }));

  return routes;
}
