/**
 * Hono application setup
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import { VERSION } from '@wetlands/core';
import type { RagChatbot } from '@wetlands/core';
import type { GatewayConfig } from './types/index.js';
import { requestId, timing, errorHandler, notFoundHandler } from './middleware/index.js';
import { createChatRoutes, createDocumentRoutes, createHealthRoutes, apiError, ERROR_CODES } from './routes/index.js';
import { getLog } from './services/log.js';
import { CORS_MAX_AGE_SECONDS, MAX_BODY_BYTES } from './config/defaults.js';

const __appDirname = dirname(fileURLToPath(import.meta.url));
const CHAT_PAGE_PATH = resolve(__appDirname, '../public/index.html');

/**
 * Default configuration. Only localhost origins are allowed unless CORS_ORIGINS adds more.
 */
export function defaultGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const port = Number.parseInt(env.PORT ?? '8080', 10) || 8080;
  return {
    port,
    host: env.HOST || '127.0.0.1',
    corsOrigins: [
      `http://localhost:${port}`,
      `http://127.0.0.1:${port}`,
      ...(env.CORS_ORIGINS
        ? env.CORS_ORIGINS.split(',')
            .map((s) => s.trim())
            .filter(Boolean)
        : []),
    ],
    maxBodyBytes: Number.parseInt(env.BODY_SIZE_LIMIT ?? '', 10) || MAX_BODY_BYTES,
    serveChatPage: true,
  };
}

export interface CreateAppOptions {
  chatbot: RagChatbot;
  config?: Partial<GatewayConfig>;
}

/**
 * Create the Hono application
 */
export function createApp({ chatbot, config = {} }: CreateAppOptions): Hono {
  const fullConfig: GatewayConfig = { ...defaultGatewayConfig(), ...config };
  const maxBodyBytes = fullConfig.maxBodyBytes ?? MAX_BODY_BYTES;

  const app = new Hono();

  app.use('*', secureHeaders());

  // Never default to a wildcard origin
  app.use(
    '*',
    cors({
      origin: fullConfig.corsOrigins,
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-ID'],
      exposeHeaders: ['X-Request-ID', 'X-Response-Time'],
      maxAge: CORS_MAX_AGE_SECONDS,
    })
  );

  app.use('*', requestId);
  app.use('*', timing);

  app.use(
    '/api/*',
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) =>
        apiError(
          c,
          {
            code: ERROR_CODES.PAYLOAD_TOO_LARGE,
            message: `Request body exceeds the ${maxBodyBytes} byte limit`,
          },
          413
        ),
    })
  );

  // Logger (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    const httpLog = getLog('HTTP');
    app.use('*', logger((message) => httpLog.info(message)));
  }

  const healthRoutes = createHealthRoutes(chatbot);
  app.route('/health', healthRoutes);
  app.route('/api/v1/health', healthRoutes);
  app.route('/api/v1/chat', createChatRoutes(chatbot));
  app.route('/api/v1/documents', createDocumentRoutes(chatbot));

  app.get('/api/v1', (c) => {
    return c.json({
      version: 'v1',
      endpoints: {
        health: '/api/v1/health',
        chat: '/api/v1/chat',
        conversations: '/api/v1/chat/conversations/:id',
        documents: '/api/v1/documents',
        search: '/api/v1/documents/search',
      },
    });
  });

  if (fullConfig.serveChatPage !== false && existsSync(CHAT_PAGE_PATH)) {
    const page = readFileSync(CHAT_PAGE_PATH, 'utf-8');
    app.get('/', (c) => c.html(page));
  } else {
    app.get('/', (c) => {
      return c.json({
        name: 'Wetlands Assistant',
        version: VERSION,
        documentation: '/api/v1',
      });
    });
  }

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

/**
 * Export types for Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    startTime: number;
  }
}
