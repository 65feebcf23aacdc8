/**
 * Shared test helpers for gateway tests.
 *
 *   import { createTestChatbot, createTestApp } from '../test-helpers.js';
 */

import { Hono } from 'hono';
import { KnowledgeBase, RagChatbot, type CompletionResponse, type SourcePage } from '@wetlands/core';
import { createScriptedProvider, textResponse, type ScriptedProvider } from '@wetlands/core/test-helpers';
import { requestId } from './middleware/request-id.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';

export const POLICY = 'Wetland Policy.pdf';
export const SECRETS_PATH = '/srv/wetlands/.secrets/secrets.toml';

export const TEST_PAGES: SourcePage[] = [
  { source: POLICY, page: 1, text: 'The policy protects wetlands and mangroves along the coast.' },
  { source: POLICY, page: 2, text: 'Mangroves shelter fish nurseries and slow storm surges.' },
  { source: 'Ramsar Sites.txt', page: 1, text: 'Ramsar sites are wetlands of international importance.' },
];

export interface TestChatbot {
  chatbot: RagChatbot;
  provider: ScriptedProvider;
}

/**
 * A RagChatbot over TEST_PAGES answering from a scripted provider.
 */
export async function createTestChatbot(
  script: readonly CompletionResponse[] = [textResponse('Wetlands store carbon.')],
  options: { ready?: boolean; pages?: SourcePage[] } = {}
): Promise<TestChatbot> {
  const provider = createScriptedProvider(script, options.ready ?? true);
  const knowledge = await KnowledgeBase.fromPages(options.pages ?? TEST_PAGES);
  const chatbot = new RagChatbot({
    provider,
    knowledge,
    model: { model: 'gemini-1.5-flash', temperature: 0.1, maxTokens: 2048 },
    contextWindowTokens: 32_768,
    secretsPath: SECRETS_PATH,
  });
  return { chatbot, provider };
}

/**
 * Mount routes under `path` with the request id and error middleware in place.
 */
export function createTestApp(path: string, routes: Hono): Hono {
  const app = new Hono();
  app.use('*', requestId);
  app.route(path, routes);
  app.onError(errorHandler);
  app.notFound(notFoundHandler);
  return app;
}

export function jsonRequest(body: unknown, method = 'POST'): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}
