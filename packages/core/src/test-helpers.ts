/**
 * Shared test helpers for @wetlands/core
 *
 * vi.mock() is hoisted, so use these inside mock factories through a
 * dynamic import:
 *
 *   vi.mock('../services/get-log.js', async () => {
 *     const { createMockLog } = await import('../test-helpers.js');
 *     return { getLog: () => createMockLog() };
 *   });
 */

import { vi } from 'vitest';
import { ok } from './types/result.js';
import type { ILogService } from './services/log-service.js';
import type { ChatProvider, Embedder, EmbeddingTask } from './agent/provider.js';
import type { CompletionRequest, CompletionResponse, ToolCall } from './agent/types.js';

/**
 * ILogService whose methods are vi.fn(); child() returns the same mock.
 */
export function createMockLog(): ILogService {
  const log: ILogService = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => log),
  };
  return log;
}

export function textResponse(content: string, model = 'gemini-1.5-flash'): CompletionResponse {
  return {
    id: 'resp_text',
    content,
    finishReason: 'stop',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    model,
    createdAt: new Date('2026-01-01T00:00:00Z'),
  };
}

export function toolCallResponse(calls: ReadonlyArray<{ name: string; args?: Record<string, unknown> }>): CompletionResponse {
  const toolCalls: ToolCall[] = calls.map((call, i) => ({
    id: `call_${i + 1}`,
    name: call.name,
    arguments: JSON.stringify(call.args ?? {}),
  }));
  return {
    id: 'resp_tools',
    content: '',
    toolCalls,
    finishReason: 'tool_calls',
    usage: { promptTokens: 8, completionTokens: 2, totalTokens: 10 },
    model: 'gemini-1.5-flash',
    createdAt: new Date('2026-01-01T00:00:00Z'),
  };
}

export interface ScriptedProvider extends ChatProvider {
  /** Requests received by complete(), in order */
  readonly requests: CompletionRequest[];
}

/**
 * A ChatProvider that answers complete() and stream() from a fixed script.
 * The last response repeats once the script runs out.
 */
export function createScriptedProvider(script: readonly CompletionResponse[], ready = true): ScriptedProvider {
  const requests: CompletionRequest[] = [];
  let index = 0;
  const next = (): CompletionResponse => {
    const response = script[Math.min(index, script.length - 1)];
    index++;
    if (!response) throw new Error('Scripted provider has no responses');
    return response;
  };

  return {
    name: 'scripted',
    requests,
    isReady: () => ready,
    complete: vi.fn(async (request: CompletionRequest) => {
      requests.push(request);
      return ok(next());
    }),
    stream: async function* (request: CompletionRequest) {
      requests.push(request);
      const response = next();
      for (const word of response.content.split(/(?<= )/)) {
        if (word) yield ok({ id: response.id, content: word, done: false });
      }
      if (response.toolCalls) {
        yield ok({ id: response.id, toolCalls: response.toolCalls, done: false });
      }
      yield ok({ id: response.id, done: true, finishReason: response.finishReason, usage: response.usage });
    },
    listModels: vi.fn(async () => ok([])),
    countTokens: () => 0,
  };
}

/**
 * Deterministic embedder: a bag-of-letters vector, enough for cosine ranking in tests.
 */
export function createLetterEmbedder(): Embedder & { calls: Array<{ count: number; task: EmbeddingTask }> } {
  const calls: Array<{ count: number; task: EmbeddingTask }> = [];
  return {
    calls,
    embed: async (texts, task) => {
      calls.push({ count: texts.length, task });
      return ok(
        texts.map((text) => {
          const vector = new Array<number>(26).fill(0);
          for (const ch of text.toLowerCase()) {
            const code = ch.charCodeAt(0) - 97;
            if (code >= 0 && code < 26) vector[code] = (vector[code] ?? 0) + 1;
          }
          return vector;
        })
      );
    },
  };
}
