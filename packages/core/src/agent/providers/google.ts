/**
 * Google AI (Gemini) Provider
 *
 * Talks to the Generative Language REST API with fetch:
 * generateContent with function calling, SSE streaming, model listing
 * and batch embeddings.
 */

import { z } from 'zod';
import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import {
  ConfigurationError,
  InternalError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from '../../types/errors.js';
import { getLog } from '../../services/get-log.js';
import { generateId, getErrorMessage } from '../../services/utils.js';
import {
  DEFAULT_CHAT_MODEL,
  DEFAULT_EMBEDDING_MODEL,
  EMBEDDING_BATCH_SIZE,
  GEMINI_BASE_URL,
  GEMINI_TIMEOUT_MS,
} from '../../config/defaults.js';
import type { ChatProvider, Embedder, EmbeddingTask, ProviderError } from '../provider.js';
import type {
  CompletionRequest,
  CompletionResponse,
  FinishReason,
  Message,
  ModelInfo,
  StreamChunk,
  TokenUsage,
  ToolCall,
  ToolChoice,
} from '../types.js';

const log = getLog('Google');

const RETRY_CONFIG = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableErrors: ['ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'fetch failed'],
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

const FUNCTION_CALLING_HINT =
  'Function calling was rejected. Use a model that supports it (gemini-1.5-flash, gemini-1.5-pro) ' +
  'and check that every tool declaration is a valid OpenAPI-style schema.';

export interface GoogleProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  /** Used when a request does not name a model */
  defaultModel?: string;
  embeddingModel?: string;
  /** Per-attempt timeout (ms) */
  timeoutMs?: number;
  maxRetries?: number;
  /** Retry backoff start (ms); tests set 0 */
  initialRetryDelayMs?: number;
}

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

const partSchema = z.object({
  text: z.string().optional(),
  thought: z.boolean().optional(),
  functionCall: z
    .object({
      name: z.string(),
      args: z.record(z.unknown()).optional(),
    })
    .optional(),
  thoughtSignature: z.string().optional(),
});

const usageSchema = z.object({
  promptTokenCount: z.number().optional(),
  candidatesTokenCount: z.number().optional(),
  totalTokenCount: z.number().optional(),
  thoughtsTokenCount: z.number().optional(),
});

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(partSchema).optional() }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: usageSchema.optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

type GeminiResponse = z.infer<typeof generateResponseSchema>;

const modelsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        displayName: z.string().optional(),
        description: z.string().optional(),
        inputTokenLimit: z.number().optional(),
        outputTokenLimit: z.number().optional(),
        supportedGenerationMethods: z.array(z.string()).optional(),
      })
    )
    .optional(),
  nextPageToken: z.string().optional(),
});

const embedResponseSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

const apiErrorSchema = z.object({
  error: z.object({ message: z.string().optional(), status: z.string().optional() }),
});

/**
 * Schema keywords Gemini rejects. Only stripped from schema objects,
 * never from the property names inside a `properties` map.
 */
const UNSUPPORTED_GEMINI_SCHEMA_KEYWORDS = new Set([
  '$schema',
  '$ref',
  '$id',
  '$comment',
  '$defs',
  'additionalProperties',
  'patternProperties',
  'anyOf',
  'oneOf',
  'allOf',
  'not',
  'definitions',
]);

export function sanitizeGeminiSchema(schema: unknown, insidePropertiesMap = false): unknown {
  if (schema === null || typeof schema !== 'object') return schema;
  if (Array.isArray(schema)) return schema.map((item) => sanitizeGeminiSchema(item));

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(schema)) {
    if (!insidePropertiesMap && UNSUPPORTED_GEMINI_SCHEMA_KEYWORDS.has(key)) continue;

    result[key] =
      key === 'properties' && typeof value === 'object' && value !== null && !Array.isArray(value)
        ? sanitizeGeminiSchema(value, true)
        : sanitizeGeminiSchema(value);
  }
  return result;
}

function safeParseToolArgs(args: string): Record<string, unknown> {
  if (!args) return {};
  try {
    const parsed: unknown = JSON.parse(args);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface AttemptFailure {
  error: ProviderError;
  retryable: boolean;
}

type GeminiPart = Record<string, unknown>;

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

/**
 * Google AI provider for Gemini models.
 */
export class GoogleProvider implements ChatProvider, Embedder {
  readonly name = 'google';
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly defaultModel: string;
  private readonly embeddingModel: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;

  constructor(config: GoogleProviderConfig = {}) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, '');
    this.defaultModel = config.defaultModel ?? DEFAULT_CHAT_MODEL;
    this.embeddingModel = config.embeddingModel ?? DEFAULT_EMBEDDING_MODEL;
    this.timeoutMs = config.timeoutMs ?? GEMINI_TIMEOUT_MS;
    this.maxRetries = config.maxRetries ?? RETRY_CONFIG.maxRetries;
    this.initialRetryDelayMs = config.initialRetryDelayMs ?? RETRY_CONFIG.initialDelayMs;
  }

  isReady(): boolean {
    return !!this.apiKey;
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }

  async complete(request: CompletionRequest): Promise<Result<CompletionResponse, ProviderError>> {
    const model = request.model.model || this.defaultModel;
    const body = this.buildGeminiRequest(request);
    const startTime = Date.now();

    const result = await this.requestJson(
      `/models/${model}:generateContent`,
      { method: 'POST', body: JSON.stringify(body) },
      generateResponseSchema,
      'generateContent'
    );
    if (!result.ok) return result;

    const response = this.parseResponse(result.value, model);
    if (response.ok) {
      log.debug('generateContent finished', {
        model,
        durationMs: Date.now() - startTime,
        finishReason: response.value.finishReason,
        toolCalls: response.value.toolCalls?.map((tc) => tc.name),
        usage: response.value.usage,
      });
    }
    return response;
  }

  async *stream(request: CompletionRequest): AsyncGenerator<Result<StreamChunk, ProviderError>, void, unknown> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      yield err(this.missingKeyError());
      return;
    }

    const model = request.model.model || this.defaultModel;
    const url = `${this.baseUrl}/models/${model}:streamGenerateContent?alt=sse`;

    // Idle timeout, re-armed on every chunk
    const controller = new AbortController();
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = (): void => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => controller.abort(), this.timeoutMs);
    };

    try {
      armIdleTimer();
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', 'x-goog-api-key': apiKey },
          body: JSON.stringify(this.buildGeminiRequest(request)),
          signal: controller.signal,
        });
      } catch (error) {
        yield err(this.networkError(error, 'streamGenerateContent').error);
        return;
      }

      if (!response.ok || !response.body) {
        const errorText = await response.text().catch(() => '');
        yield err(this.httpError(response.status, errorText).error);
        return;
      }

      yield* this.readStream(response.body, armIdleTimer);
    } finally {
      clearTimeout(idleTimer);
    }
  }

  private async *readStream(
    body: ReadableStream<Uint8Array>,
    onChunk: () => void
  ): AsyncGenerator<Result<StreamChunk, ProviderError>, void, unknown> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        onChunk();

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (!line.startsWith('data: ')) continue;
          const data = line.slice(6).trim();
          if (!data) continue;

          let parsed: GeminiResponse;
          try {
            parsed = generateResponseSchema.parse(JSON.parse(data));
          } catch (error) {
            log.debug('Skipping malformed stream chunk', { error: getErrorMessage(error) });
            continue;
          }

          yield* this.streamChunks(parsed);
        }
      }
    } catch (error) {
      yield err(this.networkError(error, 'streamGenerateContent').error);
    } finally {
      await reader.cancel().catch((error: unknown) => {
        log.debug('Stream reader already released', { error: getErrorMessage(error) });
      });
    }
  }

  private *streamChunks(parsed: GeminiResponse): Generator<Result<StreamChunk, ProviderError>> {
    const candidate = parsed.candidates?.[0];
    const text: string[] = [];
    const toolCalls: ToolCall[] = [];

    for (const part of candidate?.content?.parts ?? []) {
      if (part.text && !part.thought) text.push(part.text);
      if (part.functionCall) toolCalls.push(this.toToolCall(part));
    }

    if (text.length > 0 || toolCalls.length > 0) {
      yield ok({
        id: generateId('chunk'),
        content: text.length > 0 ? text.join('') : undefined,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        done: false,
      });
    }

    const blocked = parsed.promptFeedback?.blockReason;
    if (candidate?.finishReason || blocked) {
      yield ok({
        id: generateId('chunk'),
        done: true,
        finishReason: blocked ? 'content_filter' : this.mapFinishReason(candidate?.finishReason ?? 'STOP'),
        usage: this.mapUsage(parsed.usageMetadata),
      });
    }
  }

  /**
   * Models that support generateContent.
   */
  async listModels(): Promise<Result<readonly ModelInfo[], ProviderError>> {
    const models: ModelInfo[] = [];
    let pageToken: string | undefined;

    do {
      const query = new URLSearchParams({ pageSize: '1000' });
      if (pageToken) query.set('pageToken', pageToken);

      const result = await this.requestJson(`/models?${query}`, { method: 'GET' }, modelsResponseSchema, 'listModels');
      if (!result.ok) return result;

      for (const model of result.value.models ?? []) {
        const methods = model.supportedGenerationMethods ?? [];
        if (!methods.includes('generateContent')) continue;
        models.push({
          id: model.name.replace(/^models\//, ''),
          displayName: model.displayName ?? model.name,
          description: model.description,
          inputTokenLimit: model.inputTokenLimit,
          outputTokenLimit: model.outputTokenLimit,
          methods,
        });
      }
      pageToken = result.value.nextPageToken;
    } while (pageToken);

    return ok(models);
  }

  /**
   * Embed texts with batchEmbedContents, in batches the API accepts.
   */
  async embed(texts: readonly string[], task: EmbeddingTask): Promise<Result<number[][], ProviderError>> {
    const vectors: number[][] = [];
    const model = `models/${this.embeddingModel}`;

    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      const body = {
        requests: batch.map((text) => ({ model, content: { parts: [{ text }] }, taskType: task })),
      };

      const result = await this.requestJson(
        `/${model}:batchEmbedContents`,
        { method: 'POST', body: JSON.stringify(body) },
        embedResponseSchema,
        'batchEmbedContents'
      );
      if (!result.ok) return result;
      if (result.value.embeddings.length !== batch.length) {
        return err(
          new InternalError(
            `Embedding count mismatch: sent ${batch.length}, received ${result.value.embeddings.length}`
          )
        );
      }
      vectors.push(...result.value.embeddings.map((e) => e.values));
    }

    return ok(vectors);
  }

  /**
   * Approximate token count (~4 chars per token)
   */
  countTokens(messages: readonly Message[]): number {
    const chars = messages.reduce((sum, msg) => sum + msg.content.length, 0);
    return Math.ceil(chars / 4);
  }

  // -------------------------------------------------------------------------
  // HTTP
  // -------------------------------------------------------------------------

  /**
   * Send a request with retries and validate the JSON body against `schema`.
   */
  private async requestJson<T>(
    path: string,
    init: { method: 'GET' | 'POST'; body?: string },
    schema: z.ZodType<T>,
    operation: string
  ): Promise<Result<T, ProviderError>> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      return err(this.missingKeyError());
    }

    let delay = this.initialRetryDelayMs;
    for (let attempt = 1; ; attempt++) {
      const outcome = await this.attempt(`${this.baseUrl}${path}`, init, apiKey, schema, operation);
      if (outcome.ok) return outcome;

      const { error, retryable } = outcome.error;
      if (!retryable || attempt >= this.maxRetries) {
        log.error(`${operation} failed`, { attempt, error: error.message });
        return err(error);
      }

      log.info(`Retry ${attempt}/${this.maxRetries} after ${delay}ms - ${error.message}`);
      await sleep(delay);
      delay = Math.min(delay * RETRY_CONFIG.backoffMultiplier, RETRY_CONFIG.maxDelayMs);
    }
  }

  private async attempt<T>(
    url: string,
    init: { method: 'GET' | 'POST'; body?: string },
    apiKey: string,
    schema: z.ZodType<T>,
    operation: string
  ): Promise<Result<T, AttemptFailure>> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: { 'Content-Type': 'application/json', 'x-goog-api-key': apiKey },
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return err(this.networkError(error, operation));
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      return err(this.httpError(response.status, errorText));
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      return err({ error: new InternalError(`Invalid JSON from Gemini ${operation}`, { cause: error }), retryable: false });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      return err({
        error: new InternalError(`Unexpected Gemini ${operation} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`),
        retryable: false,
      });
    }
    return ok(parsed.data);
  }

  private networkError(error: unknown, operation: string): AttemptFailure {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return { error: new TimeoutError(`Gemini ${operation}`, this.timeoutMs, { cause: error }), retryable: true };
    }
    const message = getErrorMessage(error);
    const code = error instanceof Error && error.cause instanceof Error ? error.cause.message : '';
    const retryable = RETRY_CONFIG.retryableErrors.some((e) => message.includes(e) || code.includes(e));
    return { error: new InternalError(`Gemini request failed: ${message}`, { cause: error }), retryable };
  }

  private httpError(status: number, body: string): AttemptFailure {
    const parsed = apiErrorSchema.safeParse(safeJson(body));
    const detail = parsed.success ? (parsed.data.error.message ?? body) : body;
    const retryable = RETRY_CONFIG.retryableStatusCodes.includes(status);

    if (status === 429) {
      return { error: new RateLimitError(`Gemini rate limit exceeded: ${detail}`), retryable };
    }
    if (status === 401 || status === 403) {
      return {
        error: new ConfigurationError(
          `Gemini rejected the API key (${status}): ${detail}`,
          'Check that GOOGLE_API_KEY is a valid Generative Language API key with access to the configured model.'
        ),
        retryable: false,
      };
    }
    if (status === 400 && /function|tool/i.test(detail)) {
      return { error: new ValidationError(`Gemini rejected the request: ${detail}`, { hint: FUNCTION_CALLING_HINT }), retryable: false };
    }
    if (status === 404) {
      return {
        error: new ValidationError(`Gemini model or endpoint not found: ${detail}`, {
          hint: 'Run `wetlands models` to see the models available to this key, then set GEMINI_MODEL.',
        }),
        retryable: false,
      };
    }
    return { error: new InternalError(`Gemini API error: ${status} - ${detail}`), retryable };
  }

  private missingKeyError(): ConfigurationError {
    return new ConfigurationError(
      'Gemini API key is not configured',
      'Set GOOGLE_API_KEY in the environment or in the secrets file.'
    );
  }

  // -------------------------------------------------------------------------
  // Request / response mapping
  // -------------------------------------------------------------------------

  private parseResponse(data: GeminiResponse, model: string): Result<CompletionResponse, ProviderError> {
    const candidate = data.candidates?.[0];
    const usage = this.mapUsage(data.usageMetadata);
    const base = { id: generateId('gemini'), model, createdAt: new Date(), usage };

    if (data.promptFeedback?.blockReason) {
      return ok({ ...base, content: '', finishReason: 'content_filter' });
    }
    if (!candidate) {
      return err(new InternalError('No response from Gemini'));
    }

    let textContent = '';
    const toolCalls: ToolCall[] = [];
    for (const part of candidate.content?.parts ?? []) {
      if (part.text && !part.thought) textContent += part.text;
      if (part.functionCall) toolCalls.push(this.toToolCall(part));
    }

    if (!candidate.content?.parts && !candidate.finishReason) {
      return err(new InternalError('No response from Gemini'));
    }

    return ok({
      ...base,
      content: textContent,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : this.mapFinishReason(candidate.finishReason ?? 'STOP'),
    });
  }

  private toToolCall(part: z.infer<typeof partSchema>): ToolCall {
    return {
      id: generateId('call'),
      name: part.functionCall?.name ?? '',
      arguments: JSON.stringify(part.functionCall?.args ?? {}),
      // Thinking models require the signature echoed back with the call
      metadata: part.thoughtSignature ? { thoughtSignature: part.thoughtSignature } : undefined,
    };
  }

  private mapUsage(usage: GeminiResponse['usageMetadata']): TokenUsage | undefined {
    if (!usage) return undefined;
    return {
      promptTokens: usage.promptTokenCount ?? 0,
      completionTokens: (usage.candidatesTokenCount ?? 0) + (usage.thoughtsTokenCount ?? 0),
      totalTokens: usage.totalTokenCount ?? 0,
    };
  }

  buildGeminiRequest(request: CompletionRequest): Record<string, unknown> {
    const systemText = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    // Gemini rejects an empty `contents`.
    const contents = this.buildGeminiContents(request.messages.filter((m) => m.role !== 'system'));
    if (contents.length === 0) {
      log.warn('Empty contents for Gemini request, injecting minimal user turn');
      contents.push({ role: 'user', parts: [{ text: '(start)' }] });
    }

    const geminiRequest: Record<string, unknown> = {
      contents,
      generationConfig: {
        maxOutputTokens: request.model.maxTokens,
        temperature: request.model.temperature,
        topP: request.model.topP,
        stopSequences: request.model.stop,
      },
    };

    if (systemText) {
      geminiRequest.systemInstruction = { parts: [{ text: systemText }] };
    }

    if (request.tools?.length) {
      geminiRequest.tools = [
        {
          functionDeclarations: request.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            parameters: sanitizeGeminiSchema(tool.parameters),
          })),
        },
      ];
      geminiRequest.toolConfig = {
        functionCallingConfig: { mode: this.mapToolChoice(request.toolChoice ?? 'auto') },
      };
    }

    return geminiRequest;
  }

  private buildGeminiContents(messages: readonly Message[]): GeminiContent[] {
    const toolCallNames = new Map<string, string>();
    const toolCallSignatures = new Map<string, string>();
    for (const msg of messages) {
      for (const tc of msg.toolCalls ?? []) {
        toolCallNames.set(tc.id, tc.name);
        const signature = tc.metadata?.thoughtSignature;
        if (typeof signature === 'string') toolCallSignatures.set(tc.id, signature);
      }
    }

    const contents: GeminiContent[] = [];
    for (const msg of messages) {
      const parts: GeminiPart[] = [];
      if (msg.content) parts.push({ text: msg.content });

      if (msg.role === 'tool') {
        for (const result of msg.toolResults ?? []) {
          const part: GeminiPart = {
            functionResponse: {
              name: toolCallNames.get(result.toolCallId) ?? result.toolCallId,
              response: { result: result.content },
            },
          };
          const signature = toolCallSignatures.get(result.toolCallId);
          if (signature) part.thoughtSignature = signature;
          parts.push(part);
        }
      }

      if (msg.role === 'assistant') {
        for (const tc of msg.toolCalls ?? []) {
          const part: GeminiPart = {
            functionCall: { name: tc.name, args: safeParseToolArgs(tc.arguments) },
          };
          const signature = tc.metadata?.thoughtSignature;
          if (typeof signature === 'string') part.thoughtSignature = signature;
          parts.push(part);
        }
      }

      if (parts.length === 0) continue;
      contents.push({ role: msg.role === 'assistant' ? 'model' : 'user', parts });
    }
    return contents;
  }

  private mapToolChoice(choice: ToolChoice): 'AUTO' | 'ANY' | 'NONE' {
    switch (choice) {
      case 'required':
        return 'ANY';
      case 'none':
        return 'NONE';
      default:
        return 'AUTO';
    }
  }

  private mapFinishReason(reason: string): FinishReason {
    switch (reason) {
      case 'STOP':
        return 'stop';
      case 'MAX_TOKENS':
        return 'length';
      case 'SAFETY':
      case 'RECITATION':
      case 'BLOCKLIST':
      case 'PROHIBITED_CONTENT':
        return 'content_filter';
      case 'MALFORMED_FUNCTION_CALL':
        return 'error';
      default:
        return 'stop';
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
