/**
 * Chat provider contract used by the agent loop.
 */

import type { Result } from '../types/result.js';
import type {
  ConfigurationError,
  InternalError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from '../types/errors.js';
import type { CompletionRequest, CompletionResponse, Message, ModelInfo, StreamChunk } from './types.js';

export type ProviderError = InternalError | TimeoutError | ValidationError | RateLimitError | ConfigurationError;

export interface ChatProvider {
  readonly name: string;

  /** Whether the provider has what it needs (an API key) to make requests */
  isReady(): boolean;

  complete(request: CompletionRequest): Promise<Result<CompletionResponse, ProviderError>>;

  stream(request: CompletionRequest): AsyncGenerator<Result<StreamChunk, ProviderError>, void, unknown>;

  listModels(): Promise<Result<readonly ModelInfo[], ProviderError>>;

  countTokens(messages: readonly Message[]): number;
}

export type EmbeddingTask = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY';

/**
 * Turns texts into vectors, one per input, in input order.
 */
export interface Embedder {
  embed(texts: readonly string[], task: EmbeddingTask): Promise<Result<number[][], ProviderError>>;
}
