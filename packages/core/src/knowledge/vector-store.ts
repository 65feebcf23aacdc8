/**
 * In-memory vector store and query embedding cache.
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { InternalError } from '../types/errors.js';
import type { Embedder, ProviderError } from '../agent/provider.js';
import { EMBEDDING_BATCH_SIZE } from '../config/defaults.js';
import type { DocumentChunk, ScoredChunk } from './types.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class VectorStore {
  private readonly vectors = new Map<string, readonly number[]>();
  private readonly chunks: DocumentChunk[] = [];

  /**
   * Embed and store chunks, EMBEDDING_BATCH_SIZE at a time.
   */
  static async build(
    chunks: readonly DocumentChunk[],
    embedder: Embedder
  ): Promise<Result<VectorStore, ProviderError>> {
    const store = new VectorStore();
    for (let offset = 0; offset < chunks.length; offset += EMBEDDING_BATCH_SIZE) {
      const batch = chunks.slice(offset, offset + EMBEDDING_BATCH_SIZE);
      const result = await embedder.embed(
        batch.map((chunk) => chunk.content),
        'RETRIEVAL_DOCUMENT'
      );
      if (!result.ok) return result;
      if (result.value.length !== batch.length) {
        return err(new InternalError(`Expected ${batch.length} embeddings, received ${result.value.length}`));
      }
      batch.forEach((chunk, i) => {
        const vector = result.value[i];
        if (vector) store.add(chunk, vector);
      });
    }
    return ok(store);
  }

  add(chunk: DocumentChunk, vector: readonly number[]): void {
    if (!this.vectors.has(chunk.id)) this.chunks.push(chunk);
    this.vectors.set(chunk.id, vector);
  }

  get size(): number {
    return this.chunks.length;
  }

  getVector(chunkId: string): readonly number[] | undefined {
    return this.vectors.get(chunkId);
  }

  /**
   * Nearest chunks by cosine similarity, best first.
   */
  search(queryVector: readonly number[], limit: number): ScoredChunk[] {
    const scored: ScoredChunk[] = [];
    for (const chunk of this.chunks) {
      const vector = this.vectors.get(chunk.id);
      if (!vector) continue;
      scored.push({ document: chunk, score: cosineSimilarity(queryVector, vector) });
    }
    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}

const QUERY_CACHE_SIZE = 64;

/**
 * Embeds queries once; retrieval and reranking of the same query share the vector.
 */
export class QueryEmbedder {
  private readonly cache = new Map<string, readonly number[]>();

  constructor(private readonly embedder: Embedder) {}

  async embed(query: string): Promise<Result<readonly number[], ProviderError>> {
    const key = query.trim();
    const cached = this.cache.get(key);
    if (cached) {
      // Refresh LRU position
      this.cache.delete(key);
      this.cache.set(key, cached);
      return ok(cached);
    }

    const result = await this.embedder.embed([key], 'RETRIEVAL_QUERY');
    if (!result.ok) return result;
    const vector = result.value[0];
    if (!vector) return err(new InternalError('Embedding response contained no vector'));

    this.cache.set(key, vector);
    if (this.cache.size > QUERY_CACHE_SIZE) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return ok(vector);
  }
}
