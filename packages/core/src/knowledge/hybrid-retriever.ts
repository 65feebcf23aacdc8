/**
 * Hybrid retrieval: BM25 and vector rankings fused by Reciprocal Rank Fusion.
 */

import { RETRIEVER_CANDIDATES, RRF_K } from '../config/defaults.js';
import { getLog } from '../services/get-log.js';
import type { Bm25Index } from './bm25.js';
import type { QueryEmbedder, VectorStore } from './vector-store.js';
import type { DocumentChunk, Retriever, ScoredChunk } from './types.js';

const log = getLog('HybridRetriever');

export interface HybridRetrieverOptions {
  keyword: Bm25Index;
  /** Vector side; omitted when embeddings are disabled or failed to build */
  vector?: { store: VectorStore; queries: QueryEmbedder };
  candidates?: number;
  rrfK?: number;
}

/**
 * Fuse rankings: each chunk scores Σ 1/(k + rank), rank 1-based.
 * Ties keep first-seen order across the rankings.
 */
export function reciprocalRankFusion(
  rankings: ReadonlyArray<readonly ScoredChunk[]>,
  k: number = RRF_K
): ScoredChunk[] {
  const fused = new Map<string, { document: DocumentChunk; score: number }>();
  for (const ranking of rankings) {
    ranking.forEach(({ document }, index) => {
      const entry = fused.get(document.id) ?? { document, score: 0 };
      entry.score += 1 / (k + index + 1);
      fused.set(document.id, entry);
    });
  }
  return [...fused.values()].sort((a, b) => b.score - a.score);
}

export class HybridRetriever implements Retriever {
  private readonly keyword: Bm25Index;
  private readonly vector?: { store: VectorStore; queries: QueryEmbedder };
  private readonly candidates: number;
  private readonly rrfK: number;

  constructor(options: HybridRetrieverOptions) {
    this.keyword = options.keyword;
    this.vector = options.vector;
    this.candidates = options.candidates ?? RETRIEVER_CANDIDATES;
    this.rrfK = options.rrfK ?? RRF_K;
  }

  get usesEmbeddings(): boolean {
    return this.vector !== undefined;
  }

  async invoke(query: string): Promise<DocumentChunk[]> {
    const keywordRanking = this.keyword.search(query, this.candidates);

    if (!this.vector) {
      return keywordRanking.map((hit) => hit.document);
    }

    const embedded = await this.vector.queries.embed(query);
    if (!embedded.ok) {
      log.warn('Query embedding failed, using keyword ranking only', { error: embedded.error.message });
      return keywordRanking.map((hit) => hit.document);
    }

    const vectorRanking = this.vector.store.search(embedded.value, this.candidates);
    return reciprocalRankFusion([keywordRanking, vectorRanking], this.rrfK)
      .slice(0, this.candidates)
      .map((hit) => hit.document);
  }
}
