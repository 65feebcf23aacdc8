/**
 * Relevance checker: scores retrieved chunks against the query and drops weak ones.
 */

import { DEFAULT_RELEVANCE_THRESHOLD } from '../config/defaults.js';
import { getLog } from '../services/get-log.js';
import { cosineSimilarity } from './vector-store.js';
import type { QueryEmbedder, VectorStore } from './vector-store.js';
import { tokenize, uniqueTerms } from './tokenize.js';
import type { DocumentChunk, RelevanceFilter, ScoredChunk } from './types.js';

const log = getLog('RelevanceChecker');

export interface RelevanceCheckerOptions {
  threshold?: number;
  vector?: { store: VectorStore; queries: QueryEmbedder };
}

/**
 * Share of distinct query terms found in the text. A query with no content
 * terms covers everything.
 */
export function termCoverage(queryTerms: readonly string[], text: string): number {
  if (queryTerms.length === 0) return 1;
  const terms = new Set(tokenize(text));
  const found = queryTerms.filter((term) => terms.has(term)).length;
  return found / queryTerms.length;
}

function round(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

export class RelevanceChecker implements RelevanceFilter {
  readonly threshold: number;
  private readonly vector?: { store: VectorStore; queries: QueryEmbedder };

  constructor(options: RelevanceCheckerOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_RELEVANCE_THRESHOLD;
    this.vector = options.vector;
  }

  async filterDocuments(query: string, documents: readonly DocumentChunk[]): Promise<ScoredChunk[]> {
    if (documents.length === 0) return [];

    const queryTerms = uniqueTerms(query);
    let queryVector: readonly number[] | undefined;
    if (this.vector) {
      const embedded = await this.vector.queries.embed(query);
      if (embedded.ok) {
        queryVector = embedded.value;
      } else {
        log.warn('Query embedding failed, scoring by term coverage', { error: embedded.error.message });
      }
    }

    const scored = documents.map((document) => {
      const coverage = termCoverage(queryTerms, document.content);
      const vector = queryVector && this.vector?.store.getVector(document.id);
      const score =
        queryVector && vector
          ? 0.5 * coverage + 0.5 * Math.max(0, cosineSimilarity(queryVector, vector))
          : coverage;
      return { document, score: round(score) };
    });

    const kept = scored.filter((hit) => hit.score >= this.threshold).sort((a, b) => b.score - a.score);
    log.debug(`Kept ${kept.length}/${documents.length} chunks`, { threshold: this.threshold });
    return kept;
  }
}
