/**
 * BM25 keyword index over document chunks.
 */

import { BM25_B, BM25_K1 } from '../config/defaults.js';
import { tokenize } from './tokenize.js';
import type { DocumentChunk, ScoredChunk } from './types.js';

export interface Bm25Options {
  k1?: number;
  b?: number;
}

interface IndexedChunk {
  readonly chunk: DocumentChunk;
  readonly termFrequencies: Map<string, number>;
  readonly length: number;
}

export class Bm25Index {
  private readonly entries: IndexedChunk[];
  private readonly documentFrequency = new Map<string, number>();
  private readonly averageLength: number;
  private readonly k1: number;
  private readonly b: number;

  constructor(chunks: readonly DocumentChunk[], options: Bm25Options = {}) {
    this.k1 = options.k1 ?? BM25_K1;
    this.b = options.b ?? BM25_B;

    this.entries = chunks.map((chunk) => {
      const terms = tokenize(chunk.content);
      const termFrequencies = new Map<string, number>();
      for (const term of terms) {
        termFrequencies.set(term, (termFrequencies.get(term) ?? 0) + 1);
      }
      for (const term of termFrequencies.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
      return { chunk, termFrequencies, length: terms.length };
    });

    const totalLength = this.entries.reduce((sum, entry) => sum + entry.length, 0);
    this.averageLength = this.entries.length > 0 ? totalLength / this.entries.length : 0;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Lucene-style idf, never negative */
  private idf(term: string): number {
    const df = this.documentFrequency.get(term) ?? 0;
    const n = this.entries.length;
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /**
   * Chunks with a positive score, best first; ties keep index order.
   */
  search(query: string, limit: number): ScoredChunk[] {
    const queryTerms = [...new Set(tokenize(query))].filter((term) => this.documentFrequency.has(term));
    if (queryTerms.length === 0 || limit <= 0) return [];

    const scored: ScoredChunk[] = [];
    for (const entry of this.entries) {
      let score = 0;
      const norm = this.averageLength > 0 ? entry.length / this.averageLength : 0;
      for (const term of queryTerms) {
        const tf = entry.termFrequencies.get(term);
        if (!tf) continue;
        score += (this.idf(term) * tf * (this.k1 + 1)) / (tf + this.k1 * (1 - this.b + this.b * norm));
      }
      if (score > 0) scored.push({ document: entry.chunk, score });
    }

    // Array.prototype.sort is stable
    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}
