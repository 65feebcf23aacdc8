import { describe, it, expect, vi } from 'vitest';
import { HybridRetriever, reciprocalRankFusion } from './hybrid-retriever.js';
import { Bm25Index } from './bm25.js';
import { chunkPages } from './chunker.js';
import { QueryEmbedder, VectorStore } from './vector-store.js';
import { createLetterEmbedder } from '../test-helpers.js';
import { err, unwrap } from '../types/result.js';
import { RateLimitError } from '../types/errors.js';
import type { Embedder } from '../agent/provider.js';

vi.mock('../services/get-log.js', async () => {
  const { createMockLog } = await import('../test-helpers.js');
  return { getLog: () => createMockLog() };
});

const chunks = chunkPages([
  { source: 'a.txt', page: 1, text: 'peat bogs store carbon' },
  { source: 'b.txt', page: 1, text: 'salt marshes buffer storms' },
  { source: 'c.txt', page: 1, text: 'bogs bogs and more bogs' },
]);

function sources(documents: ReadonlyArray<{ metadata: { source: string } }>): string[] {
  return documents.map((d) => d.metadata.source);
}

describe('reciprocalRankFusion', () => {
  it('sums 1/(k + rank) across rankings', () => {
    const [a, b, c] = chunks;
    if (!a || !b || !c) throw new Error('expected three chunks');

    const fused = reciprocalRankFusion(
      [
        [{ document: a, score: 9 }, { document: b, score: 5 }],
        [{ document: b, score: 0.9 }, { document: c, score: 0.5 }],
      ],
      60
    );

    expect(sources(fused.map((hit) => hit.document))).toEqual(['b.txt', 'a.txt', 'c.txt']);
    expect(fused[0]?.score).toBeCloseTo(1 / 61 + 1 / 62);
    expect(fused[1]?.score).toBeCloseTo(1 / 61);
  });
});

describe('HybridRetriever', () => {
  it('uses keyword ranking alone without embeddings', async () => {
    const retriever = new HybridRetriever({ keyword: new Bm25Index(chunks) });

    expect(retriever.usesEmbeddings).toBe(false);
    expect(sources(await retriever.invoke('bogs'))).toEqual(['c.txt', 'a.txt']);
  });

  it('fuses keyword and vector rankings', async () => {
    const embedder = createLetterEmbedder();
    const store = unwrap(await VectorStore.build(chunks, embedder));
    const retriever = new HybridRetriever({
      keyword: new Bm25Index(chunks),
      vector: { store, queries: new QueryEmbedder(embedder) },
    });

    const results = await retriever.invoke('bogs');

    expect(retriever.usesEmbeddings).toBe(true);
    expect(sources(results)).toEqual(['c.txt', 'a.txt', 'b.txt']);
  });

  it('falls back to keywords when the query cannot be embedded', async () => {
    const store = unwrap(await VectorStore.build(chunks, createLetterEmbedder()));
    const failing: Embedder = { embed: async () => err(new RateLimitError('Gemini rate limit exceeded: quota')) };
    const retriever = new HybridRetriever({
      keyword: new Bm25Index(chunks),
      vector: { store, queries: new QueryEmbedder(failing) },
    });

    expect(sources(await retriever.invoke('bogs'))).toEqual(['c.txt', 'a.txt']);
  });

  it('caps results at the candidate count', async () => {
    const retriever = new HybridRetriever({ keyword: new Bm25Index(chunks), candidates: 1 });

    expect(sources(await retriever.invoke('bogs'))).toEqual(['c.txt']);
  });
});
