import { describe, it, expect, vi } from 'vitest';
import { RelevanceChecker, termCoverage } from './relevance.js';
import { chunkPages } from './chunker.js';
import { QueryEmbedder, VectorStore, cosineSimilarity } from './vector-store.js';
import { createLetterEmbedder } from '../test-helpers.js';
import { unwrap } from '../types/result.js';

vi.mock('../services/get-log.js', async () => {
  const { createMockLog } = await import('../test-helpers.js');
  return { getLog: () => createMockLog() };
});

const chunks = chunkPages([
  { source: 'a.txt', page: 1, text: 'peat bogs store carbon' },
  { source: 'b.txt', page: 1, text: 'salt marshes buffer storms' },
  { source: 'c.txt', page: 1, text: 'bogs bogs and more bogs' },
]);

describe('termCoverage', () => {
  it('is the share of query terms present', () => {
    expect(termCoverage(['peat', 'bog'], 'Raised bogs form over centuries')).toBe(0.5);
  });

  it('treats a query without content terms as fully covered', () => {
    expect(termCoverage([], 'anything')).toBe(1);
  });
});

describe('RelevanceChecker', () => {
  it('scores by coverage without embeddings and drops weak chunks', async () => {
    const checker = new RelevanceChecker({ threshold: 0.2 });

    const kept = await checker.filterDocuments('peat bogs', chunks);

    expect(kept.map((hit) => [hit.document.metadata.source, hit.score])).toEqual([
      ['a.txt', 1],
      ['c.txt', 0.5],
    ]);
  });

  it('keeps ties in input order', async () => {
    const checker = new RelevanceChecker({ threshold: 0 });

    const kept = await checker.filterDocuments('desert', chunks);

    expect(kept.map((hit) => hit.document.metadata.source)).toEqual(['a.txt', 'b.txt', 'c.txt']);
  });

  it('returns nothing for no documents', async () => {
    expect(await new RelevanceChecker().filterDocuments('peat', [])).toEqual([]);
  });

  it('blends coverage with cosine similarity', async () => {
    const embedder = createLetterEmbedder();
    const store = unwrap(await VectorStore.build(chunks, embedder));
    const checker = new RelevanceChecker({ threshold: 0, vector: { store, queries: new QueryEmbedder(embedder) } });

    const kept = await checker.filterDocuments('carbon', chunks);

    const queryVector = unwrap(await embedder.embed(['carbon'], 'RETRIEVAL_QUERY'))[0] ?? [];
    const aVector = store.getVector('a.txt#p1-0') ?? [];
    const expected = Math.round((0.5 * 1 + 0.5 * cosineSimilarity(queryVector, aVector)) * 10_000) / 10_000;
    expect(kept[0]?.document.metadata.source).toBe('a.txt');
    expect(kept[0]?.score).toBe(expected);
  });
});
