import { describe, it, expect } from 'vitest';
import { Bm25Index } from './bm25.js';
import { chunkPages } from './chunker.js';

const chunks = chunkPages([
  { source: 'a.txt', page: 1, text: 'peat bogs store carbon' },
  { source: 'b.txt', page: 1, text: 'salt marshes buffer storms' },
  { source: 'c.txt', page: 1, text: 'bogs bogs and more bogs' },
]);

describe('Bm25Index', () => {
  const index = new Bm25Index(chunks);

  it('ranks chunks by term frequency at equal length', () => {
    const hits = index.search('bogs', 5);

    expect(hits.map((hit) => hit.document.metadata.source)).toEqual(['c.txt', 'a.txt']);
    expect(hits[0]?.score).toBeGreaterThan(hits[1]?.score ?? 0);
  });

  it('returns nothing for unknown or stopword-only queries', () => {
    expect(index.search('desert', 5)).toEqual([]);
    expect(index.search('the and of', 5)).toEqual([]);
  });

  it('honours the limit', () => {
    expect(index.search('bogs marshes', 1)).toHaveLength(1);
    expect(index.search('bogs', 0)).toEqual([]);
  });

  it('handles an empty index', () => {
    const empty = new Bm25Index([]);

    expect(empty.size).toBe(0);
    expect(empty.search('bogs', 5)).toEqual([]);
  });
});
