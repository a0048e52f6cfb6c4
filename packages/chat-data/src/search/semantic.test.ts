import { describe, expect, it } from 'vitest';
import { cosineSimilarity, rankPassages } from './semantic';

describe('cosineSimilarity', () => {
  it('returns 0 for mismatched, empty or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it('scores identical directions as 1', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
  });
});

describe('rankPassages', () => {
  const passages = [
    { id: 'a', uri: 'notes/a.md', text: 'a', vector: [0, 1] },
    { id: 'b', uri: 'notes/b.md', text: 'b', vector: [1, 0] },
    { id: 'c', uri: 'notes/c.md', text: 'c', vector: [1, 0] },
  ];

  it('keeps ties in corpus order and drops scores below the threshold', () => {
    const ranked = rankPassages(passages, [1, 0], { limit: 5, minScore: 0.5 });
    expect(ranked.map((entry) => entry.passage.id)).toEqual(['b', 'c']);
  });

  it('returns nothing for a zero limit', () => {
    expect(rankPassages(passages, [1, 0], { limit: 0, minScore: 0 })).toEqual([]);
  });
});
