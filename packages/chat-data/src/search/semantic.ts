import type { CorpusPassage } from '../index';

export type RankedPassage = {
  passage: CorpusPassage;
  score: number;
};

export function cosineSimilarity(a: number[] | undefined, b: number[] | undefined): number {
  if (!a?.length || !b?.length || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;
  a.forEach((valA, i) => {
    const valB = b[i] ?? 0;
    dot += valA * valB;
    magA += valA * valA;
    magB += valB * valB;
  });

  if (!magA || !magB) {
    return 0;
  }

  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

/**
 * Score every passage against the query vector and keep the best `limit` at or above `minScore`.
 * Ties keep corpus order.
 */
export function rankPassages(
  passages: CorpusPassage[],
  queryVector: number[],
  options: { limit: number; minScore: number }
): RankedPassage[] {
  if (!queryVector.length || options.limit <= 0) {
    return [];
  }

  const ranked: RankedPassage[] = [];
  for (const passage of passages) {
    const score = cosineSimilarity(queryVector, passage.vector);
    if (score < options.minScore) {
      continue;
    }
    ranked.push({ passage, score });
  }

  ranked.sort((a, b) => b.score - a.score);
  return ranked.slice(0, options.limit);
}
