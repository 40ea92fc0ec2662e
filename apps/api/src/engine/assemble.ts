export type Scored<T> = T & { score: number };

/**
 * Pair candidates with their scores, drop those under the threshold, sort by
 * score descending and keep the first `limit`. Ties keep the store's order.
 */
export function assembleResults<T extends object>(
  candidates: readonly T[],
  scores: readonly number[],
  threshold: number,
  limit: number
): Scored<T>[] {
  if (candidates.length !== scores.length) {
    throw new RangeError(`Got ${candidates.length} candidates but ${scores.length} scores`);
  }
  if (limit <= 0) {
    return [];
  }

  return candidates
    .map((candidate, index) => ({ candidate, score: scores[index], index }))
    .filter(entry => Number.isFinite(entry.score) && entry.score >= threshold)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, limit)
    .map(({ candidate, score }) => ({ ...candidate, score }));
}
