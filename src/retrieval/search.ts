import { DimensionMismatchError } from "../errors.js";
import { cosineSimilarity } from "./similarity.js";
import type { EmbeddingStore, RankedResult } from "./types.js";

/**
 * Scores every record of the store against the query and returns the best
 * `min(k, records.length)` of them, highest score first. Equal scores keep
 * store order.
 */
export function rank(
  query: readonly number[],
  store: EmbeddingStore,
  k: number
): RankedResult[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer (got ${k})`);
  }

  const expectedDim = query.length;
  store.records.forEach((record, i) => {
    if (record.vector.length !== expectedDim) {
      throw new DimensionMismatchError(expectedDim, record.vector.length, `record ${i}`);
    }
  });

  const scored = store.records.map((record, position) => ({
    text: record.text,
    score: cosineSimilarity(query, record.vector),
    position
  }));

  scored.sort((a, b) => b.score - a.score || a.position - b.position);

  return scored.slice(0, k).map(({ text, score }) => ({ text, score }));
}
