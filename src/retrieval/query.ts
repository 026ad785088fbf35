import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { embedText } from "../embeddings/embed.js";
import { DimensionMismatchError } from "../errors.js";
import { rank } from "./search.js";
import type { EmbeddingStore, RankedResult } from "./types.js";

export const DEFAULT_TOP_K = 5;

export async function searchStore(params: {
  store: EmbeddingStore;
  query: string;
  embeddings: EmbeddingsInterface;
  k?: number;
}): Promise<RankedResult[]> {
  const queryEmbedding = await embedText(params.embeddings, params.query);
  if (queryEmbedding.length !== params.store.dimensions) {
    throw new DimensionMismatchError(params.store.dimensions, queryEmbedding.length, "query");
  }
  return rank(queryEmbedding, params.store, params.k ?? DEFAULT_TOP_K);
}

export function formatResults(results: RankedResult[]): string {
  return results
    .map((r, i) => `${i + 1}. [${r.score.toFixed(4)}] ${r.text}`)
    .join("\n");
}
