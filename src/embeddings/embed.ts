import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { DimensionMismatchError, callService } from "../errors.js";
import { cosineSimilarity } from "../retrieval/similarity.js";
import type { StoredEmbeddingFile } from "../retrieval/types.js";

export async function embedTexts(
  embeddings: EmbeddingsInterface,
  texts: string[]
): Promise<number[][]> {
  const vectors = await callService(() => embeddings.embedDocuments(texts));

  if (vectors.length !== texts.length) {
    throw new Error(
      `Embedding count mismatch: texts=${texts.length} embeddings=${vectors.length}`
    );
  }

  const embeddingDimension = vectors[0]?.length ?? 0;
  if (embeddingDimension <= 0 && texts.length > 0) {
    throw new Error(`Embedding dimension invalid (${embeddingDimension})`);
  }

  for (let i = 0; i < vectors.length; i += 1) {
    const dim = vectors[i]?.length ?? 0;
    if (dim !== embeddingDimension) {
      throw new DimensionMismatchError(embeddingDimension, dim, `text ${i}`);
    }
  }

  return vectors;
}

export async function embedText(embeddings: EmbeddingsInterface, text: string): Promise<number[]> {
  const vector = await callService(() => embeddings.embedQuery(text));
  if (vector.length === 0) {
    throw new Error("Embedding dimension invalid (0)");
  }
  return vector;
}

/** Splits file contents into one text per non-empty line. */
export function linesOf(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function buildStoreFile(params: {
  texts: string[];
  model: string;
  embeddings: EmbeddingsInterface;
}): Promise<StoredEmbeddingFile> {
  if (params.texts.length === 0) {
    throw new Error("Nothing to embed: no texts given");
  }

  const vectors = await embedTexts(params.embeddings, params.texts);

  return {
    version: 1,
    model: params.model,
    dimensions: vectors[0]?.length ?? 0,
    totalTexts: params.texts.length,
    embeddings: params.texts.map((text, index) => ({
      index,
      text,
      embedding: vectors[index] ?? []
    }))
  };
}

export async function compareTexts(params: {
  a: string;
  b: string;
  embeddings: EmbeddingsInterface;
}): Promise<{ score: number; dimensions: number }> {
  const [va, vb] = await embedTexts(params.embeddings, [params.a, params.b]);
  if (!va || !vb) {
    throw new Error("Expected two embeddings");
  }
  return { score: cosineSimilarity(va, vb), dimensions: va.length };
}
