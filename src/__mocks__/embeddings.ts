/**
 * Embeddings fakes for tests
 */

import type { EmbeddingsInterface } from "@langchain/core/embeddings";

/**
 * Returns the vector listed for each text; unknown texts fail the test.
 */
export function createLookupEmbeddings(table: Record<string, number[]>): EmbeddingsInterface {
  const lookup = (text: string): number[] => {
    const vector = table[text];
    if (!vector) {
      throw new Error(`No fake embedding for "${text}"`);
    }
    return [...vector];
  };
  return {
    embedQuery: async (text: string) => lookup(text),
    embedDocuments: async (texts: string[]) => texts.map(lookup)
  };
}

/**
 * Rejects every call with the given error
 */
export function createFailingEmbeddings(error: unknown): EmbeddingsInterface {
  return {
    embedQuery: async () => {
      throw error;
    },
    embedDocuments: async () => {
      throw error;
    }
  };
}
