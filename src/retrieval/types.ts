export type EmbeddingRecord = {
  readonly text: string;
  readonly vector: readonly number[];
};

export type EmbeddingStore = {
  readonly model?: string;
  readonly dimensions: number;
  readonly records: readonly EmbeddingRecord[];
};

export type RankedResult = {
  text: string;
  score: number;
};

export type StoredEmbedding = {
  index: number;
  text: string;
  embedding: number[];
};

export type StoredEmbeddingFile = {
  version: 1;
  model: string;
  dimensions: number;
  totalTexts: number;
  embeddings: StoredEmbedding[];
};

export type SingleEmbeddingFile = {
  text: string;
  model: string;
  embedding: number[];
  dimensions: number;
};
