import { OpenAIEmbeddings } from "@langchain/openai";

import type { Settings } from "../../config/settings.js";

export const EMBEDDING_BATCH_SIZE = 100;

export function createEmbeddings(settings: Settings, model = settings.embeddingModel): OpenAIEmbeddings {
  return new OpenAIEmbeddings({
    apiKey: settings.openaiApiKey,
    model,
    batchSize: EMBEDDING_BATCH_SIZE,
    maxRetries: 0
  });
}
