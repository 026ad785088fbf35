import { promises as fs } from "node:fs";

import type { Settings } from "../../config/settings.js";
import { parseEmbeddingModel } from "../../config/models.js";
import { buildStoreFile, linesOf } from "../../embeddings/embed.js";
import { InvalidArgumentError } from "../../errors.js";
import { EMBEDDING_BATCH_SIZE } from "../../integrations/openai/embeddings.js";
import { saveStore } from "../../retrieval/indexStore.js";
import { logger } from "../../util/logger.js";
import { print } from "../output.js";
import { type Services, defaultServices } from "../services.js";

export const DEFAULT_STORE_PATH = "embeddings.json";

export async function runBatchEmbedCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const [inputPath, outputPath = DEFAULT_STORE_PATH, modelArg] = args;
  if (!inputPath) {
    throw new InvalidArgumentError("Usage: modelkit batch-embed <input-file> [output-file] [model]");
  }
  const model = parseEmbeddingModel(modelArg ?? settings.embeddingModel);

  logger.info(`Reading file: ${inputPath}`);
  const texts = linesOf(await fs.readFile(inputPath, "utf-8"));
  if (texts.length === 0) {
    throw new InvalidArgumentError(`Input file ${inputPath} has no text lines`);
  }

  const batches = Math.ceil(texts.length / EMBEDDING_BATCH_SIZE);
  logger.info(`Embedding ${texts.length} texts with ${model} in ${batches} batch(es)`);

  const file = await buildStoreFile({ texts, model, embeddings: services.embeddings(settings, model) });
  await saveStore(outputPath, file);

  print(`Processed: ${file.totalTexts} texts`);
  print(`Dimensions: ${file.dimensions}`);
  print(`Output file: ${outputPath}`);
}
