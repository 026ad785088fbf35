import type { Settings } from "../../config/settings.js";
import { InvalidArgumentError } from "../../errors.js";
import { loadStore } from "../../retrieval/indexStore.js";
import { DEFAULT_TOP_K, formatResults, searchStore } from "../../retrieval/query.js";
import { logger } from "../../util/logger.js";
import { print } from "../output.js";
import { parsePositiveInt } from "../parse.js";
import { type Services, defaultServices } from "../services.js";

export async function runSearchCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const [storePath, query, topK] = args;
  if (!storePath || !query || !query.trim()) {
    throw new InvalidArgumentError("Usage: modelkit search <store-path> <query-text> [top-k]");
  }
  const k = topK === undefined ? DEFAULT_TOP_K : parsePositiveInt(topK, "top-k");

  const store = await loadStore(storePath);
  const model = store.model ?? settings.embeddingModel;
  if (store.model && store.model !== settings.embeddingModel) {
    logger.info(`Using the store's embedding model ${store.model}`);
  }
  logger.info(`Searching ${store.records.length} records (${store.dimensions} dimensions)`);

  const results = await searchStore({
    store,
    query,
    embeddings: services.embeddings(settings, model),
    k
  });

  print(formatResults(results));
}
