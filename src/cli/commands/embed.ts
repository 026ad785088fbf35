import type { Settings } from "../../config/settings.js";
import { parseEmbeddingModel } from "../../config/models.js";
import { compareTexts, embedText } from "../../embeddings/embed.js";
import { InvalidArgumentError } from "../../errors.js";
import { saveJson } from "../../retrieval/indexStore.js";
import { interpretSimilarity, vectorStats } from "../../retrieval/similarity.js";
import type { SingleEmbeddingFile } from "../../retrieval/types.js";
import { logger } from "../../util/logger.js";
import { print } from "../output.js";
import { parseArgs, stringFlag } from "../parse.js";
import { type Services, defaultServices } from "../services.js";

const PREVIEW_VALUES = 10;

export async function runEmbedCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const parsed = parseArgs(args, ["save"]);

  if (parsed.flags.compare) {
    const [a, b, modelArg] = parsed.positionals;
    if (!a || !b) {
      throw new InvalidArgumentError("Usage: modelkit embed --compare <text1> <text2> [model]");
    }
    const model = parseEmbeddingModel(modelArg ?? settings.embeddingModel);
    logger.info(`Comparing texts with ${model}`);

    const { score, dimensions } = await compareTexts({
      a,
      b,
      embeddings: services.embeddings(settings, model)
    });

    print(`Model: ${model}`);
    print(`Dimensions: ${dimensions}`);
    print(`Cosine similarity: ${score.toFixed(6)}`);
    print(`Similarity: ${(score * 100).toFixed(2)}%`);
    print(`Interpretation: ${interpretSimilarity(score).label}`);
    return;
  }

  const [text, modelArg] = parsed.positionals;
  if (!text) {
    throw new InvalidArgumentError("Usage: modelkit embed <text> [model] [--save <file>]");
  }
  const model = parseEmbeddingModel(modelArg ?? settings.embeddingModel);
  logger.info(`Generating embedding with ${model}`);

  const embedding = await embedText(services.embeddings(settings, model), text);
  const stats = vectorStats(embedding);

  print(`Model: ${model}`);
  print(`Dimensions: ${embedding.length}`);
  print(`First ${Math.min(PREVIEW_VALUES, embedding.length)} values:`);
  for (const value of embedding.slice(0, PREVIEW_VALUES)) {
    print(`  ${value.toFixed(8)}`);
  }
  print(`Mean: ${stats.mean.toFixed(8)}`);
  print(`Std dev: ${stats.stdDev.toFixed(8)}`);
  print(`Min: ${stats.min.toFixed(8)}`);
  print(`Max: ${stats.max.toFixed(8)}`);
  print(`L2 norm: ${stats.l2Norm.toFixed(8)}`);

  const savePath = stringFlag(parsed, "save");
  if (savePath) {
    const file: SingleEmbeddingFile = { text, model, embedding, dimensions: embedding.length };
    await saveJson(savePath, file);
    print(`Saved: ${savePath}`);
  }
}
