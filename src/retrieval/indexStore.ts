import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { InvalidRecordError } from "../errors.js";
import type { EmbeddingStore, StoredEmbeddingFile } from "./types.js";

const storedEmbeddingSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  text: z.string(),
  embedding: z.array(z.number().finite())
});

const storedFileSchema = z.object({
  version: z.literal(1).optional(),
  model: z.string().optional(),
  dimensions: z.number().int().positive().optional(),
  totalTexts: z.number().int().nonnegative().optional(),
  total_texts: z.number().int().nonnegative().optional(),
  embeddings: z.array(z.unknown())
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates a parsed embedding document and turns it into a read-only store.
 * Every entry must carry a text and a numeric vector of the header dimension,
 * or of the first entry's dimension when the header has none.
 */
export function parseStore(raw: unknown, source = "store"): EmbeddingStore {
  const header = storedFileSchema.safeParse(raw);
  if (!header.success) {
    throw new InvalidRecordError(`Invalid embedding file ${source}: ${describeIssues(header.error)}`);
  }

  const entries = header.data.embeddings;
  if (entries.length === 0) {
    throw new InvalidRecordError(`Embedding file ${source} contains no records`);
  }

  const records = entries.map((entry, i) => {
    const parsed = storedEmbeddingSchema.safeParse(entry);
    if (!parsed.success) {
      throw new InvalidRecordError(
        `Invalid record ${i} in ${source}: ${describeIssues(parsed.error)}`
      );
    }
    return { text: parsed.data.text, vector: parsed.data.embedding };
  });

  const dimensions = header.data.dimensions ?? records[0]?.vector.length ?? 0;
  if (dimensions <= 0) {
    throw new InvalidRecordError(`Invalid record 0 in ${source}: embedding is empty`);
  }
  records.forEach((record, i) => {
    if (record.vector.length !== dimensions) {
      throw new InvalidRecordError(
        `Invalid record ${i} in ${source}: expected ${dimensions} dimensions, got ${record.vector.length}`
      );
    }
  });

  const expectedCount = header.data.totalTexts ?? header.data.total_texts;
  if (expectedCount !== undefined && expectedCount !== records.length) {
    throw new InvalidRecordError(
      `Embedding file ${source} declares ${expectedCount} texts but contains ${records.length}`
    );
  }

  return {
    model: header.data.model,
    dimensions,
    records
  };
}

export async function loadStore(filePath: string): Promise<EmbeddingStore> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      throw new Error(`Embedding file not found: ${filePath}\nRun: modelkit batch-embed <input-file> ${filePath}`);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidRecordError(`Embedding file ${filePath} is not valid JSON: ${reason}`);
  }
  return parseStore(parsed, filePath);
}

export async function saveJson(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
}

export async function saveStore(filePath: string, file: StoredEmbeddingFile): Promise<void> {
  await saveJson(filePath, file);
}
