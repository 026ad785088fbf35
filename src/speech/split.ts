import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

/** Per-request input limit of the speech endpoint, in characters. */
export const SPEECH_INPUT_LIMIT = 4096;

/**
 * Packs whole sentences into chunks of at most `maxLength` characters.
 * A single sentence longer than the limit is broken at word boundaries.
 */
export async function splitForSpeech(text: string, maxLength = SPEECH_INPUT_LIMIT): Promise<string[]> {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer (got ${maxLength})`);
  }

  const normalized = text.replace(/\s+/g, " ").trim();
  if (!normalized) {
    return [];
  }

  const sentences = normalized.split(/(?<=[.!?])\s+/);
  const chunks: string[] = [];
  let current = "";

  for (const sentence of sentences) {
    if (sentence.length > maxLength) {
      if (current) {
        chunks.push(current);
        current = "";
      }
      chunks.push(...(await splitLongSentence(sentence, maxLength)));
      continue;
    }

    if (!current) {
      current = sentence;
    } else if (current.length + 1 + sentence.length <= maxLength) {
      current = `${current} ${sentence}`;
    } else {
      chunks.push(current);
      current = sentence;
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

async function splitLongSentence(sentence: string, maxLength: number): Promise<string[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: maxLength,
    chunkOverlap: 0,
    separators: [" ", ""],
    keepSeparator: false
  });
  return splitter.splitText(sentence);
}
