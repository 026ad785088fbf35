/**
 * Model and voice names accepted by the commands.
 */

import { InvalidArgumentError } from "../errors.js";

export const EMBEDDING_MODELS = {
  "text-embedding-3-small": { dimensions: 1536 },
  "text-embedding-3-large": { dimensions: 3072 },
  "text-embedding-ada-002": { dimensions: 1536 }
} as const;

export type EmbeddingModel = keyof typeof EMBEDDING_MODELS;

export const TTS_MODELS = ["tts-1", "tts-1-hd"] as const;
export type TtsModel = (typeof TTS_MODELS)[number];

export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

export const AUDIO_FORMATS = ["mp3", "opus", "aac", "flac"] as const;
export type AudioFormat = (typeof AUDIO_FORMATS)[number];

function oneOf<T extends string>(kind: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidArgumentError(`Invalid ${kind} '${value}'. Valid ${kind}s: ${allowed.join(", ")}`);
  }
  return match;
}

export function parseEmbeddingModel(value: string): EmbeddingModel {
  const names = Object.keys(EMBEDDING_MODELS).filter(
    (name): name is EmbeddingModel => name in EMBEDDING_MODELS
  );
  return oneOf("embedding model", value, names);
}

export function parseTtsModel(value: string): TtsModel {
  return oneOf("speech model", value, TTS_MODELS);
}

export function parseVoice(value: string): TtsVoice {
  return oneOf("voice", value, TTS_VOICES);
}
