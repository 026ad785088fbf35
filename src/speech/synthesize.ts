import path from "node:path";

import { AUDIO_FORMATS, type AudioFormat, type TtsModel, type TtsVoice } from "../config/models.js";
import { callService } from "../errors.js";

/**
 * The slice of the OpenAI client used for speech. An `OpenAI` instance
 * satisfies it.
 */
export type SpeechApi = {
  audio: {
    speech: {
      create(body: {
        model: string;
        voice: string;
        input: string;
        response_format?: AudioFormat;
      }): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
};

export type SpeechOptions = {
  model: TtsModel;
  voice: TtsVoice;
  format: AudioFormat;
};

function extensionFormat(filePath: string): AudioFormat | undefined {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return AUDIO_FORMATS.find((format) => format === ext);
}

/** Appends `.mp3` unless the path already ends in a supported audio extension. */
export function resolveOutputPath(filePath: string): string {
  return extensionFormat(filePath) ? filePath : `${filePath}.mp3`;
}

export function formatFromPath(filePath: string): AudioFormat {
  return extensionFormat(filePath) ?? "mp3";
}

export async function synthesize(api: SpeechApi, input: string, options: SpeechOptions): Promise<Buffer> {
  const response = await callService(() =>
    api.audio.speech.create({
      model: options.model,
      voice: options.voice,
      input,
      response_format: options.format
    })
  );
  return Buffer.from(await response.arrayBuffer());
}

/** Synthesizes each chunk in order and concatenates the audio. */
export async function synthesizeChunks(
  api: SpeechApi,
  chunks: string[],
  options: SpeechOptions,
  onChunk?: (index: number, total: number) => void
): Promise<Buffer> {
  const parts: Buffer[] = [];
  for (const [i, chunk] of chunks.entries()) {
    onChunk?.(i + 1, chunks.length);
    parts.push(await synthesize(api, chunk, options));
  }
  return Buffer.concat(parts);
}

export function formatSize(bytes: number): string {
  const kb = bytes / 1024;
  if (kb >= 1024) {
    return `${(kb / 1024).toFixed(2)} MB`;
  }
  return `${kb.toFixed(2)} KB`;
}
