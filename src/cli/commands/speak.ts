import { promises as fs } from "node:fs";
import path from "node:path";

import type { Settings } from "../../config/settings.js";
import { parseTtsModel, parseVoice } from "../../config/models.js";
import { InvalidArgumentError } from "../../errors.js";
import { SPEECH_INPUT_LIMIT, splitForSpeech } from "../../speech/split.js";
import {
  formatFromPath,
  formatSize,
  resolveOutputPath,
  synthesizeChunks
} from "../../speech/synthesize.js";
import { logger } from "../../util/logger.js";
import { print } from "../output.js";
import { type Services, defaultServices } from "../services.js";

async function speak(params: {
  text: string;
  output: string;
  voice: string | undefined;
  model: string | undefined;
  settings: Settings;
  services: Services;
}): Promise<void> {
  const voice = parseVoice(params.voice ?? params.settings.ttsVoice);
  const model = parseTtsModel(params.model ?? params.settings.ttsModel);
  const output = resolveOutputPath(params.output);
  const format = formatFromPath(output);

  const chunks = await splitForSpeech(params.text);
  if (chunks.length > 1) {
    logger.info(`Text split into ${chunks.length} chunks (limit ${SPEECH_INPUT_LIMIT} characters per request)`);
  }
  logger.info(`Generating speech with ${model} (${voice})`);

  const audio = await synthesizeChunks(
    params.services.speech(params.settings),
    chunks,
    { model, voice, format },
    (index, total) => {
      if (total > 1) logger.info(`Processing chunk ${index}/${total}`);
    }
  );

  await fs.mkdir(path.dirname(output), { recursive: true });
  await fs.writeFile(output, audio);

  print(`Audio file saved: ${path.resolve(output)}`);
  print(`File size: ${formatSize(audio.length)}`);
}

export async function runSpeakCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const [text, output = "speech.mp3", voice, model] = args;
  if (!text || !text.trim()) {
    throw new InvalidArgumentError("Usage: modelkit speak <text> [output-file] [voice] [model]");
  }
  await speak({ text, output, voice, model, settings, services });
}

export async function runSpeakFileCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const [inputPath, output = "speech_output.mp3", voice, model] = args;
  if (!inputPath) {
    throw new InvalidArgumentError("Usage: modelkit speak-file <input-file> [output-file] [voice] [model]");
  }

  logger.info(`Reading file: ${inputPath}`);
  const text = (await fs.readFile(inputPath, "utf-8")).trim();
  if (!text) {
    throw new InvalidArgumentError(`Input file ${inputPath} is empty`);
  }
  logger.info(`Text length: ${text.length} characters`);

  await speak({ text, output, voice, model, settings, services });
}
