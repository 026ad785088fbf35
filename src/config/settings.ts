import { ConfigError } from "../errors.js";
import { type LogLevel, parseLogLevel } from "../util/logger.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export type Settings = {
  openaiApiKey: string;
  chatModel: string;
  embeddingModel: string;
  systemPrompt: string;
  maxTokens: number;
  temperature: number;
  ttsModel: string;
  ttsVoice: string;
  fineTuneModel: string;
  fineTuneEpochs: number;
  pollIntervalMs: number;
  pollMaxAttempts: number;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function intFrom(raw: string | undefined, fallback: number, min: number): number {
  const parsed = raw == null ? Number.NaN : Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? Math.max(min, parsed) : fallback;
}

function floatFrom(raw: string | undefined, fallback: number): number {
  const parsed = raw == null ? Number.NaN : Number.parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadSettings(env: Env = process.env): Settings {
  const openaiApiKey = env.OPENAI_API_KEY?.trim();
  if (!openaiApiKey) {
    throw new ConfigError(
      "OPENAI_API_KEY is required\nSet it in the environment or in a .env file"
    );
  }

  return {
    openaiApiKey,
    chatModel: env.MODELKIT_CHAT_MODEL ?? "gpt-4o-mini",
    embeddingModel: env.MODELKIT_EMBEDDING_MODEL ?? "text-embedding-3-small",
    systemPrompt: env.MODELKIT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    maxTokens: intFrom(env.MODELKIT_MAX_TOKENS, 150, 1),
    temperature: Math.min(2, Math.max(0, floatFrom(env.MODELKIT_TEMPERATURE, 0.7))),
    ttsModel: env.MODELKIT_TTS_MODEL ?? "tts-1",
    ttsVoice: env.MODELKIT_TTS_VOICE ?? "alloy",
    fineTuneModel: env.MODELKIT_FINE_TUNE_MODEL ?? "gpt-3.5-turbo",
    fineTuneEpochs: intFrom(env.MODELKIT_FINE_TUNE_EPOCHS, 3, 1),
    pollIntervalMs: intFrom(env.MODELKIT_POLL_INTERVAL_MS, 2000, 0),
    pollMaxAttempts: intFrom(env.MODELKIT_POLL_MAX_ATTEMPTS, 900, 1),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}
