import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import type { Settings } from "../config/settings.js";
import type { FineTuneApi } from "../fineTune/jobs.js";
import type { Sleep } from "../fineTune/poll.js";
import { createChatModel } from "../integrations/openai/chat.js";
import { createOpenAIClient } from "../integrations/openai/client.js";
import { createEmbeddings } from "../integrations/openai/embeddings.js";
import type { SpeechApi } from "../speech/synthesize.js";

/** Factories the commands build their API clients from. */
export type Services = {
  chat: (settings: Settings, model?: string) => BaseChatModel;
  embeddings: (settings: Settings, model?: string) => EmbeddingsInterface;
  fineTune: (settings: Settings) => FineTuneApi;
  speech: (settings: Settings) => SpeechApi;
  sleep?: Sleep;
};

export const defaultServices: Services = {
  chat: createChatModel,
  embeddings: createEmbeddings,
  fineTune: createOpenAIClient,
  speech: createOpenAIClient
};
