import { ChatOpenAI } from "@langchain/openai";

import type { Settings } from "../../config/settings.js";

export function createChatModel(settings: Settings, model = settings.chatModel): ChatOpenAI {
  return new ChatOpenAI({
    apiKey: settings.openaiApiKey,
    model,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    maxRetries: 0
  });
}
