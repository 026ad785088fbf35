import OpenAI from "openai";

import type { Settings } from "../../config/settings.js";

export function createOpenAIClient(settings: Settings): OpenAI {
  return new OpenAI({ apiKey: settings.openaiApiKey, maxRetries: 0 });
}
