import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

import { callService } from "../errors.js";

export type ChatReply = {
  content: string;
  totalTokens?: number;
};

export async function completeChat(params: {
  chat: BaseChatModel;
  system: string;
  message: string;
}): Promise<ChatReply> {
  const result = await callService(() =>
    params.chat.invoke([new SystemMessage(params.system), new HumanMessage(params.message)])
  );

  return {
    content: typeof result.content === "string" ? result.content : result.text,
    totalTokens: result.usage_metadata?.total_tokens
  };
}
