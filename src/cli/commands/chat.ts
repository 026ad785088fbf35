import { completeChat } from "../../chat/complete.js";
import type { Settings } from "../../config/settings.js";
import { InvalidArgumentError } from "../../errors.js";
import { logger } from "../../util/logger.js";
import { print } from "../output.js";
import { parseArgs, stringFlag } from "../parse.js";
import { type Services, defaultServices } from "../services.js";

export async function runChatCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const parsed = parseArgs(args, ["model", "system"]);
  const message = parsed.positionals.join(" ").trim();
  if (!message) {
    throw new InvalidArgumentError("Usage: modelkit chat [--model <m>] [--system <prompt>] <message...>");
  }

  const model = stringFlag(parsed, "model") ?? settings.chatModel;
  logger.info(`Sending message to ${model}`);

  const reply = await completeChat({
    chat: services.chat(settings, model),
    system: stringFlag(parsed, "system") ?? settings.systemPrompt,
    message
  });

  print(reply.content);
  if (reply.totalTokens !== undefined) {
    logger.info(`Tokens used: ${reply.totalTokens}`);
  }
}
