import { type Settings, loadSettings } from "../config/settings.js";
import { hintFor } from "../errors.js";
import { logger, setLogLevel } from "../util/logger.js";
import { runBatchEmbedCommand } from "./commands/batchEmbed.js";
import { runChatCommand } from "./commands/chat.js";
import { runEmbedCommand } from "./commands/embed.js";
import { runFineTuneCommand, runJobsCommand } from "./commands/fineTune.js";
import { runSearchCommand } from "./commands/search.js";
import { runSpeakCommand, runSpeakFileCommand } from "./commands/speak.js";
import { type Command, parseCli } from "./parse.js";
import { type Services, defaultServices } from "./services.js";

type CommandRunner = (args: string[], settings: Settings, services: Services) => Promise<void>;

const RUNNERS: Record<Command, CommandRunner> = {
  chat: runChatCommand,
  embed: runEmbedCommand,
  "batch-embed": runBatchEmbedCommand,
  search: runSearchCommand,
  "fine-tune": runFineTuneCommand,
  jobs: runJobsCommand,
  speak: runSpeakCommand,
  "speak-file": runSpeakFileCommand
};

export async function run(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  services: Services = defaultServices
): Promise<void> {
  const parsed = parseCli(argv);
  const settings = loadSettings(env);
  setLogLevel(settings.logLevel);
  await RUNNERS[parsed.command](parsed.args, settings, services);
}

/** Runs the CLI and returns the process exit code. */
export async function main(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  services: Services = defaultServices
): Promise<number> {
  try {
    await run(argv, env, services);
    return 0;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${message}\n`);
    const hint = hintFor(err);
    if (hint) {
      process.stderr.write(`${hint}\n`);
    }
    logger.debug("Command failed", err);
    return 1;
  }
}
