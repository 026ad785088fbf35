import { InvalidArgumentError } from "../errors.js";

export const COMMANDS = [
  "chat",
  "embed",
  "batch-embed",
  "search",
  "fine-tune",
  "jobs",
  "speak",
  "speak-file"
] as const;

export type Command = (typeof COMMANDS)[number];

export const USAGE = `Usage: modelkit <command> [...]

Commands:
  chat [--model <m>] [--system <prompt>] <message...>
  embed <text> [model] [--save <file>]
  embed --compare <text1> <text2> [model]
  batch-embed <input-file> [output-file] [model]
  search <store-path> <query-text> [top-k]
  fine-tune [training-file] [--model <m>] [--epochs <n>] [--wait]
  jobs <job-id> [--wait]
  jobs --list
  speak <text> [output-file] [voice] [model]
  speak-file <input-file> [output-file] [voice] [model]`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new InvalidArgumentError(USAGE);
  }
  return { command, args: rest };
}

export type ParsedArgs = {
  positionals: string[];
  flags: Record<string, string | true>;
};

/**
 * Separates `--name value` and `--switch` options from positional
 * arguments. `valueFlags` names the options that take a value; `--` ends
 * option parsing.
 */
export function parseArgs(args: string[], valueFlags: readonly string[] = []): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | true> = {};

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--") {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const name = arg.slice(2);
    if (valueFlags.includes(name)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new InvalidArgumentError(`Option --${name} requires a value`);
      }
      flags[name] = value;
      i += 1;
    } else {
      flags[name] = true;
    }
  }

  return { positionals, flags };
}

export function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags[name];
  return typeof value === "string" ? value : undefined;
}

export function parsePositiveInt(raw: string, what: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${what} must be a positive integer (got '${raw}')`);
  }
  return value;
}
