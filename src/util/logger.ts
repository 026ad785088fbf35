/**
 * Leveled logger writing to stderr so that stdout carries only command
 * results (scores, answers, JSON) and can be piped.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function formatMessage(level: LogLevel, message: string, args: unknown[], now = new Date()): string {
  const prefix = `[${now.toISOString()}] [${level.toUpperCase()}]`;
  if (args.length > 0) {
    return `${prefix} ${message} ${args.map(formatArg).join(" ")}`;
  }
  return `${prefix} ${message}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (shouldLog(level)) {
    process.stderr.write(`${formatMessage(level, message, args)}\n`);
  }
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    write("debug", message, args);
  },
  info(message: string, ...args: unknown[]): void {
    write("info", message, args);
  },
  warn(message: string, ...args: unknown[]): void {
    write("warn", message, args);
  },
  error(message: string, ...args: unknown[]): void {
    write("error", message, args);
  }
};
