import { setTimeout as delay } from "node:timers/promises";

import { PollTimeoutError } from "../errors.js";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export type PollOptions<T> = {
  fetch: () => Promise<T>;
  isDone: (value: T) => boolean;
  intervalMs: number;
  maxAttempts: number;
  sleep?: Sleep;
  onPending?: (value: T, attempt: number) => void;
  what?: string;
};

/**
 * Calls `fetch` until `isDone` accepts the result, sleeping `intervalMs`
 * between attempts. Throws PollTimeoutError after `maxAttempts` fetches.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    const value = await options.fetch();
    if (options.isDone(value)) {
      return value;
    }
    options.onPending?.(value, attempt);
    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs);
    }
  }
  throw new PollTimeoutError(
    `Gave up waiting for ${options.what ?? "completion"} after ${options.maxAttempts} attempts`
  );
}
