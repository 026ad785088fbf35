/**
 * Shared fixtures for command tests
 */

import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { FakeListChatModel } from "@langchain/core/utils/testing";

import type { Services } from "../cli/services.js";
import { loadSettings, type Settings } from "../config/settings.js";
import type { FineTuneApi } from "../fineTune/jobs.js";
import type { SpeechApi } from "../speech/synthesize.js";

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return { ...loadSettings({ OPENAI_API_KEY: "test-key" }), pollIntervalMs: 0, ...overrides };
}

const unusedFineTune: FineTuneApi = {
  files: {
    create: async () => {
      throw new Error("files.create not expected");
    },
    retrieve: async () => {
      throw new Error("files.retrieve not expected");
    }
  },
  fineTuning: {
    jobs: {
      create: async () => {
        throw new Error("jobs.create not expected");
      },
      retrieve: async () => {
        throw new Error("jobs.retrieve not expected");
      },
      list: async () => {
        throw new Error("jobs.list not expected");
      },
      listEvents: async () => {
        throw new Error("jobs.listEvents not expected");
      }
    }
  }
};

const unusedSpeech: SpeechApi = {
  audio: {
    speech: {
      create: async () => {
        throw new Error("speech.create not expected");
      }
    }
  }
};

export function testServices(overrides: {
  embeddings?: EmbeddingsInterface;
  responses?: string[];
  fineTune?: FineTuneApi;
  speech?: SpeechApi;
} = {}): Services {
  return {
    chat: () => new FakeListChatModel({ responses: overrides.responses ?? ["ok"] }),
    embeddings: () => {
      if (!overrides.embeddings) {
        throw new Error("embeddings not expected");
      }
      return overrides.embeddings;
    },
    fineTune: () => overrides.fineTune ?? unusedFineTune,
    speech: () => overrides.speech ?? unusedSpeech,
    sleep: async () => {}
  };
}

/** Captures everything written to stdout until `restore` is called. */
export function captureStdout(): { lines: () => string[]; restore: () => void } {
  const chunks: string[] = [];
  const spy = vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8"));
    return true;
  });
  return {
    lines: () => chunks.join("").split("\n").filter((line, i, all) => i < all.length - 1 || line !== ""),
    restore: () => spy.mockRestore()
  };
}
