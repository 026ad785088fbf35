import { createReadStream, promises as fs, type ReadStream } from "node:fs";
import path from "node:path";

import { FileProcessingError, callService } from "../errors.js";
import { logger } from "../util/logger.js";
import { pollUntil, type Sleep } from "./poll.js";

/** Normalized job state. Only the last three are terminal. */
export type JobPhase = "queued" | "running" | "succeeded" | "failed" | "cancelled";

const TERMINAL_PHASES: ReadonlySet<JobPhase> = new Set(["succeeded", "failed", "cancelled"]);

export function toJobPhase(status: string): JobPhase {
  switch (status) {
    case "validating_files":
    case "queued":
      return "queued";
    case "succeeded":
    case "failed":
    case "cancelled":
      return status;
    default:
      return "running";
  }
}

export function isTerminal(phase: JobPhase): boolean {
  return TERMINAL_PHASES.has(phase);
}

export type UploadedFile = {
  id: string;
  filename: string;
  status: string;
};

export type FineTuneJob = {
  id: string;
  model: string;
  status: string;
  training_file: string;
  created_at: number;
  finished_at: number | null;
  fine_tuned_model: string | null;
  trained_tokens: number | null;
  hyperparameters?: { n_epochs?: "auto" | number };
  error: { message: string } | null;
};

export type FineTuneEvent = {
  created_at: number;
  message: string;
};

/**
 * The slice of the OpenAI client used for fine-tuning. An `OpenAI` instance
 * satisfies it.
 */
export type FineTuneApi = {
  files: {
    create(body: { file: ReadStream; purpose: "fine-tune" }): Promise<UploadedFile>;
    retrieve(fileId: string): Promise<UploadedFile>;
  };
  fineTuning: {
    jobs: {
      create(body: {
        training_file: string;
        model: string;
        hyperparameters?: { n_epochs?: number };
      }): Promise<FineTuneJob>;
      retrieve(jobId: string): Promise<FineTuneJob>;
      list(query: { limit: number }): Promise<{ data: FineTuneJob[] }>;
      listEvents(jobId: string, query: { limit: number }): Promise<{ data: FineTuneEvent[] }>;
    };
  };
};

export type PollSettings = {
  intervalMs: number;
  maxAttempts: number;
  sleep?: Sleep;
};

export async function uploadTrainingFile(api: FineTuneApi, filePath: string): Promise<UploadedFile> {
  try {
    await fs.access(filePath);
  } catch {
    throw new Error(
      `Training file not found: ${filePath}\nCreate a JSONL file with one {"messages": [...]} example per line.`
    );
  }
  if (path.extname(filePath).toLowerCase() !== ".jsonl") {
    logger.warn(`Training file ${filePath} does not have a .jsonl extension`);
  }
  return callService(() => api.files.create({ file: createReadStream(filePath), purpose: "fine-tune" }));
}

export async function waitForFileProcessed(
  api: FineTuneApi,
  fileId: string,
  poll: PollSettings
): Promise<UploadedFile> {
  const file = await pollUntil({
    fetch: () => callService(() => api.files.retrieve(fileId)),
    isDone: (f) => f.status === "processed" || f.status === "error",
    intervalMs: poll.intervalMs,
    maxAttempts: poll.maxAttempts,
    sleep: poll.sleep,
    onPending: (f) => logger.info(`File ${fileId} status: ${f.status}. Waiting...`),
    what: `file ${fileId}`
  });
  if (file.status === "error") {
    throw new FileProcessingError(`Processing of training file ${fileId} failed`);
  }
  return file;
}

export async function createFineTuneJob(
  api: FineTuneApi,
  params: { trainingFileId: string; model: string; epochs: number }
): Promise<FineTuneJob> {
  return callService(() =>
    api.fineTuning.jobs.create({
      training_file: params.trainingFileId,
      model: params.model,
      hyperparameters: { n_epochs: params.epochs }
    })
  );
}

export async function getJob(api: FineTuneApi, jobId: string): Promise<FineTuneJob> {
  return callService(() => api.fineTuning.jobs.retrieve(jobId));
}

export async function listJobs(api: FineTuneApi, limit = 10): Promise<FineTuneJob[]> {
  const page = await callService(() => api.fineTuning.jobs.list({ limit }));
  return page.data;
}

export async function listJobEvents(api: FineTuneApi, jobId: string, limit = 5): Promise<FineTuneEvent[]> {
  const page = await callService(() => api.fineTuning.jobs.listEvents(jobId, { limit }));
  return page.data;
}

export async function waitForJob(api: FineTuneApi, jobId: string, poll: PollSettings): Promise<FineTuneJob> {
  return pollUntil({
    fetch: () => getJob(api, jobId),
    isDone: (job) => isTerminal(toJobPhase(job.status)),
    intervalMs: poll.intervalMs,
    maxAttempts: poll.maxAttempts,
    sleep: poll.sleep,
    onPending: (job) => logger.info(`Job ${jobId} is ${toJobPhase(job.status)} (${job.status})`),
    what: `job ${jobId}`
  });
}

function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function describeJob(job: FineTuneJob): string {
  const lines = [
    `Job ID: ${job.id}`,
    `Status: ${job.status}`,
    `Model: ${job.model}`,
    `Training file: ${job.training_file}`,
    `Created: ${formatTimestamp(job.created_at)}`
  ];
  if (job.hyperparameters?.n_epochs !== undefined) {
    lines.push(`Epochs: ${job.hyperparameters.n_epochs}`);
  }
  if (job.trained_tokens) {
    lines.push(`Trained tokens: ${job.trained_tokens}`);
  }
  if (job.finished_at) {
    lines.push(`Finished: ${formatTimestamp(job.finished_at)}`);
  }
  if (job.fine_tuned_model) {
    lines.push(`Fine-tuned model: ${job.fine_tuned_model}`);
  }
  if (job.error?.message) {
    lines.push(`Error: ${job.error.message}`);
  }
  return lines.join("\n");
}

export function describeEvents(events: FineTuneEvent[]): string {
  return events.map((e) => `[${formatTimestamp(e.created_at)}] ${e.message}`).join("\n");
}
