import type { Settings } from "../../config/settings.js";
import { InvalidArgumentError } from "../../errors.js";
import {
  type FineTuneApi,
  type FineTuneJob,
  type PollSettings,
  createFineTuneJob,
  describeEvents,
  describeJob,
  getJob,
  listJobEvents,
  listJobs,
  toJobPhase,
  uploadTrainingFile,
  waitForFileProcessed,
  waitForJob
} from "../../fineTune/jobs.js";
import { logger } from "../../util/logger.js";
import { RULE, print } from "../output.js";
import { parseArgs, parsePositiveInt, stringFlag } from "../parse.js";
import { type Services, defaultServices } from "../services.js";

export const DEFAULT_TRAINING_FILE = "training_data.jsonl";

function pollSettings(settings: Settings, services: Services): PollSettings {
  return {
    intervalMs: settings.pollIntervalMs,
    maxAttempts: settings.pollMaxAttempts,
    sleep: services.sleep
  };
}

async function waitAndReport(api: FineTuneApi, jobId: string, poll: PollSettings): Promise<FineTuneJob> {
  logger.info(`Waiting for job ${jobId} to finish`);
  const job = await waitForJob(api, jobId, poll);
  print(RULE);
  print(describeJob(job));
  if (toJobPhase(job.status) !== "succeeded") {
    throw new Error(`Fine-tuning job ${jobId} ended with status ${job.status}`);
  }
  return job;
}

export async function runFineTuneCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const parsed = parseArgs(args, ["model", "epochs"]);
  const trainingFile = parsed.positionals[0] ?? DEFAULT_TRAINING_FILE;
  const model = stringFlag(parsed, "model") ?? settings.fineTuneModel;
  const epochsRaw = stringFlag(parsed, "epochs");
  const epochs = epochsRaw === undefined ? settings.fineTuneEpochs : parsePositiveInt(epochsRaw, "epochs");

  const api = services.fineTune(settings);
  const poll = pollSettings(settings, services);

  logger.info(`[1/3] Uploading training file: ${trainingFile}`);
  const uploaded = await uploadTrainingFile(api, trainingFile);
  logger.info(`File uploaded: ${uploaded.id} (${uploaded.filename})`);

  logger.info("[2/3] Waiting for file to be processed");
  await waitForFileProcessed(api, uploaded.id, poll);

  logger.info("[3/3] Creating fine-tuning job");
  const job = await createFineTuneJob(api, { trainingFileId: uploaded.id, model, epochs });
  print(describeJob(job));

  if (parsed.flags.wait) {
    await waitAndReport(api, job.id, poll);
    return;
  }
  print(`Check progress with: modelkit jobs ${job.id} [--wait]`);
}

export async function runJobsCommand(
  args: string[],
  settings: Settings,
  services: Services = defaultServices
): Promise<void> {
  const parsed = parseArgs(args);
  const api = services.fineTune(settings);

  if (parsed.flags.list) {
    const jobs = await listJobs(api);
    if (jobs.length === 0) {
      print("No fine-tuning jobs found");
      return;
    }
    print(jobs.map(describeJob).join(`\n${RULE}\n`));
    return;
  }

  const jobId = parsed.positionals[0];
  if (!jobId) {
    throw new InvalidArgumentError("Usage: modelkit jobs <job-id> [--wait] | modelkit jobs --list");
  }

  if (parsed.flags.wait) {
    await waitAndReport(api, jobId, pollSettings(settings, services));
  } else {
    print(describeJob(await getJob(api, jobId)));
  }

  const events = await listJobEvents(api, jobId);
  if (events.length > 0) {
    print(RULE);
    print("Recent events:");
    print(describeEvents(events));
  }
}
