/**
 * Orphan cleanup
 *
 * Each orphaned job gets two independent calls: kill its tasks, then delete
 * the job. Whatever a call raises is recorded against that call only; nothing
 * escapes to stop the remaining jobs.
 */

import type { CleanupOutcome, JobName, OperationResult, SchedulerClient } from "../../types";
import { describeError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("cleanup");

export interface CleanupJobsOptions {
  /** Jobs processed at once (default: 1) */
  concurrency?: number;
}

/**
 * Run a single scheduler call and capture its result. Never throws.
 */
export async function attempt(
  call: (job: JobName) => Promise<unknown>,
  job: JobName,
): Promise<OperationResult> {
  try {
    const value = await call(job);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: describeError(error) };
  }
}

export async function cleanupJob(client: SchedulerClient, job: JobName): Promise<CleanupOutcome> {
  const tasks = await attempt((name) => client.deleteTasks(name), job);
  if (tasks.ok) {
    log.debug(`Removed tasks for ${job}`);
  } else {
    log.error(`Failed to delete tasks for ${job}: ${tasks.error}`);
  }

  const deletion = await attempt((name) => client.delete(name), job);
  if (deletion.ok) {
    log.debug(`Removed job ${job}`);
  } else {
    log.error(`Failed to delete job ${job}: ${deletion.error}`);
  }

  return Object.freeze({ job, tasks, deletion });
}

/**
 * Clean up every job. Workers share a cursor and write into their own slot,
 * so outcomes come back in input order whatever the concurrency.
 */
export async function cleanupJobs(
  client: SchedulerClient,
  jobs: readonly JobName[],
  options: CleanupJobsOptions = {},
): Promise<CleanupOutcome[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const outcomes = new Array<CleanupOutcome>(jobs.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < jobs.length) {
      const index = cursor++;
      const job = jobs[index];
      if (job === undefined) {
        return;
      }
      outcomes[index] = await cleanupJob(client, job);
    }
  };

  const workerCount = Math.min(concurrency, jobs.length);
  log.debug(`Cleaning up ${jobs.length} job(s) with ${workerCount} worker(s)`);

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return outcomes;
}
