/**
 * Reconciliation orchestration
 */

import type { CleanupReport, ConfigSource, JobName, SchedulerClient } from "../../types";
import { createLogger } from "../../utils/logger";
import { expectedJobNames, jobsToDelete, runningJobNames } from "./diff";
import { cleanupJobs } from "./executor";
import { buildReport } from "./report";

const log = createLogger("reconcile");

export interface ReconcileDependencies {
  client: SchedulerClient;
  configSource: ConfigSource;
}

export interface ReconcileOptions {
  soaDir: string;
  dryRun?: boolean;
  concurrency?: number;
}

export interface ReconcilePlan {
  expected: JobName[];
  running: JobName[];
  orphans: JobName[];
}

/**
 * Read both sides once and compute the orphans. Any failure here is fatal:
 * nothing has been mutated yet.
 */
export async function planReconcile(
  deps: ReconcileDependencies,
  soaDir: string,
): Promise<ReconcilePlan> {
  const expected = expectedJobNames(await deps.configSource.expectedJobs(soaDir));
  log.info(`${expected.length} job(s) expected from ${soaDir}`);

  const running = runningJobNames(await deps.client.list());
  log.info(`${running.length} job(s) registered with the scheduler`);

  const orphans = jobsToDelete(expected, running);
  log.info(`${orphans.length} orphaned job(s)`);

  return {
    expected: [...new Set(expected)].sort(),
    running: [...new Set(running)].sort(),
    orphans,
  };
}

export async function runReconcile(
  deps: ReconcileDependencies,
  options: ReconcileOptions,
): Promise<CleanupReport> {
  const { orphans } = await planReconcile(deps, options.soaDir);

  if (options.dryRun) {
    for (const job of orphans) {
      log.info(`[DRY RUN] Would delete: ${job}`);
    }
    return buildReport(orphans, [], { dryRun: true });
  }

  const outcomes = await cleanupJobs(deps.client, orphans, {
    concurrency: options.concurrency,
  });

  return buildReport(orphans, outcomes);
}
