/**
 * Cleanup report aggregation and exit code policy
 */

import type { CleanupFailure, CleanupOutcome, CleanupReport, JobName } from "../../types";

export const NOTHING_TO_REMOVE = "No Chronos Jobs to remove";

export const REPORT_TITLES = {
  taskSuccesses: "Successfully Removed Tasks (if any were running) for:",
  taskFailures: "Failed to Delete Tasks for:",
  jobSuccesses: "Successfully Removed Jobs:",
  jobFailures: "Failed to Delete Jobs:",
  dryRun: "Would Remove Jobs (dry run):",
} as const;

const byJob = (a: CleanupFailure, b: CleanupFailure): number =>
  a.job < b.job ? -1 : a.job > b.job ? 1 : 0;

export function buildReport(
  orphans: readonly JobName[],
  outcomes: readonly CleanupOutcome[],
  options: { dryRun?: boolean } = {},
): CleanupReport {
  const report: CleanupReport = {
    orphans: [...orphans].sort(),
    taskSuccesses: [],
    taskFailures: [],
    jobSuccesses: [],
    jobFailures: [],
    dryRun: options.dryRun ?? false,
  };

  for (const { job, tasks, deletion } of outcomes) {
    if (tasks.ok) {
      report.taskSuccesses.push(job);
    } else {
      report.taskFailures.push({ job, error: tasks.error });
    }

    if (deletion.ok) {
      report.jobSuccesses.push(job);
    } else {
      report.jobFailures.push({ job, error: deletion.error });
    }
  }

  report.taskSuccesses.sort();
  report.jobSuccesses.sort();
  report.taskFailures.sort(byJob);
  report.jobFailures.sort(byJob);

  return report;
}

export function hasFailures(report: CleanupReport): boolean {
  return report.taskFailures.length > 0 || report.jobFailures.length > 0;
}

/**
 * 0 when there was nothing to do or every call succeeded, 1 otherwise.
 */
export function exitCodeFor(report: CleanupReport): number {
  return report.orphans.length > 0 && hasFailures(report) ? 1 : 0;
}

export function formatListOutput(title: string, jobs: readonly JobName[]): string {
  return [title, ...jobs.map((job) => `  ${job}`)].join("\n");
}

/**
 * Report sections for stdout. Empty buckets are left out.
 */
export function formatReport(report: CleanupReport): string[] {
  if (report.orphans.length === 0) {
    return [NOTHING_TO_REMOVE];
  }

  if (report.dryRun) {
    return [formatListOutput(REPORT_TITLES.dryRun, report.orphans)];
  }

  const sections: string[] = [];
  const add = (title: string, jobs: readonly JobName[]): void => {
    if (jobs.length > 0) {
      sections.push(formatListOutput(title, jobs));
    }
  };

  add(REPORT_TITLES.taskSuccesses, report.taskSuccesses);
  add(REPORT_TITLES.taskFailures, report.taskFailures.map((f) => f.job));
  add(REPORT_TITLES.jobSuccesses, report.jobSuccesses);
  add(REPORT_TITLES.jobFailures, report.jobFailures.map((f) => f.job));

  return sections;
}
