/**
 * Orphan computation
 */

import type { ChronosJob, JobName, ServiceJobPair } from "../../types";

/**
 * Jobs that are running but not expected: `actual − expected`, exact match,
 * duplicates collapsed, sorted.
 */
export function jobsToDelete(
  expected: Iterable<JobName>,
  actual: Iterable<JobName>,
): JobName[] {
  const keep = new Set(expected);
  const orphans = new Set<JobName>();

  for (const job of actual) {
    if (!keep.has(job)) {
      orphans.add(job);
    }
  }

  return [...orphans].sort();
}

export function expectedJobNames(pairs: readonly ServiceJobPair[]): JobName[] {
  return pairs.map(([, job]) => job);
}

export function runningJobNames(jobs: readonly ChronosJob[]): JobName[] {
  return jobs.map((job) => job.name);
}
