/**
 * Scheduler-facing type definitions
 */

/** Exact-match identifier of a job registered with the scheduler. */
export type JobName = string;

/** A job record as returned by the scheduler's job listing. */
export interface ChronosJob {
  name: JobName;
  [field: string]: unknown;
}

/** An `(owning service, job name)` pair read from service configuration. */
export type ServiceJobPair = readonly [service: string, job: JobName];

/**
 * The calls reconciliation needs from the scheduler.
 *
 * `delete` and `deleteTasks` resolve with whatever the API returned; callers
 * treat any resolution as success and any rejection as failure.
 */
export interface SchedulerClient {
  list(): Promise<ChronosJob[]>;
  delete(job: JobName): Promise<unknown>;
  deleteTasks(job: JobName): Promise<unknown>;
}

/**
 * Source of the jobs that are supposed to exist.
 */
export interface ConfigSource {
  expectedJobs(soaDir: string): Promise<ServiceJobPair[]>;
}
