/**
 * Reconciliation result type definitions
 */

import type { JobName } from "./chronos";

export type OperationResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export interface CleanupOutcome {
  readonly job: JobName;
  readonly tasks: OperationResult;
  readonly deletion: OperationResult;
}

export interface CleanupFailure {
  job: JobName;
  error: string;
}

export interface CleanupReport {
  /** Orphaned jobs, sorted */
  orphans: JobName[];
  taskSuccesses: JobName[];
  taskFailures: CleanupFailure[];
  jobSuccesses: JobName[];
  jobFailures: CleanupFailure[];
  /** True when orphans were only listed, not deleted */
  dryRun: boolean;
}
