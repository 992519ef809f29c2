/**
 * Reconciliation module exports
 */

export { expectedJobNames, jobsToDelete, runningJobNames } from "./diff";
export { attempt, type CleanupJobsOptions, cleanupJob, cleanupJobs } from "./executor";
export {
  type ReconcileDependencies,
  type ReconcileOptions,
  type ReconcilePlan,
  planReconcile,
  runReconcile,
} from "./orchestrator";
export {
  buildReport,
  exitCodeFor,
  formatListOutput,
  formatReport,
  hasFailures,
  NOTHING_TO_REMOVE,
  REPORT_TITLES,
} from "./report";
