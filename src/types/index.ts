export type {
  ChronosConfig,
  CleanupConfig,
  ConfigOverrides,
  ReaperConfig,
} from "./config";
export type {
  ChronosJob,
  ConfigSource,
  JobName,
  SchedulerClient,
  ServiceJobPair,
} from "./chronos";
export type {
  CleanupFailure,
  CleanupOutcome,
  CleanupReport,
  OperationResult,
} from "./reconcile";
