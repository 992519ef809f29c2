/**
 * Configuration type definitions for chronos-reaper
 */

export interface ChronosConfig {
  /** Base URLs of the Chronos servers, tried in order */
  servers: string[];
  username?: string;
  password?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

export interface CleanupConfig {
  /** Number of orphaned jobs processed at once (1 = sequential) */
  concurrency: number;
  /** List orphans without deleting them */
  dryRun: boolean;
}

export interface ReaperConfig {
  version: string;
  /** Directory holding one sub-directory of configuration per service */
  soaDir: string;
  /** Cluster whose `chronos-<cluster>` files declare the expected jobs */
  cluster: string;
  chronos: ChronosConfig;
  cleanup: CleanupConfig;
}

/**
 * Values that override the config file, from the environment or CLI flags
 */
export interface ConfigOverrides {
  soaDir?: string;
  cluster?: string;
  servers?: string[];
  username?: string;
  password?: string;
  timeoutMs?: number;
  concurrency?: number;
  dryRun?: boolean;
}
