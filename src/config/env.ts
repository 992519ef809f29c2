import type { ConfigOverrides } from "../types";
import { ConfigError } from "./validator";

export const ENV_PREFIX = "CHRONOS_REAPER_";

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parsePositiveInteger(value: string, name: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Read `CHRONOS_REAPER_*` variables. Empty values are ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const read = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === "" ? undefined : value;
  };

  const servers = read("SERVERS");
  const timeout = read("TIMEOUT_MS");

  return {
    soaDir: read("SOA_DIR"),
    cluster: read("CLUSTER"),
    servers: servers === undefined ? undefined : splitList(servers),
    username: read("USERNAME"),
    password: read("PASSWORD"),
    timeoutMs:
      timeout === undefined ? undefined : parsePositiveInteger(timeout, `${ENV_PREFIX}TIMEOUT_MS`),
  };
}
