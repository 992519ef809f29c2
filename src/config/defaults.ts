/**
 * Default configuration values
 */

import type { ReaperConfig } from "../types";

export const CONFIG_VERSION = "1";

export const DEFAULT_SOA_DIR = "/nail/etc/services";

export const DEFAULT_CONFIG: Omit<ReaperConfig, "version" | "cluster"> = {
  soaDir: DEFAULT_SOA_DIR,
  chronos: {
    servers: [],
    timeoutMs: 30_000,
  },
  cleanup: {
    concurrency: 1,
    dryRun: false,
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
