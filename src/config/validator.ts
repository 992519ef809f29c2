/**
 * Configuration validation
 */

import type { ReaperConfig } from "../types";
import { isPlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  soaDir: (c) => {
    if (!c.soaDir || typeof c.soaDir !== "string") {
      throw new ConfigError("soaDir must be a non-empty string");
    }
  },

  cluster: (c) => {
    const { cluster } = c;
    if (!cluster || typeof cluster !== "string") {
      throw new ConfigError(
        "cluster must be set (config file, CHRONOS_REAPER_CLUSTER or --cluster)",
      );
    }
    if (cluster.includes("/")) {
      throw new ConfigError(`cluster "${cluster}" must not contain '/'`);
    }
  },

  chronos: (c) => {
    const { chronos } = c;
    if (!isPlainObject(chronos)) {
      throw new ConfigError("Config must have a 'chronos' section");
    }
    const { servers, username, password, timeoutMs } = chronos;
    if (!Array.isArray(servers) || servers.length === 0) {
      throw new ConfigError(
        "chronos.servers must list at least one URL (config file, CHRONOS_REAPER_SERVERS or --server)",
      );
    }
    servers.forEach((server: unknown, i) => {
      if (typeof server !== "string" || !isHttpUrl(server)) {
        throw new ConfigError(`chronos.servers[${i}] must be an http(s) URL`);
      }
    });
    if (username !== undefined && typeof username !== "string") {
      throw new ConfigError("chronos.username must be a string");
    }
    if (password !== undefined && typeof password !== "string") {
      throw new ConfigError("chronos.password must be a string");
    }
    if ((username === undefined) !== (password === undefined)) {
      throw new ConfigError("chronos.username and chronos.password must be set together");
    }
    if (!isPositiveInteger(timeoutMs)) {
      throw new ConfigError("chronos.timeoutMs must be a positive integer");
    }
  },

  cleanup: (c) => {
    const { cleanup } = c;
    if (!isPlainObject(cleanup)) {
      throw new ConfigError("Config must have a 'cleanup' section");
    }
    if (!isPositiveInteger(cleanup.concurrency)) {
      throw new ConfigError("cleanup.concurrency must be a positive integer");
    }
    if (typeof cleanup.dryRun !== "boolean") {
      throw new ConfigError("cleanup.dryRun must be a boolean");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is ReaperConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
