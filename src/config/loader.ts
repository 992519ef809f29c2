/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import type { ConfigOverrides, ReaperConfig } from "../types";
import { isErrnoException } from "../utils/errors";
import { logger } from "../utils/logger";
import { CONFIG_VERSION, DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { readEnvOverrides } from "./env";
import { parseStructuredContent } from "./parse";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "chronos-reaper.config.yaml",
  "chronos-reaper.config.yml",
  "chronos-reaper.config.json",
];

/**
 * Read a config file and resolve its relative paths against the file's directory.
 * The result is not validated: overrides may still fill in missing fields.
 */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw error;
  }

  const parsed = parseStructuredContent(
    content,
    path.extname(absolutePath).toLowerCase(),
    absolutePath,
  );

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${absolutePath}`);
  }

  if (typeof parsed.soaDir === "string") {
    return { ...parsed, soaDir: path.resolve(path.dirname(absolutePath), parsed.soaDir) };
  }
  return parsed;
}

/**
 * Apply overrides on top of a (possibly partial) config object
 */
export function applyOverrides(
  config: Record<string, unknown>,
  overrides: ConfigOverrides,
): Record<string, unknown> {
  return deepMerge(config, {
    soaDir: overrides.soaDir === undefined ? undefined : path.resolve(overrides.soaDir),
    cluster: overrides.cluster,
    chronos: {
      servers: overrides.servers,
      username: overrides.username,
      password: overrides.password,
      timeoutMs: overrides.timeoutMs,
    },
    cleanup: {
      concurrency: overrides.concurrency,
      dryRun: overrides.dryRun,
    },
  });
}

/**
 * Load and validate a config file. Precedence: defaults < file < environment < overrides.
 */
export async function loadConfig(
  configPath: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReaperConfig> {
  const fileConfig = await readConfigFile(configPath);
  return buildConfig(fileConfig, overrides, env);
}

function buildConfig(
  fileConfig: Record<string, unknown>,
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv,
): ReaperConfig {
  const merged = applyOverrides(
    applyOverrides(deepMerge(DEFAULT_CONFIG, fileConfig), readEnvOverrides(env)),
    overrides,
  );

  validateConfig(merged);
  return merged;
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Find and load a config file, falling back to defaults, environment and
 * overrides when there is none.
 */
export async function findAndLoadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReaperConfig> {
  if (configPath) {
    return loadConfig(configPath, overrides, env);
  }

  const found = findConfigFile();
  if (found) {
    logger.debug(`Using config file ${found}`);
    return loadConfig(found, overrides, env);
  }

  logger.debug("No config file found, using defaults, environment and flags");
  return buildConfig({ version: CONFIG_VERSION }, overrides, env);
}
