/**
 * Expected job discovery from a service configuration directory.
 *
 * Layout: `<soaDir>/<service>/chronos-<cluster>.yaml` (or `.yml` / `.json`), a
 * mapping of job instance name to job definition. Top-level keys starting with
 * `_` are templates for YAML anchors and do not declare jobs.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import { isPlainObject } from "../config/defaults";
import { parseStructuredContent, STRUCTURED_EXTENSIONS } from "../config/parse";
import { ConfigError } from "../config/validator";
import type { ConfigSource, JobName, ServiceJobPair } from "../types";
import { describeError, isErrnoException } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("soa");

const JOB_NAME_SPACER = ".";

export function composeJobName(service: string, instance: string): JobName {
  return `${service}${JOB_NAME_SPACER}${instance}`;
}

export function chronosConfigFileNames(cluster: string): string[] {
  return STRUCTURED_EXTENSIONS.map((ext) => `chronos-${cluster}${ext}`);
}

/**
 * Read the chronos config of one service. Returns null when the service has
 * no file for this cluster.
 */
export async function readServiceChronosConfig(
  serviceDir: string,
  cluster: string,
): Promise<Record<string, unknown> | null> {
  for (const fileName of chronosConfigFileNames(cluster)) {
    const filePath = path.join(serviceDir, fileName);

    let content: string;
    try {
      content = await readFile(filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        continue;
      }
      throw new ConfigError(`Cannot read ${filePath}: ${describeError(error)}`);
    }

    const parsed = parseStructuredContent(content, path.extname(fileName), filePath);
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`${filePath} must contain a mapping of job names`);
    }
    return parsed;
  }

  return null;
}

/**
 * Symlinked service directories are followed; a dangling link is a ConfigError.
 */
async function isServiceDirectory(soaDir: string, entry: Dirent): Promise<boolean> {
  if (!entry.isSymbolicLink()) {
    return entry.isDirectory();
  }

  const linkPath = path.join(soaDir, entry.name);
  try {
    return (await stat(linkPath)).isDirectory();
  } catch (error) {
    throw new ConfigError(`Cannot resolve service link ${linkPath}: ${describeError(error)}`);
  }
}

/**
 * All `(service, job)` pairs expected on a cluster, sorted by service then job.
 */
export async function readChronosJobsForCluster(
  soaDir: string,
  cluster: string,
): Promise<ServiceJobPair[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(soaDir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigError(`Cannot read service config directory ${soaDir}: ${describeError(error)}`);
  }

  const services: string[] = [];
  for (const entry of entries) {
    if (!entry.name.startsWith(".") && (await isServiceDirectory(soaDir, entry))) {
      services.push(entry.name);
    }
  }
  services.sort();

  const pairs: ServiceJobPair[] = [];

  for (const service of services) {
    const jobs = await readServiceChronosConfig(path.join(soaDir, service), cluster);
    if (!jobs) {
      continue;
    }

    const instances = Object.keys(jobs)
      .filter((instance) => !instance.startsWith("_"))
      .sort();

    log.debug(`${service}: ${instances.length} job(s) on ${cluster}`);

    for (const instance of instances) {
      pairs.push([service, composeJobName(service, instance)]);
    }
  }

  return pairs;
}

export function createSoaConfigSource(cluster: string): ConfigSource {
  return {
    expectedJobs: (soaDir) => readChronosJobsForCluster(soaDir, cluster),
  };
}
