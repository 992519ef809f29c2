/**
 * Flags shared by the commands that talk to the scheduler
 */

import { parsePositiveInteger } from "../../config/env";
import { DEFAULT_SOA_DIR } from "../../config/defaults";
import type { ConfigOverrides } from "../../types";
import { setLogLevel } from "../../utils/logger";

export const DISCOVERY_OPTIONS = {
  config: { type: "string", short: "c" },
  "soa-dir": { type: "string", short: "d" },
  cluster: { type: "string" },
  server: { type: "string", multiple: true },
  verbose: { type: "boolean", short: "v", default: false },
  quiet: { type: "boolean", short: "q", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export const DISCOVERY_HELP = `  -c, --config <path>     Path to config file (default: ./chronos-reaper.config.yaml)
  -d, --soa-dir <dir>     Service configuration directory (default: ${DEFAULT_SOA_DIR})
      --cluster <name>    Cluster whose chronos-<cluster> files declare jobs
      --server <url>      Chronos server URL (repeatable, tried in order)
  -v, --verbose           Debug logging
  -q, --quiet             Only log errors
  -h, --help              Show this help message`;

export interface DiscoveryValues {
  "soa-dir"?: string;
  cluster?: string;
  server?: string[];
  verbose?: boolean;
  quiet?: boolean;
}

export function applyVerbosity(values: DiscoveryValues): void {
  if (values.verbose) {
    setLogLevel("debug");
  } else if (values.quiet) {
    setLogLevel("error");
  }
}

export function discoveryOverrides(values: DiscoveryValues): ConfigOverrides {
  return {
    soaDir: values["soa-dir"],
    cluster: values.cluster,
    servers: values.server && values.server.length > 0 ? values.server : undefined,
  };
}

export function parseConcurrency(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parsePositiveInteger(value, "--concurrency");
}
