/**
 * Configuration module exports
 */

// Defaults
export { CONFIG_VERSION, DEFAULT_CONFIG, DEFAULT_SOA_DIR, deepMerge } from "./defaults";
// Environment
export { readEnvOverrides, splitList } from "./env";
// Loader
export {
  applyOverrides,
  CONFIG_FILE_NAMES,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  readConfigFile,
} from "./loader";
export { parseStructuredContent } from "./parse";
// Validator
export { ConfigError, validateConfig } from "./validator";
