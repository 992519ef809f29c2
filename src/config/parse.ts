import * as yaml from "js-yaml";
import { describeError } from "../utils/errors";
import { ConfigError } from "./validator";

export const STRUCTURED_EXTENSIONS = [".yaml", ".yml", ".json"] as const;

/**
 * Parse YAML or JSON text according to the file extension.
 */
export function parseStructuredContent(content: string, ext: string, source: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content, { filename: source });
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML in ${source}: ${describeError(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON in ${source}: ${describeError(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}
