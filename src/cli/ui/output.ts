/**
 * Styled output helpers
 */

import { readFileSync } from "node:fs";
import * as p from "@clack/prompts";
import color from "picocolors";

export { color };

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../../../package.json", import.meta.url), "utf8"),
  );
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION = readVersion();

export const NAME = "chronos-reaper";

/**
 * Title line for the top-level help
 */
export function banner(subtitle: string): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(subtitle)}`);
}

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const note = (message: string, title?: string) => p.note(message, title);

export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
