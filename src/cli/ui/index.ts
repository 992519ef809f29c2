/**
 * CLI UI module exports
 */

export { formatSummary, reportSummaryItems, type SummaryItem } from "./formatters";
export {
  banner,
  color,
  error,
  intro,
  NAME,
  note,
  outro,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const isInteractive = (): boolean => process.stdout.isTTY === true;

/**
 * Command session output. The clack frame is only drawn on a terminal;
 * otherwise stdout carries the report alone and warnings and errors go to stderr.
 */
export const ui = {
  intro: (title: string): void => {
    if (isInteractive()) {
      output.intro(title);
    }
  },
  outro: (message: string): void => {
    if (isInteractive()) {
      output.outro(message);
    }
  },
  note: (message: string, title?: string): void => {
    if (isInteractive()) {
      output.note(message, title);
    }
  },
  warn: (message: string): void => {
    if (isInteractive()) {
      output.warn(message);
    } else {
      console.error(`${output.color.yellow("Warning:")} ${message}`);
    }
  },
  error: (message: string): void => {
    if (isInteractive()) {
      output.error(message);
    } else {
      console.error(`${output.color.red("Error:")} ${message}`);
    }
  },
};
