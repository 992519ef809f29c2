import color from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.cyan,
  warn: color.yellow,
  error: color.red,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  scope?: string,
): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  const prefix = scope ? `${color.dim(`[${scope}]`)} ` : "";

  let formatted = `${LEVEL_COLORS[level](`[${timestamp}] ${levelStr}`)} ${prefix}${message}`;

  if (data !== undefined) {
    formatted += typeof data === "object" ? ` ${JSON.stringify(data)}` : ` ${String(data)}`;
  }

  return formatted;
}

// Everything goes to stderr: stdout carries the reconciliation report.
function write(level: LogLevel, message: string, data?: unknown, scope?: string): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, message, data, scope));
  }
}

export function debug(message: string, data?: unknown): void {
  write("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  write("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  write("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  write("error", message, data);
}

/**
 * Logger whose messages are prefixed with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write("debug", message, data, scope),
    info: (message, data) => write("info", message, data, scope),
    warn: (message, data) => write("warn", message, data, scope),
    error: (message, data) => write("error", message, data, scope),
  };
}

export const logger = {
  debug,
  info,
  warn,
  error,
  scoped: createLogger,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
