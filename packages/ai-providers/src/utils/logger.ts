import chalk from "chalk";

export type LogLevel = "off" | "error" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let currentLevel: LogLevel = "warn";

/** Set the process-wide log level. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

/**
 * Scoped console logger. Warnings and errors go to stderr.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled("debug")) console.debug(chalk.dim(`${prefix} ${message}`));
    },
    info(message) {
      if (enabled("info")) console.info(`${chalk.cyan(prefix)} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${chalk.yellow(prefix)} ${message}`);
    },
    error(message, error) {
      if (!enabled("error")) return;
      const detail = error instanceof Error ? `: ${error.message}` : "";
      console.error(`${chalk.red(prefix)} ${message}${detail}`);
    },
  };
}
