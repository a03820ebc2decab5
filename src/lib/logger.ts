import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Log lines go to stderr so that table and JSON output on stdout stay clean.
export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = (line) => console.error(line)): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_RANK[candidate] >= LEVEL_RANK[level];
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled("debug")) {
        sink(chalk.gray(`${prefix} ${message}`));
      }
    },
    info(message) {
      if (enabled("info")) {
        sink(`${chalk.cyan(prefix)} ${message}`);
      }
    },
    warn(message) {
      if (enabled("warn")) {
        sink(chalk.yellow(`${prefix} ${message}`));
      }
    },
    error(message, error) {
      if (!enabled("error")) {
        return;
      }
      const reason = error === undefined ? "" : `: ${error instanceof Error ? error.message : String(error)}`;
      sink(chalk.red(`${prefix} ${message}${reason}`));
    }
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
