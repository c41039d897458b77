import chalk from "chalk";

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

type Write = (line: string) => void;

const toStderr: Write = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Leveled logger. Everything goes to stderr: stdout is reserved for the
 * generated lines.
 */
export class Logger {
  private level: LogLevel = "info";

  constructor(private write: Write = toStderr) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setWriter(write: Write): void {
    this.write = write;
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled("debug")) return;
    this.write(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      this.write(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  /** Plain informational output, e.g. the binding report. */
  info(message: string): void {
    if (!this.isEnabled("info")) return;
    this.write(message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled("warn")) return;
    this.write(chalk.yellow(`[WARN] ${message}`));
    if (data) {
      this.write(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.isEnabled("error")) return;
    this.write(chalk.red(`[ERROR] ${message}`));
    if (error instanceof Error && this.isEnabled("debug")) {
      this.write(chalk.red(error.stack ?? error.message));
    }
  }
}

export const logger = new Logger();
