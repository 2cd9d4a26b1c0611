import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEBUG_LEVELS = new Set(["debug", "trace"]);

const readEnv = (key: string): string | undefined =>
  process.env[key] ?? process.env[key.toLowerCase()];

/**
 * Resolve the minimum level from LOG_LEVEL / DEBUG=1
 */
export const resolveLogLevel = (): LogLevel => {
  if (readEnv("DEBUG") === "1") return "debug";
  const raw = (readEnv("LOG_LEVEL") ?? "").toLowerCase();
  if (DEBUG_LEVELS.has(raw)) return "debug";
  if (raw === "warn" || raw === "error" || raw === "info") return raw;
  return "info";
};

export interface ConsoleLoggerOptions {
  /** Minimum level to print (default: from LOG_LEVEL / DEBUG env) */
  level?: LogLevel;
  /** Component tag printed after the level, e.g. "Engine" */
  prefix?: string;
  /** Prepend an ISO timestamp */
  includeTimestamp?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;
  private readonly includeTimestamp: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? resolveLogLevel();
    this.prefix = options.prefix ?? "";
    this.includeTimestamp = options.includeTimestamp ?? false;
  }

  /**
   * Derive a logger that tags every line with a component name
   */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      prefix,
      includeTimestamp: this.includeTimestamp,
    });
  }

  info(msg: string): void {
    if (!this.enabled("info")) return;
    console.log(chalk.cyan("[INFO]"), this.format(msg));
  }

  warn(msg: string): void {
    if (!this.enabled("warn")) return;
    console.warn(chalk.yellow("[WARN]"), this.format(msg));
  }

  error(msg: string, err?: Error): void {
    if (!this.enabled("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      this.format(msg),
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.enabled("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), this.format(msg));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private format(msg: string): string {
    const parts: string[] = [];
    if (this.includeTimestamp) parts.push(new Date().toISOString());
    if (this.prefix) parts.push(`[${this.prefix}]`);
    parts.push(msg);
    return parts.join(" ");
  }
}

/**
 * Logger that discards all output (tests, quiet tooling)
 */
export function createNullLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
