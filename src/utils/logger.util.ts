import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEBUG_LEVELS = new Set(["debug", "trace"]);

export const resolveLogLevel = (
  env: Record<string, string | undefined> = process.env,
): LogLevel => {
  const read = (key: string): string | undefined =>
    env[key] ?? env[key.toLowerCase()];
  if (read("DEBUG") === "1") {
    return "debug";
  }
  const raw = (read("LOG_LEVEL") ?? "").toLowerCase();
  if (DEBUG_LEVELS.has(raw)) return "debug";
  if (raw === "warn" || raw === "error" || raw === "silent") return raw;
  return "info";
};

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  /** Tag printed before every message, e.g. "RISK" -> "[RISK] ..." */
  prefix?: string;
  includeTimestamp?: boolean;
};

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix?: string;
  private readonly includeTimestamp: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? resolveLogLevel();
    this.prefix = options.prefix;
    this.includeTimestamp = options.includeTimestamp ?? false;
  }

  /** Returns a logger sharing this one's settings but tagged with `prefix`. */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      prefix,
      includeTimestamp: this.includeTimestamp,
    });
  }

  format(msg: string): string {
    const parts: string[] = [];
    if (this.includeTimestamp) parts.push(new Date().toISOString());
    if (this.prefix) parts.push(`[${this.prefix}]`);
    parts.push(msg);
    return parts.join(" ");
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  info(msg: string): void {
    if (!this.isEnabled("info")) return;
    console.log(chalk.cyan("[INFO]"), this.format(msg));
  }

  warn(msg: string): void {
    if (!this.isEnabled("warn")) return;
    console.warn(chalk.yellow("[WARN]"), this.format(msg));
  }

  error(msg: string, err?: Error): void {
    if (!this.isEnabled("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      this.format(msg),
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.isEnabled("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), this.format(msg));
  }
}
