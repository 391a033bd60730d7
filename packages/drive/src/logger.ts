import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILES, LOG_LEVELS, type LogLevel } from "@mailstash/shared";

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Directory receiving mailstash.log. Console only when omitted. */
  logDir?: string;
  /** Defaults to stderr; stdout carries the CLI's JSON. */
  sink?: LogSink;
}

/**
 * Leveled logger writing timestamped lines to the console and, optionally,
 * appending them to mailstash.log.
 */
export class Logger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private logFile: string | null;

  private constructor(options: LoggerOptions) {
    this.threshold = LOG_LEVELS.indexOf(options.level);
    this.sink = options.sink ?? process.stderr;
    this.logFile = options.logDir ? join(options.logDir, CONFIG_FILES.log) : null;
  }

  /** Create a logger, making sure the log directory exists. */
  static async create(options: LoggerOptions): Promise<Logger> {
    if (options.logDir) {
      await mkdir(options.logDir, { recursive: true });
    }
    return new Logger(options);
  }

  /** Logger that only reports errors to stderr. */
  static quiet(): Logger {
    return new Logger({ level: "error" });
  }

  enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  async log(level: LogLevel, message: string): Promise<void> {
    if (!this.enabled(level)) return;

    const ts = new Date().toISOString();
    const line = `[${ts}] [${level.toUpperCase()}] ${message}\n`;
    this.sink.write(line);

    if (this.logFile) {
      try {
        await appendFile(this.logFile, line);
      } catch (err) {
        // Keep going on the console; report once and stop writing the file.
        const reason = err instanceof Error ? err.message : String(err);
        this.sink.write(`[${ts}] [WARN] log file disabled: ${reason}\n`);
        this.logFile = null;
      }
    }
  }

  debug(message: string): Promise<void> {
    return this.log("debug", message);
  }

  info(message: string): Promise<void> {
    return this.log("info", message);
  }

  warn(message: string): Promise<void> {
    return this.log("warn", message);
  }

  error(message: string): Promise<void> {
    return this.log("error", message);
  }
}
