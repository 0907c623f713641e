import type { LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  minLevel?: LogLevel;
  /** Receives each formatted line, newline included. Defaults to stderr. */
  write?: (line: string) => void;
}

export class Logger {
  private readonly minRank: number;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.minRank = LEVEL_RANK[options.minLevel ?? "info"];
    this.write = options.write ?? ((line) => process.stderr.write(line));
  }

  debug(message: string): void {
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minRank;
  }

  private print(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const ts = new Date().toISOString();
    // Unified, grep-friendly log format. stdout carries the report only.
    this.write(`[${ts}] [${level.toUpperCase()}] ${message}\n`);
  }
}
