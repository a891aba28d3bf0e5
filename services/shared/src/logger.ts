/**
 * Structured Logger
 * Lightweight wrapper that produces one JSON object per line.
 * Every admission decision, upstream failure and snapshot phase is logged here.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogStream = "stdout" | "stderr";

// stdout carries the protocol when the tool server runs over stdio
let logStream: LogStream = "stdout";

export function setLogStream(stream: LogStream): void {
  logStream = stream;
}

// Overrides LOG_LEVEL for loggers created without an explicit level
let levelOverride: LogLevel | null = null;

export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_ORDER;
}

export class Logger {
  private service: string;
  private explicitLevel: LogLevel | undefined;

  constructor(service: string, minLevel?: LogLevel) {
    this.service = service;
    this.explicitLevel = minLevel;
  }

  get minLevel(): LogLevel {
    if (this.explicitLevel) return this.explicitLevel;
    if (levelOverride) return levelOverride;
    const envLevel = process.env["LOG_LEVEL"];
    return isLogLevel(envLevel) ? envLevel : "info";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(data && { data }),
    };

    const line = JSON.stringify(entry);

    if (logStream === "stderr" || level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit("error", message, data);
  }

  /** Log a data-integrity condition: an upstream entry that a lookup table cannot place */
  integrity(condition: string, data: Record<string, unknown>): void {
    this.emit("warn", `DATA_INTEGRITY: ${condition}`, {
      ...data,
      _integrity: true,
    });
  }

  child(subService: string): Logger {
    return new Logger(`${this.service}:${subService}`, this.explicitLevel);
  }
}

export function createLogger(service: string): Logger {
  return new Logger(service);
}
