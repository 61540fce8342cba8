/**
 * Logging Subsystem
 *
 * Structured, levelled logging with per-subsystem child loggers, secret
 * redaction and pluggable transports. Diagnostics always go to stderr or a
 * file: stdout carries rendered records only.
 */

import fs from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
  close(): Promise<void>;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function compareLogLevels(a: LogLevel, b: LogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Console Transport
// =============================================================================

/** Writes every level to stderr. */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    console.error(this.formatter(entry));
  }
}

// =============================================================================
// File Transport
// =============================================================================

export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private filePath: string;
  private stream: fs.WriteStream | null = null;

  constructor(options: { filePath: string; formatter?: LogFormatter }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ?? createDefaultFormatter({ colors: false, timestamps: true, includeMetadata: true });
  }

  write(entry: LogEntry): void {
    if (!this.stream) {
      this.stream = fs.createWriteStream(this.filePath, { flags: "a" });
    }
    this.stream.write(`${this.formatter(entry)}\n`);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

type LoggerState = {
  level: LogLevel;
  transports: LogTransport[];
  redactPatterns: RegExp[];
};

export class SubsystemLogger implements Logger {
  readonly subsystem: string;
  private state: LoggerState;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    redact?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.state = {
      level: options.level ?? "warn",
      transports: options.transports ?? [new ConsoleTransport()],
      redactPatterns: (options.redact ?? [])
        .filter((secret) => secret.length > 0)
        .map((secret) => new RegExp(escapeRegExp(secret), "g")),
    };
  }

  private static fromState(subsystem: string, state: LoggerState): SubsystemLogger {
    const logger = new SubsystemLogger({ subsystem, transports: [] });
    logger.state = state;
    return logger;
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  /** Children share level, transports and redaction with their parent. */
  child(name: string): Logger {
    return SubsystemLogger.fromState(`${this.subsystem}/${name}`, this.state);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.state.level);
  }

  async close(): Promise<void> {
    for (const transport of this.state.transports) {
      await transport.close?.();
    }
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.state.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
    };

    for (const transport of this.state.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.state.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject(Object.fromEntries(Object.entries(value)));
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// =============================================================================
// Logger Factory
// =============================================================================

export type LoggerOptions = {
  level?: LogLevel;
  /** Append to this file instead of writing to stderr. */
  file?: string;
  /** Literal secrets replaced by `[REDACTED]`. */
  redact?: string[];
};

export function createLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const transports: LogTransport[] = options.file
    ? [new FileTransport({ filePath: options.file })]
    : [new ConsoleTransport()];
  return new SubsystemLogger({
    subsystem,
    level: options.level ?? "warn",
    transports,
    redact: options.redact,
  });
}

/** Discards everything. Default for library callers that pass no logger. */
export const silentLogger: Logger = new SubsystemLogger({
  subsystem: "silent",
  level: "fatal",
  transports: [],
});
