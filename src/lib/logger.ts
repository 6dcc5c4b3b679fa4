import { stderr } from "node:process";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  level: LogLevel;
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface LoggerOptions {
  prefix?: string;
  level?: LogLevel;
  sink?: LogSink;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * MCP reserves the `logging/setLevel` names of RFC 5424; map them onto ours.
 */
export function logLevelFromSyslog(value: string): LogLevel | null {
  const lowered = value.trim().toLowerCase();
  if (isLogLevel(lowered)) {
    return lowered;
  }
  if (lowered === "notice") {
    return "info";
  }
  if (lowered === "warning") {
    return "warn";
  }
  if (["critical", "alert", "emergency"].includes(lowered)) {
    return "error";
  }
  return null;
}

export function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

class StderrLogger implements Logger {
  level: LogLevel;
  private readonly prefix: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level ?? "warn";
    this.prefix = options.prefix ?? "ai-presence-mcp";
    this.sink = options.sink ?? stderr;
  }

  debug(message: string, meta?: unknown): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log("error", message, meta);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, meta: unknown): void {
    if (RANK[level] < RANK[this.level]) {
      return;
    }
    const suffix = meta === undefined ? "" : ` ${safeJson(meta)}`;
    // stdout belongs to the protocol; diagnostics only ever go to the sink.
    this.sink.write(`[${this.prefix}] ${level} ${message}${suffix}\n`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new StderrLogger(options);
}
