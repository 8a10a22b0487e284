import { loadLogConfig, LogLevel, type LogConfig } from "./config.js";

export type DebugCategory = "pipeline" | "rule" | "parser";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function errorFields(error: Error): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    fields.cause = error.cause;
  }
  return fields;
}

function replacer(_key: string, val: unknown): unknown {
  return val instanceof Error ? errorFields(val) : val;
}

const serialize = (value: unknown, space?: number): string => {
  try {
    return JSON.stringify(value, replacer, space);
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[duckflake:${category}]` : "[duckflake]";
  const base = `${timestamp} [${level.toUpperCase()}] ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }
  return `${base}\n${serialize(rest, 2)}`;
}

export type LogSink = (line: string) => void;

export class Logger {
  config: LogConfig;
  private sink: LogSink;

  constructor(config: LogConfig = loadLogConfig(), sink: LogSink = (line) => console.error(line)) {
    this.config = config;
    this.sink = sink;
  }

  private categoryEnabled(category: DebugCategory): boolean {
    if (!this.config.debug) {
      return false;
    }
    switch (category) {
      case "pipeline":
        return this.config.logPipeline;
      case "rule":
        return this.config.logRules;
      case "parser":
        return this.config.logParser;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.logLevel];
  }

  private emit(
    level: LogLevel,
    category: DebugCategory | undefined,
    message: string,
    payload?: unknown,
  ): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (category) {
      entry.category = category;
    }

    if (payload instanceof Error) {
      entry.error = errorFields(payload);
    } else if (typeof payload === "object" && payload !== null && !Array.isArray(payload)) {
      Object.assign(entry, payload);
    } else if (payload !== undefined) {
      entry.data = payload;
    }

    this.sink(this.config.logFormat === "json" ? serialize(entry) : formatPretty(entry));
  }

  /** Whether a debug call for `category` would emit; lets callers skip building payloads. */
  enabled(category: DebugCategory): boolean {
    return this.categoryEnabled(category) && this.shouldLog(LogLevel.DEBUG);
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (this.enabled(category)) {
      this.emit(LogLevel.DEBUG, category, message, payload);
    }
  }

  info(message: string, payload?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.emit(LogLevel.INFO, undefined, message, payload);
    }
  }

  warn(message: string, payload?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.emit(LogLevel.WARN, undefined, message, payload);
    }
  }

  error(message: string, payload?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.emit(LogLevel.ERROR, undefined, message, payload);
    }
  }
}

export const logger = new Logger();
