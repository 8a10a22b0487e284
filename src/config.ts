import { z } from "zod";
import { MalformedInputError } from "./errors.js";
import { toBool } from "./helper.js";

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

export type LogFormat = "json" | "pretty";

export interface LogConfig {
  /** Enables the debug categories below; levels apply either way. */
  debug: boolean;
  logPipeline: boolean;
  logRules: boolean;
  logParser: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat =>
  value?.trim().toLowerCase() === "json" ? "json" : defaultValue;

export function loadLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const debug = toBool(env.DUCKFLAKE_DEBUG, false);
  const logLevel = toLogLevel(env.DUCKFLAKE_LOG_LEVEL, LogLevel.WARN);
  const logFormat = toLogFormat(env.DUCKFLAKE_LOG_FORMAT, "pretty");

  if (!debug) {
    return {
      debug: false,
      logPipeline: false,
      logRules: false,
      logParser: false,
      logLevel,
      logFormat,
    };
  }

  return {
    debug: true,
    logPipeline: toBool(env.DUCKFLAKE_DEBUG_PIPELINE, true),
    logRules: toBool(env.DUCKFLAKE_DEBUG_RULES, true),
    logParser: toBool(env.DUCKFLAKE_DEBUG_PARSER, false),
    logLevel,
    logFormat,
  };
}

// ============================================================================
// Caller input
// ============================================================================

const NameSchema = z.string().min(1);

export const SessionContextSchema = z
  .object({
    currentDatabase: NameSchema.optional(),
    currentSchema: NameSchema.optional(),
    databaseFilePath: NameSchema.optional(),
  })
  .strict();

export type SessionContextInput = z.input<typeof SessionContextSchema>;

export const PipelineOptionsSchema = z
  .object({
    strictContext: z.boolean().default(false),
  })
  .strict();

export type PipelineOptionsInput = z.input<typeof PipelineOptionsSchema>;
export type PipelineOptions = z.output<typeof PipelineOptionsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Validates caller input against `schema`, raising MalformedInputError on failure. */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new MalformedInputError(`Invalid ${what}: ${describeIssues(result.error)}`);
  }
  return result.data;
}
