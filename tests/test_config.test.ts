import { describe, it, expect } from "vitest";
import { Logger, MalformedInputError, sessionContext } from "../src/index.js";
import { LogLevel, loadLogConfig, type LogConfig } from "../src/config.js";

function config(overrides: Partial<LogConfig> = {}): LogConfig {
  return {
    debug: false,
    logPipeline: false,
    logRules: false,
    logParser: false,
    logLevel: LogLevel.WARN,
    logFormat: "pretty",
    ...overrides,
  };
}

function capture(logConfig: LogConfig): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger(logConfig, (line) => lines.push(line)), lines };
}

// =============================================================================
// Environment
// =============================================================================

describe("Config: log settings", () => {
  it("defaults to warnings only", () => {
    expect(loadLogConfig({})).toEqual(config());
  });

  it("turns on pipeline and rule debugging with DUCKFLAKE_DEBUG", () => {
    expect(loadLogConfig({ DUCKFLAKE_DEBUG: "true", DUCKFLAKE_LOG_LEVEL: "debug" })).toEqual(
      config({ debug: true, logPipeline: true, logRules: true, logLevel: LogLevel.DEBUG }),
    );
  });

  it("reads each category switch", () => {
    const loaded = loadLogConfig({
      DUCKFLAKE_DEBUG: "1",
      DUCKFLAKE_DEBUG_RULES: "false",
      DUCKFLAKE_DEBUG_PARSER: "true",
      DUCKFLAKE_LOG_FORMAT: "JSON",
    });
    expect(loaded.logRules).toBe(false);
    expect(loaded.logParser).toBe(true);
    expect(loaded.logFormat).toBe("json");
  });

  it("ignores category switches without DUCKFLAKE_DEBUG", () => {
    expect(loadLogConfig({ DUCKFLAKE_DEBUG_PARSER: "true" }).logParser).toBe(false);
  });

  it("falls back on unknown levels", () => {
    expect(loadLogConfig({ DUCKFLAKE_LOG_LEVEL: "verbose" }).logLevel).toBe(LogLevel.WARN);
  });
});

// =============================================================================
// Logger
// =============================================================================

describe("Config: logger", () => {
  it("drops messages below the level", () => {
    const { logger, lines } = capture(config({ logLevel: LogLevel.ERROR }));
    logger.warn("skipped");
    logger.error("kept");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ \[ERROR\] \[duckflake\] kept$/);
  });

  it("writes debug output only for enabled categories", () => {
    const { logger, lines } = capture(config({ debug: true, logRules: true, logLevel: LogLevel.DEBUG }));
    logger.debug("rule", "applied");
    logger.debug("parser", "hidden");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ \[DEBUG\] \[duckflake:rule\] applied$/);
    expect(logger.enabled("pipeline")).toBe(false);
  });

  it("writes JSON entries with the payload merged in", () => {
    const { logger, lines } = capture(config({ logFormat: "json" }));
    logger.warn("careful", { rule: "random" });
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({ level: "warn", message: "careful", rule: "random" });
  });

  it("serializes errors", () => {
    const { logger, lines } = capture(config({ logFormat: "json" }));
    logger.error("failed", new Error("boom"));
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({ error: { name: "Error", message: "boom" } });
  });

  it("prints a payload under the pretty line", () => {
    const { logger, lines } = capture(config());
    logger.warn("careful", { rule: "random" });
    expect(lines[0]?.split("\n").slice(1)).toEqual(["{", '  "rule": "random"', "}"]);
  });
});

// =============================================================================
// Session context
// =============================================================================

describe("Config: session context", () => {
  it("freezes a valid context", () => {
    const context = sessionContext({ currentDatabase: "db1", currentSchema: "s1" });
    expect(context).toEqual({ currentDatabase: "db1", currentSchema: "s1" });
    expect(Object.isFrozen(context)).toBe(true);
  });

  it("rejects empty names", () => {
    expect(() => sessionContext({ currentDatabase: "" })).toThrow(MalformedInputError);
    expect(() => sessionContext({ currentDatabase: "" })).toThrow(/^Invalid session context: currentDatabase: /);
  });

  it("rejects unknown keys", () => {
    const input = { currentDatabase: "db1", currentWarehouse: "wh" };
    expect(() => sessionContext(input)).toThrow(/^Invalid session context: \(root\): Unrecognized key/);
  });
});
