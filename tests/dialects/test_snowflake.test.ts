import { describe, it, expect } from "vitest";
import { parseOne, transpile } from "../../src/index.js";
import { Anonymous, JSONExtract, Struct, ToNumber, UnixToTime } from "../../src/expressions.js";

function validateIdentity(sql: string, writeSql?: string): void {
  const result = transpile(sql, { readDialect: "snowflake", writeDialect: "snowflake" })[0];
  expect(result).toBe(writeSql ?? sql);
}

function validateTranspile(sql: string, expected: string): void {
  expect(transpile(sql, { readDialect: "snowflake", writeDialect: "duckdb" })[0]).toBe(expected);
}

// =============================================================================
// Round trips
// =============================================================================

describe("Snowflake: identity", () => {
  it("keeps table DDL", () => {
    validateIdentity("CREATE OR REPLACE TRANSIENT TABLE t (id INT PRIMARY KEY, name VARCHAR(10) NOT NULL)");
  });

  it("keeps SHOW statements", () => {
    validateIdentity("SHOW TERSE OBJECTS IN SCHEMA db.s LIMIT 5");
    validateIdentity("SHOW TABLES LIKE 'x%' IN DATABASE db");
  });

  it("prints paths through GET_PATH", () => {
    validateIdentity("SELECT v:a.b[0] FROM t", "SELECT GET_PATH(v, 'a.b[0]') FROM t");
    validateIdentity("SELECT GET_PATH(v, 'a') FROM t");
  });

  it("prints IFF and OBJECT_CONSTRUCT", () => {
    validateIdentity("SELECT IFF(a > 1, 'x', 'y')");
    validateIdentity("SELECT OBJECT_CONSTRUCT('a', 1)");
  });

  it("prints SAMPLE", () => {
    validateIdentity("SELECT * FROM t SAMPLE (10)");
  });

  it("prints STRING as VARCHAR", () => {
    validateIdentity("SELECT CAST(x AS STRING)", "SELECT CAST(x AS VARCHAR)");
  });
});

// =============================================================================
// Function builders
// =============================================================================

describe("Snowflake: functions", () => {
  it("reads a path into a JSON path node", () => {
    const extract = parseOne("SELECT v:a.b[0] FROM t", { dialect: "snowflake" }).find(JSONExtract);
    expect(extract?.expression?.name).toBe("$.a.b[0]");
  });

  it("pairs OBJECT_CONSTRUCT arguments", () => {
    const tree = parseOne("SELECT OBJECT_CONSTRUCT('a', 1, 'b', 2)", { dialect: "snowflake" });
    expect(tree.find(Struct)?.expressions).toHaveLength(2);
    expect(parseOne("SELECT OBJECT_CONSTRUCT(*)", { dialect: "snowflake" }).find(Anonymous)?.fnName).toBe(
      "OBJECT_CONSTRUCT",
    );
  });

  it("separates a TO_NUMBER format from its precision", () => {
    const withFormat = parseOne("SELECT TO_NUMBER(s, '999', 10)", { dialect: "snowflake" }).find(ToNumber);
    expect(withFormat?.arg("format")?.name).toBe("999");
    expect(withFormat?.arg("precision")?.name).toBe("10");

    const withoutFormat = parseOne("SELECT TO_NUMBER(s, 10, 2)", { dialect: "snowflake" }).find(ToNumber);
    expect(withoutFormat?.arg("format")).toBeUndefined();
    expect(withoutFormat?.arg("scale")?.name).toBe("2");
  });

  it("reads epoch TO_TIMESTAMP as a unix time", () => {
    expect(parseOne("SELECT TO_TIMESTAMP(0)", { dialect: "snowflake" }).find(UnixToTime)).toBeDefined();
    expect(parseOne("SELECT TO_TIMESTAMP(s)", { dialect: "snowflake" }).find(UnixToTime)).toBeUndefined();
  });
});

// =============================================================================
// To DuckDB
// =============================================================================

describe("Snowflake: to duckdb", () => {
  it("maps types", () => {
    validateTranspile(
      "CREATE OR REPLACE TRANSIENT TABLE t (id INT PRIMARY KEY, name VARCHAR(10) NOT NULL)",
      "CREATE OR REPLACE TABLE t (id INT PRIMARY KEY, name TEXT NOT NULL)",
    );
    validateTranspile("SELECT CAST(x AS BINARY)", "SELECT CAST(x AS BLOB)");
  });

  it("prints paths with arrows", () => {
    validateTranspile("SELECT v:a.b FROM t", "SELECT v -> '$.a.b' FROM t");
  });

  it("prints objects as struct literals", () => {
    validateTranspile("SELECT OBJECT_CONSTRUCT('a', 1)", "SELECT {'a': 1}");
  });

  it("keeps backslash escapes as literal text", () => {
    validateTranspile("SELECT 'it\\'s'", "SELECT 'it''s'");
  });
});
