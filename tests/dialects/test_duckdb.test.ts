import { describe, it, expect } from "vitest";
import { ErrorLevel, UnsupportedError, parseOne, transpile } from "../../src/index.js";
import { DataType, Identifier, Literal, TableSample } from "../../src/expressions.js";

function validateIdentity(sql: string, writeSql?: string): void {
  const result = transpile(sql, { readDialect: "duckdb", writeDialect: "duckdb" })[0];
  expect(result).toBe(writeSql ?? sql);
}

describe("DuckDB: generator", () => {
  it("drops text lengths", () => {
    validateIdentity("CREATE TABLE t (a VARCHAR(10), b CHAR(2))", "CREATE TABLE t (a TEXT, b TEXT)");
  });

  it("prints arrays as inner[]", () => {
    expect(DataType.arrayOf(DataType.build("JSON")).sql({ dialect: "duckdb" })).toBe("JSON[]");
  });

  it("shifts integer indexes to 1-based", () => {
    const tree = parseOne("SELECT x[0], x[i] FROM t");
    expect(tree.sql({ dialect: "duckdb" })).toBe("SELECT x[1], x[i] FROM t");
  });

  it("prints JSON operators", () => {
    validateIdentity("SELECT v -> '$.a', v ->> '$.b' FROM t");
  });

  it("reads STRPTIME and prints epoch milliseconds", () => {
    validateIdentity("SELECT STRPTIME(s, '%Y')");
    validateIdentity("SELECT TO_TIMESTAMP(0)");
  });

  it("prints samples", () => {
    const sample = new TableSample({
      method: "BERNOULLI",
      size: Literal.number(5),
      rows: true,
      seed: Literal.number(1),
    });
    expect(sample.sql({ dialect: "duckdb" })).toBe("USING SAMPLE BERNOULLI (5 ROWS) REPEATABLE (1)");
  });

  it("quotes identifiers with double quotes", () => {
    expect(new Identifier({ this: 'a"b', quoted: true }).sql({ dialect: "duckdb" })).toBe('"a""b"');
  });
});

describe("DuckDB: unsupported", () => {
  const sql = "CREATE TABLE t (a INT) COMMENT = 'x'";

  it("drops table comments when ignoring", () => {
    const tree = parseOne(sql, { dialect: "snowflake" });
    expect(tree.sql({ dialect: "duckdb", unsupportedLevel: ErrorLevel.IGNORE })).toBe("CREATE TABLE t (a INT)");
  });

  it("raises on table comments when asked to", () => {
    const tree = parseOne(sql, { dialect: "snowflake" });
    expect(() => tree.sql({ dialect: "duckdb", unsupportedLevel: ErrorLevel.RAISE })).toThrow(UnsupportedError);
  });

  it("prints through transpile", () => {
    expect(
      transpile(sql, { readDialect: "snowflake", writeDialect: "duckdb", unsupportedLevel: ErrorLevel.IGNORE }),
    ).toEqual(["CREATE TABLE t (a INT)"]);
  });
});
