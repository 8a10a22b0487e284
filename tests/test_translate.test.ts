import { describe, it, expect } from "vitest";
import {
  AmbiguousContextError,
  MalformedInputError,
  UnsupportedError,
  transforms,
  translate,
  translateAll,
} from "../src/index.js";

// =============================================================================
// Snowflake to DuckDB
// =============================================================================

describe("Translate: statements", () => {
  it("upper-cases unquoted names", () => {
    expect(translate("SELECT a FROM t").sql).toBe("SELECT A FROM T");
  });

  it("reads variant paths as text", () => {
    expect(translate("SELECT v:name::VARCHAR AS n FROM t").sql).toBe("SELECT V ->> '$.name' AS N FROM T");
  });

  it("names VALUES columns", () => {
    expect(translate("SELECT * FROM VALUES (1, 'a')").sql).toBe(
      "SELECT * FROM (VALUES (1, 'a')) AS _(\"COLUMN1\", \"COLUMN2\")",
    );
  });

  it("builds JSON objects and arrays", () => {
    expect(translate("SELECT OBJECT_CONSTRUCT('a', x)").sql).toBe("SELECT TO_JSON({'a': X})");
    expect(translate("SELECT ARRAY_AGG(x) WITHIN GROUP (ORDER BY y) FROM t").sql).toBe(
      "SELECT TO_JSON(ARRAY_AGG(X ORDER BY Y)) FROM T",
    );
  });

  it("creates a table and reports what DuckDB cannot store", () => {
    const result = translate("CREATE TABLE t (a VARCHAR(10), b NUMBER) COMMENT = 'hello'");
    expect(result.sql).toBe("CREATE TABLE T (A TEXT, B BIGINT)");
    expect(result.sideChannel.tableComment?.text).toBe("hello");
    expect(result.sideChannel.tableComment?.table.name).toBe("T");
    expect(result.sideChannel.textLengths).toEqual([{ column: "A", length: 10 }]);
  });

  it("switches schema in the current database", () => {
    expect(translate("USE SCHEMA s", { context: { currentDatabase: "db1" } }).sql).toBe("SET schema = 'db1.S'");
  });

  it("raises without a database under strict context", () => {
    expect(() => translate("USE SCHEMA s", { strictContext: true })).toThrow(AmbiguousContextError);
  });

  it("returns the RANDOM seed on the tree", () => {
    const result = translate("SELECT RANDOM(7)");
    expect(result.tree.args["seed"]).toBe("7/2147483647-0.5");
  });

  it("rejects unsupported constructs", () => {
    expect(() => translate("SELECT REGEXP_SUBSTR(s, 'a', 1, n)")).toThrow(UnsupportedError);
  });

  it("accepts a custom rule catalog", () => {
    expect(translate("SELECT a FROM t", { rules: [] }).sql).toBe("SELECT a FROM t");
    expect(translate("DROP SCHEMA s", { rules: [transforms.dropSchemaCascade] }).sql).toBe("DROP SCHEMA s CASCADE");
  });

  it("prints pretty", () => {
    expect(translate("SELECT a FROM t", { pretty: true }).sql).toBe("SELECT\nA\nFROM T");
  });
});

// =============================================================================
// Input and results
// =============================================================================

describe("Translate: input", () => {
  it("takes exactly one statement", () => {
    expect(() => translate("SELECT 1; SELECT 2")).toThrow(MalformedInputError);
    expect(() => translate("")).toThrow(MalformedInputError);
  });

  it("validates the context", () => {
    expect(() => translate("SELECT 1", { context: { currentDatabase: "" } })).toThrow(MalformedInputError);
  });

  it("freezes the result", () => {
    const result = translate("SELECT 1");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.sideChannel)).toBe(true);
  });

  it("translates a script in order", () => {
    const results = translateAll("CREATE DATABASE db1; USE DATABASE db1");
    expect(results.map((result) => result.sql)).toEqual([
      "ATTACH DATABASE ':memory:' AS DB1",
      "SET schema = 'DB1.main'",
    ]);
    expect(results[0]?.sideChannel.createDbName).toBe("DB1");
    expect(results[1]?.sideChannel).toEqual({});
  });
});
