import { describe, it, expect } from "vitest";
import { Generator, GenerateError, ErrorLevel, UnsupportedError, parseOne, transpile } from "../src/index.js";
import { Anonymous, Column, DateTrunc, Expression, Literal, toIdentifier } from "../src/expressions.js";

function validateIdentity(sql: string, writeSql?: string): void {
  expect(transpile(sql)[0]).toBe(writeSql ?? sql);
}

// =============================================================================
// Queries
// =============================================================================

describe("Generator: queries", () => {
  it("prints select clauses in order", () => {
    validateIdentity("SELECT a AS b FROM t WHERE x = 1 AND y <> 2 ORDER BY a DESC NULLS LAST LIMIT 10");
    validateIdentity("SELECT DISTINCT a FROM t GROUP BY a HAVING COUNT(*) > 1");
    validateIdentity("SELECT a FROM t LIMIT 5 OFFSET 10");
  });

  it("prints ctes and set operations", () => {
    validateIdentity("WITH x AS (SELECT 1) SELECT * FROM x");
    validateIdentity("SELECT 1 UNION SELECT 2");
    validateIdentity("SELECT 1 UNION ALL SELECT 2");
  });

  it("prints joins", () => {
    validateIdentity("SELECT * FROM a LEFT JOIN b ON a.id = b.id");
    validateIdentity("SELECT * FROM a, b");
  });

  it("prints window functions", () => {
    validateIdentity("SELECT ROW_NUMBER() OVER (PARTITION BY a ORDER BY b) FROM t");
  });

  it("prints negated predicates", () => {
    validateIdentity("SELECT * FROM t WHERE a IS NOT NULL AND b NOT IN (1, 2) AND c NOT LIKE 'x%'");
  });

  it("keeps explicit parentheses", () => {
    validateIdentity("SELECT (a + b) * c FROM t");
  });

  it("escapes quotes", () => {
    validateIdentity("SELECT 'it''s', \"a\"\"b\"");
  });

  it("prints pretty", () => {
    expect(transpile("SELECT a, b FROM t WHERE a = 1", { pretty: true })[0]).toBe(
      "SELECT\na, b\nFROM t\nWHERE a = 1",
    );
  });
});

// =============================================================================
// DML and DDL
// =============================================================================

describe("Generator: statements", () => {
  it("prints DML", () => {
    validateIdentity("INSERT INTO t (a, b) VALUES (1, 2)");
    validateIdentity("UPDATE t SET a = 1 WHERE b = 2");
    validateIdentity("DELETE FROM t WHERE a = 1");
  });

  it("prints DDL", () => {
    validateIdentity("CREATE TABLE t (a INT, b VARCHAR(10))");
    validateIdentity("DROP TABLE IF EXISTS t");
    validateIdentity("ALTER TABLE t ADD COLUMN c INT");
  });
});

// =============================================================================
// Fallbacks and errors
// =============================================================================

describe("Generator: fallbacks", () => {
  it("prints functions without a handler from their arguments", () => {
    const node = new DateTrunc({ unit: Literal.string("day"), this: new Column({ this: toIdentifier("ts") }) });
    expect(new Generator().generate(node)).toBe("DATE_TRUNC('day', ts)");
  });

  it("prints unknown functions as written", () => {
    const node = new Anonymous({ this: "my_func", expressions: [Literal.number(1)] });
    expect(new Generator().generate(node)).toBe("MY_FUNC(1)");
  });

  it("raises on nodes it cannot print", () => {
    expect(() => new Generator().generate(new Expression({ this: "x" }))).toThrow(
      new GenerateError("Unsupported expression type Expression"),
    );
  });

  it("collects unsupported messages by level", () => {
    const tree = parseOne("SELECT 1");
    const raising = new Generator({ unsupportedLevel: ErrorLevel.IMMEDIATE });
    expect(() => raising.unsupported("nope")).toThrow(UnsupportedError);

    const collecting = new Generator({ unsupportedLevel: ErrorLevel.IGNORE });
    collecting.unsupported("nope");
    expect(collecting.unsupportedMessages).toEqual(["nope"]);
    expect(collecting.generate(tree)).toBe("SELECT 1");
    expect(collecting.unsupportedMessages).toEqual([]);
  });
});
