import { describe, it, expect } from "vitest";
import { ErrorLevel, ParseError, parse, parseOne } from "../src/index.js";
import {
  Alias,
  Column,
  Command,
  Create,
  Identifier,
  Lateral,
  Select,
  Show,
  Subquery,
  Table,
  Use,
} from "../src/expressions.js";

// =============================================================================
// Statements
// =============================================================================

describe("Parser: statements", () => {
  it("splits on semicolons and keeps empty statements as null", () => {
    const statements = parse("SELECT 1; SELECT 2");
    expect(statements.map((statement) => statement?.sql())).toEqual(["SELECT 1", "SELECT 2"]);
    expect(parse("")).toEqual([null]);
  });

  it("parses a select", () => {
    const tree = parseOne("SELECT a, b AS c FROM t");
    expect(tree).toBeInstanceOf(Select);
    expect(tree.expressions[0]).toBeInstanceOf(Column);
    expect(tree.expressions[1]).toBeInstanceOf(Alias);
    expect(tree.arg("from_")?.this_).toBeInstanceOf(Table);
  });

  it("parses a subquery in FROM", () => {
    const tree = parseOne("SELECT * FROM (SELECT 1) AS x");
    const subquery = tree.find(Subquery);
    expect(subquery?.alias).toBe("x");
  });

  it("accepts a trailing comma before FROM", () => {
    expect(parseOne("SELECT a, b, FROM t").sql()).toBe("SELECT a, b FROM t");
  });

  it("reads string aliases as quoted identifiers", () => {
    const alias = parseOne("SELECT 1 AS 'one'").find(Alias);
    const identifier = alias?.arg("alias");
    expect(identifier).toBeInstanceOf(Identifier);
    expect(identifier?.flag("quoted")).toBe(true);
    expect(identifier?.name).toBe("one");
  });

  it("parses USE", () => {
    const tree = parseOne("USE SCHEMA db1.s1");
    expect(tree).toBeInstanceOf(Use);
    expect(tree instanceof Use ? tree.kind : "").toBe("SCHEMA");
    expect(tree.find(Table)?.qualifiedName).toBe("db1.s1");
  });

  it("joins the words of a SHOW object kind", () => {
    const tree = parseOne("SHOW TERSE PRIMARY KEYS IN SCHEMA db1.s1");
    expect(tree).toBeInstanceOf(Show);
    expect(tree.name).toBe("PRIMARY KEYS");
    expect(tree.flag("terse")).toBe(true);
    expect(tree instanceof Show ? tree.scopeKind : "").toBe("SCHEMA");
  });

  it("parses CREATE TABLE with a column list", () => {
    const tree = parseOne("CREATE OR REPLACE TABLE t (a INT)");
    expect(tree).toBeInstanceOf(Create);
    expect(tree instanceof Create ? tree.kind : "").toBe("TABLE");
    expect(tree.flag("replace")).toBe(true);
  });
});

// =============================================================================
// Commands
// =============================================================================

describe("Parser: commands", () => {
  it("keeps DDL it cannot read as a command", () => {
    const tree = parseOne("CREATE USER u");
    expect(tree).toBeInstanceOf(Command);
    expect(tree.name).toBe("CREATE");
    expect(tree instanceof Command ? tree.rest : "").toBe("USER u");
  });

  it("keeps command keywords as commands", () => {
    const tree = parseOne("GRANT ROLE r TO USER u");
    expect(tree).toBeInstanceOf(Command);
    expect(tree.sql()).toBe("GRANT ROLE r TO USER u");
  });
});

// =============================================================================
// Snowflake syntax
// =============================================================================

describe("Parser: snowflake", () => {
  it("gives an unaliased flatten a default alias", () => {
    const lateral = parseOne("SELECT * FROM LATERAL FLATTEN(input => x)", { dialect: "snowflake" }).find(Lateral);
    expect(lateral?.alias).toBe("_flattened");
  });

  it("reads IFF as a conditional", () => {
    const tree = parseOne("SELECT IFF(a, 1, 2)", { dialect: "snowflake" });
    expect(tree.sql()).toBe("SELECT CASE WHEN a THEN 1 ELSE 2 END");
    expect(tree.sql({ dialect: "snowflake" })).toBe("SELECT IFF(a, 1, 2)");
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("Parser: errors", () => {
  it("points at the token it failed on", () => {
    let error: unknown;
    try {
      parseOne("SELECT foo FROM");
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ParseError);
    const detail = error instanceof ParseError ? error.errors[0] : undefined;
    expect(detail?.description).toBe("Expected table after FROM");
    expect(detail?.start_context).toBe("SELECT foo ");
    expect(detail?.highlight).toBe("FROM");
    expect(detail?.line).toBe(1);
  });

  it("checks function arity", () => {
    expect(() => parseOne("SELECT UPPER(a, b)")).toThrow(
      "The number of provided arguments (2) is greater than the maximum number of supported arguments (1)",
    );
  });

  it("collects errors under RAISE", () => {
    let error: unknown;
    try {
      parse("SELECT UPPER(a, b)", { errorLevel: ErrorLevel.RAISE });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ParseError);
    expect(error instanceof ParseError ? error.errors.length : 0).toBe(1);
  });

  it("skips arity checks under IGNORE", () => {
    const tree = parseOne("SELECT UPPER(a, b)", { errorLevel: ErrorLevel.IGNORE });
    expect(tree.sql()).toBe("SELECT UPPER(a)");
  });
});
