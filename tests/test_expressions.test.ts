import { describe, it, expect } from "vitest";
import { parseOne } from "../src/index.js";
import {
  Alias,
  And,
  Column,
  DataType,
  Expression,
  Identifier,
  Literal,
  Select,
  Table,
  and_,
  cast,
  column,
  successNop,
  toIdentifier,
} from "../src/expressions.js";

// =============================================================================
// Traversal
// =============================================================================

describe("Expression: traversal", () => {
  it("finds the first node of a kind breadth first", () => {
    const tree = parseOne("SELECT a, b FROM t");
    expect(tree.find(Column)?.name).toBe("a");
    expect(tree.find(Table)?.name).toBe("t");
  });

  it("finds every node of a kind", () => {
    const tree = parseOne("SELECT a, b FROM t WHERE c = 1");
    expect([...tree.findAll(Column)].map((node) => node.name)).toEqual(["a", "b", "c"]);
  });

  it("accepts several kinds", () => {
    const tree = parseOne("SELECT a FROM t");
    expect([...tree.findAll<Column | Table>(Column, Table)].map((node) => node.key)).toEqual(["column", "table"]);
  });

  it("walks up to an ancestor", () => {
    const tree = parseOne("SELECT a FROM t");
    const identifier = tree.find(Identifier);
    expect(identifier?.findAncestor(Select)).toBe(tree);
    expect(identifier?.findAncestor(Table)).toBeUndefined();
    expect(identifier?.depth).toBe(2);
    expect(identifier?.root()).toBe(tree);
  });

  it("reads qualified table names", () => {
    const table = parseOne("SELECT * FROM db.s.t").find(Table);
    expect(table?.catalog).toBe("db");
    expect(table?.db).toBe("s");
    expect(table?.qualifiedName).toBe("db.s.t");
  });
});

// =============================================================================
// Transform
// =============================================================================

describe("Expression: transform", () => {
  it("rewrites bottom up without touching the input", () => {
    const tree = parseOne("SELECT a FROM t");
    const rewritten = tree.transform((node) => (node instanceof Column && node.name === "a" ? column("b") : node));
    expect(rewritten.sql()).toBe("SELECT b FROM t");
    expect(tree.sql()).toBe("SELECT a FROM t");
  });

  it("returns the same tree when nothing changes", () => {
    const tree = parseOne("SELECT a FROM t WHERE b > 1");
    expect(tree.transform((node) => node)).toBe(tree);
  });

  it("passes the ancestors nearest first", () => {
    const tree = parseOne("SELECT a");
    const seen: string[][] = [];
    tree.transform((node, ancestors) => {
      if (node instanceof Identifier) {
        seen.push(ancestors.map((ancestor) => ancestor.key));
      }
      return node;
    });
    expect(seen).toEqual([["column", "select"]]);
  });

  it("lets a rewrite replace the root", () => {
    const tree = parseOne("SELECT a FROM t");
    expect(tree.transform((node) => (node instanceof Select ? successNop() : node)).sql()).toBe(
      "SELECT 'Statement executed successfully.'",
    );
  });
});

// =============================================================================
// Building and copying
// =============================================================================

describe("Expression: building", () => {
  it("copies a child that already has a parent", () => {
    const child = column("x");
    const first = new Alias({ this: child, alias: toIdentifier("y") });
    const second = new Alias({ this: child, alias: toIdentifier("z") });
    expect(first.this_).toBe(child);
    expect(second.this_).not.toBe(child);
    expect(second.this_?.parent).toBe(second);
  });

  it("lays overrides over a node's arguments", () => {
    const original = parseOne("SELECT a FROM t");
    const updated = original.withArgs({ expressions: [column("c")] });
    expect(updated).toBeInstanceOf(Select);
    expect(updated.sql()).toBe("SELECT c FROM t");
    expect(original.sql()).toBe("SELECT a FROM t");
  });

  it("deep copies", () => {
    const tree = parseOne("SELECT a + 1 FROM t");
    const copied = tree.copy();
    expect(copied).not.toBe(tree);
    expect(copied.eq(tree)).toBe(true);
    expect(copied.find(Column)).not.toBe(tree.find(Column));
  });

  it("drops null and undefined arguments", () => {
    const node = new Column({ this: toIdentifier("a"), table: undefined, db: null });
    expect(Object.keys(node.args)).toEqual(["this"]);
  });

  it("quotes identifiers that are not plain words", () => {
    expect(toIdentifier("abc").quoted).toBe(false);
    expect(toIdentifier("_a$1").quoted).toBe(false);
    expect(toIdentifier("my col").quoted).toBe(true);
    expect(toIdentifier("1a").quoted).toBe(true);
    expect(toIdentifier("abc", true).quoted).toBe(true);
  });

  it("chains conditions left deep", () => {
    const condition = and_(column("a"), column("b"), column("c"));
    expect(condition).toBeInstanceOf(And);
    expect(condition.this_).toBeInstanceOf(And);
    expect(condition.sql()).toBe("a AND b AND c");
  });

  it("builds casts", () => {
    expect(cast(column("x"), DataType.build("INT")).sql()).toBe("CAST(x AS INT)");
  });
});

// =============================================================================
// Properties and equality
// =============================================================================

describe("Expression: properties", () => {
  it("classifies literals", () => {
    expect(Literal.number(5).isInt).toBe(true);
    expect(Literal.number("1.5").isInt).toBe(false);
    expect(Literal.number("1.5").isNumber).toBe(true);
    expect(Literal.string("5").isInt).toBe(false);
    expect(Literal.string("5").isString).toBe(true);
  });

  it("reads data type names and parameters", () => {
    const dataType = DataType.build("DECIMAL", [Literal.number(10), Literal.number(2)]);
    expect(dataType.isType("decimal", "INT")).toBe(true);
    expect(dataType.params.map((param) => param.name)).toEqual(["10", "2"]);
    expect(DataType.arrayOf(DataType.build("INT")).params).toEqual([]);
  });

  it("compares trees structurally", () => {
    expect(parseOne("SELECT a FROM t").eq(parseOne("select a from t"))).toBe(true);
    expect(parseOne("SELECT a FROM t").eq(parseOne("SELECT A FROM t"))).toBe(false);
    expect(parseOne("SELECT 'x'").eq(parseOne("SELECT 'X'"))).toBe(false);
  });

  it("knows its output name", () => {
    const tree = parseOne("SELECT a AS b, c FROM t");
    expect(tree.expressions.map((node: Expression) => node.outputName)).toEqual(["b", "c"]);
  });
});
