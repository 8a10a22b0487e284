import { describe, it, expect } from "vitest";
import {
  AmbiguousContextError,
  MISSING_DATABASE,
  MISSING_SCHEMA,
  MalformedInputError,
  Pipeline,
  SideChannelBag,
  UnsupportedError,
  defaultRules,
  parseOne,
  resolveDatabase,
  resolveSchema,
  transforms,
  type Rule,
  type RuleScope,
} from "../src/index.js";
import { Column, Identifier, Literal, Select, Table } from "../src/expressions.js";

function renameTo(name: string, suffix: string): Rule {
  return {
    name,
    kinds: ["identifier"],
    apply(node) {
      return node instanceof Identifier ? node.withArgs({ this: `${node.name}${suffix}` }) : node;
    },
  };
}

function scopeOf(strictContext: boolean, context: RuleScope["context"] = {}): RuleScope {
  return { context, sideChannel: new SideChannelBag(), options: { strictContext }, ancestors: [] };
}

// =============================================================================
// Running rules
// =============================================================================

describe("Pipeline: rules", () => {
  it("runs rules in catalog order", () => {
    const pipeline = new Pipeline([renameTo("first", "_1"), renameTo("second", "_2")]);
    expect(pipeline.translate(parseOne("SELECT a")).tree.sql()).toBe("SELECT a_1_2");
  });

  it("hands a rule only the kinds it lists", () => {
    const seen: string[] = [];
    const rule: Rule = {
      name: "record",
      kinds: ["column", "table"],
      apply(node) {
        seen.push(node.key);
        return node;
      },
    };
    new Pipeline([rule]).translate(parseOne("SELECT a FROM t WHERE b = 1"));
    expect(seen.sort()).toEqual(["column", "column", "table"]);
  });

  it("passes the ancestors nearest first", () => {
    const chains: string[][] = [];
    const rule: Rule = {
      name: "ancestors",
      kinds: ["identifier"],
      apply(node, scope) {
        chains.push(scope.ancestors.map((ancestor) => ancestor.key));
        return node;
      },
    };
    new Pipeline([rule]).translate(parseOne("SELECT a"));
    expect(chains).toEqual([["column", "select"]]);
  });

  it("never mutates the input tree", () => {
    const tree = parseOne("SELECT a FROM t");
    const { tree: translated } = new Pipeline([renameTo("rename", "_x")]).translate(tree);
    expect(translated.sql()).toBe("SELECT a_x FROM t_x");
    expect(tree.sql()).toBe("SELECT a FROM t");
    expect(tree.find(Column)?.parent).toBe(tree);
  });

  it("returns the same tree when no rule changes it", () => {
    const tree = parseOne("SELECT 1");
    expect(new Pipeline([transforms.tag]).translate(tree).tree).toBe(tree);
  });

  it("lets a rule replace the whole statement", () => {
    const rule: Rule = {
      name: "replace",
      kinds: ["select"],
      apply: () => new Select({ expressions: [Literal.number(2)] }),
    };
    expect(new Pipeline([rule]).translate(parseOne("SELECT 1")).tree.sql()).toBe("SELECT 2");
  });

  it("propagates rule errors", () => {
    const rule: Rule = {
      name: "fail",
      kinds: ["table"],
      apply() {
        throw new UnsupportedError("no tables");
      },
    };
    expect(() => new Pipeline([rule]).translate(parseOne("SELECT * FROM t"))).toThrow("no tables");
  });
});

// =============================================================================
// Results
// =============================================================================

describe("Pipeline: results", () => {
  it("freezes the result and its side channel", () => {
    const result = new Pipeline([transforms.extractCommentOnColumns]).translate(
      parseOne("ALTER TABLE t ALTER COLUMN c COMMENT 'x'", { dialect: "snowflake" }),
    );
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.sideChannel)).toBe(true);
    expect(Object.isFrozen(result.sideChannel.columnComments)).toBe(true);
  });

  it("leaves unset side channel keys out", () => {
    const result = new Pipeline([transforms.tag]).translate(parseOne("SELECT 1"));
    expect(result.sideChannel).toEqual({});
  });

  it("keeps the last write of a side channel key", () => {
    const bag = new SideChannelBag();
    bag.setCreateDbName("a");
    bag.setCreateDbName("b");
    expect(bag.snapshot()).toEqual({ createDbName: "b" });
  });

  it("validates the session context", () => {
    const pipeline = new Pipeline([]);
    expect(() => pipeline.translate(parseOne("SELECT 1"), { currentSchema: "" })).toThrow(MalformedInputError);
  });

  it("freezes its rule list", () => {
    const rules = [transforms.tag];
    const pipeline = new Pipeline(rules);
    rules.push(transforms.sample);
    expect(pipeline.rules).toHaveLength(1);
    expect(Object.isFrozen(pipeline.rules)).toBe(true);
  });
});

// =============================================================================
// Context resolution
// =============================================================================

describe("Pipeline: context", () => {
  it("returns the current database and schema", () => {
    const scope = scopeOf(true, { currentDatabase: "db1", currentSchema: "s1" });
    expect(resolveDatabase(scope, "x")).toBe("db1");
    expect(resolveSchema(scope, "x")).toBe("s1");
  });

  it("falls back to placeholders", () => {
    const scope = scopeOf(false);
    expect(resolveDatabase(scope, "x")).toBe(MISSING_DATABASE);
    expect(resolveSchema(scope, "x")).toBe(MISSING_SCHEMA);
    expect([MISSING_DATABASE, MISSING_SCHEMA]).toEqual(["missing_database", "missing_schema"]);
  });

  it("raises under strict context", () => {
    const scope = scopeOf(true);
    expect(() => resolveDatabase(scope, "DESCRIBE TABLE t")).toThrow(
      new AmbiguousContextError("database", "DESCRIBE TABLE t"),
    );
    expect(() => resolveSchema(scope, "DESCRIBE TABLE t")).toThrow(
      "No current schema is set; cannot resolve DESCRIBE TABLE t",
    );
  });
});

// =============================================================================
// Default catalog
// =============================================================================

describe("Pipeline: default rules", () => {
  it("returns a new frozen list each call", () => {
    const first = defaultRules();
    expect(Object.isFrozen(first)).toBe(true);
    expect(defaultRules()).not.toBe(first);
    expect(defaultRules().map((rule) => rule.name)).toEqual(first.map((rule) => rule.name));
  });

  it("names every rule once", () => {
    const names = defaultRules().map((rule) => rule.name);
    expect(new Set(names).size).toBe(names.length);
    expect(names[0]).toBe("upper_case_unquoted_identifiers");
    expect(names).toContain("show_keys_foreign");
  });

  it("upper-cases before anything reads names", () => {
    const names = defaultRules().map((rule) => rule.name);
    expect(names.indexOf("upper_case_unquoted_identifiers")).toBeLessThan(names.indexOf("set_schema"));
    expect(names.indexOf("array_agg_within_group")).toBeLessThan(names.indexOf("array_agg_to_json"));
  });
});

// =============================================================================
// SQL helpers for rules
// =============================================================================

describe("Pipeline: rule helpers", () => {
  it("quotes strings and identifiers", () => {
    expect(transforms.sqlString("it's")).toBe("'it''s'");
    expect(transforms.sqlIdentifier("db1")).toBe("db1");
    expect(transforms.sqlIdentifier("my db")).toBe('"my db"');
    expect(transforms.sqlIdentifier('a"b')).toBe('"a""b"');
  });

  it("parses DuckDB statements", () => {
    expect(transforms.parseDuckDB("SELECT * FROM t").find(Table)?.name).toBe("t");
    expect(() => transforms.parseDuckDB("")).toThrow(MalformedInputError);
  });

  it("unescapes doubled backslashes in patterns", () => {
    expect(transforms.unescapePattern("a\\\\d")).toBe("a\\d");
  });
});
