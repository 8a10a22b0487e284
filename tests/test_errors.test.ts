import { describe, it, expect } from "vitest";
import {
  AmbiguousContextError,
  MalformedInputError,
  ParseError,
  TranslationError,
  UnsupportedError,
} from "../src/index.js";
import { concatMessages, highlightSql, mergeErrors } from "../src/errors.js";

describe("Errors: hierarchy", () => {
  it("roots every error at TranslationError", () => {
    const errors = [
      new UnsupportedError("x"),
      new MalformedInputError("x"),
      new AmbiguousContextError("database", "USE SCHEMA s"),
      new ParseError("x"),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(TranslationError);
      expect(error).toBeInstanceOf(Error);
    }
    expect(errors.map((error) => error.name)).toEqual([
      "UnsupportedError",
      "MalformedInputError",
      "AmbiguousContextError",
      "ParseError",
    ]);
  });

  it("names the missing context", () => {
    const error = new AmbiguousContextError("schema", "SHOW TABLES");
    expect(error.missing).toBe("schema");
    expect(error.message).toBe("No current schema is set; cannot resolve SHOW TABLES");
  });

  it("builds a parse error with one detail", () => {
    const error = ParseError.new("msg", "desc", 1, 2, "start", "hl", "end");
    expect(error.errors).toEqual([
      {
        description: "desc",
        line: 1,
        col: 2,
        start_context: "start",
        highlight: "hl",
        end_context: "end",
        into_expression: null,
      },
    ]);
  });

  it("merges details of several parse errors", () => {
    const merged = mergeErrors([ParseError.new("a", "first"), ParseError.new("b", "second")]);
    expect(merged.map((detail) => detail.description)).toEqual(["first", "second"]);
  });
});

describe("Errors: formatting", () => {
  it("underlines the highlighted range", () => {
    expect(highlightSql("SELECT x FROM", [[7, 7]])).toEqual([
      "SELECT \x1b[4mx\x1b[0m FROM",
      "SELECT ",
      "x",
      " FROM",
    ]);
  });

  it("highlights from the start of the text", () => {
    expect(highlightSql("abc", [[0, 1]])).toEqual(["\x1b[4mab\x1b[0mc", "", "ab", "c"]);
  });

  it("rejects an empty position list", () => {
    expect(() => highlightSql("abc", [])).toThrow(RangeError);
  });

  it("caps the number of concatenated messages", () => {
    expect(concatMessages(["a", "b", "c"], 2)).toBe("a\n\nb\n\n... and 1 more");
    expect(concatMessages(["a"], 2)).toBe("a");
  });
});
