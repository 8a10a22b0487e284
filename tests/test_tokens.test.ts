import { describe, it, expect } from "vitest";
import { Dialect, TokenError, TokenType, Tokenizer } from "../src/index.js";
import { TrieResult, inTrie, newTrie } from "../src/trie.js";

function tokenTypes(sql: string, dialect?: string): TokenType[] {
  return Dialect.getOrRaise(dialect)
    .tokenize(sql)
    .map((token) => token.tokenType);
}

// =============================================================================
// Base tokenizer
// =============================================================================

describe("Tokenizer: basics", () => {
  it("splits a simple query", () => {
    const tokens = new Tokenizer().tokenize("SELECT a, 'b' FROM t");
    expect(tokens.map((token) => [token.tokenType, token.text])).toEqual([
      [TokenType.SELECT, "SELECT"],
      [TokenType.VAR, "a"],
      [TokenType.COMMA, ","],
      [TokenType.STRING, "b"],
      [TokenType.FROM, "FROM"],
      [TokenType.VAR, "t"],
    ]);
  });

  it("records start and end offsets", () => {
    const [select, column] = new Tokenizer().tokenize("SELECT a");
    expect([select?.start, select?.end]).toEqual([0, 5]);
    expect([column?.start, column?.end]).toEqual([7, 7]);
  });

  it("reads multi-word keywords", () => {
    expect(tokenTypes("GROUP BY a ORDER  BY b")).toEqual([
      TokenType.GROUP_BY,
      TokenType.VAR,
      TokenType.ORDER_BY,
      TokenType.VAR,
    ]);
  });

  it("reads the JSON and cast operators", () => {
    expect(tokenTypes("x->>'a'")).toEqual([TokenType.VAR, TokenType.DARROW, TokenType.STRING]);
    expect(tokenTypes("x->'a'")).toEqual([TokenType.VAR, TokenType.ARROW, TokenType.STRING]);
    expect(tokenTypes("x::INT")).toEqual([TokenType.VAR, TokenType.DCOLON, TokenType.INT]);
    expect(tokenTypes("f(input => x)")).toEqual([
      TokenType.VAR,
      TokenType.L_PAREN,
      TokenType.VAR,
      TokenType.FARROW,
      TokenType.VAR,
      TokenType.R_PAREN,
    ]);
  });

  it("keeps a quoted identifier's text without quotes", () => {
    const [token] = new Tokenizer().tokenize('"My Col"');
    expect(token?.tokenType).toBe(TokenType.IDENTIFIER);
    expect(token?.text).toBe("My Col");
  });

  it("doubles a quote to escape it", () => {
    const [token] = new Tokenizer().tokenize("'it''s'");
    expect(token?.text).toBe("it's");
  });

  it("keeps the rest of a command as one string", () => {
    const tokens = new Tokenizer().tokenize("GRANT ROLE r TO USER u");
    expect(tokens.map((token) => [token.tokenType, token.text])).toEqual([
      [TokenType.COMMAND, "GRANT"],
      [TokenType.STRING, "ROLE r TO USER u"],
    ]);
  });

  it("attaches a trailing comment to the previous token", () => {
    const tokens = new Tokenizer().tokenize("SELECT 1 -- one");
    expect(tokens[1]?.comments).toEqual([" one"]);
  });

  it("raises on an unterminated string", () => {
    expect(() => new Tokenizer().tokenize("SELECT 'abc")).toThrow(TokenError);
  });
});

// =============================================================================
// Snowflake tokenizer
// =============================================================================

describe("Tokenizer: snowflake", () => {
  it("accepts // line comments", () => {
    const tokens = Dialect.getOrRaise("snowflake").tokenize("SELECT 1 // note");
    expect(tokens.map((token) => token.tokenType)).toEqual([TokenType.SELECT, TokenType.NUMBER]);
    expect(tokens[1]?.comments).toEqual([" note"]);
  });

  it("escapes a quote with a backslash", () => {
    const [token] = Dialect.getOrRaise("snowflake").tokenize("'it\\'s'");
    expect(token?.text).toBe("it's");
  });

  it("keeps an escaped backslash as written", () => {
    const [token] = Dialect.getOrRaise("snowflake").tokenize("'a\\\\d'");
    expect(token?.text).toBe("a\\\\d");
  });

  it("reads SAMPLE as a table sample", () => {
    expect(tokenTypes("t SAMPLE (10)", "snowflake")).toEqual([
      TokenType.VAR,
      TokenType.TABLE_SAMPLE,
      TokenType.L_PAREN,
      TokenType.NUMBER,
      TokenType.R_PAREN,
    ]);
  });

  it("reads Snowflake type aliases", () => {
    expect(tokenTypes("TIMESTAMP_NTZ NUMBER STRING", "snowflake")).toEqual([
      TokenType.TIMESTAMPNTZ,
      TokenType.DECIMAL,
      TokenType.TEXT,
    ]);
  });
});

// =============================================================================
// Keyword trie
// =============================================================================

describe("Trie", () => {
  const trie = newTrie(["CAT", "CAR"]);

  it("finds whole keys", () => {
    expect(inTrie(trie, "CAT")[0]).toBe(TrieResult.EXISTS);
  });

  it("finds prefixes", () => {
    expect(inTrie(trie, "CA")[0]).toBe(TrieResult.PREFIX);
  });

  it("fails on unknown keys", () => {
    expect(inTrie(trie, "DOG")[0]).toBe(TrieResult.FAILED);
    expect(inTrie(trie, "")[0]).toBe(TrieResult.FAILED);
  });
});
