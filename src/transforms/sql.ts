import { MalformedInputError } from "../errors.js";
import type { Expression } from "../expressions.js";
import { DuckDB } from "../dialects/duckdb.js";

const BARE_IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/** `'value'` with embedded quotes doubled. */
export function sqlString(value: string): string {
  return `'${value.split("'").join("''")}'`;
}

/** `name` bare when it is a plain word, else double-quoted with `"` doubled. */
export function sqlIdentifier(name: string): string {
  return BARE_IDENTIFIER_RE.test(name) ? name : `"${name.split('"').join('""')}"`;
}

const duckdb = new DuckDB();

/** Parses one DuckDB statement built by a rule. */
export function parseDuckDB(sql: string): Expression {
  const [statement] = duckdb.parse(sql);
  if (!statement) {
    throw new MalformedInputError(`Could not build statement from: ${sql}`);
  }
  return statement;
}
