/**
 * duckflake: translates Snowflake SQL into DuckDB SQL.
 *
 * Main entry point. Wires the generator into the expression module and exports the
 * public API.
 */

import { Dialect } from "./dialects/index.js";
import { MalformedInputError, type ErrorLevel } from "./errors.js";
import * as exp from "./expressions.js";
import type { Expression } from "./expressions.js";
import type { ParserOptions } from "./parser.js";
import { Pipeline, type Rule, type SideChannel } from "./pipeline.js";
import type { SessionContextInput } from "./config.js";
import { defaultRules } from "./transforms/index.js";

// --- Wire up the generator ---
exp._setSqlGenerator((expression, opts) =>
  Dialect.getOrRaise(opts.dialect).generate(expression, {
    pretty: opts.pretty,
    unsupportedLevel: opts.unsupportedLevel,
  }),
);

// --- Re-exports ---
export { TokenType, Token } from "./tokens.js";
export {
  ErrorLevel,
  TranslationError,
  ParseError,
  TokenError,
  GenerateError,
  UnsupportedError,
  MalformedInputError,
  AmbiguousContextError,
} from "./errors.js";
export { Dialect, DuckDB, Snowflake, type DialectType } from "./dialects/index.js";
export { Tokenizer } from "./tokenizer.js";
export { Parser, type ParserOptions } from "./parser.js";
export { Generator, type GeneratorOptions } from "./generator.js";
export {
  Pipeline,
  SideChannelBag,
  MISSING_DATABASE,
  MISSING_SCHEMA,
  resolveDatabase,
  resolveSchema,
  sessionContext,
  type ColumnComment,
  type PipelineResult,
  type Rule,
  type RuleScope,
  type SessionContext,
  type SideChannel,
  type TableComment,
  type TextLength,
} from "./pipeline.js";
export { logger, Logger } from "./logger.js";
export * as transforms from "./transforms/index.js";
export { defaultRules } from "./transforms/index.js";
export * from "./expressions.js";

// --- Top-level convenience functions ---

export interface ParseOptions extends ParserOptions {
  dialect?: string;
}

/** Parses a SQL string into one expression per statement; empty statements are `null`. */
export function parse(sql: string, opts: ParseOptions = {}): Array<Expression | null> {
  const { dialect, ...parserOpts } = opts;
  return Dialect.getOrRaise(dialect).parse(sql, parserOpts);
}

/** Parses a SQL string holding exactly one statement. */
export function parseOne(sql: string, opts: ParseOptions = {}): Expression {
  const statements = parse(sql, opts).filter((statement): statement is Expression => statement !== null);
  const [first, ...rest] = statements;
  if (!first) {
    throw new MalformedInputError(`No expression was parsed from: ${sql}`);
  }
  if (rest.length > 0) {
    throw new MalformedInputError(`Multiple expressions were parsed from: ${sql}. Use parse() instead.`);
  }
  return first;
}

export interface TranspileOptions {
  readDialect?: string;
  writeDialect?: string;
  pretty?: boolean;
  unsupportedLevel?: ErrorLevel;
}

/** Reads `sql` in one dialect and prints every statement in another. */
export function transpile(sql: string, opts: TranspileOptions = {}): string[] {
  const readDialect = Dialect.getOrRaise(opts.readDialect);
  const writeDialect = Dialect.getOrRaise(opts.writeDialect);

  return readDialect.parse(sql).map((expression) =>
    expression
      ? writeDialect.generate(expression, {
          pretty: opts.pretty,
          unsupportedLevel: opts.unsupportedLevel,
          copy: false,
        })
      : "",
  );
}

export interface TranslateOptions {
  context?: SessionContextInput;
  strictContext?: boolean;
  /** Replaces the default catalog. */
  rules?: readonly Rule[];
  pretty?: boolean;
  unsupportedLevel?: ErrorLevel;
}

export interface Translation {
  readonly sql: string;
  readonly tree: Expression;
  readonly sideChannel: SideChannel;
}

function translator(opts: TranslateOptions): (statement: Expression) => Translation {
  const pipeline = new Pipeline(opts.rules ?? defaultRules(), { strictContext: opts.strictContext });
  const duckdb = Dialect.getOrRaise("duckdb");
  return (statement) => {
    const { tree, sideChannel } = pipeline.translate(statement, opts.context);
    const sql = duckdb.generate(tree, { pretty: opts.pretty, unsupportedLevel: opts.unsupportedLevel });
    return Object.freeze({ sql, tree, sideChannel });
  };
}

/** Translates one Snowflake statement into DuckDB SQL plus the metadata DuckDB cannot hold. */
export function translate(sql: string, opts: TranslateOptions = {}): Translation {
  return translator(opts)(parseOne(sql, { dialect: "snowflake" }));
}

/** Translates every statement of a Snowflake script, in order. */
export function translateAll(sql: string, opts: TranslateOptions = {}): Translation[] {
  const translateStatement = translator(opts);
  return parse(sql, { dialect: "snowflake" })
    .filter((statement): statement is Expression => statement !== null)
    .map(translateStatement);
}
