/**
 * Snowflake dialect.
 *
 * Snowflake escapes quotes in strings with `\` as well as `''`, accepts `//` line comments,
 * reads `col:path` as a JSON extraction and names its semi-structured types OBJECT, ARRAY
 * and VARIANT.
 */

import * as exp from "../expressions.js";
import type { Expression } from "../expressions.js";
import { Generator } from "../generator.js";
import { Parser, type FunctionBuilder } from "../parser.js";
import { Tokenizer } from "../tokenizer.js";
import { TokenType } from "../tokens.js";
import { Dialect } from "./dialect.js";

// ---------------------------------------------------------------------------
// Snowflake Tokenizer
// ---------------------------------------------------------------------------

class SnowflakeTokenizer extends Tokenizer {
  static override STRING_ESCAPES: string[] = ["\\", "'"];
  static override COMMENTS: Array<string | [string, string]> = ["--", "//", ["/*", "*/"]];

  static override KEYWORDS: Record<string, TokenType> = {
    ...Tokenizer.KEYWORDS,
    SAMPLE: TokenType.TABLE_SAMPLE,
  };
}

// ---------------------------------------------------------------------------
// Snowflake Parser
// ---------------------------------------------------------------------------

function anonymous(name: string, args: Expression[]): exp.Anonymous {
  return new exp.Anonymous({ this: name, expressions: args });
}

/** `TO_TIMESTAMP(<epoch>[, scale])` reads as a unix time; other forms stay as written. */
function buildToTimestamp(args: Expression[]): Expression {
  const [value, scale] = args;
  if (value?.isNumber && (!scale || scale.isInt)) {
    return new exp.UnixToTime({ this: value, scale });
  }
  return anonymous("TO_TIMESTAMP", args);
}

/** `GET_PATH(x, 'a.b')` is the function form of `x:a.b`. */
function buildGetPath(args: Expression[]): Expression {
  const [value, path] = args;
  if (!value || !path?.isString || args.length !== 2) {
    return anonymous("GET_PATH", args);
  }
  const text = path.name.startsWith("[") ? `$${path.name}` : `$.${path.name}`;
  return new exp.JSONExtract({ this: value, expression: new exp.JSONPath({ this: text }) });
}

/** `OBJECT_CONSTRUCT('k1', v1, 'k2', v2)` pairs keys with values. */
function buildObjectConstruct(args: Expression[]): Expression {
  if (args.length % 2 !== 0 || args.some((arg) => arg instanceof exp.Star)) {
    return anonymous("OBJECT_CONSTRUCT", args);
  }
  const members: exp.PropertyEQ[] = [];
  for (let i = 0; i < args.length; i += 2) {
    members.push(new exp.PropertyEQ({ this: args[i], expression: args[i + 1] }));
  }
  return new exp.Struct({ expressions: members });
}

/** `TO_NUMBER(x[, format][, precision[, scale]])` */
function buildToNumber(args: Expression[]): Expression {
  const [value, second, third, fourth] = args;
  if (second?.isString) {
    return new exp.ToNumber({ this: value, format: second, precision: third, scale: fourth });
  }
  return new exp.ToNumber({ this: value, precision: second, scale: third });
}

class SnowflakeParser extends Parser {
  static override COLON_IS_JSON_EXTRACT = true;

  static override FUNCTIONS: Record<string, FunctionBuilder> = {
    ...Parser.FUNCTIONS,
    GET_PATH: buildGetPath,
    OBJECT_CONSTRUCT: buildObjectConstruct,
    TO_NUMBER: buildToNumber,
    TO_TIMESTAMP: buildToTimestamp,
  };
}

// ---------------------------------------------------------------------------
// Snowflake Generator
// ---------------------------------------------------------------------------

class SnowflakeGenerator extends Generator {
  static override TYPE_MAP: Record<string, string> = {
    STRUCT: "OBJECT",
    TEXT: "VARCHAR",
  };

  static override SAMPLE_KEYWORD = "SAMPLE";

  override nestedTypeSql(_expression: exp.DataType): string {
    return "ARRAY";
  }

  override ifSql(expression: Expression): string {
    return this.func("IFF", expression.this_, expression.arg("true"), expression.arg("false"));
  }

  /** Path text without its `$` root, as GET_PATH takes it. */
  private pathText(expression: Expression): string {
    const path = expression.expression?.name ?? "";
    return this.quoteString(path.replace(/^\$\.?/, ""));
  }

  override jsonextractSql(expression: Expression): string {
    return `GET_PATH(${this.sql(expression, "this")}, ${this.pathText(expression)})`;
  }

  override jsonextractscalarSql(expression: Expression): string {
    return `JSON_EXTRACT_PATH_TEXT(${this.sql(expression, "this")}, ${this.pathText(expression)})`;
  }

  structSql(expression: Expression): string {
    const args = expression.expressions.flatMap((member) =>
      member instanceof exp.PropertyEQ
        ? [this.sql(member, "this"), this.sql(member, "expression")]
        : [this.sql(member)],
    );
    return `OBJECT_CONSTRUCT(${args.join(", ")})`;
  }
}

// ---------------------------------------------------------------------------
// Snowflake Dialect
// ---------------------------------------------------------------------------

export class Snowflake extends Dialect {
  static override TokenizerClass: typeof Tokenizer = SnowflakeTokenizer;
  static override ParserClass: typeof Parser = SnowflakeParser;
  static override GeneratorClass: typeof Generator = SnowflakeGenerator;
}

Dialect.register("snowflake", Snowflake);
