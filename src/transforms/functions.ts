import { UnsupportedError } from "../errors.js";
import * as exp from "../expressions.js";
import type { Expression } from "../expressions.js";
import type { Rule } from "../pipeline.js";

const MAX_BIGINT = "9223372036854775807";
const MAX_INTEGER = "2147483647";

/** Snowflake string constants escape backslashes in patterns once more than DuckDB's. */
export function unescapePattern(pattern: string): string {
  return pattern.split("\\\\").join("\\");
}

function unescapedLiteral(pattern: Expression): Expression {
  return pattern.isString ? exp.Literal.string(unescapePattern(pattern.name)) : pattern;
}

// ---------------------------------------------------------------------------
// Regular expressions
// ---------------------------------------------------------------------------

/** REGEXP_REPLACE replaces every match and defaults the replacement to the empty string. */
export const regexReplace: Rule = {
  name: "regex_replace",
  kinds: ["regexpreplace"],
  apply(node) {
    const pattern = node.expression;
    if (!(pattern instanceof exp.Literal)) return node;
    if (node.arg("position") || node.arg("occurrence") || node.arg("modifiers")) {
      throw new UnsupportedError(
        "REGEXP_REPLACE with additional parameters (eg: <position>, <occurrence>, <parameters>) not supported",
      );
    }
    return node.withArgs({
      expression: unescapedLiteral(pattern),
      replacement: node.arg("replacement") ?? exp.Literal.string(""),
      modifiers: exp.Literal.string("g"),
    });
  },
};

/**
 * `REGEXP_SUBSTR(s, p, position, occurrence, params, group)` as
 * `REGEXP_EXTRACT_ALL(s[position:], p, group, params)[occurrence - 1]`.
 */
export const regexSubstr: Rule = {
  name: "regex_substr",
  kinds: ["regexpextract"],
  apply(node) {
    const subject = node.this_;
    const pattern = node.expression;
    if (!subject || !pattern) return node;

    const position = node.arg("position") ?? exp.Literal.number(1);

    const occurrenceArg = node.arg("occurrence");
    if (occurrenceArg && !occurrenceArg.isInt) {
      throw new UnsupportedError("REGEXP_SUBSTR with a non-constant occurrence not supported");
    }
    const occurrence = occurrenceArg ? Number(occurrenceArg.name) : 1;

    // 'e' (extract a sub-match) is expressed through the group number instead
    const parameters = node.arg("parameters")?.name ?? "";
    const group = node.arg("group") ?? exp.Literal.number(parameters.includes("e") ? 1 : 0);

    const extractAll = new exp.Anonymous({
      this: "regexp_extract_all",
      expressions: [
        new exp.Bracket({ this: subject, expressions: [new exp.Slice({ this: position })] }),
        unescapedLiteral(pattern),
        group,
        exp.Literal.string(parameters.split("e").join("")),
      ],
    });
    // DuckDB lists are 1-based; the generator adds the 1 back
    return new exp.Bracket({ this: extractAll, expressions: [exp.Literal.number(occurrence - 1)] });
  },
};

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

/** TO_DATE drops the time part. */
export const toDate: Rule = {
  name: "to_date",
  kinds: ["anonymous"],
  apply(node) {
    if (!(node instanceof exp.Anonymous) || node.fnName !== "TO_DATE") return node;
    const [value] = node.expressions;
    if (!value) return node;
    return exp.cast(
      new exp.DateTrunc({ unit: exp.Literal.string("day"), this: value }),
      exp.DataType.build(exp.DType.DATE),
    );
  },
};

interface DecimalArgs {
  value?: Expression;
  precision?: Expression;
  scale?: Expression;
}

function decimalArgs(node: Expression): DecimalArgs | undefined {
  if (node instanceof exp.ToNumber) {
    if (node.arg("format")) {
      throw new UnsupportedError("TO_NUMBER with format argument not supported");
    }
    return { value: node.this_, precision: node.arg("precision"), scale: node.arg("scale") };
  }
  if (node instanceof exp.Anonymous && (node.fnName === "TO_DECIMAL" || node.fnName === "TO_NUMERIC")) {
    const [value, precision, scale] = node.expressions;
    if (precision?.isString) {
      throw new UnsupportedError(`${node.fnName} with format argument not supported`);
    }
    return { value, precision, scale };
  }
  return undefined;
}

/** TO_NUMBER, TO_DECIMAL and TO_NUMERIC cast to `DECIMAL(precision, scale)`, by default (38, 0). */
export const toDecimal: Rule = {
  name: "to_decimal",
  kinds: ["tonumber", "anonymous"],
  apply(node) {
    const args = decimalArgs(node);
    if (!args?.value) return node;
    if (args.scale?.isString) {
      throw new UnsupportedError("TO_DECIMAL with a non-numeric scale not supported");
    }
    const precision = args.precision ?? exp.Literal.number(38);
    const scale = args.scale ?? exp.Literal.number(0);
    return exp.cast(args.value, exp.DataType.build(exp.DType.DECIMAL, [precision, scale]));
  },
};

/** Epoch-based TO_TIMESTAMP returns a TIMESTAMP, where DuckDB's returns TIMESTAMPTZ. */
export const toTimestamp: Rule = {
  name: "to_timestamp",
  kinds: ["unixtotime"],
  apply(node) {
    return exp.cast(node, exp.DataType.build(exp.DType.TIMESTAMP));
  },
};

export const toTimestampNtz: Rule = {
  name: "to_timestamp_ntz",
  kinds: ["anonymous"],
  apply(node) {
    if (!(node instanceof exp.Anonymous) || node.fnName !== "TO_TIMESTAMP_NTZ") return node;
    const [value] = node.expressions;
    if (!value) return node;
    return new exp.StrToTime({ this: value, format: exp.Literal.string("%Y-%m-%d %H:%M:%S") });
  },
};

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

function isShiftedRandom(ancestors: readonly Expression[]): boolean {
  const [sub, , mul] = ancestors;
  return (
    sub instanceof exp.Sub &&
    sub.expression?.name === "0.5" &&
    mul instanceof exp.Mul &&
    mul.expression?.name === MAX_BIGINT
  );
}

/** `(RANDOM() - 0.5) * 2^63` as a BIGINT. */
function shiftedRandom(): Expression {
  return exp.cast(
    new exp.Paren({
      this: new exp.Mul({
        this: new exp.Paren({ this: new exp.Sub({ this: new exp.Rand(), expression: exp.Literal.number("0.5") }) }),
        expression: exp.Literal.number(MAX_BIGINT),
      }),
    }),
    exp.DataType.build(exp.DType.BIGINT),
  );
}

/**
 * Snowflake RANDOM() is a signed 64 bit integer; DuckDB's is a double in [0, 1) seeded
 * through `setseed`. A literal seed is scaled into (-0.5, 0.5] and left on the root
 * statement's `seed` argument for the caller to run before the query. The first seed in
 * the statement wins.
 */
export const random: Rule = {
  name: "random",
  kinds: ["select", "union", "intersect", "except", "insert", "update", "delete", "create"],
  apply(node, scope) {
    if (scope.ancestors.length > 0) return node;
    const seeds: string[] = [];
    const rewritten = node.transform((inner, ancestors) => {
      if (!(inner instanceof exp.Rand) || isShiftedRandom(ancestors)) return inner;
      const literal = inner.this_;
      if (literal instanceof exp.Literal) {
        seeds.push(`${literal.name}/${MAX_INTEGER}-0.5`);
      }
      return shiftedRandom();
    });
    const [seed] = seeds;
    if (rewritten === node || seed === undefined) return rewritten;
    return rewritten.withArgs({ seed });
  },
};

/** Snowflake samples rows (BERNOULLI) unless told otherwise; DuckDB defaults to SYSTEM. */
export const sample: Rule = {
  name: "sample",
  kinds: ["tablesample"],
  apply(node) {
    return node.args["method"] ? node : node.withArgs({ method: "BERNOULLI" });
  },
};
