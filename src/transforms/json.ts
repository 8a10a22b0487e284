/**
 * Semi-structured data. Snowflake VARIANT, OBJECT and ARRAY values live in DuckDB JSON
 * columns, so indexing, path access and the constructors all go through the JSON functions.
 */

import * as exp from "../expressions.js";
import type { Expression } from "../expressions.js";
import { logger } from "../logger.js";
import type { Rule } from "../pipeline.js";

/** `x[0]` and `x['k']` become `x -> '$[0]'` and `x -> '$.k'`; keys that are not plain words are quoted. */
export const indicesToJsonExtract: Rule = {
  name: "indices_to_json_extract",
  kinds: ["bracket"],
  apply(node) {
    const [index, ...rest] = node.expressions;
    if (rest.length > 0 || !(index instanceof exp.Literal) || !index.name) return node;
    const path = index.isString ? `$${exp.jsonPathKey(index.name)}` : `$[${index.name}]`;
    return new exp.JSONExtract({ this: node.this_, expression: new exp.JSONPath({ this: path }) });
  },
};

/** `x:k::VARCHAR` reads the text of the value rather than its JSON encoding. */
export const jsonExtractCastAsVarchar: Rule = {
  name: "json_extract_cast_as_varchar",
  kinds: ["cast"],
  apply(node) {
    if (!(node instanceof exp.Cast) || !node.to?.isType(exp.DType.VARCHAR, exp.DType.TEXT)) return node;
    const inner = node.this_;
    if (!(inner instanceof exp.JSONExtract) || !(inner.expression instanceof exp.JSONPath)) return node;
    return new exp.JSONExtractScalar({ this: inner.this_, expression: inner.expression });
  },
};

/** UPPER and LOWER turn a variant into text. */
export const jsonExtractCasedAsVarchar: Rule = {
  name: "json_extract_cased_as_varchar",
  kinds: ["upper", "lower"],
  apply(node) {
    const inner = node.this_;
    if (!(inner instanceof exp.JSONExtract) || !(inner.expression instanceof exp.JSONPath)) return node;
    return node.withArgs({
      this: new exp.JSONExtractScalar({ this: inner.this_, expression: inner.expression }),
    });
  },
};

/** `->` binds looser in DuckDB than in Snowflake. */
export const jsonExtractPrecedence: Rule = {
  name: "json_extract_precedence",
  kinds: ["jsonextract"],
  apply(node) {
    return new exp.Paren({ this: node });
  },
};

function flattenInput(explode: Expression): Expression | undefined {
  const input = explode.this_;
  if (input instanceof exp.Kwarg) {
    return input.expression;
  }
  return input;
}

/**
 * `LATERAL FLATTEN(input => x) f` unnests the JSON array `x`, one `VALUE` column per row.
 * The INDEX, KEY and PATH columns and flattening objects are not produced yet.
 */
export const flatten: Rule = {
  name: "flatten",
  kinds: ["lateral"],
  apply(node) {
    const explode = node.this_;
    const alias = node.arg("alias");
    if (!(explode instanceof exp.Explode) || !(alias instanceof exp.TableAlias)) return node;

    if (explode.expressions.length > 0) {
      logger.debug("rule", "FLATTEN options left as written", { rule: "flatten", options: explode.expressions.length });
      return node;
    }
    const input = flattenInput(explode);
    if (!input) return node;

    return new exp.Lateral({
      this: new exp.Unnest({
        expressions: [exp.cast(input, exp.DataType.arrayOf(exp.DataType.build(exp.DType.JSON)))],
      }),
      alias: new exp.TableAlias({
        this: alias.this_,
        columns: [new exp.Identifier({ this: "VALUE", quoted: false })],
      }),
    });
  },
};

/** OBJECT_CONSTRUCT omits keys whose value is NULL and returns a JSON object. */
export const objectConstruct: Rule = {
  name: "object_construct",
  kinds: ["struct"],
  apply(node) {
    const members = node.expressions.filter(
      (member) => !(member instanceof exp.PropertyEQ && member.expression instanceof exp.Null),
    );
    return new exp.Anonymous({ this: "TO_JSON", expressions: [node.withArgs({ expressions: members })] });
  },
};

export const tryParseJson: Rule = {
  name: "try_parse_json",
  kinds: ["anonymous"],
  apply(node) {
    if (!(node instanceof exp.Anonymous) || node.fnName !== "TRY_PARSE_JSON") return node;
    const [value] = node.expressions;
    if (!value) return node;
    return new exp.TryCast({ this: value, to: exp.DataType.build(exp.DType.JSON) });
  },
};

/** ARRAY_SIZE is NULL, not 0, for anything that is not an array. */
export const arraySize: Rule = {
  name: "array_size",
  kinds: ["arraysize"],
  apply(node) {
    const length = (): exp.Anonymous => new exp.Anonymous({ this: "json_array_length", expressions: [node.this_ ?? new exp.Null()] });
    return new exp.Case({ ifs: [new exp.If({ this: length(), true: length() })] });
  },
};

/** `ARRAY_AGG(x) WITHIN GROUP (ORDER BY y)` is `ARRAY_AGG(x ORDER BY y)` in DuckDB. */
export const arrayAggWithinGroup: Rule = {
  name: "array_agg_within_group",
  kinds: ["withingroup"],
  apply(node) {
    const agg = node.find(exp.ArrayAgg);
    const order = node.expression;
    if (!agg || !(order instanceof exp.Order)) return node;
    return new exp.ArrayAgg({
      this: new exp.Order({ this: agg.this_, expressions: order.expressions }),
    });
  },
};

export const arrayAggToJson: Rule = {
  name: "array_agg_to_json",
  kinds: ["arrayagg"],
  apply(node) {
    return new exp.Anonymous({ this: "TO_JSON", expressions: [node] });
  },
};
