/**
 * Data type rewrites: Snowflake's type names and precisions mapped onto the
 * types DuckDB stores with the same behavior.
 */

import * as exp from "../expressions.js";
import type { Rule } from "../pipeline.js";

/** Snowflake floats are 64 bit. */
export const floatToDouble: Rule = {
  name: "float_to_double",
  kinds: ["datatype"],
  apply(node) {
    if (node instanceof exp.DataType && node.isType(exp.DType.FLOAT)) {
      return exp.DataType.build(exp.DType.DOUBLE);
    }
    return node;
  },
};

/** Integers and scale-less decimals become BIGINT, which clients read back as int64. */
export const integerPrecision: Rule = {
  name: "integer_precision",
  kinds: ["datatype"],
  apply(node) {
    if (!(node instanceof exp.DataType)) return node;
    const bareDecimal = node.isType(exp.DType.DECIMAL) && node.params.length === 0;
    if (bareDecimal || node.isType(exp.DType.INT, exp.DType.SMALLINT, exp.DType.TINYINT)) {
      return exp.DataType.build(exp.DType.BIGINT);
    }
    return node;
  },
};

/** OBJECT, ARRAY and VARIANT are stored as JSON. */
export const semiStructuredTypes: Rule = {
  name: "semi_structured_types",
  kinds: ["datatype"],
  apply(node) {
    if (node instanceof exp.DataType && node.isType(exp.DType.ARRAY, exp.DType.OBJECT, exp.DType.VARIANT)) {
      return exp.DataType.build(exp.DType.JSON);
    }
    return node;
  },
};

/** `TIMESTAMP(9)` loses its precision; DuckDB timestamps are microsecond. */
export const timestampNtzNs: Rule = {
  name: "timestamp_ntz_ns",
  kinds: ["datatype"],
  apply(node) {
    if (
      node instanceof exp.DataType &&
      node.isType(exp.DType.TIMESTAMP) &&
      node.params.some((param) => param.isInt && param.name === "9")
    ) {
      return exp.DataType.build(exp.DType.TIMESTAMP);
    }
    return node;
  },
};
