import * as exp from "../expressions.js";
import type { Rule } from "../pipeline.js";

/**
 * Unquoted identifiers are case-insensitive in Snowflake and come back upper-cased in
 * result metadata; DuckDB keeps them as written. Upper-casing is idempotent.
 */
export const upperCaseUnquotedIdentifiers: Rule = {
  name: "upper_case_unquoted_identifiers",
  kinds: ["identifier"],
  apply(node) {
    if (!(node instanceof exp.Identifier) || node.quoted) return node;
    const upper = node.name.toUpperCase();
    return upper === node.name ? node : node.withArgs({ this: upper });
  },
};

/** `IDENTIFIER('t')` names the object `t`. */
export const identifier: Rule = {
  name: "identifier",
  kinds: ["anonymous"],
  apply(node) {
    if (!(node instanceof exp.Anonymous) || node.fnName !== "IDENTIFIER") return node;
    const [target] = node.expressions;
    if (!target?.isString) return node;
    return new exp.Identifier({ this: target.name, quoted: false });
  },
};

/**
 * Snowflake names the columns of an unaliased VALUES list COLUMN1, COLUMN2, ...;
 * DuckDB names them col0, col1, ...
 */
export const valuesColumns: Rule = {
  name: "values_columns",
  kinds: ["values"],
  apply(node, scope) {
    if (node.alias || !scope.ancestors.some((ancestor) => ancestor instanceof exp.Select)) {
      return node;
    }
    const firstRow = node.expressions.find((row) => row instanceof exp.Tuple);
    if (!firstRow) return node;

    const columns = firstRow.expressions.map(
      (_, i) => new exp.Identifier({ this: `COLUMN${i + 1}`, quoted: true }),
    );
    return node.withArgs({
      alias: new exp.TableAlias({ this: new exp.Identifier({ this: "_", quoted: false }), columns }),
    });
  },
};
