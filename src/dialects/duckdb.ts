/**
 * DuckDB dialect.
 *
 * DuckDB quotes identifiers with `"` and strings with `'`, prints arrays as `T[]`,
 * indexes lists from 1 and reads JSON through the `->` and `->>` operators.
 */

import * as exp from "../expressions.js";
import type { Expression } from "../expressions.js";
import { Generator } from "../generator.js";
import { Parser, type FunctionBuilder } from "../parser.js";
import { Dialect } from "./dialect.js";

// Types that lose their size/precision parameters (e.g., VARCHAR(5) -> TEXT)
const PARAMETERLESS_TYPES: ReadonlySet<string> = new Set(["TEXT", "TIME"]);

// ---------------------------------------------------------------------------
// DuckDB Parser
// ---------------------------------------------------------------------------

class DuckDBParser extends Parser {
  static override FUNCTIONS: Record<string, FunctionBuilder> = {
    ...Parser.FUNCTIONS,
    REGEXP_EXTRACT: (args) =>
      new exp.RegexpExtract({ this: args[0], expression: args[1], group: args[2] }),
    REGEXP_REPLACE: (args) =>
      new exp.RegexpReplace({
        this: args[0],
        expression: args[1],
        replacement: args[2],
        modifiers: args[3],
      }),
    STRPTIME: (args) => new exp.StrToTime({ this: args[0], format: args[1] }),
    TO_TIMESTAMP: (args) => new exp.UnixToTime({ this: args[0] }),
  };
}

// ---------------------------------------------------------------------------
// DuckDB Generator
// ---------------------------------------------------------------------------

class DuckDBGenerator extends Generator {
  static override TYPE_MAP: Record<string, string> = {
    BINARY: "BLOB",
    VARBINARY: "BLOB",
    CHAR: "TEXT",
    NCHAR: "TEXT",
    NVARCHAR: "TEXT",
    VARCHAR: "TEXT",
    DATETIME: "TIMESTAMP",
    TIMESTAMPLTZ: "TIMESTAMPTZ",
    FLOAT: "REAL",
  };

  static override PARAMETERLESS_TYPES: ReadonlySet<string> = PARAMETERLESS_TYPES;

  /** `inner[]` */
  override nestedTypeSql(expression: exp.DataType): string {
    return `${this.expressions(expression)}[]`;
  }

  /** Integer literal indexes shift from 0-based to 1-based; slices print as written. */
  override bracketSql(expression: Expression): string {
    const items = expression.expressions.map((item) =>
      item instanceof exp.Literal && item.isInt ? String(BigInt(item.name) + 1n) : this.sql(item),
    );
    return `${this.sql(expression, "this")}[${items.join(", ")}]`;
  }

  /** `{'key': value, ...}` */
  structSql(expression: Expression): string {
    const members = expression.expressions.map((member) => {
      if (member instanceof exp.PropertyEQ) {
        return `${this.quoteString(member.this_?.name ?? "")}: ${this.sql(member, "expression")}`;
      }
      return this.sql(member);
    });
    return `{${members.join(", ")}}`;
  }

  parsejsonSql(expression: Expression): string {
    return this.func("JSON", expression.this_);
  }

  override strtotimeSql(expression: Expression): string {
    return this.func("STRPTIME", expression.this_, expression.arg("format"));
  }

  override unixtotimeSql(expression: Expression): string {
    const scale = expression.arg("scale");
    if (!scale || scale.name === "0") {
      return this.func("TO_TIMESTAMP", expression.this_);
    }
    if (scale.name === "3") {
      return this.func("EPOCH_MS", expression.this_);
    }
    return `TO_TIMESTAMP(${this.sql(expression, "this")} / POWER(10, ${this.sql(scale)}))`;
  }

  regexpreplaceSql(expression: Expression): string {
    if (expression.arg("position") || expression.arg("occurrence")) {
      this.unsupported("REGEXP_REPLACE position and occurrence");
    }
    return this.func(
      "REGEXP_REPLACE",
      expression.this_,
      expression.expression,
      expression.arg("replacement"),
      expression.arg("modifiers"),
    );
  }

  regexpextractSql(expression: Expression): string {
    if (expression.arg("position") || expression.arg("occurrence") || expression.arg("parameters")) {
      this.unsupported("REGEXP_EXTRACT position, occurrence and parameters");
    }
    return this.func("REGEXP_EXTRACT", expression.this_, expression.expression, expression.arg("group"));
  }

  override tablesampleSql(expression: Expression): string {
    const method = this.sql(expression, "method");
    const unit = expression.flag("rows") ? "ROWS" : "PERCENT";
    const seed = this.sql(expression, "seed");
    return `USING SAMPLE ${method ? `${method} ` : ""}(${this.sql(expression, "size")} ${unit})${seed ? ` REPEATABLE (${seed})` : ""}`;
  }

  override columnconstraintSql(expression: exp.ColumnConstraint): string {
    if (expression.kind === "COMMENT" || expression.kind === "AUTOINCREMENT") {
      this.unsupported(`Column constraint ${expression.kind}`);
      return "";
    }
    return super.columnconstraintSql(expression);
  }

  override propertySql(expression: Expression): string {
    this.unsupported(`Table property ${this.sql(expression, "this")}`);
    return "";
  }

  override schemacommentpropertySql(_expression: Expression): string {
    this.unsupported("Table comment");
    return "";
  }

  override transientSql(_expression: Expression): string {
    return "";
  }
}

// ---------------------------------------------------------------------------
// DuckDB Dialect
// ---------------------------------------------------------------------------

export class DuckDB extends Dialect {
  static override ParserClass: typeof Parser = DuckDBParser;
  static override GeneratorClass: typeof Generator = DuckDBGenerator;
}

Dialect.register("duckdb", DuckDB);
