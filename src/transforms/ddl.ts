/**
 * DDL rewrites. DuckDB has no table or column comments, no fixed-size text and no tags,
 * so those parts are lifted into the side channel or turned into a no-op.
 */

import { join } from "node:path";

import { MalformedInputError } from "../errors.js";
import * as exp from "../expressions.js";
import type { Expression } from "../expressions.js";
import type { ColumnComment, Rule, RuleScope, TextLength } from "../pipeline.js";
import { sqlIdentifier, sqlString } from "./sql.js";

/** Snowflake's VARCHAR without a length holds 16 MB. */
export const DEFAULT_TEXT_LENGTH = 16777216;

/** `CREATE DATABASE d` attaches a new database file, or an in-memory one without a path. */
export const createDatabase: Rule = {
  name: "create_database",
  kinds: ["create"],
  apply(node, scope) {
    if (!(node instanceof exp.Create) || node.kind !== "DATABASE") return node;
    const identifier = node.find(exp.Identifier);
    if (!identifier) {
      throw new MalformedInputError("CREATE DATABASE without a database name");
    }
    const name = identifier.name;
    const directory = scope.context.databaseFilePath;
    const file = directory ? join(directory, `${name}.db`) : ":memory:";

    scope.sideChannel.setCreateDbName(name);
    return new exp.Command({
      this: "ATTACH",
      expression: `DATABASE ${sqlString(file)} AS ${sqlIdentifier(name)}`,
    });
  },
};

/** Snowflake drops a schema with its tables; DuckDB refuses unless told to cascade. */
export const dropSchemaCascade: Rule = {
  name: "drop_schema_cascade",
  kinds: ["drop"],
  apply(node) {
    if (!(node instanceof exp.Drop) || node.kind !== "SCHEMA" || node.flag("cascade")) return node;
    return node.withArgs({ cascade: true });
  },
};

function commentText(value: Expression | undefined): string | undefined {
  if (value instanceof exp.Literal || value instanceof exp.Identifier) {
    return value.name;
  }
  return undefined;
}

/** `ALTER TABLE t ALTER COLUMN c COMMENT 'x'` */
export const extractCommentOnColumns: Rule = {
  name: "extract_comment_on_columns",
  kinds: ["alter"],
  apply(node, scope) {
    if (!(node instanceof exp.Alter)) return node;

    const comments: ColumnComment[] = [];
    const remaining = node.actions.filter((action) => {
      const text = action instanceof exp.AlterColumn ? commentText(action.arg("comment")) : undefined;
      if (text === undefined) return true;
      comments.push({ column: action.this_?.name ?? "", text });
      return false;
    });
    if (comments.length === 0) return node;

    scope.sideChannel.setColumnComments(comments);
    return remaining.length > 0 ? node.withArgs({ actions: remaining }) : exp.successNop();
  },
};

function createTableComment(node: exp.Create, table: exp.Table, scope: RuleScope): Expression {
  const properties = node.arg("properties")?.expressions ?? [];
  const comment = properties.find(
    (property) => property instanceof exp.SchemaCommentProperty && commentText(property.this_) !== undefined,
  );
  const text = commentText(comment?.this_);
  if (!comment || text === undefined) return node;
  const others = properties.filter((property) => property !== comment);

  scope.sideChannel.setTableComment({ table, text });
  return node.withArgs({
    properties: others.length > 0 ? new exp.Properties({ expressions: others }) : undefined,
  });
}

function isCommentAssignment(item: Expression): item is exp.EQ {
  return item instanceof exp.EQ && item.this_?.name.toUpperCase() === "COMMENT";
}

/**
 * A table comment given in `CREATE TABLE ... COMMENT = 'x'`, `COMMENT ON TABLE t IS 'x'`
 * or `ALTER TABLE t SET COMMENT = 'x'`.
 */
export const extractCommentOnTable: Rule = {
  name: "extract_comment_on_table",
  kinds: ["create", "comment", "alter"],
  apply(node, scope) {
    if (node instanceof exp.Create) {
      const table = node.find(exp.Table);
      return table ? createTableComment(node, table, scope) : node;
    }

    if (node instanceof exp.Comment) {
      const text = commentText(node.expression);
      const table = node.this_;
      if (node.kind !== "TABLE" || text === undefined || !(table instanceof exp.Table)) return node;
      scope.sideChannel.setTableComment({ table, text });
      return exp.successNop();
    }

    const target = node.this_;
    if (node instanceof exp.Alter && target instanceof exp.Table) {
      for (const action of node.actions) {
        if (!(action instanceof exp.SetAction) || action.flag("tag") || action.flag("unset")) continue;
        const assignment = action.expressions.find(isCommentAssignment);
        const text = commentText(assignment?.expression);
        if (text !== undefined) {
          scope.sideChannel.setTableComment({ table: target, text });
          return exp.successNop();
        }
      }
    }
    return node;
  },
};

function columnOf(dataType: exp.DataType): string | undefined {
  const owner = dataType.parent;
  if (owner instanceof exp.ColumnDef) return owner.name;
  if (owner instanceof exp.AlterColumn) return owner.this_?.name;
  return undefined;
}

/** Records the declared length of every text column; DuckDB text has none. */
export const extractTextLength: Rule = {
  name: "extract_text_length",
  kinds: ["create", "alter"],
  apply(node, scope) {
    const lengths: TextLength[] = [];
    for (const dataType of node.findAll(exp.DataType)) {
      if (!dataType.isType(exp.DType.VARCHAR, exp.DType.TEXT)) continue;
      const column = columnOf(dataType);
      if (column === undefined) continue;
      const [size] = dataType.params;
      lengths.push({ column, length: size?.isInt ? Number(size.name) : DEFAULT_TEXT_LENGTH });
    }
    if (lengths.length > 0) {
      scope.sideChannel.setTextLengths(lengths);
    }
    return node;
  },
};

/** Tags are accepted and not stored. */
export const tag: Rule = {
  name: "tag",
  kinds: ["alter", "command"],
  apply(node) {
    if (node instanceof exp.Alter) {
      const setsTag = node.actions.some((action) => action instanceof exp.SetAction && action.flag("tag"));
      return setsTag ? exp.successNop() : node;
    }
    if (node instanceof exp.Command && node.rest.toUpperCase().includes("SET TAG")) {
      return exp.successNop();
    }
    return node;
  },
};
