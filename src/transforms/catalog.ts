/**
 * Catalog statements: USE, DESCRIBE, SHOW and CREATE USER, answered from DuckDB's
 * information schema and the extension tables the host keeps beside it.
 */

import { MalformedInputError, UnsupportedError } from "../errors.js";
import * as exp from "../expressions.js";
import type { Expression } from "../expressions.js";
import { resolveDatabase, resolveSchema, type Rule } from "../pipeline.js";
import { parseDuckDB, sqlString } from "./sql.js";

export const USERS_TABLE = "_fs_global._fs_information_schema._fs_users_ext";

const HIDDEN_TABLES = "'_fs_%'";

// ---------------------------------------------------------------------------
// USE
// ---------------------------------------------------------------------------

/**
 * `USE DATABASE d` selects `d.main`; `USE SCHEMA s` selects `s` in the given or the current
 * database. The current database is used as given, so callers pass it upper-cased to match
 * the statement's unquoted names.
 */
export const setSchema: Rule = {
  name: "set_schema",
  kinds: ["use"],
  apply(node, scope) {
    if (!(node instanceof exp.Use) || (node.kind !== "SCHEMA" && node.kind !== "DATABASE")) return node;
    const target = node.this_;
    if (!(target instanceof exp.Table) || !target.name) {
      throw new MalformedInputError(`USE ${node.kind} without a name`);
    }

    let name: string;
    if (node.kind === "DATABASE") {
      name = `${target.name}.main`;
    } else {
      const database = target.db || resolveDatabase(scope, `USE SCHEMA ${target.name}`);
      name = `${database}.${target.name}`;
    }
    return new exp.Command({ this: "SET", expression: `schema = ${sqlString(name)}` });
  },
};

// ---------------------------------------------------------------------------
// DESCRIBE
// ---------------------------------------------------------------------------

function describeSql(catalog: string, schema: string, table: string): string {
  return `
SELECT
    column_name AS "name",
    CASE WHEN data_type = 'NUMBER' THEN 'NUMBER(' || numeric_precision || ',' || numeric_scale || ')'
         WHEN data_type = 'TEXT' THEN 'VARCHAR(' || coalesce(character_maximum_length, 16777216) || ')'
         WHEN data_type = 'TIMESTAMP_NTZ' THEN 'TIMESTAMP_NTZ(9)'
         WHEN data_type = 'TIMESTAMP_TZ' THEN 'TIMESTAMP_TZ(9)'
         WHEN data_type = 'TIME' THEN 'TIME(9)'
         WHEN data_type = 'BINARY' THEN 'BINARY(8388608)'
        ELSE data_type END AS "type",
    'COLUMN' AS "kind",
    CASE WHEN is_nullable = 'YES' THEN 'Y' ELSE 'N' END AS "null?",
    column_default AS "default",
    'N' AS "primary key",
    'N' AS "unique key",
    NULL AS "check",
    NULL AS "expression",
    NULL AS "comment",
    NULL AS "policy name",
    NULL AS "privacy domain",
FROM information_schema._fs_columns_snowflake
WHERE table_catalog = ${sqlString(catalog)} AND table_schema = ${sqlString(schema)} AND table_name = ${sqlString(table)}
ORDER BY ordinal_position`;
}

/** `DESCRIBE TABLE t` and `DESCRIBE VIEW v` list columns the way Snowflake types them. */
export const describeTable: Rule = {
  name: "describe_table",
  kinds: ["describe"],
  apply(node, scope) {
    if (!(node instanceof exp.Describe) || (node.kind !== "TABLE" && node.kind !== "VIEW")) return node;
    const table = node.this_;
    if (!(table instanceof exp.Table)) return node;

    const statement = `DESCRIBE ${node.kind} ${table.name}`;
    const catalog = table.catalog || resolveDatabase(scope, statement);
    const schema = table.db || resolveSchema(scope, statement);
    return parseDuckDB(describeSql(catalog, schema, table.name));
  },
};

// ---------------------------------------------------------------------------
// SHOW
// ---------------------------------------------------------------------------

function showKind(node: Expression): string {
  return node instanceof exp.Show ? node.name.toUpperCase() : "";
}

function limitClause(node: Expression): string {
  const count = node.arg("limit")?.expression;
  return count?.isInt ? ` LIMIT ${count.name}` : "";
}

/** `SHOW [TERSE] OBJECTS|TABLES [IN DATABASE d | IN SCHEMA [d.]s] [LIMIT n]` */
export const showObjectsTables: Rule = {
  name: "show_objects_tables",
  kinds: ["show"],
  apply(node, scope) {
    const kind = showKind(node);
    if (!(node instanceof exp.Show) || (kind !== "OBJECTS" && kind !== "TABLES")) return node;

    const target = node.arg("scope");
    const table = target instanceof exp.Table ? target : undefined;
    let catalog: string | undefined;
    let schema: string | undefined;
    if (node.scopeKind === "DATABASE") {
      catalog = table?.name || scope.context.currentDatabase;
    } else if (node.scopeKind === "SCHEMA" && table) {
      catalog = table.db || scope.context.currentDatabase;
      schema = table.name;
    }

    const columns = [
      "to_timestamp(0)::timestamptz as 'created_on'",
      "table_name as 'name'",
      "case when table_type='BASE TABLE' then 'TABLE' else table_type end as 'kind'",
      "table_catalog as 'database_name'",
      "table_schema as 'schema_name'",
    ];
    if (!node.flag("terse")) {
      columns.push('null as "comment"');
    }

    const filters = [
      kind === "TABLES" ? "table_type = 'BASE TABLE' and " : "",
      `not (table_schema == 'information_schema' and table_name like ${HIDDEN_TABLES})`,
      catalog ? ` and table_catalog = ${sqlString(catalog)}` : "",
      schema ? ` and table_schema = ${sqlString(schema)}` : "",
    ];
    return parseDuckDB(
      `SELECT ${columns.join(", ")} from information_schema.tables where ${filters.join("")}${limitClause(node)}`,
    );
  },
};

const SHOW_SCHEMAS_SQL = `
select
    to_timestamp(0)::timestamptz as 'created_on',
    schema_name as 'name',
    NULL as 'kind',
    catalog_name as 'database_name',
    NULL as 'schema_name'
from information_schema.schemata
where catalog_name not in ('memory', 'system', 'temp') and schema_name not in ('main', 'pg_catalog')`;

/** `SHOW SCHEMAS [IN DATABASE d]`, in the current database when there is one. */
export const showSchemas: Rule = {
  name: "show_schemas",
  kinds: ["show"],
  apply(node, scope) {
    if (showKind(node) !== "SCHEMAS") return node;
    const database = node.find(exp.Identifier)?.name || scope.context.currentDatabase;
    return parseDuckDB(database ? `${SHOW_SCHEMAS_SQL} and catalog_name = ${sqlString(database)}` : SHOW_SCHEMAS_SQL);
  },
};

export type KeyKind = "PRIMARY" | "UNIQUE" | "FOREIGN";

const CONSTRAINT_NAME =
  "LOWER(CONCAT(database_name, '_', schema_name, '_', table_name, '_pkey'))";

function keyColumns(kind: KeyKind): string {
  if (kind === "FOREIGN") {
    return [
      "to_timestamp(0)::timestamptz as created_on",
      "'' as pk_database_name",
      "'' as pk_schema_name",
      "'' as pk_table_name",
      "unnest(constraint_column_names) as pk_column_name",
      "database_name as fk_database_name",
      "schema_name as fk_schema_name",
      "table_name as fk_table_name",
      "unnest(constraint_column_names) as fk_column_name",
      "1 as key_sequence",
      "'NO ACTION' as update_rule",
      "'NO ACTION' as delete_rule",
      `${CONSTRAINT_NAME} AS fk_name`,
      `${CONSTRAINT_NAME} AS pk_name`,
      "'NOT DEFERRABLE' as deferrability",
      "'false' as rely",
      'null as "comment"',
    ].join(", ");
  }
  return [
    "to_timestamp(0)::timestamptz as created_on",
    "database_name as database_name",
    "schema_name as schema_name",
    "table_name as table_name",
    "unnest(constraint_column_names) as column_name",
    "1 as key_sequence",
    `${CONSTRAINT_NAME} AS constraint_name`,
    "'false' as rely",
    'null as "comment"',
  ].join(", ");
}

/**
 * `SHOW PRIMARY KEYS`, `SHOW UNIQUE KEYS` and `SHOW IMPORTED KEYS` (foreign keys) read
 * `duckdb_constraints` in the current database, optionally narrowed to one schema.
 */
export function showKeys(kind: KeyKind): Rule {
  const shown = `${kind === "FOREIGN" ? "IMPORTED" : kind} KEYS`;
  return {
    name: `show_keys_${kind.toLowerCase()}`,
    kinds: ["show"],
    apply(node, scope) {
      if (!(node instanceof exp.Show) || showKind(node) !== shown) return node;

      const database = resolveDatabase(scope, `SHOW ${shown}`);
      let statement =
        `SELECT ${keyColumns(kind)} FROM duckdb_constraints` +
        ` WHERE constraint_type = ${sqlString(`${kind} KEY`)}` +
        ` AND database_name = ${sqlString(database)}` +
        ` AND table_name NOT LIKE ${HIDDEN_TABLES}`;

      const scopeKind = node.scopeKind;
      if (scopeKind === "SCHEMA") {
        const target = node.arg("scope");
        if (target instanceof exp.Table) {
          if (target.db) statement += ` AND database_name = ${sqlString(target.db)}`;
          if (target.name) statement += ` AND schema_name = ${sqlString(target.name)}`;
        }
      } else if (scopeKind) {
        throw new UnsupportedError(`SHOW ${shown} with ${scopeKind} not yet supported`);
      }
      return parseDuckDB(statement);
    },
  };
}

export const showUsers: Rule = {
  name: "show_users",
  kinds: ["show"],
  apply(node) {
    return showKind(node) === "USERS" ? parseDuckDB(`SELECT * FROM ${USERS_TABLE}`) : node;
  },
};

/** `CREATE USER name` registers the user; options such as PASSWORD are not supported. */
export const createUser: Rule = {
  name: "create_user",
  kinds: ["command"],
  apply(node) {
    if (!(node instanceof exp.Command) || node.name.toUpperCase() !== "CREATE") return node;
    const [keyword, name, ...rest] = node.rest.trim().split(/\s+/);
    if (keyword?.toUpperCase() !== "USER") return node;
    if (!name) {
      throw new MalformedInputError("CREATE USER without a user name");
    }
    if (rest.length > 0) {
      throw new UnsupportedError(`CREATE USER with ${rest.join(" ")} not yet supported`);
    }
    return parseDuckDB(`INSERT INTO ${USERS_TABLE} (name) VALUES (${sqlString(name)})`);
  },
};

// ---------------------------------------------------------------------------
// information_schema
// ---------------------------------------------------------------------------

function fromTable(node: Expression, schema: string, name: string): exp.Table | undefined {
  const table = node.arg("from_")?.this_;
  if (
    table instanceof exp.Table &&
    table.db.toUpperCase() === schema &&
    table.name.toUpperCase() === name
  ) {
    return table;
  }
  return undefined;
}

/** `information_schema.columns` is served by a view that carries Snowflake's column metadata. */
export const informationSchemaFsColumnsSnowflake: Rule = {
  name: "information_schema_fs_columns_snowflake",
  kinds: ["select"],
  apply(node) {
    const table = fromTable(node, "INFORMATION_SCHEMA", "COLUMNS");
    if (!table) return node;
    const from = new exp.From({
      this: table.withArgs({ this: new exp.Identifier({ this: "_FS_COLUMNS_SNOWFLAKE", quoted: false }) }),
    });
    return node.withArgs({ from_: from });
  },
};

const TABLES_EXT_JOIN_SQL =
  "SELECT 1 FROM t LEFT JOIN information_schema._fs_tables_ext ON " +
  "tables.table_catalog = _fs_tables_ext.ext_table_catalog AND " +
  "tables.table_schema = _fs_tables_ext.ext_table_schema AND " +
  "tables.table_name = _fs_tables_ext.ext_table_name";

/** `information_schema.tables` gains the extra columns (such as the comment) kept beside it. */
export const informationSchemaFsTablesExt: Rule = {
  name: "information_schema_fs_tables_ext",
  kinds: ["select"],
  apply(node) {
    if (!fromTable(node, "INFORMATION_SCHEMA", "TABLES")) return node;
    const joins = node.argList("joins");
    const joined = joins.some((join) => join.this_?.name.toUpperCase() === "_FS_TABLES_EXT");
    const [extension] = parseDuckDB(TABLES_EXT_JOIN_SQL).argList("joins");
    if (joined || !extension) return node;
    return node.withArgs({ joins: [...joins, extension] });
  },
};
