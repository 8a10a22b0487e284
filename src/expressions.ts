/**
 * Expressions module: the syntax tree every other module reads and builds.
 *
 * Every node is an instance of an Expression subclass. A node keeps its children in `args`,
 * under the names listed in its class's `argTypes`. Nodes own their children exclusively:
 * placing a node that already belongs to another parent stores a deep copy.
 */

import type { ErrorLevel } from "./errors.js";
import { camelToSnakeCase } from "./helper.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ExpressionKind =
  | "expression"
  | "condition"
  | "predicate"
  | "derivedtable"
  | "query"
  | "udtf"
  | "func"
  | "aggfunc"
  | "binary"
  | "unary"
  | "connector"
  | "setoperation"
  | "identifier"
  | "literal"
  | "star"
  | "null"
  | "boolean"
  | "var"
  | "placeholder"
  | "datatype"
  | "column"
  | "table"
  | "tablealias"
  | "alias"
  | "paren"
  | "tuple"
  | "dot"
  | "subquery"
  | "select"
  | "union"
  | "intersect"
  | "except"
  | "from"
  | "join"
  | "where"
  | "group"
  | "having"
  | "qualify"
  | "order"
  | "ordered"
  | "limit"
  | "offset"
  | "with"
  | "cte"
  | "values"
  | "lateral"
  | "unnest"
  | "tablesample"
  | "distinct"
  | "window"
  | "windowspec"
  | "schema"
  | "columndef"
  | "columnconstraint"
  | "constraint"
  | "primarykey"
  | "uniquekey"
  | "foreignkey"
  | "reference"
  | "properties"
  | "property"
  | "schemacommentproperty"
  | "create"
  | "drop"
  | "alter"
  | "altercolumn"
  | "renametable"
  | "renamecolumn"
  | "set"
  | "comment"
  | "use"
  | "show"
  | "describe"
  | "insert"
  | "update"
  | "delete"
  | "command"
  | "bracket"
  | "slice"
  | "cast"
  | "trycast"
  | "case"
  | "kwarg"
  | "propertyeq"
  | "jsonextract"
  | "jsonextractscalar"
  | "jsonpath"
  | "eq"
  | "neq"
  | "gt"
  | "gte"
  | "lt"
  | "lte"
  | "is"
  | "like"
  | "ilike"
  | "regexplike"
  | "in"
  | "between"
  | "exists"
  | "and"
  | "or"
  | "not"
  | "neg"
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "mod"
  | "dpipe"
  | "interval"
  | "anonymous"
  | "if"
  | "extract"
  | "arrayagg"
  | "arraysize"
  | "explode"
  | "struct"
  | "rand"
  | "regexpreplace"
  | "regexpextract"
  | "tonumber"
  | "unixtotime"
  | "strtotime"
  | "datetrunc"
  | "parsejson"
  | "upper"
  | "lower"
  | "count"
  | "sum"
  | "avg"
  | "min"
  | "max"
  | "currentdate"
  | "currenttime"
  | "currenttimestamp"
  | "withingroup";

export type ArgValue = Expression | Expression[] | string | number | boolean;

/** Constructor input; `null` and `undefined` entries are dropped. */
export type Args = Record<string, ArgValue | null | undefined>;

export interface ExpressionClass<T extends Expression = Expression> {
  new (args?: Args): T;
  readonly key: ExpressionKind;
}

export interface SqlOptions {
  dialect?: string;
  pretty?: boolean;
  unsupportedLevel?: ErrorLevel;
}

/** `fn` sees each node after its children were rewritten, with its ancestors nearest first. */
export type TransformFn = (node: Expression, ancestors: readonly Expression[]) => Expression;

// ---------------------------------------------------------------------------
// Generator injection (the dialect modules import this one)
// ---------------------------------------------------------------------------

type SqlGenerator = (expression: Expression, opts: SqlOptions) => string;

let sqlGenerator: SqlGenerator | undefined;

export function _setSqlGenerator(fn: SqlGenerator): void {
  sqlGenerator = fn;
}

// ---------------------------------------------------------------------------
// Helpers (internal)
// ---------------------------------------------------------------------------

function isBlank(value: ArgValue | undefined): boolean {
  return value === undefined || value === false || (Array.isArray(value) && value.length === 0);
}

function argEquals(a: ArgValue | undefined, b: ArgValue | undefined, caseSensitive: boolean): boolean {
  if (isBlank(a) || isBlank(b)) {
    return isBlank(a) && isBlank(b);
  }
  if (a instanceof Expression) {
    return b instanceof Expression && a.eq(b);
  }
  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((node, i) => {
        const other = b[i];
        return other !== undefined && node.eq(other);
      })
    );
  }
  if (typeof a === "string" && typeof b === "string") {
    return caseSensitive ? a === b : a.toLowerCase() === b.toLowerCase();
  }
  return a === b;
}

const SAFE_IDENTIFIER_RE = /^[_a-zA-Z][\w$]*$/;

// ---------------------------------------------------------------------------
// Expression base class
// ---------------------------------------------------------------------------

/**
 * The base class for all expressions in a syntax tree.
 */
export class Expression {
  static argTypes: Record<string, boolean> = { this: true };
  static key: ExpressionKind = "expression";

  readonly key: ExpressionKind;
  readonly argTypes: Readonly<Record<string, boolean>>;
  readonly args: Record<string, ArgValue> = {};
  parent?: Expression;
  argKey?: string;
  index?: number;
  comments?: string[];

  constructor(args: Args = {}) {
    this.key = new.target.key;
    this.argTypes = new.target.argTypes;
    for (const [argKey, value] of Object.entries(args)) {
      this.set(argKey, value);
    }
  }

  // -- Property accessors ---------------------------------------------------

  /** The child stored under `key`, if it is a node. */
  arg(key: string): Expression | undefined {
    const value = this.args[key];
    return value instanceof Expression ? value : undefined;
  }

  argList(key: string): Expression[] {
    const value = this.args[key];
    return Array.isArray(value) ? value : [];
  }

  flag(key: string): boolean {
    return this.args[key] === true;
  }

  get this_(): Expression | undefined {
    return this.arg("this");
  }

  get expression(): Expression | undefined {
    return this.arg("expression");
  }

  get expressions(): Expression[] {
    return this.argList("expressions");
  }

  /** The textual value of `key`: a plain string, or the text of an identifier-like child. */
  text(key: string): string {
    const field = this.args[key];
    if (typeof field === "string") return field;
    if (typeof field === "number") return String(field);
    if (field instanceof Identifier || field instanceof Literal || field instanceof Var) {
      return field.text("this");
    }
    if (field instanceof Star) return "*";
    if (field instanceof Null) return "NULL";
    return "";
  }

  get name(): string {
    return this.text("this");
  }

  get alias(): string {
    const alias = this.args["alias"];
    if (alias instanceof TableAlias) {
      return alias.name;
    }
    return this.text("alias");
  }

  get outputName(): string {
    return "";
  }

  get isString(): boolean {
    return this instanceof Literal && this.flag("is_string");
  }

  get isNumber(): boolean {
    return (
      (this instanceof Literal && !this.flag("is_string")) ||
      (this instanceof Neg && (this.this_?.isNumber ?? false))
    );
  }

  get isInt(): boolean {
    if (this instanceof Neg) {
      return this.this_?.isInt ?? false;
    }
    return this instanceof Literal && !this.flag("is_string") && /^\d+$/.test(this.name);
  }

  get isStar(): boolean {
    return this instanceof Star || (this instanceof Column && this.this_ instanceof Star);
  }

  // -- Building -------------------------------------------------------------

  /**
   * Stores `value` under `argKey`. Only a parser building a fresh node calls this;
   * rewrites go through `withArgs`.
   */
  set(argKey: string, value: ArgValue | null | undefined): void {
    if (value === null || value === undefined) {
      delete this.args[argKey];
    } else if (value instanceof Expression) {
      this.args[argKey] = this.adopt(value, argKey);
    } else if (Array.isArray(value)) {
      this.args[argKey] = value.map((node, i) => this.adopt(node, argKey, i));
    } else {
      this.args[argKey] = value;
    }
  }

  append(argKey: string, value: Expression): void {
    const current = this.args[argKey];
    const list = Array.isArray(current) ? current : [];
    list.push(this.adopt(value, argKey, list.length));
    this.args[argKey] = list;
  }

  private adopt(node: Expression, argKey: string, index?: number): Expression {
    const sameSlot = node.parent === this && node.argKey === argKey && node.index === index;
    const owned = node.parent === undefined || sameSlot ? node : node.copy();
    owned.parent = this;
    owned.argKey = argKey;
    owned.index = index;
    return owned;
  }

  // -- Traversal ------------------------------------------------------------

  get depth(): number {
    return this.parent ? this.parent.depth + 1 : 0;
  }

  *iterExpressions(reverse: boolean = false): IterableIterator<Expression> {
    const values = Object.values(this.args);
    for (const value of reverse ? [...values].reverse() : values) {
      if (Array.isArray(value)) {
        yield* reverse ? [...value].reverse() : value;
      } else if (value instanceof Expression) {
        yield value;
      }
    }
  }

  *walk(bfs: boolean = true, prune?: (node: Expression) => boolean): IterableIterator<Expression> {
    if (bfs) {
      yield* this.bfs(prune);
    } else {
      yield* this.dfs(prune);
    }
  }

  *dfs(prune?: (node: Expression) => boolean): IterableIterator<Expression> {
    const stack: Expression[] = [this];
    let node = stack.pop();
    while (node) {
      yield node;
      if (!prune || !prune(node)) {
        stack.push(...node.iterExpressions(true));
      }
      node = stack.pop();
    }
  }

  *bfs(prune?: (node: Expression) => boolean): IterableIterator<Expression> {
    const queue: Expression[] = [this];
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      if (node === undefined) break;
      yield node;
      if (!prune || !prune(node)) {
        queue.push(...node.iterExpressions());
      }
    }
  }

  find<T extends Expression>(...expressionTypes: Array<ExpressionClass<T>>): T | undefined {
    for (const node of this.findAll(...expressionTypes)) {
      return node;
    }
    return undefined;
  }

  *findAll<T extends Expression>(...expressionTypes: Array<ExpressionClass<T>>): IterableIterator<T> {
    for (const node of this.walk(true)) {
      for (const expressionType of expressionTypes) {
        if (node instanceof expressionType) {
          yield node;
          break;
        }
      }
    }
  }

  findAncestor<T extends Expression>(...expressionTypes: Array<ExpressionClass<T>>): T | undefined {
    let ancestor = this.parent;
    while (ancestor) {
      for (const expressionType of expressionTypes) {
        if (ancestor instanceof expressionType) return ancestor;
      }
      ancestor = ancestor.parent;
    }
    return undefined;
  }

  root(): Expression {
    return this.parent ? this.parent.root() : this;
  }

  // -- Transform / Copy -----------------------------------------------------

  /**
   * Bottom-up rewrite. Never mutates this tree: a node whose children changed is rebuilt,
   * an untouched subtree comes back as the same reference.
   */
  transform(fn: TransformFn, ancestors: readonly Expression[] = []): Expression {
    const chain = [this, ...ancestors];
    let changed: Args | undefined;

    for (const [argKey, value] of Object.entries(this.args)) {
      if (value instanceof Expression) {
        const next = value.transform(fn, chain);
        if (next !== value) {
          (changed ??= {})[argKey] = next;
        }
      } else if (Array.isArray(value)) {
        const next = value.map((node) => node.transform(fn, chain));
        if (next.some((node, i) => node !== value[i])) {
          (changed ??= {})[argKey] = next;
        }
      }
    }

    return fn(changed ? this.withArgs(changed) : this, ancestors);
  }

  /** A new node of the same class with `overrides` laid over this node's arguments. */
  withArgs(overrides: Args): this {
    const Constructor = this.constructor as new (args: Args) => this;
    const node = new Constructor({ ...this.args, ...overrides });
    if (this.comments) {
      node.comments = [...this.comments];
    }
    return node;
  }

  copy(): this {
    const Constructor = this.constructor as new (args: Args) => this;
    const args: Args = {};
    for (const [argKey, value] of Object.entries(this.args)) {
      if (value instanceof Expression) {
        args[argKey] = value.copy();
      } else if (Array.isArray(value)) {
        args[argKey] = value.map((node) => node.copy());
      } else {
        args[argKey] = value;
      }
    }
    const node = new Constructor(args);
    if (this.comments) {
      node.comments = [...this.comments];
    }
    return node;
  }

  unnest(): Expression {
    let expression: Expression = this;
    while (expression instanceof Paren && expression.this_) {
      expression = expression.this_;
    }
    return expression;
  }

  // -- Equality -------------------------------------------------------------

  /** Structural equality. Text compares case-insensitively outside literals and identifiers. */
  eq(other: Expression): boolean {
    if (this === other) return true;
    if (this.key !== other.key) return false;

    const caseSensitive = this instanceof Literal || this instanceof Identifier;
    const keys = new Set([...Object.keys(this.args), ...Object.keys(other.args)]);
    for (const argKey of keys) {
      if (!argEquals(this.args[argKey], other.args[argKey], caseSensitive)) {
        return false;
      }
    }
    return true;
  }

  // -- SQL generation -------------------------------------------------------

  sql(opts: SqlOptions = {}): string {
    if (!sqlGenerator) {
      throw new Error("SQL generator not initialized; import the package entry point first");
    }
    return sqlGenerator(this, opts);
  }

  toString(): string {
    return this.sql();
  }
}

// ---------------------------------------------------------------------------
// Abstract families
// ---------------------------------------------------------------------------

export class Condition extends Expression {
  static override key: ExpressionKind = "condition";
}

export class Predicate extends Condition {
  static override key: ExpressionKind = "predicate";
}

export class DerivedTable extends Expression {
  static override key: ExpressionKind = "derivedtable";
}

export class Query extends Expression {
  static override key: ExpressionKind = "query";

  get selects(): Expression[] {
    return [];
  }

  get ctes(): Expression[] {
    return this.arg("with_")?.expressions ?? [];
  }
}

export class UDTF extends DerivedTable {
  static override key: ExpressionKind = "udtf";
}

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

export class Identifier extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, quoted: false };
  static override key: ExpressionKind = "identifier";

  get quoted(): boolean {
    return this.flag("quoted");
  }

  override get outputName(): string {
    return this.name;
  }
}

export class Literal extends Condition {
  static override argTypes: Record<string, boolean> = { this: true, is_string: true };
  static override key: ExpressionKind = "literal";

  static number(value: number | string): Literal {
    return new Literal({ this: String(value), is_string: false });
  }

  static string(value: string): Literal {
    return new Literal({ this: value, is_string: true });
  }

  override get outputName(): string {
    return this.name;
  }
}

export class Star extends Expression {
  static override argTypes: Record<string, boolean> = {};
  static override key: ExpressionKind = "star";

  override get name(): string {
    return "*";
  }

  override get outputName(): string {
    return "*";
  }
}

export class Null extends Condition {
  static override argTypes: Record<string, boolean> = {};
  static override key: ExpressionKind = "null";

  override get name(): string {
    return "NULL";
  }
}

export class Boolean_ extends Condition {
  static override key: ExpressionKind = "boolean";

  get value(): boolean {
    return this.flag("this");
  }
}

export class Var extends Expression {
  static override key: ExpressionKind = "var";
}

/** `?` or `:name` bind parameters. */
export class Placeholder extends Condition {
  static override argTypes: Record<string, boolean> = { this: false };
  static override key: ExpressionKind = "placeholder";
}

// ---------------------------------------------------------------------------
// Data types
// ---------------------------------------------------------------------------

export const DType = {
  ARRAY: "ARRAY",
  BIGINT: "BIGINT",
  BINARY: "BINARY",
  BOOLEAN: "BOOLEAN",
  CHAR: "CHAR",
  DATE: "DATE",
  DATETIME: "DATETIME",
  DECIMAL: "DECIMAL",
  DOUBLE: "DOUBLE",
  FLOAT: "FLOAT",
  GEOGRAPHY: "GEOGRAPHY",
  INT: "INT",
  INTERVAL: "INTERVAL",
  JSON: "JSON",
  MAP: "MAP",
  NCHAR: "NCHAR",
  NVARCHAR: "NVARCHAR",
  OBJECT: "OBJECT",
  SMALLINT: "SMALLINT",
  STRUCT: "STRUCT",
  TEXT: "TEXT",
  TIME: "TIME",
  TIMESTAMP: "TIMESTAMP",
  TIMESTAMPLTZ: "TIMESTAMPLTZ",
  TIMESTAMPTZ: "TIMESTAMPTZ",
  TINYINT: "TINYINT",
  UUID: "UUID",
  VARBINARY: "VARBINARY",
  VARCHAR: "VARCHAR",
  VARIANT: "VARIANT",
} as const;

export type DTypeName = (typeof DType)[keyof typeof DType];

export class DataType extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    expressions: false,
    nested: false,
  };
  static override key: ExpressionKind = "datatype";

  static readonly Type = DType;

  static build(name: DTypeName, params: Expression[] = []): DataType {
    return new DataType({ this: name, expressions: params });
  }

  /** `ARRAY<inner>`, printed by DuckDB as `inner[]`. */
  static arrayOf(inner: DataType): DataType {
    return new DataType({ this: DType.ARRAY, expressions: [inner], nested: true });
  }

  get typeName(): string {
    return this.text("this").toUpperCase();
  }

  isType(...names: string[]): boolean {
    const typeName = this.typeName;
    return names.some((name) => name.toUpperCase() === typeName);
  }

  /** Literal parameters such as the `10, 2` of `DECIMAL(10, 2)`. */
  get params(): Expression[] {
    return this.flag("nested") ? [] : this.expressions;
  }
}

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

export class Column extends Condition {
  static override argTypes: Record<string, boolean> = {
    this: true,
    table: false,
    db: false,
    catalog: false,
  };
  static override key: ExpressionKind = "column";

  get table(): string {
    return this.text("table");
  }

  get db(): string {
    return this.text("db");
  }

  get catalog(): string {
    return this.text("catalog");
  }

  override get outputName(): string {
    return this.name;
  }
}

export class Table extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    db: false,
    catalog: false,
    alias: false,
    sample: false,
  };
  static override key: ExpressionKind = "table";

  get db(): string {
    return this.text("db");
  }

  get catalog(): string {
    return this.text("catalog");
  }

  /** `catalog.db.name` with the parts that are present. */
  get qualifiedName(): string {
    return [this.catalog, this.db, this.name].filter(Boolean).join(".");
  }
}

export class TableAlias extends Expression {
  static override argTypes: Record<string, boolean> = { this: false, columns: false };
  static override key: ExpressionKind = "tablealias";

  get columns(): Expression[] {
    return this.argList("columns");
  }
}

export class Alias extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, alias: false };
  static override key: ExpressionKind = "alias";

  override get outputName(): string {
    return this.alias;
  }
}

export class Paren extends Condition {
  static override key: ExpressionKind = "paren";
}

export class Tuple extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: false };
  static override key: ExpressionKind = "tuple";
}

/** Member access past the four dotted parts a column takes. */
export class Dot extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, expression: true };
  static override key: ExpressionKind = "dot";
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export class Select extends Query {
  static override argTypes: Record<string, boolean> = {
    with_: false,
    distinct: false,
    expressions: false,
    from_: false,
    joins: false,
    where: false,
    group: false,
    having: false,
    qualify: false,
    order: false,
    limit: false,
    offset: false,
    seed: false,
  };
  static override key: ExpressionKind = "select";

  override get selects(): Expression[] {
    return this.expressions;
  }
}

export class Subquery extends DerivedTable {
  static override argTypes: Record<string, boolean> = { this: true, alias: false };
  static override key: ExpressionKind = "subquery";
}

export class SetOperation extends Query {
  static override argTypes: Record<string, boolean> = {
    with_: false,
    this: true,
    expression: true,
    distinct: false,
    order: false,
    limit: false,
    offset: false,
  };
  static override key: ExpressionKind = "setoperation";
}

export class Union extends SetOperation {
  static override key: ExpressionKind = "union";
}

export class Intersect extends SetOperation {
  static override key: ExpressionKind = "intersect";
}

export class Except extends SetOperation {
  static override key: ExpressionKind = "except";
}

export class From extends Expression {
  static override key: ExpressionKind = "from";
}

export class Join extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    on: false,
    using: false,
    side: false,
    kind: false,
  };
  static override key: ExpressionKind = "join";
}

export class Where extends Expression {
  static override key: ExpressionKind = "where";
}

export class Group extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: false, all: false };
  static override key: ExpressionKind = "group";
}

export class Having extends Expression {
  static override key: ExpressionKind = "having";
}

export class Qualify extends Expression {
  static override key: ExpressionKind = "qualify";
}

export class Order extends Expression {
  static override argTypes: Record<string, boolean> = { this: false, expressions: true };
  static override key: ExpressionKind = "order";
}

export class Ordered extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, desc: false, nulls_first: false };
  static override key: ExpressionKind = "ordered";
}

export class Limit extends Expression {
  static override argTypes: Record<string, boolean> = { expression: true };
  static override key: ExpressionKind = "limit";
}

export class Offset extends Expression {
  static override argTypes: Record<string, boolean> = { expression: true };
  static override key: ExpressionKind = "offset";
}

export class With extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: true, recursive: false };
  static override key: ExpressionKind = "with";
}

export class CTE extends DerivedTable {
  static override argTypes: Record<string, boolean> = { this: true, alias: true };
  static override key: ExpressionKind = "cte";
}

export class Distinct extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: false, on: false };
  static override key: ExpressionKind = "distinct";
}

export class Values extends UDTF {
  static override argTypes: Record<string, boolean> = { expressions: true, alias: false };
  static override key: ExpressionKind = "values";
}

export class Lateral extends UDTF {
  static override argTypes: Record<string, boolean> = { this: true, alias: false };
  static override key: ExpressionKind = "lateral";
}

export class Unnest extends UDTF {
  static override argTypes: Record<string, boolean> = { expressions: true, alias: false };
  static override key: ExpressionKind = "unnest";
}

/**
 * `SAMPLE [method] (size [ROWS]) [SEED (n)]`. Without `rows` the size is a percentage.
 */
export class TableSample extends Expression {
  static override argTypes: Record<string, boolean> = {
    method: false,
    size: true,
    rows: false,
    seed: false,
  };
  static override key: ExpressionKind = "tablesample";
}

export class Window extends Condition {
  static override argTypes: Record<string, boolean> = {
    this: true,
    partition_by: false,
    order: false,
    spec: false,
  };
  static override key: ExpressionKind = "window";
}

/** Frame clause: `ROWS BETWEEN start start_side AND end end_side`. */
export class WindowSpec extends Expression {
  static override argTypes: Record<string, boolean> = {
    kind: false,
    start: false,
    start_side: false,
    end: false,
    end_side: false,
  };
  static override key: ExpressionKind = "windowspec";
}

// ---------------------------------------------------------------------------
// DDL
// ---------------------------------------------------------------------------

/** A table with its column list, as in `CREATE TABLE t (a INT)` or `INSERT INTO t (a)`. */
export class Schema extends Expression {
  static override argTypes: Record<string, boolean> = { this: false, expressions: false };
  static override key: ExpressionKind = "schema";
}

export class ColumnDef extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, kind: false, constraints: false };
  static override key: ExpressionKind = "columndef";

  get kind(): DataType | undefined {
    const kind = this.args["kind"];
    return kind instanceof DataType ? kind : undefined;
  }

  get constraints(): ColumnConstraint[] {
    return this.argList("constraints").filter((c): c is ColumnConstraint => c instanceof ColumnConstraint);
  }
}

/**
 * An inline column constraint. `kind` is the keyword (`NOT NULL`, `NULL`, `PRIMARY KEY`,
 * `UNIQUE`, `DEFAULT`, `COMMENT`, `AUTOINCREMENT`); `this` holds the value where one is taken.
 */
export class ColumnConstraint extends Expression {
  static override argTypes: Record<string, boolean> = { kind: true, this: false };
  static override key: ExpressionKind = "columnconstraint";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }
}

/** `CONSTRAINT name <table constraint>` */
export class Constraint extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, expression: true };
  static override key: ExpressionKind = "constraint";
}

export class PrimaryKey extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: true };
  static override key: ExpressionKind = "primarykey";
}

export class UniqueKey extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: true };
  static override key: ExpressionKind = "uniquekey";
}

export class ForeignKey extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: true, reference: false };
  static override key: ExpressionKind = "foreignkey";
}

/** `REFERENCES <this>`, where `this` is a Schema naming the table and columns. */
export class Reference extends Expression {
  static override key: ExpressionKind = "reference";
}

export class Properties extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: true };
  static override key: ExpressionKind = "properties";
}

/** A `KEY = value` table property the generator does not know by name. */
export class Property extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, value: true };
  static override key: ExpressionKind = "property";
}

export class SchemaCommentProperty extends Expression {
  static override key: ExpressionKind = "schemacommentproperty";
}

export class Create extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    kind: true,
    expression: false,
    exists: false,
    replace: false,
    temporary: false,
    transient: false,
    properties: false,
  };
  static override key: ExpressionKind = "create";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }
}

export class Drop extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: false,
    kind: false,
    exists: false,
    cascade: false,
  };
  static override key: ExpressionKind = "drop";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }
}

export class Alter extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    kind: true,
    actions: true,
    exists: false,
  };
  static override key: ExpressionKind = "alter";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }

  get actions(): Expression[] {
    return this.argList("actions");
  }
}

/**
 * `ALTER COLUMN c ...` with one of `dtype`, `comment`, `default`, `drop`
 * (`DEFAULT` or `NOT NULL`) or `not_null`.
 */
export class AlterColumn extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    dtype: false,
    comment: false,
    default: false,
    drop: false,
    not_null: false,
  };
  static override key: ExpressionKind = "altercolumn";
}

export class RenameTable extends Expression {
  static override key: ExpressionKind = "renametable";
}

export class RenameColumn extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, to: true };
  static override key: ExpressionKind = "renamecolumn";
}

/** `SET ...` / `UNSET ...` inside `ALTER`; `tag` marks `SET TAG`. */
export class SetAction extends Expression {
  static override argTypes: Record<string, boolean> = { expressions: false, tag: false, unset: false };
  static override key: ExpressionKind = "set";
}

/** `COMMENT [IF EXISTS] ON <kind> <this> IS <expression>` */
export class Comment extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    kind: true,
    expression: true,
    exists: false,
  };
  static override key: ExpressionKind = "comment";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export class Use extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, kind: false };
  static override key: ExpressionKind = "use";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }
}

/**
 * `SHOW [TERSE] <this> [LIKE ...] [IN <scope_kind> <scope>] [STARTS WITH ...] [LIMIT n]`.
 * `this` is the object kind as text, e.g. `TABLES` or `PRIMARY KEYS`.
 */
export class Show extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    terse: false,
    like: false,
    scope_kind: false,
    scope: false,
    starts_with: false,
    limit: false,
  };
  static override key: ExpressionKind = "show";

  get scopeKind(): string {
    return this.text("scope_kind").toUpperCase();
  }
}

export class Describe extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, kind: false };
  static override key: ExpressionKind = "describe";

  get kind(): string {
    return this.text("kind").toUpperCase();
  }
}

export class Insert extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    expression: false,
    overwrite: false,
  };
  static override key: ExpressionKind = "insert";
}

export class Update extends Expression {
  static override argTypes: Record<string, boolean> = {
    this: true,
    expressions: true,
    from_: false,
    where: false,
  };
  static override key: ExpressionKind = "update";
}

export class Delete extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, using: false, where: false };
  static override key: ExpressionKind = "delete";
}

/** A statement kept as raw text: `this` is the leading keyword, `expression` the rest. */
export class Command extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, expression: false };
  static override key: ExpressionKind = "command";

  get rest(): string {
    return this.text("expression");
  }
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export class Binary extends Condition {
  static override argTypes: Record<string, boolean> = { this: true, expression: true };
  static override key: ExpressionKind = "binary";

  get left(): Expression | undefined {
    return this.this_;
  }

  get right(): Expression | undefined {
    return this.expression;
  }
}

export class Connector extends Binary {
  static override key: ExpressionKind = "connector";
}

export class And extends Connector {
  static override key: ExpressionKind = "and";
}

export class Or extends Connector {
  static override key: ExpressionKind = "or";
}

export class Add extends Binary {
  static override key: ExpressionKind = "add";
}

export class Sub extends Binary {
  static override key: ExpressionKind = "sub";
}

export class Mul extends Binary {
  static override key: ExpressionKind = "mul";
}

export class Div extends Binary {
  static override key: ExpressionKind = "div";
}

export class Mod extends Binary {
  static override key: ExpressionKind = "mod";
}

export class DPipe extends Binary {
  static override key: ExpressionKind = "dpipe";
}

export class EQ extends Binary {
  static override key: ExpressionKind = "eq";
}

export class NEQ extends Binary {
  static override key: ExpressionKind = "neq";
}

export class GT extends Binary {
  static override key: ExpressionKind = "gt";
}

export class GTE extends Binary {
  static override key: ExpressionKind = "gte";
}

export class LT extends Binary {
  static override key: ExpressionKind = "lt";
}

export class LTE extends Binary {
  static override key: ExpressionKind = "lte";
}

export class Is extends Binary {
  static override key: ExpressionKind = "is";
}

export class Like extends Binary {
  static override key: ExpressionKind = "like";
}

export class ILike extends Binary {
  static override key: ExpressionKind = "ilike";
}

export class RegexpLike extends Binary {
  static override key: ExpressionKind = "regexplike";
}

/** `name => value` */
export class Kwarg extends Binary {
  static override key: ExpressionKind = "kwarg";
}

/** One `key: value` member of a struct literal. */
export class PropertyEQ extends Binary {
  static override key: ExpressionKind = "propertyeq";
}

/** `this -> path` */
export class JSONExtract extends Binary {
  static override key: ExpressionKind = "jsonextract";
}

/** `this ->> path`, the extracted value as text. */
export class JSONExtractScalar extends Binary {
  static override key: ExpressionKind = "jsonextractscalar";
}

/** A JSON path such as `$.a.b[0]`, kept as text. */
export class JSONPath extends Expression {
  static override key: ExpressionKind = "jsonpath";
}

const JSON_KEY_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** One key step of a JSON path: `.key` for plain words, `["key"]` otherwise. */
export function jsonPathKey(key: string): string {
  return JSON_KEY_RE.test(key) ? `.${key}` : `["${key}"]`;
}

export class Unary extends Condition {
  static override key: ExpressionKind = "unary";
}

export class Not extends Unary {
  static override key: ExpressionKind = "not";
}

export class Neg extends Unary {
  static override key: ExpressionKind = "neg";
}

export class In extends Predicate {
  static override argTypes: Record<string, boolean> = { this: true, expressions: false, query: false };
  static override key: ExpressionKind = "in";
}

export class Between extends Predicate {
  static override argTypes: Record<string, boolean> = { this: true, low: true, high: true };
  static override key: ExpressionKind = "between";
}

export class Exists extends Predicate {
  static override key: ExpressionKind = "exists";
}

export class Bracket extends Condition {
  static override argTypes: Record<string, boolean> = { this: true, expressions: true };
  static override key: ExpressionKind = "bracket";
}

/** `this:expression` inside brackets; either end may be absent. */
export class Slice extends Expression {
  static override argTypes: Record<string, boolean> = { this: false, expression: false };
  static override key: ExpressionKind = "slice";
}

export class Cast extends Condition {
  static override argTypes: Record<string, boolean> = { this: true, to: true };
  static override key: ExpressionKind = "cast";

  get to(): DataType | undefined {
    const to = this.args["to"];
    return to instanceof DataType ? to : undefined;
  }
}

export class TryCast extends Cast {
  static override key: ExpressionKind = "trycast";
}

export class Case extends Condition {
  static override argTypes: Record<string, boolean> = { this: false, ifs: true, default: false };
  static override key: ExpressionKind = "case";
}

export class Interval extends Expression {
  static override argTypes: Record<string, boolean> = { this: false, unit: false };
  static override key: ExpressionKind = "interval";
}

// ---------------------------------------------------------------------------
// Functions
// ---------------------------------------------------------------------------

interface FuncClass<T extends Func> {
  new (args?: Args): T;
  readonly argTypes: Record<string, boolean>;
  readonly isVarLenArgs: boolean;
}

export class Func extends Condition {
  static override key: ExpressionKind = "func";
  static isVarLenArgs: boolean = false;

  /** Names the function is parsed from; the first is the one printed. */
  static sqlNames(): string[] {
    return [camelToSnakeCase(this.name)];
  }

  /** Maps positional arguments onto `argTypes` in order; a var-len function takes the rest in its last slot. */
  static fromArgList<T extends Func>(this: FuncClass<T>, args: readonly Expression[]): T {
    const keys = Object.keys(this.argTypes);
    const bag: Args = {};
    keys.forEach((argKey, i) => {
      bag[argKey] = this.isVarLenArgs && i === keys.length - 1 ? args.slice(i) : args[i];
    });
    return new this(bag);
  }

  /** The name printed when no dialect handler exists. */
  get sqlName(): string {
    return FUNCTION_NAMES.get(this.key) ?? this.key.toUpperCase();
  }

  /** Arguments in `argTypes` order, list slots flattened. */
  get argValues(): Expression[] {
    const values: Expression[] = [];
    for (const argKey of Object.keys(this.argTypes)) {
      const value = this.args[argKey];
      if (value instanceof Expression) {
        values.push(value);
      } else if (Array.isArray(value)) {
        values.push(...value);
      }
    }
    return values;
  }
}

export class AggFunc extends Func {
  static override key: ExpressionKind = "aggfunc";
}

/** A call to a function with no dedicated class; `this` is the name as written. */
export class Anonymous extends Func {
  static override argTypes: Record<string, boolean> = { this: true, expressions: false };
  static override isVarLenArgs = true;
  static override key: ExpressionKind = "anonymous";

  get fnName(): string {
    return this.name.toUpperCase();
  }
}

export class If extends Func {
  static override argTypes: Record<string, boolean> = { this: true, true: true, false: false };
  static override key: ExpressionKind = "if";

  static override sqlNames(): string[] {
    return ["IFF", "IF"];
  }
}

export class Extract extends Func {
  static override argTypes: Record<string, boolean> = { this: true, expression: true };
  static override key: ExpressionKind = "extract";
}

export class ArrayAgg extends AggFunc {
  static override key: ExpressionKind = "arrayagg";
}

export class ArraySize extends Func {
  static override key: ExpressionKind = "arraysize";
}

/** `FLATTEN(input => x, ...)` */
export class Explode extends Func {
  static override argTypes: Record<string, boolean> = { this: true, expressions: false };
  static override isVarLenArgs = true;
  static override key: ExpressionKind = "explode";

  static override sqlNames(): string[] {
    return ["FLATTEN"];
  }
}

export class Struct extends Func {
  static override argTypes: Record<string, boolean> = { expressions: false };
  static override isVarLenArgs = true;
  static override key: ExpressionKind = "struct";
}

export class Rand extends Func {
  static override argTypes: Record<string, boolean> = { this: false };
  static override key: ExpressionKind = "rand";

  static override sqlNames(): string[] {
    return ["RANDOM", "RAND"];
  }
}

export class RegexpReplace extends Func {
  static override argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
    replacement: false,
    position: false,
    occurrence: false,
    modifiers: false,
  };
  static override key: ExpressionKind = "regexpreplace";
}

export class RegexpExtract extends Func {
  static override argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
    position: false,
    occurrence: false,
    parameters: false,
    group: false,
  };
  static override key: ExpressionKind = "regexpextract";

  static override sqlNames(): string[] {
    return ["REGEXP_SUBSTR", "REGEXP_EXTRACT"];
  }
}

export class ToNumber extends Func {
  static override argTypes: Record<string, boolean> = {
    this: true,
    format: false,
    precision: false,
    scale: false,
  };
  static override key: ExpressionKind = "tonumber";
}

/** Seconds since the epoch to a timestamp. */
export class UnixToTime extends Func {
  static override argTypes: Record<string, boolean> = { this: true, scale: false };
  static override key: ExpressionKind = "unixtotime";
}

export class StrToTime extends Func {
  static override argTypes: Record<string, boolean> = { this: true, format: true };
  static override key: ExpressionKind = "strtotime";
}

export class DateTrunc extends Func {
  static override argTypes: Record<string, boolean> = { unit: true, this: true };
  static override key: ExpressionKind = "datetrunc";
}

export class ParseJSON extends Func {
  static override key: ExpressionKind = "parsejson";

  static override sqlNames(): string[] {
    return ["PARSE_JSON"];
  }
}

export class Upper extends Func {
  static override key: ExpressionKind = "upper";
}

export class Lower extends Func {
  static override key: ExpressionKind = "lower";
}

export class Count extends AggFunc {
  static override argTypes: Record<string, boolean> = { this: false };
  static override key: ExpressionKind = "count";
}

export class Sum extends AggFunc {
  static override key: ExpressionKind = "sum";
}

export class Avg extends AggFunc {
  static override key: ExpressionKind = "avg";
}

export class Min extends AggFunc {
  static override key: ExpressionKind = "min";
}

export class Max extends AggFunc {
  static override key: ExpressionKind = "max";
}

export class CurrentDate extends Func {
  static override argTypes: Record<string, boolean> = {};
  static override key: ExpressionKind = "currentdate";
}

export class CurrentTime extends Func {
  static override argTypes: Record<string, boolean> = {};
  static override key: ExpressionKind = "currenttime";
}

export class CurrentTimestamp extends Func {
  static override argTypes: Record<string, boolean> = {};
  static override key: ExpressionKind = "currenttimestamp";
}

/** `agg(...) WITHIN GROUP (ORDER BY ...)`: `this` is the aggregate, `expression` the Order. */
export class WithinGroup extends Expression {
  static override argTypes: Record<string, boolean> = { this: true, expression: false };
  static override key: ExpressionKind = "withingroup";
}

/** Typed function classes the parser resolves by name. */
export const FUNCTION_CLASSES: ReadonlyArray<typeof Func> = [
  ArrayAgg,
  ArraySize,
  Avg,
  Count,
  DateTrunc,
  Explode,
  If,
  Lower,
  Max,
  Min,
  ParseJSON,
  Rand,
  RegexpExtract,
  RegexpReplace,
  Struct,
  Sum,
  ToNumber,
  Upper,
];

const FUNCTION_NAMES: Map<ExpressionKind, string> = new Map();
for (const cls of FUNCTION_CLASSES) {
  const [name] = cls.sqlNames();
  if (name) {
    FUNCTION_NAMES.set(cls.key, name);
  }
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/** An Identifier, quoted unless `name` is a plain word. */
export function toIdentifier(name: string, quoted?: boolean): Identifier {
  return new Identifier({ this: name, quoted: quoted ?? !SAFE_IDENTIFIER_RE.test(name) });
}

export function column(name: string, table?: string): Column {
  return new Column({
    this: toIdentifier(name),
    table: table === undefined ? undefined : toIdentifier(table),
  });
}

export function cast(expression: Expression, to: DataType): Cast {
  return new Cast({ this: expression, to });
}

/** Left-deep AND of the given conditions. */
export function and_(first: Expression, ...rest: Expression[]): Expression {
  return rest.reduce<Expression>((acc, condition) => new And({ this: acc, expression: condition }), first);
}

/** `SELECT 'Statement executed successfully.'`, the result of a statement with nothing to run. */
export function successNop(): Select {
  return new Select({ expressions: [Literal.string("Statement executed successfully.")] });
}
