import * as exp from "./expressions.js";
import type { Expression } from "./expressions.js";
import { ErrorLevel, GenerateError, UnsupportedError, concatMessages } from "./errors.js";
import { csv } from "./helper.js";
import { logger } from "./logger.js";

/** Quote characters a dialect hands its generator. */
export interface QuoteSettings {
  readonly QUOTE_START: string;
  readonly QUOTE_END: string;
  readonly IDENTIFIER_START: string;
  readonly IDENTIFIER_END: string;
}

export interface GeneratorOptions {
  dialect?: QuoteSettings | null;
  pretty?: boolean;
  unsupportedLevel?: ErrorLevel;
  maxUnsupported?: number;
}

type Handler = (expression: Expression) => string;

function isHandler(value: unknown): value is Handler {
  return typeof value === "function";
}

/**
 * Converts a syntax tree back into a SQL string.
 *
 * Dispatches to `<key>Sql` methods where `key` is the node's kind
 * (e.g., `select` -> `selectSql`). Functions without a handler print as
 * `NAME(args)` from their `argTypes`.
 */
export class Generator {
  /** Type names rewritten on output. */
  static TYPE_MAP: Record<string, string> = {};

  /** Types printed without their `(n)` parameters. */
  static PARAMETERLESS_TYPES: ReadonlySet<string> = new Set();

  static SAMPLE_KEYWORD = "TABLESAMPLE";

  pretty: boolean;
  unsupportedLevel: ErrorLevel;
  maxUnsupported: number;
  unsupportedMessages: string[] = [];

  private _identifierStart: string;
  private _identifierEnd: string;
  private _quoteStart: string;
  private _quoteEnd: string;

  constructor(opts: GeneratorOptions = {}) {
    this.pretty = opts.pretty ?? false;
    this.unsupportedLevel = opts.unsupportedLevel ?? ErrorLevel.WARN;
    this.maxUnsupported = opts.maxUnsupported ?? 3;

    const d = opts.dialect;
    this._quoteStart = d?.QUOTE_START ?? "'";
    this._quoteEnd = d?.QUOTE_END ?? "'";
    this._identifierStart = d?.IDENTIFIER_START ?? '"';
    this._identifierEnd = d?.IDENTIFIER_END ?? '"';
  }

  protected get ctor(): typeof Generator {
    return this.constructor as typeof Generator;
  }

  // ── public API ────────────────────────────────────────────────────────

  generate(expression: Expression, copy: boolean = true): string {
    const root = copy ? expression.copy() : expression;
    this.unsupportedMessages = [];
    const result = this.sql(root).trim();

    if (this.unsupportedLevel === ErrorLevel.WARN) {
      for (const msg of this.unsupportedMessages) {
        logger.warn(msg);
      }
    } else if (this.unsupportedLevel === ErrorLevel.RAISE && this.unsupportedMessages.length > 0) {
      throw new UnsupportedError(concatMessages(this.unsupportedMessages, this.maxUnsupported));
    }
    return result;
  }

  unsupported(message: string): void {
    if (this.unsupportedLevel === ErrorLevel.IMMEDIATE) {
      throw new UnsupportedError(message);
    }
    this.unsupportedMessages.push(message);
  }

  // ── formatting helpers ────────────────────────────────────────────────

  sep(sep: string = " "): string {
    return this.pretty ? `${sep.trim()}\n` : sep;
  }

  seg(sqlStr: string, sep: string = " "): string {
    return `${this.sep(sep)}${sqlStr}`;
  }

  wrap(expression: Expression | string): string {
    const thisSql = typeof expression === "string" ? expression : this.sql(expression, "this");
    return `(${thisSql})`;
  }

  func(name: string, ...args: Array<Expression | string | null | undefined>): string {
    const argsSql = args.map((a) => this.sql(a)).filter(Boolean);
    return `${name.toUpperCase()}(${argsSql.join(", ")})`;
  }

  // ── dispatch ──────────────────────────────────────────────────────────

  sql(expression: string | Expression | null | undefined, key?: string): string {
    if (expression === null || expression === undefined) return "";
    if (typeof expression === "string") return expression;

    if (key !== undefined) {
      const value = expression.args[key];
      if (value instanceof exp.Expression) return this.sql(value);
      if (typeof value === "string") return value;
      if (typeof value === "number") return String(value);
      return "";
    }

    const handler: unknown = Reflect.get(this, `${expression.key}Sql`);
    if (isHandler(handler)) {
      return handler.call(this, expression);
    }
    if (expression instanceof exp.Func) {
      return this.functionFallbackSql(expression);
    }
    throw new GenerateError(`Unsupported expression type ${expression.constructor.name}`);
  }

  expressions(
    expression: Expression,
    opts: { key?: string; sep?: string } = {},
  ): string {
    const nodes = expression.argList(opts.key ?? "expressions");
    return csv(
      nodes.map((node) => this.sql(node)),
      opts.sep ?? ", ",
    );
  }

  functionFallbackSql(expression: exp.Func): string {
    return this.func(expression.sqlName, ...expression.argValues);
  }

  // ── queries ───────────────────────────────────────────────────────────

  selectSql(expression: Expression): string {
    const distinct = this.sql(expression, "distinct");
    const projections = this.expressions(expression);
    const head = `SELECT${distinct ? ` ${distinct}` : ""}${projections ? `${this.sep()}${projections}` : ""}`;
    return this.prependCtes(expression, this.queryModifiers(expression, head, this.sql(expression, "from_")));
  }

  queryModifiers(expression: Expression, ...sqls: string[]): string {
    return [
      ...sqls,
      ...expression.argList("joins").map((join) => this.sql(join)),
      this.sql(expression, "where"),
      this.sql(expression, "group"),
      this.sql(expression, "having"),
      this.sql(expression, "qualify"),
      this.sql(expression, "order"),
      this.sql(expression, "limit"),
      this.sql(expression, "offset"),
    ].join("");
  }

  prependCtes(expression: Expression, sqlStr: string): string {
    const withSql = this.sql(expression, "with_");
    return withSql ? `${withSql}${this.sep()}${sqlStr}` : sqlStr;
  }

  withSql(expression: Expression): string {
    const recursive = expression.flag("recursive") ? "RECURSIVE " : "";
    return `WITH ${recursive}${this.expressions(expression)}`;
  }

  cteSql(expression: Expression): string {
    return `${this.sql(expression, "alias")} AS ${this.wrap(expression)}`;
  }

  subquerySql(expression: Expression): string {
    const alias = this.sql(expression, "alias");
    return `${this.wrap(expression)}${alias ? ` AS ${alias}` : ""}`;
  }

  private setOperationSql(expression: Expression, op: string): string {
    const distinct = expression.flag("distinct") ? "" : " ALL";
    const sqlStr = [
      this.sql(expression, "this"),
      `${op}${distinct}`,
      this.sql(expression, "expression"),
    ].join(this.sep());
    return this.prependCtes(expression, this.queryModifiers(expression, sqlStr));
  }

  unionSql(expression: Expression): string {
    return this.setOperationSql(expression, "UNION");
  }

  intersectSql(expression: Expression): string {
    return this.setOperationSql(expression, "INTERSECT");
  }

  exceptSql(expression: Expression): string {
    return this.setOperationSql(expression, "EXCEPT");
  }

  fromSql(expression: Expression): string {
    return `${this.seg("FROM")} ${this.sql(expression, "this")}`;
  }

  joinSql(expression: Expression): string {
    const op = csv([expression.text("side"), expression.text("kind")], " ").toUpperCase();
    const thisSql = this.sql(expression, "this");

    let onSql = "";
    const on = this.sql(expression, "on");
    if (on) {
      onSql = ` ON ${on}`;
    } else if (expression.argList("using").length > 0) {
      onSql = ` USING (${this.expressions(expression, { key: "using" })})`;
    }

    if (!op && !onSql) {
      return `, ${thisSql}`;
    }
    return `${this.seg(op ? `${op} JOIN` : "JOIN")} ${thisSql}${onSql}`;
  }

  whereSql(expression: Expression): string {
    return `${this.seg("WHERE")} ${this.sql(expression, "this")}`;
  }

  groupSql(expression: Expression): string {
    if (expression.flag("all")) {
      return `${this.seg("GROUP BY")} ALL`;
    }
    return `${this.seg("GROUP BY")} ${this.expressions(expression)}`;
  }

  havingSql(expression: Expression): string {
    return `${this.seg("HAVING")} ${this.sql(expression, "this")}`;
  }

  qualifySql(expression: Expression): string {
    return `${this.seg("QUALIFY")} ${this.sql(expression, "this")}`;
  }

  /** `flat` prints without the leading clause separator, as inside OVER (...). */
  orderSql(expression: Expression, flat: boolean = false): string {
    const thisSql = this.sql(expression, "this");
    const items = this.expressions(expression);
    if (thisSql) {
      return `${thisSql} ORDER BY ${items}`;
    }
    return flat ? `ORDER BY ${items}` : `${this.seg("ORDER BY")} ${items}`;
  }

  orderedSql(expression: Expression): string {
    const desc = expression.flag("desc") ? " DESC" : "";
    const nullsFirst = expression.args["nulls_first"];
    let nullsSql = "";
    if (nullsFirst === true) {
      nullsSql = " NULLS FIRST";
    } else if (nullsFirst === false) {
      nullsSql = " NULLS LAST";
    }
    return `${this.sql(expression, "this")}${desc}${nullsSql}`;
  }

  limitSql(expression: Expression): string {
    return `${this.seg("LIMIT")} ${this.sql(expression, "expression")}`;
  }

  offsetSql(expression: Expression): string {
    return `${this.seg("OFFSET")} ${this.sql(expression, "expression")}`;
  }

  distinctSql(expression: Expression): string {
    const on = this.sql(expression, "on");
    if (on) {
      return `DISTINCT ON ${on}`;
    }
    const items = this.expressions(expression);
    return items ? `DISTINCT ${items}` : "DISTINCT";
  }

  valuesSql(expression: Expression): string {
    const sqlStr = `VALUES ${this.expressions(expression)}`;
    const alias = this.sql(expression, "alias");
    const parent = expression.parent;
    if (alias || parent instanceof exp.From || parent instanceof exp.Join) {
      return `(${sqlStr})${alias ? ` AS ${alias}` : ""}`;
    }
    return sqlStr;
  }

  // ── tables ────────────────────────────────────────────────────────────

  tableParts(expression: Expression): string {
    return ["catalog", "db", "this"]
      .map((key) => this.sql(expression, key))
      .filter(Boolean)
      .join(".");
  }

  tableSql(expression: Expression): string {
    const alias = this.sql(expression, "alias");
    const sample = this.sql(expression, "sample");
    return `${this.tableParts(expression)}${alias ? ` AS ${alias}` : ""}${sample ? ` ${sample}` : ""}`;
  }

  tablealiasSql(expression: Expression): string {
    const columns = this.expressions(expression, { key: "columns" });
    return `${this.sql(expression, "this")}${columns ? `(${columns})` : ""}`;
  }

  tablesampleSql(expression: Expression): string {
    const method = this.sql(expression, "method");
    const rows = expression.flag("rows") ? " ROWS" : "";
    const seed = this.sql(expression, "seed");
    return `${this.ctor.SAMPLE_KEYWORD}${method ? ` ${method}` : ""} (${this.sql(expression, "size")}${rows})${seed ? ` SEED (${seed})` : ""}`;
  }

  lateralSql(expression: Expression): string {
    const alias = this.sql(expression, "alias");
    return `LATERAL ${this.sql(expression, "this")}${alias ? ` AS ${alias}` : ""}`;
  }

  unnestSql(expression: Expression): string {
    const alias = this.sql(expression, "alias");
    return `UNNEST(${this.expressions(expression)})${alias ? ` AS ${alias}` : ""}`;
  }

  // ── leaves ────────────────────────────────────────────────────────────

  identifierSql(expression: Expression): string {
    const text = expression.name;
    if (!expression.flag("quoted")) {
      return text;
    }
    const escaped = text.split(this._identifierEnd).join(this._identifierEnd + this._identifierEnd);
    return `${this._identifierStart}${escaped}${this._identifierEnd}`;
  }

  /** `value` as a string literal in this dialect. */
  quoteString(value: string): string {
    const escaped = value.split(this._quoteEnd).join(this._quoteEnd + this._quoteEnd);
    return `${this._quoteStart}${escaped}${this._quoteEnd}`;
  }

  literalSql(expression: Expression): string {
    const text = expression.text("this");
    return expression.isString ? this.quoteString(text) : text;
  }

  starSql(_expression: Expression): string {
    return "*";
  }

  nullSql(_expression: Expression): string {
    return "NULL";
  }

  booleanSql(expression: Expression): string {
    return expression.flag("this") ? "TRUE" : "FALSE";
  }

  varSql(expression: Expression): string {
    return expression.name;
  }

  placeholderSql(expression: Expression): string {
    const name = expression.name;
    return name ? `:${name}` : "?";
  }

  columnSql(expression: Expression): string {
    return ["catalog", "db", "table", "this"]
      .map((key) => this.sql(expression, key))
      .filter(Boolean)
      .join(".");
  }

  aliasSql(expression: Expression): string {
    const alias = this.sql(expression, "alias");
    return `${this.sql(expression, "this")}${alias ? ` AS ${alias}` : ""}`;
  }

  parenSql(expression: Expression): string {
    return `(${this.sql(expression, "this")})`;
  }

  tupleSql(expression: Expression): string {
    return `(${this.expressions(expression)})`;
  }

  dotSql(expression: Expression): string {
    return `${this.sql(expression, "this")}.${this.sql(expression, "expression")}`;
  }

  bracketSql(expression: Expression): string {
    return `${this.sql(expression, "this")}[${this.expressions(expression)}]`;
  }

  sliceSql(expression: Expression): string {
    return `${this.sql(expression, "this")}:${this.sql(expression, "expression")}`;
  }

  // ── operators ─────────────────────────────────────────────────────────

  /** Left-deep chains of the same operator print without recursion. */
  binary(expression: Expression, op: string): string {
    const rights: string[] = [];
    let node: Expression | undefined = expression;
    while (node && node.key === expression.key) {
      rights.push(this.sql(node, "expression"));
      node = node.this_;
    }
    return [this.sql(node), ...rights.reverse()].join(` ${op} `);
  }

  andSql(expression: Expression): string {
    return this.binary(expression, "AND");
  }

  orSql(expression: Expression): string {
    return this.binary(expression, "OR");
  }

  addSql(expression: Expression): string {
    return this.binary(expression, "+");
  }

  subSql(expression: Expression): string {
    return this.binary(expression, "-");
  }

  mulSql(expression: Expression): string {
    return this.binary(expression, "*");
  }

  divSql(expression: Expression): string {
    return this.binary(expression, "/");
  }

  modSql(expression: Expression): string {
    return this.binary(expression, "%");
  }

  dpipeSql(expression: Expression): string {
    return this.binary(expression, "||");
  }

  eqSql(expression: Expression): string {
    return this.binary(expression, "=");
  }

  neqSql(expression: Expression): string {
    return this.binary(expression, "<>");
  }

  gtSql(expression: Expression): string {
    return this.binary(expression, ">");
  }

  gteSql(expression: Expression): string {
    return this.binary(expression, ">=");
  }

  ltSql(expression: Expression): string {
    return this.binary(expression, "<");
  }

  lteSql(expression: Expression): string {
    return this.binary(expression, "<=");
  }

  isSql(expression: Expression, not: boolean = false): string {
    return `${this.sql(expression, "this")} IS${not ? " NOT" : ""} ${this.sql(expression, "expression")}`;
  }

  likeSql(expression: Expression, not: boolean = false): string {
    return `${this.sql(expression, "this")}${not ? " NOT" : ""} LIKE ${this.sql(expression, "expression")}`;
  }

  ilikeSql(expression: Expression, not: boolean = false): string {
    return `${this.sql(expression, "this")}${not ? " NOT" : ""} ILIKE ${this.sql(expression, "expression")}`;
  }

  regexplikeSql(expression: Expression): string {
    return this.func("REGEXP_LIKE", expression.this_, expression.expression);
  }

  kwargSql(expression: Expression): string {
    return `${this.sql(expression, "this")} => ${this.sql(expression, "expression")}`;
  }

  propertyeqSql(expression: Expression): string {
    return `${this.sql(expression, "this")} := ${this.sql(expression, "expression")}`;
  }

  jsonextractSql(expression: Expression): string {
    return `${this.sql(expression, "this")} -> ${this.sql(expression, "expression")}`;
  }

  jsonextractscalarSql(expression: Expression): string {
    return `${this.sql(expression, "this")} ->> ${this.sql(expression, "expression")}`;
  }

  jsonpathSql(expression: Expression): string {
    return this.quoteString(expression.name);
  }

  inSql(expression: Expression, not: boolean = false): string {
    const query = expression.arg("query");
    const values = query ? this.sql(query) : `(${this.expressions(expression)})`;
    return `${this.sql(expression, "this")}${not ? " NOT" : ""} IN ${values}`;
  }

  betweenSql(expression: Expression, not: boolean = false): string {
    const low = this.sql(expression, "low");
    const high = this.sql(expression, "high");
    return `${this.sql(expression, "this")}${not ? " NOT" : ""} BETWEEN ${low} AND ${high}`;
  }

  existsSql(expression: Expression): string {
    return `EXISTS ${this.wrap(expression)}`;
  }

  notSql(expression: Expression): string {
    const inner = expression.this_;
    if (inner instanceof exp.Is) return this.isSql(inner, true);
    if (inner instanceof exp.In) return this.inSql(inner, true);
    if (inner instanceof exp.Like) return this.likeSql(inner, true);
    if (inner instanceof exp.ILike) return this.ilikeSql(inner, true);
    if (inner instanceof exp.Between) return this.betweenSql(inner, true);
    return `NOT ${this.sql(inner)}`;
  }

  negSql(expression: Expression): string {
    const thisSql = this.sql(expression, "this");
    return `-${thisSql.startsWith("-") ? " " : ""}${thisSql}`;
  }

  // ── casts and types ───────────────────────────────────────────────────

  castSql(expression: Expression): string {
    return `CAST(${this.sql(expression, "this")} AS ${this.sql(expression, "to")})`;
  }

  trycastSql(expression: Expression): string {
    return `TRY_CAST(${this.sql(expression, "this")} AS ${this.sql(expression, "to")})`;
  }

  datatypeSql(expression: exp.DataType): string {
    const typeName = expression.typeName;
    if (expression.flag("nested")) {
      return this.nestedTypeSql(expression);
    }
    const name = this.ctor.TYPE_MAP[typeName] ?? typeName;
    const params = this.ctor.PARAMETERLESS_TYPES.has(name) ? "" : this.expressions(expression);
    return params ? `${name}(${params})` : name;
  }

  /** `ARRAY<inner>` */
  nestedTypeSql(expression: exp.DataType): string {
    return `${expression.typeName}<${this.expressions(expression)}>`;
  }

  intervalSql(expression: Expression): string {
    const unit = this.sql(expression, "unit");
    return `INTERVAL ${this.sql(expression, "this")}${unit ? ` ${unit}` : ""}`;
  }

  // ── conditionals ──────────────────────────────────────────────────────

  caseSql(expression: Expression): string {
    const operand = this.sql(expression, "this");
    const statements: string[] = [operand ? `CASE ${operand}` : "CASE"];

    for (const branch of expression.argList("ifs")) {
      statements.push(`WHEN ${this.sql(branch, "this")}`);
      statements.push(`THEN ${this.sql(branch, "true")}`);
    }

    const fallback = this.sql(expression, "default");
    if (fallback) {
      statements.push(`ELSE ${fallback}`);
    }
    statements.push("END");
    return statements.join(" ");
  }

  ifSql(expression: Expression): string {
    return this.caseSql(new exp.Case({ ifs: [expression], default: expression.arg("false") }));
  }

  // ── functions ─────────────────────────────────────────────────────────

  anonymousSql(expression: exp.Anonymous): string {
    return this.func(expression.fnName, ...expression.expressions);
  }

  extractSql(expression: Expression): string {
    return `EXTRACT(${this.sql(expression, "this")} FROM ${this.sql(expression, "expression")})`;
  }

  unixtotimeSql(expression: Expression): string {
    return this.func("TO_TIMESTAMP", expression.this_, expression.arg("scale"));
  }

  strtotimeSql(expression: Expression): string {
    return this.func("TO_TIMESTAMP", expression.this_, expression.arg("format"));
  }

  currentdateSql(_expression: Expression): string {
    return "CURRENT_DATE";
  }

  currenttimeSql(_expression: Expression): string {
    return "CURRENT_TIME";
  }

  currenttimestampSql(_expression: Expression): string {
    return "CURRENT_TIMESTAMP";
  }

  withingroupSql(expression: Expression): string {
    const order = expression.expression;
    const orderSql = order ? this.orderSql(order, true) : "";
    return `${this.sql(expression, "this")} WITHIN GROUP (${orderSql})`;
  }

  windowSql(expression: Expression): string {
    const partition = this.expressions(expression, { key: "partition_by" });
    const order = expression.arg("order");
    const parts = [
      partition ? `PARTITION BY ${partition}` : "",
      order ? this.orderSql(order, true) : "",
      this.sql(expression, "spec"),
    ];
    return `${this.sql(expression, "this")} OVER (${csv(parts, " ")})`;
  }

  windowspecSql(expression: Expression): string {
    const bound = (value: string, side: string): string => csv([value, side], " ");
    const start = bound(this.sql(expression, "start"), expression.text("start_side"));
    const end = this.sql(expression, "end");
    const kind = expression.text("kind");
    if (!end) {
      return `${kind} ${start}`;
    }
    return `${kind} BETWEEN ${start} AND ${bound(end, expression.text("end_side"))}`;
  }

  // ── DDL ───────────────────────────────────────────────────────────────

  createSql(expression: Expression): string {
    const head = csv(
      [
        "CREATE",
        expression.flag("replace") ? "OR REPLACE" : "",
        expression.flag("temporary") ? "TEMPORARY" : "",
        this.transientSql(expression),
        expression.text("kind"),
        expression.flag("exists") ? "IF NOT EXISTS" : "",
        this.sql(expression, "this"),
      ],
      " ",
    );
    const properties = this.sql(expression, "properties");
    const query = this.sql(expression, "expression");
    return `${head}${properties ? ` ${properties}` : ""}${query ? ` AS ${query}` : ""}`;
  }

  transientSql(expression: Expression): string {
    return expression.flag("transient") ? "TRANSIENT" : "";
  }

  schemaSql(expression: Expression): string {
    const thisSql = this.sql(expression, "this");
    const items = `(${this.expressions(expression)})`;
    return thisSql ? `${thisSql} ${items}` : items;
  }

  columndefSql(expression: Expression): string {
    return csv(
      [
        this.sql(expression, "this"),
        this.sql(expression, "kind"),
        this.expressions(expression, { key: "constraints", sep: " " }),
      ],
      " ",
    );
  }

  columnconstraintSql(expression: exp.ColumnConstraint): string {
    const value = this.sql(expression, "this");
    if (expression.kind === "REFERENCES") {
      return value;
    }
    return csv([expression.kind, value], " ");
  }

  constraintSql(expression: Expression): string {
    return `CONSTRAINT ${this.sql(expression, "this")} ${this.sql(expression, "expression")}`;
  }

  primarykeySql(expression: Expression): string {
    return `PRIMARY KEY (${this.expressions(expression)})`;
  }

  uniquekeySql(expression: Expression): string {
    return `UNIQUE (${this.expressions(expression)})`;
  }

  foreignkeySql(expression: Expression): string {
    const reference = this.sql(expression, "reference");
    return `FOREIGN KEY (${this.expressions(expression)})${reference ? ` ${reference}` : ""}`;
  }

  referenceSql(expression: Expression): string {
    return `REFERENCES ${this.sql(expression, "this")}`;
  }

  propertiesSql(expression: Expression): string {
    return this.expressions(expression, { sep: " " });
  }

  propertySql(expression: Expression): string {
    return `${this.sql(expression, "this")}=${this.sql(expression, "value")}`;
  }

  schemacommentpropertySql(expression: Expression): string {
    return `COMMENT=${this.sql(expression, "this")}`;
  }

  dropSql(expression: Expression): string {
    return csv(
      [
        "DROP",
        expression.text("kind"),
        expression.flag("exists") ? "IF EXISTS" : "",
        this.sql(expression, "this"),
        expression.flag("cascade") ? "CASCADE" : "",
      ],
      " ",
    );
  }

  alterSql(expression: exp.Alter): string {
    const actions = expression.actions.map((action) =>
      action instanceof exp.ColumnDef ? `ADD COLUMN ${this.sql(action)}` : this.sql(action),
    );
    return csv(
      [
        "ALTER",
        expression.kind,
        expression.flag("exists") ? "IF EXISTS" : "",
        this.sql(expression, "this"),
        actions.join(", "),
      ],
      " ",
    );
  }

  altercolumnSql(expression: Expression): string {
    const column = this.sql(expression, "this");
    const dtype = this.sql(expression, "dtype");
    if (dtype) return `ALTER COLUMN ${column} SET DATA TYPE ${dtype}`;
    const comment = this.sql(expression, "comment");
    if (comment) return `ALTER COLUMN ${column} COMMENT ${comment}`;
    const defaultValue = this.sql(expression, "default");
    if (defaultValue) return `ALTER COLUMN ${column} SET DEFAULT ${defaultValue}`;
    const drop = expression.text("drop");
    if (drop) return `ALTER COLUMN ${column} DROP ${drop}`;
    if (expression.flag("not_null")) return `ALTER COLUMN ${column} SET NOT NULL`;
    return `ALTER COLUMN ${column}`;
  }

  renametableSql(expression: Expression): string {
    return `RENAME TO ${this.sql(expression, "this")}`;
  }

  renamecolumnSql(expression: Expression): string {
    return `RENAME COLUMN ${this.sql(expression, "this")} TO ${this.sql(expression, "to")}`;
  }

  setSql(expression: Expression): string {
    const keyword = expression.flag("unset") ? "UNSET" : "SET";
    const tag = expression.flag("tag") ? " TAG" : "";
    return `${keyword}${tag} ${this.expressions(expression)}`;
  }

  commentSql(expression: Expression): string {
    const exists = expression.flag("exists") ? " IF EXISTS" : "";
    return `COMMENT${exists} ON ${expression.text("kind")} ${this.sql(expression, "this")} IS ${this.sql(expression, "expression")}`;
  }

  // ── other statements ──────────────────────────────────────────────────

  useSql(expression: Expression): string {
    return csv(["USE", expression.text("kind"), this.sql(expression, "this")], " ");
  }

  showSql(expression: Expression): string {
    const like = this.sql(expression, "like");
    const scopeKind = expression.text("scope_kind");
    const scope = this.sql(expression, "scope");
    const startsWith = this.sql(expression, "starts_with");
    return [
      csv(["SHOW", expression.flag("terse") ? "TERSE" : "", expression.name], " "),
      like ? ` LIKE ${like}` : "",
      scopeKind || scope ? ` IN ${csv([scopeKind, scope], " ")}` : "",
      startsWith ? ` STARTS WITH ${startsWith}` : "",
      this.sql(expression, "limit"),
    ].join("");
  }

  describeSql(expression: Expression): string {
    return csv(["DESCRIBE", expression.text("kind"), this.sql(expression, "this")], " ");
  }

  insertSql(expression: Expression): string {
    const overwrite = expression.flag("overwrite") ? " OVERWRITE" : "";
    return `INSERT${overwrite} INTO ${this.sql(expression, "this")} ${this.sql(expression, "expression")}`;
  }

  updateSql(expression: Expression): string {
    return [
      `UPDATE ${this.sql(expression, "this")} SET ${this.expressions(expression)}`,
      this.sql(expression, "from_"),
      this.sql(expression, "where"),
    ].join("");
  }

  deleteSql(expression: Expression): string {
    const using = this.expressions(expression, { key: "using" });
    return [
      `DELETE FROM ${this.sql(expression, "this")}`,
      using ? ` USING ${using}` : "",
      this.sql(expression, "where"),
    ].join("");
  }

  commandSql(expression: exp.Command): string {
    return csv([expression.name, expression.rest], " ");
  }
}
