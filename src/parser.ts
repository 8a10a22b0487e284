import { TokenType, Token } from "./tokens.js";
import * as exp from "./expressions.js";
import type { Expression } from "./expressions.js";
import {
  ParseError,
  ErrorLevel,
  highlightSql,
  concatMessages,
  mergeErrors,
} from "./errors.js";
import { seqGet } from "./helper.js";
import { logger } from "./logger.js";

/** Builds the node for a call once its arguments are parsed. */
export type FunctionBuilder = (args: Expression[]) => Expression;

type OperatorTable = Partial<Record<TokenType, exp.ExpressionClass>>;

export interface ParserOptions {
  errorLevel?: ErrorLevel;
  maxErrors?: number;
  errorMessageContext?: number;
}

function buildFunctions(): Record<string, FunctionBuilder> {
  const functions: Record<string, FunctionBuilder> = {};
  for (const cls of exp.FUNCTION_CLASSES) {
    for (const name of cls.sqlNames()) {
      functions[name] = (args) => cls.fromArgList(args);
    }
  }
  return functions;
}

const VAR_LEN_FUNCTIONS: ReadonlySet<exp.ExpressionKind> = new Set(
  exp.FUNCTION_CLASSES.filter((cls) => cls.isVarLenArgs).map((cls) => cls.key),
);

const TYPE_TOKENS: ReadonlyMap<TokenType, exp.DTypeName> = new Map([
  [TokenType.ARRAY, exp.DType.ARRAY],
  [TokenType.BIGINT, exp.DType.BIGINT],
  [TokenType.BINARY, exp.DType.BINARY],
  [TokenType.BOOLEAN, exp.DType.BOOLEAN],
  [TokenType.CHAR, exp.DType.CHAR],
  [TokenType.DATE, exp.DType.DATE],
  [TokenType.DATETIME, exp.DType.DATETIME],
  [TokenType.DECIMAL, exp.DType.DECIMAL],
  [TokenType.DOUBLE, exp.DType.DOUBLE],
  [TokenType.FLOAT, exp.DType.FLOAT],
  [TokenType.GEOGRAPHY, exp.DType.GEOGRAPHY],
  [TokenType.INT, exp.DType.INT],
  [TokenType.JSON, exp.DType.JSON],
  [TokenType.MAP, exp.DType.MAP],
  [TokenType.NCHAR, exp.DType.NCHAR],
  [TokenType.NVARCHAR, exp.DType.NVARCHAR],
  [TokenType.OBJECT, exp.DType.OBJECT],
  [TokenType.SMALLINT, exp.DType.SMALLINT],
  [TokenType.STRUCT, exp.DType.STRUCT],
  [TokenType.TEXT, exp.DType.TEXT],
  [TokenType.TIME, exp.DType.TIME],
  [TokenType.TIMESTAMP, exp.DType.TIMESTAMP],
  [TokenType.TIMESTAMPLTZ, exp.DType.TIMESTAMPLTZ],
  [TokenType.TIMESTAMPNTZ, exp.DType.TIMESTAMP],
  [TokenType.TIMESTAMPTZ, exp.DType.TIMESTAMPTZ],
  [TokenType.TINYINT, exp.DType.TINYINT],
  [TokenType.UUID, exp.DType.UUID],
  [TokenType.VARBINARY, exp.DType.VARBINARY],
  [TokenType.VARCHAR, exp.DType.VARCHAR],
  [TokenType.VARIANT, exp.DType.VARIANT],
]);

// Keywords that may still name a column, table or alias.
const ID_VAR_TOKENS: ReadonlySet<TokenType> = new Set([
  TokenType.VAR,
  TokenType.COLUMN,
  TokenType.COMMAND,
  TokenType.COMMENT,
  TokenType.DATABASE,
  TokenType.DEFAULT,
  TokenType.FIRST,
  TokenType.FUNCTION,
  TokenType.RECURSIVE,
  TokenType.RENAME,
  TokenType.REPLACE,
  TokenType.SCHEMA,
  TokenType.SHOW,
  TokenType.TABLE,
  TokenType.TEMPORARY,
  TokenType.USE,
  TokenType.VIEW,
  ...TYPE_TOKENS.keys(),
]);

const FUNC_TOKENS: ReadonlySet<TokenType> = new Set([
  TokenType.VAR,
  TokenType.ARRAY,
  TokenType.CHAR,
  TokenType.COMMAND,
  TokenType.DATE,
  TokenType.FIRST,
  TokenType.INSERT,
  TokenType.JSON,
  TokenType.LEFT,
  TokenType.OBJECT,
  TokenType.REPLACE,
  TokenType.RIGHT,
  TokenType.TIME,
  TokenType.TIMESTAMP,
  TokenType.UNNEST,
]);

// Words that follow a table reference and must not be read as its alias.
const TABLE_ALIAS_STOP_WORDS: ReadonlySet<string> = new Set([
  "AT",
  "BEFORE",
  "CHANGES",
  "CONNECT",
  "MATCH_RECOGNIZE",
  "MINUS",
  "PIVOT",
  "START",
  "UNPIVOT",
]);

const OBJECT_KINDS: ReadonlySet<TokenType> = new Set([
  TokenType.TABLE,
  TokenType.VIEW,
  TokenType.SCHEMA,
  TokenType.DATABASE,
]);

const SHOW_CLAUSE_TOKENS: ReadonlySet<TokenType> = new Set([
  TokenType.LIKE,
  TokenType.IN,
  TokenType.LIMIT,
]);

const SAMPLE_METHODS = ["BERNOULLI", "ROW", "SYSTEM", "BLOCK"];

const INTERVAL_UNITS: ReadonlySet<string> = new Set([
  "YEAR",
  "YEARS",
  "MONTH",
  "MONTHS",
  "WEEK",
  "WEEKS",
  "DAY",
  "DAYS",
  "HOUR",
  "HOURS",
  "MINUTE",
  "MINUTES",
  "SECOND",
  "SECONDS",
]);

const WORD_RE = /^\w+$/;
/**
 * Recursive-descent parser for SQL.
 *
 * Produces one tree per statement. DDL it cannot read in full is kept as a
 * Command holding the statement's raw text.
 */
export class Parser {
  // ── dialect-overridable maps ──────────────────────────────────────────

  static CONJUNCTION: OperatorTable = { [TokenType.AND]: exp.And };
  static DISJUNCTION: OperatorTable = { [TokenType.OR]: exp.Or };
  static EQUALITY: OperatorTable = {
    [TokenType.EQ]: exp.EQ,
    [TokenType.NEQ]: exp.NEQ,
  };
  static COMPARISON: OperatorTable = {
    [TokenType.GT]: exp.GT,
    [TokenType.GTE]: exp.GTE,
    [TokenType.LT]: exp.LT,
    [TokenType.LTE]: exp.LTE,
  };
  static TERM: OperatorTable = {
    [TokenType.DASH]: exp.Sub,
    [TokenType.PLUS]: exp.Add,
    [TokenType.DPIPE]: exp.DPipe,
  };
  static FACTOR: OperatorTable = {
    [TokenType.SLASH]: exp.Div,
    [TokenType.STAR]: exp.Mul,
    [TokenType.MOD]: exp.Mod,
  };

  static FUNCTIONS: Record<string, FunctionBuilder> = buildFunctions();

  /** `col:a.b[0]` reads as a JSON path extraction. */
  static COLON_IS_JSON_EXTRACT = false;

  // ── parser state ──────────────────────────────────────────────────────

  private sql: string = "";
  errors: ParseError[] = [];
  private _tokens: Token[] = [];
  private _index: number = 0;
  private _curr: Token | null = null;
  private _next: Token | null = null;
  private _prev: Token | null = null;
  private _prevComments: string[] | null = null;
  private _bracketDepth: number = 0;
  errorLevel: ErrorLevel;
  errorMessageContext: number;
  maxErrors: number;

  constructor(options: ParserOptions = {}) {
    this.errorLevel = options.errorLevel ?? ErrorLevel.IMMEDIATE;
    this.maxErrors = options.maxErrors ?? 3;
    this.errorMessageContext = options.errorMessageContext ?? 100;
  }

  // Static tables are read through the constructor so dialect overrides apply.
  private get ctor(): typeof Parser {
    return this.constructor as typeof Parser;
  }

  // ── public API ────────────────────────────────────────────────────────

  parse(rawTokens: Token[], sql?: string): Array<Expression | null> {
    this._reset();
    this.sql = sql ?? "";

    const total = rawTokens.length;
    const chunks: Token[][] = [[]];
    rawTokens.forEach((token, i) => {
      if (token.tokenType === TokenType.SEMICOLON) {
        if (i < total - 1) {
          chunks.push([]);
        }
      } else {
        chunks[chunks.length - 1]?.push(token);
      }
    });

    const expressions: Array<Expression | null> = [];
    for (const chunk of chunks) {
      this._tokens = chunk;
      this._index = -1;
      this._advance();

      expressions.push(this._parseStatement());

      if (this._index < this._tokens.length) {
        this.raiseError("Invalid expression / Unexpected token");
      }
      this._checkErrors();
    }
    return expressions;
  }

  // ── reset ─────────────────────────────────────────────────────────────

  private _reset(): void {
    this.sql = "";
    this.errors = [];
    this._tokens = [];
    this._index = 0;
    this._curr = null;
    this._next = null;
    this._prev = null;
    this._prevComments = null;
    this._bracketDepth = 0;
  }

  // ── cursor helpers ────────────────────────────────────────────────────

  private _advance(times: number = 1): void {
    this._index += times;
    this._curr = seqGet(this._tokens, this._index) ?? null;
    this._next = seqGet(this._tokens, this._index + 1) ?? null;

    if (this._index > 0) {
      this._prev = this._tokens[this._index - 1] ?? null;
      this._prevComments = this._prev?.comments ?? null;
    } else {
      this._prev = null;
      this._prevComments = null;
    }
  }

  private _retreat(index: number): void {
    if (index !== this._index) {
      this._advance(index - this._index);
    }
  }

  private get _done(): boolean {
    return this._curr === null;
  }

  private get _prevText(): string {
    return this._prev?.text ?? "";
  }

  // ── token matching ────────────────────────────────────────────────────

  private _match(tokenType: TokenType, advance: boolean = true): boolean {
    if (!this._curr) return false;
    if (this._curr.tokenType === tokenType) {
      if (advance) this._advance();
      return true;
    }
    return false;
  }

  private _matchSet(types: ReadonlySet<TokenType>, advance: boolean = true): boolean {
    if (!this._curr) return false;
    if (types.has(this._curr.tokenType)) {
      if (advance) this._advance();
      return true;
    }
    return false;
  }

  private _matchTextSeq(...texts: string[]): boolean {
    const index = this._index;
    for (const text of texts) {
      if (
        this._curr &&
        this._curr.tokenType !== TokenType.STRING &&
        this._curr.text.toUpperCase() === text
      ) {
        this._advance();
      } else {
        this._retreat(index);
        return false;
      }
    }
    return true;
  }

  private _matchTexts(texts: readonly string[]): boolean {
    if (this._curr && this._curr.tokenType !== TokenType.STRING) {
      if (texts.includes(this._curr.text.toUpperCase())) {
        this._advance();
        return true;
      }
    }
    return false;
  }

  private _matchRParen(): void {
    if (!this._match(TokenType.R_PAREN)) {
      this.raiseError("Expecting )");
    }
  }

  // ── error handling ────────────────────────────────────────────────────

  raiseError(message: string, token?: Token | null): void {
    const errorToken = token ?? this._curr ?? this._prev ?? Token.string("");
    const [formattedSql, startContext, highlight, endContext] = highlightSql(
      this.sql,
      [[errorToken.start, errorToken.end]],
      this.errorMessageContext,
    );
    const formattedMessage = `${message}. Line ${errorToken.line}, Col: ${errorToken.col}.\n  ${formattedSql}`;

    const error = ParseError.new(
      formattedMessage,
      message,
      errorToken.line,
      errorToken.col,
      startContext,
      highlight,
      endContext,
    );

    if (this.errorLevel === ErrorLevel.IMMEDIATE) {
      throw error;
    }
    this.errors.push(error);
  }

  private _checkErrors(): void {
    if (this.errorLevel === ErrorLevel.WARN) {
      for (const error of this.errors) {
        logger.warn(error.message);
      }
    } else if (this.errorLevel === ErrorLevel.RAISE && this.errors.length > 0) {
      throw new ParseError(
        concatMessages(this.errors, this.maxErrors),
        mergeErrors(this.errors),
      );
    }
  }

  /** Checks a typed function call against its class's argument table. */
  validateExpression<T extends Expression>(expression: T, args: readonly Expression[]): T {
    if (this.errorLevel === ErrorLevel.IGNORE || !(expression instanceof exp.Func)) {
      return expression;
    }

    const slots = Object.entries(expression.argTypes);
    if (!VAR_LEN_FUNCTIONS.has(expression.key) && args.length > slots.length) {
      this.raiseError(
        `The number of provided arguments (${args.length}) is greater than the maximum number of supported arguments (${slots.length})`,
      );
    }
    for (const [argKey, required] of slots) {
      if (required && expression.args[argKey] === undefined) {
        this.raiseError(`Required keyword: '${argKey}' missing for ${expression.sqlName}`);
      }
    }
    return expression;
  }

  // ── expression factory ────────────────────────────────────────────────

  expression<T extends Expression>(
    klass: exp.ExpressionClass<T>,
    args: exp.Args = {},
    comments?: string[] | null,
  ): T {
    const instance = new klass(args);
    if (comments && comments.length > 0) {
      instance.comments = [...comments];
    }
    return instance;
  }

  // ── CSV parsing ───────────────────────────────────────────────────────

  private _parseCsv<T extends Expression>(
    parseMethod: () => T | null,
    sep: TokenType = TokenType.COMMA,
  ): T[] {
    const result = parseMethod();
    const items: T[] = result !== null ? [result] : [];
    while (this._match(sep)) {
      const item = parseMethod();
      if (item !== null) items.push(item);
    }
    return items;
  }

  private _parseWrapped<T>(parseMethod: () => T, optional: boolean = false): T {
    const wrapped = this._match(TokenType.L_PAREN);
    if (!wrapped && !optional) {
      this.raiseError("Expecting (");
    }
    const result = parseMethod();
    if (wrapped) {
      this._matchRParen();
    }
    return result;
  }

  private _parseWrappedCsv<T extends Expression>(parseMethod: () => T | null): T[] {
    return this._parseWrapped(() => this._parseCsv(parseMethod));
  }

  private _parseWrappedIdentifiers(): exp.Identifier[] {
    return this._parseWrappedCsv(() => this._parseIdentifierOrVar());
  }

  /** Runs `parseMethod`, rewinding and returning null if it raises. */
  private _tryParse<T>(parseMethod: () => T | null): T | null {
    const index = this._index;
    const errorLevel = this.errorLevel;
    this.errorLevel = ErrorLevel.IMMEDIATE;
    try {
      return parseMethod();
    } catch (e) {
      if (!(e instanceof ParseError)) {
        throw e;
      }
      this._retreat(index);
      this._bracketDepth = 0;
      return null;
    } finally {
      this.errorLevel = errorLevel;
    }
  }

  // ── statement parsing ─────────────────────────────────────────────────

  private _parseStatement(): Expression | null {
    const curr = this._curr;
    if (!curr) return null;

    if (curr.tokenType === TokenType.COMMAND || curr.tokenType === TokenType.EXECUTE) {
      this._advance();
      const rest = this._match(TokenType.STRING) ? this._prevText : undefined;
      return this.expression(
        exp.Command,
        { this: curr.text.toUpperCase(), expression: rest },
        curr.comments,
      );
    }

    const ddlParser = this._ddlParser(curr.tokenType);
    if (ddlParser) {
      const index = this._index;
      this._advance();
      const statement = this._tryParse(ddlParser);
      if (statement && this._done) {
        return statement;
      }
      this._retreat(index);
      logger.debug("parser", "Statement kept as command", { keyword: curr.text.toUpperCase() });
      return this._parseAsCommand();
    }

    switch (curr.tokenType) {
      case TokenType.SET:
        return this._parseAsCommand();
      case TokenType.INSERT:
        this._advance();
        return this._parseInsert();
      case TokenType.UPDATE:
        this._advance();
        return this._parseUpdate();
      case TokenType.DELETE:
        this._advance();
        return this._parseDelete();
      default:
        return this._parseSelect() ?? this._parseExpression();
    }
  }

  private _ddlParser(tokenType: TokenType): (() => Expression | null) | undefined {
    switch (tokenType) {
      case TokenType.CREATE:
        return () => this._parseCreate();
      case TokenType.DROP:
        return () => this._parseDrop();
      case TokenType.ALTER:
        return () => this._parseAlter();
      case TokenType.COMMENT:
        return () => this._parseComment();
      case TokenType.USE:
        return () => this._parseUse();
      case TokenType.SHOW:
        return () => this._parseShow();
      case TokenType.DESCRIBE:
      case TokenType.DESC:
        return () => this._parseDescribe();
      default:
        return undefined;
    }
  }

  /** Keeps the rest of the statement verbatim behind its leading keyword. */
  private _parseAsCommand(): exp.Command | null {
    const first = this._curr;
    if (!first) return null;
    this._advance();

    const start = this._curr;
    const last = this._tokens[this._tokens.length - 1];
    let rest: string | undefined;
    if (start && last) {
      rest = this.sql
        ? this.sql.slice(start.start, last.end + 1)
        : this._tokens.slice(this._index).map((token) => token.text).join(" ");
    }
    this._advance(this._tokens.length - this._index);

    return this.expression(
      exp.Command,
      { this: first.text.toUpperCase(), expression: rest },
      first.comments,
    );
  }

  // ── CREATE / DROP / ALTER ─────────────────────────────────────────────

  private _parseCreate(): exp.Create | null {
    const replace = this._matchTextSeq("OR", "REPLACE");
    const temporary = this._match(TokenType.TEMPORARY);
    const transient = this._matchTextSeq("TRANSIENT");

    if (!this._matchSet(OBJECT_KINDS)) {
      return null;
    }
    const kind = this._prevText.toUpperCase();
    const exists = this._matchTextSeq("IF", "NOT", "EXISTS");

    const table = this._parseTableParts();
    if (!table) return null;

    let target: Expression = table;
    if (
      (kind === "TABLE" || kind === "VIEW") &&
      this._curr?.tokenType === TokenType.L_PAREN
    ) {
      const items = this._parseWrappedCsv(() => this._parseColumnDefOrConstraint());
      target = this.expression(exp.Schema, { this: table, expressions: items });
    }

    const properties = this._parseProperties();

    let expression: Expression | null = null;
    if (this._match(TokenType.ALIAS)) {
      expression = this._parseSelect();
      if (!expression) {
        this.raiseError("Expected a query after AS");
      }
    }

    return this.expression(exp.Create, {
      this: target,
      kind,
      replace,
      temporary,
      transient,
      exists,
      properties: properties.length > 0 ? this.expression(exp.Properties, { expressions: properties }) : undefined,
      expression,
    });
  }

  private _parseProperties(): Expression[] {
    const properties: Expression[] = [];
    while (this._curr) {
      if (this._match(TokenType.COMMENT)) {
        this._match(TokenType.EQ);
        properties.push(this.expression(exp.SchemaCommentProperty, { this: this._parsePrimary() }));
        continue;
      }

      const key = this._curr;
      if (this._next?.tokenType === TokenType.EQ && ID_VAR_TOKENS.has(key.tokenType)) {
        this._advance(2);
        properties.push(
          this.expression(exp.Property, {
            this: this.expression(exp.Var, { this: key.text.toUpperCase() }),
            value: this._parsePrimary() ?? this._parseVar(),
          }),
        );
        continue;
      }
      break;
    }
    return properties;
  }

  private _parseColumnDefOrConstraint(): Expression | null {
    return this._parseTableConstraint() ?? this._parseColumnDef();
  }

  private _parseColumnDef(): exp.ColumnDef | null {
    const name = this._parseIdentifierOrVar();
    if (!name) return null;

    const kind = this._parseDataType();
    const constraints: exp.ColumnConstraint[] = [];
    let constraint = this._parseColumnConstraint();
    while (constraint) {
      constraints.push(constraint);
      constraint = this._parseColumnConstraint();
    }

    return this.expression(exp.ColumnDef, { this: name, kind, constraints });
  }

  private _parseColumnConstraint(): exp.ColumnConstraint | null {
    if (this._match(TokenType.CONSTRAINT)) {
      this._parseIdentifierOrVar();
    }

    const constraint = (kind: string, value?: Expression | null): exp.ColumnConstraint =>
      this.expression(exp.ColumnConstraint, { kind, this: value });

    if (this._matchTextSeq("NOT", "NULL")) return constraint("NOT NULL");
    if (this._match(TokenType.NULL)) return constraint("NULL");
    if (this._match(TokenType.PRIMARY_KEY)) return constraint("PRIMARY KEY");
    if (this._match(TokenType.UNIQUE)) return constraint("UNIQUE");
    if (this._match(TokenType.DEFAULT)) return constraint("DEFAULT", this._parseTerm());
    if (this._match(TokenType.COMMENT)) {
      this._match(TokenType.EQ);
      return constraint("COMMENT", this._parsePrimary());
    }
    if (this._match(TokenType.REFERENCES)) {
      this._retreat(this._index - 1);
      return constraint("REFERENCES", this._parseReference());
    }
    if (this._matchTextSeq("COLLATE")) return constraint("COLLATE", this._parsePrimary());
    if (this._matchTexts(["AUTOINCREMENT", "IDENTITY"])) {
      let value: Expression | null = null;
      if (this._curr?.tokenType === TokenType.L_PAREN) {
        value = this.expression(exp.Tuple, {
          expressions: this._parseWrappedCsv(() => this._parsePrimary()),
        });
      } else if (this._matchTextSeq("START")) {
        const start = this._parsePrimary();
        this._matchTextSeq("INCREMENT");
        const increment = this._parsePrimary();
        value = this.expression(exp.Tuple, {
          expressions: [start, increment].filter((e): e is Expression => e !== null),
        });
      }
      return constraint("AUTOINCREMENT", value);
    }
    return null;
  }

  private _parseTableConstraint(): Expression | null {
    if (this._match(TokenType.CONSTRAINT)) {
      const name = this._parseIdentifierOrVar();
      const key = this._parseKeyConstraint();
      if (!key) {
        this.raiseError("Expected PRIMARY KEY, UNIQUE or FOREIGN KEY after CONSTRAINT");
      }
      return this.expression(exp.Constraint, { this: name, expression: key });
    }
    return this._parseKeyConstraint();
  }

  private _parseKeyConstraint(): Expression | null {
    const next = this._next?.tokenType;
    if (next !== TokenType.L_PAREN) return null;

    if (this._match(TokenType.PRIMARY_KEY)) {
      return this.expression(exp.PrimaryKey, { expressions: this._parseWrappedIdentifiers() });
    }
    if (this._match(TokenType.UNIQUE)) {
      return this.expression(exp.UniqueKey, { expressions: this._parseWrappedIdentifiers() });
    }
    if (this._match(TokenType.FOREIGN_KEY)) {
      return this.expression(exp.ForeignKey, {
        expressions: this._parseWrappedIdentifiers(),
        reference: this._parseReference(),
      });
    }
    return null;
  }

  private _parseReference(): exp.Reference | null {
    if (!this._match(TokenType.REFERENCES)) return null;
    const table = this._parseTableParts();
    const columns = this._curr?.tokenType === TokenType.L_PAREN ? this._parseWrappedIdentifiers() : [];
    return this.expression(exp.Reference, {
      this: this.expression(exp.Schema, { this: table, expressions: columns }),
    });
  }

  private _parseDrop(): exp.Drop | null {
    let kind: string;
    if (this._matchSet(OBJECT_KINDS) || this._match(TokenType.VAR)) {
      kind = this._prevText.toUpperCase();
    } else {
      return null;
    }

    const exists = this._matchTextSeq("IF", "EXISTS");
    const target = this._parseTableParts();
    if (!target) return null;

    const cascade = this._matchTextSeq("CASCADE");
    if (!cascade) {
      this._matchTextSeq("RESTRICT");
    }
    return this.expression(exp.Drop, { this: target, kind, exists, cascade });
  }

  private _parseAlter(): exp.Alter | null {
    if (!this._match(TokenType.TABLE)) return null;

    const exists = this._matchTextSeq("IF", "EXISTS");
    const table = this._parseTableParts();
    if (!table) return null;

    const actions = this._parseCsv(() => this._parseAlterAction());
    if (actions.length === 0) return null;

    return this.expression(exp.Alter, { this: table, kind: "TABLE", actions, exists });
  }

  private _parseAlterAction(): Expression | null {
    if (this._matchTextSeq("ADD")) {
      this._match(TokenType.COLUMN);
      this._matchTextSeq("IF", "NOT", "EXISTS");
      return this._parseColumnDef();
    }

    if (this._match(TokenType.DROP)) {
      if (!this._match(TokenType.COLUMN)) return null;
      const exists = this._matchTextSeq("IF", "EXISTS");
      const name = this._parseIdentifierOrVar();
      if (!name) return null;
      return this.expression(exp.Drop, {
        this: this.expression(exp.Column, { this: name }),
        kind: "COLUMN",
        exists,
      });
    }

    if (this._match(TokenType.RENAME)) {
      if (this._match(TokenType.COLUMN)) {
        const from = this._parseIdentifierOrVar();
        if (!from || !this._matchTextSeq("TO")) return null;
        const to = this._parseIdentifierOrVar();
        if (!to) return null;
        return this.expression(exp.RenameColumn, {
          this: this.expression(exp.Column, { this: from }),
          to: this.expression(exp.Column, { this: to }),
        });
      }
      if (this._matchTextSeq("TO")) {
        return this.expression(exp.RenameTable, { this: this._parseTableParts() });
      }
      return null;
    }

    if (this._match(TokenType.ALTER) || this._matchTextSeq("MODIFY")) {
      this._match(TokenType.COLUMN);
      return this._parseAlterColumn();
    }

    // `ALTER COLUMN a COMMENT 'x', COLUMN b COMMENT 'y'`
    if (this._match(TokenType.COLUMN)) {
      return this._parseAlterColumn();
    }

    if (this._match(TokenType.SET)) {
      const tag = this._matchTextSeq("TAG");
      return this.expression(exp.SetAction, {
        expressions: this._parseCsv(() => this._parseSetItem()),
        tag,
      });
    }

    if (this._matchTextSeq("UNSET")) {
      const tag = this._matchTextSeq("TAG");
      return this.expression(exp.SetAction, {
        expressions: this._parseCsv(() => this._parseColumn()),
        tag,
        unset: true,
      });
    }

    return null;
  }

  private _parseAlterColumn(): exp.AlterColumn | null {
    const name = this._parseIdentifierOrVar();
    if (!name) return null;
    const column = this.expression(exp.Column, { this: name });

    if (this._match(TokenType.COMMENT)) {
      return this.expression(exp.AlterColumn, { this: column, comment: this._parsePrimary() });
    }
    if (
      this._matchTextSeq("SET", "DATA", "TYPE") ||
      this._matchTextSeq("SET", "TYPE") ||
      this._matchTextSeq("TYPE")
    ) {
      return this.expression(exp.AlterColumn, { this: column, dtype: this._parseDataType() });
    }
    if (this._matchTextSeq("SET", "DEFAULT")) {
      return this.expression(exp.AlterColumn, { this: column, default: this._parseTerm() });
    }
    if (this._matchTextSeq("DROP", "DEFAULT")) {
      return this.expression(exp.AlterColumn, { this: column, drop: "DEFAULT" });
    }
    if (this._matchTextSeq("SET", "NOT", "NULL")) {
      return this.expression(exp.AlterColumn, { this: column, not_null: true });
    }
    if (this._matchTextSeq("DROP", "NOT", "NULL")) {
      return this.expression(exp.AlterColumn, { this: column, drop: "NOT NULL" });
    }

    const dtype = this._parseDataType();
    return dtype ? this.expression(exp.AlterColumn, { this: column, dtype }) : null;
  }

  /** `key = value` */
  private _parseSetItem(): Expression | null {
    const key = this._parseColumn();
    if (!key || !this._match(TokenType.EQ)) return null;
    return this.expression(exp.EQ, { this: key, expression: this._parseDisjunction() });
  }

  // ── COMMENT / USE / SHOW / DESCRIBE ───────────────────────────────────

  private _parseComment(): exp.Comment | null {
    const exists = this._matchTextSeq("IF", "EXISTS");
    if (!this._match(TokenType.ON)) return null;

    const kindToken = this._curr;
    if (!kindToken || !(this._matchSet(OBJECT_KINDS) || this._match(TokenType.COLUMN) || this._match(TokenType.FUNCTION) || this._match(TokenType.VAR))) {
      return null;
    }
    const kind = kindToken.text.toUpperCase();

    const target = kind === "COLUMN" ? this._parseColumn() : this._parseTableParts();
    if (!target || !this._match(TokenType.IS)) return null;

    return this.expression(exp.Comment, {
      this: target,
      kind,
      expression: this._parsePrimary(),
      exists,
    });
  }

  private _parseUse(): exp.Use | null {
    let kind: string | undefined;
    if (this._match(TokenType.DATABASE) || this._match(TokenType.SCHEMA) || this._matchTexts(["ROLE", "WAREHOUSE"])) {
      kind = this._prevText.toUpperCase();
    } else if (this._matchTextSeq("SECONDARY", "ROLES")) {
      kind = "SECONDARY ROLES";
    }

    const target = this._parseTableParts();
    if (!target) return null;
    return this.expression(exp.Use, { this: target, kind });
  }

  private _parseShow(): exp.Show | null {
    const terse = this._matchTextSeq("TERSE");

    const words: string[] = [];
    while (
      this._curr &&
      !SHOW_CLAUSE_TOKENS.has(this._curr.tokenType) &&
      this._curr.text.toUpperCase() !== "STARTS"
    ) {
      words.push(this._curr.text.toUpperCase());
      this._advance();
    }
    if (words.length === 0) return null;

    let like: Expression | null = null;
    if (this._match(TokenType.LIKE)) {
      like = this._parsePrimary();
    }

    let scopeKind: string | undefined;
    let scope: exp.Table | null = null;
    if (this._match(TokenType.IN)) {
      if (this._matchSet(OBJECT_KINDS) || this._matchTexts(["ACCOUNT"])) {
        scopeKind = this._prevText.toUpperCase();
      }
      if (this._curr && this._curr.tokenType !== TokenType.LIMIT && this._curr.text.toUpperCase() !== "STARTS") {
        scope = this._parseTableParts();
      }
    }

    let startsWith: Expression | null = null;
    if (this._matchTextSeq("STARTS", "WITH")) {
      startsWith = this._parsePrimary();
    }

    let limit: exp.Limit | null = null;
    if (this._match(TokenType.LIMIT)) {
      limit = this.expression(exp.Limit, { expression: this._parsePrimary() });
      if (this._match(TokenType.FROM)) {
        this._parsePrimary();
      }
    }

    return this.expression(exp.Show, {
      this: words.join(" "),
      terse,
      like,
      scope_kind: scopeKind,
      scope,
      starts_with: startsWith,
      limit,
    });
  }

  private _parseDescribe(): exp.Describe | null {
    let kind: string | undefined;
    if (this._matchSet(OBJECT_KINDS)) {
      kind = this._prevText.toUpperCase();
    }

    const target = this._parseTableParts();
    if (!target) return null;

    if (this._matchTextSeq("TYPE")) {
      this._match(TokenType.EQ);
      this._parseVar();
    }
    return this.expression(exp.Describe, { this: target, kind });
  }

  // ── DML ───────────────────────────────────────────────────────────────

  private _parseInsert(): exp.Insert {
    const overwrite = this._matchTextSeq("OVERWRITE");
    if (!this._match(TokenType.INTO)) {
      this.raiseError("Expected INTO after INSERT");
    }

    const table = this._parseTableParts();
    if (!table) {
      this.raiseError("Expected table name");
    }

    let target: Expression | null = table;
    if (
      this._curr?.tokenType === TokenType.L_PAREN &&
      this._next?.tokenType !== TokenType.SELECT &&
      this._next?.tokenType !== TokenType.WITH
    ) {
      target = this.expression(exp.Schema, {
        this: table,
        expressions: this._parseWrappedIdentifiers(),
      });
    }

    return this.expression(exp.Insert, {
      this: target,
      expression: this._parseSelect() ?? this._parseExpression(),
      overwrite,
    });
  }

  private _parseUpdate(): exp.Update {
    const table = this._parseTable(false);
    if (!this._match(TokenType.SET)) {
      this.raiseError("Expected SET after table in UPDATE");
    }
    const expressions = this._parseCsv(() => this._parseEquality());

    let from: exp.From | null = null;
    if (this._match(TokenType.FROM)) {
      from = this.expression(exp.From, { this: this._parseTable() });
    }

    return this.expression(exp.Update, {
      this: table,
      expressions,
      from_: from,
      where: this._parseWhere(),
    });
  }

  private _parseDelete(): exp.Delete {
    if (!this._match(TokenType.FROM)) {
      this.raiseError("Expected FROM after DELETE");
    }
    const table = this._parseTable(false);

    let using: Expression[] | undefined;
    if (this._match(TokenType.USING)) {
      using = this._parseCsv(() => this._parseTable());
    }

    return this.expression(exp.Delete, { this: table, using, where: this._parseWhere() });
  }

  // ── SELECT ────────────────────────────────────────────────────────────

  private _parseSelect(): Expression | null {
    const cte = this._parseWith();
    const query = this._parseSelectCore();
    if (!query) {
      if (cte) {
        this.raiseError("Expected SELECT after WITH");
      }
      return null;
    }

    const result = this._parseSetOperations(query);
    if (cte) {
      result.set("with_", cte);
    }
    return result;
  }

  private _parseSelectCore(): Expression | null {
    if (this._match(TokenType.VALUES)) {
      return this._parseValuesBody();
    }
    if (!this._match(TokenType.SELECT)) {
      return null;
    }
    const comments = this._prevComments;

    let distinct: exp.Distinct | null = null;
    if (this._match(TokenType.DISTINCT)) {
      const on = this._match(TokenType.ON)
        ? this.expression(exp.Tuple, { expressions: this._parseWrappedCsv(() => this._parseDisjunction()) })
        : null;
      distinct = this.expression(exp.Distinct, { on });
    } else {
      this._match(TokenType.ALL);
    }

    // A trailing comma before FROM yields a null item, which the csv drops.
    const expressions = this._parseCsv(() => this._parseExpression());
    const select = this.expression(exp.Select, { distinct, expressions }, comments);

    if (this._match(TokenType.FROM)) {
      const table = this._parseTable();
      if (!table) {
        this.raiseError("Expected table after FROM");
      }
      select.set("from_", this.expression(exp.From, { this: table }));
    }

    this._parseQueryModifiers(select);
    return select;
  }

  private _parseQueryModifiers(select: exp.Select): void {
    let join = this._parseJoin();
    while (join) {
      select.append("joins", join);
      join = this._parseJoin();
    }

    select.set("where", this._parseWhere());

    if (this._match(TokenType.GROUP_BY)) {
      select.set(
        "group",
        this._match(TokenType.ALL)
          ? this.expression(exp.Group, { all: true })
          : this.expression(exp.Group, { expressions: this._parseCsv(() => this._parseDisjunction()) }),
      );
    }
    if (this._match(TokenType.HAVING)) {
      select.set("having", this.expression(exp.Having, { this: this._parseDisjunction() }));
    }
    if (this._match(TokenType.QUALIFY)) {
      select.set("qualify", this.expression(exp.Qualify, { this: this._parseDisjunction() }));
    }

    select.set("order", this._parseOrder());

    if (this._match(TokenType.LIMIT)) {
      select.set("limit", this.expression(exp.Limit, { expression: this._parseTerm() }));
    }
    if (this._match(TokenType.OFFSET)) {
      select.set("offset", this.expression(exp.Offset, { expression: this._parseTerm() }));
      this._matchTexts(["ROW", "ROWS"]);
    }
  }

  private _parseWhere(): exp.Where | null {
    if (!this._match(TokenType.WHERE)) return null;
    return this.expression(exp.Where, { this: this._parseDisjunction() });
  }

  private _parseWith(): exp.With | null {
    if (!this._match(TokenType.WITH)) return null;
    const recursive = this._match(TokenType.RECURSIVE);
    const expressions = this._parseCsv(() => this._parseCte());
    return this.expression(exp.With, { expressions, recursive });
  }

  private _parseCte(): exp.CTE | null {
    const name = this._parseIdentifierOrVar();
    if (!name) {
      this.raiseError("Expected CTE name");
      return null;
    }
    const columns = this._curr?.tokenType === TokenType.L_PAREN ? this._parseWrappedIdentifiers() : [];

    if (!this._match(TokenType.ALIAS)) {
      this.raiseError("Expected AS in CTE definition");
    }
    const query = this._parseWrapped(() => this._parseSelect());

    return this.expression(exp.CTE, {
      this: query,
      alias: this.expression(exp.TableAlias, { this: name, columns }),
    });
  }

  private _parseSetOperations(thisExpr: Expression): Expression {
    let result = thisExpr;
    while (this._curr) {
      let klass: exp.ExpressionClass | undefined;
      if (this._match(TokenType.UNION)) {
        klass = exp.Union;
      } else if (this._match(TokenType.INTERSECT)) {
        klass = exp.Intersect;
      } else if (this._match(TokenType.EXCEPT) || this._matchTextSeq("MINUS")) {
        klass = exp.Except;
      } else {
        break;
      }

      const distinct = !this._match(TokenType.ALL);
      this._match(TokenType.DISTINCT);

      const expression =
        this._parseSelectCore() ??
        (this._match(TokenType.L_PAREN) ? this._parseParen() : null);
      if (!expression) {
        this.raiseError("Expected a query after set operator");
      }

      result = this.expression(klass, { this: result, expression, distinct });
    }
    return result;
  }

  private _parseValuesBody(): exp.Values {
    return this.expression(exp.Values, {
      expressions: this._parseCsv(() => this._parseValuesRow()),
    });
  }

  private _parseValuesRow(): exp.Tuple | null {
    if (this._curr?.tokenType !== TokenType.L_PAREN) {
      const value = this._parseDisjunction();
      return value ? this.expression(exp.Tuple, { expressions: [value] }) : null;
    }
    return this.expression(exp.Tuple, {
      expressions: this._parseWrappedCsv(() => this._parseDisjunction()),
    });
  }

  // ── FROM / JOIN ───────────────────────────────────────────────────────

  private _parseTable(allowFunctions: boolean = true): Expression | null {
    if (this._match(TokenType.LATERAL)) {
      return this._parseLateral();
    }

    if (this._curr?.tokenType === TokenType.TABLE && this._next?.tokenType === TokenType.L_PAREN) {
      this.raiseError("TABLE(...) table functions are not supported");
    }

    if (this._match(TokenType.L_PAREN)) {
      if (this._match(TokenType.VALUES)) {
        const values = this._parseValuesBody();
        this._matchRParen();
        values.set("alias", this._parseTableAlias());
        return values;
      }
      const query = this._parseSelect();
      if (!query) {
        this.raiseError("Expected a query in parentheses");
      }
      this._matchRParen();
      return this.expression(exp.Subquery, { this: query, alias: this._parseTableAlias() });
    }

    if (this._match(TokenType.VALUES)) {
      const values = this._parseValuesBody();
      values.set("alias", this._parseTableAlias());
      return values;
    }

    if (this._curr?.tokenType === TokenType.UNNEST && this._next?.tokenType === TokenType.L_PAREN) {
      this._advance();
      const expressions = this._parseWrappedCsv(() => this._parseDisjunction());
      return this.expression(exp.Unnest, { expressions, alias: this._parseTableAlias() });
    }

    const table = this._parseTableParts(allowFunctions);
    if (!table) return null;

    let sample = this._parseTableSample();
    table.set("alias", this._parseTableAlias());
    sample ??= this._parseTableSample();
    table.set("sample", sample);
    return table;
  }

  /** `[catalog.][db.]name`; a call such as `IDENTIFIER('t')` may stand for the name. */
  private _parseTableParts(allowFunctions: boolean = false): exp.Table | null {
    const parts: Expression[] = [];
    do {
      const part = (allowFunctions ? this._parseFunction() : null) ?? this._parseIdentifierOrVar(parts.length > 0);
      if (!part) {
        if (parts.length > 0) {
          this.raiseError("Expected identifier after .");
        }
        break;
      }
      parts.push(part);
    } while (this._match(TokenType.DOT));

    if (parts.length === 0) return null;
    if (parts.length > 3) {
      this.raiseError("Table names take at most three parts");
    }

    const [name, db, catalog] = [...parts].reverse();
    return this.expression(exp.Table, { this: name, db, catalog });
  }

  private _parseTableAlias(): exp.TableAlias | null {
    const explicit = this._match(TokenType.ALIAS);
    const curr = this._curr;
    if (!explicit && curr && TABLE_ALIAS_STOP_WORDS.has(curr.text.toUpperCase())) {
      return null;
    }

    const alias = this._parseIdentifierOrVar(explicit);
    const columns =
      alias && this._curr?.tokenType === TokenType.L_PAREN ? this._parseWrappedIdentifiers() : [];

    if (!alias) {
      if (explicit) {
        this.raiseError("Expected alias after AS");
      }
      return null;
    }
    return this.expression(exp.TableAlias, { this: alias, columns });
  }

  private _parseTableSample(): exp.TableSample | null {
    if (!this._match(TokenType.TABLE_SAMPLE)) return null;

    const method = this._matchTexts(SAMPLE_METHODS) ? this._prevText.toUpperCase() : undefined;
    if (!this._match(TokenType.L_PAREN)) {
      this.raiseError("Expecting ( after SAMPLE");
    }
    const size = this._parsePrimary();
    const rows = this._matchTextSeq("ROWS");
    this._matchRParen();

    let seed: Expression | null = null;
    if (this._matchTexts(["SEED", "REPEATABLE"])) {
      seed = this._parseWrapped(() => this._parsePrimary());
    }

    return this.expression(exp.TableSample, { method, size, rows, seed });
  }

  private _parseLateral(): exp.Lateral {
    const target =
      this._curr?.tokenType === TokenType.L_PAREN
        ? this._parseTable()
        : this._parseFunction();
    if (!target) {
      this.raiseError("Expected a function or subquery after LATERAL");
    }

    let alias = this._parseTableAlias();
    if (!alias && target instanceof exp.Explode) {
      alias = this.expression(exp.TableAlias, { this: exp.toIdentifier("_flattened") });
    }
    return this.expression(exp.Lateral, { this: target, alias });
  }

  private _parseJoin(): exp.Join | null {
    if (this._match(TokenType.COMMA)) {
      const table = this._parseTable();
      return table ? this.expression(exp.Join, { this: table }) : null;
    }

    const index = this._index;
    this._match(TokenType.NATURAL);
    const side = this._match(TokenType.LEFT) || this._match(TokenType.RIGHT) || this._match(TokenType.FULL)
      ? this._prevText.toUpperCase()
      : undefined;
    const kind = this._match(TokenType.INNER) || this._match(TokenType.CROSS) || this._match(TokenType.OUTER)
      ? this._prevText.toUpperCase()
      : undefined;

    if (!this._match(TokenType.JOIN)) {
      this._retreat(index);
      return null;
    }

    const table = this._parseTable();
    if (!table) {
      this.raiseError("Expected table after JOIN");
    }

    let on: Expression | null = null;
    let using: exp.Identifier[] | undefined;
    if (this._match(TokenType.ON)) {
      on = this._parseDisjunction();
    } else if (this._match(TokenType.USING)) {
      using = this._parseWrappedIdentifiers();
    }

    return this.expression(exp.Join, { this: table, side, kind, on, using });
  }

  // ── ORDER BY / windows ────────────────────────────────────────────────

  private _parseOrder(): exp.Order | null {
    if (!this._match(TokenType.ORDER_BY)) return null;
    return this.expression(exp.Order, { expressions: this._parseCsv(() => this._parseOrdered()) });
  }

  private _parseOrdered(): exp.Ordered | null {
    const thisExpr = this._parseDisjunction();
    if (!thisExpr) return null;

    const desc = this._match(TokenType.DESC);
    if (!desc) {
      this._match(TokenType.ASC);
    }

    let nullsFirst: boolean | undefined;
    if (this._matchTextSeq("NULLS", "FIRST")) {
      nullsFirst = true;
    } else if (this._matchTextSeq("NULLS", "LAST")) {
      nullsFirst = false;
    }

    return this.expression(exp.Ordered, { this: thisExpr, desc, nulls_first: nullsFirst });
  }

  private _parseWithinGroup(thisExpr: Expression): Expression {
    if (!this._matchTextSeq("WITHIN", "GROUP")) return thisExpr;
    const order = this._parseWrapped(() => this._parseOrder());
    return this.expression(exp.WithinGroup, { this: thisExpr, expression: order });
  }

  private _parseWindow(thisExpr: Expression): Expression {
    if (!this._match(TokenType.OVER)) return thisExpr;
    if (!this._match(TokenType.L_PAREN)) {
      this.raiseError("Expecting ( after OVER");
      return thisExpr;
    }

    const partition = this._match(TokenType.PARTITION_BY)
      ? this._parseCsv(() => this._parseDisjunction())
      : undefined;
    const order = this._parseOrder();
    const spec = this._parseWindowSpec();
    this._matchRParen();

    return this.expression(exp.Window, { this: thisExpr, partition_by: partition, order, spec });
  }

  private _parseWindowSpec(): exp.WindowSpec | null {
    if (!this._matchTexts(["ROWS", "RANGE"])) return null;
    const kind = this._prevText.toUpperCase();

    if (this._match(TokenType.BETWEEN)) {
      const [start, startSide] = this._parseWindowBound();
      if (!this._match(TokenType.AND)) {
        this.raiseError("Expected AND in window frame");
      }
      const [end, endSide] = this._parseWindowBound();
      return this.expression(exp.WindowSpec, {
        kind,
        start,
        start_side: startSide,
        end,
        end_side: endSide,
      });
    }

    const [start, startSide] = this._parseWindowBound();
    return this.expression(exp.WindowSpec, { kind, start, start_side: startSide });
  }

  private _parseWindowBound(): [string | Expression | null, string | undefined] {
    if (this._matchTextSeq("CURRENT", "ROW")) {
      return ["CURRENT ROW", undefined];
    }
    const value = this._matchTextSeq("UNBOUNDED") ? "UNBOUNDED" : this._parsePrimary();
    const side = this._matchTexts(["PRECEDING", "FOLLOWING"]) ? this._prevText.toUpperCase() : undefined;
    return [value, side];
  }

  // ── expressions ───────────────────────────────────────────────────────

  private _parseExpression(): Expression | null {
    return this._parseAlias(this._parseDisjunction());
  }

  private _parseAlias(thisExpr: Expression | null): Expression | null {
    if (!thisExpr) return null;

    const explicit = this._match(TokenType.ALIAS);
    let alias: exp.Identifier | null = this._parseIdentifierOrVar(explicit);
    if (!alias && explicit && this._match(TokenType.STRING)) {
      alias = this.expression(exp.Identifier, { this: this._prevText, quoted: true });
    }

    if (alias) {
      return this.expression(exp.Alias, { this: thisExpr, alias });
    }
    if (explicit) {
      this.raiseError("Expected alias after AS");
    }
    return thisExpr;
  }

  private _parseTokens(parseMethod: () => Expression | null, table: OperatorTable): Expression | null {
    let thisExpr = parseMethod();
    while (this._curr) {
      const klass = table[this._curr.tokenType];
      if (!klass) break;
      const comments = this._curr.comments;
      this._advance();
      thisExpr = this.expression(klass, { this: thisExpr, expression: parseMethod() }, comments);
    }
    return thisExpr;
  }

  private _parseDisjunction(): Expression | null {
    return this._parseTokens(() => this._parseConjunction(), this.ctor.DISJUNCTION);
  }

  private _parseConjunction(): Expression | null {
    return this._parseTokens(() => this._parseEquality(), this.ctor.CONJUNCTION);
  }

  private _parseEquality(): Expression | null {
    return this._parseTokens(() => this._parseComparison(), this.ctor.EQUALITY);
  }

  private _parseComparison(): Expression | null {
    return this._parseTokens(() => this._parseRange(), this.ctor.COMPARISON);
  }

  private _parseRange(): Expression | null {
    const thisExpr = this._parseTerm();
    if (!thisExpr) return null;

    if (this._match(TokenType.IS)) {
      const negate = this._match(TokenType.NOT);
      const value = this._parsePrimary();
      const is = this.expression(exp.Is, { this: thisExpr, expression: value });
      return negate ? this.expression(exp.Not, { this: is }) : is;
    }

    const index = this._index;
    const negate = this._match(TokenType.NOT);
    let result: Expression | null = null;

    if (this._match(TokenType.BETWEEN)) {
      const low = this._parseTerm();
      if (!this._match(TokenType.AND)) {
        this.raiseError("Expected AND after BETWEEN");
      }
      result = this.expression(exp.Between, { this: thisExpr, low, high: this._parseTerm() });
    } else if (this._match(TokenType.IN)) {
      result = this._parseIn(thisExpr);
    } else if (this._match(TokenType.LIKE)) {
      result = this.expression(exp.Like, { this: thisExpr, expression: this._parseTerm() });
    } else if (this._match(TokenType.ILIKE)) {
      result = this.expression(exp.ILike, { this: thisExpr, expression: this._parseTerm() });
    } else if (this._match(TokenType.RLIKE)) {
      result = this.expression(exp.RegexpLike, { this: thisExpr, expression: this._parseTerm() });
    }

    if (!result) {
      this._retreat(index);
      return thisExpr;
    }
    return negate ? this.expression(exp.Not, { this: result }) : result;
  }

  private _parseIn(thisExpr: Expression): exp.In {
    if (!this._match(TokenType.L_PAREN)) {
      this.raiseError("Expecting ( after IN");
    }
    let args: exp.Args;
    if (this._curr?.tokenType === TokenType.SELECT || this._curr?.tokenType === TokenType.WITH) {
      args = { this: thisExpr, query: this.expression(exp.Subquery, { this: this._parseSelect() }) };
    } else {
      args = { this: thisExpr, expressions: this._parseCsv(() => this._parseDisjunction()) };
    }
    this._matchRParen();
    return this.expression(exp.In, args);
  }

  private _parseTerm(): Expression | null {
    return this._parseTokens(() => this._parseFactor(), this.ctor.TERM);
  }

  private _parseFactor(): Expression | null {
    return this._parseTokens(() => this._parseUnary(), this.ctor.FACTOR);
  }

  private _parseUnary(): Expression | null {
    if (this._match(TokenType.NOT)) {
      return this.expression(exp.Not, { this: this._parseEquality() });
    }
    if (this._match(TokenType.DASH)) {
      return this.expression(exp.Neg, { this: this._parseUnary() });
    }
    if (this._match(TokenType.PLUS)) {
      return this._parseUnary();
    }
    if (this._match(TokenType.EXISTS)) {
      return this.expression(exp.Exists, { this: this._parseWrapped(() => this._parseSelect()) });
    }
    return this._parseType();
  }

  private _parseType(): Expression | null {
    if (this._match(TokenType.INTERVAL)) {
      return this._parseInterval();
    }

    // Typed literal: DATE '2024-01-01'
    const curr = this._curr;
    if (curr && TYPE_TOKENS.has(curr.tokenType) && this._next?.tokenType === TokenType.STRING) {
      const to = this._parseDataType();
      return this._parseColumnOps(this.expression(exp.Cast, { this: this._parsePrimary(), to }));
    }

    return this._parseColumnOps(this._parseColumn());
  }

  private _parseInterval(): exp.Interval {
    const value = this._parsePrimary();
    let unit: string | undefined;
    if (this._curr && this._curr.tokenType !== TokenType.STRING && INTERVAL_UNITS.has(this._curr.text.toUpperCase())) {
      unit = this._curr.text.toUpperCase();
      this._advance();
    }
    return this.expression(exp.Interval, { this: value, unit });
  }

  private _parseColumn(): Expression | null {
    const field = this._parseField();
    if (field instanceof exp.Identifier) {
      return this.expression(exp.Column, { this: field });
    }
    return field;
  }

  private _parseField(): Expression | null {
    return this._parsePrimary() ?? this._parseFunction() ?? this._parseIdentifierOrVar();
  }

  /** Postfix operators: `.field`, `[index]`, `::type`, `:path`, `->`, `->>`. */
  private _parseColumnOps(thisExpr: Expression | null): Expression | null {
    let result = thisExpr;
    while (result && this._curr) {
      if (this._match(TokenType.DCOLON)) {
        const to = this._parseDataType();
        if (!to) {
          this.raiseError("Expected type after ::");
        }
        result = this.expression(exp.Cast, { this: result, to });
      } else if (this._match(TokenType.DOT)) {
        result = this._parseDotted(result);
      } else if (this._match(TokenType.L_BRACKET)) {
        result = this._parseBracket(result);
      } else if (
        this.ctor.COLON_IS_JSON_EXTRACT &&
        this._bracketDepth === 0 &&
        this._curr.tokenType === TokenType.COLON &&
        this._next &&
        this._next.tokenType !== TokenType.STRING
      ) {
        this._advance();
        result = this._parseJsonPath(result);
      } else if (this._match(TokenType.ARROW)) {
        result = this.expression(exp.JSONExtract, { this: result, expression: this._parsePrimary() });
      } else if (this._match(TokenType.DARROW)) {
        result = this.expression(exp.JSONExtractScalar, { this: result, expression: this._parsePrimary() });
      } else {
        break;
      }
    }
    return result;
  }

  private _parseDotted(thisExpr: Expression): Expression {
    const field: Expression | null = this._match(TokenType.STAR)
      ? this.expression(exp.Star)
      : this._parseIdentifierOrVar(true);
    if (!field) {
      this.raiseError("Expected identifier after .");
      return thisExpr;
    }

    // a.b.c.d shifts parts left: column, table, db, catalog
    if (thisExpr instanceof exp.Column && !thisExpr.arg("catalog")) {
      return this.expression(exp.Column, {
        this: field,
        table: thisExpr.arg("this"),
        db: thisExpr.arg("table"),
        catalog: thisExpr.arg("db"),
      });
    }
    return this.expression(exp.Dot, { this: thisExpr, expression: field });
  }

  private _parseBracket(thisExpr: Expression): exp.Bracket {
    this._bracketDepth += 1;
    let expressions: Expression[];
    try {
      expressions = this._parseCsv(() => this._parseSlice());
    } finally {
      this._bracketDepth -= 1;
    }
    if (!this._match(TokenType.R_BRACKET)) {
      this.raiseError("Expecting ]");
    }
    return this.expression(exp.Bracket, { this: thisExpr, expressions });
  }

  private _parseSlice(): Expression | null {
    if (this._match(TokenType.COLON)) {
      return this.expression(exp.Slice, { expression: this._parseDisjunction() });
    }
    const start = this._parseDisjunction();
    if (this._match(TokenType.COLON)) {
      return this.expression(exp.Slice, { this: start, expression: this._parseDisjunction() });
    }
    return start;
  }

  /** `col:a.b[0]` after the colon, as `col -> '$.a.b[0]'`. */
  private _parseJsonPath(thisExpr: Expression): exp.JSONExtract {
    const segments: string[] = [];
    const key = (): boolean => {
      const curr = this._curr;
      if (!curr || curr.tokenType === TokenType.STRING || !(curr.tokenType === TokenType.IDENTIFIER || WORD_RE.test(curr.text))) {
        return false;
      }
      this._advance();
      segments.push(exp.jsonPathKey(curr.text));
      return true;
    };

    if (!key()) {
      this.raiseError("Expected a JSON path after :");
    }

    while (this._curr) {
      if (this._curr.tokenType === TokenType.DOT) {
        this._advance();
        if (!key()) {
          this.raiseError("Expected a key after . in JSON path");
        }
      } else if (this._match(TokenType.L_BRACKET)) {
        const index = this._curr;
        if (index?.tokenType === TokenType.NUMBER) {
          segments.push(`[${index.text}]`);
        } else if (index?.tokenType === TokenType.STRING) {
          segments.push(`["${index.text}"]`);
        } else {
          this.raiseError("Expected a number or string in JSON path brackets");
        }
        this._advance();
        if (!this._match(TokenType.R_BRACKET)) {
          this.raiseError("Expecting ]");
        }
      } else {
        break;
      }
    }

    return this.expression(exp.JSONExtract, {
      this: thisExpr,
      expression: this.expression(exp.JSONPath, { this: `$${segments.join("")}` }),
    });
  }

  // ── functions ─────────────────────────────────────────────────────────

  private _parseFunction(): Expression | null {
    const token = this._curr;
    if (!token || this._next?.tokenType !== TokenType.L_PAREN || !FUNC_TOKENS.has(token.tokenType)) {
      return null;
    }
    const upper = token.text.toUpperCase();
    this._advance(2);

    let func: Expression;
    if (upper === "CAST" || upper === "TRY_CAST") {
      func = this._parseCast(upper === "TRY_CAST" ? exp.TryCast : exp.Cast);
    } else if (upper === "EXTRACT") {
      func = this._parseExtract();
    } else {
      const args = this._parseCsv(() => this._parseFunctionArg());
      this._matchRParen();
      func = this._buildFunction(token.text, args);
    }

    return this._parseWindow(this._parseWithinGroup(func));
  }

  private _buildFunction(name: string, args: Expression[]): Expression {
    const builder = this.ctor.FUNCTIONS[name.toUpperCase()];
    if (!builder) {
      return this.expression(exp.Anonymous, { this: name, expressions: args });
    }
    return this.validateExpression(builder(args), args);
  }

  private _parseFunctionArg(): Expression | null {
    if (this._match(TokenType.DISTINCT)) {
      return this.expression(exp.Distinct, {
        expressions: this._parseCsv(() => this._parseDisjunction()),
      });
    }

    const curr = this._curr;
    if (curr && this._next?.tokenType === TokenType.FARROW) {
      this._advance(2);
      return this.expression(exp.Kwarg, {
        this: this.expression(exp.Var, { this: curr.text.toUpperCase() }),
        expression: this._parseDisjunction(),
      });
    }

    return this._parseDisjunction();
  }

  private _parseCast(klass: typeof exp.Cast): exp.Cast {
    const value = this._parseDisjunction();
    if (!this._match(TokenType.ALIAS)) {
      this.raiseError("Expected AS after CAST");
    }
    const to = this._parseDataType();
    if (!to) {
      this.raiseError("Expected type in CAST");
    }
    this._matchRParen();
    return this.expression(klass, { this: value, to });
  }

  private _parseExtract(): exp.Extract {
    const part = this._parseVar();
    if (!this._match(TokenType.FROM) && !this._match(TokenType.COMMA)) {
      this.raiseError("Expected FROM after EXTRACT part");
    }
    const value = this._parseDisjunction();
    this._matchRParen();
    return this.expression(exp.Extract, { this: part, expression: value });
  }

  // ── data types ────────────────────────────────────────────────────────

  private _parseDataType(): exp.DataType | null {
    const curr = this._curr;
    if (!curr) return null;

    const name = TYPE_TOKENS.get(curr.tokenType) ?? (curr.tokenType === TokenType.VAR ? curr.text.toUpperCase() : undefined);
    if (name === undefined) return null;
    this._advance();

    const params =
      this._curr?.tokenType === TokenType.L_PAREN
        ? this._parseWrappedCsv(() => this._parsePrimary() ?? this._parseVar())
        : [];

    let dtype = this.expression(exp.DataType, { this: name, expressions: params });
    while (this._curr?.tokenType === TokenType.L_BRACKET && this._next?.tokenType === TokenType.R_BRACKET) {
      this._advance(2);
      dtype = exp.DataType.arrayOf(dtype);
    }
    return dtype;
  }

  // ── primaries ─────────────────────────────────────────────────────────

  private _parsePrimary(): Expression | null {
    const curr = this._curr;
    if (!curr) return null;

    switch (curr.tokenType) {
      case TokenType.STRING:
        this._advance();
        return exp.Literal.string(curr.text);
      case TokenType.NUMBER:
        this._advance();
        return exp.Literal.number(curr.text);
      case TokenType.NULL:
        this._advance();
        return this.expression(exp.Null);
      case TokenType.TRUE:
      case TokenType.FALSE:
        this._advance();
        return this.expression(exp.Boolean_, { this: curr.tokenType === TokenType.TRUE });
      case TokenType.STAR:
        this._advance();
        return this.expression(exp.Star);
      case TokenType.PLACEHOLDER:
        this._advance();
        return this.expression(exp.Placeholder);
      case TokenType.CASE:
        this._advance();
        return this._parseCase();
      case TokenType.CURRENT_DATE:
        return this._parseCurrent(exp.CurrentDate);
      case TokenType.CURRENT_TIME:
        return this._parseCurrent(exp.CurrentTime);
      case TokenType.CURRENT_TIMESTAMP:
        return this._parseCurrent(exp.CurrentTimestamp);
      case TokenType.L_PAREN:
        this._advance();
        return this._parseParen();
      default:
        return null;
    }
  }

  /** `CURRENT_DATE` with or without `()`; a precision argument is accepted and dropped. */
  private _parseCurrent<T extends exp.Func>(klass: exp.ExpressionClass<T>): T {
    this._advance();
    if (this._match(TokenType.L_PAREN)) {
      this._parsePrimary();
      this._matchRParen();
    }
    return this.expression(klass);
  }

  private _parseParen(): Expression | null {
    if (this._curr?.tokenType === TokenType.SELECT || this._curr?.tokenType === TokenType.WITH) {
      const query = this._parseSelect();
      this._matchRParen();
      return this.expression(exp.Subquery, { this: query });
    }

    const expressions = this._parseCsv(() => this._parseExpression());
    const trailingComma = this._prev?.tokenType === TokenType.COMMA;
    this._matchRParen();

    const [first] = expressions;
    if (expressions.length === 1 && first && !trailingComma) {
      return this.expression(exp.Paren, { this: first });
    }
    return this.expression(exp.Tuple, { expressions });
  }

  private _parseCase(): exp.Case {
    const operand = this._curr?.tokenType === TokenType.WHEN ? null : this._parseDisjunction();

    const ifs: exp.If[] = [];
    while (this._match(TokenType.WHEN)) {
      const condition = this._parseDisjunction();
      if (!this._match(TokenType.THEN)) {
        this.raiseError("Expected THEN after WHEN condition");
      }
      ifs.push(this.expression(exp.If, { this: condition, true: this._parseDisjunction() }));
    }

    const fallback = this._match(TokenType.ELSE) ? this._parseDisjunction() : null;
    if (!this._match(TokenType.END)) {
      this.raiseError("Expected END after CASE");
    }
    return this.expression(exp.Case, { this: operand, ifs, default: fallback });
  }

  private _parseIdentifierOrVar(anyToken: boolean = false): exp.Identifier | null {
    const curr = this._curr;
    if (!curr) return null;

    if (curr.tokenType === TokenType.IDENTIFIER) {
      this._advance();
      return this.expression(exp.Identifier, { this: curr.text, quoted: true });
    }
    if (
      ID_VAR_TOKENS.has(curr.tokenType) ||
      (anyToken && curr.tokenType !== TokenType.STRING && WORD_RE.test(curr.text))
    ) {
      this._advance();
      return this.expression(exp.Identifier, { this: curr.text, quoted: false });
    }
    return null;
  }

  private _parseVar(): exp.Var | null {
    const curr = this._curr;
    if (!curr || curr.tokenType === TokenType.STRING || !WORD_RE.test(curr.text)) {
      return null;
    }
    this._advance();
    return this.expression(exp.Var, { this: curr.text.toUpperCase() });
  }
}
