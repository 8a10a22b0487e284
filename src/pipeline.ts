/**
 * The rewrite pipeline: runs an ordered rule catalog over a parsed statement, one full
 * bottom-up pass per rule, with the session context and a side-channel bag in scope.
 */

import {
  PipelineOptionsSchema,
  SessionContextSchema,
  parseInput,
  type PipelineOptions,
  type PipelineOptionsInput,
  type SessionContextInput,
} from "./config.js";
import { AmbiguousContextError } from "./errors.js";
import type { Expression, ExpressionKind, Table } from "./expressions.js";
import { logger } from "./logger.js";

export const MISSING_DATABASE = "missing_database";
export const MISSING_SCHEMA = "missing_schema";

// ---------------------------------------------------------------------------
// Session context
// ---------------------------------------------------------------------------

export interface SessionContext {
  readonly currentDatabase?: string;
  readonly currentSchema?: string;
  readonly databaseFilePath?: string;
}

/** Validates caller input and freezes it. */
export function sessionContext(input: SessionContextInput = {}): SessionContext {
  return Object.freeze(parseInput(SessionContextSchema, input, "session context"));
}

// ---------------------------------------------------------------------------
// Side channel
// ---------------------------------------------------------------------------

export interface TableComment {
  readonly table: Table;
  readonly text: string;
}

export interface ColumnComment {
  readonly column: string;
  readonly text: string;
}

export interface TextLength {
  readonly column: string;
  readonly length: number;
}

/** Metadata DuckDB cannot store, handed back to the caller next to the SQL. */
export interface SideChannel {
  readonly tableComment?: TableComment;
  readonly columnComments?: readonly ColumnComment[];
  readonly textLengths?: readonly TextLength[];
  readonly createDbName?: string;
}

/** Write-only from rules; a later write of the same key replaces the earlier one. */
export class SideChannelBag {
  private tableComment?: TableComment;
  private columnComments?: readonly ColumnComment[];
  private textLengths?: readonly TextLength[];
  private createDbName?: string;

  setTableComment(value: TableComment): void {
    this.tableComment = Object.freeze({ ...value });
  }

  setColumnComments(value: readonly ColumnComment[]): void {
    this.columnComments = Object.freeze(value.map((entry) => Object.freeze({ ...entry })));
  }

  setTextLengths(value: readonly TextLength[]): void {
    this.textLengths = Object.freeze(value.map((entry) => Object.freeze({ ...entry })));
  }

  setCreateDbName(value: string): void {
    this.createDbName = value;
  }

  snapshot(): SideChannel {
    const result: {
      tableComment?: TableComment;
      columnComments?: readonly ColumnComment[];
      textLengths?: readonly TextLength[];
      createDbName?: string;
    } = {};
    if (this.tableComment) result.tableComment = this.tableComment;
    if (this.columnComments) result.columnComments = this.columnComments;
    if (this.textLengths) result.textLengths = this.textLengths;
    if (this.createDbName !== undefined) result.createDbName = this.createDbName;
    return Object.freeze(result);
  }
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export interface RuleScope {
  readonly context: SessionContext;
  readonly sideChannel: SideChannelBag;
  readonly options: PipelineOptions;
  /** Nearest first. The node handed to a rule may be a rebuilt copy, so use these, not `parent`. */
  readonly ancestors: readonly Expression[];
}

/**
 * A tree rewrite. `apply` sees only nodes whose kind is listed in `kinds` and returns
 * either its input or a freshly built replacement.
 */
export interface Rule {
  readonly name: string;
  readonly kinds: readonly ExpressionKind[];
  apply(node: Expression, scope: RuleScope): Expression;
}

/** The current database, or the `missing_database` placeholder unless `strictContext` is on. */
export function resolveDatabase(scope: RuleScope, statement: string): string {
  const database = scope.context.currentDatabase;
  if (database) return database;
  if (scope.options.strictContext) {
    throw new AmbiguousContextError("database", statement);
  }
  return MISSING_DATABASE;
}

export function resolveSchema(scope: RuleScope, statement: string): string {
  const schema = scope.context.currentSchema;
  if (schema) return schema;
  if (scope.options.strictContext) {
    throw new AmbiguousContextError("schema", statement);
  }
  return MISSING_SCHEMA;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface PipelineResult {
  readonly tree: Expression;
  readonly sideChannel: SideChannel;
}

export class Pipeline {
  readonly rules: readonly Rule[];
  readonly options: PipelineOptions;

  constructor(rules: readonly Rule[], options: PipelineOptionsInput = {}) {
    this.rules = Object.freeze([...rules]);
    this.options = Object.freeze(parseInput(PipelineOptionsSchema, options, "pipeline options"));
  }

  /**
   * Runs every rule in order over `tree`. The input tree is never mutated; an error
   * thrown by a rule propagates and no partial result is returned.
   */
  translate(tree: Expression, context: SessionContextInput = {}): PipelineResult {
    const session = sessionContext(context);
    const sideChannel = new SideChannelBag();
    let current = tree;

    for (const rule of this.rules) {
      const kinds: ReadonlySet<ExpressionKind> = new Set(rule.kinds);
      const next = current.transform((node, ancestors) =>
        kinds.has(node.key)
          ? rule.apply(node, { context: session, sideChannel, options: this.options, ancestors })
          : node,
      );
      logger.debug("rule", `Applied ${rule.name}`, { rule: rule.name, changed: next !== current });
      current = next;
    }

    logger.debug("pipeline", "Statement translated", { kind: current.key, rules: this.rules.length });
    return Object.freeze({ tree: current, sideChannel: sideChannel.snapshot() });
  }
}
