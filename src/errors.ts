export enum ErrorLevel {
  IGNORE = "IGNORE",
  WARN = "WARN",
  RAISE = "RAISE",
  IMMEDIATE = "IMMEDIATE",
}

export class TranslationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TranslationError";
  }
}

/** A recognized construct the target engine cannot express. Aborts the statement. */
export class UnsupportedError extends TranslationError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedError";
  }
}

/**
 * The tree or the caller's input breaks a precondition of a rule, e.g. a
 * `CREATE DATABASE` without a name.
 */
export class MalformedInputError extends TranslationError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class AmbiguousContextError extends TranslationError {
  readonly missing: "database" | "schema";

  constructor(missing: "database" | "schema", statement: string) {
    super(`No current ${missing} is set; cannot resolve ${statement}`);
    this.name = "AmbiguousContextError";
    this.missing = missing;
  }
}

export interface ParseErrorDetail {
  description: string | null;
  line: number | null;
  col: number | null;
  start_context: string | null;
  highlight: string | null;
  end_context: string | null;
  into_expression: string | null;
}

export class ParseError extends TranslationError {
  errors: ParseErrorDetail[];

  constructor(message: string, errors: ParseErrorDetail[] = []) {
    super(message);
    this.name = "ParseError";
    this.errors = errors;
  }

  static new(
    message: string,
    description?: string | null,
    line?: number | null,
    col?: number | null,
    startContext?: string | null,
    highlight?: string | null,
    endContext?: string | null,
    intoExpression?: string | null,
  ): ParseError {
    return new ParseError(message, [
      {
        description: description ?? null,
        line: line ?? null,
        col: col ?? null,
        start_context: startContext ?? null,
        highlight: highlight ?? null,
        end_context: endContext ?? null,
        into_expression: intoExpression ?? null,
      },
    ]);
  }
}

export class TokenError extends TranslationError {
  constructor(message: string) {
    super(message);
    this.name = "TokenError";
  }
}

export class GenerateError extends TranslationError {
  constructor(message: string) {
    super(message);
    this.name = "GenerateError";
  }
}

export const ANSI_UNDERLINE = "\x1b[4m";
export const ANSI_RESET = "\x1b[0m";
export const ERROR_MESSAGE_CONTEXT_DEFAULT = 100;

/**
 * Underlines `positions` (inclusive start/end offsets) in `sql`.
 *
 * @returns the formatted sql, the context before the first highlight, the
 * highlighted text and the context after the last one
 */
export function highlightSql(
  sql: string,
  positions: Array<[number, number]>,
  contextLength: number = ERROR_MESSAGE_CONTEXT_DEFAULT,
): [string, string, string, string] {
  const sortedPositions = [...positions].sort((a, b) => a[0] - b[0]);
  const firstPos = sortedPositions[0];
  if (!firstPos) {
    throw new RangeError("positions must contain at least one (start, end) pair");
  }

  let startContext = "";
  let endContext = "";
  let firstHighlightStart = 0;
  let previousPartEnd = 0;
  const formattedParts: string[] = [];

  if (firstPos[0] > 0) {
    firstHighlightStart = firstPos[0];
    startContext = sql.slice(
      Math.max(0, firstHighlightStart - contextLength),
      firstHighlightStart,
    );
    formattedParts.push(startContext);
    previousPartEnd = firstHighlightStart;
  }

  for (const [start, end] of sortedPositions) {
    const highlightStart = Math.max(start, previousPartEnd);
    const highlightEnd = end + 1;
    if (highlightStart >= highlightEnd) {
      continue;
    }
    if (highlightStart > previousPartEnd) {
      formattedParts.push(sql.slice(previousPartEnd, highlightStart));
    }
    formattedParts.push(
      `${ANSI_UNDERLINE}${sql.slice(highlightStart, highlightEnd)}${ANSI_RESET}`,
    );
    previousPartEnd = highlightEnd;
  }

  if (previousPartEnd < sql.length) {
    endContext = sql.slice(previousPartEnd, previousPartEnd + contextLength);
    formattedParts.push(endContext);
  }

  return [
    formattedParts.join(""),
    startContext,
    sql.slice(firstHighlightStart, previousPartEnd),
    endContext,
  ];
}

export function concatMessages(errors: readonly unknown[], maximum: number): string {
  const msg = errors.slice(0, maximum).map((e) => String(e));
  const remaining = errors.length - maximum;
  if (remaining > 0) {
    msg.push(`... and ${remaining} more`);
  }
  return msg.join("\n\n");
}

export function mergeErrors(errors: readonly ParseError[]): ParseErrorDetail[] {
  return errors.flatMap((error) => error.errors);
}
