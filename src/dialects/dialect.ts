import type { Expression } from "../expressions.js";
import { Generator, type GeneratorOptions, type QuoteSettings } from "../generator.js";
import { Parser, type ParserOptions } from "../parser.js";
import { Tokenizer } from "../tokenizer.js";
import type { Token } from "../tokens.js";

export type DialectType = string | Dialect | typeof Dialect | null | undefined;

export type GenerateOptions = Omit<GeneratorOptions, "dialect"> & { copy?: boolean };

const dialects: Map<string, typeof Dialect> = new Map();

/**
 * Base dialect class.
 *
 * The base dialect reads and prints the common subset. A specific dialect
 * subclasses Dialect and overrides the TokenizerClass, ParserClass and
 * GeneratorClass static members.
 */
export class Dialect implements QuoteSettings {
  static QUOTE_START = "'";
  static QUOTE_END = "'";
  static IDENTIFIER_START = '"';
  static IDENTIFIER_END = '"';

  static TokenizerClass: typeof Tokenizer = Tokenizer;
  static ParserClass: typeof Parser = Parser;
  static GeneratorClass: typeof Generator = Generator;

  private get ctor(): typeof Dialect {
    return this.constructor as typeof Dialect;
  }

  get QUOTE_START(): string {
    return this.ctor.QUOTE_START;
  }
  get QUOTE_END(): string {
    return this.ctor.QUOTE_END;
  }
  get IDENTIFIER_START(): string {
    return this.ctor.IDENTIFIER_START;
  }
  get IDENTIFIER_END(): string {
    return this.ctor.IDENTIFIER_END;
  }

  // ── registry ──────────────────────────────────────────────────────────

  /** Looks up a dialect by name, class or instance. */
  static getOrRaise(dialect?: DialectType): Dialect {
    if (!dialect) return new Dialect();
    if (dialect instanceof Dialect) return dialect;
    if (typeof dialect === "function") return new dialect();

    const DialectClass = dialects.get(dialect.toLowerCase().trim());
    if (!DialectClass) {
      throw new Error(`Unknown dialect '${dialect}'`);
    }
    return new DialectClass();
  }

  static register(names: string | string[], dialectClass: typeof Dialect): void {
    for (const name of Array.isArray(names) ? names : [names]) {
      dialects.set(name.toLowerCase(), dialectClass);
    }
  }

  // ── instance API ──────────────────────────────────────────────────────

  tokenize(sql: string): Token[] {
    return new this.ctor.TokenizerClass().tokenize(sql);
  }

  parse(sql: string, opts: ParserOptions = {}): Array<Expression | null> {
    const parser = new this.ctor.ParserClass(opts);
    return parser.parse(this.tokenize(sql), sql);
  }

  generate(expression: Expression, opts: GenerateOptions = {}): string {
    const { copy, ...generatorOpts } = opts;
    const generator = new this.ctor.GeneratorClass({ ...generatorOpts, dialect: this });
    return generator.generate(expression, copy !== false);
  }

  transpile(sql: string, opts: GenerateOptions = {}): string[] {
    return this.parse(sql).map((expression) =>
      expression ? this.generate(expression, { ...opts, copy: false }) : "",
    );
  }
}

Dialect.register("", Dialect);
