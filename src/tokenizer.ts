import { TokenType, Token, isTokenType } from "./tokens.js";
import { TrieResult, newTrie, inTrie, type Trie } from "./trie.js";
import { TokenError } from "./errors.js";
import keywordTable from "./data/keywords.json" with { type: "json" };

type QuoteSpec = string | [string, string];

function convertQuotes(arr: readonly QuoteSpec[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const item of arr) {
    if (typeof item === "string") {
      result[item] = item;
    } else {
      result[item[0]] = item[1];
    }
  }
  return result;
}

function loadKeywords(table: Record<string, string>): Record<string, TokenType> {
  const keywords: Record<string, TokenType> = {};
  for (const [text, name] of Object.entries(table)) {
    if (!isTokenType(name)) {
      throw new TokenError(`Unknown token type ${name} for keyword ${text}`);
    }
    keywords[text] = name;
  }
  return keywords;
}

function isAlnum(ch: string): boolean {
  return /^[0-9A-Za-z]$/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch.length === 1 && ch >= "0" && ch <= "9";
}

function isSpace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f" || ch === "\v";
}

export class Tokenizer {
  // Dialect subclasses override these.

  static SINGLE_TOKENS: Record<string, TokenType> = {
    "(": TokenType.L_PAREN,
    ")": TokenType.R_PAREN,
    "[": TokenType.L_BRACKET,
    "]": TokenType.R_BRACKET,
    "{": TokenType.L_BRACE,
    "}": TokenType.R_BRACE,
    "&": TokenType.AMP,
    "^": TokenType.CARET,
    ":": TokenType.COLON,
    ",": TokenType.COMMA,
    ".": TokenType.DOT,
    "-": TokenType.DASH,
    "=": TokenType.EQ,
    ">": TokenType.GT,
    "<": TokenType.LT,
    "%": TokenType.MOD,
    "!": TokenType.NOT,
    "|": TokenType.PIPE,
    "+": TokenType.PLUS,
    ";": TokenType.SEMICOLON,
    "/": TokenType.SLASH,
    "\\": TokenType.BACKSLASH,
    "*": TokenType.STAR,
    "~": TokenType.TILDE,
    "?": TokenType.PLACEHOLDER,
    "@": TokenType.PARAMETER,
    "#": TokenType.HASH,
    "'": TokenType.UNKNOWN,
    "`": TokenType.UNKNOWN,
    '"': TokenType.UNKNOWN,
  };

  static IDENTIFIERS: QuoteSpec[] = ['"'];
  static QUOTES: QuoteSpec[] = ["'"];
  static STRING_ESCAPES: string[] = ["'"];
  static VAR_SINGLE_TOKENS: Set<string> = new Set();
  static NESTED_COMMENTS = true;

  static KEYWORDS: Record<string, TokenType> = loadKeywords(keywordTable);

  static WHITE_SPACE: Record<string, TokenType> = {
    " ": TokenType.SPACE,
    "\t": TokenType.SPACE,
    "\n": TokenType.BREAK,
    "\r": TokenType.BREAK,
  };

  /** Statements whose remaining text is kept verbatim as one STRING token. */
  static COMMANDS: Set<TokenType> = new Set([TokenType.COMMAND, TokenType.EXECUTE]);

  static COMMAND_PREFIX_TOKENS: Set<TokenType> = new Set([TokenType.SEMICOLON]);

  static COMMENTS: Array<string | [string, string]> = ["--", ["/*", "*/"]];

  private _quotes: Record<string, string> = {};
  private _identifiers: Record<string, string> = {};
  private _stringEscapes: Set<string> = new Set();
  private _comments: Record<string, string | null> = {};
  private _keywordTrie: Trie = new Map();

  sql = "";
  size = 0;
  tokens: Token[] = [];

  private _start = 0;
  private _current = 0;
  private _line = 1;
  private _col = 0;
  private _tokenComments: string[] = [];
  private _char = "";
  private _end = false;
  private _peek = "";
  private _prevTokenLine = -1;

  constructor() {
    this._initializeConfig();
    this.reset();
  }

  // Static settings are read through the constructor so subclass overrides apply.
  private get ctor(): typeof Tokenizer {
    return this.constructor as typeof Tokenizer;
  }

  private _initializeConfig(): void {
    const ctor = this.ctor;

    this._quotes = convertQuotes(ctor.QUOTES);
    this._identifiers = convertQuotes(ctor.IDENTIFIERS);
    this._stringEscapes = new Set(ctor.STRING_ESCAPES);

    this._comments = {};
    for (const comment of ctor.COMMENTS) {
      if (typeof comment === "string") {
        this._comments[comment] = null;
      } else {
        this._comments[comment[0]] = comment[1];
      }
    }

    // Only keywords containing a space or a single-token character need the trie;
    // plain words are resolved by scanVar.
    const trieKeys: string[] = [];
    for (const key of [
      ...Object.keys(ctor.KEYWORDS),
      ...Object.keys(this._comments),
      ...Object.keys(this._quotes),
    ]) {
      const upper = key.toUpperCase();
      if (upper.includes(" ") || [...upper].some((ch) => ch in ctor.SINGLE_TOKENS)) {
        trieKeys.push(upper);
      }
    }
    this._keywordTrie = newTrie(trieKeys);
  }

  reset(): void {
    this.sql = "";
    this.size = 0;
    this.tokens = [];
    this._start = 0;
    this._current = 0;
    this._line = 1;
    this._col = 0;
    this._tokenComments = [];
    this._char = "";
    this._end = false;
    this._peek = "";
    this._prevTokenLine = -1;
  }

  tokenize(sql: string): Token[] {
    this.reset();
    this.sql = sql;
    this.size = sql.length;

    try {
      this.scan();
    } catch (e) {
      if (e instanceof TokenError) {
        throw e;
      }
      const start = Math.max(this._current - 50, 0);
      const end = Math.min(this._current + 50, this.size - 1);
      throw new TokenError(
        `Error tokenizing '${this.sql.slice(start, end)}'${e instanceof Error ? `: ${e.message}` : ""}`,
      );
    }

    return this.tokens;
  }

  private lastToken(): Token | undefined {
    return this.tokens[this.tokens.length - 1];
  }

  private scan(until?: () => boolean): void {
    while (this.size && !this._end) {
      let current = this._current;

      while (current < this.size) {
        const char = this.sql[current];
        if (char === " " || char === "\t") {
          current += 1;
        } else {
          break;
        }
      }

      const offset = current > this._current ? current - this._current : 1;

      this._start = current;
      this.advance(offset);

      if (!isSpace(this._char)) {
        const identifierEnd = this._identifiers[this._char];
        if (isDigit(this._char)) {
          this.scanNumber();
        } else if (identifierEnd !== undefined) {
          this.scanIdentifier(identifierEnd);
        } else {
          this.scanKeywords();
        }
      }

      if (until && until()) {
        break;
      }
    }

    const last = this.lastToken();
    if (last && this._tokenComments.length > 0) {
      last.comments.push(...this._tokenComments);
    }
  }

  private chars(size: number): string {
    if (size === 1) {
      return this._char;
    }
    const start = this._current - 1;
    const end = start + size;
    return end <= this.size ? this.sql.slice(start, end) : "";
  }

  private advance(i: number = 1, alnum: boolean = false): void {
    if (this.ctor.WHITE_SPACE[this._char] === TokenType.BREAK) {
      // \r\n counts as a single line break
      if (!(this._char === "\r" && this._peek === "\n")) {
        this._col = i;
        this._line += 1;
      }
    } else {
      this._col += i;
    }

    this._current += i;
    this._end = this._current >= this.size;
    this._char = this.sql[this._current - 1] ?? "";
    this._peek = this._end ? "" : (this.sql[this._current] ?? "");

    if (alnum && isAlnum(this._char)) {
      let col = this._col;
      let current = this._current;
      let end = this._end;
      let peek = this._peek;

      while (isAlnum(peek)) {
        col += 1;
        current += 1;
        end = current >= this.size;
        peek = end ? "" : (this.sql[current] ?? "");
      }

      this._col = col;
      this._current = current;
      this._end = end;
      this._peek = peek;
      this._char = this.sql[current - 1] ?? "";
    }
  }

  private get text(): string {
    return this.sql.slice(this._start, this._current);
  }

  private add(tokenType: TokenType, text?: string): void {
    this._prevTokenLine = this._line;

    const last = this.lastToken();
    if (this._tokenComments.length > 0 && tokenType === TokenType.SEMICOLON && last) {
      last.comments.push(...this._tokenComments);
      this._tokenComments = [];
    }

    this.tokens.push(
      new Token(
        tokenType,
        text ?? this.text,
        this._line,
        this._col,
        this._start,
        this._current - 1,
        this._tokenComments,
      ),
    );
    this._tokenComments = [];

    // A command token that opens a statement swallows the rest of it as a string.
    const previous = this.tokens[this.tokens.length - 2];
    if (
      this.ctor.COMMANDS.has(tokenType) &&
      this._peek !== ";" &&
      (this.tokens.length === 1 ||
        (previous !== undefined && this.ctor.COMMAND_PREFIX_TOKENS.has(previous.tokenType)))
    ) {
      const start = this._current;
      const tokenCount = this.tokens.length;
      this.scan(() => this._peek === ";");
      this.tokens = this.tokens.slice(0, tokenCount);
      const cmdText = this.sql.slice(start, this._current).trim();
      if (cmdText) {
        this.add(TokenType.STRING, cmdText);
      }
    }
  }

  private scanKeywords(): void {
    let size = 0;
    let word: string | null = null;
    let chars = this.text;
    let char = chars;
    let prevSpace = false;
    let skip = false;
    let trie = this._keywordTrie;
    let singleToken = char in this.ctor.SINGLE_TOKENS;

    while (chars) {
      let result: TrieResult;

      if (skip) {
        result = TrieResult.PREFIX;
      } else {
        [result, trie] = inTrie(trie, char.toUpperCase());
      }

      if (result === TrieResult.FAILED) {
        break;
      }
      if (result === TrieResult.EXISTS) {
        word = chars;
      }

      const end = this._current + size;
      size += 1;

      const next = this.sql[end];
      if (next === undefined) {
        char = "";
        break;
      }

      char = next;
      singleToken = singleToken || char in this.ctor.SINGLE_TOKENS;
      const charIsSpace = isSpace(char);

      if (!charIsSpace || !prevSpace) {
        if (charIsSpace) {
          char = " ";
        }
        chars += char;
        prevSpace = charIsSpace;
        skip = false;
      } else {
        skip = true;
      }
    }

    if (word) {
      if (this.scanString(word)) {
        return;
      }
      if (this.scanComment(word)) {
        return;
      }
      const keyword = this.ctor.KEYWORDS[word.toUpperCase()];
      if ((prevSpace || singleToken || !char) && keyword !== undefined) {
        this.advance(size - 1);
        this.add(keyword, word.toUpperCase());
        return;
      }
    }

    const single = this.ctor.SINGLE_TOKENS[this._char];
    if (single !== undefined) {
      this.add(single, this._char);
      return;
    }

    this.scanVar();
  }

  private scanComment(commentStart: string): boolean {
    if (!(commentStart in this._comments)) {
      return false;
    }

    const commentStartLine = this._line;
    const commentStartSize = commentStart.length;
    const commentEnd = this._comments[commentStart];

    if (commentEnd) {
      this.advance(commentStartSize);

      let commentCount = 1;
      const commentEndSize = commentEnd.length;

      while (!this._end) {
        if (this.chars(commentEndSize) === commentEnd) {
          commentCount -= 1;
          if (!commentCount) {
            break;
          }
        }

        this.advance(1, true);

        if (this.ctor.NESTED_COMMENTS && !this._end && this.chars(commentStartSize) === commentStart) {
          this.advance(commentStartSize);
          commentCount += 1;
        }
      }

      this._tokenComments.push(this.text.slice(commentStartSize, -commentEndSize + 1));
      this.advance(commentEndSize - 1);
    } else {
      while (!this._end && this.ctor.WHITE_SPACE[this._peek] !== TokenType.BREAK) {
        this.advance(1, true);
      }
      this._tokenComments.push(this.text.slice(commentStartSize));
    }

    // Leading comments attach to the next token, trailing ones to the previous.
    const last = this.lastToken();
    if (commentStartLine === this._prevTokenLine && last) {
      last.comments.push(...this._tokenComments);
      this._tokenComments = [];
      this._prevTokenLine = this._line;
    }

    return true;
  }

  private scanNumber(): void {
    let decimal = false;
    let scientific = 0;

    while (true) {
      if (isDigit(this._peek)) {
        this.advance();
      } else if (this._peek === "." && !decimal) {
        if (this.lastToken()?.tokenType === TokenType.PARAMETER) {
          return this.add(TokenType.NUMBER);
        }
        decimal = true;
        this.advance();
      } else if ((this._peek === "-" || this._peek === "+") && scientific === 1) {
        if (isDigit(this.sql[this._current + 1] ?? "")) {
          scientific += 1;
          this.advance();
        } else {
          return this.add(TokenType.NUMBER);
        }
      } else if (this._peek.toUpperCase() === "E" && !scientific) {
        scientific += 1;
        this.advance();
      } else {
        return this.add(TokenType.NUMBER);
      }
    }
  }

  private scanString(start: string): boolean {
    const end = this._quotes[start];
    if (end === undefined) {
      return false;
    }

    this.advance(start.length);
    this.add(TokenType.STRING, this.extractString(end));
    return true;
  }

  private scanIdentifier(identifierEnd: string): void {
    this.advance();
    const text = this.extractString(identifierEnd, new Set([identifierEnd]));
    this.add(TokenType.IDENTIFIER, text);
  }

  private scanVar(): void {
    while (true) {
      const char = this._peek.trim();
      if (char && (this.ctor.VAR_SINGLE_TOKENS.has(char) || !(char in this.ctor.SINGLE_TOKENS))) {
        this.advance(1, true);
      } else {
        break;
      }
    }

    this.add(
      this.lastToken()?.tokenType === TokenType.PARAMETER
        ? TokenType.VAR
        : (this.ctor.KEYWORDS[this.text.toUpperCase()] ?? TokenType.VAR),
    );
  }

  /**
   * Reads up to `delimiter`. An escape followed by the delimiter yields the
   * delimiter; an escape followed by another escape character keeps both.
   */
  private extractString(delimiter: string, escapes: Set<string> = this._stringEscapes): string {
    let text = "";
    const delimSize = delimiter.length;

    while (true) {
      if (
        escapes.has(this._char) &&
        (this._peek === delimiter || escapes.has(this._peek)) &&
        (!this._quotes[this._char] || this._char === this._peek)
      ) {
        text += this._peek === delimiter ? this._peek : this._char + this._peek;

        if (this._current + 1 < this.size) {
          this.advance(2);
        } else {
          throw new TokenError(`Missing ${delimiter} from ${this._line}:${this._current}`);
        }
      } else {
        if (this.chars(delimSize) === delimiter) {
          if (delimSize > 1) {
            this.advance(delimSize - 1);
          }
          break;
        }

        if (this._end) {
          throw new TokenError(`Missing ${delimiter} from ${this._line}:${this._start}`);
        }

        const current = this._current - 1;
        this.advance(1, true);
        text += this.sql.slice(current, this._current - 1);
      }
    }

    return text;
  }
}
