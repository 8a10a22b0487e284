export enum TokenType {
  L_PAREN = "L_PAREN",
  R_PAREN = "R_PAREN",
  L_BRACKET = "L_BRACKET",
  R_BRACKET = "R_BRACKET",
  L_BRACE = "L_BRACE",
  R_BRACE = "R_BRACE",
  COMMA = "COMMA",
  DOT = "DOT",
  DASH = "DASH",
  PLUS = "PLUS",
  COLON = "COLON",
  DCOLON = "DCOLON",
  SEMICOLON = "SEMICOLON",
  STAR = "STAR",
  SLASH = "SLASH",
  BACKSLASH = "BACKSLASH",
  MOD = "MOD",
  EQ = "EQ",
  NEQ = "NEQ",
  GT = "GT",
  GTE = "GTE",
  LT = "LT",
  LTE = "LTE",
  AMP = "AMP",
  PIPE = "PIPE",
  DPIPE = "DPIPE",
  CARET = "CARET",
  TILDE = "TILDE",
  ARROW = "ARROW",
  DARROW = "DARROW",
  FARROW = "FARROW",
  HASH = "HASH",
  PARAMETER = "PARAMETER",
  PLACEHOLDER = "PLACEHOLDER",
  SPACE = "SPACE",
  BREAK = "BREAK",

  STRING = "STRING",
  NUMBER = "NUMBER",
  IDENTIFIER = "IDENTIFIER",
  VAR = "VAR",
  UNKNOWN = "UNKNOWN",

  // types
  ARRAY = "ARRAY",
  BIGINT = "BIGINT",
  BINARY = "BINARY",
  BOOLEAN = "BOOLEAN",
  CHAR = "CHAR",
  DATE = "DATE",
  DATETIME = "DATETIME",
  DECIMAL = "DECIMAL",
  DOUBLE = "DOUBLE",
  FLOAT = "FLOAT",
  GEOGRAPHY = "GEOGRAPHY",
  INT = "INT",
  INTERVAL = "INTERVAL",
  JSON = "JSON",
  MAP = "MAP",
  NCHAR = "NCHAR",
  NVARCHAR = "NVARCHAR",
  OBJECT = "OBJECT",
  SMALLINT = "SMALLINT",
  STRUCT = "STRUCT",
  TEXT = "TEXT",
  TIME = "TIME",
  TIMESTAMP = "TIMESTAMP",
  TIMESTAMPLTZ = "TIMESTAMPLTZ",
  TIMESTAMPNTZ = "TIMESTAMPNTZ",
  TIMESTAMPTZ = "TIMESTAMPTZ",
  TINYINT = "TINYINT",
  UUID = "UUID",
  VARBINARY = "VARBINARY",
  VARCHAR = "VARCHAR",
  VARIANT = "VARIANT",

  // keywords
  ALIAS = "ALIAS",
  ALL = "ALL",
  ALTER = "ALTER",
  AND = "AND",
  ANY = "ANY",
  ASC = "ASC",
  BETWEEN = "BETWEEN",
  CASE = "CASE",
  COLUMN = "COLUMN",
  COMMAND = "COMMAND",
  COMMENT = "COMMENT",
  CONSTRAINT = "CONSTRAINT",
  CREATE = "CREATE",
  CROSS = "CROSS",
  CURRENT_DATE = "CURRENT_DATE",
  CURRENT_TIME = "CURRENT_TIME",
  CURRENT_TIMESTAMP = "CURRENT_TIMESTAMP",
  DATABASE = "DATABASE",
  DEFAULT = "DEFAULT",
  DELETE = "DELETE",
  DESC = "DESC",
  DESCRIBE = "DESCRIBE",
  DISTINCT = "DISTINCT",
  DROP = "DROP",
  ELSE = "ELSE",
  END = "END",
  EXCEPT = "EXCEPT",
  EXECUTE = "EXECUTE",
  EXISTS = "EXISTS",
  FALSE = "FALSE",
  FIRST = "FIRST",
  FOREIGN_KEY = "FOREIGN_KEY",
  FROM = "FROM",
  FULL = "FULL",
  FUNCTION = "FUNCTION",
  GROUP_BY = "GROUP_BY",
  HAVING = "HAVING",
  ILIKE = "ILIKE",
  IN = "IN",
  INNER = "INNER",
  INSERT = "INSERT",
  INTERSECT = "INTERSECT",
  INTO = "INTO",
  IS = "IS",
  JOIN = "JOIN",
  LATERAL = "LATERAL",
  LEFT = "LEFT",
  LIKE = "LIKE",
  LIMIT = "LIMIT",
  NATURAL = "NATURAL",
  NOT = "NOT",
  NULL = "NULL",
  OFFSET = "OFFSET",
  ON = "ON",
  OR = "OR",
  ORDER_BY = "ORDER_BY",
  OUTER = "OUTER",
  OVER = "OVER",
  PARTITION_BY = "PARTITION_BY",
  PRIMARY_KEY = "PRIMARY_KEY",
  QUALIFY = "QUALIFY",
  RECURSIVE = "RECURSIVE",
  REFERENCES = "REFERENCES",
  RENAME = "RENAME",
  REPLACE = "REPLACE",
  RIGHT = "RIGHT",
  RLIKE = "RLIKE",
  SCHEMA = "SCHEMA",
  SELECT = "SELECT",
  SET = "SET",
  SHOW = "SHOW",
  TABLE = "TABLE",
  TABLE_SAMPLE = "TABLE_SAMPLE",
  TEMPORARY = "TEMPORARY",
  THEN = "THEN",
  TRUE = "TRUE",
  UNION = "UNION",
  UNIQUE = "UNIQUE",
  UNNEST = "UNNEST",
  UPDATE = "UPDATE",
  USE = "USE",
  USING = "USING",
  VALUES = "VALUES",
  VIEW = "VIEW",
  WHEN = "WHEN",
  WHERE = "WHERE",
  WINDOW = "WINDOW",
  WITH = "WITH",
}

const TOKEN_TYPES: ReadonlySet<string> = new Set(Object.values(TokenType));

export function isTokenType(value: string): value is TokenType {
  return TOKEN_TYPES.has(value);
}

export class Token {
  tokenType: TokenType;
  text: string;
  line: number;
  col: number;
  start: number;
  end: number;
  comments: string[];

  constructor(
    tokenType: TokenType,
    text: string,
    line: number = 1,
    col: number = 1,
    start: number = 0,
    end: number = 0,
    comments: string[] = [],
  ) {
    this.tokenType = tokenType;
    this.text = text;
    this.line = line;
    this.col = col;
    this.start = start;
    this.end = end;
    this.comments = comments;
  }

  static number(value: number): Token {
    return new Token(TokenType.NUMBER, String(value));
  }

  static string(value: string): Token {
    return new Token(TokenType.STRING, value);
  }

  static identifier(value: string): Token {
    return new Token(TokenType.IDENTIFIER, value);
  }

  static var_(value: string): Token {
    return new Token(TokenType.VAR, value);
  }

  toString(): string {
    return `<Token token_type: ${this.tokenType}, text: ${this.text}, line: ${this.line}, col: ${this.col}, start: ${this.start}, end: ${this.end}, comments: ${JSON.stringify(this.comments)}>`;
  }
}
