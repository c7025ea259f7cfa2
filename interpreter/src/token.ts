/**
 * Token definitions shared by the lexer and parser.
 */

export enum TokenKind {
  ILLEGAL = 'ILLEGAL',
  EOF = 'EOF',

  // Identifiers and literals
  IDENT = 'IDENT',
  INT = 'INT',

  // Operators
  ASSIGN = '=',
  PLUS = '+',
  MINUS = '-',
  BANG = '!',
  ASTERISK = '*',
  SLASH = '/',
  LT = '<',
  GT = '>',
  EQ = '==',
  NOT_EQ = '!=',

  // Delimiters
  COMMA = ',',
  SEMICOLON = ';',
  LPAREN = '(',
  RPAREN = ')',
  LBRACE = '{',
  RBRACE = '}',

  // Keywords
  FUNCTION = 'fn',
  LET = 'let',
  TRUE = 'true',
  FALSE = 'false',
  IF = 'if',
  ELSE = 'else',
  RETURN = 'return',
}

export interface Token {
  readonly kind: TokenKind;
  readonly literal: string;
  /** 1-based line number */
  readonly line: number;
  /** 0-based column */
  readonly column: number;
}

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ['fn', TokenKind.FUNCTION],
  ['let', TokenKind.LET],
  ['true', TokenKind.TRUE],
  ['false', TokenKind.FALSE],
  ['if', TokenKind.IF],
  ['else', TokenKind.ELSE],
  ['return', TokenKind.RETURN],
]);

/**
 * Resolve an identifier-shaped word to its keyword kind, or IDENT.
 */
export function lookupIdent(word: string): TokenKind {
  return KEYWORDS.get(word) ?? TokenKind.IDENT;
}

/**
 * Human-readable form of a token for diagnostics.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.EOF: return 'end of input';
    case TokenKind.IDENT: return `identifier '${token.literal}'`;
    case TokenKind.INT: return `integer ${token.literal}`;
    default: return `'${token.literal}'`;
  }
}
