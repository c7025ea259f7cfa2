/**
 * Scanner that turns Sprig source text into a flat token sequence.
 *
 * The lexer makes no parsing decisions. Unknown characters become
 * ILLEGAL tokens and are reported by the parser.
 */

import { Token, TokenKind, lookupIdent } from './token';

export class Lexer {
  private readonly source: string;
  private tokens: Token[] = [];
  private start = 0;
  private current = 0;
  private line = 1;
  private lineStart = 0;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.current = 0;
    this.line = 1;
    this.lineStart = 0;

    while (!this.isAtEnd()) {
      this.start = this.current;
      this.scanToken();
    }
    this.start = this.current;
    this.addToken(TokenKind.EOF, '');
    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private scanToken(): void {
    const c = this.advance();
    switch (c) {
      case '(': this.addToken(TokenKind.LPAREN); break;
      case ')': this.addToken(TokenKind.RPAREN); break;
      case '{': this.addToken(TokenKind.LBRACE); break;
      case '}': this.addToken(TokenKind.RBRACE); break;
      case ',': this.addToken(TokenKind.COMMA); break;
      case ';': this.addToken(TokenKind.SEMICOLON); break;
      case '+': this.addToken(TokenKind.PLUS); break;
      case '-': this.addToken(TokenKind.MINUS); break;
      case '*': this.addToken(TokenKind.ASTERISK); break;
      case '/': this.addToken(TokenKind.SLASH); break;
      case '<': this.addToken(TokenKind.LT); break;
      case '>': this.addToken(TokenKind.GT); break;
      case '!': this.addToken(this.match('=') ? TokenKind.NOT_EQ : TokenKind.BANG); break;
      case '=': this.addToken(this.match('=') ? TokenKind.EQ : TokenKind.ASSIGN); break;

      case ' ':
      case '\r':
      case '\t':
        break;
      case '\n':
        this.line++;
        this.lineStart = this.current;
        break;

      default:
        if (isDigit(c)) {
          this.number();
        } else if (isIdentStart(c)) {
          this.identifier();
        } else {
          this.addToken(TokenKind.ILLEGAL);
        }
    }
  }

  private number(): void {
    while (isDigit(this.peek())) this.advance();
    this.addToken(TokenKind.INT);
  }

  private identifier(): void {
    while (isIdentPart(this.peek())) this.advance();
    const word = this.source.slice(this.start, this.current);
    this.addToken(lookupIdent(word));
  }

  private advance(): string {
    return this.source.charAt(this.current++);
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.source.charAt(this.current) !== expected) return false;
    this.current++;
    return true;
  }

  private peek(): string {
    return this.isAtEnd() ? '\0' : this.source.charAt(this.current);
  }

  private addToken(kind: TokenKind, literal?: string): void {
    this.tokens.push({
      kind,
      literal: literal ?? this.source.slice(this.start, this.current),
      line: this.line,
      column: this.start - this.lineStart,
    });
  }
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isIdentStart(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

/**
 * Scan a whole source string.
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
