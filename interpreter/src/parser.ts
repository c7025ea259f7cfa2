/**
 * Parser module — turns a token sequence into a Sprig program.
 *
 * Statements are parsed by recursive descent; expressions by precedence
 * climbing driven by the PRECEDENCES table. Syntax errors never abort the
 * parse: each one is recorded, the parser skips to the end of the current
 * top-level statement, and parsing resumes.
 */

import {
  BlockStatement,
  Expression,
  FunctionLiteral,
  IfExpression,
  InfixOperator,
  PrefixOperator,
  Program,
  Statement,
} from './ast';
import { tokenize } from './lexer';
import { Token, TokenKind, describeToken } from './token';
import { fitsInt } from './values';

export interface ParseResult {
  program: Program;
  hasErrors: boolean;
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

export enum Precedence {
  LOWEST = 0,
  EQUALS,       // == !=
  LESS_GREATER, // < >
  SUM,          // + -
  PRODUCT,      // * /
  PREFIX,       // -x !x
  CALL,         // f(x)
}

const PRECEDENCES: Partial<Record<TokenKind, Precedence>> = {
  [TokenKind.EQ]: Precedence.EQUALS,
  [TokenKind.NOT_EQ]: Precedence.EQUALS,
  [TokenKind.LT]: Precedence.LESS_GREATER,
  [TokenKind.GT]: Precedence.LESS_GREATER,
  [TokenKind.PLUS]: Precedence.SUM,
  [TokenKind.MINUS]: Precedence.SUM,
  [TokenKind.ASTERISK]: Precedence.PRODUCT,
  [TokenKind.SLASH]: Precedence.PRODUCT,
  [TokenKind.LPAREN]: Precedence.CALL,
};

const INFIX_OPERATORS: Partial<Record<TokenKind, InfixOperator>> = {
  [TokenKind.EQ]: '==',
  [TokenKind.NOT_EQ]: '!=',
  [TokenKind.LT]: '<',
  [TokenKind.GT]: '>',
  [TokenKind.PLUS]: '+',
  [TokenKind.MINUS]: '-',
  [TokenKind.ASTERISK]: '*',
  [TokenKind.SLASH]: '/',
};

/** Deepest expression nesting accepted before the parser gives up on a statement. */
export const MAX_NESTING_DEPTH = 500;

/** Thrown internally to unwind to the statement loop; never escapes `parse`. */
class ParseFailure extends Error {
  public readonly error: ParseError;

  constructor(error: ParseError) {
    super(error.message);
    this.name = 'ParseFailure';
    this.error = error;
  }
}

export class Parser {
  private readonly tokens: Token[];
  private current = 0;
  private depth = 0;
  /** Expressions currently being parsed, innermost included */
  private nesting = 0;
  private readonly errors: ParseError[] = [];

  constructor(tokens: readonly Token[]) {
    this.tokens = [...tokens];
    const last = this.tokens[this.tokens.length - 1];
    if (last === undefined || last.kind !== TokenKind.EOF) {
      this.tokens.push({
        kind: TokenKind.EOF,
        literal: '',
        line: last?.line ?? 1,
        column: last ? last.column + last.literal.length : 0,
      });
    }
  }

  parse(): ParseResult {
    const statements: Statement[] = [];
    while (!this.isAtEnd()) {
      const before = this.current;
      try {
        statements.push(this.statement());
      } catch (e) {
        if (!(e instanceof ParseFailure)) throw e;
        this.errors.push(e.error);
        this.synchronize();
        if (this.current === before) this.advance();
      }
    }
    return {
      program: { type: 'program', statements },
      hasErrors: this.errors.length > 0,
      errors: this.errors,
    };
  }

  // ==================================================================
  // Statements
  // ==================================================================

  private statement(): Statement {
    switch (this.peek().kind) {
      case TokenKind.LET: return this.letStatement();
      case TokenKind.RETURN: return this.returnStatement();
      default: return this.expressionStatement();
    }
  }

  private letStatement(): Statement {
    this.advance();
    const name = this.consume(TokenKind.IDENT, "identifier after 'let'");
    this.consume(TokenKind.ASSIGN, `'=' after 'let ${name.literal}'`);
    const value = this.expression(Precedence.LOWEST);
    this.match(TokenKind.SEMICOLON);
    return { type: 'let_statement', name: name.literal, value };
  }

  private returnStatement(): Statement {
    this.advance();
    let value: Expression | null = null;
    if (!this.check(TokenKind.SEMICOLON) && !this.check(TokenKind.RBRACE) && !this.isAtEnd()) {
      value = this.expression(Precedence.LOWEST);
    }
    this.match(TokenKind.SEMICOLON);
    return { type: 'return_statement', value };
  }

  private expressionStatement(): Statement {
    const expression = this.expression(Precedence.LOWEST);
    this.match(TokenKind.SEMICOLON);
    return { type: 'expression_statement', expression };
  }

  /** Parses `{ statements }`; the opening brace must be the next token. */
  private block(context: string): BlockStatement {
    this.consume(TokenKind.LBRACE, `'{' to open ${context}`);
    this.depth++;
    const statements: Statement[] = [];
    while (!this.check(TokenKind.RBRACE)) {
      if (this.isAtEnd()) {
        throw this.failure(`unterminated block: expected '}' to close ${context}, got end of input`);
      }
      statements.push(this.statement());
    }
    this.advance();
    this.depth--;
    return { type: 'block', statements };
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  /**
   * Parse an expression whose operators all bind tighter than `minPrecedence`.
   */
  private expression(minPrecedence: Precedence): Expression {
    if (this.nesting >= MAX_NESTING_DEPTH) {
      throw this.failure(`expressions nested more than ${MAX_NESTING_DEPTH} deep`);
    }
    this.nesting++;
    try {
      let left = this.prefix();
      while (this.peekPrecedence() > minPrecedence) {
        left = this.infix(this.advance(), left);
      }
      return left;
    } finally {
      this.nesting--;
    }
  }

  private prefix(): Expression {
    const token = this.peek();
    switch (token.kind) {
      case TokenKind.IDENT:
        this.advance();
        return { type: 'identifier', name: token.literal };
      case TokenKind.INT:
        this.advance();
        return this.integer(token);
      case TokenKind.TRUE:
      case TokenKind.FALSE:
        this.advance();
        return { type: 'bool_literal', value: token.kind === TokenKind.TRUE };
      case TokenKind.BANG:
      case TokenKind.MINUS: {
        this.advance();
        const operator: PrefixOperator = token.kind === TokenKind.BANG ? '!' : '-';
        const operand = this.expression(Precedence.PREFIX);
        return { type: 'prefix_expression', operator, operand };
      }
      case TokenKind.LPAREN: {
        this.advance();
        const inner = this.expression(Precedence.LOWEST);
        this.consume(TokenKind.RPAREN, "')' to close grouped expression");
        return inner;
      }
      case TokenKind.IF:
        return this.ifExpression();
      case TokenKind.FUNCTION:
        return this.functionLiteral();
      case TokenKind.ILLEGAL:
        throw this.failure(`illegal character '${token.literal}'`, token);
      default:
        throw this.failure(`expected an expression, got ${describeToken(token)}`, token);
    }
  }

  private infix(token: Token, left: Expression): Expression {
    if (token.kind === TokenKind.LPAREN) {
      return { type: 'call_expression', callee: left, args: this.callArguments() };
    }
    const operator = INFIX_OPERATORS[token.kind];
    const precedence = PRECEDENCES[token.kind];
    if (operator === undefined || precedence === undefined) {
      throw this.failure(`${describeToken(token)} is not an infix operator`, token);
    }
    const right = this.expression(precedence);
    return { type: 'infix_expression', operator, left, right };
  }

  private callArguments(): Expression[] {
    const args: Expression[] = [];
    if (this.match(TokenKind.RPAREN)) return args;
    do {
      args.push(this.expression(Precedence.LOWEST));
    } while (this.match(TokenKind.COMMA));
    this.consume(TokenKind.RPAREN, "')' after call arguments");
    return args;
  }

  private ifExpression(): IfExpression {
    this.advance();
    this.consume(TokenKind.LPAREN, "'(' after 'if'");
    const condition = this.expression(Precedence.LOWEST);
    this.consume(TokenKind.RPAREN, "')' after if condition");
    const consequence = this.block('if body');
    const alternative = this.match(TokenKind.ELSE) ? this.block('else body') : null;
    return { type: 'if_expression', condition, consequence, alternative };
  }

  private functionLiteral(): FunctionLiteral {
    this.advance();
    this.consume(TokenKind.LPAREN, "'(' after 'fn'");
    const parameters: string[] = [];
    if (!this.check(TokenKind.RPAREN)) {
      do {
        parameters.push(this.consume(TokenKind.IDENT, 'parameter name').literal);
      } while (this.match(TokenKind.COMMA));
    }
    this.consume(TokenKind.RPAREN, "')' after parameters");
    const body = this.block('function body');
    return { type: 'function_literal', parameters, body };
  }

  private integer(token: Token): Expression {
    const value = BigInt(token.literal);
    if (!fitsInt(value)) {
      throw this.failure(`could not parse ${token.literal} as an integer`, token);
    }
    return { type: 'int_literal', value };
  }

  // ==================================================================
  // Token cursor
  // ==================================================================

  private peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  private peekPrecedence(): Precedence {
    return PRECEDENCES[this.peek().kind] ?? Precedence.LOWEST;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  private advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) this.current++;
    return token;
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private consume(kind: TokenKind, expectation: string): Token {
    if (this.check(kind)) return this.advance();
    const token = this.peek();
    throw this.failure(`expected ${expectation}, got ${describeToken(token)}`, token);
  }

  private failure(message: string, token: Token = this.peek()): ParseFailure {
    return new ParseFailure({ message, line: token.line, column: token.column });
  }

  /**
   * Skip to the end of the statement that failed: a `;` or the start of a
   * `let`/`return` once every block opened since the statement began is
   * closed again.
   */
  private synchronize(): void {
    let depth = this.depth;
    this.depth = 0;
    while (!this.isAtEnd()) {
      const token = this.peek();
      if (depth <= 0) {
        if (token.kind === TokenKind.SEMICOLON) {
          this.advance();
          return;
        }
        if (token.kind === TokenKind.LET || token.kind === TokenKind.RETURN) return;
      }
      if (token.kind === TokenKind.LBRACE) depth++;
      if (token.kind === TokenKind.RBRACE) depth--;
      this.advance();
    }
  }
}

/**
 * Parse a token sequence produced by the lexer.
 */
export function parse(tokens: readonly Token[]): ParseResult {
  return new Parser(tokens).parse();
}

/**
 * Lex and parse Sprig source text.
 */
export function parseSource(source: string): ParseResult {
  return parse(tokenize(source));
}

export function formatParseError(error: ParseError): string {
  return `[${error.line}:${error.column}] ${error.message}`;
}
