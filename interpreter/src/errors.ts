/**
 * Host-level error types for the Sprig interpreter.
 *
 * Language-level failures (type mismatches, unbound names, ...) are not
 * thrown: they are `error` values. These classes cover the conditions that
 * stop a program from running at all.
 */

import { ParseError, formatParseError } from './parser';

export class SprigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SprigError';
  }
}

export class SprigSyntaxError extends SprigError {
  public readonly errors: readonly ParseError[];

  constructor(errors: readonly ParseError[]) {
    const count = errors.length;
    const details = errors.map(e => `  ${formatParseError(e)}`).join('\n');
    super(`SyntaxError: ${count} parse error${count === 1 ? '' : 's'}\n${details}`);
    this.name = 'SprigSyntaxError';
    this.errors = errors;
  }
}

export class SprigConfigError extends SprigError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`ConfigError: ${issues.join('; ')}`);
    this.name = 'SprigConfigError';
    this.issues = issues;
  }
}

export class SprigStackOverflowError extends SprigError {
  constructor(maxCallDepth: number) {
    super(
      'StackOverflowError: host stack exhausted; calls or expressions are nested too deeply ' +
      `(call depth limit ${maxCallDepth})`,
    );
    this.name = 'SprigStackOverflowError';
  }
}
