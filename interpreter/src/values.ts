/**
 * Runtime value representations for the Sprig interpreter.
 */

import { BlockStatement, nodeToString } from './ast';
import type { Environment } from './environment';

export type SprigValue =
  | { kind: 'int'; value: bigint }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'return'; value: SprigValue }
  | { kind: 'error'; message: string }
  | { kind: 'function'; params: readonly string[]; body: BlockStatement; closure: Environment };

export type FunctionValue = Extract<SprigValue, { kind: 'function' }>;

export type TypeName = 'INTEGER' | 'BOOLEAN' | 'NULL' | 'RETURN_VALUE' | 'ERROR' | 'FUNCTION';

/** Integers are signed 64-bit. */
export const INT_MIN = -(2n ** 63n);
export const INT_MAX = 2n ** 63n - 1n;

export function fitsInt(value: bigint): boolean {
  return value >= INT_MIN && value <= INT_MAX;
}

// ---- Value constructors ----

export function mkInt(value: bigint): SprigValue {
  return { kind: 'int', value };
}

export function mkBool(value: boolean): SprigValue {
  return { kind: 'bool', value };
}

export function mkNull(): SprigValue {
  return { kind: 'null' };
}

/**
 * Wrap a value in the early-return signal. Only the interpreter sees these;
 * they are unwrapped at the function or program boundary.
 */
export function mkReturn(value: SprigValue): SprigValue {
  return { kind: 'return', value };
}

export function mkError(message: string): SprigValue {
  return { kind: 'error', message };
}

export function mkFunction(
  params: readonly string[],
  body: BlockStatement,
  closure: Environment,
): SprigValue {
  return { kind: 'function', params, body, closure };
}

// ---- Value utilities ----

export function typeName(v: SprigValue): TypeName {
  switch (v.kind) {
    case 'int': return 'INTEGER';
    case 'bool': return 'BOOLEAN';
    case 'null': return 'NULL';
    case 'return': return 'RETURN_VALUE';
    case 'error': return 'ERROR';
    case 'function': return 'FUNCTION';
  }
}

export function isError(v: SprigValue): v is Extract<SprigValue, { kind: 'error' }> {
  return v.kind === 'error';
}

/**
 * A return or error value: either one ends evaluation of the enclosing
 * expression and is passed up unchanged.
 */
export function isSignal(v: SprigValue): v is Extract<SprigValue, { kind: 'return' | 'error' }> {
  return v.kind === 'return' || v.kind === 'error';
}

/**
 * `false` and `null` are falsy; every other value, including 0, is truthy.
 */
export function isTruthy(v: SprigValue): boolean {
  switch (v.kind) {
    case 'bool': return v.value;
    case 'null': return false;
    default: return true;
  }
}

/**
 * Render a value for display. Functions print their parameters and body
 * only; the captured environment is never rendered, since it may contain
 * the function itself.
 */
export function valueToString(v: SprigValue): string {
  switch (v.kind) {
    case 'int': return String(v.value);
    case 'bool': return String(v.value);
    case 'null': return 'null';
    case 'return': return valueToString(v.value);
    case 'error': return `ERROR: ${v.message}`;
    case 'function': return `fn(${v.params.join(', ')}) ${nodeToString(v.body)}`;
  }
}

/**
 * Equality used by `==` and `!=`. Scalars compare by value; functions by
 * identity.
 */
export function valuesEqual(a: SprigValue, b: SprigValue): boolean {
  switch (a.kind) {
    case 'int':
      return b.kind === 'int' && b.value === a.value;
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'null':
      return b.kind === 'null';
    case 'error':
      return b.kind === 'error' && b.message === a.message;
    case 'return':
      return b.kind === 'return' && valuesEqual(a.value, b.value);
    case 'function':
      return a === b;
  }
}
