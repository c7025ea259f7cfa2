/**
 * Basic tests for the Sprig interpreter.
 *
 * These tests exercise environments, values and host errors by
 * constructing them directly, without going through the parser.
 */

import { BlockStatement } from '../src/ast';
import { Environment } from '../src/environment';
import { SprigConfigError, SprigError, SprigSyntaxError } from '../src/errors';
import {
  isError,
  isTruthy,
  mkBool,
  mkError,
  mkFunction,
  mkInt,
  mkNull,
  mkReturn,
  typeName,
  valuesEqual,
  valueToString,
} from '../src/values';

const emptyBody: BlockStatement = { type: 'block', statements: [] };

// ==================================================================
// Environment tests
// ==================================================================

describe('Environment', () => {
  test('set and get a binding', () => {
    const env = new Environment();
    env.set('x', mkInt(42n));
    expect(env.get('x')).toEqual(mkInt(42n));
  });

  test('unbound name is reported as undefined, not thrown', () => {
    const env = new Environment();
    expect(env.get('unknown')).toBeUndefined();
    expect(env.has('unknown')).toBe(false);
  });

  test('set overwrites a local binding', () => {
    const env = new Environment();
    env.set('x', mkInt(1n));
    env.set('x', mkInt(2n));
    expect(env.get('x')).toEqual(mkInt(2n));
    expect(env.localNames()).toEqual(['x']);
  });

  test('child scope inherits parent bindings', () => {
    const parent = new Environment();
    parent.set('x', mkInt(10n));
    const child = parent.child();
    expect(child.get('x')).toEqual(mkInt(10n));
    expect(child.has('x')).toBe(true);
  });

  test('lookup walks several scopes outward', () => {
    const root = new Environment();
    root.set('x', mkInt(1n));
    const leaf = root.child().child().child();
    expect(leaf.get('x')).toEqual(mkInt(1n));
  });

  test('set in a child shadows without touching the parent', () => {
    const parent = new Environment();
    parent.set('x', mkInt(10n));
    const child = parent.child();
    child.set('x', mkInt(20n));
    expect(child.get('x')).toEqual(mkInt(20n));
    expect(parent.get('x')).toEqual(mkInt(10n));
  });

  test('bindings made after a child is created are visible to it', () => {
    const parent = new Environment();
    const child = parent.child();
    parent.set('late', mkBool(true));
    expect(child.get('late')).toEqual(mkBool(true));
  });

  test('localNames lists only the scope itself', () => {
    const parent = new Environment();
    parent.set('a', mkInt(1n));
    const child = parent.child();
    child.set('b', mkInt(2n));
    child.set('c', mkInt(3n));
    expect(child.localNames()).toEqual(['b', 'c']);
    expect(parent.localNames()).toEqual(['a']);
  });

  test('a function bound in the scope it captured can be listed and printed', () => {
    const env = new Environment();
    const fn = mkFunction(['n'], emptyBody, env);
    env.set('self', fn);
    expect(env.get('self')).toBe(fn);
    expect(env.localNames()).toEqual(['self']);
    expect(valueToString(fn)).toBe('fn(n) { }');
  });
});

// ==================================================================
// Value tests
// ==================================================================

describe('Values', () => {
  test('isTruthy', () => {
    expect(isTruthy(mkBool(true))).toBe(true);
    expect(isTruthy(mkBool(false))).toBe(false);
    expect(isTruthy(mkNull())).toBe(false);
    expect(isTruthy(mkInt(0n))).toBe(true);
    expect(isTruthy(mkInt(-3n))).toBe(true);
    expect(isTruthy(mkFunction([], emptyBody, new Environment()))).toBe(true);
  });

  test('valueToString', () => {
    expect(valueToString(mkInt(42n))).toBe('42');
    expect(valueToString(mkInt(-7n))).toBe('-7');
    expect(valueToString(mkBool(true))).toBe('true');
    expect(valueToString(mkNull())).toBe('null');
    expect(valueToString(mkError('boom'))).toBe('ERROR: boom');
    expect(valueToString(mkReturn(mkInt(3n)))).toBe('3');
  });

  test('typeName', () => {
    expect(typeName(mkInt(1n))).toBe('INTEGER');
    expect(typeName(mkBool(false))).toBe('BOOLEAN');
    expect(typeName(mkNull())).toBe('NULL');
    expect(typeName(mkReturn(mkNull()))).toBe('RETURN_VALUE');
    expect(typeName(mkError('x'))).toBe('ERROR');
    expect(typeName(mkFunction([], emptyBody, new Environment()))).toBe('FUNCTION');
  });

  test('valuesEqual', () => {
    expect(valuesEqual(mkInt(1n), mkInt(1n))).toBe(true);
    expect(valuesEqual(mkInt(1n), mkInt(2n))).toBe(false);
    expect(valuesEqual(mkBool(true), mkBool(true))).toBe(true);
    expect(valuesEqual(mkBool(true), mkBool(false))).toBe(false);
    expect(valuesEqual(mkNull(), mkNull())).toBe(true);
    expect(valuesEqual(mkInt(1n), mkBool(true))).toBe(false);
    expect(valuesEqual(mkNull(), mkBool(false))).toBe(false);
  });

  test('functions compare by identity', () => {
    const env = new Environment();
    const f = mkFunction(['x'], emptyBody, env);
    const g = mkFunction(['x'], emptyBody, env);
    expect(valuesEqual(f, f)).toBe(true);
    expect(valuesEqual(f, g)).toBe(false);
  });

  test('constructors build fresh values', () => {
    expect(mkNull()).not.toBe(mkNull());
    expect(mkBool(true)).not.toBe(mkBool(true));
  });

  test('isError', () => {
    expect(isError(mkError('x'))).toBe(true);
    expect(isError(mkNull())).toBe(false);
  });
});

// ==================================================================
// Error tests
// ==================================================================

describe('Errors', () => {
  test('SprigSyntaxError lists every parse error', () => {
    const err = new SprigSyntaxError([
      { message: 'first', line: 1, column: 4 },
      { message: 'second', line: 2, column: 0 },
    ]);
    expect(err).toBeInstanceOf(SprigError);
    expect(err.errors).toHaveLength(2);
    expect(err.message).toBe('SyntaxError: 2 parse errors\n  [1:4] first\n  [2:0] second');
  });

  test('SprigConfigError joins its issues', () => {
    const err = new SprigConfigError(['maxCallDepth: too small', 'other: bad']);
    expect(err.message).toBe('ConfigError: maxCallDepth: too small; other: bad');
    expect(err.name).toBe('SprigConfigError');
  });
});
