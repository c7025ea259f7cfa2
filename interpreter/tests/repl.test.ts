/**
 * Tests for the REPL's input handling. The readline loop itself is not
 * driven here; these cover what it prints for each complete input.
 */

import { Environment } from '../src/environment';
import { Interpreter } from '../src/interpreter';
import { MAX_NESTING_DEPTH } from '../src/parser';
import { evalInput, formatEnvironment, hasUnclosedDelimiters } from '../src/repl';

describe('evalInput', () => {
  test('let prints nothing and the binding persists', () => {
    const interpreter = new Interpreter();
    expect(evalInput('let x = 5;', interpreter)).toEqual([]);
    expect(evalInput('x * 2', interpreter)).toEqual([{ stream: 'stdout', text: '=> 10' }]);
  });

  test('values are echoed', () => {
    const interpreter = new Interpreter();
    expect(evalInput('fn(x) { x }', interpreter)).toEqual([{ stream: 'stdout', text: '=> fn(x) { x }' }]);
    expect(evalInput('if (false) { 1 }', interpreter)).toEqual([{ stream: 'stdout', text: '=> null' }]);
    expect(evalInput('let a = 1; a == 1', interpreter)).toEqual([{ stream: 'stdout', text: '=> true' }]);
  });

  test('parse errors are reported and nothing runs', () => {
    const interpreter = new Interpreter();
    expect(evalInput('let a = 1; let = 1', interpreter)).toEqual([
      { stream: 'stderr', text: "  Parse error [1:15] expected identifier after 'let', got '='" },
    ]);
    expect(interpreter.getGlobalEnv().has('a')).toBe(false);
  });

  test('runtime errors go to stderr', () => {
    const interpreter = new Interpreter();
    expect(evalInput('5 + true', interpreter)).toEqual([
      { stream: 'stderr', text: '  ERROR: type mismatch: INTEGER + BOOLEAN' },
    ]);
    expect(evalInput('let a = -true', interpreter)).toEqual([
      { stream: 'stderr', text: '  ERROR: unknown operator: -BOOLEAN' },
    ]);
  });

  test('a host stack overflow is reported and the session continues', () => {
    const interpreter = new Interpreter({ maxCallDepth: 10_000 });
    evalInput('let down = fn(n) { if (n == 0) { 0 } else { down(n - 1) } };', interpreter);
    expect(evalInput('down(9000)', interpreter)).toEqual([
      {
        stream: 'stderr',
        text: '  StackOverflowError: host stack exhausted; calls or expressions are nested too deeply (call depth limit 10000)',
      },
    ]);
    expect(evalInput('down(3)', interpreter)).toEqual([{ stream: 'stdout', text: '=> 0' }]);
  });

  test('deeply nested input is a parse error and the session continues', () => {
    const interpreter = new Interpreter();
    const depth = 20_000;
    expect(evalInput(`${'('.repeat(depth)}1${')'.repeat(depth)}`, interpreter)).toEqual([
      { stream: 'stderr', text: `  Parse error [1:${MAX_NESTING_DEPTH}] expressions nested more than ${MAX_NESTING_DEPTH} deep` },
    ]);
    expect(evalInput('1 + 1', interpreter)).toEqual([{ stream: 'stdout', text: '=> 2' }]);
  });

  test('a long operator chain that exhausts the host stack is reported', () => {
    const interpreter = new Interpreter();
    const [out] = evalInput(Array(100_000).fill('1').join(' + '), interpreter);
    expect(out).toEqual({
      stream: 'stderr',
      text: '  StackOverflowError: host stack exhausted; calls or expressions are nested too deeply (call depth limit 300)',
    });
  });
});

describe('hasUnclosedDelimiters', () => {
  test('open braces and parens continue the input', () => {
    expect(hasUnclosedDelimiters('let f = fn(x) {')).toBe(true);
    expect(hasUnclosedDelimiters('add(1,')).toBe(true);
  });

  test('balanced or over-closed input is complete', () => {
    expect(hasUnclosedDelimiters('let f = fn(x) { x };')).toBe(false);
    expect(hasUnclosedDelimiters('f(1)')).toBe(false);
    expect(hasUnclosedDelimiters('}')).toBe(false);
  });
});

describe('formatEnvironment', () => {
  test('empty scope', () => {
    expect(formatEnvironment(new Environment())).toEqual(['  (no bindings defined)']);
  });

  test('lists bindings in order with their types', () => {
    const interpreter = new Interpreter();
    evalInput('let n = 5; let ok = true; let f = fn(x) { x }', interpreter);
    expect(formatEnvironment(interpreter.getGlobalEnv())).toEqual([
      '  n: INTEGER = 5',
      '  ok: BOOLEAN = true',
      '  f: FUNCTION = fn(x) { x }',
    ]);
  });

  test('a function that refers to itself is listed without recursion', () => {
    const interpreter = new Interpreter();
    evalInput('let loop = fn(n) { loop(n) }', interpreter);
    expect(formatEnvironment(interpreter.getGlobalEnv())).toEqual(['  loop: FUNCTION = fn(n) { loop(n) }']);
  });

  test('long values are truncated', () => {
    const interpreter = new Interpreter();
    evalInput('let g = fn(a) { a + a + a + a + a + a + a + a + a + a + a }', interpreter);
    const [line] = formatEnvironment(interpreter.getGlobalEnv());
    expect(line).toHaveLength('  g: FUNCTION = '.length + 60);
    expect(line.startsWith('  g: FUNCTION = fn(a) { ((((((((((a + a) + a)')).toBe(true);
    expect(line.endsWith('...')).toBe(true);
  });
});
