/**
 * Tree-walking interpreter for the Sprig programming language.
 *
 * Evaluates the AST by recursively visiting nodes. Early returns and
 * runtime errors travel as ordinary values (`return` and `error` kinds)
 * that each step checks and passes upward; nothing is thrown for them.
 */

import {
  BlockStatement,
  CallExpression,
  Expression,
  IfExpression,
  InfixExpression,
  InfixOperator,
  Node,
  PrefixOperator,
  Program,
  Statement,
} from './ast';
import { InterpreterOptions, InterpreterOptionsInput, resolveOptions } from './config';
import { Environment } from './environment';
import { SprigStackOverflowError, SprigSyntaxError } from './errors';
import { parseSource } from './parser';
import {
  FunctionValue,
  SprigValue,
  fitsInt,
  isSignal,
  isTruthy,
  mkBool,
  mkError,
  mkFunction,
  mkInt,
  mkNull,
  mkReturn,
  typeName,
  valuesEqual,
} from './values';

export class Interpreter {
  private globalEnv: Environment;
  private readonly options: InterpreterOptions;
  /** Number of function calls currently on the stack */
  private callDepth = 0;

  constructor(options: InterpreterOptionsInput = {}) {
    this.options = resolveOptions(options);
    this.globalEnv = new Environment();
  }

  /**
   * Execute a full program. The result is the value of the last statement,
   * the value of a top-level `return`, or the first runtime error.
   */
  run(program: Program, env: Environment = this.globalEnv): SprigValue {
    this.callDepth = 0;
    try {
      return this.evalProgram(program, env);
    } catch (e) {
      if (e instanceof RangeError) {
        throw new SprigStackOverflowError(this.options.maxCallDepth);
      }
      throw e;
    }
  }

  /**
   * Parse and execute source text.
   * @throws SprigSyntaxError when the source does not parse
   */
  evalSource(source: string, env: Environment = this.globalEnv): SprigValue {
    const result = parseSource(source);
    if (result.hasErrors) {
      throw new SprigSyntaxError(result.errors);
    }
    return this.run(result.program, env);
  }

  /**
   * Get the global environment (persists across `run` calls).
   */
  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  /**
   * Drop every global binding.
   */
  reset(): void {
    this.globalEnv = new Environment();
  }

  getOptions(): InterpreterOptions {
    return this.options;
  }

  // ==================================================================
  // Dispatch
  // ==================================================================

  /**
   * Main dispatch: evaluate any node.
   */
  evalNode(node: Node, env: Environment): SprigValue {
    switch (node.type) {
      case 'program':
        return this.evalProgram(node, env);

      // ---- Statements ----
      case 'let_statement': {
        const value = this.evalNode(node.value, env);
        if (isSignal(value)) return value;
        env.set(node.name, value);
        return mkNull();
      }
      case 'return_statement': {
        if (node.value === null) return mkReturn(mkNull());
        const value = this.evalNode(node.value, env);
        if (isSignal(value)) return value;
        return mkReturn(value);
      }
      case 'expression_statement':
        return this.evalNode(node.expression, env);
      case 'block':
        return this.evalBlock(node, env);

      // ---- Expressions ----
      case 'identifier':
        return env.get(node.name) ?? mkError(`identifier not found: ${node.name}`);
      case 'int_literal':
        return mkInt(node.value);
      case 'bool_literal':
        return mkBool(node.value);
      case 'prefix_expression': {
        const operand = this.evalNode(node.operand, env);
        if (isSignal(operand)) return operand;
        return this.evalPrefix(node.operator, operand);
      }
      case 'infix_expression':
        return this.evalInfixExpression(node, env);
      case 'if_expression':
        return this.evalIfExpression(node, env);
      case 'function_literal':
        return mkFunction(node.parameters, node.body, env);
      case 'call_expression':
        return this.evalCallExpression(node, env);
    }
  }

  // ==================================================================
  // Program & Blocks
  // ==================================================================

  private evalProgram(program: Program, env: Environment): SprigValue {
    let result: SprigValue = mkNull();
    for (const statement of program.statements) {
      result = this.evalNode(statement, env);
      if (result.kind === 'return') return result.value;
      if (result.kind === 'error') return result;
    }
    return result;
  }

  /**
   * Evaluate a block in its own child scope.
   */
  evalBlock(block: BlockStatement, parentEnv: Environment): SprigValue {
    return this.evalStatements(block.statements, parentEnv.child());
  }

  /**
   * Evaluate statements in order, stopping at the first return signal or
   * error. The signal is passed up unchanged.
   */
  private evalStatements(statements: readonly Statement[], env: Environment): SprigValue {
    let result: SprigValue = mkNull();
    for (const statement of statements) {
      result = this.evalNode(statement, env);
      if (result.kind === 'return' || result.kind === 'error') return result;
    }
    return result;
  }

  // ==================================================================
  // Operators
  // ==================================================================

  private evalPrefix(operator: PrefixOperator, operand: SprigValue): SprigValue {
    switch (operator) {
      case '!':
        return mkBool(!isTruthy(operand));
      case '-':
        if (operand.kind !== 'int') {
          return mkError(`unknown operator: -${typeName(operand)}`);
        }
        if (!fitsInt(-operand.value)) {
          return mkError(`integer overflow: -(${operand.value})`);
        }
        return mkInt(-operand.value);
    }
  }

  private evalInfixExpression(node: InfixExpression, env: Environment): SprigValue {
    const left = this.evalNode(node.left, env);
    if (isSignal(left)) return left;
    const right = this.evalNode(node.right, env);
    if (isSignal(right)) return right;

    const op = node.operator;
    if (left.kind === 'int' && right.kind === 'int') {
      return this.evalIntegerInfix(op, left.value, right.value);
    }
    if (left.kind !== right.kind) {
      return mkError(`type mismatch: ${typeName(left)} ${op} ${typeName(right)}`);
    }
    if (op === '==') return mkBool(valuesEqual(left, right));
    if (op === '!=') return mkBool(!valuesEqual(left, right));
    return mkError(`unknown operator: ${typeName(left)} ${op} ${typeName(right)}`);
  }

  private evalIntegerInfix(op: InfixOperator, a: bigint, b: bigint): SprigValue {
    switch (op) {
      case '+': return this.checkedInt(a + b, a, op, b);
      case '-': return this.checkedInt(a - b, a, op, b);
      case '*': return this.checkedInt(a * b, a, op, b);
      case '/':
        if (b === 0n) return mkError(`division by zero: ${a} / 0`);
        return this.checkedInt(a / b, a, op, b);
      case '<': return mkBool(a < b);
      case '>': return mkBool(a > b);
      case '==': return mkBool(a === b);
      case '!=': return mkBool(a !== b);
    }
  }

  /** Results outside the signed 64-bit range are errors, never wrapped. */
  private checkedInt(result: bigint, a: bigint, op: InfixOperator, b: bigint): SprigValue {
    if (!fitsInt(result)) {
      return mkError(`integer overflow: ${a} ${op} ${b}`);
    }
    return mkInt(result);
  }

  // ==================================================================
  // Conditionals
  // ==================================================================

  private evalIfExpression(node: IfExpression, env: Environment): SprigValue {
    const condition = this.evalNode(node.condition, env);
    if (isSignal(condition)) return condition;

    if (isTruthy(condition)) {
      return this.evalBlock(node.consequence, env);
    } else if (node.alternative) {
      return this.evalBlock(node.alternative, env);
    }

    return mkNull();
  }

  // ==================================================================
  // Calls
  // ==================================================================

  private evalCallExpression(node: CallExpression, env: Environment): SprigValue {
    const callee = this.evalNode(node.callee, env);
    if (isSignal(callee)) return callee;

    const args = this.evalExpressions(node.args, env);
    if (!Array.isArray(args)) return args;

    return this.callFunction(callee, args);
  }

  /**
   * Evaluate expressions left to right; the first error or return signal
   * is returned instead of the list.
   */
  private evalExpressions(exprs: readonly Expression[], env: Environment): SprigValue[] | SprigValue {
    const values: SprigValue[] = [];
    for (const expr of exprs) {
      const value = this.evalNode(expr, env);
      if (isSignal(value)) return value;
      values.push(value);
    }
    return values;
  }

  private callFunction(callee: SprigValue, args: SprigValue[]): SprigValue {
    if (callee.kind !== 'function') {
      return mkError(`not a function: ${typeName(callee)}`);
    }
    if (args.length !== callee.params.length) {
      return mkError(`wrong number of arguments: want=${callee.params.length}, got=${args.length}`);
    }
    if (this.callDepth >= this.options.maxCallDepth) {
      return mkError(`maximum call depth exceeded: ${this.options.maxCallDepth}`);
    }

    this.callDepth++;
    try {
      const result = this.evalStatements(callee.body.statements, this.bindParameters(callee, args));
      return result.kind === 'return' ? result.value : result;
    } finally {
      this.callDepth--;
    }
  }

  private bindParameters(fn: FunctionValue, args: SprigValue[]): Environment {
    const funcEnv = fn.closure.child();
    fn.params.forEach((param, i) => {
      funcEnv.set(param, args[i]);
    });
    return funcEnv;
  }
}
