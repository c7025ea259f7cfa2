/**
 * Syntax tree for Sprig programs.
 *
 * Nodes are plain immutable records tagged by `type`. The parser builds
 * them once; the interpreter only reads them, so a parsed program can be
 * evaluated any number of times.
 */

// ---- Statements ----

export interface LetStatement {
  readonly type: 'let_statement';
  readonly name: string;
  readonly value: Expression;
}

export interface ReturnStatement {
  readonly type: 'return_statement';
  readonly value: Expression | null;
}

export interface ExpressionStatement {
  readonly type: 'expression_statement';
  readonly expression: Expression;
}

export interface BlockStatement {
  readonly type: 'block';
  readonly statements: readonly Statement[];
}

export type Statement = LetStatement | ReturnStatement | ExpressionStatement | BlockStatement;

// ---- Expressions ----

export type PrefixOperator = '!' | '-';

export type InfixOperator = '+' | '-' | '*' | '/' | '<' | '>' | '==' | '!=';

export interface Identifier {
  readonly type: 'identifier';
  readonly name: string;
}

export interface IntLiteral {
  readonly type: 'int_literal';
  readonly value: bigint;
}

export interface BoolLiteral {
  readonly type: 'bool_literal';
  readonly value: boolean;
}

export interface PrefixExpression {
  readonly type: 'prefix_expression';
  readonly operator: PrefixOperator;
  readonly operand: Expression;
}

export interface InfixExpression {
  readonly type: 'infix_expression';
  readonly operator: InfixOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface IfExpression {
  readonly type: 'if_expression';
  readonly condition: Expression;
  readonly consequence: BlockStatement;
  readonly alternative: BlockStatement | null;
}

export interface FunctionLiteral {
  readonly type: 'function_literal';
  readonly parameters: readonly string[];
  readonly body: BlockStatement;
}

export interface CallExpression {
  readonly type: 'call_expression';
  readonly callee: Expression;
  readonly args: readonly Expression[];
}

export type Expression =
  | Identifier
  | IntLiteral
  | BoolLiteral
  | PrefixExpression
  | InfixExpression
  | IfExpression
  | FunctionLiteral
  | CallExpression;

export interface Program {
  readonly type: 'program';
  readonly statements: readonly Statement[];
}

export type Node = Program | Statement | Expression;

/**
 * Render a node as source-like text, with every operator application
 * wrapped in parentheses so the tree shape is visible.
 */
export function nodeToString(node: Node): string {
  switch (node.type) {
    case 'program':
      return node.statements.map(nodeToString).join(' ');
    case 'let_statement':
      return `let ${node.name} = ${nodeToString(node.value)};`;
    case 'return_statement':
      return node.value ? `return ${nodeToString(node.value)};` : 'return;';
    case 'expression_statement':
      return nodeToString(node.expression);
    case 'block':
      return node.statements.length === 0
        ? '{ }'
        : `{ ${node.statements.map(nodeToString).join(' ')} }`;
    case 'identifier':
      return node.name;
    case 'int_literal':
      return String(node.value);
    case 'bool_literal':
      return String(node.value);
    case 'prefix_expression':
      return `(${node.operator}${nodeToString(node.operand)})`;
    case 'infix_expression':
      return `(${nodeToString(node.left)} ${node.operator} ${nodeToString(node.right)})`;
    case 'if_expression': {
      const head = `if ${nodeToString(node.condition)} ${nodeToString(node.consequence)}`;
      return node.alternative ? `${head} else ${nodeToString(node.alternative)}` : head;
    }
    case 'function_literal':
      return `fn(${node.parameters.join(', ')}) ${nodeToString(node.body)}`;
    case 'call_expression':
      return `${nodeToString(node.callee)}(${node.args.map(nodeToString).join(', ')})`;
  }
}
