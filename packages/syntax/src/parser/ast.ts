import type { SourceLocation } from '../lexer/token';

/**
 * Base interface for all AST nodes
 */
interface BaseNode {
  /** Source location for error reporting */
  loc: SourceLocation | null;
}

/**
 * Numeric literal; every value in the language is a double
 */
export interface NumberLiteral extends BaseNode {
  type: 'NumberLiteral';
  value: number;
}

/**
 * Variable reference
 */
export interface VariableReference extends BaseNode {
  type: 'VariableReference';
  name: string;
}

/**
 * Prefix use of a user-declared unary operator: !x
 */
export interface UnaryExpression extends BaseNode {
  type: 'UnaryExpression';
  operator: string;
  operand: Expression;
}

/**
 * Binary operator expression: a + b, a < b, a | b
 */
export interface BinaryExpression extends BaseNode {
  type: 'BinaryExpression';
  operator: string;
  left: Expression;
  right: Expression;
}

/**
 * Function call: fib(n - 1)
 */
export interface CallExpression extends BaseNode {
  type: 'CallExpression';
  callee: string;
  arguments: Expression[];
}

/**
 * if cond then a else b
 */
export interface IfExpression extends BaseNode {
  type: 'IfExpression';
  condition: Expression;
  thenBranch: Expression;
  elseBranch: Expression;
}

/**
 * for i = start, end, step in body
 */
export interface ForExpression extends BaseNode {
  type: 'ForExpression';
  variable: string;
  start: Expression;
  end: Expression;
  /** null when omitted; the loop then steps by DEFAULT_FOR_STEP */
  step: Expression | null;
  body: Expression;
}

export interface VarBinding {
  name: string;
  initializer: Expression;
  loc: SourceLocation | null;
}

/**
 * var a = 1, b = 2 in body
 */
export interface VarExpression extends BaseNode {
  type: 'VarExpression';
  bindings: VarBinding[];
  body: Expression;
}

/**
 * Function signature, also used for operator declarations
 */
export interface Prototype extends BaseNode {
  type: 'Prototype';
  /** Function name, or the operator symbol itself when isOperator is set */
  name: string;
  params: string[];
  isOperator: boolean;
  /** Explicit precedence of a binary operator declaration */
  precedence: number | null;
}

/**
 * def name(params) body, or a wrapped top-level expression
 */
export interface FunctionDefinition extends BaseNode {
  type: 'FunctionDefinition';
  prototype: Prototype;
  body: Expression;
  /** true for top-level expressions wrapped into a zero-parameter function */
  anonymous: boolean;
}

/**
 * Union of all expression types
 */
export type Expression =
  | NumberLiteral
  | VariableReference
  | UnaryExpression
  | BinaryExpression
  | CallExpression
  | IfExpression
  | ForExpression
  | VarExpression;

/**
 * What the parser hands to the code generator, one item at a time
 */
export type TopLevelItem = FunctionDefinition | Prototype;

/**
 * Union of all AST node types
 */
export type Node = Expression | TopLevelItem;

export const DEFAULT_FOR_STEP = 1.0;
