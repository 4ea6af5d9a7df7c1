export type {
  BinaryExpression,
  CallExpression,
  Expression,
  ForExpression,
  FunctionDefinition,
  IfExpression,
  Node,
  NumberLiteral,
  Prototype,
  TopLevelItem,
  UnaryExpression,
  VarBinding,
  VariableReference,
  VarExpression,
} from './ast';
export { DEFAULT_FOR_STEP } from './ast';
export {
  BUILTIN_BINARY_OPERATORS,
  DEFAULT_BINARY_PRECEDENCE,
  isValidPrecedence,
  MAX_PRECEDENCE,
  MIN_PRECEDENCE,
  OperatorTable,
  STRUCTURAL_SYMBOLS,
} from './operator-table';
export type { ReadonlyOperatorTable } from './operator-table';
export { ANONYMOUS_FUNCTION_PREFIX, MAX_NESTING_DEPTH, Parser } from './parser';
export type { ParseResult, ParserOptions } from './parser';
export { ParserError, ParserErrorKind } from './parser-error';
export type { ParserErrorDetails } from './parser-error';
