import type { Prototype } from './parser/ast';

/**
 * Symbol a code generator emits for a user-declared unary operator
 */
export function unaryOperatorSymbol(operator: string): string {
  return `unary${operator}`;
}

export function binaryOperatorSymbol(operator: string): string {
  return `binary${operator}`;
}

/**
 * Linkage name for a prototype. Plain functions keep their own name; operator
 * declarations are named by arity, so `def binary| 5 (a b)` links as "binary|".
 */
export function prototypeSymbol(prototype: Prototype): string {
  if (!prototype.isOperator) {
    return prototype.name;
  }
  return prototype.params.length === 1
    ? unaryOperatorSymbol(prototype.name)
    : binaryOperatorSymbol(prototype.name);
}
