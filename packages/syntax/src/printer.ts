import { prototypeSymbol } from './linkage';
import type { Expression, Prototype, TopLevelItem } from './parser/ast';

/**
 * Render an expression as an s-expression, e.g. `(+ a (* b c))`
 */
export function printExpression(node: Expression): string {
  switch (node.type) {
    case 'NumberLiteral':
      return String(node.value);

    case 'VariableReference':
      return node.name;

    case 'UnaryExpression':
      return `(${node.operator} ${printExpression(node.operand)})`;

    case 'BinaryExpression':
      return `(${node.operator} ${printExpression(node.left)} ${printExpression(node.right)})`;

    case 'CallExpression':
      return list(['call', node.callee, ...node.arguments.map(printExpression)]);

    case 'IfExpression':
      return list([
        'if',
        printExpression(node.condition),
        printExpression(node.thenBranch),
        printExpression(node.elseBranch),
      ]);

    case 'ForExpression': {
      const header = [node.variable, printExpression(node.start), printExpression(node.end)];
      if (node.step !== null) {
        header.push(printExpression(node.step));
      }
      return list(['for', list(header), printExpression(node.body)]);
    }

    case 'VarExpression': {
      const bindings = node.bindings.map((binding) =>
        list([binding.name, printExpression(binding.initializer)]),
      );
      return list(['var', list(bindings), printExpression(node.body)]);
    }
  }
}

/**
 * Render a top-level item: `(extern sin (x))` or `(def name (params) body)`
 */
export function printItem(item: TopLevelItem): string {
  if (item.type === 'Prototype') {
    return list(['extern', ...signature(item)]);
  }
  return list(['def', ...signature(item.prototype), printExpression(item.body)]);
}

function signature(prototype: Prototype): string[] {
  const parts = [prototypeSymbol(prototype)];
  if (prototype.precedence !== null) {
    parts.push(String(prototype.precedence));
  }
  parts.push(list(prototype.params));
  return parts;
}

function list(parts: string[]): string {
  return `(${parts.join(' ')})`;
}
