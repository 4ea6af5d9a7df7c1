/**
 * Operator table owned by a single parser
 *
 * Higher precedence binds tighter. Built-in binary operators are seeded on
 * construction; `binary` and `unary` prototypes add entries while parsing.
 */

export const BUILTIN_BINARY_OPERATORS: Readonly<Record<string, number>> = {
  '<': 10,
  '+': 20,
  '-': 20,
  '*': 40,
  '/': 40,
};

/** Used when a binary declaration gives no precedence */
export const DEFAULT_BINARY_PRECEDENCE = 30;

export const MIN_PRECEDENCE = 1;
export const MAX_PRECEDENCE = 100;

/**
 * Symbols the grammar itself relies on; they can never be declared as operators
 */
export const STRUCTURAL_SYMBOLS: ReadonlySet<string> = new Set(['(', ')', ',', ';']);

export function isValidPrecedence(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PRECEDENCE && value <= MAX_PRECEDENCE;
}

export interface ReadonlyOperatorTable {
  binaryPrecedence(symbol: string): number | undefined;
  isUnary(symbol: string): boolean;
  binaryOperators(): Array<[symbol: string, precedence: number]>;
  unaryOperators(): string[];
}

export class OperatorTable implements ReadonlyOperatorTable {
  private readonly binary = new Map<string, number>(Object.entries(BUILTIN_BINARY_OPERATORS));
  private readonly unary = new Set<string>();

  binaryPrecedence(symbol: string): number | undefined {
    return this.binary.get(symbol);
  }

  isUnary(symbol: string): boolean {
    return this.unary.has(symbol);
  }

  /**
   * Insert or overwrite a binary operator's precedence
   */
  defineBinary(symbol: string, precedence: number): void {
    this.binary.set(symbol, precedence);
  }

  defineUnary(symbol: string): void {
    this.unary.add(symbol);
  }

  binaryOperators(): Array<[symbol: string, precedence: number]> {
    return [...this.binary.entries()];
  }

  unaryOperators(): string[] {
    return [...this.unary];
  }
}
