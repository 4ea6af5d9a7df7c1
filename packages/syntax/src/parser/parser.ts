import type { Logger } from '@kaleidoscope/logger';
import { Lexer, type LexResult } from '../lexer/lexer';
import type { Keyword } from '../lexer/token-types';
import { TokenType } from '../lexer/token-types';
import {
  describeToken,
  isKeywordToken,
  isOperatorToken,
  type SourceLocation,
  type Token,
} from '../lexer/token';
import { err, ok, type Err, type Result } from '../result';
import type {
  CallExpression,
  Expression,
  ForExpression,
  FunctionDefinition,
  IfExpression,
  Prototype,
  TopLevelItem,
  VarBinding,
  VarExpression,
} from './ast';
import {
  DEFAULT_BINARY_PRECEDENCE,
  isValidPrecedence,
  MAX_PRECEDENCE,
  MIN_PRECEDENCE,
  OperatorTable,
  STRUCTURAL_SYMBOLS,
  type ReadonlyOperatorTable,
} from './operator-table';
import { ParserError, ParserErrorKind } from './parser-error';

export type ParseResult<T> = Result<T, ParserError>;

export interface ParserOptions {
  /** Receives debug events for operator declarations and failures */
  logger?: Logger;
}

export const ANONYMOUS_FUNCTION_PREFIX = '__anon_expr_';

/**
 * Deepest expression nesting the parser descends into. Each level of
 * parentheses, `if`, `for` or `var` counts twice, a prefix operator once.
 */
export const MAX_NESTING_DEPTH = 500;

type Fixity = 'unary' | 'binary';

/**
 * Recursive descent parser with precedence climbing for binary operators
 *
 * Grammar (one token of lookahead, no backtracking):
 *   top       := definition | external | expression, each followed by ';' or EOF
 *   definition:= 'def' prototype expression
 *   external  := 'extern' prototype
 *   prototype := ident '(' ident* ')'
 *              | 'unary' OP '(' ident ')'
 *              | 'binary' OP number? '(' ident ident ')'
 *   expression:= unary (BINOP unary)*
 *   unary     := UNOP unary | primary
 *   primary   := number | ident | ident '(' args ')' | '(' expression ')'
 *              | if | for | var
 */
export class Parser {
  private readonly lexer: Lexer;
  private readonly table = new OperatorTable();
  private readonly logger: Logger | null;
  /** Pending lookahead; null once consumed and not yet pulled again */
  private lookahead: LexResult | null = null;
  private previous: Token | null = null;
  private anonymousCount = 0;
  private depth = 0;

  constructor(source: string | Lexer, options: ParserOptions = {}) {
    this.lexer = typeof source === 'string' ? new Lexer(source) : source;
    this.logger = options.logger ?? null;
  }

  /**
   * Live view of the operator table, including declarations parsed so far
   */
  get operators(): ReadonlyOperatorTable {
    return this.table;
  }

  /**
   * Parse the whole input, stopping at the first error
   */
  parseProgram(): ParseResult<TopLevelItem[]> {
    const items: TopLevelItem[] = [];

    while (true) {
      const item = this.parseNext();
      if (!item.ok) return item;
      if (item.value === null) return ok(items);
      items.push(item.value);
    }
  }

  /**
   * Parse the next top-level item; null once the input is exhausted
   */
  parseNext(): ParseResult<TopLevelItem | null> {
    const result = this.parseTopLevel();

    if (!result.ok) {
      this.logger?.debug('parse_failed', {
        kind: result.error.kind,
        line: result.error.line,
        column: result.error.column + 1,
      });
    }

    return result;
  }

  /**
   * Skip tokens (and lexical errors) through the next ';' so a driver can
   * resume top-level parsing after a failure. Stops before end of input.
   */
  synchronize(): void {
    while (true) {
      const next = this.peekRaw();

      if (!next.ok) {
        this.lookahead = null;
        continue;
      }
      if (next.value.type === TokenType.EOF) {
        return;
      }

      this.lookahead = null;
      this.previous = next.value;
      if (isOperatorToken(next.value, ';')) {
        return;
      }
    }
  }

  // Token navigation

  private peekRaw(): LexResult {
    if (this.lookahead === null) {
      this.lookahead = this.lexer.lex();
    }
    return this.lookahead;
  }

  private peek(): ParseResult<Token> {
    const next = this.peekRaw();
    return next.ok ? next : err(ParserError.fromLexerError(next.error));
  }

  private advance(): ParseResult<Token> {
    const token = this.peek();
    if (token.ok) {
      this.previous = token.value;
      this.lookahead = null;
    }
    return token;
  }

  /**
   * Consume the lookahead if it is the given operator symbol
   */
  private matchOperator(symbol: string): ParseResult<boolean> {
    const token = this.peek();
    if (!token.ok) return token;
    if (!isOperatorToken(token.value, symbol)) return ok(false);
    this.advance();
    return ok(true);
  }

  private expectOperator(
    symbol: string,
    kind: ParserErrorKind,
    afterExpression: boolean = false,
  ): ParseResult<Token> {
    const token = this.peek();
    if (!token.ok) return token;
    if (isOperatorToken(token.value, symbol)) return this.advance();
    return this.unexpected(token.value, `'${symbol}'`, kind, afterExpression);
  }

  /**
   * then / else / in always follow an expression
   */
  private expectKeyword(keyword: Keyword): ParseResult<Token> {
    const token = this.peek();
    if (!token.ok) return token;
    if (isKeywordToken(token.value, keyword)) return this.advance();
    return this.unexpected(token.value, `'${keyword}'`, ParserErrorKind.UNEXPECTED_TOKEN, true);
  }

  private expectIdentifier(expected: string): ParseResult<string> {
    const token = this.peek();
    if (!token.ok) return token;
    if (token.value.type !== TokenType.IDENTIFIER) {
      return this.unexpected(token.value, expected, ParserErrorKind.UNEXPECTED_TOKEN);
    }
    this.advance();
    return ok(token.value.value);
  }

  /**
   * Build an "expected X, found Y" failure. Right after an expression, an
   * operator symbol missing from the table is reported as unknown, since the
   * binary loop stopped on it rather than rejecting it.
   */
  private unexpected(
    token: Token,
    expected: string,
    kind: ParserErrorKind,
    afterExpression: boolean = false,
  ): Err<ParserError> {
    const found = describeToken(token);

    if (
      afterExpression &&
      token.type === TokenType.OPERATOR &&
      !STRUCTURAL_SYMBOLS.has(token.value) &&
      this.table.binaryPrecedence(token.value) === undefined
    ) {
      return err(
        new ParserError(
          ParserErrorKind.UNKNOWN_OPERATOR,
          `Unknown operator '${token.value}'`,
          token.loc.start,
          { expected, found },
        ),
      );
    }

    return err(
      new ParserError(kind, `Expected ${expected}, found ${found}`, token.loc.start, {
        expected,
        found,
      }),
    );
  }

  private invalidDeclaration(token: Token, description: string): Err<ParserError> {
    return err(
      new ParserError(ParserErrorKind.INVALID_OPERATOR_DECLARATION, description, token.loc.start, {
        found: describeToken(token),
      }),
    );
  }

  /**
   * Run a recursive production one level deeper, failing at the current
   * token instead of descending past MAX_NESTING_DEPTH
   */
  private nested<T>(production: () => ParseResult<T>): ParseResult<T> {
    if (this.depth >= MAX_NESTING_DEPTH) {
      const token = this.peek();
      if (!token.ok) return token;
      return err(
        new ParserError(
          ParserErrorKind.EXPECTED_EXPRESSION,
          `Expression nested too deeply (more than ${MAX_NESTING_DEPTH} levels)`,
          token.value.loc.start,
          { expected: 'expression', found: describeToken(token.value) },
        ),
      );
    }

    this.depth++;
    const result = production();
    this.depth--;
    return result;
  }

  private makeLoc(start: Token): SourceLocation {
    const end = this.previous ?? start;
    return {
      start: start.loc.start,
      end: end.loc.end,
    };
  }

  // Top level

  private parseTopLevel(): ParseResult<TopLevelItem | null> {
    let token = this.peek();
    if (!token.ok) return token;

    // Empty items between semicolons are skipped
    while (isOperatorToken(token.value, ';')) {
      this.advance();
      token = this.peek();
      if (!token.ok) return token;
    }

    if (token.value.type === TokenType.EOF) {
      return ok(null);
    }

    if (isKeywordToken(token.value, 'def')) {
      return this.terminated(this.parseDefinition());
    }
    if (isKeywordToken(token.value, 'extern')) {
      return this.terminated(this.parseExtern());
    }

    // Named only once complete, so a failed expression does not use up a number
    const body = this.terminated(this.parseExpression());
    if (!body.ok) return body;
    return ok(this.wrapAnonymous(body.value));
  }

  private terminated<T>(item: ParseResult<T>): ParseResult<T> {
    if (!item.ok) return item;
    const terminator = this.expectTerminator();
    return terminator.ok ? item : terminator;
  }

  /**
   * ';' ends an item; the last item may instead run into end of input
   */
  private expectTerminator(): ParseResult<void> {
    const token = this.peek();
    if (!token.ok) return token;
    if (token.value.type === TokenType.EOF) return ok(undefined);
    if (isOperatorToken(token.value, ';')) {
      this.advance();
      return ok(undefined);
    }
    return this.unexpected(token.value, "';'", ParserErrorKind.MISSING_TERMINATOR, true);
  }

  private parseDefinition(): ParseResult<FunctionDefinition> {
    const start = this.advance(); // consume 'def'
    if (!start.ok) return start;

    const prototype = this.parsePrototype();
    if (!prototype.ok) return prototype;

    const body = this.parseExpression();
    if (!body.ok) return body;

    return ok({
      type: 'FunctionDefinition',
      prototype: prototype.value,
      body: body.value,
      anonymous: false,
      loc: this.makeLoc(start.value),
    });
  }

  private parseExtern(): ParseResult<Prototype> {
    const start = this.advance(); // consume 'extern'
    if (!start.ok) return start;
    return this.parsePrototype();
  }

  private wrapAnonymous(body: Expression): FunctionDefinition {
    this.anonymousCount++;
    const prototype: Prototype = {
      type: 'Prototype',
      name: `${ANONYMOUS_FUNCTION_PREFIX}${this.anonymousCount}`,
      params: [],
      isOperator: false,
      precedence: null,
      loc: body.loc,
    };

    return {
      type: 'FunctionDefinition',
      prototype,
      body,
      anonymous: true,
      loc: body.loc,
    };
  }

  /**
   * Parse a prototype. Operator prototypes take effect in the table as soon
   * as they are parsed, so the body that follows may already use them.
   */
  private parsePrototype(): ParseResult<Prototype> {
    const first = this.peek();
    if (!first.ok) return first;
    const startToken = first.value;

    let name: string;
    let fixity: Fixity | null = null;
    let precedence: number | null = null;

    if (startToken.type === TokenType.IDENTIFIER) {
      this.advance();
      name = startToken.value;
    } else if (isKeywordToken(startToken, 'unary') || isKeywordToken(startToken, 'binary')) {
      this.advance();
      fixity = startToken.value === 'unary' ? 'unary' : 'binary';

      const symbol = this.parseOperatorSymbol(fixity);
      if (!symbol.ok) return symbol;
      name = symbol.value;

      if (fixity === 'binary') {
        const explicit = this.parseOptionalPrecedence();
        if (!explicit.ok) return explicit;
        precedence = explicit.value;
      }
    } else {
      return this.unexpected(startToken, 'function name in prototype', ParserErrorKind.UNEXPECTED_TOKEN);
    }

    const open = this.expectOperator('(', ParserErrorKind.UNEXPECTED_TOKEN);
    if (!open.ok) return open;

    const params: string[] = [];
    while (true) {
      const token = this.peek();
      if (!token.ok) return token;
      if (token.value.type !== TokenType.IDENTIFIER) break;
      params.push(token.value.value);
      this.advance();
    }

    const close = this.expectOperator(')', ParserErrorKind.MISSING_TERMINATOR);
    if (!close.ok) return close;

    if (fixity !== null) {
      const arity = fixity === 'unary' ? 1 : 2;
      if (params.length !== arity) {
        return this.invalidDeclaration(
          startToken,
          `Invalid number of operands for ${fixity} operator '${name}': expected ${arity}, found ${params.length}`,
        );
      }
      this.declareOperator(name, fixity, precedence);
    }

    return ok({
      type: 'Prototype',
      name,
      params,
      isOperator: fixity !== null,
      precedence,
      loc: this.makeLoc(startToken),
    });
  }

  private parseOperatorSymbol(fixity: Fixity): ParseResult<string> {
    const token = this.peek();
    if (!token.ok) return token;

    const symbol = token.value;
    if (symbol.type !== TokenType.OPERATOR || STRUCTURAL_SYMBOLS.has(symbol.value)) {
      return this.invalidDeclaration(
        symbol,
        `Expected operator symbol after '${fixity}', found ${describeToken(symbol)}`,
      );
    }

    this.advance();
    return ok(symbol.value);
  }

  private parseOptionalPrecedence(): ParseResult<number | null> {
    const token = this.peek();
    if (!token.ok) return token;

    const literal = token.value;
    if (literal.type !== TokenType.NUMBER) return ok(null);

    if (!isValidPrecedence(literal.value)) {
      return this.invalidDeclaration(
        literal,
        `Invalid precedence ${literal.raw}: must be an integer from ${MIN_PRECEDENCE} to ${MAX_PRECEDENCE}`,
      );
    }

    this.advance();
    return ok(literal.value);
  }

  private declareOperator(symbol: string, fixity: Fixity, precedence: number | null): void {
    if (fixity === 'unary') {
      this.table.defineUnary(symbol);
      this.logger?.debug('operator_declared', { symbol, fixity, precedence: null });
      return;
    }

    const effective = precedence ?? DEFAULT_BINARY_PRECEDENCE;
    this.table.defineBinary(symbol, effective);
    this.logger?.debug('operator_declared', { symbol, fixity, precedence: effective });
  }

  // Expressions

  /**
   * Precedence climbing: fold operators whose precedence is at least
   * minPrecedence; the right operand only takes strictly tighter ones, which
   * keeps every operator left-associative.
   */
  parseExpression(minPrecedence: number = 0): ParseResult<Expression> {
    return this.nested(() => this.parseBinary(minPrecedence));
  }

  private parseBinary(minPrecedence: number): ParseResult<Expression> {
    const startToken = this.peek();
    if (!startToken.ok) return startToken;

    const first = this.parseUnary();
    if (!first.ok) return first;
    let left = first.value;

    while (true) {
      const token = this.peek();
      if (!token.ok) return token;

      const operator = token.value;
      if (operator.type !== TokenType.OPERATOR) return ok(left);

      const precedence = this.table.binaryPrecedence(operator.value);
      if (precedence === undefined || precedence < minPrecedence) return ok(left);

      this.advance();
      const right = this.parseExpression(precedence + 1);
      if (!right.ok) return right;

      left = {
        type: 'BinaryExpression',
        operator: operator.value,
        left,
        right: right.value,
        loc: this.makeLoc(startToken.value),
      };
    }
  }

  private parseUnary(): ParseResult<Expression> {
    return this.nested(() => this.parsePrefix());
  }

  /** A registered prefix operator applied to a unary operand, or a primary */
  private parsePrefix(): ParseResult<Expression> {
    const token = this.peek();
    if (!token.ok) return token;

    const operator = token.value;
    if (operator.type !== TokenType.OPERATOR || !this.table.isUnary(operator.value)) {
      return this.parsePrimary();
    }

    this.advance();
    const operand = this.parseUnary();
    if (!operand.ok) return operand;

    return ok({
      type: 'UnaryExpression',
      operator: operator.value,
      operand: operand.value,
      loc: this.makeLoc(operator),
    });
  }

  private parsePrimary(): ParseResult<Expression> {
    const peeked = this.peek();
    if (!peeked.ok) return peeked;
    const token = peeked.value;

    switch (token.type) {
      case TokenType.NUMBER:
        this.advance();
        return ok({ type: 'NumberLiteral', value: token.value, loc: token.loc });

      case TokenType.IDENTIFIER:
        return this.parseIdentifierExpression();

      case TokenType.KEYWORD:
        if (token.value === 'if') return this.parseIf();
        if (token.value === 'for') return this.parseFor();
        if (token.value === 'var') return this.parseVar();
        break;

      case TokenType.OPERATOR:
        if (token.value === '(') return this.parseParenthesized();
        break;

      case TokenType.EOF:
        break;
    }

    return err(
      new ParserError(
        ParserErrorKind.EXPECTED_EXPRESSION,
        `Expected expression, found ${describeToken(token)}`,
        token.loc.start,
        { expected: 'expression', found: describeToken(token) },
      ),
    );
  }

  private parseParenthesized(): ParseResult<Expression> {
    this.advance(); // consume '('

    const inner = this.parseExpression();
    if (!inner.ok) return inner;

    const close = this.expectOperator(')', ParserErrorKind.MISSING_TERMINATOR, true);
    if (!close.ok) return close;

    // Parentheses only group; the inner node keeps its own location
    return inner;
  }

  private parseIdentifierExpression(): ParseResult<Expression> {
    const nameToken = this.advance();
    if (!nameToken.ok) return nameToken;
    if (nameToken.value.type !== TokenType.IDENTIFIER) {
      return this.unexpected(nameToken.value, 'identifier', ParserErrorKind.UNEXPECTED_TOKEN);
    }
    const name = nameToken.value.value;

    const isCall = this.matchOperator('(');
    if (!isCall.ok) return isCall;
    if (!isCall.value) {
      return ok({ type: 'VariableReference', name, loc: nameToken.value.loc });
    }

    const args: Expression[] = [];
    const closedEmpty = this.matchOperator(')');
    if (!closedEmpty.ok) return closedEmpty;

    if (!closedEmpty.value) {
      while (true) {
        const arg = this.parseExpression();
        if (!arg.ok) return arg;
        args.push(arg.value);

        const comma = this.matchOperator(',');
        if (!comma.ok) return comma;
        if (!comma.value) break;
      }

      const close = this.expectOperator(')', ParserErrorKind.MISSING_TERMINATOR, true);
      if (!close.ok) return close;
    }

    const call: CallExpression = {
      type: 'CallExpression',
      callee: name,
      arguments: args,
      loc: this.makeLoc(nameToken.value),
    };
    return ok(call);
  }

  private parseIf(): ParseResult<IfExpression> {
    const start = this.advance(); // consume 'if'
    if (!start.ok) return start;

    const condition = this.parseExpression();
    if (!condition.ok) return condition;

    const then = this.expectKeyword('then');
    if (!then.ok) return then;

    const thenBranch = this.parseExpression();
    if (!thenBranch.ok) return thenBranch;

    const otherwise = this.expectKeyword('else');
    if (!otherwise.ok) return otherwise;

    const elseBranch = this.parseExpression();
    if (!elseBranch.ok) return elseBranch;

    return ok({
      type: 'IfExpression',
      condition: condition.value,
      thenBranch: thenBranch.value,
      elseBranch: elseBranch.value,
      loc: this.makeLoc(start.value),
    });
  }

  private parseFor(): ParseResult<ForExpression> {
    const start = this.advance(); // consume 'for'
    if (!start.ok) return start;

    const variable = this.expectIdentifier('loop variable name');
    if (!variable.ok) return variable;

    const assign = this.expectOperator('=', ParserErrorKind.UNEXPECTED_TOKEN);
    if (!assign.ok) return assign;

    const from = this.parseExpression();
    if (!from.ok) return from;

    const comma = this.expectOperator(',', ParserErrorKind.UNEXPECTED_TOKEN, true);
    if (!comma.ok) return comma;

    const end = this.parseExpression();
    if (!end.ok) return end;

    let step: Expression | null = null;
    const hasStep = this.matchOperator(',');
    if (!hasStep.ok) return hasStep;
    if (hasStep.value) {
      const parsedStep = this.parseExpression();
      if (!parsedStep.ok) return parsedStep;
      step = parsedStep.value;
    }

    const inKeyword = this.expectKeyword('in');
    if (!inKeyword.ok) return inKeyword;

    const body = this.parseExpression();
    if (!body.ok) return body;

    return ok({
      type: 'ForExpression',
      variable: variable.value,
      start: from.value,
      end: end.value,
      step,
      body: body.value,
      loc: this.makeLoc(start.value),
    });
  }

  private parseVar(): ParseResult<VarExpression> {
    const start = this.advance(); // consume 'var'
    if (!start.ok) return start;

    const bindings: VarBinding[] = [];
    while (true) {
      const nameToken = this.peek();
      if (!nameToken.ok) return nameToken;

      const name = this.expectIdentifier('variable name');
      if (!name.ok) return name;

      const assign = this.expectOperator('=', ParserErrorKind.UNEXPECTED_TOKEN);
      if (!assign.ok) return assign;

      const initializer = this.parseExpression();
      if (!initializer.ok) return initializer;

      bindings.push({
        name: name.value,
        initializer: initializer.value,
        loc: this.makeLoc(nameToken.value),
      });

      const comma = this.matchOperator(',');
      if (!comma.ok) return comma;
      if (!comma.value) break;
    }

    const inKeyword = this.expectKeyword('in');
    if (!inKeyword.ok) return inKeyword;

    const body = this.parseExpression();
    if (!body.ok) return body;

    return ok({
      type: 'VarExpression',
      bindings,
      body: body.value,
      loc: this.makeLoc(start.value),
    });
  }
}
