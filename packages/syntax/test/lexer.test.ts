import { describe, expect, it } from 'vitest';
import { KEYWORDS, Lexer, LexerError, tokenize, TokenType } from '../src/lexer';
import type { Token } from '../src/lexer';

function tokens(input: string): Token[] {
  return tokenize(input).map((result) => {
    if (!result.ok) throw result.error;
    return result.value;
  });
}

function values(input: string): Array<string | number | undefined> {
  return tokens(input).map((token) => (token.type === TokenType.EOF ? undefined : token.value));
}

describe('Lexer', () => {
  describe('keywords and identifiers', () => {
    it('classifies all ten keywords', () => {
      const result = tokens(KEYWORDS.join(' '));

      expect(result).toHaveLength(11);
      expect(result.slice(0, 10).every((t) => t.type === TokenType.KEYWORD)).toBe(true);
      expect(values(KEYWORDS.join(' ')).slice(0, 10)).toEqual([...KEYWORDS]);
    });

    it('tokenizes identifiers', () => {
      const result = tokens('foo _bar x1 défini');

      expect(result.map((t) => t.type)).toEqual([
        TokenType.IDENTIFIER,
        TokenType.IDENTIFIER,
        TokenType.IDENTIFIER,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
      expect(values('foo _bar x1 défini')).toEqual(['foo', '_bar', 'x1', 'défini', undefined]);
    });

    it('treats keyword prefixes as identifiers', () => {
      const [token] = tokens('deff');
      expect(token).toMatchObject({ type: TokenType.IDENTIFIER, value: 'deff' });
    });

    it('is case sensitive', () => {
      const [token] = tokens('Def');
      expect(token.type).toBe(TokenType.IDENTIFIER);
    });
  });

  describe('numbers', () => {
    it('tokenizes integers and decimals', () => {
      const result = tokens('42 3.14 .5 1234.');

      expect(result.slice(0, 4)).toMatchObject([
        { type: TokenType.NUMBER, value: 42, raw: '42' },
        { type: TokenType.NUMBER, value: 3.14, raw: '3.14' },
        { type: TokenType.NUMBER, value: 0.5, raw: '.5' },
        { type: TokenType.NUMBER, value: 1234, raw: '1234.' },
      ]);
    });

    it('rejects numbers with more than one dot', () => {
      const [first, second] = tokenize('1.2.3');

      expect(first.ok).toBe(false);
      if (first.ok) return;
      expect(first.error).toBeInstanceOf(LexerError);
      expect(first.error.kind).toBe('InvalidNumber');
      expect(first.error.text).toBe('1.2.3');
      expect(first.error.message).toBe("Invalid number literal '1.2.3' at line 1, column 1");
      expect(second).toMatchObject({ ok: true, value: { type: TokenType.EOF } });
    });

    it('continues after an invalid number', () => {
      const results = tokenize('1.2.3 + x');

      expect(results.map((r) => r.ok)).toEqual([false, true, true, true]);
      expect(results.slice(1).map((r) => (r.ok ? r.value.type : null))).toEqual([
        TokenType.OPERATOR,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
    });

    it('lexes a dot not followed by a digit as an operator', () => {
      expect(values('a.b')).toEqual(['a', '.', 'b', undefined]);
    });
  });

  describe('operators', () => {
    it('emits every other printable character as a one-character operator', () => {
      const result = tokens('+-*/<|!;(),=');

      expect(result.slice(0, -1).every((t) => t.type === TokenType.OPERATOR)).toBe(true);
      expect(values('+-*/<|!;(),=')).toEqual([...'+-*/<|!;(),=', undefined]);
    });

    it('treats a character outside the basic plane as one operator', () => {
      const [symbol, name] = tokens('😀x');

      expect(symbol).toMatchObject({
        type: TokenType.OPERATOR,
        value: '😀',
        loc: { end: { line: 1, column: 1, index: 2 } },
      });
      expect(name).toMatchObject({
        type: TokenType.IDENTIFIER,
        value: 'x',
        loc: { start: { line: 1, column: 1, index: 2 } },
      });
    });

    it('rejects control characters', () => {
      const [first, second] = tokenize('\u0007x');

      expect(first.ok).toBe(false);
      if (first.ok) return;
      expect(first.error.kind).toBe('UnexpectedCharacter');
      expect(first.error.message).toBe('Unexpected character U+0007 at line 1, column 1');
      expect(second).toMatchObject({ ok: true, value: { type: TokenType.IDENTIFIER, value: 'x' } });
    });

    it('rejects non-ASCII separators', () => {
      const [, second] = tokenize('a\u00A0b');

      expect(second.ok).toBe(false);
      if (second.ok) return;
      expect(second.error.message).toBe('Unexpected character U+00A0 at line 1, column 2');
    });
  });

  describe('trivia', () => {
    it('skips comments to the end of the line', () => {
      const result = tokens('x # comment ( 1.2.3\ny');

      expect(values('x # comment ( 1.2.3\ny')).toEqual(['x', 'y', undefined]);
      expect(result[1].loc.start).toEqual({ line: 2, column: 0, index: 20 });
    });

    it('skips tabs and carriage returns', () => {
      expect(values('\ta\r\n b')).toEqual(['a', 'b', undefined]);
    });
  });

  describe('positions', () => {
    it('tracks line, column and index', () => {
      const [, foo, bar, eof] = tokens('def foo\n  bar');

      expect(foo.loc).toEqual({
        start: { line: 1, column: 4, index: 4 },
        end: { line: 1, column: 7, index: 7 },
      });
      expect(bar.loc.start).toEqual({ line: 2, column: 2, index: 10 });
      expect(eof.loc.start).toEqual({ line: 2, column: 5, index: 13 });
    });
  });

  describe('end of input', () => {
    it('keeps returning EndOfFile', () => {
      const lexer = new Lexer('');

      expect(lexer.lex()).toMatchObject({ ok: true, value: { type: TokenType.EOF } });
      expect(lexer.lex()).toMatchObject({ ok: true, value: { type: TokenType.EOF } });
    });

    it('iteration ends with exactly one EndOfFile', () => {
      const results = [...new Lexer('x')];

      expect(results).toHaveLength(2);
      expect(results[1]).toMatchObject({ ok: true, value: { type: TokenType.EOF } });
    });
  });

  describe('determinism', () => {
    const source = 'def fib(x)\n  if x < 3 then 1 else fib(x-1)+fib(x-2);';

    it('produces the same sequence for the same text', () => {
      expect(tokenize(source)).toEqual(tokenize(source));
    });

    it('reset rewinds to the start', () => {
      const lexer = new Lexer(source);
      const first = [...lexer];

      lexer.reset();

      expect([...lexer]).toEqual(first);
      expect(lexer.source).toBe(source);
    });
  });
});
