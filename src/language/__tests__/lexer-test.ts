import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectJSON } from '../../__testUtils__/expectJSON';

import { LexError } from '../../error/syntaxError';

import type { Token } from '../ast';
import { Lexer, tokenize } from '../lexer';
import { Source } from '../source';
import { TokenKind } from '../tokenKind';

function lexOne(str: string): Token {
  const lexer = new Lexer(new Source(str));
  return lexer.advance();
}

function lexError(str: string): LexError {
  try {
    lexOne(str);
  } catch (error) {
    expect(error).to.be.instanceOf(LexError);
    if (error instanceof LexError) {
      return error;
    }
  }
  throw new Error('Expected the lexer to fail.');
}

describe('Lexer', () => {
  it('produces every significant token followed by EOF', () => {
    const kinds = Array.from(tokenize('{ user(id: 1) { id } }'), (token) =>
      token.value === '' ? token.kind : `${token.kind}:${token.value}`,
    );

    expect(kinds).to.deep.equal([
      '{',
      'Name:user',
      '(',
      'Name:id',
      ':',
      'Int:1',
      ')',
      '{',
      'Name:id',
      '}',
      '}',
      '<EOF>',
    ]);
  });

  it('reads tokens lazily', () => {
    const tokens = tokenize('{ ? }');

    const first = tokens.next();
    expect(first.done).to.equal(false);
    expect(first.value).to.have.property('kind', TokenKind.BRACE_L);

    expect(() => tokens.next()).to.throw(
      LexError,
      'Syntax Error: Unexpected character: "?".',
    );
  });

  it('skips whitespace, commas and comments', () => {
    const token = lexOne('\uFEFF ,\t# a comment\n  foo');

    expectJSON(token).toDeepEqual({
      kind: TokenKind.NAME,
      value: 'foo',
      line: 2,
      column: 3,
    });
  });

  it('tracks lines across carriage returns', () => {
    const token = lexOne('\r\n\r\n  bar');
    expect(token.line).to.equal(3);
    expect(token.column).to.equal(3);
    expect(token.start).to.equal(6);
    expect(token.end).to.equal(9);
  });

  it('lexes numbers', () => {
    expectJSON(lexOne('4')).toDeepNestedProperty('value', '4');
    expect(lexOne('-4').kind).to.equal(TokenKind.INT);
    expect(lexOne('0').kind).to.equal(TokenKind.INT);

    const float = lexOne('-1.5e3');
    expect(float.kind).to.equal(TokenKind.FLOAT);
    expect(float.value).to.equal('-1.5e3');
    expect(lexOne('2E+10').kind).to.equal(TokenKind.FLOAT);
  });

  it('lexes strings with escapes', () => {
    const token = lexOne('"a\\nb\\u0041\\u{1F600}"');
    expect(token.kind).to.equal(TokenKind.STRING);
    expect(token.value).to.equal('a\nbA\u{1F600}');
  });

  it('lexes block strings and strips common indentation', () => {
    const token = lexOne('"""\n    hello\n      world\n"""');
    expect(token.kind).to.equal(TokenKind.BLOCK_STRING);
    expect(token.value).to.equal('hello\n  world');
  });

  it('lexes punctuation', () => {
    expect(lexOne('...').kind).to.equal(TokenKind.SPREAD);
    expect(lexOne('!').kind).to.equal(TokenKind.BANG);
    expect(lexOne('$').kind).to.equal(TokenKind.DOLLAR);
    expect(lexOne('@').kind).to.equal(TokenKind.AT);
    expect(lexOne('|').kind).to.equal(TokenKind.PIPE);
  });

  it('reports unexpected characters with a location', () => {
    expectJSON(lexError('\n  ?')).toDeepEqual({
      message: 'Syntax Error: Unexpected character: "?".',
      locations: [{ line: 2, column: 3 }],
    });
    expect(lexError('..').message).to.equal(
      'Syntax Error: Unexpected character: ".".',
    );
    expect(lexError('\u203B').message).to.equal(
      'Syntax Error: Unexpected character: U+203B.',
    );
  });

  it('suggests double quotes for single quotes', () => {
    expect(lexError("'name'").message).to.equal(
      'Syntax Error: Unexpected single quote character (\'), did you mean to use a double quote (")?',
    );
  });

  it('reports malformed numbers', () => {
    expectJSON(lexError('01')).toDeepEqual({
      message: 'Syntax Error: Invalid number, unexpected digit after 0: "1".',
      locations: [{ line: 1, column: 2 }],
    });
    expectJSON(lexError('1x')).toDeepEqual({
      message: 'Syntax Error: Invalid number, expected digit but got: "x".',
      locations: [{ line: 1, column: 2 }],
    });
    expect(lexError('1.').message).to.equal(
      'Syntax Error: Invalid number, expected digit but got: <EOF>.',
    );
  });

  it('reports unterminated strings', () => {
    const error = lexError('"abc');
    expect(error.reason).to.equal('Unterminated string.');
    expect(error.position).to.equal(4);
    expectJSON(error).toDeepEqual({
      message: 'Syntax Error: Unterminated string.',
      locations: [{ line: 1, column: 5 }],
    });

    expect(lexError('"abc\ndef"').message).to.equal(
      'Syntax Error: Unterminated string.',
    );
  });

  it('reports bad escape sequences', () => {
    expect(lexError('"\\x"').message).to.equal(
      'Syntax Error: Invalid character escape sequence: "\\x".',
    );
  });
});
