import type { Source } from '../language/source';

import { GraphQLError } from './GraphQLError';

/**
 * Produced by the lexer when the source text cannot be split into tokens:
 * an invalid character, an unterminated string or a malformed number.
 */
export class LexError extends GraphQLError {
  readonly position: number;
  readonly reason: string;

  constructor(source: Source, position: number, reason: string) {
    super(`Syntax Error: ${reason}`, {
      source,
      positions: [position],
    });
    this.name = 'LexError';
    this.position = position;
    this.reason = reason;
  }
}

/**
 * Produced by the parser when the token sequence does not match the grammar.
 * `expected` names what the parser was looking for at `position` and `found`
 * describes the token it saw instead.
 */
export class ParseError extends GraphQLError {
  readonly position: number;
  readonly expected: string;
  readonly found: string;

  constructor(
    source: Source,
    position: number,
    expected: string,
    found: string,
    description: string = `Expected ${expected}, found ${found}.`,
  ) {
    super(`Syntax Error: ${description}`, {
      source,
      positions: [position],
    });
    this.name = 'ParseError';
    this.position = position;
    this.expected = expected;
    this.found = found;
  }
}

export function isSyntaxError(
  error: unknown,
): error is LexError | ParseError {
  return error instanceof LexError || error instanceof ParseError;
}
