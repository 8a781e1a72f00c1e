import type { Maybe } from '../jsutils/Maybe';
import { inspect } from '../jsutils/inspect';

import type { ASTNode } from '../language/ast';

import { GraphQLError } from './GraphQLError';
import { isGraphQLError } from './isGraphQLError';

/**
 * Given an arbitrary value, presumably thrown while attempting to execute a
 * GraphQL operation, produce a new GraphQLError aware of the location in the
 * document responsible for the original Error.
 */
export function locatedError(
  rawOriginalError: unknown,
  nodes: ASTNode | ReadonlyArray<ASTNode> | undefined | null,
  path?: Maybe<ReadonlyArray<string | number>>,
): GraphQLError {
  const originalError = toError(rawOriginalError);

  // Note: this uses a brand-check to support GraphQL errors originating from other contexts.
  if (isLocatedGraphQLError(originalError)) {
    return originalError;
  }

  return new GraphQLError(originalError.message, {
    nodes: isGraphQLError(originalError) ? originalError.nodes ?? nodes : nodes,
    source: isGraphQLError(originalError) ? originalError.source : undefined,
    positions: isGraphQLError(originalError)
      ? originalError.positions
      : undefined,
    path,
    originalError,
  });
}

function isLocatedGraphQLError(error: Error): error is GraphQLError {
  return isGraphQLError(error) && Array.isArray(error.path);
}

/**
 * Sometimes a non-error is thrown, wrap it as an Error instance to ensure a
 * consistent Error interface.
 */
export function toError(thrownValue: unknown): Error {
  return thrownValue instanceof Error
    ? thrownValue
    : new NonErrorThrown(thrownValue);
}

class NonErrorThrown extends Error {
  thrownValue: unknown;

  constructor(thrownValue: unknown) {
    super('Unexpected error value: ' + inspect(thrownValue));
    this.name = 'NonErrorThrown';
    this.thrownValue = thrownValue;
  }
}
