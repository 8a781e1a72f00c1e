import type { GraphQLError } from './GraphQLError';

/**
 * Recognizes GraphQLError instances by their tag, so that errors created by a
 * second copy of this package are still treated as located errors.
 */
export function isGraphQLError(error: unknown): error is GraphQLError {
  return Object.prototype.toString.call(error) === '[object GraphQLError]';
}
