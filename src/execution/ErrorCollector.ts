import type { Path } from '../jsutils/Path';
import { pathToOrdinals } from '../jsutils/Path';

import type { GraphQLError } from '../error/GraphQLError';

interface CollectedError {
  readonly error: GraphQLError;
  readonly ordinals: ReadonlyArray<number>;
}

/**
 * Gathers the field errors of one request.
 *
 * Fields complete in whatever order their resolvers settle, so errors are
 * ordered on the way out instead: by the position of each path segment in
 * the response (the response key's place in its selection set, or the list
 * index), with an ancestor's error ahead of its descendants'.
 */
export class ErrorCollector {
  private readonly _errors: Array<CollectedError> = [];

  add(error: GraphQLError, path: Path | undefined): void {
    this._errors.push({ error, ordinals: pathToOrdinals(path) });
  }

  get size(): number {
    return this._errors.length;
  }

  toArray(): ReadonlyArray<GraphQLError> {
    return [...this._errors]
      .sort((a, b) => compareOrdinals(a.ordinals, b.ordinals))
      .map(({ error }) => error);
  }
}

function compareOrdinals(
  a: ReadonlyArray<number>,
  b: ReadonlyArray<number>,
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; ++i) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}
