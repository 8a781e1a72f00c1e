import type { Maybe } from './Maybe';

export interface Path {
  readonly prev: Path | undefined;
  readonly key: string | number;
  readonly typename: string | undefined;
  /**
   * Position of this key among its siblings in the response: the ordinal of
   * the response key within its grouped field set, or the list index.
   */
  readonly ordinal: number;
}

/**
 * Given a Path and a key, return a new Path containing the new key.
 */
export function addPath(
  prev: Readonly<Path> | undefined,
  key: string | number,
  typename: string | undefined,
  ordinal: number = typeof key === 'number' ? key : 0,
): Path {
  return { prev, key, typename, ordinal };
}

/**
 * Given a Path, return an Array of the path keys.
 */
export function pathToArray(
  path: Maybe<Readonly<Path>>,
): Array<string | number> {
  const flattened = [];
  let curr = path;
  while (curr) {
    flattened.push(curr.key);
    curr = curr.prev;
  }
  return flattened.reverse();
}

/**
 * Given a Path, return an Array of the ordinals of each key.
 */
export function pathToOrdinals(path: Maybe<Readonly<Path>>): Array<number> {
  const flattened = [];
  let curr = path;
  while (curr) {
    flattened.push(curr.ordinal);
    curr = curr.prev;
  }
  return flattened.reverse();
}
