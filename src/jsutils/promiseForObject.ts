import type { ObjMap } from './ObjMap';

/**
 * Converts an object whose values may be promises into a promise for an
 * object of the settled values, keeping the key order of the input.
 *
 * Unlike `Promise.all`, the returned promise only settles once every value
 * has settled. If any of them rejected, it rejects with the first rejection
 * in key order.
 */
export function promiseForObject<T>(
  object: ObjMap<Promise<T> | T>,
): Promise<ObjMap<T>> {
  const keys = Object.keys(object);
  const values = Object.values(object);

  return Promise.allSettled(values).then((settled) => {
    const resolvedObject: ObjMap<T> = Object.create(null);
    for (let i = 0; i < keys.length; ++i) {
      const outcome = settled[i];
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      resolvedObject[keys[i]] = outcome.value;
    }
    return resolvedObject;
  });
}
