/**
 * Lazily maps `s`. The result can be iterated any number of times and `cb`
 * runs again on every pass.
 */
export function genMap<T, U>(s: Iterable<T>, cb: (x: T) => U): Iterable<U> {
  return {
    *[Symbol.iterator]() {
      for (const x of s) {
        yield cb(x);
      }
    },
  };
}
