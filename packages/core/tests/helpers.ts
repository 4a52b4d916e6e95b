/**
 * Counting iterable: records how many elements were pulled from `source`,
 * so tests can check that a traversal stopped where it should.
 */
export function counted<T>(source: Iterable<T>): { iterable: Iterable<T>; reads: () => number } {
  let reads = 0;
  const iterable: Iterable<T> = {
    [Symbol.iterator]() {
      const iter = source[Symbol.iterator]();
      return {
        next() {
          const result = iter.next();
          if (!result.done) reads++;
          return result;
        },
      };
    },
  };
  return { iterable, reads: () => reads };
}

/** 0, 1, 2, ... without end */
export function* naturals(): Generator<number> {
  for (let i = 0; ; i++) yield i;
}
