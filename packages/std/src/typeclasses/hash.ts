/**
 * Hash typeclass
 *
 * Law: `Eq.equals(a, b) => hash(a) === hash(b)` for the Eq instance the
 * hash is paired with.
 */

export interface Hash<A> {
  /** A 32-bit integer. */
  hash(a: A): number;
}

/**
 * FNV-1a over UTF-16 code units.
 */
function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h | 0;
}

export const hashString: Hash<string> = {
  hash: fnv1a,
};

export const hashNumber: Hash<number> = {
  hash: (n) => {
    // int32 values hash to themselves; -0 lands on 0
    if (Number.isInteger(n) && n >= -0x80000000 && n <= 0x7fffffff) return n | 0;
    if (Number.isNaN(n)) return 0x7fc00000;
    return fnv1a(String(n));
  },
};

export const hashBoolean: Hash<boolean> = {
  hash: (b) => (b ? 1231 : 1237),
};

export const hashBigInt: Hash<bigint> = {
  hash: (n) => fnv1a(n.toString(36)),
};

export function makeHash<A>(hash: (a: A) => number): Hash<A> {
  return { hash: (a) => hash(a) | 0 };
}

/**
 * Hash a value through a projection, e.g. hashing records by their id.
 */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return { hash: (a) => H.hash(f(a)) };
}
