/**
 * Comparison typeclasses
 *
 * Plain dictionary-passing typeclasses: an instance is an object holding the
 * operations for one type, passed explicitly to whatever needs it.
 */

// ============================================================================
// Ordering
// ============================================================================

/**
 * Result of a three-way comparison.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

// ============================================================================
// Eq: types supporting equality comparison
// ============================================================================

/**
 * Eq typeclass.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  // NaN is equal to itself so that Eq stays reflexive
  equals: (a, b) => a === b || (Number.isNaN(a) && Number.isNaN(b)),
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
};

export const eqBoolean: Eq<boolean> = {
  equals: (a, b) => a === b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
};

/**
 * Create an Eq instance from an equality function.
 */
export function makeEq<A>(equals: (a: A, b: A) => boolean): Eq<A> {
  return { equals };
}

/**
 * Eq using `Object.is` (reference equality for objects).
 */
export function eqStrict<A>(): Eq<A> {
  return { equals: (a, b) => Object.is(a, b) };
}

// ============================================================================
// Ord: types supporting total ordering
// ============================================================================

/**
 * Ord typeclass.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
}

/**
 * Ordering on numbers. NaN sorts after every other number so the order is total.
 */
export const ordNumber: Ord<number> = makeOrd((a, b) => {
  if (a < b) return LT;
  if (a > b) return GT;
  if (a === b) return EQ;
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN && bNaN) return EQ;
  return aNaN ? GT : LT;
});

export const ordString: Ord<string> = makeOrd((a, b) => (a < b ? LT : a > b ? GT : EQ));

export const ordBoolean: Ord<boolean> = makeOrd((a, b) => (a === b ? EQ : a ? GT : LT));

export const ordBigInt: Ord<bigint> = makeOrd((a, b) => (a < b ? LT : a > b ? GT : EQ));

export const ordDate: Ord<Date> = ordBy((d: Date) => d.getTime(), ordNumber);

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ,
    compare,
  };
}

/**
 * Create an Ord instance from an `Array.prototype.sort`-style comparator,
 * normalizing its result to an `Ordering`.
 */
export function fromCompare<A>(compare: (a: A, b: A) => number): Ord<A> {
  return makeOrd((a, b) => {
    const c = compare(a, b);
    return c < 0 ? LT : c > 0 ? GT : EQ;
  });
}

/**
 * Create an Ord instance by mapping to a comparable value.
 */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B>): Ord<A> {
  return {
    equals: (a, b) => O.equals(f(a), f(b)),
    compare: (a, b) => O.compare(f(a), f(b)),
  };
}

/**
 * Reverse an Ord instance.
 */
export function reverseOrd<A>(O: Ord<A>): Ord<A> {
  return {
    equals: O.equals,
    compare: (a, b) => O.compare(b, a),
  };
}
