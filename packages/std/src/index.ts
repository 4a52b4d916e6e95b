/**
 * @sluice/std: typeclasses shared by the sluice packages.
 *
 * - `Eq` and `Ord` for comparisons (`min`, `max`, `minByKey`, ...)
 * - `Hash` for the hash-bucketed collections
 *
 * @example
 * ```ts
 * import { ordBy, ordNumber } from "@sluice/std";
 *
 * const byAge = ordBy((p: { age: number }) => p.age, ordNumber);
 * byAge.compare({ age: 3 }, { age: 5 }); // -1
 * ```
 */

export type { Ordering, Eq, Ord } from "./typeclasses/index.js";
export {
  LT,
  EQ,
  GT,
  eqNumber,
  eqString,
  eqBoolean,
  eqBigInt,
  eqStrict,
  makeEq,
  ordNumber,
  ordString,
  ordBoolean,
  ordBigInt,
  ordDate,
  makeOrd,
  ordBy,
  reverseOrd,
  fromCompare,
} from "./typeclasses/index.js";

export type { Hash } from "./typeclasses/hash.js";
export {
  hashNumber,
  hashString,
  hashBoolean,
  hashBigInt,
  makeHash,
  hashBy,
} from "./typeclasses/hash.js";
