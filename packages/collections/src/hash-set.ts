/**
 * HashSet<K> is a set keyed by `Eq<K>` + `Hash<K>` instead of `===`.
 *
 * Keys that are equal under `eq` must hash equally under `hash`. Traversal
 * order is bucket order: stable for a given sequence of insertions, but not
 * insertion order. A producer walks the live buckets, so keys added by a step
 * during traversal are visited by that same traversal.
 */

import { CONTINUE, Producer, type IntoProducer, type Step, type StepResult } from "@sluice/core";
import type { Eq, Hash } from "@sluice/std";

export class HashSet<K> implements IntoProducer<K> {
  private readonly _buckets = new Map<number, K[]>();
  private _size = 0;

  constructor(
    private readonly _eq: Eq<K>,
    private readonly _hash: Hash<K>,
  ) {}

  /** A set holding `keys`, later duplicates ignored */
  static of<K>(eq: Eq<K>, hash: Hash<K>, keys: Iterable<K>): HashSet<K> {
    const set = new HashSet(eq, hash);
    for (const k of keys) set.add(k);
    return set;
  }

  get size(): number {
    return this._size;
  }

  private _indexIn(bucket: readonly K[], k: K): number {
    for (let i = 0; i < bucket.length; i++) {
      if (this._eq.equals(k, bucket[i])) return i;
    }
    return -1;
  }

  has(k: K): boolean {
    const bucket = this._buckets.get(this._hash.hash(k));
    return bucket !== undefined && this._indexIn(bucket, k) >= 0;
  }

  /** Adds `k` unless an equal key is already present; the stored key is kept */
  add(k: K): this {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (bucket === undefined) {
      this._buckets.set(h, [k]);
    } else if (this._indexIn(bucket, k) < 0) {
      bucket.push(k);
    } else {
      return this;
    }
    this._size++;
    return this;
  }

  delete(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (bucket === undefined) return false;
    const i = this._indexIn(bucket, k);
    if (i < 0) return false;
    bucket.splice(i, 1);
    if (bucket.length === 0) this._buckets.delete(h);
    this._size--;
    return true;
  }

  clear(): void {
    this._buckets.clear();
    this._size = 0;
  }

  /** True if both sets hold keys equal under this set's `eq` */
  equals(other: HashSet<K>): boolean {
    if (this._size !== other.size) return false;
    for (const k of other) if (!this.has(k)) return false;
    return true;
  }

  intoProducer(): Producer<K> {
    return new HashSetProducer(this._buckets, () => this._size);
  }

  *[Symbol.iterator](): IterableIterator<K> {
    for (const bucket of this._buckets.values()) yield* bucket;
  }

  toArray(): K[] {
    return [...this];
  }
}

class HashSetProducer<K> extends Producer<K> {
  constructor(
    private readonly buckets: ReadonlyMap<number, readonly K[]>,
    private readonly size: () => number,
  ) {
    super();
  }

  override traverse<R>(step: Step<K, R>): StepResult<R> {
    for (const bucket of this.buckets.values()) {
      for (let i = 0; i < bucket.length; i++) {
        const result = step(bucket[i]);
        if (result.type === "stop") return result;
      }
    }
    return CONTINUE;
  }

  override _count(): number {
    return this.size();
  }
}
