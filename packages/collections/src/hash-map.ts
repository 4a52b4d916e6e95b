/**
 * HashMap<K, V> is a map keyed by `Eq<K>` + `Hash<K>` instead of `===`.
 *
 * As a producer it yields `[key, value]` pairs in bucket order. A producer
 * walks the live buckets, so keys set by a step during traversal are visited
 * by that same traversal.
 */

import {
  CONTINUE,
  Producer,
  none,
  some,
  type IntoProducer,
  type Option,
  type Step,
  type StepResult,
} from "@sluice/core";
import type { Eq, Hash } from "@sluice/std";

interface Entry<K, V> {
  readonly key: K;
  value: V;
}

export class HashMap<K, V> implements IntoProducer<[K, V]> {
  private readonly _buckets = new Map<number, Entry<K, V>[]>();
  private _size = 0;

  constructor(
    private readonly _eq: Eq<K>,
    private readonly _hash: Hash<K>,
  ) {}

  get size(): number {
    return this._size;
  }

  private _entry(k: K): Entry<K, V> | undefined {
    const bucket = this._buckets.get(this._hash.hash(k));
    if (bucket === undefined) return undefined;
    return bucket.find((entry) => this._eq.equals(k, entry.key));
  }

  /** The value stored under `k`, boxed so stored `undefined` stays visible */
  get(k: K): Option<V> {
    const entry = this._entry(k);
    return entry === undefined ? none : some(entry.value);
  }

  getOrElse(k: K, fallback: V): V {
    const entry = this._entry(k);
    return entry === undefined ? fallback : entry.value;
  }

  has(k: K): boolean {
    return this._entry(k) !== undefined;
  }

  /** Stores `v` under `k`, replacing the value of an equal key */
  set(k: K, v: V): this {
    const existing = this._entry(k);
    if (existing !== undefined) {
      existing.value = v;
      return this;
    }
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (bucket === undefined) {
      this._buckets.set(h, [{ key: k, value: v }]);
    } else {
      bucket.push({ key: k, value: v });
    }
    this._size++;
    return this;
  }

  /** Replace the value under `k` with `f(current)`, or `f(undefined)` when absent */
  update(k: K, f: (current: V | undefined) => V): this {
    const entry = this._entry(k);
    return this.set(k, f(entry?.value));
  }

  delete(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (bucket === undefined) return false;
    const i = bucket.findIndex((entry) => this._eq.equals(k, entry.key));
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

  intoProducer(): Producer<[K, V]> {
    return new HashMapProducer(this._buckets, () => this._size);
  }

  keys(): Producer<K> {
    return this.intoProducer().map(([k]) => k);
  }

  values(): Producer<V> {
    return this.intoProducer().map(([, v]) => v);
  }

  *[Symbol.iterator](): IterableIterator<[K, V]> {
    for (const bucket of this._buckets.values()) {
      for (const { key, value } of bucket) yield [key, value];
    }
  }
}

class HashMapProducer<K, V> extends Producer<[K, V]> {
  constructor(
    private readonly buckets: ReadonlyMap<number, readonly Entry<K, V>[]>,
    private readonly size: () => number,
  ) {
    super();
  }

  override traverse<R>(step: Step<[K, V], R>): StepResult<R> {
    for (const bucket of this.buckets.values()) {
      for (const { key, value } of bucket) {
        const result = step([key, value]);
        if (result.type === "stop") return result;
      }
    }
    return CONTINUE;
  }

  override _count(): number {
    return this.size();
  }
}
