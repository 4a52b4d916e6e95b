/**
 * Producer: push-based internal iteration.
 *
 * A producer calls a step function once per element, in order, and stops the
 * moment a step returns `Stop`. That single method, `traverse`, is all a
 * producer has to implement; everything else on this class is derived from
 * it.
 *
 * Producers are single-use. Every derived operation and every adapter
 * constructor claims the producer it is called on, and claiming twice is
 * reported according to the `guards.reuse` setting.
 *
 * @example
 * ```typescript
 * const total = from([1, 2, 3, 4, 5, 6])
 *   .filter((x) => x > 3)
 *   .map((x) => x * 10)
 *   .sum(); // 150
 * ```
 */

import type { Ord } from "@sluice/std";
import { arrayCollector, type Collector, type IntoProducer } from "./bridge.js";
import { config } from "./config.js";
import { ProducerConsumedError } from "./errors.js";
import { createLogger } from "./logger.js";
import { err, none, ok, some, type Option, type Result } from "./option.js";
import { assertCount, unreachable } from "./safety.js";
import { CONTINUE, proceed, stop, type Step, type StepResult, type Stop } from "./step.js";

const log = createLogger("producer");

/**
 * Returned by limiting adapters to halt their inner producer without a
 * downstream stop to report.
 */
const HALT: Stop<StepResult<never>> = Object.freeze(stop(CONTINUE));

export abstract class Producer<T> implements IntoProducer<T> {
  private _consumed = false;

  /**
   * The traversal primitive: call `step` on each element in order, returning
   * the first `Stop` unchanged, or `CONTINUE` once every element has been
   * visited. No element after the one that produced a `Stop` is touched.
   *
   * This is the raw primitive and does not claim the producer; adapters
   * call it on producers they own. Use `tryForEach` from outside.
   */
  abstract traverse<R>(step: Step<T, R>): StepResult<R>;

  intoProducer(): Producer<T> {
    return this;
  }

  /**
   * Take ownership of this producer.
   *
   * @internal
   */
  _claim(): void {
    if (!this._consumed) {
      this._consumed = true;
      return;
    }
    const name = this.constructor.name;
    const mode = config.reuseGuard();
    switch (mode) {
      case "throw":
        throw new ProducerConsumedError(name);
      case "warn":
        log.warn(`${name} is being traversed again after it was consumed`);
        break;
      case "off":
        break;
      default:
        unreachable(mode);
    }
  }

  // ---------------------------------------------------------------------------
  // Specialization hooks
  //
  // Overrides must be observably identical to these defaults: same result,
  // same elements visited by any user closure upstream.
  // ---------------------------------------------------------------------------

  /** @internal */
  _count(): number {
    let n = 0;
    this.traverse<never>(() => {
      n++;
      return CONTINUE;
    });
    return n;
  }

  /** @internal */
  _nth(index: number): Option<T> {
    let remaining = index;
    const result = this.traverse<T>((item) => {
      if (remaining === 0) return stop(item);
      remaining--;
      return CONTINUE;
    });
    return result.type === "stop" ? some(result.value) : none;
  }

  /** @internal */
  _last(): Option<T> {
    let last: Option<T> = none;
    this.traverse<never>((item) => {
      last = some(item);
      return CONTINUE;
    });
    return last;
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Run `f` on every element */
  forEach(f: (item: T) => void): void {
    this._claim();
    this.traverse<never>((item) => {
      f(item);
      return CONTINUE;
    });
  }

  /** `traverse`, after claiming the producer */
  tryForEach<R>(f: Step<T, R>): StepResult<R> {
    this._claim();
    return this.traverse(f);
  }

  /**
   * Fold with early exit: `f` returns `proceed(acc)` to keep going or
   * `stop(result)` to finish. Returns `proceed(finalAcc)` if it never stopped.
   */
  tryFold<Acc, R>(init: Acc, f: (acc: Acc, item: T) => StepResult<R, Acc>): StepResult<R, Acc> {
    this._claim();
    let acc = init;
    const result = this.traverse<R>((item) => {
      const next = f(acc, item);
      if (next.type === "stop") return next;
      acc = next.value;
      return CONTINUE;
    });
    return result.type === "stop" ? result : proceed(acc);
  }

  /** Fold elements left-to-right into a single value */
  fold<Acc>(init: Acc, f: (acc: Acc, item: T) => Acc): Acc {
    this._claim();
    let acc = init;
    this.traverse<never>((item) => {
      acc = f(acc, item);
      return CONTINUE;
    });
    return acc;
  }

  /** Fold seeded with the first element; `None` when empty */
  reduce(f: (acc: T, item: T) => T): Option<T> {
    this._claim();
    let acc: Option<T> = none;
    this.traverse<never>((item) => {
      acc = acc === null ? some(item) : some(f(acc.value, item));
      return CONTINUE;
    });
    return acc;
  }

  /** Number of elements */
  count(): number {
    this._claim();
    return this._count();
  }

  /**
   * The element at `index` (0-based), or `None`. Elements after `index` are
   * never visited.
   *
   * @throws RangeError if `index` is not a non-negative integer
   */
  nth(index: number): Option<T> {
    assertCount(index, "index");
    this._claim();
    return this._nth(index);
  }

  first(): Option<T> {
    return this.nth(0);
  }

  last(): Option<T> {
    this._claim();
    return this._last();
  }

  /** First element matching the predicate */
  find(predicate: (item: T) => boolean): Option<T> {
    this._claim();
    const result = this.traverse<T>((item) => (predicate(item) ? stop(item) : CONTINUE));
    return result.type === "stop" ? some(result.value) : none;
  }

  /** First `some` returned by `f` */
  findMap<U>(f: (item: T) => Option<U>): Option<U> {
    this._claim();
    const result = this.traverse<U>((item) => {
      const mapped = f(item);
      return mapped === null ? CONTINUE : stop(mapped.value);
    });
    return result.type === "stop" ? some(result.value) : none;
  }

  /** Index of the first element matching the predicate */
  position(predicate: (item: T) => boolean): Option<number> {
    this._claim();
    let index = 0;
    const result = this.traverse<number>((item) => {
      if (predicate(item)) return stop(index);
      index++;
      return CONTINUE;
    });
    return result.type === "stop" ? some(result.value) : none;
  }

  /** True if any element satisfies the predicate; stops at the first that does */
  any(predicate: (item: T) => boolean): boolean {
    this._claim();
    const result = this.traverse<boolean>((item) => (predicate(item) ? stop(true) : CONTINUE));
    return result.type === "stop";
  }

  /** True if every element satisfies the predicate; stops at the first that does not */
  all(predicate: (item: T) => boolean): boolean {
    this._claim();
    const result = this.traverse<boolean>((item) => (predicate(item) ? CONTINUE : stop(false)));
    return result.type !== "stop";
  }

  /** Smallest element; the first of several equal ones */
  min(ord: Ord<T>): Option<T> {
    return this.minBy((a, b) => ord.compare(a, b));
  }

  /** Largest element; the last of several equal ones */
  max(ord: Ord<T>): Option<T> {
    return this.maxBy((a, b) => ord.compare(a, b));
  }

  minBy(compare: (a: T, b: T) => number): Option<T> {
    this._claim();
    let best: Option<T> = none;
    this.traverse<never>((item) => {
      if (best === null || compare(item, best.value) < 0) best = some(item);
      return CONTINUE;
    });
    return best;
  }

  maxBy(compare: (a: T, b: T) => number): Option<T> {
    this._claim();
    let best: Option<T> = none;
    this.traverse<never>((item) => {
      if (best === null || compare(item, best.value) >= 0) best = some(item);
      return CONTINUE;
    });
    return best;
  }

  /**
   * Element with the smallest key; ties keep the first. `key` runs exactly
   * once per element.
   */
  minByKey<K>(key: (item: T) => K, ord: Ord<K>): Option<T> {
    this._claim();
    let best: Option<readonly [K, T]> = none;
    this.traverse<never>((item) => {
      const k = key(item);
      if (best === null || ord.compare(k, best.value[0]) < 0) best = some([k, item] as const);
      return CONTINUE;
    });
    return best === null ? none : some(best.value[1]);
  }

  /**
   * Element with the largest key; ties keep the last. `key` runs exactly
   * once per element.
   */
  maxByKey<K>(key: (item: T) => K, ord: Ord<K>): Option<T> {
    this._claim();
    let best: Option<readonly [K, T]> = none;
    this.traverse<never>((item) => {
      const k = key(item);
      if (best === null || ord.compare(k, best.value[0]) >= 0) best = some([k, item] as const);
      return CONTINUE;
    });
    return best === null ? none : some(best.value[1]);
  }

  sum(this: Producer<number>): number {
    return this.fold(0, (acc, item) => acc + item);
  }

  product(this: Producer<number>): number {
    return this.fold(1, (acc, item) => acc * item);
  }

  /** Join string elements with a separator */
  join(this: Producer<string>, separator: string = ","): string {
    let first = true;
    return this.fold("", (acc, item) => {
      if (first) {
        first = false;
        return item;
      }
      return acc + separator + item;
    });
  }

  /** Feed every element, in order, into a fresh builder from `collector` */
  collect<C>(collector: Collector<T, C>): C {
    const builder = collector.begin();
    this.forEach((item) => builder.accept(item));
    return builder.finish();
  }

  toArray(): T[] {
    return this.collect(arrayCollector<T>());
  }

  /**
   * Collect the `ok` values, stopping at the first `err` and returning it.
   * Elements after the first error are not visited.
   */
  tryCollect<A, E, C>(this: Producer<Result<A, E>>, collector: Collector<A, C>): Result<C, E> {
    this._claim();
    const builder = collector.begin();
    const result = this.traverse<E>((item) => {
      if (!item.ok) return stop(item.error);
      builder.accept(item.value);
      return CONTINUE;
    });
    return result.type === "stop" ? err(result.value) : ok(builder.finish());
  }

  // ---------------------------------------------------------------------------
  // Adapters
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (item: T) => U): Producer<U> {
    this._claim();
    return new MapProducer(this, f);
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (item: T) => boolean): Producer<T> {
    this._claim();
    return new FilterProducer(this, predicate);
  }

  /** Map and filter in one step: forward `v` for every `some(v)` */
  filterMap<U>(f: (item: T) => Option<U>): Producer<U> {
    this._claim();
    return new FilterMapProducer(this, f);
  }

  /**
   * Map each element to a producer and splice its elements in. A stop inside
   * any inner producer ends the whole traversal.
   */
  flatMap<U>(f: (item: T) => IntoProducer<U>): Producer<U> {
    this._claim();
    return new FlatMapProducer(this, f);
  }

  flatten<U>(this: Producer<IntoProducer<U>>): Producer<U> {
    return this.flatMap((inner) => inner);
  }

  /**
   * The first `count` elements. The element at position `count` is never
   * requested from the inner producer.
   *
   * @throws RangeError if `count` is not a non-negative integer
   */
  take(count: number): Producer<T> {
    assertCount(count, "take count");
    this._claim();
    return new TakeProducer(this, count);
  }

  /**
   * Everything after the first `count` elements.
   *
   * @throws RangeError if `count` is not a non-negative integer
   */
  skip(count: number): Producer<T> {
    assertCount(count, "skip count");
    this._claim();
    return new SkipProducer(this, count);
  }

  /** Elements up to, not including, the first that fails the predicate */
  takeWhile(predicate: (item: T) => boolean): Producer<T> {
    this._claim();
    return new TakeWhileProducer(this, predicate);
  }

  /** Skip elements while the predicate holds, then forward the rest */
  skipWhile(predicate: (item: T) => boolean): Producer<T> {
    this._claim();
    return new SkipWhileProducer(this, predicate);
  }

  /**
   * Every `step`-th element, starting with the first.
   *
   * @throws RangeError if `step` is not a positive integer
   */
  stepBy(step: number): Producer<T> {
    if (!Number.isSafeInteger(step) || step < 1) {
      throw new RangeError(`step must be a positive integer, got ${step}`);
    }
    this._claim();
    return new StepByProducer(this, step);
  }

  /** Pair each element with its 0-based position */
  enumerate(): Producer<[number, T]> {
    this._claim();
    return new EnumerateProducer(this);
  }

  /** Run a side effect on each element, forwarding it unchanged */
  inspect(f: (item: T) => void): Producer<T> {
    this._claim();
    return new InspectProducer(this, f);
  }

  /** All elements of this producer, then all of `other` */
  chain(other: IntoProducer<T>): Producer<T> {
    this._claim();
    const second = other.intoProducer();
    second._claim();
    return new ChainProducer(this, second);
  }

  /** Running accumulation: emits `f(acc, item)` after each element */
  scan<Acc>(init: Acc, f: (acc: Acc, item: T) => Acc): Producer<Acc> {
    this._claim();
    return new ScanProducer(this, init, f);
  }
}

// =============================================================================
// Adapter implementations
// =============================================================================

export class MapProducer<T, U> extends Producer<U> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly f: (item: T) => U,
  ) {
    super();
  }

  override traverse<R>(step: Step<U, R>): StepResult<R> {
    const f = this.f;
    return this.inner.traverse((item) => step(f(item)));
  }
}

export class FilterProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly predicate: (item: T) => boolean,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const predicate = this.predicate;
    return this.inner.traverse((item) => (predicate(item) ? step(item) : CONTINUE));
  }
}

export class FilterMapProducer<T, U> extends Producer<U> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly f: (item: T) => Option<U>,
  ) {
    super();
  }

  override traverse<R>(step: Step<U, R>): StepResult<R> {
    const f = this.f;
    return this.inner.traverse((item) => {
      const mapped = f(item);
      return mapped === null ? CONTINUE : step(mapped.value);
    });
  }
}

export class FlatMapProducer<T, U> extends Producer<U> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly f: (item: T) => IntoProducer<U>,
  ) {
    super();
  }

  override traverse<R>(step: Step<U, R>): StepResult<R> {
    const f = this.f;
    return this.inner.traverse((item) => {
      const sub = f(item).intoProducer();
      sub._claim();
      return sub.traverse(step);
    });
  }
}

export class TakeProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly limit: number,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    let remaining = this.limit;
    if (remaining === 0) return CONTINUE;

    const result = this.inner.traverse<StepResult<R>>((item) => {
      remaining--;
      const downstream = step(item);
      if (downstream.type === "stop") return stop(downstream);
      return remaining === 0 ? HALT : CONTINUE;
    });

    if (result.type === "continue") return CONTINUE;
    if (result === HALT) {
      log.debug(`take(${this.limit}) stopped its source after ${this.limit} elements`);
    }
    return result.value;
  }

  override _nth(index: number): Option<T> {
    return index < this.limit ? this.inner._nth(index) : super._nth(index);
  }
}

export class SkipProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly skipped: number,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    let remaining = this.skipped;
    return this.inner.traverse((item) => {
      if (remaining > 0) {
        remaining--;
        return CONTINUE;
      }
      return step(item);
    });
  }

  override _count(): number {
    return Math.max(0, this.inner._count() - this.skipped);
  }

  override _nth(index: number): Option<T> {
    const target = index + this.skipped;
    if (!Number.isSafeInteger(target)) return super._nth(index);
    return this.inner._nth(target);
  }
}

export class TakeWhileProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly predicate: (item: T) => boolean,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const predicate = this.predicate;
    const result = this.inner.traverse<StepResult<R>>((item) => {
      if (!predicate(item)) return HALT;
      const downstream = step(item);
      return downstream.type === "stop" ? stop(downstream) : CONTINUE;
    });
    return result.type === "stop" ? result.value : CONTINUE;
  }
}

export class SkipWhileProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly predicate: (item: T) => boolean,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const predicate = this.predicate;
    let skipping = true;
    return this.inner.traverse((item) => {
      if (skipping) {
        if (predicate(item)) return CONTINUE;
        skipping = false;
      }
      return step(item);
    });
  }
}

export class StepByProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly stride: number,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const stride = this.stride;
    let gap = 0;
    return this.inner.traverse((item) => {
      if (gap > 0) {
        gap--;
        return CONTINUE;
      }
      gap = stride - 1;
      return step(item);
    });
  }

  override _nth(index: number): Option<T> {
    const target = index * this.stride;
    if (!Number.isSafeInteger(target)) return super._nth(index);
    return this.inner._nth(target);
  }
}

export class EnumerateProducer<T> extends Producer<[number, T]> {
  constructor(private readonly inner: Producer<T>) {
    super();
  }

  override traverse<R>(step: Step<[number, T], R>): StepResult<R> {
    let index = 0;
    return this.inner.traverse((item) => step([index++, item]));
  }

  override _count(): number {
    return this.inner._count();
  }

  override _nth(index: number): Option<[number, T]> {
    const found = this.inner._nth(index);
    if (found === null) return none;
    const pair: [number, T] = [index, found.value];
    return some(pair);
  }
}

export class InspectProducer<T> extends Producer<T> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly f: (item: T) => void,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const f = this.f;
    return this.inner.traverse((item) => {
      f(item);
      return step(item);
    });
  }
}

export class ChainProducer<T> extends Producer<T> {
  constructor(
    private readonly front: Producer<T>,
    private readonly back: Producer<T>,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const result = this.front.traverse(step);
    return result.type === "stop" ? result : this.back.traverse(step);
  }

  override _count(): number {
    return this.front._count() + this.back._count();
  }

  override _last(): Option<T> {
    const fromFront = this.front._last();
    const fromBack = this.back._last();
    return fromBack ?? fromFront;
  }
}

export class ScanProducer<T, Acc> extends Producer<Acc> {
  constructor(
    private readonly inner: Producer<T>,
    private readonly init: Acc,
    private readonly f: (acc: Acc, item: T) => Acc,
  ) {
    super();
  }

  override traverse<R>(step: Step<Acc, R>): StepResult<R> {
    const f = this.f;
    let acc = this.init;
    return this.inner.traverse((item) => {
      acc = f(acc, item);
      return step(acc);
    });
  }
}
