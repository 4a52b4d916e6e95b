/**
 * Entry points for creating producers.
 *
 * `from()` wraps arrays, iterables and anything implementing `IntoProducer`;
 * `range()`, `fromFn()`, `successors()` and friends build common sources.
 */

import { isIntoProducer, type IntoProducer } from "./bridge.js";
import { createLogger } from "./logger.js";
import { none, some, type Option } from "./option.js";
import { Producer } from "./producer.js";
import { assertCount, invariant } from "./safety.js";
import { CONTINUE, type Step, type StepResult } from "./step.js";

const log = createLogger("sources");

// ---------------------------------------------------------------------------
// Indexed sources
// ---------------------------------------------------------------------------

/**
 * Producer over an array. Knows its length, so `count`, `nth` and `last`
 * never visit elements.
 */
export class ArrayProducer<T> extends Producer<T> {
  constructor(private readonly items: readonly T[]) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    const items = this.items;
    for (let i = 0; i < items.length; i++) {
      const result = step(items[i]);
      if (result.type === "stop") return result;
    }
    return CONTINUE;
  }

  override _count(): number {
    return this.items.length;
  }

  override _nth(index: number): Option<T> {
    return index < this.items.length ? some(this.items[index]) : none;
  }

  override _last(): Option<T> {
    const length = this.items.length;
    return length > 0 ? some(this.items[length - 1]) : none;
  }
}

/**
 * Arithmetic progression `start, start + step, ...` below `end` (above it
 * for a negative step). Element `i` is computed as `start + i * step`.
 */
export class RangeProducer extends Producer<number> {
  private readonly length: number;

  constructor(
    private readonly start: number,
    end: number,
    private readonly stride: number,
  ) {
    super();
    invariant(stride !== 0 && !Number.isNaN(stride), "RangeProducer stride must be a non-zero number");
    this.length = RangeProducer.lengthOf(start, end, stride);
  }

  private static lengthOf(start: number, end: number, stride: number): number {
    const estimate = Math.ceil((end - start) / stride);
    // infinite bounds of the same sign give NaN; such a range is empty
    if (Number.isNaN(estimate) || estimate <= 0) return 0;
    if (estimate === Infinity) return estimate;
    // the division can round up past the bound: keep the last element inside it
    let length = estimate;
    const inside = (i: number) => {
      const value = start + i * stride;
      return stride > 0 ? value < end : value > end;
    };
    while (length > 0 && !inside(length - 1)) length--;
    return length;
  }

  override traverse<R>(step: Step<number, R>): StepResult<R> {
    const { start, stride, length } = this;
    for (let i = 0; i < length; i++) {
      const result = step(start + i * stride);
      if (result.type === "stop") return result;
    }
    return CONTINUE;
  }

  override _count(): number {
    return this.length;
  }

  override _nth(index: number): Option<number> {
    return index < this.length ? some(this.start + index * this.stride) : none;
  }

  override _last(): Option<number> {
    // an unbounded range has no last element; traverse like the default does
    if (this.length === Infinity) return super._last();
    return this.length > 0 ? some(this.start + (this.length - 1) * this.stride) : none;
  }
}

/**
 * `value`, `times` times.
 */
export class RepeatProducer<T> extends Producer<T> {
  constructor(
    private readonly value: T,
    private readonly times: number,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    for (let i = 0; i < this.times; i++) {
      const result = step(this.value);
      if (result.type === "stop") return result;
    }
    return CONTINUE;
  }

  override _count(): number {
    return this.times;
  }

  override _nth(index: number): Option<T> {
    return index < this.times ? some(this.value) : none;
  }

  override _last(): Option<T> {
    return this.times > 0 ? some(this.value) : none;
  }
}

// ---------------------------------------------------------------------------
// Sequential sources
// ---------------------------------------------------------------------------

/**
 * Producer over any JS iterable. A stop leaves the `for...of` loop early,
 * which closes the underlying iterator.
 */
export class IterableProducer<T> extends Producer<T> {
  constructor(private readonly source: Iterable<T>) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    for (const item of this.source) {
      const result = step(item);
      if (result.type === "stop") return result;
    }
    return CONTINUE;
  }
}

/**
 * Pushes items into a producer body. Returns `false` once the consumer has
 * stopped; the body should return at that point.
 */
export type Emit<T> = (item: T) => boolean;

export class FnProducer<T> extends Producer<T> {
  constructor(private readonly body: (emit: Emit<T>) => void) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    let result: StepResult<R> = CONTINUE;
    let stopped = false;
    let reported = false;

    this.body((item) => {
      if (stopped) {
        if (!reported) {
          reported = true;
          log.debug("fromFn body emitted after its consumer stopped; the item was dropped");
        }
        return false;
      }
      const next = step(item);
      if (next.type === "stop") {
        stopped = true;
        result = next;
        return false;
      }
      return true;
    });

    return result;
  }
}

export class SuccessorsProducer<T> extends Producer<T> {
  constructor(
    private readonly seed: T,
    private readonly next: (previous: T) => Option<T>,
  ) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    let current: Option<T> = some(this.seed);
    while (current !== null) {
      const result = step(current.value);
      if (result.type === "stop") return result;
      current = this.next(current.value);
    }
    return CONTINUE;
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Producer over an array, an iterable, or anything implementing
 * `IntoProducer` (including producers themselves).
 */
export function from<T>(source: IntoProducer<T> | Iterable<T>): Producer<T> {
  if (isIntoProducer(source)) return source.intoProducer();
  if (Array.isArray(source)) return new ArrayProducer<T>(source);
  return new IterableProducer(source);
}

/**
 * Producer over `[start, end)` with the given step (negative steps count
 * down).
 *
 * @throws RangeError if `step` is zero or not finite, or a bound is NaN
 */
export function range(start: number, end: number, step: number = 1): Producer<number> {
  if (step === 0 || !Number.isFinite(step)) {
    throw new RangeError(`range() step must be a finite non-zero number, got ${step}`);
  }
  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new RangeError("range() bounds must not be NaN");
  }
  return new RangeProducer(start, end, step);
}

/**
 * Producer driven by a function that pushes items through `emit`.
 *
 * @example
 * ```typescript
 * const squares = fromFn<number>((emit) => {
 *   for (let i = 1; ; i++) if (!emit(i * i)) return;
 * });
 * squares.take(3).toArray(); // [1, 4, 9]
 * ```
 */
export function fromFn<T>(body: (emit: Emit<T>) => void): Producer<T> {
  return new FnProducer(body);
}

/**
 * `seed`, then `next(seed)`, `next(next(seed))`, ... until `next` returns
 * `None`. Unbounded if it never does.
 */
export function successors<T>(seed: T, next: (previous: T) => Option<T>): Producer<T> {
  return new SuccessorsProducer(seed, next);
}

export function empty<T>(): Producer<T> {
  return new ArrayProducer<T>([]);
}

export function once<T>(value: T): Producer<T> {
  return new ArrayProducer([value]);
}

/**
 * @throws RangeError if `times` is not a non-negative integer
 */
export function repeatN<T>(value: T, times: number): Producer<T> {
  assertCount(times, "times");
  return new RepeatProducer(value, times);
}
