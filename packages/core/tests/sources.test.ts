import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ArrayProducer,
  IterableProducer,
  config,
  empty,
  from,
  fromFn,
  none,
  once,
  range,
  repeatN,
  some,
  successors,
  toProducer,
  type IntoProducer,
  type Producer,
} from "../src/index.js";

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

describe("from", () => {
  it("wraps arrays in an ArrayProducer", () => {
    expect(from([1, 2])).toBeInstanceOf(ArrayProducer);
  });

  it("wraps other iterables in an IterableProducer", () => {
    const p = from(new Set(["a", "b"]));
    expect(p).toBeInstanceOf(IterableProducer);
    expect(p.toArray()).toEqual(["a", "b"]);
    expect(from("hi").toArray()).toEqual(["h", "i"]);
  });

  it("returns an existing producer unchanged", () => {
    const p = range(0, 3);
    expect(from(p)).toBe(p);
  });

  it("accepts anything implementing IntoProducer", () => {
    class Pair implements IntoProducer<string> {
      constructor(
        private readonly left: string,
        private readonly right: string,
      ) {}

      intoProducer(): Producer<string> {
        return from([this.left, this.right]);
      }
    }
    expect(from(new Pair("l", "r")).toArray()).toEqual(["l", "r"]);
    expect(toProducer(new Pair("x", "y")).join("")).toBe("xy");
  });
});

describe("range", () => {
  it("counts up by one by default", () => {
    expect(range(0, 5).toArray()).toEqual([0, 1, 2, 3, 4]);
  });

  it("counts down with a negative step", () => {
    expect(range(5, 0, -2).toArray()).toEqual([5, 3, 1]);
  });

  it("computes fractional steps by index", () => {
    expect(range(0, 1, 0.25).toArray()).toEqual([0, 0.25, 0.5, 0.75]);
  });

  it("is empty when the bounds are equal or reversed", () => {
    expect(range(3, 3).toArray()).toEqual([]);
    expect(range(5, 0).count()).toBe(0);
    expect(range(5, 0).last()).toBe(none);
  });

  it("never reaches the end bound when the step is fractional", () => {
    const xs = range(0, 2.1, 0.3).toArray();
    expect(xs).toHaveLength(7);
    expect(xs.every((x) => x < 2.1)).toBe(true);
    expect(range(0, 2.1, 0.3).count()).toBe(7);
    expect(range(0, 2.1, 0.3).last()).toEqual(some(6 * 0.3));
    expect(range(0, 2.1, 0.3).nth(7)).toBe(none);
    expect(range(0, 10.5, 0.7).count()).toBe(15);
  });

  it("is empty when both bounds are the same infinity", () => {
    expect(range(Infinity, Infinity).count()).toBe(0);
    expect(range(Infinity, Infinity).toArray()).toEqual([]);
    expect(range(-Infinity, -Infinity, -1).count()).toBe(0);
  });

  it("knows its last element", () => {
    expect(range(0, 10, 3).last()).toEqual(some(9));
  });

  it("rejects a zero or non-finite step and NaN bounds", () => {
    expect(() => range(0, 1, 0)).toThrow(
      new RangeError("range() step must be a finite non-zero number, got 0"),
    );
    expect(() => range(0, 1, Infinity)).toThrow(RangeError);
    expect(() => range(NaN, 1)).toThrow(new RangeError("range() bounds must not be NaN"));
  });
});

describe("fromFn", () => {
  it("forwards emitted items", () => {
    const squares = fromFn<number>((emit) => {
      for (let i = 1; ; i++) if (!emit(i * i)) return;
    });
    expect(squares.take(3).toArray()).toEqual([1, 4, 9]);
  });

  it("emit returns false once the consumer has stopped", () => {
    const answers: boolean[] = [];
    const first = fromFn<string>((emit) => {
      answers.push(emit("a"));
      answers.push(emit("b"));
    }).first();
    expect(first).toEqual(some("a"));
    expect(answers).toEqual([false, false]);
  });

  it("drops items emitted after a stop and reports it once", () => {
    config.set({ debug: true });
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    const out = fromFn<number>((emit) => {
      emit(1);
      emit(2);
      emit(3);
    })
      .take(1)
      .toArray();

    expect(out).toEqual([1]);
    expect(debug.mock.calls).toEqual([
      ["[sluice/sources] DEBUG: fromFn body emitted after its consumer stopped; the item was dropped"],
      ["[sluice/producer] DEBUG: take(1) stopped its source after 1 elements"],
    ]);
  });
});

describe("successors", () => {
  it("follows next until it returns none", () => {
    expect(successors(1, (n) => (n < 100 ? some(n * 3) : none)).toArray()).toEqual([
      1, 3, 9, 27, 81, 243,
    ]);
  });

  it("can be unbounded", () => {
    expect(
      successors("a", (s) => some(s + "a"))
        .map((s) => s.length)
        .nth(4),
    ).toEqual(some(5));
  });
});

describe("empty, once, repeatN", () => {
  it("empty has no elements", () => {
    expect(empty<number>().toArray()).toEqual([]);
  });

  it("once has exactly one", () => {
    expect(once("x").toArray()).toEqual(["x"]);
  });

  it("repeatN repeats a value", () => {
    expect(repeatN(0, 3).toArray()).toEqual([0, 0, 0]);
    expect(repeatN("z", 1_000_000).nth(999_999)).toEqual(some("z"));
    expect(repeatN("z", 2).last()).toEqual(some("z"));
    expect(() => repeatN(1, -2)).toThrow(
      new RangeError("times must be a non-negative integer, got -2"),
    );
  });
});
