import { describe, it, expect } from "vitest";
import {
  EQ,
  GT,
  LT,
  eqNumber,
  eqStrict,
  fromCompare,
  hashBy,
  hashNumber,
  hashString,
  makeHash,
  ordBy,
  ordDate,
  ordNumber,
  ordString,
  ordBoolean,
  ordBigInt,
  reverseOrd,
} from "../src/index.js";

describe("Ord instances", () => {
  it("ordNumber compares numbers", () => {
    expect(ordNumber.compare(1, 2)).toBe(LT);
    expect(ordNumber.compare(2, 1)).toBe(GT);
    expect(ordNumber.compare(2, 2)).toBe(EQ);
    expect(ordNumber.compare(-0, 0)).toBe(EQ);
  });

  it("ordNumber places NaN after every number", () => {
    expect(ordNumber.compare(NaN, Infinity)).toBe(GT);
    expect(ordNumber.compare(-Infinity, NaN)).toBe(LT);
    expect(ordNumber.compare(NaN, NaN)).toBe(EQ);
    expect(ordNumber.equals(NaN, NaN)).toBe(true);
  });

  it("ordString, ordBoolean and ordBigInt", () => {
    expect(ordString.compare("a", "b")).toBe(LT);
    expect(ordString.equals("x", "x")).toBe(true);
    expect(ordBoolean.compare(false, true)).toBe(LT);
    expect(ordBoolean.compare(true, true)).toBe(EQ);
    expect(ordBigInt.compare(10n, 9n)).toBe(GT);
  });

  it("ordDate compares timestamps", () => {
    expect(ordDate.compare(new Date(1000), new Date(2000))).toBe(LT);
    expect(ordDate.equals(new Date(5), new Date(5))).toBe(true);
  });

  it("ordBy compares through a projection", () => {
    const byLength = ordBy((s: string) => s.length, ordNumber);
    expect(byLength.compare("aaa", "b")).toBe(GT);
    expect(byLength.equals("ab", "cd")).toBe(true);
  });

  it("reverseOrd flips the order but keeps equality", () => {
    const desc = reverseOrd(ordNumber);
    expect(desc.compare(1, 2)).toBe(GT);
    expect(desc.equals(3, 3)).toBe(true);
  });

  it("fromCompare normalizes comparator results", () => {
    const ord = fromCompare((a: number, b: number) => a - b);
    expect(ord.compare(1, 10)).toBe(LT);
    expect(ord.compare(10, 1)).toBe(GT);
    expect(ord.compare(4, 4)).toBe(EQ);
  });
});

describe("Eq instances", () => {
  it("eqNumber", () => {
    expect(eqNumber.equals(1, 1)).toBe(true);
    expect(eqNumber.equals(1, 2)).toBe(false);
  });

  it("eqStrict uses reference identity", () => {
    const eq = eqStrict<{ id: number }>();
    const a = { id: 1 };
    expect(eq.equals(a, a)).toBe(true);
    expect(eq.equals(a, { id: 1 })).toBe(false);
  });
});

describe("Hash instances", () => {
  it("hashString is deterministic and distinguishes short strings", () => {
    expect(hashString.hash("abc")).toBe(hashString.hash("abc"));
    expect(hashString.hash("abc")).not.toBe(hashString.hash("abd"));
  });

  it("hashNumber agrees with eqNumber", () => {
    expect(hashNumber.hash(42)).toBe(42);
    expect(hashNumber.hash(-0)).toBe(hashNumber.hash(0));
    expect(hashNumber.hash(NaN)).toBe(hashNumber.hash(Number("x")));
    expect(hashNumber.hash(1.5)).toBe(hashNumber.hash(3 / 2));
  });

  it("makeHash truncates to 32 bits", () => {
    const h = makeHash((n: number) => n);
    expect(h.hash(2 ** 32 + 7)).toBe(7);
  });

  it("hashBy hashes through a projection", () => {
    const byId = hashBy((r: { id: string }) => r.id, hashString);
    expect(byId.hash({ id: "k" })).toBe(hashString.hash("k"));
  });
});
