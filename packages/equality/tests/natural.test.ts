import { describe, expect, it } from "vitest";
import { IllegalArgumentError } from "@equasets/core";
import {
  defaultEquality,
  defaultHashingEquality,
  defaultOrderingEquality,
  hashString,
  naturalCompare,
  naturalEquals,
  naturalHash,
  naturalOrderingEquality,
  type Equals,
} from "../src/natural.js";

class Point implements Equals {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Point && other.x === this.x && other.y === this.y;
  }

  hashCode(): number {
    return this.x * 31 + this.y;
  }
}

describe("naturalEquals", () => {
  it("uses SameValueZero for primitives", () => {
    expect(naturalEquals(1, 1)).toBe(true);
    expect(naturalEquals(0, -0)).toBe(true);
    expect(naturalEquals(NaN, NaN)).toBe(true);
    expect(naturalEquals("a", "a")).toBe(true);
    expect(naturalEquals("1", 1)).toBe(false);
    expect(naturalEquals(null, undefined)).toBe(false);
  });

  it("compares arrays element-wise", () => {
    expect(naturalEquals([1, [2, "x"]], [1, [2, "x"]])).toBe(true);
    expect(naturalEquals([1, 2], [1, 2, 3])).toBe(false);
    expect(naturalEquals([1, 2], { 0: 1, 1: 2 })).toBe(false);
  });

  it("compares dates by time", () => {
    expect(naturalEquals(new Date(1000), new Date(1000))).toBe(true);
    expect(naturalEquals(new Date(1000), new Date(2000))).toBe(false);
  });

  it("delegates to equals()", () => {
    expect(naturalEquals(new Point(1, 2), new Point(1, 2))).toBe(true);
    expect(naturalEquals(new Point(1, 2), new Point(2, 1))).toBe(false);
  });

  it("uses reference identity for other objects", () => {
    const o = { a: 1 };
    expect(naturalEquals(o, o)).toBe(true);
    expect(naturalEquals(o, { a: 1 })).toBe(false);
  });
});

describe("naturalHash", () => {
  it("hashes strings with djb2", () => {
    expect(hashString("")).toBe(5381);
    expect(naturalHash("a")).toBe(((5381 << 5) + 5381) ^ 97);
  });

  it("keeps small integers as their own hash", () => {
    expect(naturalHash(42)).toBe(42);
    expect(naturalHash(-0)).toBe(naturalHash(0));
  });

  it("agrees with naturalEquals", () => {
    const pairs: Array<[unknown, unknown]> = [
      [[1, 2], [1, 2]],
      [new Date(5), new Date(5)],
      [new Point(3, 4), new Point(3, 4)],
      [NaN, NaN],
      [1.5, 1.5],
    ];
    for (const [a, b] of pairs) {
      expect(naturalHash(a)).toBe(naturalHash(b));
    }
  });

  it("gives objects a stable identity hash", () => {
    const o = {};
    expect(naturalHash(o)).toBe(naturalHash(o));
  });

  it("uses hashCode() for Equals values", () => {
    expect(naturalHash(new Point(1, 2))).toBe(33);
  });
});

describe("naturalCompare", () => {
  it("orders numbers, strings, booleans, bigints and dates", () => {
    expect(naturalCompare(1, 2)).toBe(-1);
    expect(naturalCompare("b", "a")).toBe(1);
    expect(naturalCompare(false, true)).toBe(-1);
    expect(naturalCompare(10n, 10n)).toBe(0);
    expect(naturalCompare(new Date(2), new Date(1))).toBe(1);
  });

  it("sorts NaN last", () => {
    expect(naturalCompare(NaN, 1)).toBe(1);
    expect(naturalCompare(1, NaN)).toBe(-1);
    expect(naturalCompare(NaN, NaN)).toBe(0);
  });

  it("orders arrays lexicographically", () => {
    expect(naturalCompare([1, 2], [1, 3])).toBe(-1);
    expect(naturalCompare([1, 2], [1])).toBe(1);
    expect(naturalCompare([], [])).toBe(0);
  });

  it("rejects mixed kinds", () => {
    expect(() => naturalCompare(1, "1")).toThrow(IllegalArgumentError);
    expect(() => naturalCompare({}, {})).toThrow("values of kind object and object have no natural order");
  });
});

describe("default policies", () => {
  it("are shared singletons", () => {
    expect(defaultHashingEquality<string>()).toBe(defaultHashingEquality<number>());
    expect(defaultEquality<string>()).toBe(defaultHashingEquality<string>());
    expect(defaultOrderingEquality<number>()).toBe(naturalOrderingEquality<Date>());
  });

  it("derives ordering equality from compare", () => {
    const ord = defaultOrderingEquality<number>();
    expect(ord.areEqual(0, -0)).toBe(true);
    expect(ord.compare(3, 1)).toBe(1);
    expect(ord.hashCodeFor(7)).toBe(7);
  });
});
