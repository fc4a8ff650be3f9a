import { describe, expect, it } from "vitest";
import { Collections, FastEquaSet, partialFunction, TreeEquaSet } from "../src/index.js";
import { lower, nativeNumber, number, sortedLower, trimmedPath } from "./fixtures.js";

describe("into", () => {
  const digits = trimmedPath.EquaSet("1", "2", "01", "3");

  it("maps into a sorted factory", () => {
    const s = digits.into(number).map((x) => parseInt(x, 10));
    expect(s).toBeInstanceOf(TreeEquaSet);
    expect(s.toString()).toBe("SortedEquaSet(1, 2, 3)");
  });

  it("maps into a hash-backed factory", () => {
    const s = digits.into(nativeNumber).map((x) => parseInt(x, 10));
    expect(s).toBeInstanceOf(FastEquaSet);
    expect(s.toString()).toBe("EquaSet(1, 2, 3)");
  });

  it("flatMaps and deduplicates under the target policy", () => {
    const s = lower.EquaSet("ab", "BC").into(sortedLower).flatMap((x) => x.split(""));
    expect(s.toString()).toBe("SortedEquaSet(a, b, C)");
  });

  it("filters before transforming", () => {
    const s = number
      .EquaSet(1, 2, 3, 4)
      .into(nativeNumber)
      .filter((x) => x % 2 === 0)
      .map((x) => x * 10);
    expect(s.toArray()).toEqual([20, 40]);
  });

  it("flatMaps large expansions", () => {
    const s = number
      .EquaSet(1)
      .into(nativeNumber)
      .flatMap(() => Array.from({ length: 300000 }, (_, i) => i % 3));
    expect(s.toArray()).toEqual([0, 1, 2]);
  });

  it("collects", () => {
    const evens = partialFunction(
      (x: number) => x % 2 === 0,
      (x: number) => `#${x}`
    );
    expect(number.EquaSet(1, 2, 3, 4).into(lower).collect(evens).toArray()).toEqual(["#2", "#4"]);
  });

  it("scans", () => {
    const s = lower.EquaSet("a", "bb", "ccc").into(nativeNumber).scanLeft(0, (acc, x) => acc + x.length);
    expect(s.toArray()).toEqual([0, 1, 3, 6]);
  });

  it("scans from the right", () => {
    const s = lower.EquaSet("a", "bb", "ccc").into(nativeNumber).scanRight(0, (x, acc) => x.length + acc);
    expect(s.toArray()).toEqual([6, 5, 3, 0]);
    const words = number.EquaSet(1, 2, 3).into(lower).scanRight("z", (x, acc) => `${x}${acc}`);
    expect(words.toString()).toBe("EquaSet(123z, 23z, 3z, z)");
  });

  it("flattens sets of iterables", () => {
    const words = Collections.native<readonly string[]>().EquaSet(["b", "a"], ["A", "c"], ["b", "a"]);
    expect(words.size).toBe(2);
    expect(words.into(sortedLower).flatten().toString()).toBe("SortedEquaSet(a, b, c)");
  });
});
