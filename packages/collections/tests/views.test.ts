import { afterEach, describe, expect, it, vi } from "vitest";
import { config } from "@equasets/core";
import { FastEquaSetView, partialFunction, TreeEquaSetView } from "../src/index.js";
import { lower, nativeNumber, number, trimmedPath } from "./fixtures.js";

describe("FastEquaSetView", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("runs nothing until traversed, and reruns on each traversal", () => {
    let calls = 0;
    const v = lower.EquaSet("a", "b").view().map((x) => {
      calls++;
      return x.toUpperCase();
    });
    expect(calls).toBe(0);
    expect(v.toArray()).toEqual(["A", "B"]);
    expect(calls).toBe(2);
    expect([...v]).toEqual(["A", "B"]);
    expect(calls).toBe(4);
  });

  it("deduplicates only when forced into a factory", () => {
    const v = trimmedPath.EquaSet(" 1", "2 ", "3").view().map((s) => parseInt(s, 10) + 1);
    expect(v.toEquaSet(nativeNumber).toString()).toBe("EquaSet(2, 3, 4)");
    const constant = lower.EquaSet("a", "b").view().map(() => 1);
    expect(constant.toArray()).toEqual([1, 1]);
    expect(constant.size).toBe(2);
    expect(constant.force(nativeNumber).size).toBe(1);
    expect(constant.toStrict(nativeNumber).toArray()).toEqual([1]);
  });

  it("gives equal sets when forced twice", () => {
    const v = trimmedPath.EquaSet("a", "b", "c").view().map((x) => x.length);
    const first = v.force(nativeNumber);
    const second = v.force(nativeNumber);
    expect(first).not.toBe(second);
    expect(first.equals(second)).toBe(true);
    expect(v.toSortedEquaSet(number).equals(v.toSortedEquaSet(number))).toBe(true);
  });

  it("forces into a sorted factory", () => {
    expect(FastEquaSetView.of(3, 1, 3).toSortedEquaSet(number).toString()).toBe(
      "SortedEquaSet(1, 3)"
    );
  });

  it("logs when forced in debug mode", () => {
    config.set({ debug: true });
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    FastEquaSetView.of(1).toEquaSet(nativeNumber);
    expect(debug).toHaveBeenCalledWith(
      "[equasets/views] DEBUG: forcing FastEquaSetView into Collections(native)"
    );
  });

  it("flatMaps, filters and collects", () => {
    const v = FastEquaSetView.of(1, 2, 3);
    expect(v.flatMap((x) => [x, x * 10]).toArray()).toEqual([1, 10, 2, 20, 3, 30]);
    expect(v.filter((x) => x > 1).toArray()).toEqual([2, 3]);
    expect(v.withFilter((x) => x < 2).toArray()).toEqual([1]);
    const odd = partialFunction(
      (x: number) => x % 2 === 1,
      (x: number) => `odd ${x}`
    );
    expect(v.collect(odd).toArray()).toEqual(["odd 1", "odd 3"]);
  });

  it("scans", () => {
    const v = FastEquaSetView.of(1, 2, 3);
    expect(v.scanLeft(0, (acc, x) => acc + x).toArray()).toEqual([0, 1, 3, 6]);
    expect(v.scan(0, (a, b) => a + b).toArray()).toEqual([0, 1, 3, 6]);
    expect(v.scanRight(0, (x, acc) => x + acc).toArray()).toEqual([6, 5, 3, 0]);
  });

  it("zips", () => {
    const v = FastEquaSetView.of(1, 2, 3);
    expect(v.zip(["a", "b"]).toArray()).toEqual([
      [1, "a"],
      [2, "b"],
    ]);
    expect(FastEquaSetView.of(1).zipAll(["a", "b"], 0, "-").toArray()).toEqual([
      [1, "a"],
      [0, "b"],
    ]);
    expect(FastEquaSetView.of(1, 2).zipAll(["a"], 0, "-").toArray()).toEqual([
      [1, "a"],
      [2, "-"],
    ]);
    expect(FastEquaSetView.of("x", "y").zipWithIndex().toArray()).toEqual([
      ["x", 0],
      ["y", 1],
    ]);
  });

  it("unzips", () => {
    const [letters, indices] = FastEquaSetView.of("x", "y").zipWithIndex().unzip();
    expect(letters.toArray()).toEqual(["x", "y"]);
    expect(indices.toArray()).toEqual([0, 1]);
    const triples = FastEquaSetView.of<readonly [number, string, boolean]>([1, "a", true], [2, "b", false]);
    const [ns, ss, bs] = triples.unzip3();
    expect(ns.toArray()).toEqual([1, 2]);
    expect(ss.toArray()).toEqual(["a", "b"]);
    expect(bs.toArray()).toEqual([true, false]);
  });

  it("compares as a bag", () => {
    expect(FastEquaSetView.of(1, 2, 2).equals(FastEquaSetView.of(2, 1, 2))).toBe(true);
    expect(FastEquaSetView.of(1, 2, 2).equals(FastEquaSetView.of(1, 2))).toBe(false);
    expect(FastEquaSetView.of(1, 2).equals(FastEquaSetView.of(1, 3))).toBe(false);
    expect(FastEquaSetView.of(1, 2).hashCode()).toBe(FastEquaSetView.of(2, 1).hashCode());
    expect(FastEquaSetView.of(1, 2).equals(TreeEquaSetView.of(1, 2))).toBe(false);
  });

  it("answers size queries and prints", () => {
    const v = FastEquaSetView.of(1, 2);
    expect(v.isEmpty()).toBe(false);
    expect(FastEquaSetView.of<number>().isEmpty()).toBe(true);
    expect(v.foldLeft(10, (acc, x) => acc + x)).toBe(13);
    expect(v.toString()).toBe("FastEquaSetView(1, 2)");
  });
});

describe("TreeEquaSetView", () => {
  it("follows the set order and forces to an array", () => {
    const v = number.SortedEquaSet(3, 1, 2).view().map((x) => x % 2);
    expect(v.force()).toEqual([1, 0, 1]);
    expect(v.toStrict(number).toString()).toBe("SortedEquaSet(0, 1)");
    expect(v.toString()).toBe("TreeEquaSetView(1, 0, 1)");
  });

  it("compares as a sequence", () => {
    expect(TreeEquaSetView.of(1, 2).equals(TreeEquaSetView.of(1, 2))).toBe(true);
    expect(TreeEquaSetView.of(1, 2).equals(TreeEquaSetView.of(2, 1))).toBe(false);
    expect(TreeEquaSetView.of(1, 2).hashCode()).toBe(TreeEquaSetView.of(1, 2).hashCode());
    expect(TreeEquaSetView.of(1, 2).hashCode()).not.toBe(TreeEquaSetView.of(2, 1).hashCode());
  });

  it("supports the same transforms", () => {
    const v = TreeEquaSetView.of(1, 2, 3);
    expect(v.zipWithIndex().map(([x, i]) => x * i).toArray()).toEqual([0, 2, 6]);
    expect(v.scanRight(0, (x, acc) => x + acc).force()).toEqual([6, 5, 3, 0]);
    expect(v.flatMap((x) => (x > 1 ? [x] : [])).force()).toEqual([2, 3]);
  });
});
