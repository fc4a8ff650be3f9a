import { describe, expect, it } from "vitest";
import { IncompatiblePathError, NoSuchElementError } from "@equasets/core";
import { Collections } from "../src/index.js";
import { lower, lowerCased, sortedLower } from "./fixtures.js";

describe("EquaMap", () => {
  it("keeps the first key and the last value", () => {
    const m = lower.EquaMap(["Hi", 1], ["b", 5], ["HI", 2]);
    expect(m.size).toBe(2);
    expect(m.toString()).toBe("EquaMap(Hi -> 2, b -> 5)");
    expect(m.keys()).toEqual(["Hi", "b"]);
    expect(m.values()).toEqual([2, 5]);
    expect(m.entries()).toEqual([
      ["Hi", 2],
      ["b", 5],
    ]);
  });

  it("looks keys up through the policy", () => {
    const m = lower.EquaMap(["Hi", 1]);
    expect(m.get("hI")).toBe(1);
    expect(m.get("ho")).toBeUndefined();
    expect(m.getOrElse("ho", 0)).toBe(0);
    expect(m.apply("HI")).toBe(1);
    expect(m.contains("hi")).toBe(true);
    expect(() => m.apply("ho")).toThrow(NoSuchElementError);
    expect(() => m.apply("ho")).toThrow("key not found: ho");
  });

  it("updates without mutating", () => {
    const m = lower.EquaMap(["Hi", 1]);
    const updated = m.set("hI", 3).add(["x", 4]);
    expect(updated.toString()).toBe("EquaMap(Hi -> 3, x -> 4)");
    expect(m.toString()).toBe("EquaMap(Hi -> 1)");
    expect(updated.addAll([["X", 9]]).get("x")).toBe(9);
  });

  it("removes keys", () => {
    const m = lower.EquaMap(["a", 1], ["b", 2], ["c", 3]);
    expect(m.remove("A", "C").keys()).toEqual(["b"]);
    expect(m.removeAll(lower.EquaSet("B")).keys()).toEqual(["a", "c"]);
    expect(m.removeAll(sortedLower.SortedEquaSet("c")).keys()).toEqual(["a", "b"]);
  });

  it("rejects removing a set of another policy", () => {
    const otherLower = Collections.of(lowerCased.toHashingEquality(), "lower");
    const m = lower.EquaMap(["a", 1]);
    expect(() => m.removeAll(otherLower.EquaSet("a"))).toThrow(IncompatiblePathError);
  });

  it("starts empty", () => {
    const m = lower.EquaMap.empty<number>();
    expect(m.isEmpty()).toBe(true);
    expect(m.toString()).toBe("EquaMap()");
    expect(lower.EquaMap.from([["k", true]]).get("K")).toBe(true);
  });

  it("converts", () => {
    const m = lower.EquaMap(["Hi", 1], ["b", 2]);
    expect(m.keySet().toString()).toBe("EquaSet(Hi, b)");
    expect(m.toMap()).toEqual(
      new Map([
        ["Hi", 1],
        ["b", 2],
      ])
    );
    expect([...m.toEquaBoxMap().keys()].map((b) => b.toString())).toEqual(["EquaBox(Hi)", "EquaBox(b)"]);
    expect(m.foldLeft(0, (acc, [, v]) => acc + v)).toBe(3);
    expect([...m]).toEqual(m.entries());
  });

  it("is equal to maps of the same policy with the same entries", () => {
    const a = lower.EquaMap<unknown>(["a", 1], ["b", [1, 2]]);
    const b = sortedLower.EquaMap<unknown>(["B", [1, 2]], ["A", 1]);
    expect(a.equals(b)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
    expect(a.equals(lower.EquaMap<unknown>(["a", 1], ["b", [2, 1]]))).toBe(false);
    expect(a.equals(lower.EquaMap(["a", 1]))).toBe(false);
  });

  it("is not equal to maps of another policy", () => {
    const otherLower = Collections.of(lowerCased.toHashingEquality(), "lower");
    expect(lower.EquaMap(["a", 1]).canEqual(otherLower.EquaMap(["a", 1]))).toBe(false);
    expect(lower.EquaMap(["a", 1]).equals(otherLower.EquaMap(["a", 1]))).toBe(false);
  });
});
