import { describe, expect, it } from "vitest";
import { defaultHashingEquality, defaultOrderingEquality } from "../src/natural.js";
import { makeNormalization } from "../src/normalization.js";
import { makeEquality, makeHashingEquality } from "../src/equality.js";

const lower = makeNormalization((s: string) => s.toLowerCase());
const trim = makeNormalization((s: string) => s.trim());
const exclaim = makeNormalization((s: string) => `${s}!`);

describe("Normalization", () => {
  it("normalizes values", () => {
    expect(lower.normalized("HeLLo")).toBe("hello");
  });

  it("composes left to right", () => {
    expect(lower.and(exclaim).normalized("Hi")).toBe("hi!");
    expect(exclaim.and(trim).normalized(" a ")).toBe("a !");
    expect(trim.and(exclaim).normalized(" a ")).toBe("a!");
  });

  it("composition is associative", () => {
    const left = lower.and(trim).and(exclaim);
    const right = lower.and(trim.and(exclaim));
    for (const s of ["  A ", "b", " Cc"]) {
      expect(left.normalized(s)).toBe(right.normalized(s));
    }
  });

  it("promotes to an Equality over a base", () => {
    const strict = makeEquality((a: string, b: string) => a === b);
    const caseless = lower.toEquality(strict);
    expect(caseless.areEqual("Hi", "hI")).toBe(true);
    expect(caseless.areEquivalent("Hi", "ho")).toBe(false);
  });

  it("promotes to a HashingEquality with consistent hashes", () => {
    const caseless = lower.and(trim).toHashingEquality(defaultHashingEquality<string>());
    expect(caseless.areEqual(" HELLO ", "hello")).toBe(true);
    expect(caseless.hashCodeFor(" HELLO ")).toBe(caseless.hashCodeFor("hello"));
  });

  it("promotes to an OrderingEquality", () => {
    const caseless = lower.toOrderingEquality(defaultOrderingEquality<string>());
    expect(caseless.compare("B", "a")).toBe(1);
    expect(caseless.compare("abc", "ABC")).toBe(0);
    expect(caseless.areEqual("abc", "ABC")).toBe(true);
  });

  it("uses the base hash on the normalized value", () => {
    const lengthHash = makeHashingEquality(
      (a: string, b: string) => a === b,
      (a: string) => a.length
    );
    expect(lower.toHashingEquality(lengthHash).hashCodeFor("ABCD")).toBe(4);
  });
});
