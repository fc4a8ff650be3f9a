/**
 * Uniformity: a Normalization that can also recognise, at runtime, which
 * arbitrary values it knows how to normalize. That makes it usable without a
 * base policy (the natural ones fill in) and on values of unknown type.
 */

import {
  makeEquivalence,
  type Equality,
  type Equivalence,
  type HashingEquality,
  type OrderingEquality,
} from "./equality.js";
import {
  defaultEquality,
  defaultHashingEquality,
  naturalEquals,
  naturalOrderingEquality,
} from "./natural.js";
import {
  makeNormalization,
  normalizingEquality,
  normalizingHashingEquality,
  normalizingOrderingEquality,
  type Normalization,
} from "./normalization.js";

export interface Uniformity<T> extends Normalization<T> {
  normalizedCanHandle(b: unknown): b is T;
  /** `normalized(b)` when this uniformity can handle `b`, else `b` unchanged */
  normalizedOrSame(b: unknown): unknown;
  /** Composing two uniformities stays a uniformity */
  and(other: Uniformity<T>): Uniformity<T>;
  /** A plain normalization on the right gives a plain normalization */
  and(other: Normalization<T>): Normalization<T>;
  toEquality(base?: Equality<T>): Equality<T>;
  toHashingEquality(base?: HashingEquality<T>): HashingEquality<T>;
  toOrderingEquality(base?: OrderingEquality<T>): OrderingEquality<T>;
  toEquivalence(): Equivalence<T>;
}

export function isUniformity<T>(normalization: Normalization<T>): normalization is Uniformity<T> {
  return (
    "normalizedCanHandle" in normalization &&
    typeof normalization.normalizedCanHandle === "function" &&
    "normalizedOrSame" in normalization &&
    typeof normalization.normalizedOrSame === "function"
  );
}

/**
 * @example
 * ```typescript
 * const lowerCased = makeUniformity(
 *   (s: string) => s.toLowerCase(),
 *   (b): b is string => typeof b === "string"
 * );
 * lowerCased.normalizedOrSame("HI"); // "hi"
 * lowerCased.normalizedOrSame(42);   // 42
 * ```
 */
export function makeUniformity<T>(
  normalize: (a: T) => T,
  canHandle: (b: unknown) => b is T
): Uniformity<T> {
  const plain = makeNormalization(normalize);

  function and(other: Uniformity<T>): Uniformity<T>;
  function and(other: Normalization<T>): Normalization<T>;
  function and(other: Normalization<T>): Normalization<T> {
    if (!isUniformity(other)) return plain.and(other);
    const next = other;
    return makeUniformity(
      (a: T) => next.normalized(normalize(a)),
      (b: unknown): b is T => canHandle(b) && next.normalizedCanHandle(b)
    );
  }

  return {
    normalized: normalize,
    normalizedCanHandle: canHandle,
    normalizedOrSame: (b) => (canHandle(b) ? normalize(b) : b),
    and,
    toEquality: (base = defaultEquality<T>()) => normalizingEquality(normalize, base),
    toHashingEquality: (base = defaultHashingEquality<T>()) =>
      normalizingHashingEquality(normalize, base),
    toOrderingEquality: (base = naturalOrderingEquality<T>()) =>
      normalizingOrderingEquality(normalize, base),
    toEquivalence: () =>
      makeEquivalence((a: T, b: T) => naturalEquals(normalize(a), normalize(b))),
  };
}
