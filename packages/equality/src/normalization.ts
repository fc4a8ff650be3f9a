/**
 * Normalizations: canonicalizing transforms that turn a base equality policy
 * into a coarser one.
 *
 * @example
 * ```typescript
 * const lowerCased = makeNormalization((s: string) => s.toLowerCase());
 * const caseless = lowerCased.toHashingEquality(defaultHashingEquality<string>());
 * caseless.areEqual("Hi", "HI"); // true
 * ```
 */

import {
  makeEquality,
  makeHashingEquality,
  makeOrderingEquality,
  type Equality,
  type HashingEquality,
  type OrderingEquality,
} from "./equality.js";

export interface Normalization<T> {
  /** Should be idempotent: `normalized(normalized(a))` equals `normalized(a)` */
  normalized(a: T): T;
  /** Applies this normalization first, then `other` */
  and(other: Normalization<T>): Normalization<T>;
  toEquality(base: Equality<T>): Equality<T>;
  toHashingEquality(base: HashingEquality<T>): HashingEquality<T>;
  toOrderingEquality(base: OrderingEquality<T>): OrderingEquality<T>;
}

export function normalizingEquality<T>(normalize: (a: T) => T, base: Equality<T>): Equality<T> {
  return makeEquality((a, b) => base.areEqual(normalize(a), normalize(b)));
}

export function normalizingHashingEquality<T>(
  normalize: (a: T) => T,
  base: HashingEquality<T>
): HashingEquality<T> {
  return makeHashingEquality(
    (a, b) => base.areEqual(normalize(a), normalize(b)),
    (a) => base.hashCodeFor(normalize(a))
  );
}

export function normalizingOrderingEquality<T>(
  normalize: (a: T) => T,
  base: OrderingEquality<T>
): OrderingEquality<T> {
  return makeOrderingEquality(
    (a, b) => base.compare(normalize(a), normalize(b)),
    (a) => base.hashCodeFor(normalize(a))
  );
}

export function makeNormalization<T>(normalize: (a: T) => T): Normalization<T> {
  return {
    normalized: normalize,
    and: (other) => makeNormalization((a: T) => other.normalized(normalize(a))),
    toEquality: (base) => normalizingEquality(normalize, base),
    toHashingEquality: (base) => normalizingHashingEquality(normalize, base),
    toOrderingEquality: (base) => normalizingOrderingEquality(normalize, base),
  };
}
