/**
 * Equality policies.
 *
 * A policy is a plain object implementing one of the interfaces below. The
 * family forms a chain: every `OrderingEquality` is a `HashingEquality`, every
 * `HashingEquality` an `Equality`, every `Equality` an `Equivalence`.
 *
 * The contracts tying the operations together (equal values hash alike,
 * `compare` returns 0 exactly for equal values) are the policy author's
 * responsibility. Collections built on a policy that breaks them behave
 * unpredictably; nothing checks them at runtime.
 */

/**
 * A two-argument relation that is reflexive, symmetric and transitive.
 */
export interface Equivalence<T> {
  areEquivalent(a: T, b: T): boolean;
}

export interface Equality<T> extends Equivalence<T> {
  areEqual(a: T, b: T): boolean;
}

/**
 * An Equality with a hash consistent with it:
 * `areEqual(a, b)` implies `hashCodeFor(a) === hashCodeFor(b)`.
 */
export interface HashingEquality<T> extends Equality<T> {
  /** A 32-bit integer */
  hashCodeFor(a: T): number;
}

/**
 * A HashingEquality with a total order where `compare(a, b) === 0`
 * exactly when `areEqual(a, b)`.
 */
export interface OrderingEquality<T> extends HashingEquality<T> {
  /** Negative, zero or positive as `a` sorts before, with or after `b` */
  compare(a: T, b: T): number;
}

// ============================================================================
// Constructors
// ============================================================================

export function makeEquivalence<T>(areEquivalent: (a: T, b: T) => boolean): Equivalence<T> {
  return { areEquivalent };
}

export function makeEquality<T>(areEqual: (a: T, b: T) => boolean): Equality<T> {
  return { areEqual, areEquivalent: areEqual };
}

export function makeHashingEquality<T>(
  areEqual: (a: T, b: T) => boolean,
  hashCodeFor: (a: T) => number
): HashingEquality<T> {
  return { areEqual, areEquivalent: areEqual, hashCodeFor };
}

/**
 * Build an OrderingEquality whose equality is derived from `compare`.
 */
export function makeOrderingEquality<T>(
  compare: (a: T, b: T) => number,
  hashCodeFor: (a: T) => number
): OrderingEquality<T> {
  const areEqual = (a: T, b: T): boolean => compare(a, b) === 0;
  return { areEqual, areEquivalent: areEqual, hashCodeFor, compare };
}

/**
 * Compare values of `A` by projecting them to `B` and applying `base`.
 *
 * @example
 * ```typescript
 * const byId = hashingEqualityBy((u: User) => u.id, defaultHashingEquality<number>());
 * ```
 */
export function hashingEqualityBy<A, B>(
  f: (a: A) => B,
  base: HashingEquality<B>
): HashingEquality<A> {
  return makeHashingEquality(
    (a, b) => base.areEqual(f(a), f(b)),
    (a) => base.hashCodeFor(f(a))
  );
}

export function orderingEqualityBy<A, B>(
  f: (a: A) => B,
  base: OrderingEquality<B>
): OrderingEquality<A> {
  return makeOrderingEquality(
    (a, b) => base.compare(f(a), f(b)),
    (a) => base.hashCodeFor(f(a))
  );
}

// ============================================================================
// Guards
// ============================================================================

export function isHashingEquality<T>(eq: Equality<T>): eq is HashingEquality<T> {
  return "hashCodeFor" in eq && typeof eq.hashCodeFor === "function";
}

export function isOrderingEquality<T>(eq: Equality<T>): eq is OrderingEquality<T> {
  return isHashingEquality(eq) && "compare" in eq && typeof eq.compare === "function";
}
