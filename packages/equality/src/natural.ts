/**
 * Natural equality, hashing and ordering.
 *
 * These are the policies used when a caller asks for the "default" one. They
 * are shared singletons: `defaultHashingEquality<string>()` and
 * `defaultHashingEquality<number>()` return the same object, so collections
 * built on either are compatible with each other.
 */

import { IllegalArgumentError } from "@equasets/core";
import {
  makeHashingEquality,
  makeOrderingEquality,
  type Equality,
  type HashingEquality,
  type OrderingEquality,
} from "./equality.js";

/**
 * Values that define their own equality. `hashCode` must agree with `equals`.
 */
export interface Equals {
  equals(other: unknown): boolean;
  hashCode(): number;
}

export type Comparable = number | string | bigint | boolean | Date | readonly Comparable[];

export function isEquals(value: unknown): value is Equals {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function" &&
    "hashCode" in value &&
    typeof value.hashCode === "function"
  );
}

// ============================================================================
// Hashing
// ============================================================================

/** djb2, folded to a signed 32-bit integer */
export function hashString(s: string): number {
  let hash = 5381;
  for (let i = 0; i < s.length; i++) {
    hash = ((hash << 5) + hash) ^ s.charCodeAt(i);
  }
  return hash | 0;
}

export function hashNumber(n: number): number {
  if (Number.isNaN(n)) return 0x7fc00000;
  if (!Number.isFinite(n)) return n > 0 ? 0x7f800000 : 0xff800000 | 0;
  if (Number.isInteger(n) && Math.abs(n) < 2 ** 31) return n | 0;
  return hashString(String(n));
}

/**
 * Order-sensitive combination of element hashes.
 */
export function hashSequence(hashes: Iterable<number>): number {
  let hash = 17;
  for (const h of hashes) {
    hash = (Math.imul(hash, 31) + h) | 0;
  }
  return hash;
}

const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

function identityHash(value: object): number {
  let hash = identityHashes.get(value);
  if (hash === undefined) {
    hash = hashNumber(nextIdentityHash++);
    identityHashes.set(value, hash);
  }
  return hash;
}

export function naturalHash(value: unknown): number {
  switch (typeof value) {
    case "string":
      return hashString(value);
    case "number":
      return hashNumber(value);
    case "boolean":
      return value ? 1 : 0;
    case "bigint":
      return hashString(value.toString());
    case "undefined":
      return 1;
    case "symbol":
      return hashString(value.description ?? "");
    case "function":
      return identityHash(value);
    default:
      if (value === null) return 0;
      if (isEquals(value)) return value.hashCode() | 0;
      if (Array.isArray(value)) return hashSequence(value.map(naturalHash));
      if (value instanceof Date) return hashNumber(value.getTime());
      return identityHash(value);
  }
}

// ============================================================================
// Equality
// ============================================================================

/**
 * SameValueZero for primitives, `equals()` for values implementing
 * {@link Equals}, element-wise for arrays, by time for dates, otherwise
 * reference identity.
 */
export function naturalEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false;
  }
  if (isEquals(a)) return a.equals(b);
  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((x: unknown, i: number) => naturalEquals(x, b[i]))
    );
  }
  if (a instanceof Date) return b instanceof Date && a.getTime() === b.getTime();
  return false;
}

// ============================================================================
// Ordering
// ============================================================================

function compareNumbers(a: number, b: number): number {
  // NaN sorts after everything and equals itself
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
  if (Number.isNaN(b)) return -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function describeKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  return typeof value;
}

/**
 * Numeric, code-unit string, `false < true`, chronological, and
 * lexicographic order for arrays.
 *
 * @throws IllegalArgumentError for values of different or unordered kinds
 */
export function naturalCompare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return compareNumbers(a, b);
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return compareNumbers(a.getTime(), b.getTime());
  if (Array.isArray(a) && Array.isArray(b)) {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const c = naturalCompare(a[i], b[i]);
      if (c !== 0) return c;
    }
    return a.length - b.length;
  }
  throw new IllegalArgumentError(
    `values of kind ${describeKind(a)} and ${describeKind(b)} have no natural order`
  );
}

// ============================================================================
// Default policies
// ============================================================================

const naturalHashingEquality: HashingEquality<unknown> = makeHashingEquality(
  naturalEquals,
  naturalHash
);

const naturalOrdering: OrderingEquality<unknown> = makeOrderingEquality(
  naturalCompare,
  naturalHash
);

export function defaultEquality<T>(): Equality<T> {
  return naturalHashingEquality;
}

export function defaultHashingEquality<T>(): HashingEquality<T> {
  return naturalHashingEquality;
}

export function defaultOrderingEquality<T extends Comparable>(): OrderingEquality<T> {
  return naturalOrdering;
}

/**
 * The natural ordering for any `T`. Same object as
 * {@link defaultOrderingEquality}; comparing values with no natural order
 * throws IllegalArgumentError.
 */
export function naturalOrderingEquality<T>(): OrderingEquality<T> {
  return naturalOrdering;
}
