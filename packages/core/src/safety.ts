/**
 * Runtime Safety Primitives
 *
 * - `requireArgument(condition, message)`: argument validation
 * - `invariant(condition, message)`: internal assertion
 * - `unreachable(value)`: exhaustiveness marker for switches
 *
 * @example
 * ```typescript
 * function grouped(size: number) {
 *   requireArgument(size > 0, `size=${size} must be positive`);
 *   ...
 * }
 * ```
 */

import { EquaError, IllegalArgumentError } from "./errors.js";

/**
 * Throws {@link IllegalArgumentError} when `condition` is false.
 */
export function requireArgument(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new IllegalArgumentError(message);
  }
}

/**
 * Runtime invariant check.
 *
 * @throws EquaError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new EquaError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Takes `never` so that adding a case to a
 * union without handling it is a type error.
 */
export function unreachable(value: never): never {
  throw new EquaError(`Unreachable code reached with ${String(value)}`);
}
