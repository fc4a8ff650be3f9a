/**
 * Error Types
 *
 * Every error the equasets packages raise extends {@link EquaError}, so callers
 * can catch the whole family with one `instanceof` check and branch on `code`.
 */

export type EquaErrorCode =
  | "illegal_argument"
  | "incompatible_path"
  | "no_such_element"
  | "unsupported_operation"
  | "invariant";

/**
 * Base class for all equasets errors.
 */
export class EquaError extends Error {
  constructor(
    message: string,
    public readonly code: EquaErrorCode = "invariant"
  ) {
    super(message);
    this.name = "EquaError";
  }
}

/**
 * Thrown when an argument is outside the accepted domain, e.g. a
 * non-positive window size.
 */
export class IllegalArgumentError extends EquaError {
  constructor(message: string) {
    super(message, "illegal_argument");
    this.name = "IllegalArgumentError";
  }
}

/**
 * Thrown when two collections minted by factories with different equality
 * policies are combined.
 */
export class IncompatiblePathError extends EquaError {
  constructor(
    public readonly operation: string,
    message = `${operation}: collections belong to different equality policies`
  ) {
    super(message, "incompatible_path");
    this.name = "IncompatiblePathError";
  }
}

/**
 * Thrown when an element is requested from an empty collection or a key is
 * missing.
 */
export class NoSuchElementError extends EquaError {
  constructor(message: string) {
    super(message, "no_such_element");
    this.name = "NoSuchElementError";
  }
}

/**
 * Thrown for operations that have no result for the given receiver, such as
 * reducing an empty collection.
 */
export class UnsupportedOperationError extends EquaError {
  constructor(message: string) {
    super(message, "unsupported_operation");
    this.name = "UnsupportedOperationError";
  }
}
