import { describe, expect, it } from "vitest";
import {
  EquaError,
  IllegalArgumentError,
  IncompatiblePathError,
  NoSuchElementError,
  UnsupportedOperationError,
} from "../src/errors.js";
import { invariant, requireArgument } from "../src/safety.js";

describe("error types", () => {
  it("carry names and codes", () => {
    const cases: Array<[EquaError, string, string]> = [
      [new IllegalArgumentError("bad"), "IllegalArgumentError", "illegal_argument"],
      [new IncompatiblePathError("union"), "IncompatiblePathError", "incompatible_path"],
      [new NoSuchElementError("empty"), "NoSuchElementError", "no_such_element"],
      [new UnsupportedOperationError("empty"), "UnsupportedOperationError", "unsupported_operation"],
    ];
    for (const [error, name, code] of cases) {
      expect(error).toBeInstanceOf(EquaError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    }
  });

  it("IncompatiblePathError names the operation", () => {
    const error = new IncompatiblePathError("intersect");
    expect(error.operation).toBe("intersect");
    expect(error.message).toBe("intersect: collections belong to different equality policies");
  });
});

describe("safety helpers", () => {
  it("requireArgument throws IllegalArgumentError", () => {
    expect(() => requireArgument(false, "size must be positive")).toThrow(IllegalArgumentError);
    expect(() => requireArgument(true, "unused")).not.toThrow();
  });

  it("invariant throws EquaError with a default message", () => {
    expect(() => invariant(false)).toThrow("Invariant violation");
  });
});
