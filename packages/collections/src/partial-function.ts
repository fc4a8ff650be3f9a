/**
 * A function defined on part of its input type. `apply` is only called on
 * values for which `isDefinedAt` returned true.
 */
export interface PartialFunction<A, B> {
  isDefinedAt(a: A): boolean;
  apply(a: A): B;
}

export function partialFunction<A, B>(
  isDefinedAt: (a: A) => boolean,
  apply: (a: A) => B
): PartialFunction<A, B> {
  return { isDefinedAt, apply };
}
