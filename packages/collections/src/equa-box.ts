/**
 * EquaBox: a value paired with the factory ("path") that minted it.
 *
 * Boxes compare and hash through the path's policy, so two boxes holding
 * "Hi" and "hi" are equal under a case-insensitive path and distinct under
 * the natural one. Boxes from paths with different policy objects are never
 * equal.
 */

import type { Collections } from "./collections.js";
import type { SortedCollections } from "./sorted-collections.js";
import { show } from "./show.js";

/** Phantom tag distinguishing factories at the type level */
export type PathTag = string | symbol;

export class EquaBox<T, K extends PathTag = PathTag> {
  constructor(
    readonly path: Collections<T, K>,
    readonly value: T
  ) {}

  equals(other: unknown): boolean {
    return (
      other instanceof EquaBox &&
      other.path.equality === this.path.equality &&
      this.path.equality.areEqual(this.value, other.value)
    );
  }

  hashCode(): number {
    return this.path.equality.hashCodeFor(this.value);
  }

  toString(): string {
    return `EquaBox(${show(this.value)})`;
  }
}

export class SortedEquaBox<T, K extends PathTag = PathTag> extends EquaBox<T, K> {
  constructor(
    override readonly path: SortedCollections<T, K>,
    value: T
  ) {
    super(path, value);
  }

  compare(other: SortedEquaBox<T, K>): number {
    return this.path.ordering.compare(this.value, other.value);
  }
}
