/**
 * SortedCollections: a Collections factory whose policy is also an
 * ordering. Adds the tree-backed sorted set companions.
 */

import { naturalOrderingEquality, type OrderingEquality } from "@equasets/equality";
import { Collections, setCompanion, type SetCompanion } from "./collections.js";
import { SortedEquaBox, type PathTag } from "./equa-box.js";
import { EquaBridge } from "./equa-bridge.js";
import { TreeEquaSet } from "./tree-equa-set.js";

export class SortedCollections<T, K extends PathTag = symbol> extends Collections<T, K> {
  readonly SortedEquaSet: SetCompanion<T, TreeEquaSet<T, K>>;
  readonly TreeEquaSet: SetCompanion<T, TreeEquaSet<T, K>>;

  constructor(
    readonly ordering: OrderingEquality<T>,
    tag: K
  ) {
    super(ordering, tag);
    this.SortedEquaSet = setCompanion(
      (elements) => new TreeEquaSet(this, elements, "SortedEquaSet")
    );
    this.TreeEquaSet = setCompanion((elements) => new TreeEquaSet(this, elements, "TreeEquaSet"));
  }

  static of<T>(ordering: OrderingEquality<T>): SortedCollections<T, symbol>;
  static of<T, K extends PathTag>(ordering: OrderingEquality<T>, tag: K): SortedCollections<T, K>;
  static of<T>(
    ordering: OrderingEquality<T>,
    tag: PathTag = Symbol("sorted-collections")
  ): SortedCollections<T, PathTag> {
    return new SortedCollections(ordering, tag);
  }

  /**
   * A factory over the shared natural ordering. Comparing values that have
   * no natural order throws IllegalArgumentError.
   */
  static native<T>(): SortedCollections<T, "native"> {
    return new SortedCollections(naturalOrderingEquality<T>(), "native");
  }

  override box(value: T): SortedEquaBox<T, K> {
    return new SortedEquaBox(this, value);
  }

  override bridge<A>(source: Iterable<A>): EquaBridge<A, T, TreeEquaSet<T, K>> {
    return new EquaBridge(source, (values: Iterable<T>) => this.SortedEquaSet.from(values));
  }
}
