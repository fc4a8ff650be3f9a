/**
 * TreeEquaSet: EquaSet backed by a persistent red-black tree ordered by the
 * path's OrderingEquality. Iterates in ascending order.
 */

import createRBTree from "functional-red-black-tree";
import { NoSuchElementError } from "@equasets/core";
import type { OrderingEquality } from "@equasets/equality";
import type { PathTag, SortedEquaBox } from "./equa-box.js";
import { EquaSetBase } from "./equa-set.js";
import type { SortedCollections } from "./sorted-collections.js";
import { TreeEquaSetView } from "./views/tree-equa-set-view.js";

export class TreeEquaSet<T, K extends PathTag = PathTag> extends EquaSetBase<
  T,
  K,
  TreeEquaSet<T, K>
> {
  private readonly _tree: createRBTree.Tree<T, SortedEquaBox<T, K>>;
  private _boxes: readonly SortedEquaBox<T, K>[] | undefined;

  /**
   * Prefer the factory companions (`path.SortedEquaSet(...)`, `path.TreeEquaSet(...)`).
   * Elements that compare equal to an earlier one, or to one already in
   * `base`, are dropped.
   */
  constructor(
    override readonly path: SortedCollections<T, K>,
    elements: Iterable<T>,
    stringPrefix = "TreeEquaSet",
    base?: createRBTree.Tree<T, SortedEquaBox<T, K>>
  ) {
    super(path, stringPrefix);
    let tree =
      base ?? createRBTree<T, SortedEquaBox<T, K>>((a, b) => path.ordering.compare(a, b));
    for (const e of elements) {
      if (tree.get(e) === undefined) tree = tree.insert(e, path.box(e));
    }
    this._tree = tree;
  }

  protected get boxes(): readonly SortedEquaBox<T, K>[] {
    if (this._boxes === undefined) {
      const boxes: SortedEquaBox<T, K>[] = [];
      this._tree.forEach((_key, box) => {
        boxes.push(box);
      });
      this._boxes = boxes;
    }
    return this._boxes;
  }

  protected rebuild(values: Iterable<T>): TreeEquaSet<T, K> {
    return new TreeEquaSet(this.path, values, this.stringPrefix);
  }

  /** Inserts into the persistent tree; elements already present are kept */
  override addAll(elems: Iterable<T>): TreeEquaSet<T, K> {
    this.requireCompatibleElements("addAll", elems);
    return new TreeEquaSet(this.path, elems, this.stringPrefix, this._tree);
  }

  override removeAll(elems: Iterable<T>): TreeEquaSet<T, K> {
    this.requireCompatibleElements("removeAll", elems);
    let tree = this._tree;
    for (const e of elems) tree = tree.remove(e);
    return new TreeEquaSet(this.path, [], this.stringPrefix, tree);
  }

  contains(elem: T): boolean {
    return this._tree.get(elem) !== undefined;
  }

  get ordering(): OrderingEquality<T> {
    return this.path.ordering;
  }

  firstKey(): T {
    if (this.isEmpty()) throw new NoSuchElementError("firstKey of empty set");
    return this.values[0];
  }

  lastKey(): T {
    if (this.isEmpty()) throw new NoSuchElementError("lastKey of empty set");
    return this.values[this.size - 1];
  }

  /** Elements greater than or equal to `from` */
  rangeFrom(from: T): TreeEquaSet<T, K> {
    return this.filter((e) => this.ordering.compare(e, from) >= 0);
  }

  /** Elements strictly less than `until` */
  rangeUntil(until: T): TreeEquaSet<T, K> {
    return this.filter((e) => this.ordering.compare(e, until) < 0);
  }

  range(from: T, until: T): TreeEquaSet<T, K> {
    return this.filter(
      (e) => this.ordering.compare(e, from) >= 0 && this.ordering.compare(e, until) < 0
    );
  }

  view(from = 0, until = this.size): TreeEquaSetView<T> {
    return TreeEquaSetView.from(this.slice(from, until).values);
  }
}

/** The sorted flavour of EquaSet; TreeEquaSet is its only implementation */
export type SortedEquaSet<T, K extends PathTag = PathTag> = TreeEquaSet<T, K>;
