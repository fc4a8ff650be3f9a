/**
 * FastEquaSet: hash-backed EquaSet. Iterates in first-insertion order.
 */

import { BoxIndex } from "./box-index.js";
import type { Collections } from "./collections.js";
import type { EquaBox, PathTag } from "./equa-box.js";
import { EquaSetBase } from "./equa-set.js";
import { FastEquaSetView } from "./views/fast-equa-set-view.js";

export class FastEquaSet<T, K extends PathTag = PathTag> extends EquaSetBase<
  T,
  K,
  FastEquaSet<T, K>
> {
  private readonly _index: BoxIndex<T, EquaBox<T, K>>;
  private readonly _entries: EquaBox<T, K>[] = [];

  /**
   * Prefer the factory companions (`path.EquaSet(...)`, `path.FastEquaSet(...)`).
   * Elements equal under the path's policy to an earlier one are dropped.
   */
  constructor(path: Collections<T, K>, elements: Iterable<T>, stringPrefix = "FastEquaSet") {
    super(path, stringPrefix);
    this._index = new BoxIndex(path.equality, (box: EquaBox<T, K>) => box.value);
    for (const e of elements) {
      if (this._index.has(e)) continue;
      const box = path.box(e);
      this._index.add(box);
      this._entries.push(box);
    }
  }

  protected get boxes(): readonly EquaBox<T, K>[] {
    return this._entries;
  }

  protected rebuild(values: Iterable<T>): FastEquaSet<T, K> {
    return new FastEquaSet(this.path, values, this.stringPrefix);
  }

  contains(elem: T): boolean {
    return this._index.has(elem);
  }

  /**
   * A lazy view over the elements, or over positions `from` (inclusive) to
   * `until` (exclusive); transformations run when the view is traversed.
   */
  view(from = 0, until = this.size): FastEquaSetView<T> {
    return FastEquaSetView.from(this.slice(from, until).values);
  }
}
