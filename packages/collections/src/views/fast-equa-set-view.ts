/**
 * FastEquaSetView: a lazy view with bag semantics: two views are equal
 * when they produce the same elements the same number of times, in any order.
 */

import { naturalEquals, naturalHash } from "@equasets/equality";
import type { Collections } from "../collections.js";
import type { PathTag } from "../equa-box.js";
import type { FastEquaSet } from "../fast-equa-set.js";
import type { PartialFunction } from "../partial-function.js";
import { EquaSetView } from "./equa-set-view.js";
import {
  collectNode,
  filterNode,
  flatMapNode,
  mapNode,
  run,
  scanLeftNode,
  scanRightNode,
  sourceNode,
  zipAllNode,
  zipNode,
  zipWithIndexNode,
} from "./view-node.js";

export class FastEquaSetView<T> extends EquaSetView<T> {
  readonly stringPrefix = "FastEquaSetView";

  static of<T>(...elements: T[]): FastEquaSetView<T> {
    return new FastEquaSetView(sourceNode(elements));
  }

  static from<T>(elements: Iterable<T>): FastEquaSetView<T> {
    return new FastEquaSetView(sourceNode(elements));
  }

  map<U>(f: (elem: T) => U): FastEquaSetView<U> {
    return new FastEquaSetView(mapNode(this.node, f));
  }

  flatMap<U>(f: (elem: T) => Iterable<U>): FastEquaSetView<U> {
    return new FastEquaSetView(flatMapNode(this.node, f));
  }

  filter(p: (elem: T) => boolean): FastEquaSetView<T> {
    return new FastEquaSetView(filterNode(this.node, p));
  }

  withFilter(p: (elem: T) => boolean): FastEquaSetView<T> {
    return this.filter(p);
  }

  collect<U>(pf: PartialFunction<T, U>): FastEquaSetView<U> {
    return new FastEquaSetView(collectNode(this.node, pf));
  }

  scanLeft<B>(z: B, op: (acc: B, elem: T) => B): FastEquaSetView<B> {
    return new FastEquaSetView(scanLeftNode(this.node, z, op));
  }

  scan(z: T, op: (a: T, b: T) => T): FastEquaSetView<T> {
    return this.scanLeft(z, op);
  }

  scanRight<B>(z: B, op: (elem: T, acc: B) => B): FastEquaSetView<B> {
    return new FastEquaSetView(scanRightNode(this.node, z, op));
  }

  zip<U>(that: Iterable<U>): FastEquaSetView<readonly [T, U]> {
    return new FastEquaSetView(zipNode(this.node, that));
  }

  zipAll<U>(that: Iterable<U>, thisElem: T, thatElem: U): FastEquaSetView<readonly [T, U]> {
    return new FastEquaSetView(zipAllNode(this.node, that, thisElem, thatElem));
  }

  zipWithIndex(): FastEquaSetView<readonly [T, number]> {
    return new FastEquaSetView(zipWithIndexNode(this.node));
  }

  unzip<A, B>(this: FastEquaSetView<readonly [A, B]>): [FastEquaSetView<A>, FastEquaSetView<B>] {
    return [this.map((p) => p[0]), this.map((p) => p[1])];
  }

  unzip3<A, B, C>(
    this: FastEquaSetView<readonly [A, B, C]>
  ): [FastEquaSetView<A>, FastEquaSetView<B>, FastEquaSetView<C>] {
    return [this.map((p) => p[0]), this.map((p) => p[1]), this.map((p) => p[2])];
  }

  force<K extends PathTag>(path: Collections<T, K>): FastEquaSet<T, K> {
    return this.toEquaSet(path);
  }

  toStrict<K extends PathTag>(path: Collections<T, K>): FastEquaSet<T, K> {
    return this.toEquaSet(path);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof FastEquaSetView)) return false;
    const remaining: unknown[] = other.toArray();
    for (const e of run(this.node)) {
      const i = remaining.findIndex((r) => naturalEquals(e, r));
      if (i === -1) return false;
      remaining.splice(i, 1);
    }
    return remaining.length === 0;
  }

  hashCode(): number {
    return this.foldLeft(0, (hash, e) => (hash + naturalHash(e)) | 0);
  }
}
