/**
 * TreeEquaSetView: a lazy view with sequence semantics: equality and
 * hashing follow the order the pipeline produces.
 */

import { hashSequence, naturalEquals, naturalHash } from "@equasets/equality";
import type { PathTag } from "../equa-box.js";
import type { PartialFunction } from "../partial-function.js";
import type { SortedCollections } from "../sorted-collections.js";
import type { TreeEquaSet } from "../tree-equa-set.js";
import { EquaSetView } from "./equa-set-view.js";
import {
  collectNode,
  filterNode,
  flatMapNode,
  mapNode,
  scanLeftNode,
  scanRightNode,
  sourceNode,
  zipAllNode,
  zipNode,
  zipWithIndexNode,
} from "./view-node.js";

export class TreeEquaSetView<T> extends EquaSetView<T> {
  readonly stringPrefix = "TreeEquaSetView";

  static of<T>(...elements: T[]): TreeEquaSetView<T> {
    return new TreeEquaSetView(sourceNode(elements));
  }

  static from<T>(elements: Iterable<T>): TreeEquaSetView<T> {
    return new TreeEquaSetView(sourceNode(elements));
  }

  map<U>(f: (elem: T) => U): TreeEquaSetView<U> {
    return new TreeEquaSetView(mapNode(this.node, f));
  }

  flatMap<U>(f: (elem: T) => Iterable<U>): TreeEquaSetView<U> {
    return new TreeEquaSetView(flatMapNode(this.node, f));
  }

  filter(p: (elem: T) => boolean): TreeEquaSetView<T> {
    return new TreeEquaSetView(filterNode(this.node, p));
  }

  withFilter(p: (elem: T) => boolean): TreeEquaSetView<T> {
    return this.filter(p);
  }

  collect<U>(pf: PartialFunction<T, U>): TreeEquaSetView<U> {
    return new TreeEquaSetView(collectNode(this.node, pf));
  }

  scanLeft<B>(z: B, op: (acc: B, elem: T) => B): TreeEquaSetView<B> {
    return new TreeEquaSetView(scanLeftNode(this.node, z, op));
  }

  scan(z: T, op: (a: T, b: T) => T): TreeEquaSetView<T> {
    return this.scanLeft(z, op);
  }

  scanRight<B>(z: B, op: (elem: T, acc: B) => B): TreeEquaSetView<B> {
    return new TreeEquaSetView(scanRightNode(this.node, z, op));
  }

  zip<U>(that: Iterable<U>): TreeEquaSetView<readonly [T, U]> {
    return new TreeEquaSetView(zipNode(this.node, that));
  }

  zipAll<U>(that: Iterable<U>, thisElem: T, thatElem: U): TreeEquaSetView<readonly [T, U]> {
    return new TreeEquaSetView(zipAllNode(this.node, that, thisElem, thatElem));
  }

  zipWithIndex(): TreeEquaSetView<readonly [T, number]> {
    return new TreeEquaSetView(zipWithIndexNode(this.node));
  }

  unzip<A, B>(this: TreeEquaSetView<readonly [A, B]>): [TreeEquaSetView<A>, TreeEquaSetView<B>] {
    return [this.map((p) => p[0]), this.map((p) => p[1])];
  }

  unzip3<A, B, C>(
    this: TreeEquaSetView<readonly [A, B, C]>
  ): [TreeEquaSetView<A>, TreeEquaSetView<B>, TreeEquaSetView<C>] {
    return [this.map((p) => p[0]), this.map((p) => p[1]), this.map((p) => p[2])];
  }

  /** The produced elements in order, duplicates kept */
  force(): readonly T[] {
    return this.toArray();
  }

  toStrict<K extends PathTag>(path: SortedCollections<T, K>): TreeEquaSet<T, K> {
    return this.toSortedEquaSet(path);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof TreeEquaSetView)) return false;
    const mine = this.toArray();
    const theirs: unknown[] = other.toArray();
    return mine.length === theirs.length && mine.every((e, i) => naturalEquals(e, theirs[i]));
  }

  hashCode(): number {
    return hashSequence(this.toArray().map(naturalHash));
  }
}
