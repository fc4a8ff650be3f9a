/**
 * Lazy views over EquaSet elements.
 *
 * Views hold plain values with no equality policy attached, so a transform
 * may produce duplicates. Terminal operations re-run the pipeline from its
 * source; forcing into a factory (`toEquaSet`, `toSortedEquaSet`) is where
 * duplicates collapse under that factory's policy.
 */

import { createLogger } from "@equasets/core";
import type { Collections } from "../collections.js";
import type { PathTag } from "../equa-box.js";
import type { FastEquaSet } from "../fast-equa-set.js";
import { show } from "../show.js";
import type { SortedCollections } from "../sorted-collections.js";
import type { TreeEquaSet } from "../tree-equa-set.js";
import { run, type ViewNode } from "./view-node.js";

const log = createLogger("views");

export abstract class EquaSetView<T> implements Iterable<T> {
  constructor(protected readonly node: ViewNode<T>) {}

  abstract readonly stringPrefix: string;

  abstract equals(other: unknown): boolean;

  abstract hashCode(): number;

  [Symbol.iterator](): Iterator<T> {
    return run(this.node);
  }

  toArray(): T[] {
    return [...run(this.node)];
  }

  toList(): readonly T[] {
    return this.toArray();
  }

  get size(): number {
    let n = 0;
    for (const _ of run(this.node)) n++;
    return n;
  }

  isEmpty(): boolean {
    return run(this.node).next().done === true;
  }

  forEach(f: (elem: T) => void): void {
    for (const e of run(this.node)) f(e);
  }

  foldLeft<B>(z: B, op: (acc: B, elem: T) => B): B {
    let acc = z;
    for (const e of run(this.node)) acc = op(acc, e);
    return acc;
  }

  /** Runs the pipeline and collects the results into a set of `path` */
  toEquaSet<K extends PathTag>(path: Collections<T, K>): FastEquaSet<T, K> {
    log.debug(`forcing ${this.stringPrefix} into ${path.toString()}`);
    return path.EquaSet.from(run(this.node));
  }

  toSortedEquaSet<K extends PathTag>(path: SortedCollections<T, K>): TreeEquaSet<T, K> {
    log.debug(`forcing ${this.stringPrefix} into ${path.toString()}`);
    return path.SortedEquaSet.from(run(this.node));
  }

  toString(): string {
    return `${this.stringPrefix}(${this.toArray().map(show).join(", ")})`;
  }
}
