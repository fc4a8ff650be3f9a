/**
 * EquaMap: an immutable map whose keys are compared by the path's policy.
 *
 * Iterates in first-insertion order of keys. Setting a key that is already
 * present (under the policy) replaces the value but keeps the original key
 * and its position.
 *
 * @example
 * ```typescript
 * const m = lower.EquaMap(["Hi", 1], ["HI", 2]);
 * m.toString();  // "EquaMap(Hi -> 2)"
 * m.get("hi");   // 2
 * ```
 */

import { IncompatiblePathError, NoSuchElementError } from "@equasets/core";
import { naturalEquals, naturalHash } from "@equasets/equality";
import { BoxIndex } from "./box-index.js";
import type { Collections } from "./collections.js";
import type { EquaBox, PathTag } from "./equa-box.js";
import { EquaSetBase, type EquaSet } from "./equa-set.js";
import type { FastEquaSet } from "./fast-equa-set.js";
import { show } from "./show.js";

interface MapEntry<T, V, K extends PathTag> {
  readonly box: EquaBox<T, K>;
  value: V;
}

export class EquaMap<T, V, K extends PathTag = PathTag> implements Iterable<[T, V]> {
  private readonly _index: BoxIndex<T, MapEntry<T, V, K>>;
  private readonly _entries: MapEntry<T, V, K>[] = [];

  /** Prefer `path.EquaMap(...)`. Later entries overwrite earlier values for equal keys. */
  constructor(
    readonly path: Collections<T, K>,
    entries: Iterable<readonly [T, V]>
  ) {
    this._index = new BoxIndex(path.equality, (entry: MapEntry<T, V, K>) => entry.box.value);
    for (const [key, value] of entries) {
      const existing = this._index.find(key);
      if (existing) {
        existing.value = value;
      } else {
        const entry = { box: path.box(key), value };
        this._index.add(entry);
        this._entries.push(entry);
      }
    }
  }

  get size(): number {
    return this._entries.length;
  }

  isEmpty(): boolean {
    return this._entries.length === 0;
  }

  get(key: T): V | undefined {
    return this._index.find(key)?.value;
  }

  getOrElse(key: T, fallback: V): V {
    const entry = this._index.find(key);
    return entry ? entry.value : fallback;
  }

  /** @throws NoSuchElementError when the key is absent */
  apply(key: T): V {
    const entry = this._index.find(key);
    if (!entry) throw new NoSuchElementError(`key not found: ${show(key)}`);
    return entry.value;
  }

  contains(key: T): boolean {
    return this._index.has(key);
  }

  set(key: T, value: V): EquaMap<T, V, K> {
    return this.addAll([[key, value]]);
  }

  add(...entries: Array<readonly [T, V]>): EquaMap<T, V, K> {
    return this.addAll(entries);
  }

  addAll(entries: Iterable<readonly [T, V]>): EquaMap<T, V, K> {
    return new EquaMap(this.path, [...this.entries(), ...entries]);
  }

  remove(...keys: T[]): EquaMap<T, V, K> {
    return this.removeAll(keys);
  }

  /**
   * @throws IncompatiblePathError when `keys` is an EquaSet of a factory with
   * a different policy
   */
  removeAll(keys: Iterable<T> | EquaSet<T, K>): EquaMap<T, V, K> {
    if (keys instanceof EquaSetBase && keys.path.equality !== this.path.equality) {
      throw new IncompatiblePathError("removeAll");
    }
    const doomed = new BoxIndex<T, T>(this.path.equality, (k) => k);
    for (const k of keys) doomed.add(k);
    return new EquaMap(this.path, this.entries().filter(([k]) => !doomed.has(k)));
  }

  keys(): T[] {
    return this._entries.map((e) => e.box.value);
  }

  values(): V[] {
    return this._entries.map((e) => e.value);
  }

  entries(): Array<[T, V]> {
    return this._entries.map((e): [T, V] => [e.box.value, e.value]);
  }

  [Symbol.iterator](): IterableIterator<[T, V]> {
    return this.entries()[Symbol.iterator]();
  }

  keySet(): FastEquaSet<T, K> {
    return this.path.EquaSet.from(this.keys());
  }

  foldLeft<B>(z: B, op: (acc: B, entry: [T, V]) => B): B {
    return this.entries().reduce(op, z);
  }

  toMap(): Map<T, V> {
    return new Map(this.entries());
  }

  toEquaBoxMap(): Map<EquaBox<T, K>, V> {
    return new Map(this._entries.map((e): [EquaBox<T, K>, V] => [e.box, e.value]));
  }

  canEqual(other: unknown): boolean {
    return other instanceof EquaMap && other.path.equality === this.path.equality;
  }

  /** Same policy, same keys under it, naturally equal values */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof EquaMap) || !this.canEqual(other) || other.size !== this.size) {
      return false;
    }
    return this._entries.every(
      (e) => other.contains(e.box.value) && naturalEquals(other.get(e.box.value), e.value)
    );
  }

  hashCode(): number {
    let hash = 0;
    for (const e of this._entries) {
      hash = (hash + (e.box.hashCode() ^ naturalHash(e.value))) | 0;
    }
    return hash;
  }

  toString(): string {
    const body = this._entries.map((e) => `${show(e.box.value)} -> ${show(e.value)}`);
    return `EquaMap(${body.join(", ")})`;
  }
}
