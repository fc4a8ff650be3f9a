/**
 * BoxIndex: hash buckets over entries keyed by an equality policy.
 *
 * Built once while a collection is constructed and read-only afterwards.
 * `add` keeps the first entry for each key.
 */

import type { HashingEquality } from "@equasets/equality";

export class BoxIndex<T, E> {
  private readonly _buckets = new Map<number, E[]>();

  constructor(
    private readonly _equality: HashingEquality<T>,
    private readonly _keyOf: (entry: E) => T
  ) {}

  find(key: T): E | undefined {
    const bucket = this._buckets.get(this._equality.hashCodeFor(key));
    if (!bucket) return undefined;
    for (let i = 0; i < bucket.length; i++) {
      if (this._equality.areEqual(key, this._keyOf(bucket[i]))) return bucket[i];
    }
    return undefined;
  }

  has(key: T): boolean {
    return this.find(key) !== undefined;
  }

  /** Leaves the index unchanged when the key is already present */
  add(entry: E): void {
    const key = this._keyOf(entry);
    const h = this._equality.hashCodeFor(key);
    const bucket = this._buckets.get(h);
    if (!bucket) {
      this._buckets.set(h, [entry]);
      return;
    }
    for (let i = 0; i < bucket.length; i++) {
      if (this._equality.areEqual(key, this._keyOf(bucket[i]))) return;
    }
    bucket.push(entry);
  }
}
