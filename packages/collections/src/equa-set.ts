/**
 * EquaSet: immutable sets whose membership is decided by an equality policy.
 *
 * `EquaSetBase` implements every operation shared by the hash-backed
 * {@link FastEquaSet} and the tree-backed {@link TreeEquaSet} on top of three
 * primitives: the boxes in iteration order, membership, and `rebuild`, which
 * makes a new set of the same variant from plain values. `Self` is the
 * concrete variant, so `filter` on a TreeEquaSet gives back a TreeEquaSet.
 *
 * Sets are compatible when their factories carry the same policy object.
 * Algebra between incompatible sets throws {@link IncompatiblePathError};
 * `equals` and `canEqual` simply answer false.
 *
 * @example
 * ```typescript
 * const lower = Collections.of(lowerCased.toHashingEquality(), "lower");
 * const s = lower.EquaSet("Hi", "hI", "ho");
 * s.size;              // 2
 * s.toString();        // "EquaSet(Hi, ho)"
 * s.contains("HO");    // true
 * ```
 */

import {
  config,
  createLogger,
  IncompatiblePathError,
  NoSuchElementError,
  requireArgument,
  UnsupportedOperationError,
} from "@equasets/core";
import { naturalCompare, naturalEquals } from "@equasets/equality";
import { BoxIndex } from "./box-index.js";
import type { Collections } from "./collections.js";
import type { EquaBridge } from "./equa-bridge.js";
import type { EquaBox, PathTag } from "./equa-box.js";
import type { FastEquaSet } from "./fast-equa-set.js";
import type { PartialFunction } from "./partial-function.js";
import { show } from "./show.js";
import type { SortedCollections } from "./sorted-collections.js";
import type { TreeEquaSet } from "./tree-equa-set.js";

const log = createLogger("collections");

/** Any set variant minted by a factory tagged `K` */
export type EquaSet<T, K extends PathTag = PathTag> = EquaSetBase<T, K, EquaSet<T, K>>;

export abstract class EquaSetBase<T, K extends PathTag, Self> implements Iterable<T> {
  private _values: readonly T[] | undefined;

  constructor(
    readonly path: Collections<T, K>,
    readonly stringPrefix: string
  ) {}

  // ==========================================================================
  // Primitives
  // ==========================================================================

  /** Boxes in iteration order */
  protected abstract get boxes(): readonly EquaBox<T, K>[];

  /** A set of the same variant, prefix and path holding `values` (first wins) */
  protected abstract rebuild(values: Iterable<T>): Self;

  abstract contains(elem: T): boolean;

  /** Values in iteration order */
  protected get values(): readonly T[] {
    if (this._values === undefined) {
      this._values = this.boxes.map((box) => box.value);
    }
    return this._values;
  }

  protected requireCompatible(
    operation: string,
    that: { readonly path: { readonly equality: object } }
  ): void {
    if (that.path.equality !== this.path.equality) {
      throw new IncompatiblePathError(operation);
    }
  }

  /** Plain iterables are taken as they are; sets must share this set's policy */
  protected requireCompatibleElements(operation: string, elems: Iterable<T>): void {
    if (elems instanceof EquaSetBase) this.requireCompatible(operation, elems);
  }

  // ==========================================================================
  // Size and membership
  // ==========================================================================

  get size(): number {
    return this.boxes.length;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  nonEmpty(): boolean {
    return this.size > 0;
  }

  hasDefiniteSize(): boolean {
    return true;
  }

  apply(elem: T): boolean {
    return this.contains(elem);
  }

  // ==========================================================================
  // Adding and removing
  // ==========================================================================

  add(...elems: T[]): Self {
    return this.addAll(elems);
  }

  remove(...elems: T[]): Self {
    return this.removeAll(elems);
  }

  /** @throws IncompatiblePathError when `elems` is a set of another policy */
  addAll(elems: Iterable<T>): Self {
    this.requireCompatibleElements("addAll", elems);
    return this.rebuild([...this.values, ...elems]);
  }

  /** @throws IncompatiblePathError when `elems` is a set of another policy */
  removeAll(elems: Iterable<T>): Self {
    this.requireCompatibleElements("removeAll", elems);
    const doomed = new BoxIndex<T, T>(this.path.equality, (e) => e);
    for (const e of elems) doomed.add(e);
    return this.filterValues((e) => !doomed.has(e));
  }

  // ==========================================================================
  // Set algebra
  // ==========================================================================

  union(that: EquaSet<T, K>): Self {
    this.requireCompatible("union", that);
    return this.rebuild([...this.values, ...that.values]);
  }

  concat(that: EquaSet<T, K>): Self {
    this.requireCompatible("concat", that);
    return this.rebuild([...this.values, ...that.values]);
  }

  intersect(that: EquaSet<T, K>): Self {
    this.requireCompatible("intersect", that);
    return this.filterValues((e) => that.contains(e));
  }

  diff(that: EquaSet<T, K>): Self {
    this.requireCompatible("diff", that);
    return this.filterValues((e) => !that.contains(e));
  }

  subsetOf(that: EquaSet<T, K>): boolean {
    this.requireCompatible("subsetOf", that);
    return this.values.every((e) => that.contains(e));
  }

  // ==========================================================================
  // Equality and printing
  // ==========================================================================

  /** True for any set variant whose factory carries the same policy object */
  canEqual(other: unknown): boolean {
    return other instanceof EquaSetBase && other.path.equality === this.path.equality;
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof EquaSetBase) || !this.canEqual(other) || !other.canEqual(this)) {
      return false;
    }
    return other.size === this.size && this.values.every((e) => other.contains(e));
  }

  /** Sum of the element hashes, so iteration order does not matter */
  hashCode(): number {
    let hash = 0;
    for (const box of this.boxes) {
      hash = (hash + box.hashCode()) | 0;
    }
    return hash;
  }

  toString(): string {
    return this.mkString(`${this.stringPrefix}(`, ", ", ")");
  }

  mkString(separator?: string): string;
  mkString(start: string, separator: string, end: string): string;
  mkString(startOrSeparator = "", separator?: string, end = ""): string {
    if (separator === undefined) return this.values.map(show).join(startOrSeparator);
    return startOrSeparator + this.values.map(show).join(separator) + end;
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  [Symbol.iterator](): IterableIterator<T> {
    return this.values[Symbol.iterator]();
  }

  iterator(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  forEach(f: (elem: T) => void): void {
    this.values.forEach((e) => f(e));
  }

  private filterValues(p: (elem: T) => boolean): Self {
    return this.rebuild(this.values.filter((e) => p(e)));
  }

  filter(p: (elem: T) => boolean): Self {
    return this.filterValues(p);
  }

  filterNot(p: (elem: T) => boolean): Self {
    return this.filterValues((e) => !p(e));
  }

  /** Results are deduplicated under this set's policy */
  collect(pf: PartialFunction<T, T>): Self {
    const out: T[] = [];
    for (const e of this.values) {
      if (pf.isDefinedAt(e)) out.push(pf.apply(e));
    }
    return this.rebuild(out);
  }

  partition(p: (elem: T) => boolean): [Self, Self] {
    return [this.filter(p), this.filterNot(p)];
  }

  private prefixLength(p: (elem: T) => boolean): number {
    const i = this.values.findIndex((e) => !p(e));
    return i === -1 ? this.size : i;
  }

  span(p: (elem: T) => boolean): [Self, Self] {
    const n = this.prefixLength(p);
    return [this.take(n), this.drop(n)];
  }

  splitAt(n: number): [Self, Self] {
    return [this.take(n), this.drop(n)];
  }

  take(n: number): Self {
    return this.rebuild(this.values.slice(0, Math.max(n, 0)));
  }

  takeRight(n: number): Self {
    return n <= 0 ? this.rebuild([]) : this.rebuild(this.values.slice(Math.max(this.size - n, 0)));
  }

  takeWhile(p: (elem: T) => boolean): Self {
    return this.take(this.prefixLength(p));
  }

  drop(n: number): Self {
    return this.rebuild(this.values.slice(Math.max(n, 0)));
  }

  dropRight(n: number): Self {
    return this.rebuild(this.values.slice(0, Math.max(this.size - Math.max(n, 0), 0)));
  }

  dropWhile(p: (elem: T) => boolean): Self {
    return this.drop(this.prefixLength(p));
  }

  /** Elements at positions `from` (inclusive) to `until` (exclusive) */
  slice(from: number, until: number): Self {
    const start = Math.max(from, 0);
    return this.rebuild(this.values.slice(start, Math.max(until, start)));
  }

  head(): T {
    if (this.isEmpty()) throw new NoSuchElementError("head of empty set");
    return this.values[0];
  }

  headOption(): T | undefined {
    return this.values[0];
  }

  last(): T {
    if (this.isEmpty()) throw new NoSuchElementError("last of empty set");
    return this.values[this.size - 1];
  }

  lastOption(): T | undefined {
    return this.isEmpty() ? undefined : this.values[this.size - 1];
  }

  init(): Self {
    if (this.isEmpty()) throw new NoSuchElementError("init of empty set");
    return this.dropRight(1);
  }

  tail(): Self {
    if (this.isEmpty()) throw new NoSuchElementError("tail of empty set");
    return this.drop(1);
  }

  /** The set, then the set minus its last element, and so on down to empty */
  *inits(): IterableIterator<Self> {
    for (let n = this.size; n >= 0; n--) {
      yield this.take(n);
    }
  }

  /** The set, then the set minus its first element, and so on down to empty */
  *tails(): IterableIterator<Self> {
    for (let n = 0; n <= this.size; n++) {
      yield this.drop(n);
    }
  }

  /**
   * Consecutive chunks of `size` elements; the last may be smaller.
   *
   * @throws IllegalArgumentError when size is not positive (at the call, not on iteration)
   */
  grouped(size: number): IterableIterator<Self> {
    requireArgument(Number.isInteger(size) && size > 0, `size=${size} must be a positive integer`);
    return this.windows(size, size);
  }

  /**
   * Windows of `size` elements starting every `step` positions. Iteration
   * stops after the first window that reaches the last element, which may
   * therefore be shorter than `size`.
   *
   * @example
   * ```typescript
   * EquaSet(1, 2, 3, 4, 5).sliding(2, 3) // {1, 2}, {4, 5}
   * EquaSet(1, 2, 3, 4, 5).sliding(2, 4) // {1, 2}, {5}
   * ```
   */
  sliding(size: number, step = 1): IterableIterator<Self> {
    requireArgument(Number.isInteger(size) && size > 0, `size=${size} must be a positive integer`);
    requireArgument(Number.isInteger(step) && step > 0, `step=${step} must be a positive integer`);
    return this.windows(size, step);
  }

  private *windows(size: number, step: number): IterableIterator<Self> {
    const values = this.values;
    for (let i = 0; i < values.length; i += step) {
      yield this.rebuild(values.slice(i, i + size));
      if (i + size >= values.length) return;
    }
  }

  /**
   * Every subset, or every subset of exactly `size` elements, smallest first.
   * Each call returns a fresh iterator. The full enumeration has 2^n entries.
   */
  subsets(size?: number): IterableIterator<Self> {
    if (size !== undefined) {
      requireArgument(Number.isInteger(size), `size=${size} must be an integer`);
    }
    const threshold = config.get("subsets.threshold");
    if (size === undefined && typeof threshold === "number" && this.size > threshold) {
      log.warn(`enumerating all ${2 ** this.size} subsets of a ${this.size}-element set`);
    }
    return size === undefined ? this.allSubsets() : this.subsetsOfSize(size);
  }

  private *allSubsets(): IterableIterator<Self> {
    for (let n = 0; n <= this.size; n++) {
      yield* this.subsetsOfSize(n);
    }
  }

  private *subsetsOfSize(n: number): IterableIterator<Self> {
    const values = this.values;
    if (n < 0 || n > values.length) return;
    // indices of the current combination, advanced in lexicographic order
    const idx = Array.from({ length: n }, (_, i) => i);
    while (true) {
      yield this.rebuild(idx.map((i) => values[i]));
      let i = n - 1;
      while (i >= 0 && idx[i] === values.length - n + i) i--;
      if (i < 0) return;
      idx[i]++;
      for (let j = i + 1; j < n; j++) idx[j] = idx[j - 1] + 1;
    }
  }

  /** `z`, then each running result of `op`; deduplicated under this set's policy */
  scanLeft(z: T, op: (acc: T, elem: T) => T): Self {
    const out = [z];
    let acc = z;
    for (const e of this.values) {
      acc = op(acc, e);
      out.push(acc);
    }
    return this.rebuild(out);
  }

  scan(z: T, op: (acc: T, elem: T) => T): Self {
    return this.scanLeft(z, op);
  }

  scanRight(z: T, op: (elem: T, acc: T) => T): Self {
    const out = [z];
    let acc = z;
    for (let i = this.size - 1; i >= 0; i--) {
      acc = op(this.values[i], acc);
      out.unshift(acc);
    }
    return this.rebuild(out);
  }

  // ==========================================================================
  // Folds and queries
  // ==========================================================================

  fold(z: T, op: (a: T, b: T) => T): T {
    return this.foldLeft(z, op);
  }

  foldLeft<B>(z: B, op: (acc: B, elem: T) => B): B {
    let acc = z;
    for (const e of this.values) acc = op(acc, e);
    return acc;
  }

  foldRight<B>(z: B, op: (elem: T, acc: B) => B): B {
    let acc = z;
    for (let i = this.size - 1; i >= 0; i--) acc = op(this.values[i], acc);
    return acc;
  }

  reduce(op: (a: T, b: T) => T): T {
    return this.reduceLeft(op);
  }

  reduceLeft(op: (acc: T, elem: T) => T): T {
    if (this.isEmpty()) throw new UnsupportedOperationError("reduceLeft of empty set");
    return this.values.slice(1).reduce((acc, e) => op(acc, e), this.values[0]);
  }

  reduceRight(op: (elem: T, acc: T) => T): T {
    if (this.isEmpty()) throw new UnsupportedOperationError("reduceRight of empty set");
    let acc = this.values[this.size - 1];
    for (let i = this.size - 2; i >= 0; i--) acc = op(this.values[i], acc);
    return acc;
  }

  reduceOption(op: (a: T, b: T) => T): T | undefined {
    return this.isEmpty() ? undefined : this.reduceLeft(op);
  }

  reduceLeftOption(op: (acc: T, elem: T) => T): T | undefined {
    return this.isEmpty() ? undefined : this.reduceLeft(op);
  }

  reduceRightOption(op: (elem: T, acc: T) => T): T | undefined {
    return this.isEmpty() ? undefined : this.reduceRight(op);
  }

  count(p: (elem: T) => boolean): number {
    return this.values.filter((e) => p(e)).length;
  }

  exists(p: (elem: T) => boolean): boolean {
    return this.values.some((e) => p(e));
  }

  forall(p: (elem: T) => boolean): boolean {
    return this.values.every((e) => p(e));
  }

  find(p: (elem: T) => boolean): T | undefined {
    return this.values.find((e) => p(e));
  }

  /** Group keys are compared with SameValueZero, as in a native Map */
  groupBy<G>(f: (elem: T) => G): Map<G, Self> {
    const groups = new Map<G, T[]>();
    for (const e of this.values) {
      const key = f(e);
      const group = groups.get(key);
      if (group) group.push(e);
      else groups.set(key, [e]);
    }
    const result = new Map<G, Self>();
    for (const [key, group] of groups) result.set(key, this.rebuild(group));
    return result;
  }

  min(compare: (a: T, b: T) => number = naturalCompare): T {
    return this.minBy((e) => e, compare);
  }

  max(compare: (a: T, b: T) => number = naturalCompare): T {
    return this.maxBy((e) => e, compare);
  }

  minBy<B>(f: (elem: T) => B, compare: (a: B, b: B) => number = naturalCompare): T {
    if (this.isEmpty()) throw new NoSuchElementError("minBy of empty set");
    return this.values.reduce((best, e) => (compare(f(e), f(best)) < 0 ? e : best));
  }

  maxBy<B>(f: (elem: T) => B, compare: (a: B, b: B) => number = naturalCompare): T {
    if (this.isEmpty()) throw new NoSuchElementError("maxBy of empty set");
    return this.values.reduce((best, e) => (compare(f(e), f(best)) > 0 ? e : best));
  }

  sum(this: EquaSetBase<number, K, Self>): number {
    return this.foldLeft(0, (acc, e) => acc + e);
  }

  product(this: EquaSetBase<number, K, Self>): number {
    return this.foldLeft(1, (acc, e) => acc * e);
  }

  /** Same elements in the same iteration order, under natural equality */
  sameElements(that: Iterable<unknown>): boolean {
    const other = [...that];
    return (
      other.length === this.size && this.values.every((e, i) => naturalEquals(e, other[i]))
    );
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  toArray(): T[] {
    return [...this.values];
  }

  toBuffer(): T[] {
    return [...this.values];
  }

  toList(): readonly T[] {
    return this.values;
  }

  toSeq(): readonly T[] {
    return this.values;
  }

  toVector(): readonly T[] {
    return this.values;
  }

  toIndexedSeq(): readonly T[] {
    return this.values;
  }

  toIterable(): Iterable<T> {
    return this.values;
  }

  toIterator(): IterableIterator<T> {
    return this.iterator();
  }

  /** A native Set; distinct policy-equal elements stay distinct only if `===` differs */
  toSet(): Set<T> {
    return new Set(this.values);
  }

  toMap<A, B>(this: EquaSetBase<readonly [A, B], K, Self>): Map<A, B> {
    return new Map(this.values);
  }

  toEquaBoxArray(): EquaBox<T, K>[] {
    return [...this.boxes];
  }

  toEquaBoxBuffer(): EquaBox<T, K>[] {
    return [...this.boxes];
  }

  toEquaBoxList(): readonly EquaBox<T, K>[] {
    return this.boxes;
  }

  toEquaBoxSeq(): readonly EquaBox<T, K>[] {
    return this.boxes;
  }

  toEquaBoxVector(): readonly EquaBox<T, K>[] {
    return this.boxes;
  }

  toEquaBoxIndexedSeq(): readonly EquaBox<T, K>[] {
    return this.boxes;
  }

  toEquaBoxIterable(): Iterable<EquaBox<T, K>> {
    return this.boxes;
  }

  toEquaBoxIterator(): IterableIterator<EquaBox<T, K>> {
    return this.boxes[Symbol.iterator]();
  }

  toEquaBoxSet(): Set<EquaBox<T, K>> {
    return new Set(this.boxes);
  }

  /**
   * Copies boxes into `target` from index `start`, at most `len` of them and
   * never past the end of `target`. Returns the number copied.
   */
  copyToArray(target: EquaBox<T, K>[], start = 0, len = this.size): number {
    requireArgument(
      Number.isInteger(start) && start >= 0,
      `start=${start} must be a non-negative integer`
    );
    const n = Math.max(Math.min(len, this.size, target.length - start), 0);
    for (let i = 0; i < n; i++) target[start + i] = this.boxes[i];
    return n;
  }

  /** Appends every box to `dest` */
  copyToBuffer(dest: EquaBox<T, K>[]): void {
    for (const box of this.boxes) dest.push(box);
  }

  // ==========================================================================
  // Pairing and reshaping
  // ==========================================================================

  /** Pairs elements with `that` in iteration order, stopping at the shorter side */
  zip<U>(that: Iterable<U>): Array<[T, U]> {
    const out: Array<[T, U]> = [];
    const other = that[Symbol.iterator]();
    for (const e of this.values) {
      const next = other.next();
      if (next.done) break;
      out.push([e, next.value]);
    }
    return out;
  }

  /** Like `zip`, padding the shorter side with `thisElem` or `thatElem` */
  zipAll<U>(that: Iterable<U>, thisElem: T, thatElem: U): Array<[T, U]> {
    const out: Array<[T, U]> = [];
    const other = that[Symbol.iterator]();
    let next = other.next();
    for (const e of this.values) {
      out.push([e, next.done ? thatElem : next.value]);
      if (!next.done) next = other.next();
    }
    while (!next.done) {
      out.push([thisElem, next.value]);
      next = other.next();
    }
    return out;
  }

  zipWithIndex(): Array<[T, number]> {
    return this.values.map((e, i): [T, number] => [e, i]);
  }

  /** Splits pairs into sets of two factories, each deduplicated under its own policy */
  unzip<A, B, KA extends PathTag, KB extends PathTag>(
    this: EquaSetBase<readonly [A, B], K, Self>,
    pathA: Collections<A, KA>,
    pathB: Collections<B, KB>
  ): [FastEquaSet<A, KA>, FastEquaSet<B, KB>] {
    const pairs = this.toArray();
    return [pathA.EquaSet.from(pairs.map((p) => p[0])), pathB.EquaSet.from(pairs.map((p) => p[1]))];
  }

  unzip3<A, B, C, KA extends PathTag, KB extends PathTag, KC extends PathTag>(
    this: EquaSetBase<readonly [A, B, C], K, Self>,
    pathA: Collections<A, KA>,
    pathB: Collections<B, KB>,
    pathC: Collections<C, KC>
  ): [FastEquaSet<A, KA>, FastEquaSet<B, KB>, FastEquaSet<C, KC>] {
    const triples = this.toArray();
    return [
      pathA.EquaSet.from(triples.map((t) => t[0])),
      pathB.EquaSet.from(triples.map((t) => t[1])),
      pathC.EquaSet.from(triples.map((t) => t[2])),
    ];
  }

  /**
   * Rows become columns: the i-th element of the result holds the i-th entry
   * of every row, in iteration order. The columns are deduplicated under
   * this set's policy.
   *
   * @throws IllegalArgumentError when the rows differ in length
   */
  transpose<E>(this: EquaSetBase<readonly E[], K, Self>): Self {
    const rows = this.toArray();
    const width = rows.length === 0 ? 0 : rows[0].length;
    requireArgument(
      rows.every((row) => row.length === width),
      "transpose requires rows of equal length"
    );
    const columns: E[][] = [];
    for (let i = 0; i < width; i++) columns.push(rows.map((row) => row[i]));
    return this.rebuild(columns);
  }

  /** The elements of every element, in iteration order, duplicates kept */
  flatten<E>(this: Iterable<Iterable<E>>): E[] {
    const out: E[] = [];
    for (const inner of this) {
      for (const e of inner) out.push(e);
    }
    return out;
  }

  // ==========================================================================
  // Bridges
  // ==========================================================================

  /**
   * Transform the elements into a set of another factory.
   *
   * @example
   * ```typescript
   * trimmed.EquaSet("1", "01", "2").into(number).map((s) => parseInt(s, 10)) // EquaSet(1, 2)
   * ```
   */
  into<S, K2 extends PathTag>(target: SortedCollections<S, K2>): EquaBridge<T, S, TreeEquaSet<S, K2>>;
  into<S, K2 extends PathTag>(target: Collections<S, K2>): EquaBridge<T, S, FastEquaSet<S, K2>>;
  into<S, K2 extends PathTag>(target: Collections<S, K2>): EquaBridge<T, S, EquaSet<S, K2>> {
    return target.bridge(this.values);
  }
}
