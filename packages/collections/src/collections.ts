/**
 * Collections: a factory ("path") binding an equality policy to the sets,
 * maps and boxes it mints.
 *
 * The tag `K` is a phantom type: sets from `Collections<string, "lower">`
 * and `Collections<string, "trimmed">` do not type-check against each
 * other. At runtime two factories are compatible exactly when they carry the
 * same policy object.
 *
 * @example
 * ```typescript
 * const lower = Collections.of(lowerCased.toHashingEquality(), "lower");
 * lower.EquaSet("one", "One", "two").size;  // 2
 * lower.EquaSet.empty.isEmpty();            // true
 * lower.box("HI").equals(lower.box("hi"));  // true
 * ```
 */

import { createLogger } from "@equasets/core";
import { defaultHashingEquality, type HashingEquality } from "@equasets/equality";
import { EquaBox, type PathTag } from "./equa-box.js";
import { EquaBridge } from "./equa-bridge.js";
import { EquaMap } from "./equa-map.js";
import type { EquaSet } from "./equa-set.js";
import { FastEquaSet } from "./fast-equa-set.js";

const log = createLogger("collections");

/** Callable with elements, plus `empty` and `from(iterable)` */
export interface SetCompanion<T, S> {
  (...elements: T[]): S;
  readonly empty: S;
  from(elements: Iterable<T>): S;
}

export interface MapCompanion<T, K extends PathTag> {
  <V>(...entries: Array<readonly [T, V]>): EquaMap<T, V, K>;
  empty<V>(): EquaMap<T, V, K>;
  from<V>(entries: Iterable<readonly [T, V]>): EquaMap<T, V, K>;
}

export function setCompanion<T, S>(build: (elements: Iterable<T>) => S): SetCompanion<T, S> {
  return Object.assign((...elements: T[]) => build(elements), {
    empty: build([]),
    from: build,
  });
}

export class Collections<T, K extends PathTag = symbol> {
  readonly EquaSet: SetCompanion<T, FastEquaSet<T, K>>;
  readonly FastEquaSet: SetCompanion<T, FastEquaSet<T, K>>;
  readonly EquaMap: MapCompanion<T, K>;

  constructor(
    readonly equality: HashingEquality<T>,
    readonly tag: K
  ) {
    this.EquaSet = setCompanion((elements) => new FastEquaSet(this, elements, "EquaSet"));
    this.FastEquaSet = setCompanion((elements) => new FastEquaSet(this, elements, "FastEquaSet"));
    this.EquaMap = Object.assign(
      <V>(...entries: Array<readonly [T, V]>) => new EquaMap<T, V, K>(this, entries),
      {
        empty: <V>() => new EquaMap<T, V, K>(this, []),
        from: <V>(entries: Iterable<readonly [T, V]>) => new EquaMap<T, V, K>(this, entries),
      }
    );
    log.debug(`created ${this.constructor.name} ${String(tag)}`);
  }

  /**
   * A factory over `equality`. Without a tag a fresh symbol is used, so the
   * factory's sets only type-check against sets of factories sharing it.
   */
  static of<T>(equality: HashingEquality<T>): Collections<T, symbol>;
  static of<T, K extends PathTag>(equality: HashingEquality<T>, tag: K): Collections<T, K>;
  static of<T>(equality: HashingEquality<T>, tag: PathTag = Symbol("collections")): Collections<T, PathTag> {
    return new Collections(equality, tag);
  }

  /**
   * A factory over the shared natural policy. Every call returns a factory
   * compatible with every other.
   */
  static native<T>(): Collections<T, "native"> {
    return new Collections(defaultHashingEquality<T>(), "native");
  }

  box(value: T): EquaBox<T, K> {
    return new EquaBox(this, value);
  }

  /** Same policy object as `other` */
  isCompatibleWith(other: { readonly equality: object }): boolean {
    return other.equality === this.equality;
  }

  /** Backs `set.into(this)`; sorted factories build sorted sets */
  bridge<A>(source: Iterable<A>): EquaBridge<A, T, EquaSet<T, K>> {
    return new EquaBridge(source, (values: Iterable<T>) => this.EquaSet.from(values));
  }

  toString(): string {
    return `Collections(${String(this.tag)})`;
  }
}
