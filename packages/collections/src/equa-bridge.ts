/**
 * EquaBridge: transformations from one set's elements into a set of
 * another factory. Obtained from `set.into(targetPath)`; results are
 * deduplicated under the target's policy.
 */

import type { PartialFunction } from "./partial-function.js";

export class EquaBridge<A, S, R> {
  constructor(
    private readonly _source: Iterable<A>,
    private readonly _build: (values: Iterable<S>) => R
  ) {}

  map(f: (a: A) => S): R {
    const out: S[] = [];
    for (const a of this._source) out.push(f(a));
    return this._build(out);
  }

  flatMap(f: (a: A) => Iterable<S>): R {
    const out: S[] = [];
    for (const a of this._source) {
      for (const s of f(a)) out.push(s);
    }
    return this._build(out);
  }

  collect(pf: PartialFunction<A, S>): R {
    const out: S[] = [];
    for (const a of this._source) {
      if (pf.isDefinedAt(a)) out.push(pf.apply(a));
    }
    return this._build(out);
  }

  /** Narrows the source; the returned bridge still targets the same factory */
  filter(p: (a: A) => boolean): EquaBridge<A, S, R> {
    const kept: A[] = [];
    for (const a of this._source) if (p(a)) kept.push(a);
    return new EquaBridge(kept, this._build);
  }

  scanLeft(z: S, op: (acc: S, a: A) => S): R {
    const out = [z];
    let acc = z;
    for (const a of this._source) {
      acc = op(acc, a);
      out.push(acc);
    }
    return this._build(out);
  }

  /** `op` runs from the last element back; results in that order, `z` last */
  scanRight(z: S, op: (a: A, acc: S) => S): R {
    const source = [...this._source];
    const out = [z];
    let acc = z;
    for (let i = source.length - 1; i >= 0; i--) {
      acc = op(source[i], acc);
      out.unshift(acc);
    }
    return this._build(out);
  }

  flatten(this: EquaBridge<Iterable<S>, S, R>): R {
    return this.flatMap((a) => a);
  }
}
