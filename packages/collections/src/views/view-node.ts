/**
 * View pipeline IR.
 *
 * A view is a chain of nodes ending in a source. Nothing runs when a node is
 * built; `run` walks the chain each time a view is traversed, so element
 * functions are called once per traversal.
 *
 * Each node is typed by what it produces. Transform functions are declared
 * as methods, which lets a `MapNode<string, number>` stand in for the
 * `MapNode<unknown, number>` member of `ViewNode<number>`.
 */

import { unreachable } from "@equasets/core";
import type { PartialFunction } from "../partial-function.js";

export interface SourceNode<T> {
  readonly kind: "source";
  readonly elements: Iterable<T>;
}

export interface MapNode<A, B> {
  readonly kind: "map";
  readonly upstream: ViewNode<A>;
  transform(a: A): B;
}

export interface FlatMapNode<A, B> {
  readonly kind: "flatMap";
  readonly upstream: ViewNode<A>;
  expand(a: A): Iterable<B>;
}

export interface FilterNode<T> {
  readonly kind: "filter";
  readonly upstream: ViewNode<T>;
  test(a: T): boolean;
}

export interface CollectNode<A, B> {
  readonly kind: "collect";
  readonly upstream: ViewNode<A>;
  readonly pf: PartialFunction<A, B>;
}

export interface ScanLeftNode<A, B> {
  readonly kind: "scanLeft";
  readonly upstream: ViewNode<A>;
  readonly initial: B;
  step(acc: B, a: A): B;
}

export interface ScanRightNode<A, B> {
  readonly kind: "scanRight";
  readonly upstream: ViewNode<A>;
  readonly initial: B;
  step(a: A, acc: B): B;
}

export interface ZipNode<T> {
  readonly kind: "zip";
  readonly upstream: ViewNode<unknown>;
  readonly other: Iterable<unknown>;
  pair(a: unknown, b: unknown): T;
}

export interface ZipAllNode<T> {
  readonly kind: "zipAll";
  readonly upstream: ViewNode<unknown>;
  readonly other: Iterable<unknown>;
  readonly thisFill: unknown;
  readonly thatFill: unknown;
  pair(a: unknown, b: unknown): T;
}

export interface ZipWithIndexNode<T> {
  readonly kind: "zipWithIndex";
  readonly upstream: ViewNode<unknown>;
  pair(a: unknown, index: number): T;
}

export type ViewNode<T> =
  | SourceNode<T>
  | MapNode<unknown, T>
  | FlatMapNode<unknown, T>
  | FilterNode<T>
  | CollectNode<unknown, T>
  | ScanLeftNode<unknown, T>
  | ScanRightNode<unknown, T>
  | ZipNode<T>
  | ZipAllNode<T>
  | ZipWithIndexNode<T>;

// ============================================================================
// Constructors
// ============================================================================

export function sourceNode<T>(elements: Iterable<T>): ViewNode<T> {
  return { kind: "source", elements };
}

export function mapNode<A, B>(upstream: ViewNode<A>, transform: (a: A) => B): ViewNode<B> {
  return { kind: "map", upstream, transform };
}

export function flatMapNode<A, B>(
  upstream: ViewNode<A>,
  expand: (a: A) => Iterable<B>
): ViewNode<B> {
  return { kind: "flatMap", upstream, expand };
}

export function filterNode<T>(upstream: ViewNode<T>, test: (a: T) => boolean): ViewNode<T> {
  return { kind: "filter", upstream, test };
}

export function collectNode<A, B>(upstream: ViewNode<A>, pf: PartialFunction<A, B>): ViewNode<B> {
  return { kind: "collect", upstream, pf };
}

export function scanLeftNode<A, B>(
  upstream: ViewNode<A>,
  initial: B,
  step: (acc: B, a: A) => B
): ViewNode<B> {
  return { kind: "scanLeft", upstream, initial, step };
}

export function scanRightNode<A, B>(
  upstream: ViewNode<A>,
  initial: B,
  step: (a: A, acc: B) => B
): ViewNode<B> {
  return { kind: "scanRight", upstream, initial, step };
}

export function zipNode<A, B>(
  upstream: ViewNode<A>,
  other: Iterable<B>
): ViewNode<readonly [A, B]> {
  return { kind: "zip", upstream, other, pair: (a: A, b: B): readonly [A, B] => [a, b] };
}

export function zipAllNode<A, B>(
  upstream: ViewNode<A>,
  other: Iterable<B>,
  thisFill: A,
  thatFill: B
): ViewNode<readonly [A, B]> {
  return {
    kind: "zipAll",
    upstream,
    other,
    thisFill,
    thatFill,
    pair: (a: A, b: B): readonly [A, B] => [a, b],
  };
}

export function zipWithIndexNode<A>(upstream: ViewNode<A>): ViewNode<readonly [A, number]> {
  return {
    kind: "zipWithIndex",
    upstream,
    pair: (a: A, index: number): readonly [A, number] => [a, index],
  };
}

// ============================================================================
// Interpreter
// ============================================================================

export function* run<T>(node: ViewNode<T>): Generator<T, void, undefined> {
  switch (node.kind) {
    case "source":
      yield* node.elements;
      return;
    case "map":
      for (const a of run(node.upstream)) yield node.transform(a);
      return;
    case "flatMap":
      for (const a of run(node.upstream)) yield* node.expand(a);
      return;
    case "filter":
      for (const a of run(node.upstream)) if (node.test(a)) yield a;
      return;
    case "collect":
      for (const a of run(node.upstream)) if (node.pf.isDefinedAt(a)) yield node.pf.apply(a);
      return;
    case "scanLeft": {
      let acc = node.initial;
      yield acc;
      for (const a of run(node.upstream)) {
        acc = node.step(acc, a);
        yield acc;
      }
      return;
    }
    case "scanRight": {
      const upstream = [...run(node.upstream)];
      const out = [node.initial];
      let acc = node.initial;
      for (let i = upstream.length - 1; i >= 0; i--) {
        acc = node.step(upstream[i], acc);
        out.push(acc);
      }
      yield* out.reverse();
      return;
    }
    case "zip": {
      const other = node.other[Symbol.iterator]();
      for (const a of run(node.upstream)) {
        const b = other.next();
        if (b.done) return;
        yield node.pair(a, b.value);
      }
      return;
    }
    case "zipAll": {
      const other = node.other[Symbol.iterator]();
      let rest = other.next();
      for (const a of run(node.upstream)) {
        yield node.pair(a, rest.done ? node.thatFill : rest.value);
        if (!rest.done) rest = other.next();
      }
      while (!rest.done) {
        yield node.pair(node.thisFill, rest.value);
        rest = other.next();
      }
      return;
    }
    case "zipWithIndex": {
      let index = 0;
      for (const a of run(node.upstream)) yield node.pair(a, index++);
      return;
    }
    default:
      unreachable(node);
  }
}
