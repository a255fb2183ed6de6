/**
 * Metadata aggregation - per-subtree summaries kept on every node
 *
 * An aggregator lifts one element into a summary and combines two summaries
 * of adjacent ranges. `combine` must be associative with `identity()` as its
 * unit; it need not commute, since summaries are always combined in in-order
 * sequence (left, pivot, right).
 */

import { CHECKSUM_BASE } from './constants';
import type { Comparator } from './types';

export interface Aggregator<T, M> {
  identity(): M;
  lift(element: T): M;
  combine(a: M, b: M): M;
  equals?(a: M, b: M): boolean;
}

export type Aggregators<T> = { readonly [name: string]: Aggregator<T, unknown> };

export type MetaOf<A> = {
  readonly [K in keyof A]: A[K] extends Aggregator<never, infer M> ? M : never;
};

// Order-sensitive polynomial digest; `scale` is BASE^n for n summarized elements
export interface Digest {
  readonly hash: number;
  readonly scale: number;
}

// Summaries every tree carries
export interface CoreMeta {
  readonly size: number;
  readonly checksum: Digest;
}

export const EMPTY_DIGEST: Digest = Object.freeze({ hash: 0, scale: 1 });

export function digestEquals(a: Digest, b: Digest): boolean {
  return a.hash === b.hash && a.scale === b.scale;
}

export function combineDigests(a: Digest, b: Digest): Digest {
  return {
    hash: (Math.imul(a.hash, b.scale) + b.hash) >>> 0,
    scale: Math.imul(a.scale, b.scale) >>> 0,
  };
}

// =====================================================
// Built-in kinds
// =====================================================

export function cardinality<T>(): Aggregator<T, number> {
  return {
    identity: () => 0,
    lift: () => 1,
    combine: (a, b) => a + b,
  };
}

export function digest<T>(hash: (element: T) => number): Aggregator<T, Digest> {
  return {
    identity: () => EMPTY_DIGEST,
    lift: (element) => ({ hash: hash(element) >>> 0, scale: CHECKSUM_BASE }),
    combine: combineDigests,
    equals: digestEquals,
  };
}

export function checksum<T>(hash: (element: T) => number): Aggregator<T, Digest> {
  return digest(hash);
}

/**
 * Greatest projected value in the subtree. Ties keep the leftmost value.
 * `undefined` stands for "no elements", so projections should not yield it.
 */
export function maxBy<T, V>(select: (element: T) => V, compare: Comparator<V>): Aggregator<T, V | undefined> {
  return {
    identity: () => undefined,
    lift: select,
    combine: (a, b) => {
      if (a === undefined) return b;
      if (b === undefined) return a;
      return compare(a, b) >= 0 ? a : b;
    },
  };
}

export function max<T>(compare: Comparator<T>): Aggregator<T, T | undefined> {
  return maxBy((element: T) => element, compare);
}

// Map-specific kinds

export function maxKey<T, K>(keyOf: (entry: T) => K, compare: Comparator<K>): Aggregator<T, K | undefined> {
  return maxBy(keyOf, compare);
}

export function keySum<T, K>(keyOf: (entry: T) => K, hash: (key: K) => number): Aggregator<T, Digest> {
  return digest((entry) => hash(keyOf(entry)));
}

export function valSum<T, V>(valueOf: (entry: T) => V, hash: (value: V) => number): Aggregator<T, Digest> {
  return digest((entry) => hash(valueOf(entry)));
}

// =====================================================
// Product composition
// =====================================================

/**
 * Compose named aggregators into one whose summary is the record of the
 * component summaries. The component list is fixed here, once, so per-node
 * work is a flat loop over it. Omitting the record composes nothing.
 */
export function product<T, A extends Aggregators<T> = Record<never, never>>(
  aggregators?: A
): Aggregator<T, MetaOf<A>> {
  const parts: [string, Aggregator<T, unknown>][] = aggregators ? Object.entries(aggregators) : [];

  // Each record is filled with exactly the keys of `A`, each from its own aggregator
  const build = (value: (agg: Aggregator<T, unknown>, name: string) => unknown): MetaOf<A> => {
    const out: Record<string, unknown> = {};
    for (const [name, agg] of parts) {
      out[name] = value(agg, name);
    }
    return out as MetaOf<A>;
  };

  const field = (meta: MetaOf<A>, name: string): unknown => Reflect.get(meta, name);

  return {
    identity: () => build((agg) => agg.identity()),
    lift: (element) => build((agg) => agg.lift(element)),
    combine: (a, b) => build((agg, name) => agg.combine(field(a, name), field(b, name))),
    equals: (a, b) => {
      for (const [name, agg] of parts) {
        const x = field(a, name);
        const y = field(b, name);
        if (agg.equals ? !agg.equals(x, y) : !Object.is(x, y)) return false;
      }
      return true;
    },
  };
}

/**
 * Extend a user summary with the core `size` and `checksum` components.
 * Reserved names are kept out of user aggregators, so the spread never
 * overwrites a user field.
 */
export function withCore<T, U>(
  user: Aggregator<T, U>,
  hash: (element: T) => number
): Aggregator<T, U & CoreMeta> {
  const size = cardinality<T>();
  const sum = checksum(hash);
  return {
    identity: () => ({ ...user.identity(), size: size.identity(), checksum: sum.identity() }),
    lift: (element) => ({ ...user.lift(element), size: size.lift(element), checksum: sum.lift(element) }),
    combine: (a, b) => ({
      ...user.combine(a, b),
      size: size.combine(a.size, b.size),
      checksum: sum.combine(a.checksum, b.checksum),
    }),
    equals: (a, b) =>
      a.size === b.size && digestEquals(a.checksum, b.checksum) && (user.equals ? user.equals(a, b) : true),
  };
}
