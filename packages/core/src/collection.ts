/**
 * Collection types - a validated configuration bound to one Stash
 *
 * Every tree of a collection type lives in the type's Stash, so trees of one
 * type can share subtrees and be combined in O(1) when their roots match.
 * Trees of different types never mix.
 */

import { resolveSettings } from './config';
import { hashValue, type HashFunction } from './internal/hash';
import { product, withCore, type Aggregator, type Aggregators, type CoreMeta, type MetaOf } from './internal/meta';
import { Stash } from './internal/stash';
import * as core from './internal/tree';
import type { Tree, TreeContext, TreeSplit } from './internal/tree';
import type { Comparator, Match, Resolution } from './internal/types';
import { createWeigher } from './internal/weight';
import { getLogger } from './logger';

export interface CollectionConfig<T, A extends Aggregators<T> = Record<never, never>> {
  name: string;
  compare: Comparator<T>;
  // Comparable identity; the weight is derived from its hash
  identify?: (element: T) => unknown;
  hash?: HashFunction;
  salt?: number;
  aggregators?: A;
  intern?: boolean;
  elementEquals?: (a: T, b: T) => boolean;
}

export type CollectionMeta<A> = MetaOf<A> & CoreMeta;

export interface CollectionType<T, M extends CoreMeta> {
  readonly name: string;
  readonly salt: number;
  readonly stash: Stash<T, M>;
  readonly context: TreeContext<T, M>;

  empty(): Tree<T, M>;
  from(elements: Iterable<T>, resolution?: Resolution<T>): Tree<T, M>;
  clone(tree: Tree<T, M>): Tree<T, M>;
  dispose(tree: Tree<T, M>): void;

  insert(tree: Tree<T, M>, element: T, resolution?: Resolution<T>): Tree<T, M>;
  remove(tree: Tree<T, M>, key: T): Tree<T, M>;
  contains(tree: Tree<T, M>, key: T): boolean;
  lookup(tree: Tree<T, M>, key: T): Match<T> | undefined;
  split(tree: Tree<T, M>, key: T): TreeSplit<T, M>;
  join(left: Tree<T, M>, right: Tree<T, M>): Tree<T, M>;
  union(a: Tree<T, M>, b: Tree<T, M>, resolution?: Resolution<T>): Tree<T, M>;
  intersect(a: Tree<T, M>, b: Tree<T, M>, resolution?: Resolution<T>): Tree<T, M>;
  difference(a: Tree<T, M>, b: Tree<T, M>): Tree<T, M>;
  slice(tree: Tree<T, M>, from?: Match<T>, to?: Match<T>): Tree<T, M>;

  singleton(element: T): Tree<T, M>;
  splitAt(tree: Tree<T, M>, index: number): TreeSplit<T, M>;
  splice(tree: Tree<T, M>, start: number, end: number, middle: Tree<T, M>): Tree<T, M>;

  size(tree: Tree<T, M>): number;
  meta(tree: Tree<T, M>): M;
  equals(a: Tree<T, M>, b: Tree<T, M>): boolean;
  at(tree: Tree<T, M>, index: number): T;
  rank(tree: Tree<T, M>, key: T): number;
  first(tree: Tree<T, M>): Match<T> | undefined;
  last(tree: Tree<T, M>): Match<T> | undefined;
  inOrder(tree: Tree<T, M>): IterableIterator<T>;
  reverse(tree: Tree<T, M>): IterableIterator<T>;
}

export function defineCollection<T, A extends Aggregators<T> = Record<never, never>>(
  config: CollectionConfig<T, A>
): CollectionType<T, CollectionMeta<A>> {
  return assembleCollection(config, product<T, A>(config.aggregators));
}

/**
 * Build a collection type around a ready-made user summary. `config.aggregators`
 * is still what gets validated; `summary` must be composed from it.
 */
export function assembleCollection<T, U>(
  config: CollectionConfig<T, Aggregators<T>>,
  summary: Aggregator<T, U>
): CollectionType<T, U & CoreMeta> {
  const { name, salt, intern } = resolveSettings(config);
  const { compare } = config;
  const hash = config.hash ?? hashValue;
  const identify = config.identify ?? ((element: T) => element);
  const elementEquals = config.elementEquals ?? ((a: T, b: T) => compare(a, b) === 0);
  const elementHash = (element: T) => hash(element, salt);
  // Intern buckets group by identity; `elementEquals` tells entries of one key apart
  const identityHash = (element: T) => hash(identify(element), salt);

  const stash = new Stash<T, U & CoreMeta>({
    name,
    intern: intern ? { hash: identityHash, equals: elementEquals } : undefined,
  });
  const ctx = core.createContext(stash, compare, createWeigher(identify, hash, salt), withCore(summary, elementHash));

  getLogger().debug(
    { collection: name, salt, intern, aggregators: Object.keys(config.aggregators ?? {}) },
    'defined collection type'
  );

  return {
    name,
    salt,
    stash,
    context: ctx,

    empty: () => core.empty(ctx),
    from: (elements, resolution) => {
      let tree = core.empty(ctx);
      for (const element of elements) {
        const next = core.insert(ctx, tree, element, resolution);
        core.dispose(tree);
        tree = next;
      }
      return tree;
    },
    clone: (tree) => core.cloneRoot(tree),
    dispose: (tree) => core.dispose(tree),

    insert: (tree, element, resolution) => core.insert(ctx, tree, element, resolution),
    remove: (tree, key) => core.remove(ctx, tree, key),
    contains: (tree, key) => core.contains(ctx, tree, key),
    lookup: (tree, key) => core.lookup(ctx, tree, key),
    split: (tree, key) => core.split(ctx, tree, key),
    join: (left, right) => core.join(ctx, left, right),
    union: (a, b, resolution) => core.union(ctx, a, b, resolution),
    intersect: (a, b, resolution) => core.intersect(ctx, a, b, resolution),
    difference: (a, b) => core.difference(ctx, a, b),
    slice: (tree, from, to) => core.slice(ctx, tree, from, to),

    singleton: (element) => core.singleton(ctx, element),
    splitAt: (tree, index) => core.splitAt(ctx, tree, index),
    splice: (tree, start, end, middle) => core.spliceAt(ctx, tree, start, end, middle),

    size: (tree) => core.size(ctx, tree),
    meta: (tree) => core.meta(ctx, tree),
    equals: (a, b) => core.equals(ctx, a, b),
    at: (tree, index) => core.at(ctx, tree, index),
    rank: (tree, key) => core.rank(ctx, tree, key),
    first: (tree) => core.first(ctx, tree),
    last: (tree) => core.last(ctx, tree),
    inOrder: (tree) => core.inOrder(tree),
    reverse: (tree) => core.reverse(tree),
  };
}
