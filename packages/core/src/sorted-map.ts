/**
 * SortedMap - immutable key-ordered map over a collection type
 *
 * Entries are `[key, value]` pairs ordered and weighted by key alone, so two
 * maps with the same keys share their shape whatever their values. Each map
 * type also keeps key and value digests, which make `keysEqual` and
 * `valuesEqual` reject mismatches without walking the trees.
 */

import { assembleCollection, type CollectionType } from './collection';
import { checkMapSettings } from './config';
import { DisposedCollectionError, DuplicateKeyError } from './errors';
import { KEY_SEED, VALUE_SEED } from './internal/constants';
import { hashValue, type HashFunction } from './internal/hash';
import { Lifecycle } from './internal/lifecycle';
import {
  digestEquals,
  keySum,
  product,
  valSum,
  type Aggregator,
  type Aggregators,
  type CoreMeta,
  type Digest,
  type MetaOf,
} from './internal/meta';
import * as core from './internal/tree';
import type { Probe, Tree } from './internal/tree';
import type { Comparator, Resolution } from './internal/types';
import type { Producible } from './produce';

export type MapEntry<K, V> = readonly [K, V];

/**
 * What happens when a key is written that is already present with a
 * different value: overwrite it, throw `DuplicateKeyError`, or merge.
 */
export type DuplicatePolicy<K, V> = 'replace' | 'reject' | ((existing: V, incoming: V, key: K) => V);

export interface SortedMapConfig<K, V, A extends Aggregators<MapEntry<K, V>> = Record<never, never>> {
  name: string;
  compare: Comparator<K>;
  onDuplicate: DuplicatePolicy<K, V>;
  hash?: HashFunction;
  salt?: number;
  aggregators?: A;
  intern?: boolean;
}

export interface MapDigests {
  readonly keySum: Digest;
  readonly valSum: Digest;
}

export type MapCoreMeta = CoreMeta & MapDigests;

export type MapMeta<A> = MetaOf<A> & MapDigests & CoreMeta;

export interface SortedMapType<K, V, M extends MapCoreMeta = MapCoreMeta> {
  readonly collection: CollectionType<MapEntry<K, V>, M>;
  empty(): SortedMap<K, V, M>;
  of(...entries: MapEntry<K, V>[]): SortedMap<K, V, M>;
  from(entries: Iterable<MapEntry<K, V>>): SortedMap<K, V, M>;
}

export interface MapRuntime<K, V, M extends MapCoreMeta> {
  lifecycle: Lifecycle<MapEntry<K, V>, M>;
  compareKeys: Comparator<K>;
  onDuplicate: DuplicatePolicy<K, V>;
}

// Adds order-sensitive digests of the keys and of the values to a user summary
function withDigests<K, V, U>(
  user: Aggregator<MapEntry<K, V>, U>,
  hash: HashFunction
): Aggregator<MapEntry<K, V>, U & MapDigests> {
  const keys = keySum((entry: MapEntry<K, V>) => entry[0], (key: K) => hash(key, KEY_SEED));
  const values = valSum((entry: MapEntry<K, V>) => entry[1], (value: V) => hash(value, VALUE_SEED));
  return {
    identity: () => ({ ...user.identity(), keySum: keys.identity(), valSum: values.identity() }),
    lift: (entry) => ({ ...user.lift(entry), keySum: keys.lift(entry), valSum: values.lift(entry) }),
    combine: (a, b) => ({
      ...user.combine(a, b),
      keySum: keys.combine(a.keySum, b.keySum),
      valSum: values.combine(a.valSum, b.valSum),
    }),
    equals: (a, b) =>
      digestEquals(a.keySum, b.keySum) && digestEquals(a.valSum, b.valSum) && (user.equals ? user.equals(a, b) : true),
  };
}

export function defineMap<K, V, A extends Aggregators<MapEntry<K, V>> = Record<never, never>>(
  config: SortedMapConfig<K, V, A>
): SortedMapType<K, V, MapMeta<A>> {
  checkMapSettings(config);
  const { compare: compareKeys, onDuplicate, ...rest } = config;
  const collection = assembleCollection<MapEntry<K, V>, MetaOf<A> & MapDigests>(
    {
      ...rest,
      compare: (a, b) => compareKeys(a[0], b[0]),
      identify: (entry) => entry[0],
      elementEquals: (a, b) => compareKeys(a[0], b[0]) === 0 && Object.is(a[1], b[1]),
    },
    withDigests(product<MapEntry<K, V>, A>(config.aggregators), config.hash ?? hashValue)
  );

  const runtime: MapRuntime<K, V, MapMeta<A>> = {
    lifecycle: new Lifecycle(collection),
    compareKeys,
    onDuplicate,
  };
  const build = (entries: Iterable<MapEntry<K, V>>) =>
    new SortedMap(runtime, collection.empty()).produce((draft) => {
      for (const [key, value] of entries) draft.set(key, value);
    });

  return {
    collection,
    empty: () => new SortedMap(runtime, collection.empty()),
    of: (...entries) => build(entries),
    from: (entries) => build(entries),
  };
}

function keyProbe<K, V>(compareKeys: Comparator<K>, key: K): Probe<MapEntry<K, V>> {
  return (pivot) => compareKeys(key, pivot[0]);
}

// Keeps the stored entry whenever the value is unchanged, so no node is rebuilt
function replaceEntry<K, V>(existing: MapEntry<K, V>, value: V): MapEntry<K, V> {
  return Object.is(existing[1], value) ? existing : [existing[0], value];
}

/**
 * Entry resolution for one write. `reject` is checked by the caller before
 * the tree is touched, so here it only ever sees equal values.
 */
function resolutionFor<K, V>(policy: DuplicatePolicy<K, V>): Resolution<MapEntry<K, V>> {
  if (policy === 'replace' || policy === 'reject') {
    return (existing, incoming) => replaceEntry(existing, incoming[1]);
  }
  return (existing, incoming) => replaceEntry(existing, policy(existing[1], incoming[1], existing[0]));
}

function* project<E, R>(source: Iterable<E>, pick: (element: E) => R): IterableIterator<R> {
  for (const element of source) yield pick(element);
}

export class SortedMap<K, V, M extends MapCoreMeta = MapCoreMeta>
  implements Iterable<MapEntry<K, V>>, Producible<MapDraft<K, V, M>, SortedMap<K, V, M>>
{
  private tree: Tree<MapEntry<K, V>, M> | undefined;

  /** Maps are created through their type; see `defineMap`. */
  constructor(private readonly runtime: MapRuntime<K, V, M>, tree: Tree<MapEntry<K, V>, M>) {
    this.tree = tree;
    runtime.lifecycle.track(this, tree);
  }

  private get collection(): CollectionType<MapEntry<K, V>, M> {
    return this.runtime.lifecycle.collection;
  }

  private live(): Tree<MapEntry<K, V>, M> {
    if (!this.tree) throw new DisposedCollectionError(this.collection.name);
    return this.tree;
  }

  private derive(next: Tree<MapEntry<K, V>, M>): SortedMap<K, V, M> {
    if (next.root === this.live().root) {
      this.collection.dispose(next);
      return this;
    }
    return new SortedMap(this.runtime, next);
  }

  private probe(key: K): Probe<MapEntry<K, V>> {
    return keyProbe(this.runtime.compareKeys, key);
  }

  get size(): number {
    return this.collection.size(this.live());
  }

  get meta(): M {
    return this.collection.meta(this.live());
  }

  get(key: K): V | undefined {
    return core.lookupBy(this.collection.context, this.live(), this.probe(key))?.element[1];
  }

  has(key: K): boolean {
    return core.lookupBy(this.collection.context, this.live(), this.probe(key)) !== undefined;
  }

  set(key: K, value: V): SortedMap<K, V, M> {
    return this.derive(writeEntry(this.runtime, this.live(), key, value));
  }

  // Writes the updater's result whatever the duplicate policy
  update(key: K, updater: (value: V | undefined) => V): SortedMap<K, V, M> {
    const tree = this.live();
    const value = updater(this.get(key));
    return this.derive(this.collection.insert(tree, [key, value], (existing) => replaceEntry(existing, value)));
  }

  delete(key: K): SortedMap<K, V, M> {
    return this.derive(core.removeBy(this.collection.context, this.live(), this.probe(key)));
  }

  // Entries of both maps; shared keys go through the duplicate policy, `other` being incoming
  union(other: SortedMap<K, V, M>): SortedMap<K, V, M> {
    const { collection, runtime } = this;
    if (runtime.onDuplicate !== 'reject') {
      return this.derive(collection.union(this.live(), other.live(), resolutionFor(runtime.onDuplicate)));
    }
    let conflict: MapEntry<K, V> | undefined;
    const merged = collection.union(this.live(), other.live(), (existing, incoming) => {
      if (conflict === undefined && !Object.is(existing[1], incoming[1])) conflict = existing;
      return existing;
    });
    if (conflict !== undefined) {
      collection.dispose(merged);
      throw new DuplicateKeyError(collection.name, conflict[0]);
    }
    return this.derive(merged);
  }

  // Entries of this map whose key is in `other`; values come from this map
  intersection(other: SortedMap<K, V, M>): SortedMap<K, V, M> {
    return this.derive(this.collection.intersect(this.live(), other.live()));
  }

  // Entries of this map whose key is not in `other`
  difference(other: SortedMap<K, V, M>): SortedMap<K, V, M> {
    return this.derive(this.collection.difference(this.live(), other.live()));
  }

  equals(other: SortedMap<K, V, M>): boolean {
    return this.collection.equals(this.live(), other.live());
  }

  keysEqual(other: SortedMap<K, V, M>): boolean {
    return this.sameSequence(other, 'keySum', (a, b) => this.runtime.compareKeys(a[0], b[0]) === 0);
  }

  // Same values in key order, keys aside
  valuesEqual(other: SortedMap<K, V, M>): boolean {
    return this.sameSequence(other, 'valSum', (a, b) => Object.is(a[1], b[1]));
  }

  private sameSequence(
    other: SortedMap<K, V, M>,
    digest: 'keySum' | 'valSum',
    same: (a: MapEntry<K, V>, b: MapEntry<K, V>) => boolean
  ): boolean {
    const a = this.live();
    const b = other.live();
    if (a.root === b.root) return true;
    const ma = this.collection.meta(a);
    const mb = this.collection.meta(b);
    if (ma.size !== mb.size || !digestEquals(ma[digest], mb[digest])) return false;

    const right = this.collection.inOrder(b);
    for (const entry of this.collection.inOrder(a)) {
      const next = right.next();
      if (next.done || !same(entry, next.value)) return false;
    }
    return true;
  }

  at(index: number): MapEntry<K, V> {
    return this.collection.at(this.live(), index);
  }

  // Position of `key`, or -1 when absent
  indexOf(key: K): number {
    const { context } = this.collection;
    const tree = this.live();
    const probe = this.probe(key);
    return core.lookupBy(context, tree, probe) ? core.rankBy(context, tree, probe) : -1;
  }

  first(): MapEntry<K, V> | undefined {
    return this.collection.first(this.live())?.element;
  }

  last(): MapEntry<K, V> | undefined {
    return this.collection.last(this.live())?.element;
  }

  // Entries with from <= key < to; a bound left out or passed as `undefined` is open
  slice(from?: K, to?: K): SortedMap<K, V, M> {
    const bound = (key: K | undefined) => (key === undefined ? undefined : this.probe(key));
    return this.derive(core.sliceBy(this.collection.context, this.live(), bound(from), bound(to)));
  }

  [Symbol.iterator](): IterableIterator<MapEntry<K, V>> {
    return this.entries();
  }

  entries(): IterableIterator<MapEntry<K, V>> {
    return this.runtime.lifecycle.iterate(this.live(), this.collection.inOrder);
  }

  keys(): IterableIterator<K> {
    const { inOrder } = this.collection;
    return this.runtime.lifecycle.iterate(this.live(), (tree) => project(inOrder(tree), (entry) => entry[0]));
  }

  values(): IterableIterator<V> {
    const { inOrder } = this.collection;
    return this.runtime.lifecycle.iterate(this.live(), (tree) => project(inOrder(tree), (entry) => entry[1]));
  }

  reversed(): IterableIterator<MapEntry<K, V>> {
    return this.runtime.lifecycle.iterate(this.live(), this.collection.reverse);
  }

  toMap(): Map<K, V> {
    return new Map(this.entries());
  }

  produce(recipe: (draft: MapDraft<K, V, M>) => void): SortedMap<K, V, M> {
    const draft = new MapDraft(this.runtime, this.live());
    try {
      recipe(draft);
      return this.derive(draft.commit());
    } finally {
      draft.close();
    }
  }

  get disposed(): boolean {
    return this.tree === undefined;
  }

  dispose(): void {
    if (!this.tree) return;
    this.runtime.lifecycle.release(this, this.tree);
    this.tree = undefined;
  }
}

// Owned tree with `[key, value]` written under the map's duplicate policy
function writeEntry<K, V, M extends MapCoreMeta>(
  runtime: MapRuntime<K, V, M>,
  tree: Tree<MapEntry<K, V>, M>,
  key: K,
  value: V
): Tree<MapEntry<K, V>, M> {
  const { collection } = runtime.lifecycle;
  if (runtime.onDuplicate === 'reject') {
    const existing = core.lookupBy(collection.context, tree, keyProbe(runtime.compareKeys, key));
    if (existing && !Object.is(existing.element[1], value)) {
      throw new DuplicateKeyError(collection.name, key);
    }
  }
  return collection.insert(tree, [key, value], resolutionFor(runtime.onDuplicate));
}

/**
 * Mutable view handed to a `produce` recipe, with the `Map` methods a recipe
 * needs. Writes follow the map's duplicate policy; iteration walks a snapshot.
 */
export class MapDraft<K, V, M extends MapCoreMeta = MapCoreMeta>
  implements Iterable<MapEntry<K, V>>
{
  private tree: Tree<MapEntry<K, V>, M> | undefined;

  constructor(private readonly runtime: MapRuntime<K, V, M>, base: Tree<MapEntry<K, V>, M>) {
    this.tree = runtime.lifecycle.collection.clone(base);
  }

  private get collection(): CollectionType<MapEntry<K, V>, M> {
    return this.runtime.lifecycle.collection;
  }

  private live(): Tree<MapEntry<K, V>, M> {
    if (!this.tree) throw new DisposedCollectionError(this.collection.name);
    return this.tree;
  }

  private swap(next: Tree<MapEntry<K, V>, M>): boolean {
    const current = this.live();
    const changed = next.root !== current.root;
    this.collection.dispose(current);
    this.tree = next;
    return changed;
  }

  get size(): number {
    return this.collection.size(this.live());
  }

  get(key: K): V | undefined {
    return core.lookupBy(this.collection.context, this.live(), keyProbe(this.runtime.compareKeys, key))?.element[1];
  }

  has(key: K): boolean {
    return core.lookupBy(this.collection.context, this.live(), keyProbe(this.runtime.compareKeys, key)) !== undefined;
  }

  set(key: K, value: V): this {
    this.swap(writeEntry(this.runtime, this.live(), key, value));
    return this;
  }

  update(key: K, updater: (value: V | undefined) => V): this {
    const value = updater(this.get(key));
    this.swap(this.collection.insert(this.live(), [key, value], (existing) => replaceEntry(existing, value)));
    return this;
  }

  delete(key: K): boolean {
    return this.swap(core.removeBy(this.collection.context, this.live(), keyProbe(this.runtime.compareKeys, key)));
  }

  clear(): void {
    this.swap(this.collection.empty());
  }

  *[Symbol.iterator](): IterableIterator<MapEntry<K, V>> {
    const snapshot = this.collection.clone(this.live());
    try {
      yield* this.collection.inOrder(snapshot);
    } finally {
      this.collection.dispose(snapshot);
    }
  }

  entries(): IterableIterator<MapEntry<K, V>> {
    return this[Symbol.iterator]();
  }

  *keys(): IterableIterator<K> {
    for (const entry of this) yield entry[0];
  }

  *values(): IterableIterator<V> {
    for (const entry of this) yield entry[1];
  }

  /** @internal Owned copy of the current tree */
  commit(): Tree<MapEntry<K, V>, M> {
    return this.collection.clone(this.live());
  }

  /** @internal */
  close(): void {
    if (!this.tree) return;
    this.collection.dispose(this.tree);
    this.tree = undefined;
  }
}
