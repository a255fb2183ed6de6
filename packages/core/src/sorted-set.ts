/**
 * SortedSet - immutable ordered set over a collection type
 *
 * - defineSet(config)        → validated set type bound to one Stash
 * - type.of(1, 2, 3)         → canonical tree, whatever the input order
 * - set.add(x) / delete(x)   → new set, or `this` when nothing changed
 * - union / intersection / difference → O(1) when both sides share a root
 * - produce(set, draft => …) → batched updates through a SetDraft
 */

import { defineCollection, type CollectionConfig, type CollectionMeta, type CollectionType } from './collection';
import { DisposedCollectionError } from './errors';
import { Lifecycle } from './internal/lifecycle';
import type { Aggregators, CoreMeta } from './internal/meta';
import type { Tree } from './internal/tree';
import type { Producible } from './produce';

export interface SortedSetType<T, M extends CoreMeta = CoreMeta> {
  readonly collection: CollectionType<T, M>;
  empty(): SortedSet<T, M>;
  of(...elements: T[]): SortedSet<T, M>;
  from(elements: Iterable<T>): SortedSet<T, M>;
}

export interface SetSplit<T, M extends CoreMeta> {
  below: SortedSet<T, M>;
  present: boolean;
  above: SortedSet<T, M>;
}

export function defineSet<T, A extends Aggregators<T> = Record<never, never>>(
  config: CollectionConfig<T, A>
): SortedSetType<T, CollectionMeta<A>> {
  const collection = defineCollection(config);
  const lifecycle = new Lifecycle(collection);
  return {
    collection,
    empty: () => new SortedSet(lifecycle, collection.empty()),
    of: (...elements) => new SortedSet(lifecycle, collection.from(elements)),
    from: (elements) => new SortedSet(lifecycle, collection.from(elements)),
  };
}

export class SortedSet<T, M extends CoreMeta = CoreMeta>
  implements Iterable<T>, Producible<SetDraft<T, M>, SortedSet<T, M>>
{
  private tree: Tree<T, M> | undefined;

  /** Sets are created through their type; see `defineSet`. */
  constructor(private readonly lifecycle: Lifecycle<T, M>, tree: Tree<T, M>) {
    this.tree = tree;
    lifecycle.track(this, tree);
  }

  private get collection(): CollectionType<T, M> {
    return this.lifecycle.collection;
  }

  private live(): Tree<T, M> {
    if (!this.tree) throw new DisposedCollectionError(this.collection.name);
    return this.tree;
  }

  private derive(next: Tree<T, M>): SortedSet<T, M> {
    if (next.root === this.live().root) {
      this.collection.dispose(next);
      return this;
    }
    return new SortedSet(this.lifecycle, next);
  }

  get size(): number {
    return this.collection.size(this.live());
  }

  get meta(): M {
    return this.collection.meta(this.live());
  }

  has(value: T): boolean {
    return this.collection.contains(this.live(), value);
  }

  // The stored element equal to `value`
  get(value: T): T | undefined {
    return this.collection.lookup(this.live(), value)?.element;
  }

  add(value: T): SortedSet<T, M> {
    return this.derive(this.collection.insert(this.live(), value));
  }

  delete(value: T): SortedSet<T, M> {
    return this.derive(this.collection.remove(this.live(), value));
  }

  union(other: SortedSet<T, M>): SortedSet<T, M> {
    return this.derive(this.collection.union(this.live(), other.live()));
  }

  intersection(other: SortedSet<T, M>): SortedSet<T, M> {
    return this.derive(this.collection.intersect(this.live(), other.live()));
  }

  difference(other: SortedSet<T, M>): SortedSet<T, M> {
    return this.derive(this.collection.difference(this.live(), other.live()));
  }

  isSubsetOf(other: SortedSet<T, M>): boolean {
    const rest = this.collection.difference(this.live(), other.live());
    const subset = rest.root === undefined;
    this.collection.dispose(rest);
    return subset;
  }

  equals(other: SortedSet<T, M>): boolean {
    return this.collection.equals(this.live(), other.live());
  }

  at(index: number): T {
    return this.collection.at(this.live(), index);
  }

  // Position of `value`, or -1 when absent
  indexOf(value: T): number {
    const tree = this.live();
    return this.collection.contains(tree, value) ? this.collection.rank(tree, value) : -1;
  }

  first(): T | undefined {
    return this.collection.first(this.live())?.element;
  }

  last(): T | undefined {
    return this.collection.last(this.live())?.element;
  }

  /**
   * Elements e with from <= e < to. A bound left out or passed as `undefined`
   * is open, so a set holding `undefined` cannot be bounded at that element;
   * use `split` for it instead.
   */
  slice(from?: T, to?: T): SortedSet<T, M> {
    const bound = (value: T | undefined) => (value === undefined ? undefined : { element: value });
    return this.derive(this.collection.slice(this.live(), bound(from), bound(to)));
  }

  split(value: T): SetSplit<T, M> {
    const { left, match, right } = this.collection.split(this.live(), value);
    return {
      below: new SortedSet(this.lifecycle, left),
      present: match !== undefined,
      above: new SortedSet(this.lifecycle, right),
    };
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  // Iterators hold their own reference; disposing the set does not cut them short
  values(): IterableIterator<T> {
    return this.lifecycle.iterate(this.live(), this.collection.inOrder);
  }

  reversed(): IterableIterator<T> {
    return this.lifecycle.iterate(this.live(), this.collection.reverse);
  }

  toArray(): T[] {
    return Array.from(this.values());
  }

  toJSON(): T[] {
    return this.toArray();
  }

  produce(recipe: (draft: SetDraft<T, M>) => void): SortedSet<T, M> {
    const draft = new SetDraft(this.collection, this.live());
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

  // Releases the nodes held by this set; further use throws
  dispose(): void {
    if (!this.tree) return;
    this.lifecycle.release(this, this.tree);
    this.tree = undefined;
  }
}

/**
 * Mutable view handed to a `produce` recipe. Every mutation swaps in a new
 * persistent tree; iteration walks a snapshot, so the draft may be changed
 * while it is being iterated.
 */
export class SetDraft<T, M extends CoreMeta = CoreMeta> implements Iterable<T> {
  private tree: Tree<T, M> | undefined;

  constructor(private readonly collection: CollectionType<T, M>, base: Tree<T, M>) {
    this.tree = collection.clone(base);
  }

  private live(): Tree<T, M> {
    if (!this.tree) throw new DisposedCollectionError(this.collection.name);
    return this.tree;
  }

  private swap(next: Tree<T, M>): boolean {
    const current = this.live();
    const changed = next.root !== current.root;
    this.collection.dispose(current);
    this.tree = next;
    return changed;
  }

  get size(): number {
    return this.collection.size(this.live());
  }

  has(value: T): boolean {
    return this.collection.contains(this.live(), value);
  }

  add(value: T): this {
    this.swap(this.collection.insert(this.live(), value));
    return this;
  }

  delete(value: T): boolean {
    return this.swap(this.collection.remove(this.live(), value));
  }

  clear(): void {
    this.swap(this.collection.empty());
  }

  *[Symbol.iterator](): IterableIterator<T> {
    const snapshot = this.collection.clone(this.live());
    try {
      yield* this.collection.inOrder(snapshot);
    } finally {
      this.collection.dispose(snapshot);
    }
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  /** @internal Owned copy of the current tree */
  commit(): Tree<T, M> {
    return this.collection.clone(this.live());
  }

  /** @internal */
  close(): void {
    if (!this.tree) return;
    this.collection.dispose(this.tree);
    this.tree = undefined;
  }
}
