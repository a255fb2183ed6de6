/**
 * Vector - immutable positional sequence over a collection type
 *
 * - defineVector(config)          → vector type bound to one Stash
 * - vec.push(x) / insert(i, x)    → new vector; positions come from subtree sizes
 * - split(i) / concat / splice    → O(log n), sharing every untouched subtree
 * - equal sequences share a root within an interning Stash
 *
 * Node weights come from element hashes, so a long run of one repeated value
 * makes a deep right spine.
 */

import { defineCollection, type CollectionMeta, type CollectionType } from './collection';
import { DisposedCollectionError } from './errors';
import type { HashFunction } from './internal/hash';
import { Lifecycle } from './internal/lifecycle';
import type { Aggregators, CoreMeta } from './internal/meta';
import type { Tree } from './internal/tree';
import type { Comparator } from './internal/types';

export interface VectorConfig<T, A extends Aggregators<T> = Record<never, never>> {
  name: string;
  identify?: (element: T) => unknown;
  hash?: HashFunction;
  salt?: number;
  aggregators?: A;
  intern?: boolean;
  // Interned nodes are shared only between elements this accepts; defaults to Object.is
  elementEquals?: (a: T, b: T) => boolean;
}

export interface VectorType<T, M extends CoreMeta = CoreMeta> {
  readonly collection: CollectionType<T, M>;
  empty(): Vector<T, M>;
  of(...elements: T[]): Vector<T, M>;
  from(elements: Iterable<T>): Vector<T, M>;
}

export interface VectorSplit<T, M extends CoreMeta> {
  head: Vector<T, M>;
  tail: Vector<T, M>;
}

export function defineVector<T, A extends Aggregators<T> = Record<never, never>>(
  config: VectorConfig<T, A>
): VectorType<T, CollectionMeta<A>> {
  // Every vector operation navigates by position
  const compare: Comparator<T> = () => {
    throw new TypeError(`Vector "${config.name}" has no element order`);
  };
  const collection = defineCollection<T, A>({
    ...config,
    compare,
    elementEquals: config.elementEquals ?? ((a, b) => Object.is(a, b)),
  });
  const lifecycle = new Lifecycle(collection);

  const build = (elements: Iterable<T>) => {
    let tree = collection.empty();
    for (const element of elements) {
      const piece = collection.singleton(element);
      const next = collection.join(tree, piece);
      collection.dispose(tree);
      collection.dispose(piece);
      tree = next;
    }
    return new Vector(lifecycle, tree);
  };

  return {
    collection,
    empty: () => new Vector(lifecycle, collection.empty()),
    of: (...elements) => build(elements),
    from: (elements) => build(elements),
  };
}

export class Vector<T, M extends CoreMeta = CoreMeta> implements Iterable<T> {
  private tree: Tree<T, M> | undefined;

  /** Vectors are created through their type; see `defineVector`. */
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

  private derive(next: Tree<T, M>): Vector<T, M> {
    if (next.root === this.live().root) {
      this.collection.dispose(next);
      return this;
    }
    return new Vector(this.lifecycle, next);
  }

  // Consumes `middle`
  private edit(start: number, end: number, middle: Tree<T, M>): Vector<T, M> {
    try {
      return this.derive(this.collection.splice(this.live(), start, end, middle));
    } finally {
      this.collection.dispose(middle);
    }
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size;
  }

  get size(): number {
    return this.collection.size(this.live());
  }

  get meta(): M {
    return this.collection.meta(this.live());
  }

  // Element at `index`, or undefined outside the vector
  get(index: number): T | undefined {
    return this.inRange(index) ? this.collection.at(this.live(), index) : undefined;
  }

  first(): T | undefined {
    return this.collection.first(this.live())?.element;
  }

  last(): T | undefined {
    return this.collection.last(this.live())?.element;
  }

  set(index: number, value: T): Vector<T, M> {
    if (Object.is(this.collection.at(this.live(), index), value)) return this;
    return this.edit(index, index + 1, this.collection.singleton(value));
  }

  // 0 <= index <= size; anything else throws RangeError
  insert(index: number, value: T): Vector<T, M> {
    return this.edit(index, index, this.collection.singleton(value));
  }

  remove(index: number): Vector<T, M> {
    if (!this.inRange(index)) return this;
    return this.edit(index, index + 1, this.collection.empty());
  }

  push(value: T): Vector<T, M> {
    return this.insert(this.size, value);
  }

  // Without the last element
  pop(): Vector<T, M> {
    return this.remove(this.size - 1);
  }

  split(index: number): VectorSplit<T, M> {
    const { left, right } = this.collection.splitAt(this.live(), index);
    return { head: new Vector(this.lifecycle, left), tail: new Vector(this.lifecycle, right) };
  }

  concat(other: Vector<T, M>): Vector<T, M> {
    return this.derive(this.collection.join(this.live(), other.live()));
  }

  // Inserts the elements of `other` before position `index`
  splice(index: number, other: Vector<T, M>): Vector<T, M> {
    return this.derive(this.collection.splice(this.live(), index, index, other.live()));
  }

  // Positions start <= i < end, clamped to the vector
  slice(start = 0, end?: number): Vector<T, M> {
    if (!Number.isInteger(start) || (end !== undefined && !Number.isInteger(end))) {
      throw new RangeError('Invalid range');
    }
    const { collection } = this;
    const tree = this.live();
    const size = collection.size(tree);
    const from = Math.min(Math.max(start, 0), size);
    const to = Math.min(Math.max(end ?? size, from), size);

    const { left: head, right: rest } = collection.splitAt(tree, from);
    collection.dispose(head);
    const { left, right } = collection.splitAt(rest, to - from);
    collection.dispose(rest);
    collection.dispose(right);
    return this.derive(left);
  }

  equals(other: Vector<T, M>): boolean {
    return this.collection.equals(this.live(), other.live());
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

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

  get disposed(): boolean {
    return this.tree === undefined;
  }

  // Releases the nodes held by this vector; further use throws
  dispose(): void {
    if (!this.tree) return;
    this.lifecycle.release(this, this.tree);
    this.tree = undefined;
  }
}
