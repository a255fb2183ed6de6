/**
 * Lifecycle - ties a facade's tree reference to the facade object
 *
 * A facade owns one reference to its root. `release` drops it eagerly; a
 * facade that is dropped without being released gives its reference back
 * when the garbage collector reclaims it.
 */

import type { CollectionType } from '../collection';
import type { CoreMeta } from './meta';
import type { Tree } from './tree';

export class Lifecycle<T, M extends CoreMeta> {
  private readonly registry: FinalizationRegistry<Tree<T, M>>;

  constructor(readonly collection: CollectionType<T, M>) {
    this.registry = new FinalizationRegistry((tree) => collection.dispose(tree));
  }

  track(owner: object, tree: Tree<T, M>): void {
    this.registry.register(owner, tree, owner);
  }

  release(owner: object, tree: Tree<T, M>): void {
    this.registry.unregister(owner);
    this.collection.dispose(tree);
  }

  /**
   * Walk a snapshot of `tree` that holds its own reference, so the walk
   * outlives the facade it came from. The reference goes back when the walk
   * finishes or is closed, or when an abandoned iterator is collected.
   */
  iterate<R>(tree: Tree<T, M>, walk: (tree: Tree<T, M>) => Iterator<R>): IterableIterator<R> {
    const snapshot = this.collection.clone(tree);
    const token = {};
    const iterator = this.drain(snapshot, token, walk);
    this.registry.register(iterator, snapshot, token);
    return iterator;
  }

  private *drain<R>(snapshot: Tree<T, M>, token: object, walk: (tree: Tree<T, M>) => Iterator<R>): IterableIterator<R> {
    try {
      const source = walk(snapshot);
      for (let step = source.next(); !step.done; step = source.next()) {
        yield step.value;
      }
    } finally {
      this.release(token, snapshot);
    }
  }
}
