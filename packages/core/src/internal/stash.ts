/**
 * Stash - reference-counted arena of immutable tree nodes
 *
 * Nodes are only reachable through Location handles minted here. A node owns
 * one reference to each child; a tree owns one reference to its root. When a
 * count drops to zero the slot is freed and the release cascades downwards.
 *
 * With interning, allocating a node equal to a live one (same pivot, same
 * child handles) hands back the live handle, so equal canonical subtrees built
 * in one stash share a single Location.
 */

import { ForeignLocationError, RefCountUnderflowError } from '../errors';
import { getLogger, type Logger } from '../logger';
import { Location, type Link, type Node } from './types';
import { isLevel, type Level } from './weight';

interface Slot<T, M> {
  node: Node<T, M>;
  refs: number;
  serial: number;
  key?: string;
}

export interface InternPolicy<T> {
  hash: (element: T) => number;
  equals: (a: T, b: T) => boolean;
}

export interface StashOptions<T> {
  name?: string;
  intern?: InternPolicy<T>;
}

let STASH_SEQ = 1;

export class Stash<T, M> {
  readonly name: string;
  private readonly slots = new Map<Location, Slot<T, M>>();
  private readonly reclaimed = new WeakSet<Location>();
  private readonly interned = new Map<string, Location[]>();
  private readonly intern?: InternPolicy<T>;
  private readonly log: Logger;
  private serial = 0;
  private allocated = 0;

  constructor(options: StashOptions<T> = {}) {
    this.name = options.name ?? `stash-${STASH_SEQ++}`;
    this.intern = options.intern;
    this.log = getLogger().child({ stash: this.name });
  }

  get interning(): boolean {
    return this.intern !== undefined;
  }

  // Nodes currently held
  get liveNodes(): number {
    return this.slots.size;
  }

  // Nodes created over the stash's lifetime (interning hits excluded)
  get allocations(): number {
    return this.allocated;
  }

  owns(location: Location): boolean {
    return this.slots.has(location);
  }

  allocate(pivot: T, weight: Level, left: Link, right: Link, meta: M): Location {
    if (!isLevel(weight)) {
      throw new RangeError(`Invalid node weight ${weight}`);
    }
    const leftSlot = left && this.slot(left);
    const rightSlot = right && this.slot(right);

    let key: string | undefined;
    if (this.intern) {
      key = `${this.intern.hash(pivot)}/${leftSlot?.serial ?? 0}/${rightSlot?.serial ?? 0}`;
      const bucket = this.interned.get(key);
      if (bucket) {
        for (const candidate of bucket) {
          const slot = this.slot(candidate);
          const node = slot.node;
          if (node.left === left && node.right === right && this.intern.equals(node.pivot, pivot)) {
            slot.refs++;
            // The live node already holds its children; drop the references passed in
            this.release(left);
            this.release(right);
            return candidate;
          }
        }
      }
    }

    const location = new Location();
    const node: Node<T, M> = Object.freeze({ pivot, weight, left, right, meta });
    this.slots.set(location, { node, refs: 1, serial: ++this.serial, key });
    this.allocated++;

    if (key !== undefined) {
      const bucket = this.interned.get(key);
      if (bucket) {
        bucket.push(location);
      } else {
        this.interned.set(key, [location]);
      }
    }
    return location;
  }

  get(location: Location): Node<T, M> {
    return this.slot(location).node;
  }

  retain(location: Link): Link {
    if (location) {
      this.slot(location).refs++;
    }
    return location;
  }

  release(location: Link): void {
    if (!location) return;
    const pending: Location[] = [location];
    let freed = 0;

    while (pending.length > 0) {
      const current = pending.pop();
      if (!current) break;
      if (this.reclaimed.has(current)) {
        throw new RefCountUnderflowError(this.name);
      }
      const slot = this.slot(current);
      slot.refs--;
      if (slot.refs > 0) continue;

      this.free(current, slot);
      freed++;
      if (slot.node.left) pending.push(slot.node.left);
      if (slot.node.right) pending.push(slot.node.right);
    }

    if (freed > 0) {
      this.log.trace({ freed, live: this.slots.size }, 'reclaimed nodes');
    }
  }

  refCount(location: Location): number {
    return this.slot(location).refs;
  }

  private free(location: Location, slot: Slot<T, M>): void {
    this.slots.delete(location);
    this.reclaimed.add(location);
    if (slot.key === undefined) return;
    const bucket = this.interned.get(slot.key);
    if (!bucket) return;
    const idx = bucket.indexOf(location);
    if (idx >= 0) bucket.splice(idx, 1);
    if (bucket.length === 0) this.interned.delete(slot.key);
  }

  private slot(location: Location): Slot<T, M> {
    const slot = this.slots.get(location);
    if (!slot) {
      throw new ForeignLocationError(this.name);
    }
    return slot;
  }
}
