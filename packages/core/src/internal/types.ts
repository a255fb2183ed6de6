/**
 * Core type definitions
 */

import type { Level } from './weight';

/**
 * Opaque handle to a node held by a Stash. It carries no address: only the
 * Stash that minted it can resolve it, and handles are compared by identity.
 */
export class Location {
  // Nominal brand; structurally identical objects are not Locations
  readonly #location = true;

  static is(value: unknown): value is Location {
    return value instanceof Location && value.#location;
  }
}

export type Link = Location | undefined;

// Immutable tree node
export interface Node<T, M> {
  readonly pivot: T;
  readonly weight: Level;
  readonly left: Link;
  readonly right: Link;
  readonly meta: M;
}

// Element equal to a split key, boxed so that `undefined` elements stay distinct
export interface Match<T> {
  readonly element: T;
}

// Result of partitioning a tree around a key; both sides are owned
export interface Split<T> {
  left: Link;
  match: Match<T> | undefined;
  right: Link;
}

export type Comparator<T> = (a: T, b: T) => number;

/**
 * How an incoming element meets an equal one already present.
 * `keep` leaves the tree untouched, `replace` stores the incoming element,
 * and a function decides from both.
 */
export type Resolution<T> = 'keep' | 'replace' | ((existing: T, incoming: T) => T);
