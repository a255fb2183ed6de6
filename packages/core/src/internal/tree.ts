/**
 * Tree core - split/join treap algorithms over Stash-backed nodes
 *
 * Every node outranks its children: higher weight first, and on equal
 * weight the element that sorts first. Ranks are unique per element, so a
 * set of elements has exactly one tree shape however it was assembled.
 *
 * Ownership: functions taking `Tree` borrow it and return an owned result.
 * Link-level helpers document per parameter whether they borrow or consume.
 * A comparator that is not a total order breaks canonical shape (results stay
 * well-formed but are no longer unique); that is a caller contract violation.
 */

import { ForeignLocationError } from '../errors';
import { digestEquals, type Aggregator, type CoreMeta } from './meta';
import type { Stash } from './stash';
import type { Comparator, Link, Location, Match, Node, Resolution, Split } from './types';
import type { Weigher } from './weight';

export interface TreeContext<T, M extends CoreMeta> {
  readonly stash: Stash<T, M>;
  readonly compare: Comparator<T>;
  readonly weigh: Weigher<T>;
  readonly aggregate: Aggregator<T, M>;
  readonly identity: M;
}

export interface Tree<T, M> {
  readonly root: Link;
  readonly stash: Stash<T, M>;
}

export interface TreeSplit<T, M> {
  left: Tree<T, M>;
  match: Match<T> | undefined;
  right: Tree<T, M>;
}

// Sign of the searched position relative to `pivot`
export type Probe<T> = (pivot: T) => number;

export function createContext<T, M extends CoreMeta>(
  stash: Stash<T, M>,
  compare: Comparator<T>,
  weigh: Weigher<T>,
  aggregate: Aggregator<T, M>
): TreeContext<T, M> {
  return { stash, compare, weigh, aggregate, identity: aggregate.identity() };
}

export function probeFor<T, M extends CoreMeta>(ctx: TreeContext<T, M>, key: T): Probe<T> {
  const { compare } = ctx;
  return (pivot) => compare(key, pivot);
}

// =====================================================
// Link-level helpers
// =====================================================

function metaOf<T, M extends CoreMeta>(ctx: TreeContext<T, M>, link: Link): M {
  return link ? ctx.stash.get(link).meta : ctx.identity;
}

function sizeOf<T, M extends CoreMeta>(ctx: TreeContext<T, M>, link: Link): number {
  return link ? ctx.stash.get(link).meta.size : 0;
}

// Consumes `left` and `right`
function node<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  pivot: T,
  weight: number,
  left: Link,
  right: Link
): Location {
  const { aggregate } = ctx;
  const meta = aggregate.combine(
    aggregate.combine(metaOf(ctx, left), aggregate.lift(pivot)),
    metaOf(ctx, right)
  );
  return ctx.stash.allocate(pivot, weight, left, right, meta);
}

// Consumes `left` and `right`; hands back `loc` itself when nothing changed
function rebuild<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  loc: Location,
  n: Node<T, M>,
  pivot: T,
  left: Link,
  right: Link
): Location {
  const { stash } = ctx;
  if (left === n.left && right === n.right && Object.is(pivot, n.pivot)) {
    stash.release(left);
    stash.release(right);
    stash.retain(loc);
    return loc;
  }
  return node(ctx, pivot, n.weight, left, right);
}

// Does `a` belong above `b`? Only meaningful for nodes of different trees
function outranks<T, M extends CoreMeta>(ctx: TreeContext<T, M>, a: Node<T, M>, b: Node<T, M>): boolean {
  if (a.weight !== b.weight) return a.weight > b.weight;
  return ctx.compare(a.pivot, b.pivot) <= 0;
}

function pick<T>(resolution: Resolution<T>, existing: T, incoming: T): T {
  if (resolution === 'keep') return existing;
  if (resolution === 'replace') return incoming;
  return resolution(existing, incoming);
}

function findNode<T, M extends CoreMeta>(ctx: TreeContext<T, M>, link: Link, probe: Probe<T>): Node<T, M> | undefined {
  let loc = link;
  while (loc) {
    const n = ctx.stash.get(loc);
    const c = probe(n.pivot);
    if (c === 0) return n;
    loc = c < 0 ? n.left : n.right;
  }
  return undefined;
}

// Borrows `link`
function splitLink<T, M extends CoreMeta>(ctx: TreeContext<T, M>, link: Link, probe: Probe<T>): Split<T> {
  if (!link) return { left: undefined, match: undefined, right: undefined };
  const { stash } = ctx;
  const n = stash.get(link);
  const c = probe(n.pivot);

  if (c === 0) {
    return { left: stash.retain(n.left), match: { element: n.pivot }, right: stash.retain(n.right) };
  }
  if (c < 0) {
    const s = splitLink(ctx, n.left, probe);
    return {
      left: s.left,
      match: s.match,
      right: rebuild(ctx, link, n, n.pivot, s.right, stash.retain(n.right)),
    };
  }
  const s = splitLink(ctx, n.right, probe);
  return {
    left: rebuild(ctx, link, n, n.pivot, stash.retain(n.left), s.left),
    match: s.match,
    right: s.right,
  };
}

// Borrows `link`; the first `count` elements go left
function splitAtLink<T, M extends CoreMeta>(ctx: TreeContext<T, M>, link: Link, count: number): Split<T> {
  const { stash } = ctx;
  const total = sizeOf(ctx, link);
  if (!link || count <= 0) return { left: undefined, match: undefined, right: stash.retain(link) };
  if (count >= total) return { left: stash.retain(link), match: undefined, right: undefined };

  const n = stash.get(link);
  const leftSize = sizeOf(ctx, n.left);
  if (count <= leftSize) {
    const s = splitAtLink(ctx, n.left, count);
    return {
      left: s.left,
      match: undefined,
      right: rebuild(ctx, link, n, n.pivot, s.right, stash.retain(n.right)),
    };
  }
  const s = splitAtLink(ctx, n.right, count - leftSize - 1);
  return {
    left: rebuild(ctx, link, n, n.pivot, stash.retain(n.left), s.left),
    match: undefined,
    right: s.right,
  };
}

// Consumes `a` and `b`; every element of `a` sorts before every element of `b`
function joinLinks<T, M extends CoreMeta>(ctx: TreeContext<T, M>, a: Link, b: Link): Link {
  if (!a) return b;
  if (!b) return a;
  const { stash } = ctx;
  const na = stash.get(a);
  const nb = stash.get(b);

  // Equal weights: the left tree's root sorts first, so it ranks higher
  if (na.weight >= nb.weight) {
    const right = joinLinks(ctx, stash.retain(na.right), b);
    const out = node(ctx, na.pivot, na.weight, stash.retain(na.left), right);
    stash.release(a);
    return out;
  }
  const left = joinLinks(ctx, a, stash.retain(nb.left));
  const out = node(ctx, nb.pivot, nb.weight, left, stash.retain(nb.right));
  stash.release(b);
  return out;
}

// Consumes `a` and `b`; a < pivot < b
function joinAround<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  a: Link,
  pivot: T,
  weight: number,
  b: Link
): Location {
  const { stash } = ctx;
  const na = a && stash.get(a);
  const nb = b && stash.get(b);

  if (a && na && na.weight >= weight && (!nb || na.weight >= nb.weight)) {
    const right = joinAround(ctx, stash.retain(na.right), pivot, weight, b);
    const out = node(ctx, na.pivot, na.weight, stash.retain(na.left), right);
    stash.release(a);
    return out;
  }
  if (b && nb && nb.weight > weight) {
    const left = joinAround(ctx, a, pivot, weight, stash.retain(nb.left));
    const out = node(ctx, nb.pivot, nb.weight, left, stash.retain(nb.right));
    stash.release(b);
    return out;
  }
  return node(ctx, pivot, weight, a, b);
}

// Borrows `a` and `b`
function unionLinks<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  a: Link,
  b: Link,
  resolution: Resolution<T>
): Link {
  const { stash } = ctx;
  if (!a) return stash.retain(b);
  if (!b || a === b) return stash.retain(a);
  const na = stash.get(a);
  const nb = stash.get(b);

  if (outranks(ctx, na, nb)) {
    const s = splitLink(ctx, b, probeFor(ctx, na.pivot));
    const left = unionLinks(ctx, na.left, s.left, resolution);
    const right = unionLinks(ctx, na.right, s.right, resolution);
    stash.release(s.left);
    stash.release(s.right);
    const pivot = s.match ? pick(resolution, na.pivot, s.match.element) : na.pivot;
    return rebuild(ctx, a, na, pivot, left, right);
  }

  const s = splitLink(ctx, a, probeFor(ctx, nb.pivot));
  const left = unionLinks(ctx, s.left, nb.left, resolution);
  const right = unionLinks(ctx, s.right, nb.right, resolution);
  stash.release(s.left);
  stash.release(s.right);
  const pivot = s.match ? pick(resolution, s.match.element, nb.pivot) : nb.pivot;
  return rebuild(ctx, b, nb, pivot, left, right);
}

// Borrows `a` and `b`
function intersectLinks<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  a: Link,
  b: Link,
  resolution: Resolution<T>
): Link {
  const { stash } = ctx;
  if (!a || !b) return undefined;
  if (a === b) return stash.retain(a);
  const na = stash.get(a);
  const nb = stash.get(b);

  if (outranks(ctx, na, nb)) {
    const s = splitLink(ctx, b, probeFor(ctx, na.pivot));
    const left = intersectLinks(ctx, na.left, s.left, resolution);
    const right = intersectLinks(ctx, na.right, s.right, resolution);
    stash.release(s.left);
    stash.release(s.right);
    if (!s.match) return joinLinks(ctx, left, right);
    return rebuild(ctx, a, na, pick(resolution, na.pivot, s.match.element), left, right);
  }

  const s = splitLink(ctx, a, probeFor(ctx, nb.pivot));
  const left = intersectLinks(ctx, s.left, nb.left, resolution);
  const right = intersectLinks(ctx, s.right, nb.right, resolution);
  stash.release(s.left);
  stash.release(s.right);
  if (!s.match) return joinLinks(ctx, left, right);
  return rebuild(ctx, b, nb, pick(resolution, s.match.element, nb.pivot), left, right);
}

// Borrows `a` and `b`
function differenceLinks<T, M extends CoreMeta>(ctx: TreeContext<T, M>, a: Link, b: Link): Link {
  const { stash } = ctx;
  if (!a || a === b) return undefined;
  if (!b) return stash.retain(a);
  const na = stash.get(a);

  const s = splitLink(ctx, b, probeFor(ctx, na.pivot));
  const left = differenceLinks(ctx, na.left, s.left);
  const right = differenceLinks(ctx, na.right, s.right);
  stash.release(s.left);
  stash.release(s.right);
  if (s.match) return joinLinks(ctx, left, right);
  return rebuild(ctx, a, na, na.pivot, left, right);
}

// =====================================================
// Tree operations
// =====================================================

function check<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>): Link {
  if (tree.stash !== ctx.stash) {
    throw new ForeignLocationError(ctx.stash.name);
  }
  return tree.root;
}

function wrap<T, M extends CoreMeta>(ctx: TreeContext<T, M>, root: Link): Tree<T, M> {
  return { root, stash: ctx.stash };
}

export function empty<T, M extends CoreMeta>(ctx: TreeContext<T, M>): Tree<T, M> {
  return wrap(ctx, undefined);
}

// O(1): shares the root and takes a reference on it
export function cloneRoot<T, M>(tree: Tree<T, M>): Tree<T, M> {
  tree.stash.retain(tree.root);
  return { root: tree.root, stash: tree.stash };
}

export function dispose<T, M>(tree: Tree<T, M>): void {
  tree.stash.release(tree.root);
}

export function lookupBy<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  probe: Probe<T>
): Match<T> | undefined {
  const n = findNode(ctx, check(ctx, tree), probe);
  return n && { element: n.pivot };
}

export function lookup<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, key: T): Match<T> | undefined {
  return lookupBy(ctx, tree, probeFor(ctx, key));
}

export function contains<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, key: T): boolean {
  return findNode(ctx, check(ctx, tree), probeFor(ctx, key)) !== undefined;
}

export function insert<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  element: T,
  resolution: Resolution<T> = 'keep'
): Tree<T, M> {
  const root = check(ctx, tree);
  const probe = probeFor(ctx, element);
  const existing = findNode(ctx, root, probe);
  let pivot = element;
  if (existing) {
    pivot = pick(resolution, existing.pivot, element);
    if (Object.is(pivot, existing.pivot)) return cloneRoot(tree);
  }
  const s = splitLink(ctx, root, probe);
  return wrap(ctx, joinAround(ctx, s.left, pivot, ctx.weigh(pivot), s.right));
}

export function removeBy<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  probe: Probe<T>
): Tree<T, M> {
  const root = check(ctx, tree);
  if (!findNode(ctx, root, probe)) return cloneRoot(tree);
  const s = splitLink(ctx, root, probe);
  return wrap(ctx, joinLinks(ctx, s.left, s.right));
}

export function remove<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, key: T): Tree<T, M> {
  return removeBy(ctx, tree, probeFor(ctx, key));
}

export function splitBy<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  probe: Probe<T>
): TreeSplit<T, M> {
  const s = splitLink(ctx, check(ctx, tree), probe);
  return { left: wrap(ctx, s.left), match: s.match, right: wrap(ctx, s.right) };
}

export function split<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, key: T): TreeSplit<T, M> {
  return splitBy(ctx, tree, probeFor(ctx, key));
}

// Every element of `left` must precede every element of `right`
export function join<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  left: Tree<T, M>,
  right: Tree<T, M>
): Tree<T, M> {
  const { stash } = ctx;
  const a = stash.retain(check(ctx, left));
  const b = stash.retain(check(ctx, right));
  return wrap(ctx, joinLinks(ctx, a, b));
}

export function union<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  a: Tree<T, M>,
  b: Tree<T, M>,
  resolution: Resolution<T> = 'keep'
): Tree<T, M> {
  return wrap(ctx, unionLinks(ctx, check(ctx, a), check(ctx, b), resolution));
}

export function intersect<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  a: Tree<T, M>,
  b: Tree<T, M>,
  resolution: Resolution<T> = 'keep'
): Tree<T, M> {
  return wrap(ctx, intersectLinks(ctx, check(ctx, a), check(ctx, b), resolution));
}

export function difference<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  a: Tree<T, M>,
  b: Tree<T, M>
): Tree<T, M> {
  return wrap(ctx, differenceLinks(ctx, check(ctx, a), check(ctx, b)));
}

// Elements at or after the `lower` position and before the `upper` one; an omitted bound is open
export function sliceBy<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  lower?: Probe<T>,
  upper?: Probe<T>
): Tree<T, M> {
  const { stash } = ctx;
  let rest = stash.retain(check(ctx, tree));

  if (lower) {
    const s = splitLink(ctx, rest, lower);
    stash.release(rest);
    stash.release(s.left);
    rest = s.match ? joinAround(ctx, undefined, s.match.element, ctx.weigh(s.match.element), s.right) : s.right;
  }
  if (upper) {
    const s = splitLink(ctx, rest, upper);
    stash.release(rest);
    stash.release(s.right);
    rest = s.left;
  }
  return wrap(ctx, rest);
}

// Elements e with from <= e < to
export function slice<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  from?: Match<T>,
  to?: Match<T>
): Tree<T, M> {
  return sliceBy(ctx, tree, from && probeFor(ctx, from.element), to && probeFor(ctx, to.element));
}

// =====================================================
// Positional operations
// =====================================================

export function singleton<T, M extends CoreMeta>(ctx: TreeContext<T, M>, element: T): Tree<T, M> {
  return wrap(ctx, node(ctx, element, ctx.weigh(element), undefined, undefined));
}

// The first `index` elements go left; `match` is always undefined
export function splitAt<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, index: number): TreeSplit<T, M> {
  const root = check(ctx, tree);
  if (!Number.isInteger(index) || index < 0 || index > sizeOf(ctx, root)) {
    throw new RangeError('Invalid index');
  }
  const s = splitAtLink(ctx, root, index);
  return { left: wrap(ctx, s.left), match: undefined, right: wrap(ctx, s.right) };
}

/**
 * Replace the elements at positions `start` (inclusive) to `end` (exclusive)
 * with the elements of `middle`, in order. Shape depends only on the
 * resulting sequence, so an edit that restores a sequence restores its tree.
 */
export function spliceAt<T, M extends CoreMeta>(
  ctx: TreeContext<T, M>,
  tree: Tree<T, M>,
  start: number,
  end: number,
  middle: Tree<T, M>
): Tree<T, M> {
  const { stash } = ctx;
  const root = check(ctx, tree);
  const inserted = check(ctx, middle);
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > sizeOf(ctx, root)) {
    throw new RangeError('Invalid range');
  }
  if (start === end && !inserted) return cloneRoot(tree);

  const head = splitAtLink(ctx, root, start);
  const tail = splitAtLink(ctx, head.right, end - start);
  stash.release(head.right);
  stash.release(tail.left);
  return wrap(ctx, joinLinks(ctx, joinLinks(ctx, head.left, stash.retain(inserted)), tail.right));
}

// =====================================================
// Inspection
// =====================================================

export function meta<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>): M {
  return metaOf(ctx, check(ctx, tree));
}

export function size<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>): number {
  return sizeOf(ctx, check(ctx, tree));
}

/**
 * Content equality. Within one interning stash equal content means the same
 * root handle, so the answer is exact; otherwise the checksums decide.
 */
export function equals<T, M extends CoreMeta>(ctx: TreeContext<T, M>, a: Tree<T, M>, b: Tree<T, M>): boolean {
  const ra = check(ctx, a);
  const rb = check(ctx, b);
  if (ra === rb) return true;
  if (ctx.stash.interning) return false;
  const ma = metaOf(ctx, ra);
  const mb = metaOf(ctx, rb);
  return ma.size === mb.size && digestEquals(ma.checksum, mb.checksum);
}

export function at<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, index: number): T {
  let loc = check(ctx, tree);
  if (!Number.isInteger(index) || index < 0 || index >= sizeOf(ctx, loc)) {
    throw new RangeError('Invalid index');
  }
  let i = index;
  while (loc) {
    const n = ctx.stash.get(loc);
    const leftSize = sizeOf(ctx, n.left);
    if (i < leftSize) {
      loc = n.left;
    } else if (i === leftSize) {
      return n.pivot;
    } else {
      i -= leftSize + 1;
      loc = n.right;
    }
  }
  throw new RangeError('Invalid index');
}

// Count of elements sorting before the probed position
export function rankBy<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, probe: Probe<T>): number {
  let loc = check(ctx, tree);
  let rank = 0;
  while (loc) {
    const n = ctx.stash.get(loc);
    const c = probe(n.pivot);
    if (c === 0) return rank + sizeOf(ctx, n.left);
    if (c < 0) {
      loc = n.left;
    } else {
      rank += sizeOf(ctx, n.left) + 1;
      loc = n.right;
    }
  }
  return rank;
}

export function rank<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>, key: T): number {
  return rankBy(ctx, tree, probeFor(ctx, key));
}

export function first<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>): Match<T> | undefined {
  let loc = check(ctx, tree);
  let edge: Node<T, M> | undefined;
  while (loc) {
    edge = ctx.stash.get(loc);
    loc = edge.left;
  }
  return edge && { element: edge.pivot };
}

export function last<T, M extends CoreMeta>(ctx: TreeContext<T, M>, tree: Tree<T, M>): Match<T> | undefined {
  let loc = check(ctx, tree);
  let edge: Node<T, M> | undefined;
  while (loc) {
    edge = ctx.stash.get(loc);
    loc = edge.right;
  }
  return edge && { element: edge.pivot };
}

/**
 * Lazy in-order walk. Trees never change, so calling again restarts from the
 * same root and yields the same sequence. The tree must stay retained while
 * the walk is in progress.
 */
export function* inOrder<T, M>(tree: Tree<T, M>): IterableIterator<T> {
  const { stash } = tree;
  const stack: Node<T, M>[] = [];
  let loc = tree.root;
  while (loc || stack.length > 0) {
    while (loc) {
      const n = stash.get(loc);
      stack.push(n);
      loc = n.left;
    }
    const n = stack.pop();
    if (!n) return;
    yield n.pivot;
    loc = n.right;
  }
}

export function* reverse<T, M>(tree: Tree<T, M>): IterableIterator<T> {
  const { stash } = tree;
  const stack: Node<T, M>[] = [];
  let loc = tree.root;
  while (loc || stack.length > 0) {
    while (loc) {
      const n = stash.get(loc);
      stack.push(n);
      loc = n.right;
    }
    const n = stack.pop();
    if (!n) return;
    yield n.pivot;
    loc = n.left;
  }
}

// Visit every node top-down; for diagnostics and invariant checks
export function* nodes<T, M>(tree: Tree<T, M>): IterableIterator<Node<T, M>> {
  const { stash } = tree;
  const stack: Location[] = tree.root ? [tree.root] : [];
  while (stack.length > 0) {
    const loc = stack.pop();
    if (!loc) return;
    const n = stash.get(loc);
    yield n;
    if (n.right) stack.push(n.right);
    if (n.left) stack.push(n.left);
  }
}
