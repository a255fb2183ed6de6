/**
 * Internal modules barrel export
 */

// Constants
export { HASH_BITS, CHECKSUM_BASE, KEY_SEED, VALUE_SEED, SIZE, CHECKSUM, RESERVED_AGGREGATORS } from './constants';

// Hashing & weights
export { hashValue, murmur3, mix32, type HashFunction } from './hash';
export { weightOf, createWeigher, isLevel, type Level, type Weigher } from './weight';

// Node store
export { Stash, type InternPolicy, type StashOptions } from './stash';
export { Lifecycle } from './lifecycle';

// Metadata
export {
  cardinality,
  checksum,
  digest,
  max,
  maxBy,
  maxKey,
  keySum,
  valSum,
  product,
  withCore,
  combineDigests,
  digestEquals,
  EMPTY_DIGEST,
  type Aggregator,
  type Aggregators,
  type MetaOf,
  type Digest,
  type CoreMeta,
} from './meta';

// Tree core
export {
  createContext,
  probeFor,
  empty,
  cloneRoot,
  dispose,
  lookup,
  lookupBy,
  contains,
  insert,
  remove,
  removeBy,
  split,
  splitBy,
  join,
  union,
  intersect,
  difference,
  slice,
  sliceBy,
  singleton,
  splitAt,
  spliceAt,
  meta,
  size,
  equals,
  at,
  rank,
  rankBy,
  first,
  last,
  inOrder,
  reverse,
  nodes,
  type Tree,
  type TreeContext,
  type TreeSplit,
  type Probe,
} from './tree';

// Types
export { Location, type Link, type Node, type Match, type Split, type Comparator, type Resolution } from './types';
