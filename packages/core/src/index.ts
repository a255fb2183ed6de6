/**
 * Sylvan – persistent ordered collections on canonical, content-addressed trees
 *
 * - defineSet(config)   → immutable SortedSet type
 * - defineMap(config)   → immutable SortedMap type with an explicit duplicate policy
 * - defineVector(config) → immutable positional Vector type
 * - produce(base, fn)   → batched updates through a draft
 * - defineCollection    → the raw tree operations bound to one Stash
 *
 * Trees holding the same elements have the same shape, so unions, equality
 * checks and diffs skip every subtree the inputs share.
 */

export {
  defineCollection,
  assembleCollection,
  type CollectionConfig,
  type CollectionMeta,
  type CollectionType,
} from './collection';
export { defineSet, SortedSet, SetDraft, type SortedSetType, type SetSplit } from './sorted-set';
export {
  defineMap,
  SortedMap,
  MapDraft,
  type SortedMapType,
  type SortedMapConfig,
  type MapEntry,
  type MapMeta,
  type MapCoreMeta,
  type MapDigests,
  type MapRuntime,
  type DuplicatePolicy,
} from './sorted-map';
export { defineVector, Vector, type VectorType, type VectorConfig, type VectorSplit } from './vector';
export { produce, type Producible } from './produce';

export {
  SylvanError,
  ForeignLocationError,
  RefCountUnderflowError,
  ConfigError,
  DuplicateKeyError,
  DisposedCollectionError,
  type ConfigIssue,
} from './errors';
export { createLogger, getLogger, setLogger, type Logger } from './logger';
export { CollectionConfigSchema, MapConfigSchema, resolveSettings, type ResolvedSettings } from './config';

// Building blocks
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
  digestEquals,
  hashValue,
  murmur3,
  weightOf,
  Stash,
  Location,
  type Aggregator,
  type Aggregators,
  type MetaOf,
  type Digest,
  type CoreMeta,
  type HashFunction,
  type Level,
  type Comparator,
  type Resolution,
  type Match,
  type Tree,
} from './internal';
