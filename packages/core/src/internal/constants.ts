/**
 * Core constants for Sylvan trees
 */

// Hash width in bits; weights range over [0, HASH_BITS]
export const HASH_BITS = 32;

// Odd multiplier for the polynomial checksum (golden-ratio constant)
export const CHECKSUM_BASE = 0x9e3779b1;

// Seeds mixed into digests so keys and values never collide by construction
export const KEY_SEED = 0x4b455953;
export const VALUE_SEED = 0x56414c53;

// Aggregator names the core composes on every collection
export const SIZE = 'size';
export const CHECKSUM = 'checksum';
export const RESERVED_AGGREGATORS: readonly string[] = [SIZE, CHECKSUM];

