/**
 * Weight - deterministic balance level of an element
 *
 * The level is the count of leading zero bits of the element's 32-bit hash,
 * so P(level >= k) = 2^-k and expected tree height stays logarithmic.
 * Changing the hash or salt changes every level, which breaks structural
 * sharing with trees built under the old values.
 */

import { HASH_BITS } from './constants';
import type { HashFunction } from './hash';

export type Level = number;

export type Weigher<T> = (element: T) => Level;

export function weightOf(hash: number): Level {
  return Math.clz32(hash);
}

export function createWeigher<T>(
  identify: (element: T) => unknown,
  hash: HashFunction,
  salt: number
): Weigher<T> {
  return (element) => weightOf(hash(identify(element), salt));
}

export function isLevel(value: number): value is Level {
  return Number.isInteger(value) && value >= 0 && value <= HASH_BITS;
}
