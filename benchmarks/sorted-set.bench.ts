/**
 * Benchmark: SortedSet vs native Set copies vs Immer
 * Set algebra and batched updates on 1000-element sets
 */

import { bench, describe } from 'vitest';
import { defineSet, produce } from '../packages/core/src/index';
import { enableMapSet, produce as immerProduce } from 'immer';

enableMapSet();

// ===== Setup =====
const SIZE = 1000;
const ascending = Array.from({ length: SIZE }, (_, i) => i);
const overlapping = Array.from({ length: SIZE }, (_, i) => i + SIZE / 2);

const numbers = defineSet({ name: 'bench-numbers', compare: (a: number, b: number) => a - b });
const sortedA = numbers.from(ascending);
const sortedAgain = numbers.from([...ascending].reverse());
const sortedB = numbers.from(overlapping);

const nativeA = new Set(ascending);
const nativeB = new Set(overlapping);

describe('Union of equal content', () => {
  bench('Native (copy)', () => {
    const out = new Set(nativeA);
    for (const v of nativeA) out.add(v);
    return out;
  });

  bench('SortedSet union()', () => {
    return sortedA.union(sortedAgain);
  });
});

describe('Union of half-overlapping sets', () => {
  bench('Native (copy)', () => {
    const out = new Set(nativeA);
    for (const v of nativeB) out.add(v);
    return out;
  });

  bench('SortedSet union()', () => {
    const out = sortedA.union(sortedB);
    out.dispose();
  });
});

// ===== Batched updates =====
describe('Add 10 items', () => {
  bench('Native (copy)', () => {
    const copy = new Set(nativeA);
    for (let i = 0; i < 10; i++) {
      copy.add(SIZE + i);
    }
    return copy;
  });

  bench('SortedSet produce()', () => {
    const out = produce(sortedA, (draft) => {
      for (let i = 0; i < 10; i++) {
        draft.add(SIZE + i);
      }
    });
    out.dispose();
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeA, (draft) => {
      for (let i = 0; i < 10; i++) {
        draft.add(SIZE + i);
      }
    });
  });
});

describe('Membership', () => {
  bench('Native has()', () => {
    return nativeA.has(SIZE / 2);
  });

  bench('SortedSet has()', () => {
    return sortedA.has(SIZE / 2);
  });
});
