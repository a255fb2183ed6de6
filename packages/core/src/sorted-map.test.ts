/**
 * Tests for SortedMap, duplicate policies and map drafts
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, DuplicateKeyError } from './errors';
import { cardinality, type Aggregator } from './internal/meta';
import { produce } from './produce';
import { defineMap, type DuplicatePolicy, type MapEntry } from './sorted-map';

const byString = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const prices = (onDuplicate: DuplicatePolicy<string, number> = 'replace') =>
  defineMap<string, number>({ name: 'prices', compare: byString, onDuplicate });

describe('SortedMap', () => {
  describe('construction', () => {
    it('should order entries by key', () => {
      const map = prices().of(['pear', 3], ['apple', 1], ['fig', 2]);

      expect([...map]).toEqual([
        ['apple', 1],
        ['fig', 2],
        ['pear', 3],
      ]);
      expect([...map.keys()]).toEqual(['apple', 'fig', 'pear']);
      expect([...map.values()]).toEqual([1, 2, 3]);
      expect(map.size).toBe(3);
    });

    it('should let later entries win under replace', () => {
      const map = prices('replace').of(['a', 1], ['a', 2]);
      expect(map.get('a')).toBe(2);
      expect(map.size).toBe(1);
    });

    it('should refuse repeated keys under reject', () => {
      expect(() => prices('reject').of(['a', 1], ['a', 2])).toThrow(DuplicateKeyError);
    });

    it('should accept a repeated identical entry under reject', () => {
      expect(prices('reject').of(['a', 1], ['a', 1]).size).toBe(1);
    });

    it('should convert to a native Map', () => {
      const map = prices().from(new Map([['b', 2], ['a', 1]]));
      expect(map.toMap()).toEqual(
        new Map([
          ['a', 1],
          ['b', 2],
        ])
      );
    });
  });

  describe('reads', () => {
    const map = prices().of(['a', 1], ['c', 3], ['e', 5]);

    it('should look up values by key', () => {
      expect(map.get('c')).toBe(3);
      expect(map.get('d')).toBeUndefined();
      expect(map.has('e')).toBe(true);
      expect(map.has('b')).toBe(false);
    });

    it('should access entries by position', () => {
      expect(map.at(1)).toEqual(['c', 3]);
      expect(map.indexOf('e')).toBe(2);
      expect(map.indexOf('d')).toBe(-1);
      expect(map.first()).toEqual(['a', 1]);
      expect(map.last()).toEqual(['e', 5]);
      expect([...map.reversed()].map(([k]) => k)).toEqual(['e', 'c', 'a']);
    });

    it('should slice by key', () => {
      expect([...map.slice('b', 'e').keys()]).toEqual(['c']);
      expect([...map.slice('c').keys()]).toEqual(['c', 'e']);
      expect(map.slice()).toBe(map);
    });
  });

  describe('writes', () => {
    it('should replace values under replace', () => {
      const base = prices('replace').of(['a', 1]);
      const next = base.set('a', 10).set('b', 2);

      expect(next.get('a')).toBe(10);
      expect(next.get('b')).toBe(2);
      expect(base.get('a')).toBe(1);
    });

    it('should return the same map when the value is unchanged', () => {
      const base = prices().of(['a', 1]);
      expect(base.set('a', 1)).toBe(base);
      expect(base.delete('z')).toBe(base);
    });

    it('should throw on conflicting writes under reject', () => {
      const base = prices('reject').of(['a', 1]);

      expect(() => base.set('a', 2)).toThrow(DuplicateKeyError);
      expect(() => base.set('a', 2)).toThrow('Key a is already present in "prices"');
      expect(base.set('a', 1)).toBe(base);
      expect(base.set('b', 2).size).toBe(2);
    });

    it('should merge values with a merge function', () => {
      const seen: string[] = [];
      const totals = prices((existing, incoming, key) => {
        seen.push(key);
        return existing + incoming;
      });
      const map = totals.of(['a', 1], ['b', 2]).set('a', 5);

      expect(map.get('a')).toBe(6);
      expect(seen).toEqual(['a']);
    });

    it('should update regardless of the policy', () => {
      const base = prices('reject').of(['a', 1]);
      const next = base.update('a', (v) => (v ?? 0) + 1).update('b', (v) => (v ?? 0) + 1);

      expect(next.get('a')).toBe(2);
      expect(next.get('b')).toBe(1);
    });

    it('should delete keys', () => {
      const map = prices().of(['a', 1], ['b', 2]).delete('a');
      expect([...map.keys()]).toEqual(['b']);
    });
  });

  describe('combining maps', () => {
    it('should union with the other map as incoming', () => {
      const type = prices('replace');
      const a = type.of(['a', 1], ['b', 2]);
      const b = type.of(['b', 20], ['c', 30]);

      expect([...a.union(b)]).toEqual([
        ['a', 1],
        ['b', 20],
        ['c', 30],
      ]);
    });

    it('should merge shared keys in a union', () => {
      const type = prices((existing, incoming) => existing + incoming);
      const merged = type.of(['a', 1], ['b', 2]).union(type.of(['b', 20]));
      expect(merged.get('b')).toBe(22);
    });

    it('should refuse conflicting unions under reject', () => {
      const type = prices('reject');
      const a = type.of(['a', 1], ['b', 2]);

      expect(() => a.union(type.of(['b', 3]))).toThrow(DuplicateKeyError);
      expect(a.union(type.of(['b', 2], ['c', 3])).size).toBe(3);
    });

    it('should intersect and subtract by key', () => {
      const type = prices();
      const a = type.of(['a', 1], ['b', 2], ['c', 3]);
      const b = type.of(['b', 200], ['c', 300], ['d', 400]);

      expect([...a.intersection(b)]).toEqual([
        ['b', 2],
        ['c', 3],
      ]);
      expect([...a.difference(b)]).toEqual([['a', 1]]);
    });
  });

  describe('equality', () => {
    it('should compare entries', () => {
      const type = prices();
      const a = type.of(['a', 1], ['b', 2]);

      expect(a.equals(type.of(['b', 2], ['a', 1]))).toBe(true);
      expect(a.equals(type.of(['a', 1], ['b', 3]))).toBe(false);
    });

    it('should compare keys alone', () => {
      const type = prices();
      const a = type.of(['a', 1], ['b', 2]);

      expect(a.keysEqual(type.of(['a', 10], ['b', 20]))).toBe(true);
      expect(a.keysEqual(type.of(['a', 1], ['c', 2]))).toBe(false);
      expect(a.keysEqual(type.of(['a', 1]))).toBe(false);
    });

    it('should tell apart non-ASCII values without interning', () => {
      const labels = defineMap<string, string>({ name: 'labels', compare: byString, onDuplicate: 'replace', intern: false });
      const a = labels.of(['k', 'x']);
      const b = labels.of(['k', 'Ÿ']);

      expect(a.equals(b)).toBe(false);
      expect(a.valuesEqual(b)).toBe(false);
      expect(a.keysEqual(b)).toBe(true);
      expect(a.equals(labels.of(['k', 'x']))).toBe(true);
    });

    it('should compare values in key order', () => {
      const type = prices();
      const a = type.of(['a', 1], ['b', 2]);

      expect(a.valuesEqual(type.of(['x', 1], ['y', 2]))).toBe(true);
      expect(a.valuesEqual(type.of(['x', 2], ['y', 1]))).toBe(false);
    });
  });

  describe('metadata', () => {
    it('should keep key and value digests', () => {
      const type = prices();
      const a = type.of(['a', 1], ['b', 2]);
      const b = type.of(['a', 7], ['b', 8]);

      expect(a.meta.keySum).toEqual(b.meta.keySum);
      expect(a.meta.valSum).not.toEqual(b.meta.valSum);
      expect(a.meta.size).toBe(2);
    });

    it('should carry configured aggregators', () => {
      const total: Aggregator<MapEntry<string, number>, number> = {
        identity: () => 0,
        lift: ([, value]) => value,
        combine: (a, b) => a + b,
      };
      const ledger = defineMap({
        name: 'ledger',
        compare: byString,
        onDuplicate: 'replace',
        aggregators: { total, entries: cardinality<MapEntry<string, number>>() },
      });
      const map = ledger.of(['rent', 500], ['food', 120], ['fuel', 60]);

      expect(map.meta.total).toBe(680);
      expect(map.meta.entries).toBe(3);
      expect(map.delete('rent').meta.total).toBe(180);
    });

    it('should reject aggregators named after the map digests', () => {
      expect(() =>
        defineMap({
          name: 'bad',
          compare: byString,
          onDuplicate: 'replace',
          aggregators: { keySum: cardinality<MapEntry<string, number>>() },
        })
      ).toThrow(ConfigError);
    });
  });

  describe('produce', () => {
    it('should apply draft edits under the map policy', () => {
      const base = prices('replace').of(['a', 1], ['b', 2]);
      const next = produce(base, (draft) => {
        draft.set('a', 10).set('c', 3);
        draft.delete('b');
        draft.update('d', (v) => (v ?? 0) + 4);
      });

      expect([...next]).toEqual([
        ['a', 10],
        ['c', 3],
        ['d', 4],
      ]);
      expect(base.get('a')).toBe(1);
    });

    it('should read its own writes', () => {
      const base = prices().of(['a', 1]);
      const reads: (number | undefined)[] = [];
      produce(base, (draft) => {
        draft.set('b', 2);
        reads.push(draft.get('b'), draft.get('z'), draft.size);
        reads.push(draft.has('a') ? 1 : 0);
      });
      expect(reads).toEqual([2, undefined, 2, 1]);
    });

    it('should return the base when nothing changed', () => {
      const base = prices().of(['a', 1]);
      expect(
        produce(base, (draft) => {
          draft.set('a', 1);
          draft.delete('q');
        })
      ).toBe(base);
    });

    it('should iterate a snapshot while edits happen', () => {
      const base = prices().of(['a', 1], ['b', 2], ['c', 3]);
      const next = produce(base, (draft) => {
        for (const [key, value] of draft) {
          if (value > 1) draft.set(key, value * 10);
        }
        draft.clear();
        draft.set('z', [...draft.keys()].length);
      });
      expect([...next]).toEqual([['z', 0]]);
    });

    it('should throw reject conflicts out of the recipe', () => {
      const base = prices('reject').of(['a', 1]);
      expect(() => produce(base, (draft) => draft.set('a', 2))).toThrow(DuplicateKeyError);
      expect(base.get('a')).toBe(1);
    });
  });

  describe('reclamation', () => {
    it('should keep iterators working after the map is disposed', () => {
      const type = prices();
      const map = type.of(['a', 1], ['b', 2]);
      const entries = map.entries();
      const keys = map.keys();
      const values = map.values();
      const reversed = map.reversed();

      map.dispose();

      expect([...entries]).toEqual([
        ['a', 1],
        ['b', 2],
      ]);
      expect([...keys]).toEqual(['a', 'b']);
      expect([...values]).toEqual([1, 2]);
      expect([...reversed].map(([key]) => key)).toEqual(['b', 'a']);
      expect(type.collection.stash.liveNodes).toBe(0);
    });

    it('should release every node once all maps are disposed', () => {
      const type = prices();
      const created: { dispose(): void }[] = [];
      const keep = <S extends { dispose(): void }>(map: S): S => {
        created.push(map);
        return map;
      };

      const a = keep(type.from(Array.from({ length: 100 }, (_, i): MapEntry<string, number> => [`k${i}`, i])));
      const b = keep(type.from(Array.from({ length: 100 }, (_, i): MapEntry<string, number> => [`k${i * 2}`, -i])));
      keep(a.union(b));
      keep(a.intersection(b));
      keep(a.difference(b));
      keep(keep(a.set('k1', 99)).delete('k2'));
      keep(a.slice('k10', 'k20'));

      for (const map of created) map.dispose();
      expect(type.collection.stash.liveNodes).toBe(0);
    });
  });
});
