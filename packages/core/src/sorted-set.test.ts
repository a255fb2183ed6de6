/**
 * Tests for SortedSet and set drafts
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, DisposedCollectionError, ForeignLocationError } from './errors';
import { max } from './internal/meta';
import { produce } from './produce';
import { defineSet } from './sorted-set';

const byNumber = (a: number, b: number) => a - b;

const numbers = () => defineSet({ name: 'numbers', compare: byNumber });

describe('SortedSet', () => {
  describe('construction', () => {
    it('should order elements whatever the input order', () => {
      const set = numbers().of(3, 1, 2);
      expect([...set]).toEqual([1, 2, 3]);
      expect(set.size).toBe(3);
    });

    it('should drop duplicate elements', () => {
      const set = numbers().from([2, 2, 1, 2]);
      expect(set.toArray()).toEqual([1, 2]);
    });

    it('should start empty', () => {
      const set = numbers().empty();
      expect(set.size).toBe(0);
      expect(set.first()).toBeUndefined();
      expect(set.last()).toBeUndefined();
    });
  });

  describe('reads', () => {
    const set = numbers().of(10, 20, 30, 40);

    it('should answer membership', () => {
      expect(set.has(20)).toBe(true);
      expect(set.has(25)).toBe(false);
      expect(set.get(30)).toBe(30);
      expect(set.get(35)).toBeUndefined();
    });

    it('should access by position', () => {
      expect(set.at(0)).toBe(10);
      expect(set.at(3)).toBe(40);
      expect(() => set.at(4)).toThrow(RangeError);
      expect(set.indexOf(30)).toBe(2);
      expect(set.indexOf(35)).toBe(-1);
    });

    it('should expose both ends', () => {
      expect(set.first()).toBe(10);
      expect(set.last()).toBe(40);
    });

    it('should iterate both ways', () => {
      expect([...set.values()]).toEqual([10, 20, 30, 40]);
      expect([...set.reversed()]).toEqual([40, 30, 20, 10]);
    });

    it('should serialize as an array', () => {
      expect(JSON.stringify(set)).toBe('[10,20,30,40]');
    });
  });

  describe('updates', () => {
    it('should return a new set and leave the original intact', () => {
      const base = numbers().of(1, 2);
      const grown = base.add(3);
      expect(grown.toArray()).toEqual([1, 2, 3]);
      expect(base.toArray()).toEqual([1, 2]);
    });

    it('should return the same set when nothing changes', () => {
      const base = numbers().of(1, 2);
      expect(base.add(2)).toBe(base);
      expect(base.delete(5)).toBe(base);
    });

    it('should delete elements', () => {
      expect(numbers().of(1, 2, 3).delete(2).toArray()).toEqual([1, 3]);
    });

    it('should keep the stored element on re-insertion', () => {
      interface Tag {
        key: string;
        color: string;
      }
      const tags = defineSet({
        name: 'tags',
        compare: (a: Tag, b: Tag) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
        identify: (tag: Tag) => tag.key,
      });
      const original = { key: 'x', color: 'red' };
      const set = tags.of(original);

      expect(set.add({ key: 'x', color: 'blue' })).toBe(set);
      expect(set.get({ key: 'x', color: '' })).toBe(original);
    });
  });

  describe('set algebra', () => {
    it('should combine sets', () => {
      const type = numbers();
      const a = type.of(1, 2, 3, 4);
      const b = type.of(3, 4, 5);

      expect(a.union(b).toArray()).toEqual([1, 2, 3, 4, 5]);
      expect(a.intersection(b).toArray()).toEqual([3, 4]);
      expect(a.difference(b).toArray()).toEqual([1, 2]);
    });

    it('should hand back the receiver for equal content', () => {
      const type = numbers();
      const a = type.of(1, 2, 3);
      const b = type.of(3, 1, 2);

      expect(a.union(b)).toBe(a);
      expect(a.intersection(b)).toBe(a);
    });

    it('should compare content', () => {
      const type = numbers();
      const a = type.of(1, 2, 3);
      expect(a.equals(type.of(3, 2, 1))).toBe(true);
      expect(a.equals(type.of(1, 2))).toBe(false);
    });

    it('should test for subsets', () => {
      const type = numbers();
      expect(type.of(1, 3).isSubsetOf(type.of(1, 2, 3))).toBe(true);
      expect(type.of(1, 4).isSubsetOf(type.of(1, 2, 3))).toBe(false);
      expect(type.empty().isSubsetOf(type.of(1))).toBe(true);
    });

    it('should refuse sets of another type', () => {
      expect(() => numbers().of(1).union(numbers().of(2))).toThrow(ForeignLocationError);
    });
  });

  describe('ranges', () => {
    const set = numbers().from([5, 10, 15, 20, 25]);

    it('should slice by value', () => {
      expect(set.slice(10, 20).toArray()).toEqual([10, 15]);
      expect(set.slice(12).toArray()).toEqual([15, 20, 25]);
      expect(set.slice(undefined, 6).toArray()).toEqual([5]);
      expect(set.slice()).toBe(set);
    });

    it('should read an undefined bound as open', () => {
      const maybe = defineSet({
        name: 'maybe',
        compare: (a: number | undefined, b: number | undefined) =>
          a === undefined ? (b === undefined ? 0 : -1) : b === undefined ? 1 : a - b,
      });
      const set = maybe.of(2, undefined, 1, 3);

      expect(set.slice(undefined, 2).toArray()).toEqual([undefined, 1]);
      expect(set.slice(undefined)).toBe(set);
      expect(set.split(undefined).present).toBe(true);
    });

    it('should split around a value', () => {
      const { below, present, above } = set.split(15);
      expect(below.toArray()).toEqual([5, 10]);
      expect(present).toBe(true);
      expect(above.toArray()).toEqual([20, 25]);
      expect(set.split(16).present).toBe(false);
    });
  });

  describe('metadata', () => {
    it('should carry size, checksum and configured aggregators', () => {
      const scores = defineSet({ name: 'scores', compare: byNumber, aggregators: { top: max(byNumber) } });
      const set = scores.of(4, 9, 2);

      expect(set.meta.top).toBe(9);
      expect(set.meta.size).toBe(3);
      expect(set.meta.checksum).toEqual(scores.of(2, 4, 9).meta.checksum);
      expect(scores.empty().meta.top).toBeUndefined();
    });
  });

  describe('produce', () => {
    it('should apply a batch of edits', () => {
      const base = numbers().of(1, 2, 3);
      const next = produce(base, (draft) => {
        draft.add(4).add(5);
        draft.delete(1);
      });

      expect(next.toArray()).toEqual([2, 3, 4, 5]);
      expect(base.toArray()).toEqual([1, 2, 3]);
    });

    it('should return the base when nothing changed', () => {
      const base = numbers().of(1, 2, 3);
      expect(produce(base, (draft) => draft.add(2))).toBe(base);
    });

    it('should return the base when edits cancel out', () => {
      const base = numbers().of(1, 2, 3);
      const next = produce(base, (draft) => {
        draft.add(9);
        draft.delete(9);
      });
      expect(next).toBe(base);
    });

    it('should report draft state', () => {
      const base = numbers().of(1, 2, 3);
      const seen: boolean[] = [];
      produce(base, (draft) => {
        seen.push(draft.delete(2), draft.delete(2), draft.has(2));
        seen.push(draft.size === 2);
      });
      expect(seen).toEqual([true, false, false, true]);
    });

    it('should allow edits while iterating the draft', () => {
      const base = numbers().of(1, 2, 3, 4, 5, 6);
      const next = produce(base, (draft) => {
        for (const n of draft) {
          if (n % 2 === 1) draft.delete(n);
        }
      });
      expect(next.toArray()).toEqual([2, 4, 6]);
    });

    it('should clear the draft', () => {
      const next = numbers()
        .of(1, 2)
        .produce((draft) => draft.clear());
      expect(next.size).toBe(0);
    });

    it('should propagate recipe errors and leave the base usable', () => {
      const base = numbers().of(1, 2);
      expect(() =>
        produce(base, (draft) => {
          draft.add(3);
          throw new Error('recipe failed');
        })
      ).toThrow('recipe failed');
      expect(base.toArray()).toEqual([1, 2]);
    });
  });

  describe('disposal', () => {
    it('should refuse use after dispose', () => {
      const set = numbers().of(1);
      set.dispose();
      set.dispose();

      expect(set.disposed).toBe(true);
      expect(() => set.size).toThrow(DisposedCollectionError);
      expect(() => set.add(2)).toThrow('Collection "numbers" was disposed');
    });

    it('should keep iterators working after the set is disposed', () => {
      const type = numbers();
      const set = type.of(1, 2, 3, 4, 5);
      const forward = set.values();
      const backward = set.reversed();
      expect(forward.next()).toEqual({ value: 1, done: false });

      set.dispose();

      expect([...forward]).toEqual([2, 3, 4, 5]);
      expect([...backward]).toEqual([5, 4, 3, 2, 1]);
      expect(type.collection.stash.liveNodes).toBe(0);
    });

    it('should give back the iterator reference when a walk stops early', () => {
      const type = numbers();
      const set = type.of(1, 2, 3);
      for (const n of set) {
        if (n === 2) break;
      }
      set.dispose();
      expect(type.collection.stash.liveNodes).toBe(0);
    });

    it('should release every node once all sets are disposed', () => {
      const type = numbers();
      const created: { dispose(): void }[] = [];
      const keep = <S extends { dispose(): void }>(set: S): S => {
        created.push(set);
        return set;
      };

      const a = keep(type.from(Array.from({ length: 200 }, (_, i) => i)));
      const b = keep(type.from(Array.from({ length: 200 }, (_, i) => i * 3)));
      keep(a.union(b));
      keep(a.intersection(b));
      keep(keep(a.difference(b)).add(-1));
      keep(a.slice(20, 40));
      keep(
        produce(b, (draft) => {
          draft.delete(3);
        })
      );
      const { below, above } = a.split(100);
      keep(below);
      keep(above);

      expect(type.collection.stash.liveNodes).toBeGreaterThan(0);
      for (const set of created) set.dispose();
      expect(type.collection.stash.liveNodes).toBe(0);
    });
  });

  describe('configuration', () => {
    it('should reject an empty name', () => {
      expect(() => defineSet({ name: '  ', compare: byNumber })).toThrow(ConfigError);
    });

    it('should reject reserved aggregator names', () => {
      expect(() => defineSet({ name: 'n', compare: byNumber, aggregators: { size: max(byNumber) } })).toThrow(
        ConfigError
      );
    });
  });
});
