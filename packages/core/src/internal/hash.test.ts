import { describe, it, expect } from 'vitest';
import { hashValue, mix32, murmur3 } from './hash';

const isUint32 = (n: number) => Number.isInteger(n) && n >= 0 && n <= 0xffffffff;

describe('murmur3', () => {
  it('should be deterministic and unsigned', () => {
    expect(murmur3('alpha', 1)).toBe(murmur3('alpha', 1));
    expect(isUint32(murmur3('alpha', 1))).toBe(true);
  });

  it('should hash the empty string with seed 0 to 0', () => {
    expect(murmur3('')).toBe(0);
  });

  it('should depend on the seed', () => {
    expect(murmur3('alpha', 1)).not.toBe(murmur3('alpha', 2));
  });

  it('should tell apart characters that share a low byte', () => {
    // U+0161 and U+0178 end in the bytes of "a" and "x"
    for (const seed of [0, 1, 0xdeadbeef]) {
      expect(murmur3('a', seed)).not.toBe(murmur3('\u0161', seed));
      expect(murmur3('cat', seed)).not.toBe(murmur3('c\u0161t', seed));
      expect(murmur3('taxi', seed)).not.toBe(murmur3('ta\u0178i', seed));
    }
  });

  it('should tell apart distinct lone surrogates', () => {
    expect(murmur3('\ud800')).not.toBe(murmur3('\ud801'));
  });
});

describe('mix32', () => {
  it('should map distinct inputs to distinct outputs', () => {
    const seen = new Set<number>();
    for (let i = 0; i < 1000; i++) seen.add(mix32(i));
    expect(seen.size).toBe(1000);
  });
});

describe('hashValue', () => {
  it('should hash every kind of value to an unsigned 32-bit integer', () => {
    const values: unknown[] = ['x', 1, 1.5, true, 10n, undefined, null, Symbol('s'), [1, 2], {}, () => 0];
    for (const value of values) {
      expect(isUint32(hashValue(value, 3))).toBe(true);
    }
  });

  it('should treat -0 and 0 alike', () => {
    expect(hashValue(-0, 9)).toBe(hashValue(0, 9));
  });

  it('should give distinct int32 values distinct hashes', () => {
    const seen = new Set<number>();
    for (let i = -500; i < 500; i++) seen.add(hashValue(i, 11));
    expect(seen.size).toBe(1000);
  });

  it('should hash arrays by content', () => {
    expect(hashValue([1, 'a', [true]], 5)).toBe(hashValue([1, 'a', [true]], 5));
  });

  it('should hash other objects by identity', () => {
    const a = { id: 1 };
    const b = { id: 1 };
    expect(hashValue(a, 5)).toBe(hashValue(a, 5));
    expect(hashValue(a, 5)).not.toBe(hashValue(b, 5));
  });

  it('should hash registered symbols by their key', () => {
    expect(hashValue(Symbol.for('shared'), 4)).toBe(hashValue(Symbol.for('shared'), 4));
    expect(hashValue(Symbol.for('shared'), 4)).not.toBe(hashValue(Symbol.for('other'), 4));
  });

  it('should hash the same symbol consistently', () => {
    const s = Symbol('key');
    expect(hashValue(s, 0)).toBe(hashValue(s, 0));
    expect(hashValue(s, 0)).not.toBe(hashValue(Symbol('key'), 0));
  });
});
