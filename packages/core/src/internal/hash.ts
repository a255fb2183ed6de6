/**
 * Hash family - seeded 32-bit hashing for weights and checksums
 */

// Identity hash caches for values without structural content
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new WeakMap<symbol, number>();

export type HashFunction = (value: unknown, seed: number) => number;

// Splitmix32 finalizer
export function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

// Murmur3 32-bit over UTF-16 code units, two units per block
export function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 2 <= key.length) {
    k = key.charCodeAt(i) | (key.charCodeAt(i + 1) << 16);
    i += 2;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  if (i < key.length) {
    k = key.charCodeAt(i);
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

function hashNumber(n: number, seed: number): number {
  if (Object.is(n, -0)) n = 0;
  if ((n | 0) === n) {
    return mix32(n ^ seed);
  }
  // Non-int32 numbers hash through their canonical text
  return murmur3(String(n), seed ^ 0x2545f491);
}

/**
 * Default hash: structural for primitives and arrays, by identity for other
 * objects. Collections of objects that compare equal by content should pass
 * their own `hash` in the collection config.
 */
export function hashValue(value: unknown, seed = 0): number {
  switch (typeof value) {
    case 'string':
      return murmur3(value, seed);
    case 'number':
      return hashNumber(value, seed);
    case 'boolean':
      return mix32((value ? 0x27d4eb2d : 0x165667b1) ^ seed);
    case 'bigint':
      return murmur3(value.toString(), seed ^ 0x6b43a9b5);
    case 'undefined':
      return mix32(0x9747b28c ^ seed);
    case 'symbol': {
      // Registered symbols cannot be weak keys; their registry key identifies them
      const registered = Symbol.keyFor(value);
      if (registered !== undefined) return murmur3(registered, seed ^ 0x3c6ef372);
      let id = SYM_HASH.get(value);
      if (id === undefined) {
        id = OBJ_SEQ++;
        SYM_HASH.set(value, id);
      }
      return mix32(Math.imul(id, 0x85ebca77) ^ seed);
    }
    default: {
      if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
        return mix32(0x811c9dc5 ^ seed);
      }
      if (Array.isArray(value)) {
        let h = mix32(value.length ^ seed);
        for (const item of value) {
          h = mix32(Math.imul(h, 31) ^ hashValue(item, seed));
        }
        return h;
      }
      let id = OBJ_HASH.get(value);
      if (id === undefined) {
        id = OBJ_SEQ++;
        OBJ_HASH.set(value, id);
      }
      return mix32(Math.imul(id, 0x85ebca77) ^ seed);
    }
  }
}
