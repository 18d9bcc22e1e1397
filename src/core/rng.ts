/**
 * Seeded Random Number Generator for deterministic simulation
 * Uses xoroshiro64** over two 32-bit words
 */

interface RNGState {
  s0: number;
  s1: number;
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * One round of a 32-bit integer hash (lowbias32)
 */
function mix32(x: number): number {
  let s = x >>> 0;
  s ^= s >>> 16;
  s = Math.imul(s, 0x7feb352d);
  s ^= s >>> 15;
  s = Math.imul(s, 0x846ca68b);
  s ^= s >>> 16;
  return s >>> 0;
}

export class SeededRNG {
  private state: RNGState;

  constructor(seed: number) {
    this.state = this.initializeFromSeed(seed);
  }

  private initializeFromSeed(seed: number): RNGState {
    const s0 = mix32(seed);
    const s1 = mix32(s0 ^ 0x9e3779b9);

    // All-zero state is a fixed point
    return { s0: s0 || 1, s1: s1 || 1 };
  }

  /**
   * Generate next random uint32
   */
  private next(): number {
    const s0 = this.state.s0;
    let s1 = this.state.s1;

    const result = Math.imul(rotl(Math.imul(s0, 0x9e3779bb) >>> 0, 5), 5) >>> 0;

    s1 ^= s0;
    this.state.s0 = (rotl(s0, 26) ^ s1 ^ (s1 << 9)) >>> 0;
    this.state.s1 = rotl(s1 >>> 0, 13);

    return result;
  }

  /**
   * Generate random float in [0, 1)
   */
  random(): number {
    return this.next() / 0x100000000;
  }

  /**
   * Generate random float in [min, max)
   */
  randomRange(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  /**
   * Generate random integer in [min, max] inclusive
   */
  randomInt(min: number, max: number): number {
    return Math.floor(this.randomRange(min, max + 1));
  }

  /**
   * Draw `count` distinct elements without replacement (partial Fisher-Yates).
   * The source array is left untouched.
   */
  sample<T>(array: readonly T[], count: number): T[] {
    if (count > array.length) {
      throw new Error(`Cannot sample ${count} items from ${array.length}`);
    }

    const pool = [...array];
    for (let i = 0; i < count; i++) {
      const j = this.randomInt(i, pool.length - 1);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count);
  }
}

/**
 * Seed for one path of a multi-path run.
 * Each path gets its own stream so it can be replayed alone.
 */
export function derivePathSeed(seed: number, pathIndex: number): number {
  return mix32(mix32(seed) ^ Math.imul(pathIndex + 1, 0x9e3779b9));
}

/**
 * Create a hash from state for determinism verification
 */
export function hashState(obj: unknown): string {
  const str = JSON.stringify(obj, (_, value: unknown) => {
    if (value instanceof Set) {
      return Array.from(value.values()).sort();
    }
    return value;
  });

  // Simple hash function (djb2)
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16);
}
