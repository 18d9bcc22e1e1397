/**
 * RNG Tests
 * Verify seeded random number generator behavior
 */

import { describe, it, expect } from 'vitest';
import { SeededRNG, derivePathSeed, hashState } from '../../src/core/rng.js';

describe('SeededRNG', () => {
  it('should produce deterministic sequences', () => {
    const rng1 = new SeededRNG(12345);
    const rng2 = new SeededRNG(12345);

    const seq1 = Array.from({ length: 100 }, () => rng1.random());
    const seq2 = Array.from({ length: 100 }, () => rng2.random());

    expect(seq1).toEqual(seq2);
  });

  it('should produce different sequences for different seeds', () => {
    const rng1 = new SeededRNG(12345);
    const rng2 = new SeededRNG(67890);

    const seq1 = Array.from({ length: 10 }, () => rng1.random());
    const seq2 = Array.from({ length: 10 }, () => rng2.random());

    expect(seq1).not.toEqual(seq2);
  });

  it('should produce values in [0, 1) range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 1000; i++) {
      const value = rng.random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should produce uniform distribution', () => {
    const rng = new SeededRNG(12345);
    const buckets: number[] = new Array(10).fill(0);

    for (let i = 0; i < 10000; i++) {
      buckets[Math.floor(rng.random() * 10)]++;
    }

    // Each bucket should have roughly 1000 values
    for (const count of buckets) {
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
  });

  it('should work with seed 0', () => {
    const rng = new SeededRNG(0);
    const values = Array.from({ length: 5 }, () => rng.random());

    expect(new Set(values).size).toBe(5);
  });

  it('randomInt should produce integers in range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 100; i++) {
      const value = rng.randomInt(1, 8);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(8);
    }
  });

  it('randomInt should reach both ends of the range', () => {
    const rng = new SeededRNG(7);
    const seen = new Set<number>();

    for (let i = 0; i < 500; i++) {
      seen.add(rng.randomInt(1, 8));
    }

    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('randomRange should produce values in range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 100; i++) {
      const value = rng.randomRange(-5, 5);
      expect(value).toBeGreaterThanOrEqual(-5);
      expect(value).toBeLessThan(5);
    }
  });
});

describe('SeededRNG.sample', () => {
  const catalog = ['apples', 'bananas', 'bread', 'cheese', 'eggs', 'fish'];

  it('should return the requested number of distinct items', () => {
    const rng = new SeededRNG(3);

    for (let size = 0; size <= catalog.length; size++) {
      const drawn = rng.sample(catalog, size);
      expect(drawn).toHaveLength(size);
      expect(new Set(drawn).size).toBe(size);
      for (const item of drawn) {
        expect(catalog).toContain(item);
      }
    }
  });

  it('should not modify the source array', () => {
    const rng = new SeededRNG(3);
    const source = [...catalog];

    rng.sample(source, 4);

    expect(source).toEqual(catalog);
  });

  it('should return a permutation when drawing everything', () => {
    const drawn = new SeededRNG(11).sample(catalog, catalog.length);

    expect([...drawn].sort()).toEqual([...catalog].sort());
  });

  it('should reject oversized draws', () => {
    expect(() => new SeededRNG(1).sample(catalog, 7)).toThrow('Cannot sample 7 items from 6');
  });

  it('should give every item a chance to be drawn', () => {
    const rng = new SeededRNG(2024);
    const counts = new Map<string, number>();

    for (let i = 0; i < 3000; i++) {
      const [item] = rng.sample(catalog, 1);
      counts.set(item, (counts.get(item) ?? 0) + 1);
    }

    // 500 expected per item
    for (const item of catalog) {
      expect(counts.get(item) ?? 0).toBeGreaterThan(400);
      expect(counts.get(item) ?? 0).toBeLessThan(600);
    }
  });
});

describe('derivePathSeed', () => {
  it('should be stable for the same inputs', () => {
    expect(derivePathSeed(12345, 3)).toBe(derivePathSeed(12345, 3));
  });

  it('should give distinct seeds for different paths', () => {
    const seeds = Array.from({ length: 100 }, (_, p) => derivePathSeed(12345, p));

    expect(new Set(seeds).size).toBe(100);
  });

  it('should depend on the master seed', () => {
    expect(derivePathSeed(1, 0)).not.toBe(derivePathSeed(2, 0));
  });

  it('should produce unsigned 32-bit integers', () => {
    for (let p = 0; p < 20; p++) {
      const seed = derivePathSeed(-7, p);
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThan(0x100000000);
    }
  });
});

describe('hashState', () => {
  it('should produce consistent hashes', () => {
    const obj = { a: 1, b: 'test', c: [1, 2, 3] };

    expect(hashState(obj)).toBe(hashState(obj));
  });

  it('should produce different hashes for different objects', () => {
    expect(hashState({ a: 1 })).not.toBe(hashState({ a: 2 }));
  });

  it('should hash Sets by content', () => {
    const visited1 = { visited: new Set([2, 0, 1]) };
    const visited2 = { visited: new Set([0, 1, 2]) };
    const visited3 = { visited: new Set([0, 1]) };

    expect(hashState(visited1)).toBe(hashState(visited2));
    expect(hashState(visited1)).not.toBe(hashState(visited3));
  });
});
