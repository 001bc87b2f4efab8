import { describe, it, expect } from 'vitest';
import { MersenneTwister, RandomStream } from '../src/index.js';

describe('MersenneTwister', () => {
  it('should match the reference first output for the default seed', () => {
    expect(new MersenneTwister(5489).nextUint32()).toBe(3499211612);
  });

  it('should match the reference first output for seed 42', () => {
    expect(new MersenneTwister(42).nextUint32()).toBe(1608637542);
  });

  it('should reproduce the same words for the same seed', () => {
    const a = new MersenneTwister(1234);
    const b = new MersenneTwister(1234);
    for (let i = 0; i < 1000; i++) {
      expect(a.nextUint32()).toBe(b.nextUint32());
    }
  });

  it('should keep every word within 32 bits across a twist', () => {
    const mt = new MersenneTwister(7);
    for (let i = 0; i < 1300; i++) {
      const w = mt.nextUint32();
      expect(Number.isInteger(w)).toBe(true);
      expect(w).toBeGreaterThanOrEqual(0);
      expect(w).toBeLessThan(4294967296);
    }
  });
});

describe('RandomStream', () => {
  it('should draw integers within inclusive bounds', () => {
    const rng = new RandomStream(99);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = rng.int(3, 6);
      expect(v).toBeGreaterThanOrEqual(3);
      expect(v).toBeLessThanOrEqual(6);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([3, 4, 5, 6]);
  });

  it('should return the only value of a one-element range', () => {
    const rng = new RandomStream(1);
    expect(rng.int(8, 8)).toBe(8);
  });

  it('should reject an empty range', () => {
    const rng = new RandomStream(1);
    expect(() => rng.int(5, 4)).toThrow('Empty integer range [5, 4]');
  });

  it('should produce canonical values in [0, 1)', () => {
    const rng = new RandomStream(2024);
    for (let i = 0; i < 200; i++) {
      const v = rng.canonical();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('should honour the extremes of bool()', () => {
    const rng = new RandomStream(3);
    for (let i = 0; i < 50; i++) {
      expect(rng.bool(0)).toBe(false);
      expect(rng.bool(1)).toBe(true);
    }
  });

  it('should not consume a word when picking from an empty list', () => {
    const a = new RandomStream(11);
    const b = new RandomStream(11);
    expect(a.pick([])).toBeUndefined();
    expect(a.int(0, 1000)).toBe(b.int(0, 1000));
  });

  it('should not consume a word for a single-weight draw', () => {
    const a = new RandomStream(12);
    const b = new RandomStream(12);
    expect(a.weighted([5])).toBe(0);
    expect(a.weighted([])).toBe(0);
    expect(a.canonical()).toBe(b.canonical());
  });

  it('should consume exactly one canonical per weighted draw', () => {
    const a = new RandomStream(13);
    const b = new RandomStream(13);
    a.weighted([1, 2, 3]);
    b.canonical();
    expect(a.int(0, 99)).toBe(b.int(0, 99));
  });

  it('should never select a zero-weight entry after a positive one', () => {
    const rng = new RandomStream(21);
    for (let i = 0; i < 200; i++) {
      expect(rng.weighted([1, 0, 0])).toBe(0);
      expect(rng.weighted([0, 0, 1])).toBe(2);
    }
  });

  it('should reject a non-positive total weight', () => {
    const rng = new RandomStream(5);
    expect(() => rng.weighted([0, 0])).toThrow('Weighted draw needs a positive total weight');
  });

  it('should pick only members of the candidate list', () => {
    const rng = new RandomStream(77);
    const items = ['a', 'b', 'c'];
    for (let i = 0; i < 100; i++) {
      expect(items).toContain(rng.pick(items));
    }
  });
});
