// Seeded random stream: 32-bit Mersenne Twister (MT19937) plus the derived
// draws the generator needs. Every draw consumes words from the twister in a
// fixed pattern so a given seed always reproduces the same netlist.

const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;

const TWO_POW_32 = 4294967296;
const TWO_POW_64 = TWO_POW_32 * TWO_POW_32;
const LARGEST_BELOW_ONE = 1 - Number.EPSILON / 2;

export class MersenneTwister {
  private state = new Uint32Array(N);
  private index = N;

  constructor(seed: number) {
    this.state[0] = seed >>> 0;
    for (let i = 1; i < N; i++) {
      const prev = this.state[i - 1] ^ (this.state[i - 1] >>> 30);
      this.state[i] = (Math.imul(1812433253, prev) + i) >>> 0;
    }
  }

  /**
   * Next raw 32-bit word, in [0, 2^32).
   */
  nextUint32(): number {
    if (this.index >= N) {
      this.twist();
    }

    let y = this.state[this.index++];
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }

  private twist(): void {
    const mt = this.state;
    for (let i = 0; i < N; i++) {
      const y = (mt[i] & UPPER_MASK) | (mt[(i + 1) % N] & LOWER_MASK);
      let next = mt[(i + M) % N] ^ (y >>> 1);
      if (y & 1) {
        next ^= MATRIX_A;
      }
      mt[i] = next >>> 0;
    }
    this.index = 0;
  }
}

/**
 * Random draws layered over one Mersenne Twister stream.
 *
 * - `int(min, max)` is an unbiased bounded integer (multiply-shift with
 *   rejection), one or more words per draw.
 * - `canonical()` is a double in [0, 1) built from two words.
 * - `bool(p)` and `weighted(weights)` both consume one `canonical()`.
 */
export class RandomStream {
  private twister: MersenneTwister;

  constructor(seed: number) {
    this.twister = new MersenneTwister(seed);
  }

  /**
   * Uniform integer in [min, max], both inclusive.
   */
  int(min: number, max: number): number {
    if (max < min) {
      throw new Error(`Empty integer range [${min}, ${max}]`);
    }

    const range = max - min + 1;
    if (range > TWO_POW_32) {
      throw new Error(`Integer range [${min}, ${max}] exceeds 32 bits`);
    }
    if (range === TWO_POW_32) {
      return min + this.twister.nextUint32();
    }

    let [high, low] = this.multiplyWide(this.twister.nextUint32(), range);
    if (low < range) {
      const threshold = (TWO_POW_32 - range) % range;
      while (low < threshold) {
        [high, low] = this.multiplyWide(this.twister.nextUint32(), range);
      }
    }
    return min + high;
  }

  /**
   * Double in [0, 1) assembled from two consecutive words.
   */
  canonical(): number {
    const lo = this.twister.nextUint32();
    const hi = this.twister.nextUint32();
    const value = (lo + hi * TWO_POW_32) / TWO_POW_64;
    return value >= 1 ? LARGEST_BELOW_ONE : value;
  }

  /**
   * True with the given probability.
   */
  bool(probability: number = 0.5): boolean {
    return this.canonical() < probability;
  }

  /**
   * Index drawn from an unnormalized discrete distribution.
   *
   * Fewer than two weights consume nothing and return 0. Weights are
   * normalized, accumulated, and the first cumulative bound at or above the
   * drawn value wins.
   */
  weighted(weights: readonly number[]): number {
    if (weights.length < 2) {
      return 0;
    }

    let total = 0;
    for (const w of weights) {
      total += w;
    }
    if (!(total > 0)) {
      throw new Error('Weighted draw needs a positive total weight');
    }

    const cumulative: number[] = [];
    let running = 0;
    for (const w of weights) {
      running += w / total;
      cumulative.push(running);
    }
    cumulative[cumulative.length - 1] = 1;

    const p = this.canonical();
    let lo = 0;
    let hi = cumulative.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (cumulative[mid] < p) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return Math.min(lo, cumulative.length - 1);
  }

  /**
   * Uniformly pick one element, or undefined (without consuming a word) when
   * the candidate list is empty.
   */
  pick<T>(candidates: readonly T[]): T | undefined {
    if (candidates.length === 0) {
      return undefined;
    }
    return candidates[this.int(0, candidates.length - 1)];
  }

  // Full 64-bit product of two 32-bit values, split into [high, low] words.
  private multiplyWide(a: number, b: number): [number, number] {
    const low = Math.imul(a, b) >>> 0;
    const aHigh = Math.floor(a / 65536);
    const aLow = a % 65536;
    const partial = Math.floor((aLow * b) / 65536);
    const high = Math.floor((aHigh * b + partial) / 65536);
    return [high, low];
  }
}
