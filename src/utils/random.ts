// Largest mean drawn in one Knuth pass
const POISSON_CHUNK = 500;

/**
 * Seedable pseudo-random stream (Mulberry32) with the samplers the
 * simulation pipeline draws from.
 *
 * Each run owns one instance; concurrent runs take independent streams via fork().
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number | string) {
    this.state = SeededRandom.seedToUint32(seed);
  }

  /** Convert seed to unsigned 32-bit integer. */
  static seedToUint32(seed: number | string): number {
    if (typeof seed === 'number') {
      return seed >>> 0;
    }

    // FNV-1a 32-bit hash for strings
    let h = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
      h ^= seed.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    return h >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** True with probability p. p <= 0 never succeeds, p >= 1 always does. */
  nextBernoulli(p: number): boolean {
    return this.next() < p;
  }

  /**
   * Normal sample via Box-Muller
   * @param std Standard deviation (default: 1)
   */
  nextGaussian(std: number = 1): number {
    // 1 - U keeps the log argument in (0, 1]
    const u1 = 1 - this.next();
    const u2 = this.next();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2) * std;
  }

  /**
   * Poisson sample (Knuth's multiplication method).
   * Means above POISSON_CHUNK are drawn as a sum of chunk-sized samples,
   * since exp(-mean) underflows past ~745.
   */
  nextPoisson(mean: number): number {
    if (mean <= 0) return 0;

    let remaining = mean;
    let total = 0;
    while (remaining > POISSON_CHUNK) {
      total += this.knuthPoisson(POISSON_CHUNK);
      remaining -= POISSON_CHUNK;
    }
    return total + this.knuthPoisson(remaining);
  }

  private knuthPoisson(mean: number): number {
    const limit = Math.exp(-mean);
    let k = 0;
    let p = 1;
    do {
      k++;
      p *= this.next();
    } while (p > limit);
    return k - 1;
  }

  /** Fork a deterministic sub-stream (one per worker or batch run). */
  fork(tag: number | string): SeededRandom {
    const mixed = (this.state ^ SeededRandom.seedToUint32(tag) ^ 0x9e3779b9) >>> 0;
    return new SeededRandom(mixed);
  }
}
