// src/core/math/random.ts
/**
 * Seeded random number generation for synthetic datasets
 *
 * There is no shared default instance: every generator owns an RNG built from
 * an explicit seed, so two runs with the same seed produce the same table.
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;
  private normalCache: number | null = null;

  constructor(seed: number) {
    this.random = new Random(MersenneTwister19937.seed(seed));
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * Uniform random in [min, max)
   */
  uniformRange(min: number, max: number): number {
    return this.random.real(min, max, false);
  }

  /**
   * Integer in range [min, max] inclusive
   */
  integer(min: number, max: number): number {
    return this.random.integer(min, max);
  }

  /**
   * Standard normal using Box-Muller transform
   * Caches the second value of each pair
   */
  normal(): number {
    if (this.normalCache !== null) {
      const value = this.normalCache;
      this.normalCache = null;
      return value;
    }

    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - this.uniform();
    const u2 = this.uniform();

    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.normalCache = r * Math.sin(theta);
    return r * Math.cos(theta);
  }

  /**
   * Normal distribution with mean and standard deviation
   */
  normalDistribution(mean: number, stdDev: number): number {
    return mean + stdDev * this.normal();
  }

  /**
   * Pick one element uniformly
   */
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot pick from an empty list');
    }
    return items[this.integer(0, items.length - 1)];
  }
}
