// src/core/math/random.ts
/**
 * Seeded random number generation for the population simulator
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;

  constructor(seed?: number) {
    const engine =
      seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * True with probability p
   */
  bernoulli(p: number): boolean {
    if (p < 0 || p > 1) {
      throw new Error('p must be between 0 and 1');
    }
    return this.uniform() < p;
  }

  /**
   * Standard normal using Box-Muller transform, second value cached
   */
  private normalCache: number | null = null;

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
   * Log-normal with the given log-scale mean and standard deviation
   */
  logNormal(logMean: number, logStd: number): number {
    if (logStd < 0) {
      throw new Error('logStd must be non-negative');
    }
    return Math.exp(logMean + logStd * this.normal());
  }
}
