// Seedable random number generation for synthetic data and treatment draws

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;
  private normalCache: number | null = null;

  constructor(seed?: number) {
    const engine = seed !== undefined
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
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
   * Standard normal using Box-Muller transform, second value cached
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

  normalDistribution(mean: number, stdDev: number): number {
    return mean + stdDev * this.normal();
  }

  /**
   * Triangular distribution on [min, max] with the given mode
   */
  triangular(min: number, mode: number, max: number): number {
    if (!(min <= mode && mode <= max) || min === max) {
      throw new Error('Triangular parameters must satisfy min <= mode <= max with min < max');
    }

    const u = this.uniform();
    const split = (mode - min) / (max - min);
    if (u < split) {
      return min + Math.sqrt(u * (max - min) * (mode - min));
    }
    return max - Math.sqrt((1 - u) * (max - min) * (max - mode));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot pick from an empty list');
    }
    return items[this.integer(0, items.length - 1)];
  }

  weightedChoice<T>(choices: ReadonlyArray<{ value: T; weight: number }>): T {
    const total = choices.reduce((sum, choice) => sum + choice.weight, 0);
    if (choices.length === 0 || total <= 0) {
      throw new Error('Weighted choice needs at least one positive weight');
    }

    let threshold = this.uniform() * total;
    for (const choice of choices) {
      threshold -= choice.weight;
      if (threshold < 0) {
        return choice.value;
      }
    }
    return choices[choices.length - 1].value;
  }

  uuid(): string {
    return this.random.uuid4();
  }
}
