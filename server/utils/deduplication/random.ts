/**
 * Random sources for hash-family construction.
 *
 * Coefficients are drawn through an injected RandomSource so a seed makes
 * every sketch reproducible.
 */

export interface RandomSource {
  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number;
}

const LCG_MULTIPLIER = 1664525;
const LCG_INCREMENT = 1013904223;
const TWO_POW_32 = 4294967296;

/**
 * 32-bit linear congruential generator (Numerical Recipes constants)
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number = Math.floor(Math.random() * TWO_POW_32)) {
    this.state = seed >>> 0;
  }

  /**
   * Next value in [0, 1)
   */
  next(): number {
    this.state = (Math.imul(this.state, LCG_MULTIPLIER) + LCG_INCREMENT) >>> 0;
    return this.state / TWO_POW_32;
  }

  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}
