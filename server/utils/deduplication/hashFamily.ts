/**
 * Universal hash family for MinHash
 *
 * Each function maps a 32-bit shingle fingerprint into [0, 2^31 - 1] with
 * a cheap linear, bit-shifted mix:
 *
 *   h(x) = (a * (x >> 4) + b * x + c) & (2^31 - 1)
 *
 * Arithmetic wraps at 32 bits, so the same coefficients always give the
 * same output for the same input.
 */

import { IllegalConfigurationError } from '../../types/errors';
import { SeededRandom, type RandomSource } from './random';

/** 2^31 - 1, a Mersenne prime */
export const UNIVERSE_SIZE = 0x7fffffff;

export class HashFunction {
  constructor(
    readonly a: number,
    readonly b: number,
    readonly c: number,
  ) {}

  calculateHash(x: number): number {
    const masked = x & UNIVERSE_SIZE;
    const hash = (Math.imul(this.a, masked >> 4) + Math.imul(this.b, masked) + this.c) & UNIVERSE_SIZE;
    return Math.abs(hash);
  }
}

export class HashFamily {
  readonly functions: readonly HashFunction[];

  /**
   * @param numHashFunctions - Number of independent functions to draw
   * @param random - Coefficient source; seed it for reproducible sketches
   */
  constructor(numHashFunctions: number, random: RandomSource = new SeededRandom()) {
    if (!Number.isInteger(numHashFunctions) || numHashFunctions <= 0) {
      throw new IllegalConfigurationError(
        `Illegal number of hash functions: ${numHashFunctions}`,
        { numHashFunctions }
      );
    }

    const functions: HashFunction[] = [];
    for (let i = 0; i < numHashFunctions; i++) {
      const a = random.nextInt(UNIVERSE_SIZE);
      const b = random.nextInt(UNIVERSE_SIZE);
      const c = random.nextInt(UNIVERSE_SIZE);
      functions.push(new HashFunction(a, b, c));
    }
    this.functions = functions;
  }

  get size(): number {
    return this.functions.length;
  }
}
