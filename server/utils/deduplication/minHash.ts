/**
 * MinHash sketching
 *
 * Compresses a token sequence into a fixed-length sketch whose per-position
 * agreement rate estimates the Jaccard similarity of two documents'
 * shingle sets.
 *
 * Algorithm:
 * 1. Build overlapping k-token shingles (one per start position)
 * 2. Fingerprint each shingle to a 32-bit integer
 * 3. Hash the fingerprint with every function of the hash family
 * 4. Keep the minimum value per hash function
 */

import { IllegalConfigurationError, InvalidSketchError } from '../../types/errors';
import { HashFamily, UNIVERSE_SIZE } from './hashFamily';
import type { RandomSource } from './random';

/** One minimum hash value per hash function */
export type Sketch = readonly number[];

/**
 * Initial value of every sketch position. No hash output exceeds it, so an
 * empty document yields a sketch made only of this value.
 */
export const SKETCH_SENTINEL = UNIVERSE_SIZE;

export interface MinHashConfig {
  tokensInWord: number;
  numHashFunctions: number;
}

export class MinHash {
  private readonly tokensInWord: number;
  private readonly numHashFunctions: number;
  private readonly hashFamily: HashFamily;

  /**
   * @param tokensInWord - Tokens per shingle (default: 5)
   * @param numHashFunctions - Sketch length (default: 400)
   * @param random - Coefficient source for the hash family
   */
  constructor(tokensInWord: number = 5, numHashFunctions: number = 400, random?: RandomSource) {
    if (!Number.isInteger(tokensInWord) || tokensInWord <= 0) {
      throw new IllegalConfigurationError(
        `Illegal number of tokens in a word: ${tokensInWord}`,
        { tokensInWord }
      );
    }

    this.tokensInWord = tokensInWord;
    this.numHashFunctions = numHashFunctions;
    this.hashFamily = new HashFamily(numHashFunctions, random);
  }

  /**
   * Compute the sketch of a token sequence.
   *
   * Shingles starting near the end hold fewer than `tokensInWord` tokens;
   * they are hashed like any other.
   */
  computeSketch(tokens?: readonly string[] | null): number[] {
    const minimums: number[] = new Array(this.numHashFunctions).fill(SKETCH_SENTINEL);

    if (!tokens || tokens.length === 0) {
      return minimums;
    }

    const functions = this.hashFamily.functions;

    for (let start = 0; start < tokens.length; start++) {
      const end = Math.min(start + this.tokensInWord, tokens.length);
      const shingle = tokens.slice(start, end).join('');
      const fingerprint = fingerprintShingle(shingle);

      for (let i = 0; i < this.numHashFunctions; i++) {
        const hash = functions[i].calculateHash(fingerprint);
        if (hash < minimums[i]) {
          minimums[i] = hash;
        }
      }
    }

    return minimums;
  }

  /**
   * Estimate Jaccard similarity as the fraction of equal positions
   *
   * @returns Similarity score between 0 and 1
   */
  compareSketches(first: Sketch, second: Sketch): number {
    this.assertSketch(first);
    this.assertSketch(second);

    let equal = 0;
    for (let i = 0; i < this.numHashFunctions; i++) {
      if (first[i] === second[i]) {
        equal++;
      }
    }

    return equal / this.numHashFunctions;
  }

  assertSketch(sketch: Sketch): void {
    if (sketch.length !== this.numHashFunctions) {
      throw new InvalidSketchError(this.numHashFunctions, sketch.length);
    }
  }

  getConfig(): MinHashConfig {
    return {
      tokensInWord: this.tokensInWord,
      numHashFunctions: this.numHashFunctions,
    };
  }
}

/**
 * 31-multiplier polynomial string hash, wrapped to a signed 32-bit integer
 */
export function fingerprintShingle(value: string): number {
  let hash = 0;

  for (let i = 0; i < value.length; i++) {
    hash = ((hash << 5) - hash) + value.charCodeAt(i);
    hash |= 0;
  }

  return hash;
}
