/**
 * Deduplication Module
 *
 * MinHash sketches and LSH banding for near-duplicate detection
 */

export {
  SeededRandom,
  type RandomSource,
} from './random';

export {
  HashFamily,
  HashFunction,
  UNIVERSE_SIZE,
} from './hashFamily';

export {
  MinHash,
  SKETCH_SENTINEL,
  fingerprintShingle,
  type Sketch,
  type MinHashConfig,
} from './minHash';

export {
  LSHIndex,
  DEFAULT_LSH_OPTIONS,
  computeBandKey,
  type BandKey,
  type LookupResult,
  type LSHIndexOptions,
  type LSHIndexStats,
} from './lshIndex';

export { tokenize } from './tokenizer';

export {
  Deduplicator,
  type DeduplicationResult,
  type DeduplicatorOptions,
} from './deduplicator';
