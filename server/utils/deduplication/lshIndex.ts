/**
 * LSH banding index over MinHash sketches
 *
 * A sketch of `bands * rows` values is cut into `bands` slices of `rows`
 * consecutive values. Two documents are compared only when they agree on
 * every row of at least one band, so a lookup touches a handful of buckets
 * instead of every stored document.
 *
 * Probability that two documents with Jaccard similarity s are compared:
 *
 *   1 - (1 - s^rows)^bands
 *
 * With the default 20 bands of 20 rows:
 *
 *   s      P(compared)
 *   .70    .016
 *   .80    .206
 *   .85    .546
 *   .861   .642   (S-curve midpoint, (1/bands)^(1/rows))
 *   .87    .720
 *   .90    .925
 *   .95    .999
 *
 * More bands raise recall and false positives; more rows raise precision
 * and false negatives.
 */

import { DuplicateDocumentIdError, IllegalConfigurationError } from '../../types/errors';
import { MinHash, type Sketch } from './minHash';
import type { RandomSource } from './random';
import { tokenize } from './tokenizer';

export interface LSHIndexOptions {
  tokensInWord?: number;
  numHashFunctions?: number;
  bands?: number;
  rows?: number;
  random?: RandomSource;
}

export const DEFAULT_LSH_OPTIONS = {
  tokensInWord: 5,
  numHashFunctions: 400,
  bands: 20,
  rows: 20,
} as const;

/**
 * Identifies the bucket of one band. `digest` is a 32-bit hash of the
 * band's row values; buckets sharing a digest are told apart by the row
 * values themselves.
 */
export interface BandKey {
  band: number;
  digest: number;
}

export type LookupResult =
  | {
      isDuplicate: true;
      matchedDocumentId: string;
      similarity: number;
      candidatesCompared: number;
    }
  | {
      isDuplicate: false;
      documentId: string;
      candidatesCompared: number;
    };

export interface LSHIndexStats {
  documents: number;
  totalBuckets: number;
  maxBucketSize: number;
  avgBucketSize: number;
}

interface IndexedDocument {
  id: string;
  sketch: Sketch;
}

/** Arena positions of documents sharing one band's row values */
type Bucket = number[];

/** Per-band table: digest -> buckets whose rows hash to that digest */
type BandTable = Map<number, Bucket[]>;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function computeBandKey(sketch: Sketch, band: number, rows: number): BandKey {
  let hash = FNV_OFFSET_BASIS ^ band;
  const offset = band * rows;

  for (let j = 0; j < rows; j++) {
    hash ^= sketch[offset + j];
    hash = Math.imul(hash, FNV_PRIME);
  }

  return { band, digest: hash >>> 0 };
}

export class LSHIndex {
  private readonly threshold: number;
  private readonly bands: number;
  private readonly rows: number;
  private readonly minHash: MinHash;

  private documents: IndexedDocument[] = [];
  private tables: BandTable[];
  private storedIds = new Set<string>();
  private nextDocumentId = 0;

  /**
   * @param threshold - Similarity in [0, 1] at or above which documents are duplicates
   * @param options - Sketch and banding parameters; defaults suit thresholds around 0.9
   */
  constructor(threshold: number, options: LSHIndexOptions = {}) {
    const {
      tokensInWord = DEFAULT_LSH_OPTIONS.tokensInWord,
      numHashFunctions = DEFAULT_LSH_OPTIONS.numHashFunctions,
      bands = DEFAULT_LSH_OPTIONS.bands,
      rows = DEFAULT_LSH_OPTIONS.rows,
      random,
    } = options;

    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new IllegalConfigurationError(`Illegal threshold: ${threshold}`, { threshold });
    }

    if (!Number.isInteger(bands) || bands <= 0 || !Number.isInteger(rows) || rows <= 0) {
      throw new IllegalConfigurationError(
        `Illegal banding: ${bands} bands of ${rows} rows`,
        { bands, rows }
      );
    }

    if (bands * rows !== numHashFunctions) {
      throw new IllegalConfigurationError(
        'bands * rows != numHashFunctions',
        { bands, rows, numHashFunctions }
      );
    }

    this.threshold = threshold;
    this.minHash = new MinHash(tokensInWord, numHashFunctions, random);
    this.bands = bands;
    this.rows = rows;
    this.tables = this.createTables();
  }

  /**
   * Probability that documents of Jaccard similarity `similarity` share at
   * least one band
   */
  static matchProbability(similarity: number, bands: number, rows: number): number {
    return 1 - Math.pow(1 - Math.pow(similarity, rows), bands);
  }

  /**
   * Similarity at which the banding S-curve is steepest
   */
  static sCurveThreshold(bands: number, rows: number): number {
    return Math.pow(1 / bands, 1 / rows);
  }

  /**
   * Empties every bucket; later lookups start from an empty index
   */
  clearDocuments(): void {
    this.documents = [];
    this.storedIds = new Set<string>();
    this.tables = this.createTables();
  }

  /** Number of indexed documents */
  get size(): number {
    return this.documents.length;
  }

  /**
   * Looks whether a similar document was already seen. Unseen documents are
   * added to the index.
   *
   * @returns true if a similar document was already seen, false otherwise
   */
  lookForSimilarDocument(doc: string): boolean {
    return this.findSimilarDocument(doc).isDuplicate;
  }

  findSimilarDocument(doc: string, documentId?: string): LookupResult {
    const sketch = this.minHash.computeSketch(tokenize(doc));
    return this.findSimilarSketch(sketch, documentId);
  }

  findSimilarSketch(sketch: Sketch, documentId?: string): LookupResult {
    this.minHash.assertSketch(sketch);

    const keys: BandKey[] = [];
    const compared = new Set<number>();

    for (let band = 0; band < this.bands; band++) {
      const key = computeBandKey(sketch, band, this.rows);
      keys.push(key);

      const bucket = this.findBucket(sketch, key);
      if (!bucket) continue;

      for (const position of bucket) {
        if (compared.has(position)) continue;

        const candidate = this.documents[position];
        const similarity = this.minHash.compareSketches(sketch, candidate.sketch);
        if (similarity >= this.threshold) {
          return {
            isDuplicate: true,
            matchedDocumentId: candidate.id,
            similarity,
            candidatesCompared: compared.size + 1,
          };
        }

        // Avoid comparing two documents twice
        compared.add(position);
      }
    }

    const id = this.assignId(documentId);
    this.storedIds.add(id);
    const position = this.documents.length;
    this.documents.push({ id, sketch: [...sketch] });

    for (const key of keys) {
      const existing = this.findBucket(sketch, key);
      if (existing) {
        existing.push(position);
        continue;
      }

      const table = this.tables[key.band];
      const chain = table.get(key.digest);
      if (chain) {
        chain.push([position]);
      } else {
        table.set(key.digest, [[position]]);
      }
    }

    return { isDuplicate: false, documentId: id, candidatesCompared: compared.size };
  }

  getStats(): LSHIndexStats {
    let totalBuckets = 0;
    let maxBucketSize = 0;
    let totalEntries = 0;

    for (const table of this.tables) {
      for (const chain of Array.from(table.values())) {
        for (const bucket of chain) {
          totalBuckets++;
          totalEntries += bucket.length;
          maxBucketSize = Math.max(maxBucketSize, bucket.length);
        }
      }
    }

    return {
      documents: this.documents.length,
      totalBuckets,
      maxBucketSize,
      avgBucketSize: totalBuckets > 0 ? totalEntries / totalBuckets : 0,
    };
  }

  getConfig(): {
    threshold: number;
    tokensInWord: number;
    numHashFunctions: number;
    bands: number;
    rows: number;
  } {
    return {
      threshold: this.threshold,
      ...this.minHash.getConfig(),
      bands: this.bands,
      rows: this.rows,
    };
  }

  /**
   * Caller ids must be unused; generated ids skip any taken by a caller
   */
  private assignId(documentId: string | undefined): string {
    if (documentId !== undefined) {
      if (this.storedIds.has(documentId)) {
        throw new DuplicateDocumentIdError(documentId);
      }
      return documentId;
    }

    let id = String(this.nextDocumentId++);
    while (this.storedIds.has(id)) {
      id = String(this.nextDocumentId++);
    }
    return id;
  }

  private createTables(): BandTable[] {
    return Array.from({ length: this.bands }, () => new Map<number, Bucket[]>());
  }

  /**
   * Bucket holding documents whose rows in `key.band` equal the sketch's
   */
  private findBucket(sketch: Sketch, key: BandKey): Bucket | undefined {
    const chain = this.tables[key.band].get(key.digest);
    if (!chain) return undefined;

    const offset = key.band * this.rows;
    return chain.find(bucket => {
      const stored = this.documents[bucket[0]].sketch;
      for (let j = offset; j < offset + this.rows; j++) {
        if (stored[j] !== sketch[j]) return false;
      }
      return true;
    });
  }
}
