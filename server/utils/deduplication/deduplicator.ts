/**
 * Document Deduplication Service
 *
 * Wraps an LSHIndex with logging and metrics. Each checked document is
 * either reported as a near-duplicate of an earlier one or added to the
 * index.
 */

import { performance } from 'perf_hooks';
import { LSHIndex, type LSHIndexStats } from './lshIndex';
import { SeededRandom, type RandomSource } from './random';
import { withSource } from '../../logger';
import { metrics } from '../../metrics';
import { config } from '../../config';

const log = withSource('deduplicator');

export interface DeduplicationResult {
  isDuplicate: boolean;
  documentId?: string;
  matchedDocumentId?: string;
  similarity?: number;
  candidatesCompared: number;
}

export interface DeduplicatorOptions {
  threshold: number;
  tokensInWord: number;
  numHashFunctions: number;
  bands: number;
  rows: number;
  /** Seeds the hash family; ignored when `random` is given */
  seed?: number;
  random?: RandomSource;
}

export class Deduplicator {
  private readonly index: LSHIndex;

  /**
   * @param options - Threshold, sketch and banding parameters (default: from env config)
   * @throws IllegalConfigurationError when the parameters cannot build an index
   */
  constructor(options: DeduplicatorOptions = config.dedup) {
    const random = options.random ?? (options.seed !== undefined ? new SeededRandom(options.seed) : undefined);

    this.index = new LSHIndex(options.threshold, {
      tokensInWord: options.tokensInWord,
      numHashFunctions: options.numHashFunctions,
      bands: options.bands,
      rows: options.rows,
      random,
    });

    log.info(
      { ...this.index.getConfig(), seeded: random !== undefined },
      'Deduplicator initialized'
    );
  }

  /**
   * Check document content against everything seen so far
   *
   * @param content - Whitespace-separated document text
   * @param documentId - Id to store the document under when it is new
   */
  check(content: string, documentId?: string): DeduplicationResult {
    const start = performance.now();
    const lookup = this.index.findSimilarDocument(content, documentId);
    const durationMs = performance.now() - start;
    const documents = this.index.size;

    metrics.recordLookup(lookup.isDuplicate, durationMs, lookup.candidatesCompared, documents);

    if (lookup.isDuplicate) {
      log.info(
        {
          documentId,
          matchedDocumentId: lookup.matchedDocumentId,
          similarity: lookup.similarity,
          candidatesCompared: lookup.candidatesCompared,
          contentPreview: content.substring(0, 100),
        },
        'Duplicate document detected'
      );

      return {
        isDuplicate: true,
        documentId,
        matchedDocumentId: lookup.matchedDocumentId,
        similarity: lookup.similarity,
        candidatesCompared: lookup.candidatesCompared,
      };
    }

    log.debug(
      { documentId: lookup.documentId, candidatesCompared: lookup.candidatesCompared, documents },
      'Indexed new document'
    );

    return {
      isDuplicate: false,
      documentId: lookup.documentId,
      candidatesCompared: lookup.candidatesCompared,
    };
  }

  /**
   * Forget every indexed document
   */
  clear(): void {
    const documents = this.index.size;
    this.index.clearDocuments();
    metrics.recordClear();
    log.info({ documentsCleared: documents }, 'Cleared document index');
  }

  get size(): number {
    return this.index.size;
  }

  getStats(): LSHIndexStats {
    return this.index.getStats();
  }

  getConfig(): ReturnType<LSHIndex['getConfig']> {
    return this.index.getConfig();
  }
}
