/**
 * Deduplicator Unit Tests
 * Tests the service wrapper: results, clearing and metrics
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Deduplicator, type DeduplicatorOptions } from '../../utils/deduplication/deduplicator';
import { LSHIndex } from '../../utils/deduplication/lshIndex';
import { DuplicateDocumentIdError, IllegalConfigurationError } from '../../types/errors';
import { metrics } from '../../metrics';
import { randomWords } from '../helpers/testUtils';

const SMALL: DeduplicatorOptions = {
  threshold: 0.5,
  tokensInWord: 2,
  numHashFunctions: 4,
  bands: 2,
  rows: 2,
  seed: 1,
};

describe('Deduplicator - check', () => {
  let deduplicator: Deduplicator;

  beforeEach(() => {
    deduplicator = new Deduplicator(SMALL);
  });

  it('should index an unseen document under the given id', () => {
    expect(deduplicator.check('the quick brown fox', 'doc-a')).toEqual({
      isDuplicate: false,
      documentId: 'doc-a',
      candidatesCompared: 0,
    });
  });

  it('should report a duplicate with the matched id', () => {
    deduplicator.check('the quick brown fox', 'doc-a');

    expect(deduplicator.check('the quick brown fox', 'doc-b')).toEqual({
      isDuplicate: true,
      documentId: 'doc-b',
      matchedDocumentId: 'doc-a',
      similarity: 1,
      candidatesCompared: 1,
    });
  });

  it('should assign ids when none are given', () => {
    expect(deduplicator.check('first document').documentId).toBe('0');
    expect(deduplicator.check('second unrelated document here').documentId).toBe('1');
  });

  it('should forget documents on clear', () => {
    deduplicator.check('the quick brown fox', 'doc-a');
    deduplicator.clear();

    expect(deduplicator.getStats().documents).toBe(0);
    expect(deduplicator.check('the quick brown fox', 'doc-c').isDuplicate).toBe(false);
  });
});

describe('Deduplicator - Document Ids', () => {
  // Full-size sketches so unrelated documents never reach the threshold
  const WIDE: DeduplicatorOptions = { ...SMALL, threshold: 0.9, numHashFunctions: 400, bands: 20, rows: 20 };

  it('should never hand out an id a caller already used', () => {
    const deduplicator = new Deduplicator(WIDE);
    const first = randomWords(40, 1).join(' ');
    const second = randomWords(40, 2).join(' ');
    const third = randomWords(40, 3).join(' ');

    expect(deduplicator.check(first, '1').documentId).toBe('1');
    expect(deduplicator.check(second).documentId).toBe('0');
    expect(deduplicator.check(third).documentId).toBe('2');
    expect(deduplicator.check(third)).toMatchObject({ isDuplicate: true, matchedDocumentId: '2' });
  });

  it('should refuse to index a new document under a taken id', () => {
    const deduplicator = new Deduplicator(WIDE);
    deduplicator.check(randomWords(40, 1).join(' '), 'doc-a');

    expect(() => deduplicator.check(randomWords(40, 2).join(' '), 'doc-a')).toThrow(DuplicateDocumentIdError);
    expect(deduplicator.size).toBe(1);
  });
});

describe('Deduplicator - Bookkeeping', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should not walk the buckets on check or clear', () => {
    const getStats = vi.spyOn(LSHIndex.prototype, 'getStats');
    const deduplicator = new Deduplicator(SMALL);

    deduplicator.check('the quick brown fox', 'doc-a');
    deduplicator.check('the quick brown fox', 'doc-b');
    deduplicator.clear();

    expect(getStats).not.toHaveBeenCalled();
  });

  it('should report the document count in constant time', () => {
    const deduplicator = new Deduplicator(SMALL);
    deduplicator.check('the quick brown fox', 'doc-a');

    expect(deduplicator.size).toBe(1);
  });
});

describe('Deduplicator - Configuration', () => {
  it('should reject parameters that cannot build an index', () => {
    expect(() => new Deduplicator({ ...SMALL, bands: 3 })).toThrow(IllegalConfigurationError);
    expect(() => new Deduplicator({ ...SMALL, threshold: 85 })).toThrow(IllegalConfigurationError);
  });

  it('should default to the environment configuration', () => {
    expect(new Deduplicator().getConfig()).toEqual({
      threshold: 0.9,
      tokensInWord: 5,
      numHashFunctions: 400,
      bands: 20,
      rows: 20,
    });
  });

  it('should reproduce decisions from the same seed', () => {
    const doc = 'alpha beta gamma delta epsilon zeta';
    const other = 'alpha beta gamma delta omega';

    const first = new Deduplicator(SMALL);
    const second = new Deduplicator(SMALL);
    first.check(doc);
    second.check(doc);

    expect(first.check(other)).toEqual(second.check(other));
  });
});

describe('Deduplicator - Metrics', () => {
  it('should count lookups by outcome', async () => {
    const deduplicator = new Deduplicator(SMALL);
    deduplicator.check('metrics sample text', 'm-1');
    deduplicator.check('metrics sample text', 'm-2');

    const content = await metrics.getMetricsContent();
    expect(content).toMatch(/dedup_lookups_total\{result="duplicate"\} [1-9]\d*/);
    expect(content).toMatch(/dedup_lookups_total\{result="unique"\} [1-9]\d*/);
  });

  it('should reset the indexed document gauge on clear', async () => {
    const deduplicator = new Deduplicator(SMALL);
    deduplicator.check('gauge sample text', 'g-1');
    deduplicator.clear();

    const content = await metrics.getMetricsContent();
    expect(content).toContain('dedup_indexed_documents 0');
  });
});
