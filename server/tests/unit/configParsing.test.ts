import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Helper to import config fresh per test case
async function importFreshConfig() {
  const mod = await import('../../config');
  return mod.config;
}

let originalEnv: NodeJS.ProcessEnv;

const DEDUP_KEYS = [
  'DEDUP_THRESHOLD',
  'DEDUP_TOKENS_IN_WORD',
  'DEDUP_NUM_HASH_FUNCTIONS',
  'DEDUP_BANDS',
  'DEDUP_ROWS',
  'DEDUP_SEED',
  'METRICS_ENABLED',
  'MAX_DOCUMENT_BYTES',
  'PORT',
];

describe('Config Parsing - Deduplication Settings', () => {
  beforeEach(() => {
    // Preserve env and reset modules for fresh import behavior
    originalEnv = { ...process.env };
    vi.resetModules();
    process.env.NODE_ENV = 'test';
    for (const key of DEDUP_KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('should use sane defaults when env vars are absent', async () => {
    const config = await importFreshConfig();

    expect(config.port).toBe(5000);
    expect(config.metricsEnabled).toBe(false);
    expect(config.maxDocumentBytes).toBe(1048576);
    expect(config.dedup).toEqual({
      threshold: 0.9,
      tokensInWord: 5,
      numHashFunctions: 400,
      bands: 20,
      rows: 20,
      seed: undefined,
    });
  });

  it('should parse banding and seed values', async () => {
    process.env.DEDUP_THRESHOLD = '0.75';
    process.env.DEDUP_TOKENS_IN_WORD = '3';
    process.env.DEDUP_NUM_HASH_FUNCTIONS = '128';
    process.env.DEDUP_BANDS = '32';
    process.env.DEDUP_ROWS = '4';
    process.env.DEDUP_SEED = '42';

    const config = await importFreshConfig();

    expect(config.dedup).toEqual({
      threshold: 0.75,
      tokensInWord: 3,
      numHashFunctions: 128,
      bands: 32,
      rows: 4,
      seed: 42,
    });
  });

  it('should fall back to defaults for non-numeric values', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    process.env.DEDUP_BANDS = 'twenty';
    process.env.DEDUP_THRESHOLD = 'high';

    const config = await importFreshConfig();

    expect(config.dedup.bands).toBe(20);
    expect(config.dedup.threshold).toBe(0.9);
    expect(warn).toHaveBeenCalledWith('DEDUP_BANDS is not an integer (twenty). Using default 20.');
    expect(warn).toHaveBeenCalledWith('DEDUP_THRESHOLD is not a number (high). Using default 0.9.');
  });

  it('should pass out-of-range values through for the index to reject', async () => {
    process.env.DEDUP_THRESHOLD = '85';
    process.env.DEDUP_ROWS = '0';

    const config = await importFreshConfig();

    expect(config.dedup.threshold).toBe(85);
    expect(config.dedup.rows).toBe(0);
  });

  it('should read the metrics flag', async () => {
    process.env.METRICS_ENABLED = 'yes';
    expect((await importFreshConfig()).metricsEnabled).toBe(true);

    vi.resetModules();
    process.env.METRICS_ENABLED = 'false';
    expect((await importFreshConfig()).metricsEnabled).toBe(false);
  });

  it('should enable metrics by default in development', async () => {
    process.env.NODE_ENV = 'development';
    expect((await importFreshConfig()).metricsEnabled).toBe(true);
  });

  it('should fail fast on an invalid NODE_ENV', async () => {
    process.env.NODE_ENV = 'staging';
    await expect(importFreshConfig()).rejects.toThrow('Invalid environment variables');
  });
});
