/**
 * Batch Deduplication Script
 *
 * Runs every line of a file through the deduplicator and prints which lines
 * are near-duplicates of earlier ones.
 *
 * Usage: npm run dedupe:file -- <path> [threshold]
 */

import { readFileSync } from 'fs';
import { Deduplicator } from '../utils/deduplication';
import { config } from '../config';

const [path, thresholdArg] = process.argv.slice(2);

if (!path) {
  console.error('Usage: dedupeFile <path> [threshold]');
  process.exit(1);
}

const threshold = thresholdArg !== undefined ? Number(thresholdArg) : config.dedup.threshold;
const deduplicator = new Deduplicator({ ...config.dedup, threshold });

const lines = readFileSync(path, 'utf-8').split('\n');
let duplicates = 0;
let checked = 0;

console.log(`🧪 Deduplicating ${path} (threshold ${threshold})\n`);

lines.forEach((line, i) => {
  if (line.trim().length === 0) return;
  checked++;

  const lineId = `line ${i + 1}`;
  const result = deduplicator.check(line, lineId);
  if (result.isDuplicate) {
    duplicates++;
    console.log(
      `${lineId} duplicates ${result.matchedDocumentId} ` +
      `(similarity ${(result.similarity ?? 0).toFixed(4)})`
    );
  }
});

const stats = deduplicator.getStats();
console.log(`\nChecked: ${checked}`);
console.log(`Duplicates: ${duplicates}`);
console.log(`Unique: ${stats.documents}`);
console.log(`Buckets: ${stats.totalBuckets} (max size ${stats.maxBucketSize}, avg ${stats.avgBucketSize.toFixed(2)})`);
