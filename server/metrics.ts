import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';

// Dedicated registry to avoid default global pollution
const register = new Registry();
collectDefaultMetrics({ register, prefix: 'app_' });

// Buckets tuned for ms latencies of in-memory sketching
const LATENCY_BUCKETS = [0.1, 0.5, 1, 2, 5, 10, 20, 50, 100, 200, 500];

const CANDIDATE_BUCKETS = [0, 1, 2, 5, 10, 20, 50, 100, 500];

const dedupLookupsTotal = new Counter({
  name: 'dedup_lookups_total',
  help: 'Total document lookups by outcome',
  labelNames: ['result'], // result: duplicate | unique
  registers: [register],
});

const dedupLookupLatencyMs = new Histogram({
  name: 'dedup_lookup_latency_ms',
  help: 'Latency of sketch-and-lookup in milliseconds',
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const dedupCandidatesCompared = new Histogram({
  name: 'dedup_candidates_compared',
  help: 'Stored sketches compared per lookup',
  buckets: CANDIDATE_BUCKETS,
  registers: [register],
});

const dedupIndexedDocuments = new Gauge({
  name: 'dedup_indexed_documents',
  help: 'Documents currently held by the LSH index',
  registers: [register],
});

const dedupIndexClearsTotal = new Counter({
  name: 'dedup_index_clears_total',
  help: 'Total full index clears',
  registers: [register],
});

// HTTP API request latency and totals
const apiRequestLatencyMs = new Histogram({
  name: 'api_request_latency_ms',
  help: 'Latency of API requests in milliseconds',
  labelNames: ['endpoint', 'method', 'status'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const apiRequestsTotal = new Counter({
  name: 'api_requests_total',
  help: 'Total API requests by endpoint, method, and status',
  labelNames: ['endpoint', 'method', 'status'],
  registers: [register],
});

// Helpers
function recordLookup(isDuplicate: boolean, durationMs: number, candidatesCompared: number, documents: number) {
  dedupLookupsTotal.labels(isDuplicate ? 'duplicate' : 'unique').inc();
  dedupLookupLatencyMs.observe(durationMs);
  dedupCandidatesCompared.observe(candidatesCompared);
  dedupIndexedDocuments.set(documents);
}

function recordClear() {
  dedupIndexClearsTotal.inc();
  dedupIndexedDocuments.set(0);
}

function observeApiRequest(endpoint: string, method: string, status: number, durationMs: number) {
  const statusStr = String(status);
  apiRequestLatencyMs.labels(endpoint, method, statusStr).observe(durationMs);
  apiRequestsTotal.labels(endpoint, method, statusStr).inc();
}

async function getMetricsContent(): Promise<string> {
  return await register.metrics();
}

export const metrics = {
  register,
  dedupLookupsTotal,
  dedupLookupLatencyMs,
  dedupCandidatesCompared,
  dedupIndexedDocuments,
  dedupIndexClearsTotal,
  apiRequestLatencyMs,
  apiRequestsTotal,
  recordLookup,
  recordClear,
  observeApiRequest,
  getMetricsContent,
} as const;
