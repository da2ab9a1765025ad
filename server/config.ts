import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  // Sketching and banding; LSHIndex enforces bands * rows == numHashFunctions
  DEDUP_THRESHOLD: z.string().optional(),
  DEDUP_TOKENS_IN_WORD: z.string().optional(),
  DEDUP_NUM_HASH_FUNCTIONS: z.string().optional(),
  DEDUP_BANDS: z.string().optional(),
  DEDUP_ROWS: z.string().optional(),
  DEDUP_SEED: z.string().optional(),
  METRICS_ENABLED: z.string().optional(),
  MAX_DOCUMENT_BYTES: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

function toPort(val: string | undefined, fallback: number): number {
  const parsedPort = parseInt(val ?? "", 10);
  return Number.isFinite(parsedPort) ? parsedPort : fallback;
}

function parseIntSetting(val: string | undefined, fallback: number, name: string): number {
  if (val === undefined || val.trim() === "") return fallback;
  if (!/^-?\d+$/.test(val.trim())) {
    console.warn(`${name} is not an integer (${val}). Using default ${fallback}.`);
    return fallback;
  }
  return parseInt(val, 10);
}

function parseFloatSetting(val: string | undefined, fallback: number, name: string): number {
  if (val === undefined || val.trim() === "") return fallback;
  const raw = Number(val);
  if (!Number.isFinite(raw)) {
    console.warn(`${name} is not a number (${val}). Using default ${fallback}.`);
    return fallback;
  }
  return raw;
}

function parseFlag(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined) return fallback;
  return ["1", "true", "yes"].includes(val.toLowerCase());
}

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === "development",
  port: toPort(env.PORT, 5000),
  logLevel: env.LOG_LEVEL ?? "info",
  metricsEnabled: parseFlag(env.METRICS_ENABLED, env.NODE_ENV === "development"),
  maxDocumentBytes: parseIntSetting(env.MAX_DOCUMENT_BYTES, 1_048_576, "MAX_DOCUMENT_BYTES"),
  dedup: {
    threshold: parseFloatSetting(env.DEDUP_THRESHOLD, 0.9, "DEDUP_THRESHOLD"),
    tokensInWord: parseIntSetting(env.DEDUP_TOKENS_IN_WORD, 5, "DEDUP_TOKENS_IN_WORD"),
    numHashFunctions: parseIntSetting(env.DEDUP_NUM_HASH_FUNCTIONS, 400, "DEDUP_NUM_HASH_FUNCTIONS"),
    bands: parseIntSetting(env.DEDUP_BANDS, 20, "DEDUP_BANDS"),
    rows: parseIntSetting(env.DEDUP_ROWS, 20, "DEDUP_ROWS"),
    // Unset means a fresh random hash family per process
    seed: env.DEDUP_SEED ? parseIntSetting(env.DEDUP_SEED, 0, "DEDUP_SEED") : undefined,
  },
} as const;
