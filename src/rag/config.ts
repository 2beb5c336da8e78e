import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const RAG_DEFAULTS = {
  chunkSize: 400,
  chunkOverlap: 50,
  tokenizer: "cl100k_base",
  preserveBoundaries: true,

  embeddingModel: "openai/text-embedding-3-small",
  embeddingVersion: "v1",
  embeddingDimensions: 1536,
  embeddingBatchSize: 100,
  embeddingConcurrency: 4,
  embeddingBaseUrl: "https://api.openai.com/v1",
  maxRetries: 3,
  requestTimeoutMs: 30_000,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 30_000,

  indexBackend: "vectra",
  indexName: "notebook-semantic-search",
  indexPath: ".rag-cache/vectra",
  searchOversample: 5,

  embeddingsDir: "data/embeddings",
  lockTimeoutMs: 30_000,

  exportDir: "data/notebooks",

  buildRecordPath: "data/.last_indexed",
  unitConcurrency: 4,
  driftTolerance: 0,
} as const;

export const chunkingConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(RAG_DEFAULTS.chunkSize),
    overlap: z.number().int().nonnegative().default(RAG_DEFAULTS.chunkOverlap),
    tokenizer: z.string().min(1).default(RAG_DEFAULTS.tokenizer),
    preserveBoundaries: z.boolean().default(RAG_DEFAULTS.preserveBoundaries),
  })
  .refine((c) => c.overlap < c.chunkSize, {
    message: "overlap must be less than chunkSize",
    path: ["overlap"],
  });

export const embeddingConfigSchema = z.object({
  model: z.string().min(1).default(RAG_DEFAULTS.embeddingModel),
  version: z.string().min(1).default(RAG_DEFAULTS.embeddingVersion),
  dimensions: z.number().int().min(128).max(4096).default(RAG_DEFAULTS.embeddingDimensions),
  batchSize: z.number().int().min(1).max(500).default(RAG_DEFAULTS.embeddingBatchSize),
  concurrency: z.number().int().min(1).max(32).default(RAG_DEFAULTS.embeddingConcurrency),
  maxRetries: z.number().int().min(1).max(10).default(RAG_DEFAULTS.maxRetries),
  timeoutMs: z.number().int().min(1_000).max(300_000).default(RAG_DEFAULTS.requestTimeoutMs),
  baseDelayMs: z.number().int().nonnegative().default(RAG_DEFAULTS.retryBaseDelayMs),
  maxDelayMs: z.number().int().nonnegative().default(RAG_DEFAULTS.retryMaxDelayMs),
  baseUrl: z.string().url().default(RAG_DEFAULTS.embeddingBaseUrl),
  apiKey: z.string().optional(),
});

export const indexConfigSchema = z.object({
  backend: z.enum(["vectra", "memory"]).default(RAG_DEFAULTS.indexBackend),
  indexName: z.string().min(1).default(RAG_DEFAULTS.indexName),
  namespace: z.string().min(1).nullable().default(null),
  path: z.string().min(1).default(RAG_DEFAULTS.indexPath),
  timeoutMs: z.number().int().positive().default(RAG_DEFAULTS.requestTimeoutMs),
  oversample: z.number().int().min(1).max(50).default(RAG_DEFAULTS.searchOversample),
});

export const persistenceConfigSchema = z.object({
  basePath: z.string().min(1).default(RAG_DEFAULTS.embeddingsDir),
  lockTimeoutMs: z.number().int().positive().default(RAG_DEFAULTS.lockTimeoutMs),
  trackArtifacts: z.boolean().default(false),
});

export const syncConfigSchema = z.object({
  recordPath: z.string().min(1).default(RAG_DEFAULTS.buildRecordPath),
  unitConcurrency: z.number().int().min(1).max(64).default(RAG_DEFAULTS.unitConcurrency),
  driftTolerance: z.number().int().nonnegative().default(RAG_DEFAULTS.driftTolerance),
});

export const sourceConfigSchema = z.object({
  exportDir: z.string().min(1).default(RAG_DEFAULTS.exportDir),
  collectionIds: z.array(z.string().min(1)).default([]),
});

export const indexingConfigSchema = z.object({
  chunking: chunkingConfigSchema.default({}),
  embedding: embeddingConfigSchema.default({}),
  index: indexConfigSchema.default({}),
  persistence: persistenceConfigSchema.default({}),
  sync: syncConfigSchema.default({}),
  source: sourceConfigSchema.default({}),
});

export type ChunkingConfig = z.infer<typeof chunkingConfigSchema>;
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>;
export type IndexConfig = z.infer<typeof indexConfigSchema>;
export type PersistenceConfig = z.infer<typeof persistenceConfigSchema>;
export type SyncConfig = z.infer<typeof syncConfigSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type IndexingConfig = z.infer<typeof indexingConfigSchema>;
export type IndexingConfigInput = z.input<typeof indexingConfigSchema>;

export function parseConfig(input: IndexingConfigInput): IndexingConfig {
  const parsed = indexingConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, {
      context: { issues },
    });
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function num(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got ${JSON.stringify(raw)}`);
  }
  return value;
}

function bool(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigurationError(`${key} must be true or false, got ${JSON.stringify(raw)}`);
}

function str(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw === undefined || raw === "" ? undefined : raw;
}

function list(env: Env, key: string): string[] | undefined {
  const raw = str(env, key);
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function resolved(value: string | undefined): string | undefined {
  return value === undefined ? undefined : path.resolve(value);
}

/**
 * Build the configuration from environment variables. Unset variables take the
 * defaults in {@link RAG_DEFAULTS}; paths are resolved against the cwd.
 */
export function loadConfig(env: Env = process.env): IndexingConfig {
  const backend = str(env, "INDEX_BACKEND");
  if (backend !== undefined && backend !== "vectra" && backend !== "memory") {
    throw new ConfigurationError(`INDEX_BACKEND must be "vectra" or "memory", got "${backend}"`);
  }

  return parseConfig({
    chunking: {
      chunkSize: num(env, "CHUNK_SIZE"),
      overlap: num(env, "CHUNK_OVERLAP"),
      tokenizer: str(env, "CHUNK_TOKENIZER"),
      preserveBoundaries: bool(env, "CHUNK_PRESERVE_BOUNDARIES"),
    },
    embedding: {
      model: str(env, "EMBEDDING_MODEL"),
      version: str(env, "EMBEDDING_VERSION"),
      dimensions: num(env, "EMBEDDING_DIMENSIONS"),
      batchSize: num(env, "EMBEDDING_BATCH_SIZE"),
      concurrency: num(env, "EMBEDDING_CONCURRENCY"),
      maxRetries: num(env, "EMBEDDING_MAX_RETRIES"),
      timeoutMs: num(env, "EMBEDDING_TIMEOUT_MS"),
      baseDelayMs: num(env, "EMBEDDING_RETRY_BASE_MS"),
      maxDelayMs: num(env, "EMBEDDING_RETRY_MAX_MS"),
      baseUrl: str(env, "EMBEDDING_BASE_URL"),
      apiKey: str(env, "EMBEDDING_API_KEY") ?? str(env, "OPENAI_API_KEY"),
    },
    index: {
      backend,
      indexName: str(env, "INDEX_NAME"),
      namespace: str(env, "INDEX_NAMESPACE") ?? null,
      path: resolved(str(env, "INDEX_PATH")) ?? path.resolve(RAG_DEFAULTS.indexPath),
      timeoutMs: num(env, "INDEX_TIMEOUT_MS"),
      oversample: num(env, "SEARCH_OVERSAMPLE"),
    },
    persistence: {
      basePath: resolved(str(env, "EMBEDDINGS_DIR")) ?? path.resolve(RAG_DEFAULTS.embeddingsDir),
      lockTimeoutMs: num(env, "LOCK_TIMEOUT_MS"),
      trackArtifacts: bool(env, "TRACK_ARTIFACTS"),
    },
    sync: {
      recordPath:
        resolved(str(env, "BUILD_RECORD_PATH")) ?? path.resolve(RAG_DEFAULTS.buildRecordPath),
      unitConcurrency: num(env, "SYNC_CONCURRENCY"),
      driftTolerance: num(env, "DRIFT_TOLERANCE"),
    },
    source: {
      exportDir:
        resolved(str(env, "NOTEBOOK_EXPORT_DIR")) ?? path.resolve(RAG_DEFAULTS.exportDir),
      collectionIds: list(env, "NOTEBOOK_COLLECTIONS"),
    },
  });
}
