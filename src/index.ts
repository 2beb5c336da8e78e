import { createVectorIndex } from "./rag/backends/index.js";
import { BuildStateStore } from "./rag/build-state.js";
import { TokenChunker } from "./rag/chunking/index.js";
import type { IndexingConfig } from "./rag/config.js";
import { checkDrift, restoreIndexFromLocal, type DriftReport } from "./rag/drift.js";
import { createEmbeddingClient, type EmbeddingClient } from "./rag/embedding-service.js";
import { LocalPersistence } from "./rag/local-store.js";
import { PageIndexer } from "./rag/page-indexer.js";
import { SearchService } from "./rag/retriever.js";
import { SyncService, type ContentSource } from "./rag/sync-service.js";
import type { VectorIndex } from "./rag/vector-store.js";

export * from "./rag/errors.js";
export { loadConfig, parseConfig, RAG_DEFAULTS } from "./rag/config.js";
export type { IndexingConfig, IndexingConfigInput } from "./rag/config.js";
export { logger, getLogger } from "./rag/logger.js";
export { RetryPolicy } from "./rag/retry.js";
export { chunkText, getTokenizer, registerTokenizer, TokenChunker } from "./rag/chunking/index.js";
export type { ChunkingStrategy, ChunkOptions, Tokenizer } from "./rag/chunking/index.js";
export {
  EmbeddingClient,
  OpenAICompatibleProvider,
  createEmbeddingClient,
} from "./rag/embedding-service.js";
export type { EmbeddingInput, EmbeddingProvider } from "./rag/embedding-service.js";
export { collapseByPage } from "./rag/vector-store.js";
export type { VectorIndex } from "./rag/vector-store.js";
export { createVectorIndex, MemoryVectorIndex, VectraIndex } from "./rag/backends/index.js";
export { LocalPersistence } from "./rag/local-store.js";
export { GitArtifactTracker } from "./rag/artifact-tracker.js";
export type { ArtifactTracker } from "./rag/artifact-tracker.js";
export { BuildStateStore, configFingerprint, fingerprintUnit } from "./rag/build-state.js";
export { extractEntries, htmlToText, normalizeEntryType } from "./rag/entries.js";
export { PageIndexer, unitIdFor } from "./rag/page-indexer.js";
export { planSync } from "./rag/sync-planner.js";
export { SyncService } from "./rag/sync-service.js";
export type {
  ContentSource,
  SyncRequest,
  SyncResponse,
  SyncScope,
} from "./rag/sync-service.js";
export { JsonDirectorySource } from "./rag/json-source.js";
export { SearchService } from "./rag/retriever.js";
export type { SearchHit, SearchQuery, SearchResponse } from "./rag/retriever.js";
export { assertNoDrift, checkDrift, restoreIndexFromLocal } from "./rag/drift.js";
export type { DriftReport } from "./rag/drift.js";
export * from "./rag/models.js";
export type {
  Chunk,
  DeleteTarget,
  IndexableEntry,
  IndexStats,
  MetadataFilter,
  PageRef,
  ProgressCallback,
  SearchRequest,
  SearchResult,
  SourceEntry,
  SourceUnit,
  SyncAction,
  SyncFlags,
  SyncPlan,
  SyncReason,
  UnitIndexResult,
} from "./rag/types.js";

export interface IndexingSystem {
  config: IndexingConfig;
  embedder: EmbeddingClient;
  index: VectorIndex;
  store: LocalPersistence;
  state: BuildStateStore;
  indexer: PageIndexer;
  sync: SyncService;
  search: SearchService;
  checkDrift(): Promise<DriftReport>;
  restoreIndex(): Promise<number>;
}

export interface IndexingSystemOverrides {
  embedder?: EmbeddingClient;
  index?: VectorIndex;
  now?: () => Date;
}

/** Wire every component from one configuration. */
export function createIndexingSystem(
  config: IndexingConfig,
  source: ContentSource,
  overrides: IndexingSystemOverrides = {},
): IndexingSystem {
  const version = config.embedding.version;
  const embedder = overrides.embedder ?? createEmbeddingClient(config.embedding);
  const index = overrides.index ?? createVectorIndex(config.index, version);
  const store = new LocalPersistence(config.persistence, version);
  const state = new BuildStateStore(config.sync.recordPath);
  const indexer = new PageIndexer({
    chunker: new TokenChunker(config.chunking),
    embedder,
    store,
    index,
    embeddingVersion: version,
  });

  return {
    config,
    embedder,
    index,
    store,
    state,
    indexer,
    sync: new SyncService({
      source,
      indexer,
      state,
      config,
      collectionIds: config.source.collectionIds,
      now: overrides.now,
    }),
    search: new SearchService(index, embedder),
    checkDrift: () => checkDrift(store, index, config.sync.driftTolerance),
    restoreIndex: () => restoreIndexFromLocal(store, index),
  };
}
