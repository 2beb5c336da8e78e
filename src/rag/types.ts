import type { ChunkMetadata, EntryType } from "./models.js";

export type { BuildRecord, ChunkMetadata, EmbeddedChunk, EntryType } from "./models.js";

export interface Chunk {
  unitId: string;
  chunkIndex: number;
  /** Offsets are Unicode code points, not UTF-16 units or bytes. */
  startChar: number;
  endChar: number;
  startToken: number;
  text: string;
  tokenCount: number;
}

/** A page as enumerated by the content source. One page is one source unit. */
export interface PageRef {
  collectionId: string;
  collectionName: string;
  pageId: string;
  pageTitle: string;
  folderPath?: string;
}

export interface SourceEntry {
  entryId: string;
  /** Raw type as reported upstream, e.g. "text entry", "heading", "Attachment". */
  entryType: string;
  content: string;
  author: string;
  createdAt?: string;
  updatedAt?: string;
  tags?: string[];
  url: string;
}

export interface IndexableEntry {
  entryId: string;
  entryType: EntryType;
  text: string;
  source: SourceEntry;
}

export interface SourceUnit {
  unitId: string;
  page: PageRef;
  entries: SourceEntry[];
}

export type FilterField =
  | "collectionId"
  | "pageId"
  | "entryId"
  | "entryType"
  | "author"
  | "embeddingVersion";

export type MetadataFilter = Partial<Record<FilterField, string>>;

export interface SearchRequest {
  vector: number[];
  limit: number;
  minScore?: number;
  filter?: MetadataFilter;
}

export interface SearchResult {
  id: string;
  score: number;
  rank: number;
  text: string;
  metadata: ChunkMetadata;
}

export interface IndexStats {
  totalChunks: number;
  totalCollections: number;
  dimensions: number | null;
  embeddingVersion: string;
  namespace: string | null;
  lastUpdated: string | null;
}

export type DeleteTarget = { ids: string[] } | { filter: MetadataFilter };

export type SyncAction = "skip" | "incremental" | "rebuild";

export type SyncReason =
  | "force"
  | "no_record"
  | "config_changed"
  | "embedding_changed"
  | "stale"
  | "content_changed"
  | "up_to_date";

export interface SyncFlags {
  force: boolean;
  dryRun: boolean;
  maxAgeHours?: number;
}

export interface SyncPlan {
  action: SyncAction;
  reason: SyncReason;
  affectedUnits: string[];
  flags: SyncFlags;
  builtAt: string | null;
}

export interface UnitIndexResult {
  unitId: string;
  chunkCount: number;
  skippedEntries: number;
  deletedChunks: number;
}

export type ProgressCallback = (done: number, total: number) => void;
