import { ValidationError } from "./errors.js";
import type {
  ChunkMetadata,
  DeleteTarget,
  EmbeddedChunk,
  IndexStats,
  MetadataFilter,
  SearchRequest,
  SearchResult,
} from "./types.js";

export const MAX_SEARCH_LIMIT = 100;
export const MAX_CANDIDATES = 1000;

/**
 * Backend-agnostic vector index. Every instance is bound to one namespace and
 * never reads or writes outside it.
 */
export interface VectorIndex {
  readonly backend: string;
  readonly namespace: string | null;
  /** Insert or replace by id. An empty batch is a ValidationError. */
  upsert(chunks: EmbeddedChunk[]): Promise<void>;
  /** At most one result per page, best score first. */
  search(request: SearchRequest): Promise<SearchResult[]>;
  /** Returns how many records were removed. */
  delete(target: DeleteTarget): Promise<number>;
  stats(): Promise<IndexStats>;
  healthCheck(): Promise<boolean>;
  count(): Promise<number>;
}

/** A raw nearest-neighbour hit before page collapsing. */
export interface Candidate {
  id: string;
  score: number;
  text: string;
  metadata: ChunkMetadata;
}

export function assertUpsertBatch(chunks: EmbeddedChunk[]): void {
  if (chunks.length === 0) {
    throw new ValidationError("Cannot upsert an empty batch");
  }
  const dims = chunks[0]?.vector.length;
  for (const chunk of chunks) {
    if (chunk.vector.length !== dims) {
      throw new ValidationError(
        `Mixed dimensions in upsert batch: ${chunk.id} has ${chunk.vector.length}, expected ${dims}`,
        { context: { id: chunk.id } },
      );
    }
  }
}

export function assertSearchRequest(request: SearchRequest): void {
  const { limit, minScore, vector } = request;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SEARCH_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_SEARCH_LIMIT}`, {
      context: { limit },
    });
  }
  if (minScore !== undefined && (!(minScore >= 0) || minScore > 1)) {
    throw new ValidationError("minScore must be between 0 and 1", { context: { minScore } });
  }
  if (vector.length === 0 || !vector.every(Number.isFinite)) {
    throw new ValidationError("Search vector must be non-empty and finite");
  }
}

/** How many raw candidates to fetch so that `limit` distinct pages survive collapsing. */
export function candidateCount(limit: number, oversample: number): number {
  return Math.min(limit * oversample, MAX_CANDIDATES);
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

function pageKey(metadata: ChunkMetadata): string {
  return JSON.stringify([metadata.collectionId, metadata.pageId]);
}

/**
 * Keep the best-scoring candidate of each page, drop those under `minScore`,
 * then rank and cut to `limit`. Ties keep candidate order.
 */
export function collapseByPage(
  candidates: Candidate[],
  limit: number,
  minScore = 0,
): SearchResult[] {
  const best = new Map<string, Candidate & { order: number }>();

  candidates.forEach((candidate, order) => {
    const score = clampScore(candidate.score);
    if (score < minScore) return;
    const key = pageKey(candidate.metadata);
    const current = best.get(key);
    if (!current || score > current.score) {
      best.set(key, { ...candidate, score, order: current?.order ?? order });
    }
  });

  return [...best.values()]
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, limit)
    .map((c, i) => ({ id: c.id, score: c.score, rank: i + 1, text: c.text, metadata: c.metadata }));
}

export function matchesFilter(
  metadata: ChunkMetadata,
  filter: MetadataFilter | undefined,
): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(
    ([field, value]) => value === undefined || filterField(metadata, field) === value,
  );
}

function filterField(metadata: ChunkMetadata, field: string): string | undefined {
  switch (field) {
    case "collectionId":
      return metadata.collectionId;
    case "pageId":
      return metadata.pageId;
    case "entryId":
      return metadata.entryId;
    case "entryType":
      return metadata.entryType;
    case "author":
      return metadata.author;
    case "embeddingVersion":
      return metadata.embeddingVersion;
    default:
      throw new ValidationError(`Unsupported filter field: ${field}`);
  }
}

export function isEmptyFilter(filter: MetadataFilter): boolean {
  return Object.values(filter).every((v) => v === undefined);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
