import type {
  DeleteTarget,
  EmbeddedChunk,
  IndexStats,
  SearchRequest,
  SearchResult,
} from "../types.js";
import {
  assertSearchRequest,
  assertUpsertBatch,
  candidateCount,
  collapseByPage,
  cosineSimilarity,
  isEmptyFilter,
  matchesFilter,
  type Candidate,
  type VectorIndex,
} from "../vector-store.js";
import { ValidationError } from "../errors.js";

/** Namespace → id → record. Share one between instances to model one physical backend. */
export type MemoryStore = Map<string, Map<string, EmbeddedChunk>>;

const DEFAULT_NAMESPACE = "__default__";

export interface MemoryVectorIndexOptions {
  namespace: string | null;
  embeddingVersion: string;
  oversample?: number;
  store?: MemoryStore;
}

/** In-process index with exact cosine search. */
export class MemoryVectorIndex implements VectorIndex {
  readonly backend = "memory";
  readonly namespace: string | null;
  private readonly embeddingVersion: string;
  private readonly oversample: number;
  private readonly store: MemoryStore;
  private lastUpdated: string | null = null;

  constructor(options: MemoryVectorIndexOptions) {
    this.namespace = options.namespace;
    this.embeddingVersion = options.embeddingVersion;
    this.oversample = options.oversample ?? 5;
    this.store = options.store ?? new Map();
  }

  private get records(): Map<string, EmbeddedChunk> {
    const key = this.namespace ?? DEFAULT_NAMESPACE;
    let records = this.store.get(key);
    if (!records) {
      records = new Map();
      this.store.set(key, records);
    }
    return records;
  }

  async upsert(chunks: EmbeddedChunk[]): Promise<void> {
    assertUpsertBatch(chunks);
    const dims = (await this.stats()).dimensions;
    const incoming = chunks[0]?.vector.length;
    if (dims !== null && incoming !== dims) {
      throw new ValidationError(`Index holds ${dims}-dimensional vectors, got ${incoming}`);
    }
    for (const chunk of chunks) {
      this.records.set(chunk.id, { ...chunk, vector: [...chunk.vector] });
    }
    this.lastUpdated = new Date().toISOString();
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    assertSearchRequest(request);
    const candidates: Candidate[] = [];
    for (const record of this.records.values()) {
      if (!matchesFilter(record.metadata, request.filter)) continue;
      candidates.push({
        id: record.id,
        score: cosineSimilarity(request.vector, record.vector),
        text: record.text,
        metadata: record.metadata,
      });
    }
    candidates.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
    const top = candidates.slice(0, candidateCount(request.limit, this.oversample));
    return collapseByPage(top, request.limit, request.minScore);
  }

  async delete(target: DeleteTarget): Promise<number> {
    const records = this.records;
    let removed = 0;
    if ("ids" in target) {
      for (const id of target.ids) {
        if (records.delete(id)) removed++;
      }
    } else {
      if (isEmptyFilter(target.filter)) {
        throw new ValidationError("Refusing to delete with an empty filter");
      }
      for (const [id, record] of records) {
        if (matchesFilter(record.metadata, target.filter) && records.delete(id)) removed++;
      }
    }
    if (removed > 0) this.lastUpdated = new Date().toISOString();
    return removed;
  }

  async stats(): Promise<IndexStats> {
    const records = [...this.records.values()];
    return {
      totalChunks: records.length,
      totalCollections: new Set(records.map((r) => r.metadata.collectionId)).size,
      dimensions: records[0]?.vector.length ?? null,
      embeddingVersion: this.embeddingVersion,
      namespace: this.namespace,
      lastUpdated: this.lastUpdated,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
