import path from "node:path";
import { LocalIndex } from "vectra";
import type { IndexConfig } from "../config.js";
import { getErrorMessage, ValidationError, withTimeout } from "../errors.js";
import { getLogger } from "../logger.js";
import { createChunkMetadata, entryTypeSchema } from "../models.js";
import { RetryPolicy } from "../retry.js";
import type {
  ChunkMetadata,
  DeleteTarget,
  EmbeddedChunk,
  IndexStats,
  MetadataFilter,
  SearchRequest,
  SearchResult,
} from "../types.js";
import {
  assertSearchRequest,
  assertUpsertBatch,
  candidateCount,
  collapseByPage,
  isEmptyFilter,
  type Candidate,
  type VectorIndex,
} from "../vector-store.js";

const log = getLogger("vectra");

const DEFAULT_NAMESPACE = "_default";

type FlatMetadata = Record<string, string | number | boolean>;

/** vectra only stores scalar metadata; tags are kept as a JSON string. */
function flatten(chunk: EmbeddedChunk): FlatMetadata {
  const { metadata } = chunk;
  return {
    text: chunk.text,
    collectionId: metadata.collectionId,
    collectionName: metadata.collectionName,
    pageId: metadata.pageId,
    pageTitle: metadata.pageTitle,
    entryId: metadata.entryId,
    entryType: metadata.entryType,
    author: metadata.author,
    date: metadata.date,
    folderPath: metadata.folderPath ?? "",
    tags: JSON.stringify(metadata.tags),
    url: metadata.url,
    embeddingVersion: metadata.embeddingVersion,
  };
}

function text(meta: Record<string, unknown>, key: string): string {
  const value = meta[key];
  return typeof value === "string" ? value : String(value ?? "");
}

function parseTags(raw: string): string[] {
  if (raw === "") return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.map(String) : [];
}

function unflatten(meta: Record<string, unknown>): { text: string; metadata: ChunkMetadata } {
  const folderPath = text(meta, "folderPath");
  return {
    text: text(meta, "text"),
    metadata: createChunkMetadata({
      collectionId: text(meta, "collectionId"),
      collectionName: text(meta, "collectionName"),
      pageId: text(meta, "pageId"),
      pageTitle: text(meta, "pageTitle"),
      entryId: text(meta, "entryId"),
      entryType: entryTypeSchema.parse(text(meta, "entryType")),
      author: text(meta, "author"),
      date: text(meta, "date"),
      folderPath: folderPath === "" ? undefined : folderPath,
      tags: parseTags(text(meta, "tags")),
      url: text(meta, "url"),
      embeddingVersion: text(meta, "embeddingVersion"),
    }),
  };
}

function toVectraFilter(filter: MetadataFilter): Record<string, { $eq: string }> {
  const out: Record<string, { $eq: string }> = {};
  for (const [field, value] of Object.entries(filter)) {
    if (value !== undefined) out[field] = { $eq: value };
  }
  return out;
}

export interface VectraIndexOptions {
  embeddingVersion: string;
  retry?: RetryPolicy;
}

/**
 * Vector index on a vectra `LocalIndex`. Each namespace gets its own folder
 * under `<path>/<indexName>/`.
 */
export class VectraIndex implements VectorIndex {
  readonly backend = "vectra";
  readonly namespace: string | null;
  readonly folder: string;
  private readonly index: LocalIndex;
  private readonly retry: RetryPolicy;
  private readonly embeddingVersion: string;
  private ready: Promise<void> | undefined;
  // vectra allows a single pending update per index.
  private writes: Promise<unknown> = Promise.resolve();
  /** Last write started, settled or not; a write that timed out may still be running. */
  private inFlight: Promise<unknown> = Promise.resolve();
  private lastUpdated: string | null = null;

  constructor(
    private readonly config: IndexConfig,
    options: VectraIndexOptions,
  ) {
    this.namespace = config.namespace;
    this.embeddingVersion = options.embeddingVersion;
    this.folder = path.join(config.path, config.indexName, config.namespace ?? DEFAULT_NAMESPACE);
    this.index = new LocalIndex(this.folder);
    this.retry =
      options.retry ?? new RetryPolicy({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 5_000 });
  }

  private ensureIndex(): Promise<void> {
    this.ready ??= (async () => {
      if (!(await this.index.isIndexCreated())) {
        log.info({ folder: this.folder }, "creating vectra index");
        await this.index.createIndex();
      }
    })().catch((error: unknown) => {
      this.ready = undefined;
      throw error;
    });
    return this.ready;
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.retry.execute(
      async () => {
        await this.ensureIndex();
        return withTimeout(fn(), this.config.timeoutMs, `vectra ${operation}`);
      },
      { operation: `vectra ${operation}` },
    );
  }

  /**
   * Runs a write after every earlier one. Each attempt, retries included,
   * first waits for the previous attempt's update to settle, so vectra never
   * sees two `beginUpdate` calls at once. Only the update itself is timed.
   */
  private write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const label = `vectra ${operation}`;
    const run = this.writes.then(() =>
      this.retry.execute(
        async () => {
          await this.ensureIndex();
          await this.inFlight;
          const work = fn();
          this.inFlight = work.catch(() => undefined);
          return withTimeout(work, this.config.timeoutMs, label);
        },
        { operation: label },
      ),
    );
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async update(apply: () => Promise<void>): Promise<void> {
    await this.index.beginUpdate();
    try {
      await apply();
      await this.index.endUpdate();
    } catch (error) {
      this.index.cancelUpdate();
      throw error;
    }
    this.lastUpdated = new Date().toISOString();
  }

  async upsert(chunks: EmbeddedChunk[]): Promise<void> {
    assertUpsertBatch(chunks);
    await this.write("upsert", () =>
      this.update(async () => {
        for (const chunk of chunks) {
          await this.index.upsertItem({
            id: chunk.id,
            vector: chunk.vector,
            metadata: flatten(chunk),
          });
        }
      }),
    );
    log.debug({ namespace: this.namespace, count: chunks.length }, "upserted chunks");
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    assertSearchRequest(request);
    const topK = candidateCount(request.limit, this.config.oversample);
    const filter = request.filter ? toVectraFilter(request.filter) : undefined;

    const hits = await this.call("query", () =>
      filter && Object.keys(filter).length > 0
        ? this.index.queryItems(request.vector, topK, filter)
        : this.index.queryItems(request.vector, topK),
    );

    const candidates: Candidate[] = hits.map((hit) => ({
      id: hit.item.id,
      score: hit.score,
      ...unflatten(hit.item.metadata),
    }));
    return collapseByPage(candidates, request.limit, request.minScore);
  }

  async delete(target: DeleteTarget): Promise<number> {
    if ("filter" in target && isEmptyFilter(target.filter)) {
      throw new ValidationError("Refusing to delete with an empty filter");
    }
    return this.write("delete", async () => {
      let ids: string[];
      if ("ids" in target) {
        ids = [];
        for (const id of target.ids) {
          if (await this.index.getItem(id)) ids.push(id);
        }
      } else {
        const items = await this.index.listItemsByMetadata(toVectraFilter(target.filter));
        ids = items.map((item) => item.id);
      }
      if (ids.length === 0) return 0;

      await this.update(async () => {
        for (const id of ids) await this.index.deleteItem(id);
      });
      return ids.length;
    });
  }

  async stats(): Promise<IndexStats> {
    const items = await this.call("stats", () => this.index.listItems());
    return {
      totalChunks: items.length,
      totalCollections: new Set(items.map((item) => text(item.metadata, "collectionId"))).size,
      dimensions: items[0]?.vector.length ?? null,
      embeddingVersion: this.embeddingVersion,
      namespace: this.namespace,
      lastUpdated: this.lastUpdated,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.call("health", () => this.index.getIndexStats());
      return true;
    } catch (error) {
      log.warn({ folder: this.folder }, `vectra health check failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  async count(): Promise<number> {
    const items = await this.call("count", () => this.index.listItems());
    return items.length;
  }
}
