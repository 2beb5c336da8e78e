import type { ChunkingStrategy } from "./chunking/index.js";
import type { EmbeddingClient, EmbeddingInput } from "./embedding-service.js";
import { extractEntries, type ExtractionResult } from "./entries.js";
import { ValidationError } from "./errors.js";
import type { LocalPersistence } from "./local-store.js";
import { getLogger } from "./logger.js";
import {
  chunkId,
  createChunkMetadata,
  createEmbeddedChunk,
  MAX_CHUNK_TEXT_LENGTH,
} from "./models.js";
import type {
  ChunkMetadata,
  EmbeddedChunk,
  IndexableEntry,
  PageRef,
  SourceUnit,
  UnitIndexResult,
} from "./types.js";
import type { VectorIndex } from "./vector-store.js";

const log = getLogger("page-indexer");

const EPOCH = "1970-01-01T00:00:00.000Z";

export function unitIdFor(page: Pick<PageRef, "collectionId" | "pageId">): string {
  return `${page.collectionId}_${page.pageId}`;
}

/** Last modification time of the entry as ISO-8601; entries without one sort as the epoch. */
export function entryDate(entry: IndexableEntry): string {
  const raw = entry.source.updatedAt ?? entry.source.createdAt;
  if (raw === undefined || raw.trim() === "") return EPOCH;
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Entry ${entry.entryId} has an invalid timestamp: ${raw}`, {
      context: { entryId: entry.entryId },
    });
  }
  return date.toISOString();
}

export function buildMetadata(
  page: PageRef,
  entry: IndexableEntry,
  embeddingVersion: string,
): ChunkMetadata {
  return createChunkMetadata({
    collectionId: page.collectionId,
    collectionName: page.collectionName,
    pageId: page.pageId,
    pageTitle: page.pageTitle,
    entryId: entry.entryId,
    entryType: entry.entryType,
    author: entry.source.author,
    date: entryDate(entry),
    ...(page.folderPath ? { folderPath: page.folderPath } : {}),
    tags: entry.source.tags ?? [],
    url: entry.source.url,
    embeddingVersion,
  });
}

export interface PageIndexerDeps {
  chunker: ChunkingStrategy;
  embedder: EmbeddingClient;
  store: LocalPersistence;
  index: VectorIndex;
  embeddingVersion: string;
}

/**
 * Runs one source unit through chunk → embed → persist locally → update the
 * vector index. Each step finishes before the next starts.
 */
export class PageIndexer {
  constructor(private readonly deps: PageIndexerDeps) {}

  async indexUnit(unit: SourceUnit, extracted?: ExtractionResult): Promise<UnitIndexResult> {
    const { chunker, embedder, store, index, embeddingVersion } = this.deps;
    const { entries, skipped } = extracted ?? extractEntries(unit.entries);

    const pending: Array<EmbeddingInput & { metadata: ChunkMetadata }> = [];
    for (const entry of entries) {
      const metadata = buildMetadata(unit.page, entry, embeddingVersion);
      for (const chunk of chunker.chunk(unit.unitId, entry.text)) {
        const { collectionId, pageId } = unit.page;
        const id = chunkId(collectionId, pageId, entry.entryId, chunk.chunkIndex);
        // Checked before any embedding call is spent on the unit.
        if (chunk.text.length > MAX_CHUNK_TEXT_LENGTH) {
          throw new ValidationError(
            `Chunk ${id} is ${chunk.text.length} characters, over ${MAX_CHUNK_TEXT_LENGTH}`,
            { context: { chunkId: id, length: chunk.text.length } },
          );
        }
        pending.push({
          id,
          text: chunk.text,
          metadata,
        });
      }
    }

    log.debug(
      { unitId: unit.unitId, entries: entries.length, chunks: pending.length },
      "embedding unit",
    );
    const vectors = await embedder.embed(pending, {
      onProgress: (done, total) => log.debug({ unitId: unit.unitId, done, total }, "embedding"),
    });

    const chunks: EmbeddedChunk[] = pending.map(({ id, text, metadata }, i) =>
      createEmbeddedChunk({ id, text, vector: vectors[i] ?? [], metadata }),
    );

    const previous = await store.tryLoad(unit.unitId);
    await store.save(unit.unitId, chunks);

    const current = new Set(chunks.map((c) => c.id));
    const stale = (previous ?? []).map((c) => c.id).filter((id) => !current.has(id));
    const deletedChunks = stale.length > 0 ? await index.delete({ ids: stale }) : 0;
    if (chunks.length > 0) await index.upsert(chunks);

    log.info(
      { unitId: unit.unitId, chunks: chunks.length, skippedEntries: skipped, deletedChunks },
      "indexed unit",
    );
    return {
      unitId: unit.unitId,
      chunkCount: chunks.length,
      skippedEntries: skipped,
      deletedChunks,
    };
  }
}
