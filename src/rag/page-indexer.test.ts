import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryVectorIndex } from "./backends/memory-index.js";
import { TokenChunker, type ChunkingStrategy } from "./chunking/index.js";
import { parseConfig } from "./config.js";
import { EmbeddingClient } from "./embedding-service.js";
import { ValidationError } from "./errors.js";
import { LocalPersistence } from "./local-store.js";
import { PageIndexer } from "./page-indexer.js";
import { RetryPolicy } from "./retry.js";
import { entry, FakeEmbeddingProvider, page, unit } from "./testing.js";
import type { Chunk } from "./types.js";

const DIMS = 128;
const noRetry = new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }, async () => {});

/** Returns the whole text as one chunk, however long. */
const wholeText: ChunkingStrategy = {
  name: "whole-text",
  chunk: (unitId: string, text: string): Chunk[] => [
    {
      unitId,
      chunkIndex: 0,
      startChar: 0,
      endChar: Array.from(text).length,
      startToken: 0,
      text,
      tokenCount: 1,
    },
  ],
};

describe("PageIndexer", () => {
  let dir: string;
  let provider: FakeEmbeddingProvider;
  let index: MemoryVectorIndex;
  let store: LocalPersistence;

  function indexer(chunker?: ChunkingStrategy): PageIndexer {
    const config = parseConfig({
      embedding: { dimensions: DIMS },
      persistence: { basePath: dir },
    });
    return new PageIndexer({
      chunker: chunker ?? new TokenChunker(config.chunking),
      embedder: new EmbeddingClient(provider, config.embedding, noRetry),
      store,
      index,
      embeddingVersion: "v1",
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "page-indexer-"));
    provider = new FakeEmbeddingProvider(DIMS);
    index = new MemoryVectorIndex({ namespace: null, embeddingVersion: "v1" });
    store = new LocalPersistence(parseConfig({ persistence: { basePath: dir } }).persistence, "v1");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("deletes chunks of entries that are gone on the next run", async () => {
    const p1 = page("p1");
    await indexer().indexUnit(
      unit(p1, [entry("e1", "<p>Alpha</p>"), entry("e2", "<p>Beta</p>")]),
    );

    const result = await indexer().indexUnit(unit(p1, [entry("e1", "<p>Alpha</p>")]));

    expect(result).toEqual({
      unitId: "nb1_p1",
      chunkCount: 1,
      skippedEntries: 0,
      deletedChunks: 1,
    });
    expect(await index.count()).toBe(1);
    expect((await store.tryLoad("nb1_p1"))?.map((c) => c.id)).toEqual(["nb1_p1_e1_0"]);
  });

  it("rejects chunk text over 5000 characters before embedding", async () => {
    const long = unit(page("p1"), [entry("e1", "y".repeat(5001))]);

    await expect(indexer(wholeText).indexUnit(long)).rejects.toThrow(ValidationError);
    expect(provider.calls).toBe(0);
    expect(await store.tryLoad("nb1_p1")).toBeNull();
    expect(await index.count()).toBe(0);
  });
});
