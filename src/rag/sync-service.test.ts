import { access, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createIndexingSystem, type IndexingSystem } from "../index.js";
import { MemoryVectorIndex } from "./backends/memory-index.js";
import { parseConfig, type IndexingConfigInput } from "./config.js";
import { EmbeddingClient } from "./embedding-service.js";
import { SyncFailedError, ValidationError } from "./errors.js";
import { JsonDirectorySource } from "./json-source.js";
import { RetryPolicy } from "./retry.js";
import type { ContentSource } from "./sync-service.js";
import {
  entry,
  FakeEmbeddingProvider,
  InMemoryContentSource,
  page,
  unit,
} from "./testing.js";

const DIMS = 128;
const noRetry = new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }, async () => {});

function notebook(): InMemoryContentSource {
  return new InMemoryContentSource([
    unit(page("p1"), [
      entry("e1", "<p>Prepared phosphate buffer at pH 7.4</p>"),
      entry("e2", "<p>Incubated cells overnight</p>"),
    ]),
    unit(page("p2"), [
      entry("e3", "Western blot", { entryType: "heading" }),
      entry("e4", "gel.png", { entryType: "Attachment" }),
    ]),
  ]);
}

describe("SyncService", () => {
  let dir: string;
  let clock: Date;
  let provider: FakeEmbeddingProvider;
  let source: InMemoryContentSource;
  let index: MemoryVectorIndex;

  function build(
    overrides: IndexingConfigInput = {},
    contentSource: ContentSource = source,
  ): IndexingSystem {
    const config = parseConfig({
      ...overrides,
      embedding: { dimensions: DIMS, batchSize: 8, ...overrides.embedding },
      index: { backend: "memory" },
      persistence: { basePath: path.join(dir, "embeddings") },
      sync: { recordPath: path.join(dir, ".last_indexed"), unitConcurrency: 2 },
      source: { collectionIds: ["nb1"] },
    });
    return createIndexingSystem(config, contentSource, {
      embedder: new EmbeddingClient(provider, config.embedding, noRetry),
      index,
      now: () => clock,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "sync-"));
    clock = new Date("2024-05-01T00:00:00.000Z");
    provider = new FakeEmbeddingProvider(DIMS);
    source = notebook();
    index = new MemoryVectorIndex({ namespace: null, embeddingVersion: "v1" });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("plans a dry run without touching anything", async () => {
    const system = build();
    const result = await system.sync.sync({ dryRun: true });

    expect(result).toEqual({
      plan: "rebuild",
      reason: "no_record",
      affectedUnits: ["nb1_p1", "nb1_p2"],
      executed: false,
      processedCount: 0,
      skippedCount: 0,
      failedCount: 0,
      failures: [],
    });
    expect(provider.calls).toBe(0);
    expect(await index.count()).toBe(0);
    expect(await system.store.listUnits()).toEqual([]);
    await expect(access(path.join(dir, ".last_indexed"))).rejects.toThrow();
  });

  it("builds everything once, then skips", async () => {
    const system = build();

    const first = await system.sync.sync();
    expect(first).toMatchObject({
      plan: "rebuild",
      reason: "no_record",
      executed: true,
      processedCount: 2,
      skippedCount: 0,
      failedCount: 0,
    });
    expect(await index.count()).toBe(3);
    expect(await system.store.countChunks()).toBe(3);
    expect(provider.embeddedTexts).toBe(3);

    const record = await system.state.load();
    expect(record).toMatchObject({
      builtAt: "2024-05-01T00:00:00.000Z",
      embeddingVersion: "v1",
      backend: "memory",
      processedCount: 2,
      failedUnits: [],
    });
    expect(Object.keys(record?.unitFingerprints ?? {}).sort()).toEqual(["nb1_p1", "nb1_p2"]);

    const calls = provider.calls;
    const second = await system.sync.sync();
    expect(second).toMatchObject({
      plan: "skip",
      reason: "up_to_date",
      executed: false,
      skippedCount: 2,
    });
    expect(provider.calls).toBe(calls);
  });

  it("re-indexes only the unit whose content changed", async () => {
    const system = build();
    await system.sync.sync();

    source.setEntries("nb1_p2", [
      entry("e3", "Western blot repeated", { entryType: "heading" }),
      entry("e4", "gel.png", { entryType: "Attachment" }),
    ]);
    const result = await system.sync.sync();

    expect(result).toMatchObject({
      plan: "incremental",
      reason: "content_changed",
      affectedUnits: ["nb1_p2"],
      executed: true,
      processedCount: 1,
      skippedCount: 1,
    });
    expect(provider.embeddedTexts).toBe(4);
    const [chunk] = await system.store.load("nb1_p2");
    expect(chunk?.text).toBe("Western blot repeated");
  });

  it("drops chunks of entries that disappeared", async () => {
    const system = build();
    await system.sync.sync();

    source.setEntries("nb1_p1", [entry("e1", "<p>Prepared phosphate buffer at pH 7.4</p>")]);
    await system.sync.sync();

    expect((await system.store.load("nb1_p1")).map((c) => c.id)).toEqual(["nb1_p1_e1_0"]);
    expect(await index.count()).toBe(2);
    expect(await system.checkDrift()).toEqual({
      localCount: 2,
      remoteCount: 2,
      drift: 0,
      withinTolerance: true,
    });
  });

  it("re-indexes every unit once the record is older than maxAgeHours", async () => {
    const system = build();
    await system.sync.sync();

    clock = new Date("2024-05-02T01:00:00.000Z");
    const result = await system.sync.sync({ maxAgeHours: 24 });

    expect(result).toMatchObject({
      plan: "incremental",
      reason: "stale",
      affectedUnits: ["nb1_p1", "nb1_p2"],
      processedCount: 2,
    });
    expect((await system.state.load())?.builtAt).toBe("2024-05-02T01:00:00.000Z");
  });

  it("rebuilds when the chunking settings change", async () => {
    await build().sync.sync();
    const result = await build({ chunking: { chunkSize: 300 } }).sync.sync();
    expect(result).toMatchObject({ plan: "rebuild", reason: "config_changed", processedCount: 2 });
  });

  it("rebuilds when the embedding version changes", async () => {
    await build().sync.sync();
    const result = await build({ embedding: { version: "v2" } }).sync.sync({ dryRun: true });
    expect(result).toMatchObject({ plan: "rebuild", reason: "embedding_changed", executed: false });
  });

  it("plans a forced rebuild even when up to date", async () => {
    const system = build();
    await system.sync.sync();
    const result = await system.sync.sync({ force: true, dryRun: true });
    expect(result).toMatchObject({ plan: "rebuild", reason: "force", executed: false });
  });

  it("records a partial failure and retries the failed unit next time", async () => {
    const system = build();
    provider.poison.add("Western");

    const result = await system.sync.sync();
    expect(result).toMatchObject({ executed: true, processedCount: 1, failedCount: 1 });
    expect(result.failures).toEqual([
      expect.objectContaining({
        unitId: "nb1_p2",
        code: "EMBEDDING_FAILED",
        chunkIds: ["nb1_p2_e3_0"],
      }),
    ]);

    const record = await system.state.load();
    expect(record?.failedUnits).toEqual(["nb1_p2"]);
    expect(Object.keys(record?.unitFingerprints ?? {})).toEqual(["nb1_p1"]);

    provider.poison.clear();
    const retry = await system.sync.sync();
    expect(retry).toMatchObject({
      plan: "incremental",
      reason: "content_changed",
      affectedUnits: ["nb1_p2"],
      processedCount: 1,
      failedCount: 0,
    });
  });

  it("leaves the record untouched when every unit fails", async () => {
    const system = build();
    await system.sync.sync();
    const before = await system.state.load();

    provider.poison.add("phosphate");
    provider.poison.add("Western");
    const error = await system.sync.sync({ force: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyncFailedError);
    if (error instanceof SyncFailedError) {
      expect(error.failures.map((f) => f.unitId)).toEqual(["nb1_p1", "nb1_p2"]);
    }
    expect(await system.state.load()).toEqual(before);
  });

  it("limits a sync to the requested units", async () => {
    const system = build();
    const result = await system.sync.sync({ scope: { unitIds: ["nb1_p1"] } });
    expect(result).toMatchObject({ affectedUnits: ["nb1_p1"], processedCount: 1 });
    expect(await system.store.listUnits()).toEqual(["nb1_p1"]);
  });

  it("rejects a negative maxAgeHours", async () => {
    await expect(build().sync.sync({ maxAgeHours: -1 })).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects an empty collection scope", async () => {
    await expect(build().sync.sync({ scope: { collectionIds: [] } })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("finds synced content through search", async () => {
    const system = build();
    await system.sync.sync();

    const response = await system.search.search({ query: "phosphate buffer", minScore: 0.1 });
    expect(response.query).toBe("phosphate buffer");
    expect(response.results).toHaveLength(1);
    expect(response.results[0]).toMatchObject({
      id: "nb1_p1_e1_0",
      rank: 1,
      excerpt: "Prepared phosphate buffer at pH 7.4",
      metadata: { pageId: "p1", pageTitle: "Page p1", entryType: "text_entry", author: "alice" },
    });
  });

  it("repairs drift from local state", async () => {
    const system = build();
    await system.sync.sync();
    await index.delete({ ids: ["nb1_p1_e1_0"] });

    expect(await system.checkDrift()).toMatchObject({ drift: -1, withinTolerance: false });
    expect(await system.restoreIndex()).toBe(3);
    expect(await system.checkDrift()).toMatchObject({ drift: 0, withinTolerance: true });
  });

  it("sees edits to a JSON export between syncs", async () => {
    const exportDir = path.join(dir, "export");
    await mkdir(exportDir);
    const writeExport = (content: string) =>
      writeFile(
        path.join(exportDir, "nb1.json"),
        JSON.stringify({
          collectionName: "Lab notebook",
          pages: [
            {
              pageId: "p1",
              pageTitle: "Page p1",
              entries: [entry("e1", content)],
            },
          ],
        }),
        "utf-8",
      );
    await writeExport("<p>Thawed aliquot 3</p>");
    const system = build({}, new JsonDirectorySource(exportDir));

    expect(await system.sync.sync()).toMatchObject({ plan: "rebuild", processedCount: 1 });

    await writeExport("<p>Thawed aliquot 3 and 4</p>");
    expect(await system.sync.sync()).toMatchObject({
      plan: "incremental",
      reason: "content_changed",
      affectedUnits: ["nb1_p1"],
    });
    const [chunk] = await system.store.load("nb1_p1");
    expect(chunk?.text).toBe("Thawed aliquot 3 and 4");
  });
});
