import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BuildStateStore, configFingerprint, fingerprintUnit } from "./build-state.js";
import { parseConfig } from "./config.js";
import { extractEntries } from "./entries.js";
import { ValidationError } from "./errors.js";
import { entry } from "./testing.js";
import type { BuildRecord } from "./types.js";

function fingerprintOf(...entries: ReturnType<typeof entry>[]): string {
  return fingerprintUnit(extractEntries(entries).entries);
}

describe("fingerprintUnit", () => {
  it("is stable for the same content", () => {
    const a = fingerprintOf(entry("e1", "<p>alpha</p>"), entry("e2", "beta"));
    const b = fingerprintOf(entry("e1", "<p>alpha</p>"), entry("e2", "beta"));
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes on a text edit even when the timestamp does not", () => {
    const before = fingerprintOf(entry("e1", "alpha"));
    const after = fingerprintOf(entry("e1", "alpha beta"));
    expect(after).not.toBe(before);
  });

  it("changes when only the timestamp moves", () => {
    const before = fingerprintOf(entry("e1", "alpha"));
    const after = fingerprintOf(entry("e1", "alpha", { updatedAt: "2024-03-02T10:00:00Z" }));
    expect(after).not.toBe(before);
  });

  it("ignores markup that cleans to the same text", () => {
    expect(fingerprintOf(entry("e1", "<p>alpha</p>"))).toBe(fingerprintOf(entry("e1", "alpha")));
  });

  it("ignores entries that are not indexed", () => {
    const plain = fingerprintOf(entry("e1", "alpha"));
    const withAttachment = fingerprintOf(
      entry("e1", "alpha"),
      entry("e2", "scan.pdf", { entryType: "Attachment" }),
    );
    expect(withAttachment).toBe(plain);
  });
});

describe("configFingerprint", () => {
  const base = { embedding: { dimensions: 128 } };

  it("ignores the API key", () => {
    const withKey = { embedding: { dimensions: 128, apiKey: "test-key" } };
    const a = configFingerprint(parseConfig(withKey));
    expect(a).toBe(configFingerprint(parseConfig(base)));
  });

  it("changes with the chunk size", () => {
    const a = configFingerprint(parseConfig(base));
    const b = configFingerprint(parseConfig({ ...base, chunking: { chunkSize: 300 } }));
    expect(b).not.toBe(a);
  });

  it("leaves the embedding version to the record", () => {
    const a = configFingerprint(parseConfig(base));
    const b = configFingerprint(parseConfig({ embedding: { dimensions: 128, version: "v2" } }));
    expect(b).toBe(a);
  });
});

describe("BuildStateStore", () => {
  let dir: string;
  let store: BuildStateStore;

  const record: BuildRecord = {
    builtAt: "2024-05-01T00:00:00.000Z",
    embeddingVersion: "v1",
    configFingerprint: "abc",
    backend: "memory",
    indexName: "notebook-semantic-search",
    namespace: null,
    unitFingerprints: { nb1_p1: "f1", nb1_p2: "f2" },
    processedCount: 2,
    skippedCount: 0,
    failedCount: 0,
    failedUnits: [],
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "build-state-"));
    store = new BuildStateStore(path.join(dir, "state", ".last_indexed"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads null when there is no record", async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it("round-trips a record and leaves no temp file behind", async () => {
    await store.save(record);
    await expect(store.load()).resolves.toEqual(record);
    expect(await readdir(path.join(dir, "state"))).toEqual([".last_indexed"]);
  });

  it("loads null for a corrupt file", async () => {
    await store.save(record);
    await writeFile(store.recordPath, "{not json", "utf-8");
    await expect(store.load()).resolves.toBeNull();
  });

  it("loads null for a record missing fields", async () => {
    await store.save(record);
    await writeFile(store.recordPath, JSON.stringify({ builtAt: record.builtAt }), "utf-8");
    await expect(store.load()).resolves.toBeNull();
  });

  it("refuses to save an invalid record", async () => {
    await expect(store.save({ ...record, builtAt: "yesterday" })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("replaces the previous record", async () => {
    await store.save(record);
    await store.save({ ...record, processedCount: 1, unitFingerprints: { nb1_p1: "f3" } });
    const saved: unknown = JSON.parse(await readFile(store.recordPath, "utf-8"));
    expect(saved).toMatchObject({ processedCount: 1, unitFingerprints: { nb1_p1: "f3" } });
  });
});
