// Builders shared by the test suites.
import type { EmbeddingProvider } from "./embedding-service.js";
import { IndexingError } from "./errors.js";
import { chunkId, createEmbeddedChunk, type ChunkMetadataInput } from "./models.js";
import type { ContentSource } from "./sync-service.js";
import type { EmbeddedChunk, PageRef, SourceEntry, SourceUnit } from "./types.js";

export interface ChunkFixture {
  collectionId?: string;
  pageId?: string;
  entryId?: string;
  chunkIndex?: number;
  vector: number[];
  text?: string;
  metadata?: Partial<ChunkMetadataInput>;
}

export function makeChunk(fixture: ChunkFixture): EmbeddedChunk {
  const collectionId = fixture.collectionId ?? "nb1";
  const pageId = fixture.pageId ?? "p1";
  const entryId = fixture.entryId ?? "e1";
  const chunkIndex = fixture.chunkIndex ?? 0;
  return createEmbeddedChunk({
    id: chunkId(collectionId, pageId, entryId, chunkIndex),
    text: fixture.text ?? `chunk ${pageId}/${entryId}/${chunkIndex}`,
    vector: fixture.vector,
    metadata: {
      collectionId,
      collectionName: "Lab notebook",
      pageId,
      pageTitle: `Page ${pageId}`,
      entryId,
      entryType: "text_entry",
      author: "alice",
      date: "2024-03-01T10:00:00.000Z",
      url: `https://notebook.test/${collectionId}/${pageId}`,
      embeddingVersion: "v1",
      ...fixture.metadata,
    },
  });
}

/** Unit vector along `axis`, nudged towards axis 0 by `lean` to order scores. */
export function axisVector(dims: number, axis: number, lean = 0): number[] {
  const v = new Array<number>(dims).fill(0);
  v[axis] = 1;
  v[0] = (v[0] ?? 0) + lean;
  return v;
}

export function page(pageId: string, collectionId = "nb1"): PageRef {
  return {
    collectionId,
    collectionName: "Lab notebook",
    pageId,
    pageTitle: `Page ${pageId}`,
  };
}

export function entry(
  entryId: string,
  content: string,
  overrides: Partial<SourceEntry> = {},
): SourceEntry {
  return {
    entryId,
    entryType: "text entry",
    content,
    author: "alice",
    updatedAt: "2024-03-01T10:00:00Z",
    url: `https://notebook.test/entries/${entryId}`,
    ...overrides,
  };
}

export function unit(pageRef: PageRef, entries: SourceEntry[]): SourceUnit {
  return { unitId: `${pageRef.collectionId}_${pageRef.pageId}`, page: pageRef, entries };
}

/** Bag-of-words vector: each word bumps one hashed coordinate. */
export function wordVector(text: string, dims: number): number[] {
  const v = new Array<number>(dims).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let h = 5381;
    for (const c of word) h = ((h * 33) ^ (c.codePointAt(0) ?? 0)) >>> 0;
    const slot = h % (dims - 1);
    v[slot] = (v[slot] ?? 0) + 1;
  }
  // Keeps every vector non-zero.
  v[dims - 1] = 0.01;
  return v;
}

/** Deterministic provider; texts containing a poisoned marker fail permanently. */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = "fake";
  readonly poison = new Set<string>();
  calls = 0;
  embeddedTexts = 0;

  constructor(readonly dims = 128) {}

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    const bad = texts.find((t) => [...this.poison].some((p) => t.includes(p)));
    if (bad !== undefined) {
      throw new IndexingError(`upstream rejected input "${bad}"`, { code: "EMBEDDING_HTTP_ERROR" });
    }
    this.embeddedTexts += texts.length;
    return texts.map((t) => wordVector(t, this.dims));
  }
}

/** Content source over a mutable list of units. */
export class InMemoryContentSource implements ContentSource {
  private readonly units = new Map<string, SourceUnit>();

  constructor(units: SourceUnit[]) {
    for (const u of units) this.units.set(u.unitId, u);
  }

  async listPages(collectionId: string): Promise<PageRef[]> {
    return [...this.units.values()]
      .filter((u) => u.page.collectionId === collectionId)
      .map((u) => u.page);
  }

  async listEntries(pageRef: PageRef): Promise<SourceEntry[]> {
    return this.units.get(`${pageRef.collectionId}_${pageRef.pageId}`)?.entries ?? [];
  }

  setEntries(unitId: string, entries: SourceEntry[]): void {
    const current = this.units.get(unitId);
    if (current) this.units.set(unitId, { ...current, entries });
  }
}
