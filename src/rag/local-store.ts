import { mkdir, readdir, readFile, rename, rm, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { GitArtifactTracker, type ArtifactTracker } from "./artifact-tracker.js";
import type { PersistenceConfig } from "./config.js";
import { getErrorMessage, hasErrorCode, NotFoundError, ValidationError } from "./errors.js";
import { FileLockManager } from "./file-lock.js";
import { getLogger } from "./logger.js";
import { createEmbeddedChunk, entryTypeSchema } from "./models.js";
import type { EmbeddedChunk } from "./types.js";

const log = getLogger("local-store");

const TABLE_FORMAT = "embedded-chunks";
const TABLE_VERSION = 1;
const TABLE_EXT = ".json";

/**
 * One table per source unit, stored column by column so that every field is
 * a flat array of `rowCount` values.
 */
const tableSchema = z
  .object({
    format: z.literal(TABLE_FORMAT),
    version: z.literal(TABLE_VERSION),
    unitId: z.string(),
    rowCount: z.number().int().nonnegative(),
    columns: z.object({
      id: z.array(z.string()),
      text: z.array(z.string()),
      vector: z.array(z.array(z.number())),
      collectionId: z.array(z.string()),
      collectionName: z.array(z.string()),
      pageId: z.array(z.string()),
      pageTitle: z.array(z.string()),
      entryId: z.array(z.string()),
      entryType: z.array(entryTypeSchema),
      author: z.array(z.string()),
      date: z.array(z.string()),
      folderPath: z.array(z.string().nullable()),
      tags: z.array(z.array(z.string())),
      url: z.array(z.string()),
      embeddingVersion: z.array(z.string()),
    }),
  })
  .refine((t) => Object.values(t.columns).every((col) => col.length === t.rowCount), {
    message: "every column must hold rowCount values",
  });

type ChunkTable = z.infer<typeof tableSchema>;
type Columns = ChunkTable["columns"];

function toTable(unitId: string, chunks: EmbeddedChunk[]): ChunkTable {
  const columns: Columns = {
    id: [],
    text: [],
    vector: [],
    collectionId: [],
    collectionName: [],
    pageId: [],
    pageTitle: [],
    entryId: [],
    entryType: [],
    author: [],
    date: [],
    folderPath: [],
    tags: [],
    url: [],
    embeddingVersion: [],
  };
  for (const { id, text, vector, metadata: m } of chunks) {
    columns.id.push(id);
    columns.text.push(text);
    columns.vector.push(vector);
    columns.collectionId.push(m.collectionId);
    columns.collectionName.push(m.collectionName);
    columns.pageId.push(m.pageId);
    columns.pageTitle.push(m.pageTitle);
    columns.entryId.push(m.entryId);
    columns.entryType.push(m.entryType);
    columns.author.push(m.author);
    columns.date.push(m.date);
    columns.folderPath.push(m.folderPath ?? null);
    columns.tags.push(m.tags);
    columns.url.push(m.url);
    columns.embeddingVersion.push(m.embeddingVersion);
  }
  return { format: TABLE_FORMAT, version: TABLE_VERSION, unitId, rowCount: chunks.length, columns };
}

function fromTable(table: ChunkTable): EmbeddedChunk[] {
  const c = table.columns;
  const rows: EmbeddedChunk[] = [];
  for (let i = 0; i < table.rowCount; i++) {
    const cell = <T>(column: T[]): T => {
      const value = column[i];
      if (value === undefined) {
        throw new ValidationError(`Table for ${table.unitId} is missing row ${i}`);
      }
      return value;
    };
    const folderPath = c.folderPath[i];
    rows.push(
      createEmbeddedChunk({
        id: cell(c.id),
        text: cell(c.text),
        vector: cell(c.vector),
        metadata: {
          collectionId: cell(c.collectionId),
          collectionName: cell(c.collectionName),
          pageId: cell(c.pageId),
          pageTitle: cell(c.pageTitle),
          entryId: cell(c.entryId),
          entryType: cell(c.entryType),
          author: cell(c.author),
          date: cell(c.date),
          ...(folderPath ? { folderPath } : {}),
          tags: cell(c.tags),
          url: cell(c.url),
          embeddingVersion: cell(c.embeddingVersion),
        },
      }),
    );
  }
  return rows;
}

export interface LocalPersistenceOptions {
  tracker?: ArtifactTracker;
}

/**
 * Durable per-unit storage of embedded chunks; the source of truth from which
 * the vector index can always be rebuilt. Tables live under a directory named
 * after the embedding version so incompatible vectors never mix.
 */
export class LocalPersistence {
  readonly dir: string;
  private readonly locks: FileLockManager;
  private readonly tracker: ArtifactTracker | undefined;

  constructor(
    config: PersistenceConfig,
    readonly embeddingVersion: string,
    options: LocalPersistenceOptions = {},
  ) {
    if (embeddingVersion.trim() === "" || embeddingVersion.includes("/")) {
      throw new ValidationError(`Invalid embedding version: "${embeddingVersion}"`);
    }
    this.dir = path.join(config.basePath, embeddingVersion);
    this.locks = new FileLockManager({ dir: this.dir, timeoutMs: config.lockTimeoutMs });
    this.tracker =
      options.tracker ??
      (config.trackArtifacts ? new GitArtifactTracker(config.basePath) : undefined);
  }

  unitPath(unitId: string): string {
    return path.join(this.dir, `${encodeURIComponent(unitId)}${TABLE_EXT}`);
  }

  /** Replaces the unit's table. Serialised per unit through a lock file. */
  async save(unitId: string, chunks: EmbeddedChunk[]): Promise<void> {
    const file = this.unitPath(unitId);
    const table = toTable(unitId, chunks);

    await this.locks.withLock(unitId, async () => {
      await mkdir(this.dir, { recursive: true });
      const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
      try {
        await writeFile(tmp, JSON.stringify(table), "utf-8");
        await rename(tmp, file);
      } catch (error) {
        await rm(tmp, { force: true });
        throw error;
      }
    });

    log.debug({ unitId, rows: chunks.length }, "saved unit table");
    await this.track([file], `save ${unitId} (${chunks.length} chunks)`);
  }

  /** Lock-free read of the last committed table. */
  async load(unitId: string): Promise<EmbeddedChunk[]> {
    const file = this.unitPath(unitId);
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new NotFoundError(`No local table for unit ${unitId}`, { context: { unitId } });
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Corrupt local table for unit ${unitId}: not JSON`, {
        cause: error,
        context: { unitId, file },
      });
    }
    const parsed = tableSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Corrupt local table for unit ${unitId}: ${parsed.error.message}`, {
        context: { unitId, file },
      });
    }
    return fromTable(parsed.data);
  }

  /** Like {@link load}, but an unknown unit yields `null`. */
  async tryLoad(unitId: string): Promise<EmbeddedChunk[] | null> {
    try {
      return await this.load(unitId);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  async listUnits(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw error;
    }
    return names
      .filter((name) => name.endsWith(TABLE_EXT) && !name.startsWith("."))
      .map((name) => decodeURIComponent(name.slice(0, -TABLE_EXT.length)))
      .sort();
  }

  /** Returns false when there was nothing to remove. */
  async remove(unitId: string): Promise<boolean> {
    const file = this.unitPath(unitId);
    const removed = await this.locks.withLock(unitId, async () => {
      try {
        await unlink(file);
        return true;
      } catch (error) {
        if (hasErrorCode(error, "ENOENT")) return false;
        throw error;
      }
    });
    if (removed) await this.track([file], `remove ${unitId}`);
    return removed;
  }

  async countChunks(): Promise<number> {
    let total = 0;
    for (const unitId of await this.listUnits()) {
      total += (await this.load(unitId)).length;
    }
    return total;
  }

  private async track(files: string[], message: string): Promise<void> {
    if (!this.tracker) return;
    try {
      await this.tracker.track(files, message);
    } catch (error) {
      log.warn({ files, err: error }, `artifact tracking failed: ${getErrorMessage(error)}`);
    }
  }
}
