import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { hasErrorCode, NotFoundError, ValidationError } from "./errors.js";
import type { ContentSource } from "./sync-service.js";
import type { PageRef, SourceEntry } from "./types.js";

const entrySchema = z.object({
  entryId: z.string().min(1),
  entryType: z.string(),
  content: z.string().default(""),
  author: z.string().default(""),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  tags: z.array(z.string()).optional(),
  url: z.string(),
});

const collectionSchema = z.object({
  collectionName: z.string(),
  pages: z.array(
    z.object({
      pageId: z.string().min(1),
      pageTitle: z.string(),
      folderPath: z.string().optional(),
      entries: z.array(entrySchema).default([]),
    }),
  ),
});

type CollectionFile = z.infer<typeof collectionSchema>;

/**
 * Content source over exported collections, one `<collectionId>.json` file
 * per collection in `dir`. `listPages` always reads the file again; the
 * `listEntries` calls that follow reuse that read, so one scan sees one
 * consistent version of the export.
 */
export class JsonDirectorySource implements ContentSource {
  private readonly cache = new Map<string, Promise<CollectionFile>>();

  constructor(private readonly dir: string) {}

  async listPages(collectionId: string): Promise<PageRef[]> {
    this.cache.delete(collectionId);
    const collection = await this.read(collectionId);
    return collection.pages.map((p) => ({
      collectionId,
      collectionName: collection.collectionName,
      pageId: p.pageId,
      pageTitle: p.pageTitle,
      ...(p.folderPath ? { folderPath: p.folderPath } : {}),
    }));
  }

  async listEntries(page: PageRef): Promise<SourceEntry[]> {
    const collection = await this.read(page.collectionId);
    const found = collection.pages.find((p) => p.pageId === page.pageId);
    if (!found) {
      throw new NotFoundError(`Page ${page.pageId} not found in ${page.collectionId}`);
    }
    return found.entries;
  }

  private read(collectionId: string): Promise<CollectionFile> {
    let pending = this.cache.get(collectionId);
    if (!pending) {
      pending = this.load(collectionId).catch((error: unknown) => {
        this.cache.delete(collectionId);
        throw error;
      });
      this.cache.set(collectionId, pending);
    }
    return pending;
  }

  private async load(collectionId: string): Promise<CollectionFile> {
    const file = path.join(this.dir, `${encodeURIComponent(collectionId)}.json`);
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new NotFoundError(`No export for collection ${collectionId}`, { context: { file } });
      }
      throw error;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Collection export ${file} is not JSON`, { cause: error });
    }
    const parsed = collectionSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Invalid collection export ${file}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
