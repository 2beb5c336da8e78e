import { createHash } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { IndexingConfig } from "./config.js";
import { getErrorMessage, hasErrorCode, ValidationError } from "./errors.js";
import { getLogger } from "./logger.js";
import { buildRecordSchema } from "./models.js";
import type { BuildRecord, IndexableEntry } from "./types.js";

const log = getLogger("build-state");

function sha256(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

/**
 * Content hash of a source unit. Covers each entry's id, type, cleaned text
 * and modification time, in entry order; a text edit changes the fingerprint
 * even when the timestamp does not.
 */
export function fingerprintUnit(entries: readonly IndexableEntry[]): string {
  const canonical = entries.map((e) => [
    e.entryId,
    e.entryType,
    e.text,
    e.source.updatedAt ?? e.source.createdAt ?? null,
  ]);
  return sha256(JSON.stringify(canonical));
}

/**
 * Hash of the settings that change what ends up in the index. Secrets are
 * excluded, and so is the embedding version, which the record keeps apart.
 */
export function configFingerprint(config: IndexingConfig): string {
  const { chunking, embedding, index } = config;
  return sha256(
    JSON.stringify({
      chunking: [
        chunking.chunkSize,
        chunking.overlap,
        chunking.tokenizer,
        chunking.preserveBoundaries,
      ],
      embedding: [embedding.model, embedding.dimensions],
      index: [index.backend, index.indexName, index.namespace],
    }),
  );
}

/**
 * Persists the {@link BuildRecord} of one logical index. Saves replace the
 * file atomically; an unreadable record loads as `null` so the next sync
 * rebuilds.
 */
export class BuildStateStore {
  constructor(readonly recordPath: string) {}

  async load(): Promise<BuildRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.recordPath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        log.debug({ recordPath: this.recordPath }, "no build record yet");
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.warn(
        { recordPath: this.recordPath },
        `unreadable build record: ${getErrorMessage(error)}`,
      );
      return null;
    }

    const parsed = buildRecordSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(
        { recordPath: this.recordPath, issues: parsed.error.issues.length },
        "invalid build record, ignoring it",
      );
      return null;
    }
    return parsed.data;
  }

  async save(record: BuildRecord): Promise<void> {
    const checked = buildRecordSchema.safeParse(record);
    if (!checked.success) {
      throw new ValidationError(`Refusing to save an invalid build record: ${checked.error.message}`);
    }
    const valid = checked.data;
    await mkdir(path.dirname(this.recordPath), { recursive: true });

    const tmp = `${this.recordPath}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(valid, null, 2), "utf-8");
      await rename(tmp, this.recordPath); // atomic on the same volume
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
    log.debug(
      { recordPath: this.recordPath, units: Object.keys(valid.unitFingerprints).length },
      "saved build record",
    );
  }
}
