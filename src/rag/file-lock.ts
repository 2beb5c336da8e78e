import { mkdir, open, readFile, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { hasErrorCode, LockTimeoutError } from "./errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("file-lock");

export interface FileLockOptions {
  /** Directory holding the `.<key>.lock` files. */
  dir: string;
  timeoutMs?: number;
  pollMs?: number;
  /** A lock older than this is taken over. Defaults to twice the timeout, at least a minute. */
  staleMs?: number;
}

const lockOwnerSchema = z.object({ pid: z.number().int().positive(), acquiredAt: z.string() });

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function parseOwner(raw: string): z.infer<typeof lockOwnerSchema> | null {
  try {
    const parsed = lockOwnerSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists under another user.
    return !hasErrorCode(error, "ESRCH");
  }
}

/**
 * Advisory per-key locks backed by exclusively created files, so separate
 * processes writing the same directory also exclude each other. Locks on
 * different keys never contend. A lock left behind by a dead process, or one
 * older than `staleMs`, is removed and taken over.
 */
export class FileLockManager {
  private readonly dir: string;
  private readonly timeoutMs: number;
  private readonly pollMs: number;
  private readonly staleMs: number;
  private readonly held = new Set<string>();

  constructor(options: FileLockOptions) {
    this.dir = options.dir;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.pollMs = options.pollMs ?? 50;
    this.staleMs = options.staleMs ?? Math.max(2 * this.timeoutMs, 60_000);
  }

  lockPath(key: string): string {
    return path.join(this.dir, `.${encodeURIComponent(key)}.lock`);
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /** Runs `operation` holding the lock for `key`; the lock is released on every exit path. */
  async withLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const lockFile = await this.acquire(key);
    this.held.add(key);
    try {
      return await operation();
    } finally {
      this.held.delete(key);
      await unlink(lockFile).catch((error: unknown) => {
        log.warn({ key, lockFile, err: error }, "failed to remove lock file");
      });
    }
  }

  private async acquire(key: string): Promise<string> {
    const lockFile = this.lockPath(key);
    await mkdir(this.dir, { recursive: true });
    const deadline = Date.now() + this.timeoutMs;

    for (;;) {
      try {
        const handle = await open(lockFile, "wx");
        try {
          await handle.writeFile(
            JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }),
          );
        } finally {
          await handle.close();
        }
        return lockFile;
      } catch (error) {
        if (!hasErrorCode(error, "EEXIST")) throw error;
      }

      if (await this.isStale(lockFile)) {
        log.warn({ key, lockFile }, `taking over stale lock for ${key}`);
        await unlink(lockFile).catch((error: unknown) => {
          if (!hasErrorCode(error, "ENOENT")) throw error;
        });
        continue;
      }

      if (Date.now() >= deadline) {
        log.warn({ key, timeoutMs: this.timeoutMs }, `lock timeout for ${key}`);
        throw new LockTimeoutError(key, this.timeoutMs);
      }
      await sleep(Math.min(this.pollMs, Math.max(0, deadline - Date.now())));
    }
  }

  private async isStale(lockFile: string): Promise<boolean> {
    let modifiedMs: number;
    let raw: string;
    try {
      [modifiedMs, raw] = await Promise.all([
        stat(lockFile).then((info) => info.mtimeMs),
        readFile(lockFile, "utf-8"),
      ]);
    } catch (error) {
      // Released in the meantime; the next attempt will tell.
      if (hasErrorCode(error, "ENOENT")) return false;
      throw error;
    }
    if (Date.now() - modifiedMs > this.staleMs) return true;
    const owner = parseOwner(raw);
    return owner !== null && owner.pid !== process.pid && !isAlive(owner.pid);
  }
}
