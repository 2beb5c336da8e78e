/**
 * Error hierarchy for the indexing pipeline.
 *
 * Every error raised by this package extends {@link IndexingError}, carries a
 * stable `code`, and says whether the failed operation may be retried.
 */

export interface IndexingErrorOptions {
  code?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
  retryable?: boolean;
}

export class IndexingError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown> | undefined;
  readonly retryable: boolean;

  constructor(message: string, options: IndexingErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code ?? "INDEXING_ERROR";
    this.context = options.context;
    this.retryable = options.retryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

type SubclassOptions = Omit<IndexingErrorOptions, "code" | "retryable">;

/** Bad input: empty batch, malformed id, non-finite vector, unknown enum value. */
export class ValidationError extends IndexingError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "VALIDATION_ERROR", retryable: false });
  }
}

export class ConfigurationError extends IndexingError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "CONFIG_ERROR", retryable: false });
  }
}

export class NotFoundError extends IndexingError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "NOT_FOUND", retryable: false });
  }
}

/** Timeouts, rate limits, unavailable backends. */
export class TransientError extends IndexingError {
  constructor(message: string, options: SubclassOptions & { code?: string } = {}) {
    super(message, { ...options, code: options.code ?? "TRANSIENT_ERROR", retryable: true });
  }
}

export class TimeoutError extends TransientError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "TIMEOUT" });
  }
}

/** Raised once an embedding batch cannot be produced; names the chunks it covered. */
export class EmbeddingError extends IndexingError {
  readonly chunkIds: string[];

  constructor(message: string, chunkIds: string[], options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: "EMBEDDING_FAILED",
      retryable: false,
      context: { ...options.context, chunkIds },
    });
    this.chunkIds = chunkIds;
  }
}

export class LockTimeoutError extends IndexingError {
  readonly key: string;

  constructor(key: string, timeoutMs: number) {
    super(`Could not acquire lock for ${key} within ${timeoutMs}ms`, {
      code: "LOCK_TIMEOUT",
      retryable: true,
      context: { key, timeoutMs },
    });
    this.key = key;
  }
}

export class DriftError extends IndexingError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "INDEX_DRIFT", retryable: false });
  }
}

export interface UnitFailure {
  unitId: string;
  code: string;
  message: string;
  chunkIds?: string[];
}

/** Every unit a sync attempted failed; nothing was committed. */
export class SyncFailedError extends IndexingError {
  readonly failures: UnitFailure[];

  constructor(failures: UnitFailure[], options: SubclassOptions = {}) {
    const first = failures[0];
    const summary = first ? `${first.unitId}: ${first.message}` : "no units attempted";
    super(`Sync failed for all ${failures.length} unit(s) (${summary})`, {
      ...options,
      code: "SYNC_FAILED",
      retryable: failures.some((f) => f.code === "LOCK_TIMEOUT" || f.code === "TIMEOUT"),
      context: { ...options.context, failures },
    });
    this.failures = failures;
  }
}

export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  if (typeof error === "string") return new Error(error);
  return new Error(JSON.stringify(error));
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/** True for Node system errors such as ENOENT or EEXIST. */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof IndexingError && error.retryable;
}

export function toUnitFailure(unitId: string, error: unknown): UnitFailure {
  const err = toError(error);
  const failure: UnitFailure = {
    unitId,
    code: err instanceof IndexingError ? err.code : "INTERNAL_ERROR",
    message: err.message,
  };
  if (err instanceof EmbeddingError) failure.chunkIds = err.chunkIds;
  return failure;
}

/**
 * Reject with a {@link TimeoutError} if `promise` has not settled after `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${what} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
