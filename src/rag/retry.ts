import { isRetryable, toError } from "./errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("retry");

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryContext {
  /** Label used in log lines, e.g. "embedding batch 3". */
  operation: string;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff shared by every component that talks to the network.
 *
 * Attempt `n` (1-based) that fails with a retryable error waits
 * `min(baseDelayMs * 2^(n-1), maxDelayMs)` before attempt `n + 1`. After
 * `maxAttempts` failures the last error is rethrown unchanged.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: RetryOptions, sleep: Sleep = defaultSleep) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs);
    this.sleep = sleep;
  }

  delayFor(attempt: number): number {
    return Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, context: RetryContext): Promise<T> {
    const shouldRetry = context.shouldRetry ?? isRetryable;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !shouldRetry(error)) throw error;

        const delayMs = this.delayFor(attempt);
        log.warn(
          { operation: context.operation, attempt, maxAttempts: this.maxAttempts, delayMs },
          `${context.operation} failed, retrying: ${toError(error).message}`,
        );
        context.onRetry?.(error, attempt, delayMs);
        await this.sleep(delayMs);
      }
    }
  }
}
