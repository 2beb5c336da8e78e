import type { EmbeddingConfig } from "./config.js";
import {
  ConfigurationError,
  EmbeddingError,
  IndexingError,
  TimeoutError,
  TransientError,
  ValidationError,
  getErrorMessage,
} from "./errors.js";
import { mapWithConcurrency } from "./concurrency.js";
import { getLogger } from "./logger.js";
import { RetryPolicy } from "./retry.js";
import type { ProgressCallback } from "./types.js";

const log = getLogger("embedding");

export interface EmbeddingInput {
  id: string;
  text: string;
}

/** One round trip to an embedding service. No batching, retry or validation. */
export interface EmbeddingProvider {
  readonly model: string;
  embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]>;
}

interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index?: number }>;
}

function isEmbeddingResponse(value: unknown): value is EmbeddingResponse {
  if (typeof value !== "object" || value === null || !("data" in value)) return false;
  const { data } = value;
  return (
    Array.isArray(data) &&
    data.every(
      (item: unknown) =>
        typeof item === "object" &&
        item !== null &&
        "embedding" in item &&
        Array.isArray(item.embedding) &&
        item.embedding.every((n: unknown) => typeof n === "number"),
    )
  );
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Client for any service that speaks the OpenAI `/embeddings` protocol.
 */
export class OpenAICompatibleProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly url: string;

  constructor(
    private readonly config: Pick<EmbeddingConfig, "model" | "baseUrl" | "apiKey">,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    if (config.model.startsWith("local/")) {
      throw new ConfigurationError(`Local embedding models are not supported: ${config.model}`);
    }
    this.model = config.model.startsWith("openai/")
      ? config.model.slice("openai/".length)
      : config.model;
    this.url = `${config.baseUrl.replace(/\/+$/, "")}/embeddings`;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.apiKey) headers["Authorization"] = `Bearer ${this.config.apiKey}`;

    let res: Response;
    try {
      res = await this.fetchFn(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify({ model: this.model, input: texts }),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new TimeoutError(`Embedding request to ${this.url} timed out`, { cause: error });
      }
      throw new TransientError(`Embedding request failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (!res.ok) {
      const body = await res.text();
      const message = `Embedding API error (${res.status}): ${body}`;
      if (res.status === 429 || res.status >= 500) {
        throw new TransientError(message, {
          code: res.status === 429 ? "RATE_LIMITED" : "UPSTREAM_UNAVAILABLE",
          context: { status: res.status },
        });
      }
      throw new IndexingError(message, {
        code: "EMBEDDING_HTTP_ERROR",
        context: { status: res.status },
      });
    }

    const json: unknown = await res.json();
    if (!isEmbeddingResponse(json)) {
      throw new IndexingError("Embedding API returned an unexpected payload", {
        code: "EMBEDDING_BAD_RESPONSE",
      });
    }

    // Some servers return data out of order; `index` restores input order.
    const ordered = [...json.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((item) => item.embedding);
  }
}

export interface EmbedOptions {
  onProgress?: ProgressCallback;
}

/**
 * Splits inputs into batches of at most `batchSize`, embeds them with bounded
 * concurrency, retries transient failures and validates every vector.
 */
export class EmbeddingClient {
  private readonly retry: RetryPolicy;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly config: EmbeddingConfig,
    retry?: RetryPolicy,
  ) {
    this.retry =
      retry ??
      new RetryPolicy({
        maxAttempts: config.maxRetries,
        baseDelayMs: config.baseDelayMs,
        maxDelayMs: config.maxDelayMs,
      });
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embed(inputs: EmbeddingInput[], options: EmbedOptions = {}): Promise<number[][]> {
    if (inputs.length === 0) return [];

    const batches: EmbeddingInput[][] = [];
    for (let i = 0; i < inputs.length; i += this.config.batchSize) {
      batches.push(inputs.slice(i, i + this.config.batchSize));
    }

    let completed = 0;
    const results = await mapWithConcurrency(batches, this.config.concurrency, async (batch, i) => {
      const vectors = await this.embedBatch(batch, i);
      completed += batch.length;
      options.onProgress?.(completed, inputs.length);
      return vectors;
    });

    return results.flat();
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embed([{ id: "query", text }]);
    if (!vector) {
      throw new EmbeddingError("Embedding service returned no vector for query", ["query"]);
    }
    return vector;
  }

  private async embedBatch(batch: EmbeddingInput[], batchIndex: number): Promise<number[][]> {
    const ids = batch.map((b) => b.id);
    const texts = batch.map((b) => b.text);

    let vectors: number[][];
    try {
      vectors = await this.retry.execute(
        () => this.provider.embedBatch(texts, AbortSignal.timeout(this.config.timeoutMs)),
        { operation: `embedding batch ${batchIndex}` },
      );
    } catch (error) {
      throw new EmbeddingError(
        `Embedding failed for ${ids.length} chunk(s) after up to ${this.retry.maxAttempts} attempt(s): ${getErrorMessage(error)}`,
        ids,
        { cause: error },
      );
    }

    if (vectors.length !== batch.length) {
      throw new ValidationError(
        `Embedding service returned ${vectors.length} vectors for ${batch.length} inputs`,
        { context: { chunkIds: ids } },
      );
    }

    vectors.forEach((vector, i) => {
      if (vector.length !== this.config.dimensions) {
        throw new ValidationError(
          `Expected ${this.config.dimensions} dimensions, got ${vector.length} for chunk ${ids[i]}`,
          { context: { chunkId: ids[i] } },
        );
      }
    });

    log.debug(
      { batch: batchIndex, size: batch.length, model: this.provider.model },
      "embedded batch",
    );
    return vectors;
  }
}

export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  return new EmbeddingClient(new OpenAICompatibleProvider(config), config);
}
