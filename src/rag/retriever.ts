import type { EmbeddingClient } from "./embedding-service.js";
import { ValidationError } from "./errors.js";
import { getLogger } from "./logger.js";
import type { ChunkMetadata, MetadataFilter } from "./types.js";
import type { VectorIndex } from "./vector-store.js";

const log = getLogger("search");

export const DEFAULT_SEARCH_LIMIT = 10;
export const EXCERPT_LENGTH = 300;

export interface SearchQuery {
  query?: string;
  vector?: number[];
  limit?: number;
  minScore?: number;
  filter?: MetadataFilter;
}

export interface SearchHit {
  id: string;
  score: number;
  rank: number;
  excerpt: string;
  metadata: ChunkMetadata;
}

export interface SearchResponse {
  query: string | null;
  results: SearchHit[];
}

/** Cut to `max` code points, ending with an ellipsis when anything was dropped. */
export function excerpt(text: string, max = EXCERPT_LENGTH): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, max - 1).join("").trimEnd()}…`;
}

export class SearchService {
  constructor(
    private readonly index: VectorIndex,
    private readonly embedder: EmbeddingClient,
  ) {}

  async search(request: SearchQuery): Promise<SearchResponse> {
    const query = request.query?.trim() ?? "";
    if (query === "" && !request.vector) {
      throw new ValidationError("A search needs a non-empty query or a vector");
    }

    const vector = request.vector ?? (await this.embedder.embedQuery(query));
    const results = await this.index.search({
      vector,
      limit: request.limit ?? DEFAULT_SEARCH_LIMIT,
      minScore: request.minScore,
      filter: request.filter,
    });

    log.debug({ query, hits: results.length }, "search complete");
    return {
      query: query === "" ? null : query,
      results: results.map((r) => ({
        id: r.id,
        score: r.score,
        rank: r.rank,
        excerpt: excerpt(r.text),
        metadata: r.metadata,
      })),
    };
  }
}
