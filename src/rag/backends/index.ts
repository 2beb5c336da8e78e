import type { IndexConfig } from "../config.js";
import type { VectorIndex } from "../vector-store.js";
import { MemoryVectorIndex, type MemoryStore } from "./memory-index.js";
import { VectraIndex } from "./vectra-index.js";

export { MemoryVectorIndex, VectraIndex };
export type { MemoryStore };

/** Pick the adapter named by `config.backend`. Callers only see {@link VectorIndex}. */
export function createVectorIndex(config: IndexConfig, embeddingVersion: string): VectorIndex {
  switch (config.backend) {
    case "memory":
      return new MemoryVectorIndex({
        namespace: config.namespace,
        embeddingVersion,
        oversample: config.oversample,
      });
    case "vectra":
      return new VectraIndex(config, { embeddingVersion });
  }
}
