import type { Chunk } from "../types.js";

/**
 * A fixed, named token-counting scheme. `encode` must be deterministic, and the
 * concatenated `tokenBytes` of `encode(text)` must equal the UTF-8 bytes of `text`.
 */
export interface Tokenizer {
  readonly name: string;
  encode(text: string): number[];
  tokenBytes(token: number): Uint8Array;
}

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
  preserveBoundaries: boolean;
  tokenizer: Tokenizer;
  /** Upper bound on a chunk's text length in UTF-16 units; defaults to the stored maximum. */
  maxChars?: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(unitId: string, text: string): Chunk[];
}
