export { chunkText, TokenChunker } from "./token-chunker.js";
export { getTokenizer, registerTokenizer, TiktokenTokenizer } from "./tokenizer.js";
export type { ChunkingStrategy, ChunkOptions, Tokenizer } from "./types.js";
