import type { ChunkingConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { MAX_CHUNK_TEXT_LENGTH } from "../models.js";
import type { Chunk } from "../types.js";
import { getTokenizer } from "./tokenizer.js";
import type { ChunkingStrategy, ChunkOptions } from "./types.js";

const SENTENCE_END = /[.!?]/;
const WHITESPACE = /\s/;

function utf8Length(codePoint: string): number {
  const cp = codePoint.codePointAt(0) ?? 0;
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

/**
 * Maps UTF-8 byte offsets of a text to code-point offsets. Offsets that fall
 * inside a multi-byte character are snapped to one of its edges.
 */
class OffsetMap {
  /** charStarts[i] is the byte offset where code point i begins; the last entry is the total. */
  private readonly charStarts: number[];

  constructor(codePoints: string[]) {
    this.charStarts = new Array<number>(codePoints.length + 1);
    let bytes = 0;
    for (let i = 0; i < codePoints.length; i++) {
      this.charStarts[i] = bytes;
      bytes += utf8Length(codePoints[i] ?? "");
    }
    this.charStarts[codePoints.length] = bytes;
  }

  get totalBytes(): number {
    return this.charStarts[this.charStarts.length - 1] ?? 0;
  }

  /** Largest char index whose start is <= byte. */
  floor(byte: number): number {
    let lo = 0;
    let hi = this.charStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.charStarts[mid] ?? 0) <= byte) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }

  /** Smallest char index whose start is >= byte. */
  ceil(byte: number): number {
    const f = this.floor(byte);
    return (this.charStarts[f] ?? 0) === byte ? f : f + 1;
  }

  isAligned(byte: number): boolean {
    return (this.charStarts[this.floor(byte)] ?? 0) === byte;
  }
}

function validateOptions({ chunkSize, overlap, maxChars }: ChunkOptions): void {
  if (maxChars !== undefined && (!Number.isInteger(maxChars) || maxChars <= 0)) {
    throw new ValidationError(`maxChars must be a positive integer, got ${maxChars}`);
  }
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ValidationError(`overlap (${overlap}) must be less than chunkSize (${chunkSize})`);
  }
}

/**
 * Splits `text` into overlapping windows of at most `chunkSize` tokens.
 *
 * Each window after the first starts `overlap` tokens before the previous
 * window's end, and always after the previous window's start. With
 * `preserveBoundaries`, a window that does not reach the end of the text is
 * shortened to the nearest paragraph or sentence break within the last quarter
 * of the window; if there is none the raw token cut is used. A window whose
 * text would exceed `maxChars` is first cut back to the longest token prefix
 * that fits.
 */
export function chunkText(unitId: string, text: string, options: ChunkOptions): Chunk[] {
  validateOptions(options);
  if (text.trim() === "") return [];

  const { chunkSize, overlap, preserveBoundaries, tokenizer } = options;
  const maxChars = options.maxChars ?? MAX_CHUNK_TEXT_LENGTH;
  const codePoints = Array.from(text);
  const offsets = new OffsetMap(codePoints);

  // unitStarts[i] is the UTF-16 offset of code point i.
  const unitStarts = new Array<number>(codePoints.length + 1);
  let units = 0;
  for (let i = 0; i < codePoints.length; i++) {
    unitStarts[i] = units;
    units += (codePoints[i] ?? "").length;
  }
  unitStarts[codePoints.length] = units;
  const tokens = tokenizer.encode(text);

  const tokenStarts = new Array<number>(tokens.length + 1);
  let bytes = 0;
  for (let i = 0; i < tokens.length; i++) {
    tokenStarts[i] = bytes;
    bytes += tokenizer.tokenBytes(tokens[i] ?? 0).length;
  }
  tokenStarts[tokens.length] = bytes;

  if (bytes !== offsets.totalBytes) {
    throw new Error(
      `Tokenizer ${tokenizer.name} covered ${bytes} bytes of a ${offsets.totalBytes}-byte text`,
    );
  }

  const byteAt = (token: number): number => tokenStarts[token] ?? bytes;

  const isBoundary = (token: number): boolean => {
    const byte = byteAt(token);
    if (!offsets.isAligned(byte)) return false;
    const charIndex = offsets.floor(byte);
    const prev = codePoints[charIndex - 1];
    if (prev === undefined) return false;
    if (prev === "\n") return true;
    const next = codePoints[charIndex];
    return SENTENCE_END.test(prev) && (next === undefined || WHITESPACE.test(next));
  };

  const spanLength = (start: number, end: number): number =>
    (unitStarts[offsets.ceil(byteAt(end))] ?? units) -
    (unitStarts[offsets.floor(byteAt(start))] ?? 0);

  const fitLength = (start: number, end: number): number => {
    if (spanLength(start, end) <= maxChars) return end;
    if (spanLength(start, start + 1) > maxChars) {
      throw new ValidationError(
        `Token ${start} of ${unitId} is longer than ${maxChars} characters on its own`,
      );
    }
    let lo = start + 1;
    let hi = end - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (spanLength(start, mid) <= maxChars) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  };

  const lookback = Math.max(1, Math.floor(chunkSize / 4));
  const findBoundary = (start: number, end: number): number | null => {
    const floor = Math.max(start + 1, end - lookback);
    for (let t = end; t >= floor; t--) {
      if (isBoundary(t)) return t;
    }
    return null;
  };

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < tokens.length) {
    const limit = Math.min(start + chunkSize, tokens.length);
    let end = fitLength(start, limit);
    // A window cut short by maxChars keeps at most half of itself as overlap.
    const stepOverlap = end < limit ? Math.min(overlap, Math.floor((end - start) / 2)) : overlap;
    if (preserveBoundaries && end < tokens.length) {
      end = findBoundary(start, end) ?? end;
    }

    const startChar = offsets.floor(byteAt(start));
    const endChar = offsets.ceil(byteAt(end));
    chunks.push({
      unitId,
      chunkIndex: chunks.length,
      startChar,
      endChar,
      startToken: start,
      text: codePoints.slice(startChar, endChar).join(""),
      tokenCount: end - start,
    });

    if (end >= tokens.length) break;
    start = Math.max(start + 1, end - stepOverlap);
  }

  return chunks;
}

export class TokenChunker implements ChunkingStrategy {
  readonly name = "token-chunker";
  private readonly options: ChunkOptions;

  constructor(config: ChunkingConfig) {
    this.options = {
      chunkSize: config.chunkSize,
      overlap: config.overlap,
      preserveBoundaries: config.preserveBoundaries,
      tokenizer: getTokenizer(config.tokenizer),
      maxChars: MAX_CHUNK_TEXT_LENGTH,
    };
    validateOptions(this.options);
  }

  chunk(unitId: string, text: string): Chunk[] {
    return chunkText(unitId, text, this.options);
  }
}
