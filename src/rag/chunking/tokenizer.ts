import { get_encoding, type Tiktoken, type TiktokenEncoding } from "@dqbd/tiktoken";
import { ConfigurationError } from "../errors.js";
import type { Tokenizer } from "./types.js";

const TIKTOKEN_ENCODINGS: readonly TiktokenEncoding[] = [
  "gpt2",
  "r50k_base",
  "p50k_base",
  "p50k_edit",
  "cl100k_base",
];

function isTiktokenEncoding(name: string): name is TiktokenEncoding {
  return TIKTOKEN_ENCODINGS.some((e) => e === name);
}

/**
 * BPE tokenizer backed by tiktoken. Special-token text such as `<|endoftext|>`
 * is encoded as ordinary text rather than rejected.
 */
export class TiktokenTokenizer implements Tokenizer {
  readonly name: string;
  private readonly encoding: Tiktoken;
  private readonly byteCache = new Map<number, Uint8Array>();

  constructor(name: TiktokenEncoding) {
    this.name = name;
    this.encoding = get_encoding(name);
  }

  encode(text: string): number[] {
    return Array.from(this.encoding.encode(text, [], []));
  }

  tokenBytes(token: number): Uint8Array {
    let bytes = this.byteCache.get(token);
    if (!bytes) {
      bytes = this.encoding.decode_single_token_bytes(token);
      this.byteCache.set(token, bytes);
    }
    return bytes;
  }
}

const registry = new Map<string, Tokenizer>();

export function registerTokenizer(tokenizer: Tokenizer): void {
  registry.set(tokenizer.name, tokenizer);
}

/** Tiktoken encodings are created on first use and shared afterwards. */
export function getTokenizer(name: string): Tokenizer {
  const existing = registry.get(name);
  if (existing) return existing;

  if (isTiktokenEncoding(name)) {
    const tokenizer = new TiktokenTokenizer(name);
    registry.set(name, tokenizer);
    return tokenizer;
  }
  throw new ConfigurationError(`Unknown tokenizer: ${name}`, {
    context: { known: [...new Set([...registry.keys(), ...TIKTOKEN_ENCODINGS])] },
  });
}
