import type { SparseVector } from "@stratarag/types";
import type { ISparseEncoder } from "./embedding-provider.interface.js";

const STOPWORDS: ReadonlySet<string> = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "has", "in", "is", "it",
  "its", "of", "on", "or", "that", "the", "this", "to", "was", "were", "will", "with",
]);

const TOKEN_REGEX = /[\p{L}\p{N}]+/gu;

export interface Bm25EncoderOptions {
  k1?: number;
  b?: number;
  /** Expected document length in tokens, used for length normalization. */
  avgDocLength?: number;
}

const utf8 = new TextEncoder();

/** 32-bit FNV-1a over the token's UTF-8 bytes. */
export function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (const byte of utf8.encode(token)) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  const tokens = text.normalize("NFKC").toLowerCase().match(TOKEN_REGEX) ?? [];
  return tokens.filter((token) => !STOPWORDS.has(token));
}

function toSparse(weights: Map<number, number>): SparseVector {
  const indices = [...weights.keys()].sort((a, b) => a - b);
  return { indices, values: indices.map((index) => weights.get(index) ?? 0) };
}

/**
 * BM25 term-frequency half of the score. Inverse document frequency is left to
 * the vector store, which sees the whole collection.
 */
export class Bm25SparseEncoder implements ISparseEncoder {
  private k1: number;
  private b: number;
  private avgDocLength: number;

  constructor(options?: Bm25EncoderOptions) {
    this.k1 = options?.k1 ?? 1.2;
    this.b = options?.b ?? 0.75;
    this.avgDocLength = options?.avgDocLength ?? 256;
  }

  encodeDocument(text: string): SparseVector {
    const tokens = tokenize(text);
    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const norm = this.k1 * (1 - this.b + (this.b * tokens.length) / this.avgDocLength);
    const weights = new Map<number, number>();
    for (const [token, tf] of counts) {
      const index = hashToken(token);
      const weight = (tf * (this.k1 + 1)) / (tf + norm);
      weights.set(index, (weights.get(index) ?? 0) + weight);
    }
    return toSparse(weights);
  }

  encodeQuery(text: string): SparseVector {
    const weights = new Map<number, number>();
    for (const token of new Set(tokenize(text))) {
      const index = hashToken(token);
      weights.set(index, (weights.get(index) ?? 0) + 1);
    }
    return toSparse(weights);
  }
}
