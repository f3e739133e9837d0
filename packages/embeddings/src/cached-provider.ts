import { LRUCache } from "lru-cache";
import type { EmbeddingResult } from "@stratarag/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

/**
 * Memoizes single-text `embed` calls (queries, KB descriptions). Batch calls
 * made during ingestion pass straight through.
 */
export class CachedEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  private cache: LRUCache<string, number[]>;

  constructor(
    private inner: IEmbeddingProvider,
    maxEntries = 1_000,
  ) {
    this.name = inner.name;
    this.dimensions = inner.dimensions;
    this.cache = new LRUCache<string, number[]>({ max: maxEntries });
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    const key = `${options?.inputType ?? "query"}\u0000${text}`;
    const hit = this.cache.get(key);
    if (hit) {
      // Callers get their own copy of the cached vector
      return { embeddings: [[...hit]], model: this.inner.name, tokensUsed: 0, dimensions: this.dimensions };
    }

    const result = await this.inner.embed(text, options);
    const [vector] = result.embeddings;
    if (vector) {
      this.cache.set(key, [...vector]);
    }
    return result;
  }

  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.inner.batchEmbed(texts, options);
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }

  get size(): number {
    return this.cache.size;
  }
}
