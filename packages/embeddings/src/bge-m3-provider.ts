import { z } from "zod";
import type { EmbeddingResult } from "@stratarag/types";
import { ExternalServiceError, RateLimitedError } from "@stratarag/errors";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
  fetch?: typeof fetch;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative().default(0),
});

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;
  private fetchFn: typeof fetch;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.fetchFn = config.fetch ?? fetch;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], { inputType: "query", ...options });
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const response = await this.fetchFn(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        texts,
        dimensions: this.dimensions,
        input_type: options?.inputType ?? "document",
      }),
      signal: options?.signal,
    });

    if (response.status === 429) {
      throw new RateLimitedError("BGE-M3 embedding rate limited");
    }
    if (!response.ok) {
      throw new ExternalServiceError(
        `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
        "bge-m3",
      );
    }

    const parsed = bgeM3ResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new ExternalServiceError("BGE-M3 returned a malformed embedding response", "bge-m3");
    }

    return {
      embeddings: parsed.data.embeddings,
      model: "bge-m3",
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
