import { z } from "zod";
import { ExternalServiceError, RateLimitedError } from "@stratarag/errors";
import type { IRerankScorer } from "./rerank-scorer.interface.js";

export interface HttpCrossEncoderConfig {
  baseUrl: string;
  fetch?: typeof fetch;
}

const crossEncoderResponseSchema = z.object({
  scores: z.array(z.number()),
});

/**
 * Self-hosted cross-encoder (e.g. bge-reranker) behind `POST /rerank`
 * taking `{query, texts}` and answering `{scores}`.
 */
export class HttpCrossEncoderScorer implements IRerankScorer {
  readonly name = "cross-encoder";
  private baseUrl: string;
  private fetchFn: typeof fetch;

  constructor(config: HttpCrossEncoderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.fetchFn = config.fetch ?? fetch;
  }

  async score(query: string, texts: readonly string[], signal?: AbortSignal): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.fetchFn(`${this.baseUrl}/rerank`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query, texts }),
      signal,
    });

    if (response.status === 429) {
      throw new RateLimitedError("Cross-encoder rate limited");
    }
    if (!response.ok) {
      throw new ExternalServiceError(
        `Cross-encoder failed: ${String(response.status)} ${response.statusText}`,
        "cross-encoder",
      );
    }

    const parsed = crossEncoderResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.scores.length !== texts.length) {
      throw new ExternalServiceError("Cross-encoder returned a malformed response", "cross-encoder");
    }
    return parsed.data.scores;
  }
}
