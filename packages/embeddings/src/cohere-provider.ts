import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@stratarag/types";
import { ExternalServiceError, RateLimitedError, TimeoutError } from "@stratarag/errors";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Injected client, for tests. */
  client?: CohereClient;
}

/** Translate SDK failures into the shared error taxonomy. */
export function mapCohereError(error: unknown, operation: string): Error {
  if (error instanceof CohereTimeoutError) {
    return new TimeoutError(`cohere:${operation}`, 0, { cause: error });
  }
  if (error instanceof CohereError) {
    if (error.statusCode === 429) {
      return new RateLimitedError(`Cohere ${operation} rate limited`, undefined, { cause: error });
    }
    return new ExternalServiceError(
      `Cohere ${operation} failed: ${String(error.statusCode ?? "no status")}`,
      "cohere",
      { cause: error },
    );
  }
  return error instanceof Error ? error : new Error(String(error));
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], { inputType: "query", ...options });
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;
    const inputType = options?.inputType === "query" ? "search_query" : "search_document";

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.v2
        .embed(
          {
            texts: batch,
            model: this.model,
            inputType,
            embeddingTypes: ["float"],
          },
          { abortSignal: options?.signal },
        )
        .catch((error: unknown) => {
          throw mapCohereError(error, "embed");
        });

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw new ExternalServiceError(
          `Cohere returned ${String(vectors.length)} embeddings for ${String(batch.length)} texts`,
          "cohere",
        );
      }
      allEmbeddings.push(...vectors);

      // Use actual tokensUsed from Cohere response for billing accuracy
      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: allEmbeddings[0]?.length ?? this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
