import { CohereClient } from "cohere-ai";
import { ExternalServiceError } from "@stratarag/errors";
import { mapCohereError } from "@stratarag/embeddings";
import type { IRerankScorer } from "./rerank-scorer.interface.js";

const DEFAULT_MODEL = "rerank-v3.5";

export interface CohereRerankConfig {
  apiKey: string;
  model?: string;
  client?: CohereClient;
}

export class CohereRerankScorer implements IRerankScorer {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;

  constructor(config: CohereRerankConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async score(query: string, texts: readonly string[], signal?: AbortSignal): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.v2
      .rerank(
        { model: this.model, query, documents: [...texts], topN: texts.length },
        { abortSignal: signal },
      )
      .catch((error: unknown) => {
        throw mapCohereError(error, "rerank");
      });

    // Results come back sorted by relevance; put them back in input order
    const scores = new Array<number | undefined>(texts.length).fill(undefined);
    for (const result of response.results) {
      scores[result.index] = result.relevanceScore;
    }

    return scores.map((score, index) => {
      if (score === undefined) {
        throw new ExternalServiceError(`Cohere rerank returned no score for document ${String(index)}`, "cohere");
      }
      return score;
    });
  }
}
