import type { RerankerConfig } from "@stratarag/types";
import { ValidationError } from "@stratarag/errors";
import type { IRerankScorer } from "./rerank-scorer.interface.js";
import { CohereRerankScorer } from "./cohere-scorer.js";
import { HttpCrossEncoderScorer } from "./http-cross-encoder.js";

/** Returns undefined when reranking is switched off. */
export function createRerankScorer(config: RerankerConfig): IRerankScorer | undefined {
  switch (config.provider) {
    case "none":
      return undefined;
    case "cohere":
      if (!config.cohereApiKey) {
        throw new ValidationError("Cohere API key is required for the cohere reranker", {
          COHERE_API_KEY: "required",
        });
      }
      return new CohereRerankScorer({ apiKey: config.cohereApiKey, model: config.cohereModel });
    case "cross-encoder":
      if (!config.crossEncoderUrl) {
        throw new ValidationError("Cross-encoder URL is required", { CROSS_ENCODER_URL: "required" });
      }
      return new HttpCrossEncoderScorer({ baseUrl: config.crossEncoderUrl });
  }
}
