export type { IRerankScorer } from "./rerank-scorer.interface.js";
export { CohereRerankScorer } from "./cohere-scorer.js";
export type { CohereRerankConfig } from "./cohere-scorer.js";
export { HttpCrossEncoderScorer } from "./http-cross-encoder.js";
export type { HttpCrossEncoderConfig } from "./http-cross-encoder.js";
export { createRerankScorer } from "./factory.js";
