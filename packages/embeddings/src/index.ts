export type {
  IEmbeddingProvider,
  ISparseEncoder,
  EmbedOptions,
  EmbeddingInputType,
} from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider, mapCohereError } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { CachedEmbeddingProvider } from "./cached-provider.js";
export { Bm25SparseEncoder, hashToken, tokenize } from "./sparse-encoder.js";
export type { Bm25EncoderOptions } from "./sparse-encoder.js";
export { createEmbeddingProvider, embeddingFactoryConfigFrom } from "./factory.js";
export type { EmbeddingFactoryConfig, EmbeddingProviderType } from "./factory.js";
