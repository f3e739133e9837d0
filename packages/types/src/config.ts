import type { ExtractionTier } from "./extraction.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  database?: DatabaseConfig;
  redis: RedisConfig;
  vectorStore: VectorStoreConfig;
  embedding: EmbeddingConfig;
  reranker: RerankerConfig;
  llm: LlmConfig;
  extraction: ExtractionConfig;
  search: SearchConfig;
  router: RouterConfig;
  chunking: ChunkingSettings;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface VectorStoreConfig {
  provider: "qdrant" | "memory";
  qdrantUrl: string;
  qdrantApiKey?: string;
}

export interface EmbeddingConfig {
  provider: "cohere" | "bge-m3";
  cohereApiKey?: string;
  cohereModel: string;
  bgeM3Url?: string;
  cacheSize: number;
}

export interface RerankerConfig {
  provider: "cohere" | "cross-encoder" | "none";
  cohereApiKey?: string;
  cohereModel: string;
  crossEncoderUrl?: string;
}

export interface LlmConfig {
  cohereApiKey?: string;
  model: string;
  temperature: number;
  historyTokenLimit: number;
  /** Ask the chat model for document type, category, status and title at ingestion. */
  extractMetadata: boolean;
}

export interface ExtractionConfig {
  targetQuality: number;
  enabledTiers: Record<ExtractionTier, boolean>;
  tierTimeoutMs: number;
  openRouterApiKey?: string;
  openRouterBaseUrl: string;
  balancedModel: string;
  premiumModel: string;
  doclingPythonPath: string;
  doclingScriptPath?: string;
}

export interface SearchConfig {
  topK: number;
  limitMultiplier: number;
  rrfK: number;
  rerankThreshold: number;
  searchTimeoutMs: number;
  rerankTimeoutMs: number;
}

export interface RouterConfig {
  similarityFloor: number;
}

export interface ChunkingSettings {
  chunkSize: number;
  overlap: number;
}
