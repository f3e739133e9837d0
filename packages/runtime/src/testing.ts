/**
 * In-process services for tests and local experiments: memory stores, a
 * keyword embedder and the plain-text extraction tier. Nothing here touches
 * the network.
 */
import type { EmbeddingResult } from "@stratarag/types";
import { parseEnv } from "@stratarag/config";
import { InMemoryKnowledgeBaseStore } from "@stratarag/core";
import type { IEmbeddingProvider } from "@stratarag/embeddings";
import { PlainTextTierClient } from "@stratarag/extraction";
import type { ILlmGateway } from "@stratarag/llm";
import { createSilentLogger } from "@stratarag/logger";
import { InMemoryVectorStore } from "@stratarag/vector-store";
import { assembleServices } from "./services.js";
import type { PipelineServices } from "./services.js";

const VOCABULARY = ["leave", "holiday", "salary", "refund", "shipping", "order"];

/** One dimension per vocabulary word, counting occurrences. */
export class KeywordEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "keywords";
  readonly dimensions = VOCABULARY.length;

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().split(/[^a-z]+/);
    return VOCABULARY.map((term) => words.filter((word) => word === term).length);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map((text) => this.vectorFor(text)),
      model: this.name,
      tokensUsed: texts.length,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

export const testConfig = () =>
  parseEnv({
    NODE_ENV: "test",
    VECTOR_STORE: "memory",
    COHERE_API_KEY: "test-secret",
    RERANKER_PROVIDER: "none",
  });

export function createTestServices(llm?: ILlmGateway): PipelineServices {
  return assembleServices({
    config: testConfig(),
    logger: createSilentLogger(),
    knowledgeBaseStore: new InMemoryKnowledgeBaseStore(),
    vectorStore: new InMemoryVectorStore(),
    embeddingProvider: new KeywordEmbeddingProvider(),
    tierClients: { fast: new PlainTextTierClient() },
    llm,
  });
}
