import { describe, it, expect } from "vitest";
import { parseEnv } from "@stratarag/config";
import { InMemoryKnowledgeBaseStore } from "@stratarag/core";
import { PlainTextTierClient } from "@stratarag/extraction";
import { LlmMetadataExtractor } from "@stratarag/llm";
import type { ILlmGateway } from "@stratarag/llm";
import { createSilentLogger } from "@stratarag/logger";
import { InMemoryVectorStore } from "@stratarag/vector-store";
import { assembleServices } from "./services.js";
import { createTestServices, KeywordEmbeddingProvider, testConfig } from "./testing.js";

describe("assembleServices", () => {
  it("leaves answering off without a chat model", () => {
    expect(createTestServices().answer).toBeUndefined();
  });

  it("passes configuration through to the pipeline", () => {
    const config = testConfig();
    const services = createTestServices({
      name: "fake",
      generate: async () => ({ text: "", model: "m", inputTokens: 0, outputTokens: 0 }),
    });

    expect(services.retriever.config.topK).toBe(config.search.topK);
    expect(services.ingestion.defaultTargetQuality).toBe(0.7);
    expect(services.ingestion.chunking).toEqual({ chunkSize: 1000, overlap: 200 });
    expect(services.answer?.historyTokenLimit).toBe(3000);
  });

  it("classifies documents only when metadata extraction is on and a chat model exists", () => {
    const llm: ILlmGateway = {
      name: "fake",
      generate: async () => ({ text: "", model: "m", inputTokens: 0, outputTokens: 0 }),
    };
    const build = (extract: "true" | "false", chat?: ILlmGateway) =>
      assembleServices({
        config: parseEnv({
          NODE_ENV: "test",
          VECTOR_STORE: "memory",
          COHERE_API_KEY: "test-secret",
          RERANKER_PROVIDER: "none",
          METADATA_EXTRACTION: extract,
        }),
        logger: createSilentLogger(),
        knowledgeBaseStore: new InMemoryKnowledgeBaseStore(),
        vectorStore: new InMemoryVectorStore(),
        embeddingProvider: new KeywordEmbeddingProvider(),
        tierClients: { fast: new PlainTextTierClient() },
        llm: chat,
      });

    expect(build("true", llm).ingestion.metadataExtractor).toBeInstanceOf(LlmMetadataExtractor);
    expect(build("true").ingestion.metadataExtractor).toBeUndefined();
    expect(build("false", llm).ingestion.metadataExtractor).toBeUndefined();
  });

  it("plans only the tiers that have a client", () => {
    const planned = createTestServices().ingestion.extractor.plan();
    expect(planned.map((p) => p.profile.tier)).toEqual(["fast"]);
  });

  it("shares one descriptor store between knowledge bases and ingestion", async () => {
    const services = createTestServices();
    await services.knowledgeBases.create({ name: "hr", description: "Leave policies" });

    expect(await services.ingestion.knowledgeBases.get("hr")).toMatchObject({ name: "hr" });
    expect((await services.router.routeQuery("leave")).knowledgeBase).toBe("hr");
  });
});

describe("KeywordEmbeddingProvider", () => {
  it("counts vocabulary words", () => {
    expect(new KeywordEmbeddingProvider().vectorFor("Leave, leave and a refund")).toEqual([2, 0, 0, 1, 0, 0]);
  });
});
