import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    PORT: "3000",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/test",
    REDIS_URL: "redis://localhost:6379",
    QDRANT_URL: "http://localhost:6333",
    COHERE_API_KEY: "test-secret",
    OPENROUTER_API_KEY: "test-secret",
    ...overrides,
  };
}

function without(env: Record<string, string>, ...keys: string[]): Record<string, string> {
  const copy = { ...env };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe("info");
    expect(config.database).toEqual({ url: "postgresql://localhost:5432/test", poolMax: 10 });
    expect(config.redis.url).toBe("redis://localhost:6379");
    expect(config.vectorStore).toEqual({
      provider: "qdrant",
      qdrantUrl: "http://localhost:6333",
      qdrantApiKey: undefined,
    });
    expect(config.embedding.provider).toBe("cohere");
    expect(config.embedding.cohereModel).toBe("embed-v4.0");
    expect(config.reranker.cohereModel).toBe("rerank-v3.5");
  });

  it("applies retrieval and extraction defaults", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.search).toEqual({
      topK: 5,
      limitMultiplier: 2,
      rrfK: 60,
      rerankThreshold: 0,
      searchTimeoutMs: 10000,
      rerankTimeoutMs: 5000,
    });
    expect(config.router.similarityFloor).toBe(0.5);
    expect(config.extraction.targetQuality).toBe(0.7);
    expect(config.extraction.enabledTiers).toEqual({ fast: true, balanced: true, premium: true });
    expect(config.chunking).toEqual({ chunkSize: 1000, overlap: 200 });
  });

  it("reads tier switches", () => {
    const config = parseEnv(makeValidEnv({ EXTRACTION_ENABLE_BALANCED: "false" }));
    expect(config.extraction.enabledTiers.balanced).toBe(false);
  });

  it("leaves database undefined without DATABASE_URL", () => {
    const config = parseEnv(without(makeValidEnv(), "DATABASE_URL"));
    expect(config.database).toBeUndefined();
  });

  it("rejects a non-postgres DATABASE_URL", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow();
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });

  it("rejects a target quality above 1", () => {
    expect(() => parseEnv(makeValidEnv({ EXTRACTION_TARGET_QUALITY: "1.5" }))).toThrow();
  });

  it("requires a Cohere key for Cohere embeddings", () => {
    expect(() => parseEnv(without(makeValidEnv(), "COHERE_API_KEY"))).toThrow(
      /COHERE_API_KEY is required/,
    );
  });

  it("requires BGE_M3_URL for the bge-m3 provider", () => {
    expect(() =>
      parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3", RERANKER_PROVIDER: "none" })),
    ).toThrow(/BGE_M3_URL is required/);
  });

  it("accepts bge-m3 and cross-encoder without a Cohere key", () => {
    const env = without(
      makeValidEnv({
        EMBEDDING_PROVIDER: "bge-m3",
        BGE_M3_URL: "http://localhost:8001",
        RERANKER_PROVIDER: "cross-encoder",
        CROSS_ENCODER_URL: "http://localhost:8002",
      }),
      "COHERE_API_KEY",
    );

    const config = parseEnv(env);

    expect(config.embedding.bgeM3Url).toBe("http://localhost:8001");
    expect(config.reranker.crossEncoderUrl).toBe("http://localhost:8002");
  });

  it("rejects overlap not smaller than chunk size", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "200", CHUNK_OVERLAP: "200" }))).toThrow(
      /CHUNK_OVERLAP/,
    );
  });
});
