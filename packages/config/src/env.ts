import { z } from "zod";
import type { AppConfig } from "@stratarag/types";

const int = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const ratio = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().min(0).max(1));

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((value) => value === "true");

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    PORT: int("3000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database (optional: in-memory descriptor store without it) ----------
    DATABASE_URL: z
      .string()
      .refine((url) => url.startsWith("postgres://") || url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgres:// or postgresql://",
      })
      .optional(),
    DATABASE_POOL_MAX: int("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().min(1).default("http://localhost:6333"),
    QDRANT_API_KEY: z.string().optional(),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),
    EMBEDDING_CACHE_SIZE: int("1000"),

    // ---------- Reranking ----------
    RERANKER_PROVIDER: z.enum(["cohere", "cross-encoder", "none"]).default("cohere"),
    COHERE_RERANK_MODEL: z.string().default("rerank-v3.5"),
    CROSS_ENCODER_URL: z.string().url().optional(),

    // ---------- Answer generation ----------
    COHERE_CHAT_MODEL: z.string().default("command-r-plus-08-2024"),
    LLM_TEMPERATURE: z.string().default("0.3").transform(Number).pipe(z.number().min(0).max(2)),
    HISTORY_TOKEN_LIMIT: int("3000"),
    METADATA_EXTRACTION: flag("false"),

    // ---------- Extraction ----------
    EXTRACTION_TARGET_QUALITY: ratio("0.7"),
    EXTRACTION_ENABLE_FAST: flag("true"),
    EXTRACTION_ENABLE_BALANCED: flag("true"),
    EXTRACTION_ENABLE_PREMIUM: flag("true"),
    EXTRACTION_TIER_TIMEOUT_MS: int("120000"),
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
    OPENROUTER_BALANCED_MODEL: z.string().default("google/gemini-2.0-flash-lite-001"),
    OPENROUTER_PREMIUM_MODEL: z.string().default("google/gemini-2.5-flash"),
    DOCLING_PYTHON_PATH: z.string().default("python3"),
    DOCLING_SCRIPT_PATH: z.string().optional(),

    // ---------- Search ----------
    SEARCH_TOP_K: int("5"),
    SEARCH_LIMIT_MULTIPLIER: int("2"),
    SEARCH_RRF_K: int("60"),
    SEARCH_RERANK_THRESHOLD: z.string().default("0").transform(Number).pipe(z.number()),
    SEARCH_TIMEOUT_MS: int("10000"),
    RERANK_TIMEOUT_MS: int("5000"),

    // ---------- Routing ----------
    ROUTER_SIMILARITY_FLOOR: ratio("0.5"),

    // ---------- Chunking ----------
    CHUNK_SIZE: int("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER=cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER=bge-m3",
      });
    }
    if (env.RERANKER_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when RERANKER_PROVIDER=cohere",
      });
    }
    if (env.RERANKER_PROVIDER === "cross-encoder" && !env.CROSS_ENCODER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CROSS_ENCODER_URL"],
        message: "CROSS_ENCODER_URL is required when RERANKER_PROVIDER=cross-encoder",
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
  });

export type ParsedEnv = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    database: parsed.DATABASE_URL
      ? { url: parsed.DATABASE_URL, poolMax: parsed.DATABASE_POOL_MAX }
      : undefined,

    redis: {
      url: parsed.REDIS_URL,
    },

    vectorStore: {
      provider: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      cohereApiKey: parsed.COHERE_API_KEY,
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
      cacheSize: parsed.EMBEDDING_CACHE_SIZE,
    },

    reranker: {
      provider: parsed.RERANKER_PROVIDER,
      cohereApiKey: parsed.COHERE_API_KEY,
      cohereModel: parsed.COHERE_RERANK_MODEL,
      crossEncoderUrl: parsed.CROSS_ENCODER_URL,
    },

    llm: {
      cohereApiKey: parsed.COHERE_API_KEY,
      model: parsed.COHERE_CHAT_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
      historyTokenLimit: parsed.HISTORY_TOKEN_LIMIT,
      extractMetadata: parsed.METADATA_EXTRACTION,
    },

    extraction: {
      targetQuality: parsed.EXTRACTION_TARGET_QUALITY,
      enabledTiers: {
        fast: parsed.EXTRACTION_ENABLE_FAST,
        balanced: parsed.EXTRACTION_ENABLE_BALANCED,
        premium: parsed.EXTRACTION_ENABLE_PREMIUM,
      },
      tierTimeoutMs: parsed.EXTRACTION_TIER_TIMEOUT_MS,
      openRouterApiKey: parsed.OPENROUTER_API_KEY,
      openRouterBaseUrl: parsed.OPENROUTER_BASE_URL,
      balancedModel: parsed.OPENROUTER_BALANCED_MODEL,
      premiumModel: parsed.OPENROUTER_PREMIUM_MODEL,
      doclingPythonPath: parsed.DOCLING_PYTHON_PATH,
      doclingScriptPath: parsed.DOCLING_SCRIPT_PATH,
    },

    search: {
      topK: parsed.SEARCH_TOP_K,
      limitMultiplier: parsed.SEARCH_LIMIT_MULTIPLIER,
      rrfK: parsed.SEARCH_RRF_K,
      rerankThreshold: parsed.SEARCH_RERANK_THRESHOLD,
      searchTimeoutMs: parsed.SEARCH_TIMEOUT_MS,
      rerankTimeoutMs: parsed.RERANK_TIMEOUT_MS,
    },

    router: {
      similarityFloor: parsed.ROUTER_SIMILARITY_FLOOR,
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },
  };
}
