import type {
  AppConfig,
  IIngestionLog,
  IKnowledgeBaseStore,
} from "@stratarag/types";
import { createChunker } from "@stratarag/chunker";
import { resolveTierProfiles } from "@stratarag/config";
import {
  HybridRetriever,
  InMemoryKnowledgeBaseStore,
  KnowledgeBaseManager,
  ProgressiveExtractor,
  SemanticRouter,
} from "@stratarag/core";
import type {
  AnswerDependencies,
  DocumentStoreDependencies,
  IngestionDependencies,
  TierClients,
} from "@stratarag/core";
import { PgIngestionLog, PgKnowledgeBaseStore, createDbClient, ensureSchema } from "@stratarag/db";
import type { DbHandle } from "@stratarag/db";
import { Bm25SparseEncoder, createEmbeddingProvider, embeddingFactoryConfigFrom } from "@stratarag/embeddings";
import type { IEmbeddingProvider } from "@stratarag/embeddings";
import { createTierClients } from "@stratarag/extraction";
import { LlmMetadataExtractor, createLlmGateway } from "@stratarag/llm";
import type { ILlmGateway } from "@stratarag/llm";
import type { Logger } from "@stratarag/logger";
import { createRerankScorer } from "@stratarag/reranker";
import type { IRerankScorer } from "@stratarag/reranker";
import { createVectorStore } from "@stratarag/vector-store";
import type { IVectorStore } from "@stratarag/vector-store";

/** Already-constructed collaborators; everything else is derived from them. */
export interface ServiceParts {
  config: AppConfig;
  logger: Logger;
  knowledgeBaseStore: IKnowledgeBaseStore;
  ingestionLog?: IIngestionLog;
  vectorStore: IVectorStore;
  embeddingProvider: IEmbeddingProvider;
  reranker?: IRerankScorer;
  tierClients: TierClients;
  llm?: ILlmGateway;
}

export interface PipelineServices {
  config: AppConfig;
  logger: Logger;
  vectorStore: IVectorStore;
  router: SemanticRouter;
  retriever: HybridRetriever;
  knowledgeBases: KnowledgeBaseManager;
  ingestion: IngestionDependencies;
  documents: DocumentStoreDependencies;
  /** Undefined when no chat model is configured. */
  answer: AnswerDependencies | undefined;
  close(): Promise<void>;
}

export function assembleServices(parts: ServiceParts, close: () => Promise<void> = async () => undefined): PipelineServices {
  const { config, logger, knowledgeBaseStore, vectorStore, embeddingProvider } = parts;
  const sparseEncoder = new Bm25SparseEncoder();

  const router = new SemanticRouter({
    store: knowledgeBaseStore,
    embeddingProvider,
    floor: config.router.similarityFloor,
    logger,
  });
  const retriever = new HybridRetriever({
    embeddingProvider,
    sparseEncoder,
    vectorStore,
    reranker: parts.reranker,
    config: config.search,
    logger,
  });
  const extractor = new ProgressiveExtractor({
    clients: parts.tierClients,
    profiles: resolveTierProfiles(config.extraction),
    logger,
  });

  const ingestion: IngestionDependencies = {
    knowledgeBases: knowledgeBaseStore,
    extractor,
    chunker: createChunker("markdown"),
    chunking: config.chunking,
    embeddingProvider,
    sparseEncoder,
    vectorStore,
    defaultTargetQuality: config.extraction.targetQuality,
    ingestionLog: parts.ingestionLog,
    logger,
  };
  if (config.llm.extractMetadata) {
    if (parts.llm) {
      ingestion.metadataExtractor = new LlmMetadataExtractor(parts.llm, logger);
    } else {
      logger.warn("METADATA_EXTRACTION is on but no chat model is configured, skipping it");
    }
  }

  return {
    config,
    logger,
    vectorStore,
    router,
    retriever,
    knowledgeBases: new KnowledgeBaseManager({
      store: knowledgeBaseStore,
      vectorStore,
      embeddingProvider,
      router,
      logger,
    }),
    ingestion,
    documents: { knowledgeBases: knowledgeBaseStore, vectorStore },
    answer: parts.llm
      ? {
          retriever,
          router,
          embeddingProvider,
          llm: parts.llm,
          historyTokenLimit: config.llm.historyTokenLimit,
          logger,
        }
      : undefined,
    close,
  };
}

/**
 * Build every backend client named by the configuration. Postgres is used
 * when DATABASE_URL is set; otherwise descriptors live in memory.
 */
export async function createPipelineServices(config: AppConfig, logger: Logger): Promise<PipelineServices> {
  let db: DbHandle | undefined;
  let knowledgeBaseStore: IKnowledgeBaseStore;
  let ingestionLog: IIngestionLog | undefined;

  if (config.database) {
    db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
    await ensureSchema(db.db);
    knowledgeBaseStore = new PgKnowledgeBaseStore(db.db);
    ingestionLog = new PgIngestionLog(db.db);
  } else {
    logger.warn("DATABASE_URL not set, knowledge base descriptors are kept in memory");
    knowledgeBaseStore = new InMemoryKnowledgeBaseStore();
  }

  let llm: ILlmGateway | undefined;
  if (config.llm.cohereApiKey) {
    llm = createLlmGateway(config.llm);
  } else {
    logger.warn("COHERE_API_KEY not set, answer generation is disabled");
  }

  const handle = db;
  return assembleServices(
    {
      config,
      logger,
      knowledgeBaseStore,
      ingestionLog,
      vectorStore: createVectorStore(config.vectorStore),
      embeddingProvider: createEmbeddingProvider(embeddingFactoryConfigFrom(config.embedding)),
      reranker: createRerankScorer(config.reranker),
      tierClients: createTierClients(config.extraction, { logger }),
      llm,
    },
    async () => {
      await handle?.close();
    },
  );
}
