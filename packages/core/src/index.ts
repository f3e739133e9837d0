export { QualityScorer, DEFAULT_QUALITY_WEIGHTS, recommendationFor, validateWeights } from "./quality-scorer.js";
export { ProgressiveExtractor, toTierFailure } from "./progressive-extractor.js";
export type { ExtractOptions, PlannedTier, ProgressiveExtractorDeps, TierClients } from "./progressive-extractor.js";

export { reciprocalRankFusion, DEFAULT_RRF_K } from "./rrf.js";
export type { FusedCandidate } from "./rrf.js";
export { deduplicateHits, normalizeText, jaccard, shingles, DEFAULT_DEDUP_THRESHOLD } from "./deduplicate.js";
export type { DedupResult } from "./deduplicate.js";
export { assembleContext, summarizeSources } from "./context-assembler.js";
export { HybridRetriever, DEFAULT_SEARCH_CONFIG } from "./hybrid-retriever.js";
export type { HybridRetrieverDeps, SearchOptions } from "./hybrid-retriever.js";

export { SemanticRouter, selectRoutes, DEFAULT_SIMILARITY_FLOOR } from "./semantic-router.js";
export type { RouteOptions, RoutingEntry, RoutingIndex, SemanticRouterDeps } from "./semantic-router.js";
export { InMemoryKnowledgeBaseStore } from "./knowledge-base-store.js";
export { KnowledgeBaseManager, KNOWLEDGE_BASE_NAME, validateKnowledgeBaseName } from "./knowledge-bases.js";
export type { KnowledgeBaseManagerDeps } from "./knowledge-bases.js";

export { ingest, updateDocument, deleteDocument } from "./ingestion-pipeline.js";
export type { DocumentStoreDependencies, IngestionDependencies, PipelineOptions } from "./ingestion-pipeline.js";
export { listDocuments, getDocument, DEFAULT_DOCUMENT_PAGE_SIZE } from "./documents.js";
export type { GetDocumentOptions, ListDocumentsOptions } from "./documents.js";
export { answer } from "./answer-pipeline.js";
export type { AnswerDependencies } from "./answer-pipeline.js";
