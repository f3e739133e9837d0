export type { ApiEnvelope, ApiSuccess, ApiFailure, ApiErrorBody, QueuedJobView } from "./api.js";
export type {
  ChunkingConfig,
  ChunkResult,
  ChunkSource,
  ChunkPayload,
  SparseVector,
  ChunkRecord,
  StoredChunk,
} from "./chunk.js";
export type {
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  VectorStoreConfig,
  EmbeddingConfig,
  RerankerConfig,
  LlmConfig,
  ExtractionConfig,
  SearchConfig,
  RouterConfig,
  ChunkingSettings,
} from "./config.js";
export { EXTRACTION_TIERS, QUALITY_DIMENSIONS } from "./extraction.js";
export type {
  ExtractionTier,
  TierProfile,
  ExtractionDocument,
  TierOutput,
  IExtractionTierClient,
  QualityDimension,
  QualityRecommendation,
  QualityWeights,
  DimensionReport,
  QualityReport,
  ExtractionAttempt,
  TierFailureCode,
  TierFailure,
  ExtractionResult,
} from "./extraction.js";
export type {
  JobType,
  JobStatus,
  JobData,
  IngestJobData,
  DeleteDocumentJobData,
  AnyJobData,
  JobResult,
} from "./job.js";
export type {
  KnowledgeBaseDescriptor,
  CreateKnowledgeBaseRequest,
  UpdateKnowledgeBaseRequest,
  IKnowledgeBaseStore,
  RouteMatch,
  RouteMissReason,
  RouteResult,
} from "./knowledge-base.js";
export type {
  IngestionInput,
  IngestionResult,
  EmbeddingResult,
  IngestionLogEntry,
  IIngestionLog,
} from "./pipeline.js";
export type {
  TargetModel,
  SearchRequest,
  SearchHit,
  SourceSummaryEntry,
  SearchDiagnostics,
  FusedResultSet,
  VectorMatch,
  ConversationTurn,
  AnswerRequest,
  AnswerResult,
} from "./retrieval.js";
export type {
  DocumentMetadata,
  IMetadataExtractor,
  DocumentSummary,
  DocumentChunkView,
  DocumentDetail,
  DocumentPage,
  DocumentUpdateResult,
} from "./document.js";
export type { TraceSink } from "./trace.js";
