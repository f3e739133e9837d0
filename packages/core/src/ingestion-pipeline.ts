import { randomUUID } from "node:crypto";
import type {
  ChunkRecord,
  ChunkResult,
  ChunkingConfig,
  DocumentMetadata,
  DocumentUpdateResult,
  EmbeddingResult,
  ExtractionResult,
  IIngestionLog,
  IKnowledgeBaseStore,
  IMetadataExtractor,
  IngestionInput,
  IngestionResult,
  TraceSink,
} from "@stratarag/types";
import { CancelledError, ExternalServiceError, NotFoundError } from "@stratarag/errors";
import { chunkPages } from "@stratarag/chunker";
import type { IChunker } from "@stratarag/chunker";
import type { IEmbeddingProvider, ISparseEncoder } from "@stratarag/embeddings";
import type { IVectorStore } from "@stratarag/vector-store";
import type { Logger } from "@stratarag/logger";
import { noopTraceSink } from "@stratarag/logger";
import type { ProgressiveExtractor } from "./progressive-extractor.js";

export interface IngestionDependencies {
  knowledgeBases: IKnowledgeBaseStore;
  extractor: ProgressiveExtractor;
  chunker: IChunker;
  chunking: ChunkingConfig;
  embeddingProvider: IEmbeddingProvider;
  sparseEncoder: ISparseEncoder;
  vectorStore: IVectorStore;
  defaultTargetQuality: number;
  ingestionLog?: IIngestionLog;
  /** Classifies the first chunk; its fields go into every chunk's metadata. */
  metadataExtractor?: IMetadataExtractor;
  logger?: Logger;
  now?: () => Date;
  onExtracted?: (result: ExtractionResult) => Promise<void>;
  onChunked?: (results: ChunkResult[]) => Promise<void>;
  onEmbedded?: (result: EmbeddingResult) => Promise<void>;
}

export interface PipelineOptions {
  signal?: AbortSignal;
  trace?: TraceSink;
}

async function requireKnowledgeBase(store: IKnowledgeBaseStore, name: string): Promise<void> {
  if (!(await store.get(name))) {
    throw new NotFoundError(`Knowledge base '${name}' not found`);
  }
}

/**
 * Ingestion pipeline: Extract -> Chunk -> Embed (dense + sparse) -> Store
 *
 * Every chunk carries the extraction tier and quality score it came from.
 * A cancelled ingestion still returns the extraction it produced, with no
 * chunks written.
 */
export async function ingest(
  input: IngestionInput,
  deps: IngestionDependencies,
  options?: PipelineOptions,
): Promise<IngestionResult> {
  const { result } = await runIngestion(input, deps, options, false);
  return result;
}

/**
 * Re-ingests a document under its existing id. The previous chunks are
 * removed only once the new ones are embedded, so a failed or cancelled
 * update leaves the old version searchable.
 */
export async function updateDocument(
  input: IngestionInput & { documentId: string },
  deps: IngestionDependencies,
  options?: PipelineOptions,
): Promise<DocumentUpdateResult> {
  const { result, replacedChunks } = await runIngestion(input, deps, options, true);
  return { ...result, replacedChunks };
}

async function runIngestion(
  input: IngestionInput,
  deps: IngestionDependencies,
  options: PipelineOptions | undefined,
  replace: boolean,
): Promise<{ result: IngestionResult; replacedChunks: number }> {
  const started = performance.now();
  const signal = options?.signal;
  const trace = options?.trace ?? noopTraceSink;
  const documentId = input.documentId ?? randomUUID();
  const knowledgeBase = input.knowledgeBase;

  await requireKnowledgeBase(deps.knowledgeBases, knowledgeBase);

  // Phase 1: Extract
  const extraction = await deps.extractor.extract(
    { documentId, fileName: input.fileName, mimeType: input.mimeType, content: input.content },
    {
      targetQuality: input.targetQuality ?? deps.defaultTargetQuality,
      tiers: input.tiers,
      signal,
      trace,
    },
  );
  if (deps.onExtracted) await deps.onExtracted(extraction);

  const result = (chunkCount: number, tokensUsed: number): IngestionResult => ({
    documentId,
    knowledgeBase,
    extraction,
    chunkCount,
    tokensUsed,
  });

  if (extraction.cancelled || signal?.aborted) {
    return { result: result(0, 0), replacedChunks: 0 };
  }

  // Phase 2: Chunk
  const selected = extraction.selected;
  const chunks = chunkPages(deps.chunker, selected.pages, deps.chunking);
  if (deps.onChunked) await deps.onChunked(chunks);

  const firstChunk = chunks[0];
  const documentMetadata: Partial<DocumentMetadata> =
    deps.metadataExtractor && firstChunk ? await deps.metadataExtractor.extract(firstChunk.content, signal) : {};
  const ingestedAt = (deps.now ?? (() => new Date()))().toISOString();

  let tokensUsed = 0;
  let replacedChunks = 0;
  if (chunks.length > 0) {
    // Phase 3: Embed
    const embeddingResult = await deps.embeddingProvider.batchEmbed(
      chunks.map((c) => c.content),
      { inputType: "document", signal },
    );
    if (deps.onEmbedded) await deps.onEmbedded(embeddingResult);
    tokensUsed = embeddingResult.tokensUsed;

    if (signal?.aborted) {
      throw new CancelledError("Ingestion cancelled before indexing");
    }

    // Phase 4: Store
    const records: ChunkRecord[] = chunks.map((chunk, i) => {
      const dense = embeddingResult.embeddings[i];
      if (!dense) {
        throw new ExternalServiceError(
          `Embedding provider returned ${String(embeddingResult.embeddings.length)} vectors for ${String(chunks.length)} chunks`,
          deps.embeddingProvider.name,
        );
      }
      return {
        chunkId: randomUUID(),
        documentId,
        text: chunk.content,
        dense,
        sparse: deps.sparseEncoder.encodeDocument(chunk.content),
        metadata: {
          ...documentMetadata,
          ...input.metadata,
          sourceFile: input.fileName,
          documentId,
          chunkIndex: chunk.index,
          tokenCount: chunk.tokenCount,
          ...(chunk.metadata.page !== undefined ? { page: chunk.metadata.page } : {}),
          ...(chunk.metadata.section !== undefined ? { section: chunk.metadata.section } : {}),
          tier: selected.tier,
          qualityScore: selected.quality.overallScore,
          ingestedAt,
        },
      };
    });

    if (replace) {
      replacedChunks = await deps.vectorStore.deleteByDocument(knowledgeBase, documentId);
    }
    await deps.vectorStore.upsert(knowledgeBase, records);
  } else if (replace) {
    replacedChunks = await deps.vectorStore.deleteByDocument(knowledgeBase, documentId);
  }

  const durationMs = performance.now() - started;
  await deps.ingestionLog?.record({
    documentId,
    knowledgeBase,
    fileName: input.fileName,
    selectedTier: selected.tier,
    tiersTried: extraction.tiersTried,
    qualityScore: selected.quality.overallScore,
    costUsd: extraction.totalCostUsd,
    escalationReason: extraction.escalationReason,
    chunkCount: chunks.length,
    durationMs,
  });

  trace.event("ingestion.complete", {
    documentId,
    knowledgeBase,
    tier: selected.tier,
    chunks: chunks.length,
    durationMs,
  });
  deps.logger?.info(
    { kb: knowledgeBase, documentId, tier: selected.tier, chunks: chunks.length, replacedChunks },
    replace ? "document updated" : "document ingested",
  );

  return { result: result(chunks.length, tokensUsed), replacedChunks };
}

export interface DocumentStoreDependencies {
  knowledgeBases: IKnowledgeBaseStore;
  vectorStore: IVectorStore;
}

/** Remove every chunk of one document. Returns how many were deleted. */
export async function deleteDocument(
  knowledgeBase: string,
  documentId: string,
  deps: DocumentStoreDependencies,
): Promise<number> {
  await requireKnowledgeBase(deps.knowledgeBases, knowledgeBase);
  return deps.vectorStore.deleteByDocument(knowledgeBase, documentId);
}
