import type { ExtractionTier } from "./extraction.js";
import type { IngestionResult } from "./pipeline.js";

/** Document-level fields inferred from the opening text. */
export interface DocumentMetadata {
  docType: string;
  category: string;
  status: string;
  title: string;
}

export interface IMetadataExtractor {
  extract(text: string, signal?: AbortSignal): Promise<DocumentMetadata>;
}

/** One indexed document, assembled from its chunks' payloads. */
export interface DocumentSummary {
  documentId: string;
  knowledgeBase: string;
  fileName: string;
  chunkCount: number;
  tier?: ExtractionTier;
  qualityScore?: number;
  /** ISO timestamp of the ingestion that wrote the chunks. */
  ingestedAt?: string;
  title?: string;
}

export interface DocumentChunkView {
  chunkId: string;
  chunkIndex: number;
  page?: number;
  section?: string;
  text: string;
}

export interface DocumentDetail extends DocumentSummary {
  /** Present when requested; ordered by chunk index. */
  chunks?: DocumentChunkView[];
}

export interface DocumentPage {
  documents: DocumentSummary[];
  total: number;
  limit: number;
  offset: number;
}

export interface DocumentUpdateResult extends IngestionResult {
  /** Chunks of the previous version that were removed. */
  replacedChunks: number;
}
