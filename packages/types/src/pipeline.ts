import type { ExtractionResult, ExtractionTier } from "./extraction.js";

export interface IngestionInput {
  knowledgeBase: string;
  fileName: string;
  mimeType: string;
  content: Uint8Array | string;
  documentId?: string;
  targetQuality?: number;
  tiers?: ExtractionTier[];
  metadata?: Record<string, unknown>;
}

export interface IngestionResult {
  documentId: string;
  knowledgeBase: string;
  extraction: ExtractionResult;
  chunkCount: number;
  tokensUsed: number;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IngestionLogEntry {
  documentId: string;
  knowledgeBase: string;
  fileName: string;
  selectedTier: ExtractionTier;
  tiersTried: ExtractionTier[];
  qualityScore: number;
  costUsd: number;
  escalationReason: string;
  chunkCount: number;
  durationMs: number;
}

/** Audit trail of completed ingestions. */
export interface IIngestionLog {
  record(entry: IngestionLogEntry): Promise<void>;
}
