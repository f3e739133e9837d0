import type { ExtractionTier } from "./extraction.js";

export interface ChunkingConfig {
  /** Target chunk size in characters. */
  chunkSize: number;
  /** Characters carried over from the end of one chunk into the next. */
  overlap: number;
  separators?: string[];
}

export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: {
    startChar: number;
    endChar: number;
    page?: number;
    section?: string;
  };
}

export interface ChunkSource {
  sourceFile: string;
  page?: number;
  section?: string;
  documentId?: string;
}

export interface ChunkPayload extends ChunkSource {
  chunkIndex: number;
  tier?: ExtractionTier;
  qualityScore?: number;
  [key: string]: unknown;
}

export interface SparseVector {
  indices: number[];
  values: number[];
}

/** One chunk as written to the vector store. */
export interface ChunkRecord {
  chunkId: string;
  documentId: string;
  text: string;
  dense: number[];
  sparse: SparseVector;
  metadata: ChunkPayload;
}

/** A chunk read back from the vector store, without its vectors. */
export interface StoredChunk {
  chunkId: string;
  documentId: string;
  text: string;
  metadata: ChunkPayload;
}
