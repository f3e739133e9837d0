import type { ChunkRecord, SparseVector, StoredChunk, VectorMatch } from "@stratarag/types";

export const DENSE_VECTOR_NAME = "dense";
export const SPARSE_VECTOR_NAME = "bm25";

/** Physical collection backing a knowledge base. */
export function toCollectionName(knowledgeBase: string): string {
  return `kb_${knowledgeBase}`;
}

export interface ChunkFilter {
  documentId?: string;
}

/**
 * Per-knowledge-base chunk index with a dense and a sparse channel. Methods
 * take the knowledge base name; adapters map it to their own collection.
 */
export interface IVectorStore {
  ensureCollection(knowledgeBase: string, dimensions: number): Promise<void>;
  collectionExists(knowledgeBase: string): Promise<boolean>;
  deleteCollection(knowledgeBase: string): Promise<void>;
  upsert(knowledgeBase: string, records: ChunkRecord[]): Promise<void>;
  /** Best matches first. */
  denseSearch(knowledgeBase: string, vector: number[], limit: number): Promise<VectorMatch[]>;
  /** Best matches first; chunks sharing no term with the query are not returned. */
  sparseSearch(knowledgeBase: string, vector: SparseVector, limit: number): Promise<VectorMatch[]>;
  /** Chunks that no longer exist are absent from the map. */
  fetchChunks(knowledgeBase: string, chunkIds: string[]): Promise<Map<string, StoredChunk>>;
  /** Every chunk of the collection, or of one document, without vectors. */
  listChunks(knowledgeBase: string, filter?: ChunkFilter): Promise<StoredChunk[]>;
  deleteByDocument(knowledgeBase: string, documentId: string): Promise<number>;
  healthCheck(): Promise<boolean>;
}
