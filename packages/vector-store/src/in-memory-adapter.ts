import type { ChunkRecord, SparseVector, StoredChunk, VectorMatch } from "@stratarag/types";
import { NotFoundError, ValidationError } from "@stratarag/errors";
import type { ChunkFilter, IVectorStore } from "./vector-store.interface.js";
import { cosineSimilarity, sparseToMap } from "./similarity.js";

interface Collection {
  dimensions: number;
  points: Map<string, ChunkRecord>;
}

function toStoredChunk(point: ChunkRecord): StoredChunk {
  return {
    chunkId: point.chunkId,
    documentId: point.documentId,
    text: point.text,
    metadata: { ...point.metadata },
  };
}

/**
 * In-process store for tests and local runs. Sparse scores apply the same
 * BM25 inverse document frequency Qdrant's `idf` modifier does.
 */
export class InMemoryVectorStore implements IVectorStore {
  private collections = new Map<string, Collection>();

  private collection(knowledgeBase: string): Collection {
    const collection = this.collections.get(knowledgeBase);
    if (!collection) {
      throw new NotFoundError(`Collection for knowledge base '${knowledgeBase}' not found`);
    }
    return collection;
  }

  async ensureCollection(knowledgeBase: string, dimensions: number): Promise<void> {
    if (!this.collections.has(knowledgeBase)) {
      this.collections.set(knowledgeBase, { dimensions, points: new Map() });
    }
  }

  async collectionExists(knowledgeBase: string): Promise<boolean> {
    return this.collections.has(knowledgeBase);
  }

  async deleteCollection(knowledgeBase: string): Promise<void> {
    this.collections.delete(knowledgeBase);
  }

  async upsert(knowledgeBase: string, records: ChunkRecord[]): Promise<void> {
    const collection = this.collection(knowledgeBase);
    for (const record of records) {
      if (record.dense.length !== collection.dimensions) {
        throw new ValidationError(
          `Expected ${String(collection.dimensions)}-dimensional vectors, got ${String(record.dense.length)}`,
        );
      }
      collection.points.set(record.chunkId, record);
    }
  }

  async denseSearch(knowledgeBase: string, vector: number[], limit: number): Promise<VectorMatch[]> {
    const collection = this.collection(knowledgeBase);
    const scored = [...collection.points.values()].map((point) => ({
      chunkId: point.chunkId,
      score: cosineSimilarity(vector, point.dense),
    }));
    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async sparseSearch(
    knowledgeBase: string,
    vector: SparseVector,
    limit: number,
  ): Promise<VectorMatch[]> {
    const collection = this.collection(knowledgeBase);
    const points = [...collection.points.values()];
    const query = sparseToMap(vector);
    const total = points.length;

    const documentFrequency = new Map<number, number>();
    const docMaps = points.map((point) => sparseToMap(point.sparse));
    for (const doc of docMaps) {
      for (const index of query.keys()) {
        if (doc.has(index)) {
          documentFrequency.set(index, (documentFrequency.get(index) ?? 0) + 1);
        }
      }
    }

    const scored: VectorMatch[] = [];
    points.forEach((point, i) => {
      const doc = docMaps[i];
      if (!doc) {
        return;
      }
      let score = 0;
      for (const [index, weight] of query) {
        const docWeight = doc.get(index);
        if (docWeight === undefined) {
          continue;
        }
        const n = documentFrequency.get(index) ?? 0;
        const idf = Math.log(1 + (total - n + 0.5) / (n + 0.5));
        score += weight * docWeight * idf;
      }
      if (score > 0) {
        scored.push({ chunkId: point.chunkId, score });
      }
    });

    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async fetchChunks(knowledgeBase: string, chunkIds: string[]): Promise<Map<string, StoredChunk>> {
    const collection = this.collection(knowledgeBase);
    const chunks = new Map<string, StoredChunk>();
    for (const id of chunkIds) {
      const point = collection.points.get(id);
      if (point) {
        chunks.set(id, toStoredChunk(point));
      }
    }
    return chunks;
  }

  async listChunks(knowledgeBase: string, filter?: ChunkFilter): Promise<StoredChunk[]> {
    const points = [...this.collection(knowledgeBase).points.values()];
    return points
      .filter((point) => filter?.documentId === undefined || point.documentId === filter.documentId)
      .map(toStoredChunk);
  }

  async deleteByDocument(knowledgeBase: string, documentId: string): Promise<number> {
    const collection = this.collection(knowledgeBase);
    let removed = 0;
    for (const [id, point] of collection.points) {
      if (point.documentId === documentId) {
        collection.points.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
