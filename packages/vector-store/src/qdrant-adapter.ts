import { QdrantClient } from "@qdrant/js-client-rest";
import type { ChunkRecord, SparseVector, StoredChunk, VectorMatch } from "@stratarag/types";
import { NotFoundError, SearchBackendUnavailableError } from "@stratarag/errors";
import {
  DENSE_VECTOR_NAME,
  SPARSE_VECTOR_NAME,
  toCollectionName,
  type ChunkFilter,
  type IVectorStore,
} from "./vector-store.interface.js";
import { fromPayload, toPayload } from "./payload.js";

const BATCH_SIZE = 100;
const SCROLL_PAGE_SIZE = 256;

function httpStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string, client?: QdrantClient) {
    this.client = client ?? new QdrantClient({ url, apiKey, checkCompatibility: false });
  }

  /** Run a client call, translating transport failures and missing collections. */
  private async call<T>(knowledgeBase: string, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      if (httpStatus(error) === 404) {
        throw new NotFoundError(`Collection for knowledge base '${knowledgeBase}' not found`, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new SearchBackendUnavailableError("qdrant", `qdrant ${operation} failed: ${reason}`, {
        cause: error,
      });
    }
  }

  async ensureCollection(knowledgeBase: string, dimensions: number): Promise<void> {
    if (await this.collectionExists(knowledgeBase)) {
      return;
    }
    const collection = toCollectionName(knowledgeBase);

    await this.call(knowledgeBase, "createCollection", async () => {
      await this.client.createCollection(collection, {
        vectors: {
          [DENSE_VECTOR_NAME]: { size: dimensions, distance: "Cosine" },
        },
        sparse_vectors: {
          [SPARSE_VECTOR_NAME]: { modifier: "idf" },
        },
        optimizers_config: {
          indexing_threshold: 20000,
        },
      });

      // Payload index for per-document deletes
      await this.client.createPayloadIndex(collection, {
        field_name: "documentId",
        field_schema: "keyword",
      });
    });
  }

  async collectionExists(knowledgeBase: string): Promise<boolean> {
    const result = await this.call(knowledgeBase, "collectionExists", () =>
      this.client.collectionExists(toCollectionName(knowledgeBase)),
    );
    return result.exists;
  }

  async deleteCollection(knowledgeBase: string): Promise<void> {
    if (!(await this.collectionExists(knowledgeBase))) {
      return;
    }
    await this.call(knowledgeBase, "deleteCollection", () =>
      this.client.deleteCollection(toCollectionName(knowledgeBase)),
    );
  }

  async upsert(knowledgeBase: string, records: ChunkRecord[]): Promise<void> {
    const collection = toCollectionName(knowledgeBase);

    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.call(knowledgeBase, "upsert", () =>
        this.client.upsert(collection, {
          wait: true,
          points: batch.map((r) => ({
            id: r.chunkId,
            vector: {
              [DENSE_VECTOR_NAME]: r.dense,
              [SPARSE_VECTOR_NAME]: { indices: r.sparse.indices, values: r.sparse.values },
            },
            payload: toPayload(r),
          })),
        }),
      );
    }
  }

  async denseSearch(knowledgeBase: string, vector: number[], limit: number): Promise<VectorMatch[]> {
    const result = await this.call(knowledgeBase, "denseSearch", () =>
      this.client.query(toCollectionName(knowledgeBase), {
        query: vector,
        using: DENSE_VECTOR_NAME,
        limit,
        with_payload: false,
      }),
    );
    return result.points.map((p) => ({ chunkId: String(p.id), score: p.score }));
  }

  async sparseSearch(
    knowledgeBase: string,
    vector: SparseVector,
    limit: number,
  ): Promise<VectorMatch[]> {
    if (vector.indices.length === 0) {
      return [];
    }
    const result = await this.call(knowledgeBase, "sparseSearch", () =>
      this.client.query(toCollectionName(knowledgeBase), {
        query: { indices: vector.indices, values: vector.values },
        using: SPARSE_VECTOR_NAME,
        limit,
        with_payload: false,
      }),
    );
    return result.points.map((p) => ({ chunkId: String(p.id), score: p.score }));
  }

  async fetchChunks(knowledgeBase: string, chunkIds: string[]): Promise<Map<string, StoredChunk>> {
    const chunks = new Map<string, StoredChunk>();
    if (chunkIds.length === 0) {
      return chunks;
    }

    const records = await this.call(knowledgeBase, "retrieve", () =>
      this.client.retrieve(toCollectionName(knowledgeBase), {
        ids: chunkIds,
        with_payload: true,
        with_vector: false,
      }),
    );

    for (const record of records) {
      const id = String(record.id);
      const chunk = fromPayload(id, record.payload);
      if (chunk) {
        chunks.set(id, chunk);
      }
    }
    return chunks;
  }

  async listChunks(knowledgeBase: string, filter?: ChunkFilter): Promise<StoredChunk[]> {
    const collection = toCollectionName(knowledgeBase);
    const scrollFilter =
      filter?.documentId !== undefined
        ? { must: [{ key: "documentId", match: { value: filter.documentId } }] }
        : undefined;

    const chunks: StoredChunk[] = [];
    let offset: string | number | Record<string, unknown> | undefined;
    do {
      const page = await this.call(knowledgeBase, "scroll", () =>
        this.client.scroll(collection, {
          filter: scrollFilter,
          limit: SCROLL_PAGE_SIZE,
          with_payload: true,
          with_vector: false,
          ...(offset !== undefined ? { offset } : {}),
        }),
      );
      for (const point of page.points) {
        const chunk = fromPayload(String(point.id), point.payload);
        if (chunk) {
          chunks.push(chunk);
        }
      }
      offset = page.next_page_offset ?? undefined;
    } while (offset !== undefined);

    return chunks;
  }

  async deleteByDocument(knowledgeBase: string, documentId: string): Promise<number> {
    const collection = toCollectionName(knowledgeBase);
    const filter = { must: [{ key: "documentId", match: { value: documentId } }] };

    const { count } = await this.call(knowledgeBase, "count", () =>
      this.client.count(collection, { filter, exact: true }),
    );
    await this.call(knowledgeBase, "delete", () =>
      this.client.delete(collection, { wait: true, filter }),
    );
    return count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
