import type { VectorStoreConfig } from "@stratarag/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./in-memory-adapter.js";

export {
  DENSE_VECTOR_NAME,
  SPARSE_VECTOR_NAME,
  toCollectionName,
} from "./vector-store.interface.js";
export type { ChunkFilter, IVectorStore } from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { InMemoryVectorStore } from "./in-memory-adapter.js";
export { cosineSimilarity, sparseToMap } from "./similarity.js";
export { toPayload, fromPayload } from "./payload.js";

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.provider) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.provider)}`);
  }
}
