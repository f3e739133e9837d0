import { describe, it, expect, vi } from "vitest";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { ChunkRecord } from "@stratarag/types";
import { NotFoundError, SearchBackendUnavailableError } from "@stratarag/errors";
import {
  createVectorStore,
  InMemoryVectorStore,
  QdrantVectorStore,
  cosineSimilarity,
  toCollectionName,
  fromPayload,
} from "./index.js";

function record(
  chunkId: string,
  dense: number[],
  sparse: Record<number, number>,
  documentId = "doc-1",
): ChunkRecord {
  const indices = Object.keys(sparse).map(Number);
  return {
    chunkId,
    documentId,
    text: `text of ${chunkId}`,
    dense,
    sparse: { indices, values: indices.map((i) => sparse[i] ?? 0) },
    metadata: { sourceFile: "handbook.pdf", page: 1, chunkIndex: 0, documentId },
  };
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    it("creates QdrantVectorStore for provider 'qdrant'", () => {
      const store = createVectorStore({ provider: "qdrant", qdrantUrl: "http://localhost:6333" });
      expect(store).toBeInstanceOf(QdrantVectorStore);
    });

    it("creates InMemoryVectorStore for provider 'memory'", () => {
      const store = createVectorStore({ provider: "memory", qdrantUrl: "" });
      expect(store).toBeInstanceOf(InMemoryVectorStore);
    });

    it("throws for missing qdrantUrl", () => {
      expect(() => createVectorStore({ provider: "qdrant", qdrantUrl: "" })).toThrow(
        "qdrantUrl is required",
      );
    });
  });

  it("names collections after the knowledge base", () => {
    expect(toCollectionName("hr-policies")).toBe("kb_hr-policies");
  });

  describe("cosineSimilarity", () => {
    it("is 1 for parallel and 0 for orthogonal vectors", () => {
      expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it("is 0 for a zero vector", () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it("rejects mismatched dimensions", () => {
      expect(() => cosineSimilarity([1], [1, 2])).toThrow("dimension mismatch");
    });
  });

  describe("InMemoryVectorStore", () => {
    async function seeded(): Promise<InMemoryVectorStore> {
      const store = new InMemoryVectorStore();
      await store.ensureCollection("kb", 2);
      await store.upsert("kb", [
        record("a", [1, 0], { 1: 1 }),
        record("b", [0.6, 0.8], { 1: 1, 2: 1 }),
        record("c", [0, 1], { 3: 1 }, "doc-2"),
      ]);
      return store;
    }

    it("ranks dense matches by cosine similarity", async () => {
      const store = await seeded();
      const matches = await store.denseSearch("kb", [1, 0], 2);
      expect(matches.map((m) => m.chunkId)).toEqual(["a", "b"]);
      expect(matches[0]?.score).toBeCloseTo(1, 12);
      expect(matches[1]?.score).toBeCloseTo(0.6, 12);
    });

    it("returns only term-sharing chunks from sparse search, rarer terms weighing more", async () => {
      const store = await seeded();
      const matches = await store.sparseSearch("kb", { indices: [1, 2], values: [1, 1] }, 10);
      // term 1 is in 2 of 3 chunks, term 2 in 1 of 3
      const idf1 = Math.log(1 + (3 - 2 + 0.5) / (2 + 0.5));
      const idf2 = Math.log(1 + (3 - 1 + 0.5) / (1 + 0.5));
      expect(matches.map((m) => m.chunkId)).toEqual(["b", "a"]);
      expect(matches[0]?.score).toBeCloseTo(idf1 + idf2, 12);
      expect(matches[1]?.score).toBeCloseTo(idf1, 12);
    });

    it("fetches stored chunks and skips unknown ids", async () => {
      const store = await seeded();
      const chunks = await store.fetchChunks("kb", ["a", "zzz"]);
      expect([...chunks.keys()]).toEqual(["a"]);
      expect(chunks.get("a")?.text).toBe("text of a");
    });

    it("lists every chunk or the chunks of one document", async () => {
      const store = await seeded();
      expect((await store.listChunks("kb")).map((c) => c.chunkId)).toEqual(["a", "b", "c"]);
      expect(await store.listChunks("kb", { documentId: "doc-2" })).toEqual([
        {
          chunkId: "c",
          documentId: "doc-2",
          text: "text of c",
          metadata: { sourceFile: "handbook.pdf", page: 1, chunkIndex: 0, documentId: "doc-2" },
        },
      ]);
    });

    it("deletes a document's chunks", async () => {
      const store = await seeded();
      expect(await store.deleteByDocument("kb", "doc-1")).toBe(2);
      expect((await store.denseSearch("kb", [1, 0], 10)).map((m) => m.chunkId)).toEqual(["c"]);
    });

    it("rejects vectors of the wrong dimension", async () => {
      const store = new InMemoryVectorStore();
      await store.ensureCollection("kb", 3);
      await expect(store.upsert("kb", [record("a", [1, 0], {})])).rejects.toThrow(
        "Expected 3-dimensional vectors",
      );
    });

    it("throws NotFoundError for a missing collection", async () => {
      const store = new InMemoryVectorStore();
      await expect(store.denseSearch("nope", [1], 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("drops collections", async () => {
      const store = await seeded();
      await store.deleteCollection("kb");
      expect(await store.collectionExists("kb")).toBe(false);
    });
  });

  describe("QdrantVectorStore", () => {
    function makeClient(): QdrantClient {
      return new QdrantClient({ url: "http://qdrant.test", checkCompatibility: false });
    }

    it("queries the named dense vector", async () => {
      const client = makeClient();
      const query = vi
        .spyOn(client, "query")
        .mockResolvedValue({ points: [{ id: "a", version: 1, score: 0.9 }] });
      const store = new QdrantVectorStore("http://qdrant.test", undefined, client);

      const matches = await store.denseSearch("kb", [0.1, 0.2], 4);

      expect(matches).toEqual([{ chunkId: "a", score: 0.9 }]);
      expect(query).toHaveBeenCalledWith("kb_kb", {
        query: [0.1, 0.2],
        using: "dense",
        limit: 4,
        with_payload: false,
      });
    });

    it("skips the sparse query for an empty vector", async () => {
      const client = makeClient();
      const query = vi.spyOn(client, "query");
      const store = new QdrantVectorStore("http://qdrant.test", undefined, client);

      expect(await store.sparseSearch("kb", { indices: [], values: [] }, 4)).toEqual([]);
      expect(query).not.toHaveBeenCalled();
    });

    it("maps transport failures to SearchBackendUnavailableError", async () => {
      const client = makeClient();
      vi.spyOn(client, "query").mockRejectedValue(new TypeError("fetch failed"));
      const store = new QdrantVectorStore("http://qdrant.test", undefined, client);

      await expect(store.denseSearch("kb", [1], 1)).rejects.toBeInstanceOf(
        SearchBackendUnavailableError,
      );
    });

    it("maps 404 to NotFoundError", async () => {
      const client = makeClient();
      vi.spyOn(client, "query").mockRejectedValue(
        Object.assign(new Error("Not Found"), { status: 404 }),
      );
      const store = new QdrantVectorStore("http://qdrant.test", undefined, client);

      await expect(store.denseSearch("kb", [1], 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("scrolls through every page of a document's chunks", async () => {
      const client = makeClient();
      const payload = (chunkIndex: number) => ({
        text: `chunk ${String(chunkIndex)}`,
        documentId: "doc-1",
        metadata: { sourceFile: "a.pdf", chunkIndex },
      });
      const scroll = vi
        .spyOn(client, "scroll")
        .mockResolvedValueOnce({ points: [{ id: "a", payload: payload(0) }], next_page_offset: "b" })
        .mockResolvedValueOnce({ points: [{ id: "b", payload: payload(1) }], next_page_offset: null });
      const store = new QdrantVectorStore("http://qdrant.test", undefined, client);

      const chunks = await store.listChunks("kb", { documentId: "doc-1" });

      expect(chunks.map((c) => c.chunkId)).toEqual(["a", "b"]);
      expect(scroll).toHaveBeenCalledTimes(2);
      expect(scroll).toHaveBeenLastCalledWith("kb_kb", {
        filter: { must: [{ key: "documentId", match: { value: "doc-1" } }] },
        limit: 256,
        with_payload: true,
        with_vector: false,
        offset: "b",
      });
    });

    it("drops retrieved points with foreign payloads", async () => {
      const client = makeClient();
      vi.spyOn(client, "retrieve").mockResolvedValue([
        {
          id: "a",
          payload: {
            text: "hello",
            documentId: "doc-1",
            metadata: { sourceFile: "a.pdf", chunkIndex: 0 },
          },
        },
        { id: "b", payload: { unrelated: true } },
      ]);
      const store = new QdrantVectorStore("http://qdrant.test", undefined, client);

      const chunks = await store.fetchChunks("kb", ["a", "b"]);

      expect([...chunks.keys()]).toEqual(["a"]);
    });
  });

  describe("fromPayload", () => {
    it("keeps extra metadata keys", () => {
      const chunk = fromPayload("x", {
        text: "t",
        documentId: "d",
        metadata: { sourceFile: "f.md", chunkIndex: 2, author: "ops" },
      });
      expect(chunk?.metadata).toEqual({ sourceFile: "f.md", chunkIndex: 2, author: "ops" });
    });
  });
});
