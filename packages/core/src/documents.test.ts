import { describe, it, expect, beforeEach } from "vitest";
import type { ChunkRecord } from "@stratarag/types";
import { NotFoundError, ValidationError } from "@stratarag/errors";
import { InMemoryVectorStore } from "@stratarag/vector-store";
import { InMemoryKnowledgeBaseStore } from "./knowledge-base-store.js";
import { getDocument, listDocuments } from "./documents.js";
import type { DocumentStoreDependencies } from "./ingestion-pipeline.js";

function chunk(documentId: string, chunkIndex: number, ingestedAt: string, extra?: Partial<ChunkRecord["metadata"]>): ChunkRecord {
  return {
    chunkId: `${documentId}-${String(chunkIndex)}`,
    documentId,
    text: `${documentId} part ${String(chunkIndex)}`,
    dense: [1, 0, 0],
    sparse: { indices: [], values: [] },
    metadata: { sourceFile: `${documentId}.md`, documentId, chunkIndex, tier: "fast", qualityScore: 0.8, ingestedAt, ...extra },
  };
}

describe("documents", () => {
  let deps: DocumentStoreDependencies;

  beforeEach(async () => {
    const knowledgeBases = new InMemoryKnowledgeBaseStore();
    const at = new Date("2026-01-01T00:00:00Z");
    await knowledgeBases.upsert({ name: "hr", description: "HR", category: "general", descriptionEmbedding: [1, 0, 0], createdAt: at, updatedAt: at });
    const vectorStore = new InMemoryVectorStore();
    await vectorStore.ensureCollection("hr", 3);
    await vectorStore.upsert("hr", [
      chunk("old", 0, "2026-01-01T00:00:00.000Z"),
      chunk("new", 1, "2026-02-01T00:00:00.000Z", { page: 2, section: "Leave" }),
      chunk("new", 0, "2026-02-01T00:00:00.000Z", { page: 1, title: "Leave policy" }),
      chunk("mid", 0, "2026-01-15T00:00:00.000Z"),
    ]);
    deps = { knowledgeBases, vectorStore };
  });

  describe("listDocuments", () => {
    it("lists one summary per document, newest first", async () => {
      const page = await listDocuments("hr", {}, deps);

      expect(page.total).toBe(3);
      expect(page.limit).toBe(100);
      expect(page.offset).toBe(0);
      expect(page.documents.map((d) => d.documentId)).toEqual(["new", "mid", "old"]);
      expect(page.documents[0]).toEqual({
        documentId: "new",
        knowledgeBase: "hr",
        fileName: "new.md",
        chunkCount: 2,
        tier: "fast",
        qualityScore: 0.8,
        ingestedAt: "2026-02-01T00:00:00.000Z",
        title: "Leave policy",
      });
    });

    it("pages through the documents", async () => {
      const page = await listDocuments("hr", { limit: 1, offset: 1 }, deps);
      expect(page.documents.map((d) => d.documentId)).toEqual(["mid"]);
      expect(page.total).toBe(3);
    });

    it("returns an empty page past the end", async () => {
      const page = await listDocuments("hr", { limit: 10, offset: 5 }, deps);
      expect(page.documents).toEqual([]);
      expect(page.total).toBe(3);
    });

    it("rejects a non-positive limit and a negative offset", async () => {
      await expect(listDocuments("hr", { limit: 0 }, deps)).rejects.toBeInstanceOf(ValidationError);
      await expect(listDocuments("hr", { offset: -1 }, deps)).rejects.toBeInstanceOf(ValidationError);
    });

    it("rejects an unknown knowledge base", async () => {
      await expect(listDocuments("missing", {}, deps)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("getDocument", () => {
    it("returns the summary without chunks by default", async () => {
      const detail = await getDocument("hr", "new", {}, deps);
      expect(detail.chunkCount).toBe(2);
      expect(detail.chunks).toBeUndefined();
    });

    it("returns the chunks in chunk order when asked", async () => {
      const detail = await getDocument("hr", "new", { includeChunks: true }, deps);
      expect(detail.chunks).toEqual([
        { chunkId: "new-0", chunkIndex: 0, page: 1, text: "new part 0" },
        { chunkId: "new-1", chunkIndex: 1, page: 2, section: "Leave", text: "new part 1" },
      ]);
    });

    it("rejects a document with no chunks", async () => {
      await expect(getDocument("hr", "absent", {}, deps)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
