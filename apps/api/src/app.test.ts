import { createServer } from "node:http";
import type { Server } from "node:http";
import type { Express } from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";
import { z } from "zod";
import type { DeleteDocumentJobData, IngestJobData } from "@stratarag/types";
import type { ILlmGateway } from "@stratarag/llm";
import type { JobSink } from "@stratarag/queue";
import type { ApiQueues } from "./context.js";
import { createApp } from "./app.js";
import { createTestServices } from "@stratarag/runtime/testing";

const HANDBOOK = "# Leave\nEmployees get 25 leave days per year.";
const encoded = (text: string) => Buffer.from(text, "utf8").toString("base64");

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      requestId: z.string(),
      details: z.record(z.unknown()).optional(),
    })
    .optional(),
});

async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
  const server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : 0;
  return { server, baseUrl: `http://127.0.0.1:${String(port)}` };
}

const close = (server: Server) => new Promise<void>((resolve) => server.close(() => resolve()));

describe("api", () => {
  let server: Server;
  let baseUrl: string;
  let generate: Mock<ILlmGateway["generate"]>;
  let ingestAdd: Mock<JobSink<IngestJobData>["add"]>;

  async function start(queues?: ApiQueues): Promise<void> {
    generate = vi.fn<ILlmGateway["generate"]>(async () => ({
      text: "25 days [1]",
      model: "fake-chat",
      inputTokens: 30,
      outputTokens: 4,
    }));
    ({ server, baseUrl } = await listen(createApp({ services: createTestServices({ name: "fake", generate }), queues })));
  }

  async function call(method: string, path: string, body?: unknown, headers?: Record<string, string>) {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { "content-type": "application/json", ...headers },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });
    return { status: response.status, headers: response.headers, body: envelopeSchema.parse(await response.json()) };
  }

  const createHr = () =>
    call("POST", "/v1/knowledge-bases", { name: "hr", description: "Leave and holiday policies" });

  beforeEach(async () => {
    ingestAdd = vi.fn<JobSink<IngestJobData>["add"]>(async () => ({ id: "job-1" }));
    const deleteAdd = vi.fn<JobSink<DeleteDocumentJobData>["add"]>(async () => ({ id: "job-2" }));
    await start({ ingest: { add: ingestAdd }, deleteDocument: { add: deleteAdd } });
  });

  afterEach(async () => {
    await close(server);
  });

  describe("knowledge bases", () => {
    it("creates a knowledge base without exposing its embedding", async () => {
      const { status, body } = await createHr();

      expect(status).toBe(201);
      expect(body.data).toMatchObject({
        name: "hr",
        description: "Leave and holiday policies",
        category: "general",
        dimensions: 6,
      });
      expect(body.data).not.toHaveProperty("descriptionEmbedding");
    });

    it("rejects a duplicate name with 409", async () => {
      await createHr();
      const { status, body } = await createHr();

      expect(status).toBe(409);
      expect(body.error?.code).toBe("CONFLICT");
    });

    it("reports invalid fields", async () => {
      const { status, body } = await call("POST", "/v1/knowledge-bases", { name: "hr", description: " " });

      expect(status).toBe(400);
      expect(body.error?.code).toBe("VALIDATION_ERROR");
      expect(body.error?.details).toEqual({ fields: { description: "required" } });
    });

    it("returns 404 for an unknown knowledge base", async () => {
      const { status, body } = await call("GET", "/v1/knowledge-bases/missing");

      expect(status).toBe(404);
      expect(body.error?.message).toBe("Knowledge base 'missing' not found");
    });

    it("updates and deletes", async () => {
      await createHr();

      const patched = await call("PATCH", "/v1/knowledge-bases/hr", { category: "people" });
      expect(patched.body.data).toMatchObject({ category: "people" });

      const deleted = await call("DELETE", "/v1/knowledge-bases/hr");
      expect(deleted.body.data).toEqual({ name: "hr", deleted: true });

      const listed = await call("GET", "/v1/knowledge-bases");
      expect(listed.body.data).toEqual([]);
    });
  });

  describe("documents and search", () => {
    it("ingests, searches and deletes a document", async () => {
      await createHr();

      const ingested = await call("POST", "/v1/knowledge-bases/hr/documents", {
        fileName: "handbook.md",
        mimeType: "text/markdown",
        content: encoded(HANDBOOK),
        documentId: "doc-1",
      });
      expect(ingested.status).toBe(201);
      expect(ingested.body.data).toMatchObject({
        documentId: "doc-1",
        knowledgeBase: "hr",
        chunkCount: 1,
        extraction: { selectedTier: "fast", tiersTried: ["fast"], cancelled: false },
      });

      const search = await call("POST", "/v1/search", { query: "leave days", knowledgeBase: "hr" });
      expect(search.status).toBe(200);
      expect(search.body.data).toMatchObject({
        hits: [{ rank: 1, source: { sourceFile: "handbook.md", page: 1, section: "Leave", documentId: "doc-1" } }],
        formattedContext: expect.stringContaining("25 leave days"),
      });

      const removed = await call("DELETE", "/v1/knowledge-bases/hr/documents/doc-1");
      expect(removed.body.data).toEqual({ documentId: "doc-1", knowledgeBase: "hr", deletedChunks: 1 });
    });

    it("lists, reads and replaces documents", async () => {
      await createHr();
      const upload = (documentId: string, text: string) =>
        call("POST", "/v1/knowledge-bases/hr/documents", {
          fileName: `${documentId}.md`,
          mimeType: "text/markdown",
          content: encoded(text),
          documentId,
        });
      await upload("doc-1", HANDBOOK);
      await upload("doc-2", "# Holiday\nPublic holidays are paid.");

      const listed = await call("GET", "/v1/knowledge-bases/hr/documents?limit=10");
      expect(listed.status).toBe(200);
      const page = z
        .object({ documents: z.array(z.object({ documentId: z.string() })), total: z.number(), limit: z.number() })
        .parse(listed.body.data);
      expect(page.documents.map((d) => d.documentId).sort()).toEqual(["doc-1", "doc-2"]);
      expect(page.total).toBe(2);
      expect(page.limit).toBe(10);

      const updated = await call("PUT", "/v1/knowledge-bases/hr/documents/doc-1", {
        fileName: "doc-1.md",
        mimeType: "text/markdown",
        content: encoded("# Leave\nEmployees get 30 leave days per year."),
      });
      expect(updated.status).toBe(200);
      expect(updated.body.data).toMatchObject({ documentId: "doc-1", chunkCount: 1, replacedChunks: 1 });

      const detail = await call("GET", "/v1/knowledge-bases/hr/documents/doc-1?chunks=true");
      expect(detail.body.data).toMatchObject({
        documentId: "doc-1",
        fileName: "doc-1.md",
        chunkCount: 1,
        chunks: [{ chunkIndex: 0, text: expect.stringContaining("30 leave days") }],
      });
    });

    it("returns 404 for a document that is not indexed", async () => {
      await createHr();
      const { status, body } = await call("GET", "/v1/knowledge-bases/hr/documents/ghost");

      expect(status).toBe(404);
      expect(body.error?.message).toBe("Document 'ghost' not found in 'hr'");
    });

    it("rejects a zero page size", async () => {
      await createHr();
      const { status, body } = await call("GET", "/v1/knowledge-bases/hr/documents?limit=0");

      expect(status).toBe(400);
      expect(body.error?.code).toBe("VALIDATION_ERROR");
    });

    it("enqueues a replacing ingestion for PUT with ?async=true", async () => {
      await createHr();
      const { status, body } = await call("PUT", "/v1/knowledge-bases/hr/documents/doc-1?async=true", {
        fileName: "handbook.md",
        mimeType: "text/markdown",
        content: encoded(HANDBOOK),
      });

      expect(status).toBe(202);
      expect(body.data).toEqual({ jobId: "job-1", documentId: "doc-1", knowledgeBase: "hr" });
      expect(ingestAdd).toHaveBeenCalledWith(
        "ingest",
        expect.objectContaining({ documentId: "doc-1", replace: true }),
        { jobId: "ingest--hr--doc-1" },
      );
    });

    it("answers a blank search query with no hits", async () => {
      await createHr();
      const { status, body } = await call("POST", "/v1/search", { query: "  ", knowledgeBase: "hr" });

      expect(status).toBe(200);
      expect(body.data).toMatchObject({ query: "  ", knowledgeBase: "hr", hits: [] });
    });

    it("rejects content that is not base64", async () => {
      await createHr();
      const { status, body } = await call("POST", "/v1/knowledge-bases/hr/documents", {
        fileName: "a.txt",
        mimeType: "text/plain",
        content: "not base64!",
      });

      expect(status).toBe(400);
      expect(body.error?.details).toEqual({ fields: { content: "must be base64" } });
    });

    it("enqueues an ingestion with ?async=true", async () => {
      await createHr();
      const { status, body } = await call("POST", "/v1/knowledge-bases/hr/documents?async=true", {
        fileName: "handbook.md",
        mimeType: "text/markdown",
        content: encoded(HANDBOOK),
        documentId: "doc-7",
      });

      expect(status).toBe(202);
      expect(body.data).toEqual({ jobId: "job-1", documentId: "doc-7", knowledgeBase: "hr" });
      expect(ingestAdd).toHaveBeenCalledWith(
        "ingest",
        expect.objectContaining({ type: "ingest", knowledgeBase: "hr", documentId: "doc-7" }),
        { jobId: "ingest--hr--doc-7" },
      );
    });

    it("does not enqueue for an unknown knowledge base", async () => {
      const { status } = await call("POST", "/v1/knowledge-bases/nope/documents?async=true", {
        fileName: "a.txt",
        mimeType: "text/plain",
        content: encoded("hello"),
      });

      expect(status).toBe(404);
      expect(ingestAdd).not.toHaveBeenCalled();
    });
  });

  describe("routing and answers", () => {
    it("routes a query to the closest knowledge base", async () => {
      await createHr();
      const { body } = await call("POST", "/v1/route", { query: "How many leave days?" });

      expect(body.data).toMatchObject({ knowledgeBase: "hr" });
    });

    it("answers through the routed knowledge base", async () => {
      await createHr();
      const { status, body } = await call("POST", "/v1/answer", { query: "How many leave days?" });

      expect(status).toBe(200);
      expect(body.data).toMatchObject({
        answer: "25 days [1]",
        knowledgeBase: "hr",
        routed: true,
        tokens: { input: 30, output: 4 },
      });
      expect(generate).toHaveBeenCalledTimes(1);
    });
  });

  describe("envelope", () => {
    it("echoes a caller-supplied request id", async () => {
      const { headers, body } = await call("GET", "/v1/knowledge-bases/missing", undefined, {
        "x-request-id": "req-42",
      });

      expect(headers.get("x-request-id")).toBe("req-42");
      expect(body.error?.requestId).toBe("req-42");
    });

    it("answers malformed JSON with 400", async () => {
      const { status, body } = await call("POST", "/v1/search", "{not json");

      expect(status).toBe(400);
      expect(body.error?.code).toBe("BAD_REQUEST");
    });

    it("answers unknown routes with 404", async () => {
      const { status, body } = await call("GET", "/v2/nothing");

      expect(status).toBe(404);
      expect(body.error?.message).toBe("Route GET /v2/nothing not found");
    });

    it("reports health", async () => {
      const { status, body } = await call("GET", "/health");

      expect(status).toBe(200);
      expect(body.data).toEqual({ status: "ok", checks: { vectorStore: true } });
    });
  });
});

describe("api without queues", () => {
  it("refuses async ingestion", async () => {
    const { server, baseUrl } = await listen(createApp({ services: createTestServices() }));

    try {
      const response = await fetch(`${baseUrl}/v1/knowledge-bases/hr/documents?async=true`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ fileName: "a.txt", mimeType: "text/plain", content: encoded("hi") }),
      });
      const body = envelopeSchema.parse(await response.json());

      expect(response.status).toBe(503);
      expect(body.error?.code).toBe("QUEUE_UNAVAILABLE");
    } finally {
      await close(server);
    }
  });
});
