import { describe, it, expect, vi } from "vitest";
import type { DeleteDocumentJobData, IngestJobData } from "@stratarag/types";
import {
  documentJobId,
  enqueueDeleteDocument,
  enqueueIngest,
  parseRedisConnection,
  type JobSink,
} from "./queues.js";
import { moveToDeadLetter, toDeadLetter, type DeadLetterJobData } from "./dlq.js";

function sink<T>(id?: string) {
  const add = vi.fn<JobSink<T>["add"]>(async () => ({ id }));
  return { add };
}

const ingestJob: IngestJobData = {
  type: "ingest",
  knowledgeBase: "hr-policies",
  documentId: "doc-1",
  fileName: "handbook.pdf",
  mimeType: "application/pdf",
  contentBase64: "aGVsbG8=",
};

describe("documentJobId", () => {
  it("joins the parts and strips colons", () => {
    expect(documentJobId("ingest", "kb", "a:b")).toBe("ingest--kb--a_b");
  });
});

describe("enqueueIngest", () => {
  it("adds the job under its document id", async () => {
    const queue = sink<IngestJobData>("ingest--hr-policies--doc-1");

    const id = await enqueueIngest(queue, ingestJob);

    expect(id).toBe("ingest--hr-policies--doc-1");
    expect(queue.add).toHaveBeenCalledWith("ingest", ingestJob, { jobId: "ingest--hr-policies--doc-1" });
  });

  it("falls back to the computed id when the queue returns none", async () => {
    const queue = sink<DeleteDocumentJobData>();
    const id = await enqueueDeleteDocument(queue, {
      type: "delete-document",
      knowledgeBase: "kb",
      documentId: "doc-9",
    });
    expect(id).toBe("delete-document--kb--doc-9");
  });
});

describe("dead letters", () => {
  it("records the failure alongside the original payload", () => {
    const entry = toDeadLetter("stratarag:ingest", ingestJob, new Error("boom"), 3, new Date("2026-02-01T00:00:00Z"));
    expect(entry).toEqual({
      ...ingestJob,
      originalQueue: "stratarag:ingest",
      failureReason: "boom",
      attemptsMade: 3,
      failedAt: "2026-02-01T00:00:00.000Z",
    });
  });

  it("adds the entry to the dead-letter queue", async () => {
    const dlq = sink<DeadLetterJobData>();
    await moveToDeadLetter(dlq, "stratarag:ingest", ingestJob, "gone", 3);
    expect(dlq.add).toHaveBeenCalledTimes(1);
    expect(dlq.add.mock.calls[0]?.[1].failureReason).toBe("gone");
  });
});

describe("parseRedisConnection", () => {
  it("reads host, port and password", () => {
    expect(parseRedisConnection("redis://:test-secret@cache:6380")).toEqual({
      host: "cache",
      port: 6380,
      password: "test-secret",
      maxRetriesPerRequest: null,
    });
  });

  it("defaults the port", () => {
    expect(parseRedisConnection("redis://localhost")).toEqual({
      host: "localhost",
      port: 6379,
      maxRetriesPerRequest: null,
    });
  });
});
