import { randomUUID } from "node:crypto";
import { Router } from "express";
import type { IngestionResult, QueuedJobView } from "@stratarag/types";
import { AppError } from "@stratarag/errors";
import { deleteDocument, getDocument, ingest, listDocuments, updateDocument } from "@stratarag/core";
import { createLoggerTraceSink } from "@stratarag/logger";
import { enqueueDeleteDocument, enqueueIngest } from "@stratarag/queue";
import type { ApiContext, ApiQueues } from "../context.js";
import { flag, handle, param, parseBody, parseQuery, send } from "../http.js";
import { responseSignal } from "../middleware/abort.js";
import { requestLogger } from "../middleware/request-context.js";
import { ingestDocumentSchema, listDocumentsQuerySchema, updateDocumentSchema } from "../schemas.js";

/** Pages are left out; callers get the decision trail, not the text. */
export function toIngestionView(result: IngestionResult) {
  const { extraction } = result;
  return {
    documentId: result.documentId,
    knowledgeBase: result.knowledgeBase,
    chunkCount: result.chunkCount,
    tokensUsed: result.tokensUsed,
    extraction: {
      selectedTier: extraction.selected.tier,
      qualityScore: extraction.selected.quality.overallScore,
      recommendation: extraction.selected.quality.recommendation,
      issues: extraction.selected.quality.issues,
      tiersTried: extraction.tiersTried,
      failures: extraction.failures,
      escalationReason: extraction.escalationReason,
      totalCostUsd: extraction.totalCostUsd,
      totalDurationMs: extraction.totalDurationMs,
      cancelled: extraction.cancelled,
    },
  };
}

function requireQueues(queues: ApiQueues | undefined): ApiQueues {
  if (!queues) {
    throw new AppError({
      message: "Background jobs are not available on this server",
      statusCode: 503,
      code: "QUEUE_UNAVAILABLE",
    });
  }
  return queues;
}

export function documentRoutes({ services, queues }: ApiContext): Router {
  // mergeParams: `:name` is declared on the parent path
  const router = Router({ mergeParams: true });

  router.post(
    "/",
    handle(async (req, res) => {
      const knowledgeBase = param(req, "name");
      const body = parseBody(ingestDocumentSchema, req.body);
      const documentId = body.documentId ?? randomUUID();

      if (flag(req, "async")) {
        const sink = requireQueues(queues).ingest;
        // Reject unknown knowledge bases now rather than in the worker
        await services.knowledgeBases.get(knowledgeBase);
        const jobId = await enqueueIngest(sink, {
          type: "ingest",
          knowledgeBase,
          documentId,
          fileName: body.fileName,
          mimeType: body.mimeType,
          contentBase64: body.content,
          targetQuality: body.targetQuality,
          tiers: body.tiers,
          metadata: body.metadata,
        });
        send<QueuedJobView>(res, 202, { jobId, documentId, knowledgeBase });
        return;
      }

      const logger = requestLogger(req, services.logger);
      const result = await ingest(
        {
          knowledgeBase,
          documentId,
          fileName: body.fileName,
          mimeType: body.mimeType,
          content: new Uint8Array(Buffer.from(body.content, "base64")),
          targetQuality: body.targetQuality,
          tiers: body.tiers,
          metadata: body.metadata,
        },
        { ...services.ingestion, logger },
        { signal: responseSignal(res), trace: createLoggerTraceSink(logger) },
      );
      send(res, 201, toIngestionView(result));
    }),
  );

  router.get(
    "/",
    handle(async (req, res) => {
      const knowledgeBase = param(req, "name");
      const query = parseQuery(listDocumentsQuerySchema, req.query);
      send(res, 200, await listDocuments(knowledgeBase, query, services.documents));
    }),
  );

  router.get(
    "/:documentId",
    handle(async (req, res) => {
      const knowledgeBase = param(req, "name");
      const documentId = param(req, "documentId");
      const detail = await getDocument(knowledgeBase, documentId, { includeChunks: flag(req, "chunks") }, services.documents);
      send(res, 200, detail);
    }),
  );

  router.put(
    "/:documentId",
    handle(async (req, res) => {
      const knowledgeBase = param(req, "name");
      const documentId = param(req, "documentId");
      const body = parseBody(updateDocumentSchema, req.body);

      if (flag(req, "async")) {
        const sink = requireQueues(queues).ingest;
        await services.knowledgeBases.get(knowledgeBase);
        const jobId = await enqueueIngest(sink, {
          type: "ingest",
          knowledgeBase,
          documentId,
          fileName: body.fileName,
          mimeType: body.mimeType,
          contentBase64: body.content,
          targetQuality: body.targetQuality,
          tiers: body.tiers,
          metadata: body.metadata,
          replace: true,
        });
        send<QueuedJobView>(res, 202, { jobId, documentId, knowledgeBase });
        return;
      }

      const logger = requestLogger(req, services.logger);
      const result = await updateDocument(
        {
          knowledgeBase,
          documentId,
          fileName: body.fileName,
          mimeType: body.mimeType,
          content: new Uint8Array(Buffer.from(body.content, "base64")),
          targetQuality: body.targetQuality,
          tiers: body.tiers,
          metadata: body.metadata,
        },
        { ...services.ingestion, logger },
        { signal: responseSignal(res), trace: createLoggerTraceSink(logger) },
      );
      send(res, 200, { ...toIngestionView(result), replacedChunks: result.replacedChunks });
    }),
  );

  router.delete(
    "/:documentId",
    handle(async (req, res) => {
      const knowledgeBase = param(req, "name");
      const documentId = param(req, "documentId");

      if (flag(req, "async")) {
        const sink = requireQueues(queues).deleteDocument;
        await services.knowledgeBases.get(knowledgeBase);
        const jobId = await enqueueDeleteDocument(sink, { type: "delete-document", knowledgeBase, documentId });
        send<QueuedJobView>(res, 202, { jobId, documentId, knowledgeBase });
        return;
      }

      const deleted = await deleteDocument(knowledgeBase, documentId, services.documents);
      send(res, 200, { documentId, knowledgeBase, deletedChunks: deleted });
    }),
  );

  return router;
}
