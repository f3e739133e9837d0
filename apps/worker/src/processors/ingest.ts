import type { IngestJobData, IngestionResult } from "@stratarag/types";
import { ValidationError } from "@stratarag/errors";
import { ingest, updateDocument } from "@stratarag/core";
import type { IngestionDependencies } from "@stratarag/core";
import { createLoggerTraceSink } from "@stratarag/logger";
import type { Logger } from "@stratarag/logger";
import { toJobError } from "../job-errors.js";

export interface ProcessorContext {
  logger: Logger;
  signal?: AbortSignal;
}

export function decodeContent(contentBase64: string): Uint8Array {
  const bytes = new Uint8Array(Buffer.from(contentBase64, "base64"));
  if (bytes.length === 0) {
    throw new ValidationError("Job carries no document content", { contentBase64: "empty" });
  }
  return bytes;
}

/**
 * Runs one queued document through extract -> chunk -> embed -> store.
 * Permanent failures are rethrown as unrecoverable so the job is not retried.
 */
export async function processIngest(
  data: IngestJobData,
  deps: IngestionDependencies,
  context: ProcessorContext,
): Promise<IngestionResult> {
  const logger = context.logger.child({ kb: data.knowledgeBase, documentId: data.documentId });
  try {
    const input = {
      knowledgeBase: data.knowledgeBase,
      documentId: data.documentId,
      fileName: data.fileName,
      mimeType: data.mimeType,
      content: decodeContent(data.contentBase64),
      targetQuality: data.targetQuality,
      tiers: data.tiers,
      metadata: data.metadata,
    };
    const options = { signal: context.signal, trace: createLoggerTraceSink(logger) };
    const result = data.replace
      ? await updateDocument(input, { ...deps, logger }, options)
      : await ingest(input, { ...deps, logger }, options);
    logger.info(
      {
        tier: result.extraction.selected.tier,
        chunks: result.chunkCount,
        cancelled: result.extraction.cancelled,
        replace: data.replace ?? false,
      },
      "ingest job finished",
    );
    return result;
  } catch (error: unknown) {
    throw toJobError(error);
  }
}
