import type { DeleteDocumentJobData } from "@stratarag/types";
import { deleteDocument } from "@stratarag/core";
import type { DocumentStoreDependencies } from "@stratarag/core";
import { toJobError } from "../job-errors.js";
import type { ProcessorContext } from "./ingest.js";

/** Removes every chunk of one document from its knowledge base. */
export async function processDeleteDocument(
  data: DeleteDocumentJobData,
  deps: DocumentStoreDependencies,
  context: ProcessorContext,
): Promise<number> {
  try {
    const removed = await deleteDocument(data.knowledgeBase, data.documentId, deps);
    context.logger.info({ kb: data.knowledgeBase, documentId: data.documentId, removed }, "document deleted");
    return removed;
  } catch (error: unknown) {
    throw toJobError(error);
  }
}
