import type {
  DocumentChunkView,
  DocumentDetail,
  DocumentPage,
  DocumentSummary,
  StoredChunk,
} from "@stratarag/types";
import { NotFoundError, ValidationError } from "@stratarag/errors";
import type { DocumentStoreDependencies } from "./ingestion-pipeline.js";

export const DEFAULT_DOCUMENT_PAGE_SIZE = 100;

export interface ListDocumentsOptions {
  limit?: number;
  offset?: number;
}

export interface GetDocumentOptions {
  includeChunks?: boolean;
}

function summarize(knowledgeBase: string, documentId: string, chunks: StoredChunk[]): DocumentSummary {
  const first = chunks.reduce((a, b) => (b.metadata.chunkIndex < a.metadata.chunkIndex ? b : a));
  const { sourceFile, tier, qualityScore, ingestedAt, title } = first.metadata;
  return {
    documentId,
    knowledgeBase,
    fileName: sourceFile,
    chunkCount: chunks.length,
    ...(tier !== undefined ? { tier } : {}),
    ...(qualityScore !== undefined ? { qualityScore } : {}),
    ...(typeof ingestedAt === "string" ? { ingestedAt } : {}),
    ...(typeof title === "string" ? { title } : {}),
  };
}

function toChunkView(chunk: StoredChunk): DocumentChunkView {
  const { chunkIndex, page, section } = chunk.metadata;
  return {
    chunkId: chunk.chunkId,
    chunkIndex,
    ...(page !== undefined ? { page } : {}),
    ...(section !== undefined ? { section } : {}),
    text: chunk.text,
  };
}

function groupByDocument(chunks: StoredChunk[]): Map<string, StoredChunk[]> {
  const groups = new Map<string, StoredChunk[]>();
  for (const chunk of chunks) {
    const group = groups.get(chunk.documentId);
    if (group) {
      group.push(chunk);
    } else {
      groups.set(chunk.documentId, [chunk]);
    }
  }
  return groups;
}

async function requireKnowledgeBase(deps: DocumentStoreDependencies, name: string): Promise<void> {
  if (!(await deps.knowledgeBases.get(name))) {
    throw new NotFoundError(`Knowledge base '${name}' not found`);
  }
}

/**
 * Documents of a knowledge base, newest ingestion first. Documents with the
 * same timestamp are ordered by id so pages stay stable.
 */
export async function listDocuments(
  knowledgeBase: string,
  options: ListDocumentsOptions,
  deps: DocumentStoreDependencies,
): Promise<DocumentPage> {
  const limit = options.limit ?? DEFAULT_DOCUMENT_PAGE_SIZE;
  const offset = options.offset ?? 0;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError("limit must be a positive integer");
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError("offset must be a non-negative integer");
  }
  await requireKnowledgeBase(deps, knowledgeBase);

  const groups = groupByDocument(await deps.vectorStore.listChunks(knowledgeBase));
  const summaries = [...groups].map(([documentId, chunks]) => summarize(knowledgeBase, documentId, chunks));
  summaries.sort((a, b) => {
    const byTime = (b.ingestedAt ?? "").localeCompare(a.ingestedAt ?? "");
    return byTime !== 0 ? byTime : a.documentId.localeCompare(b.documentId);
  });

  return {
    documents: summaries.slice(offset, offset + limit),
    total: summaries.length,
    limit,
    offset,
  };
}

export async function getDocument(
  knowledgeBase: string,
  documentId: string,
  options: GetDocumentOptions,
  deps: DocumentStoreDependencies,
): Promise<DocumentDetail> {
  await requireKnowledgeBase(deps, knowledgeBase);
  const chunks = await deps.vectorStore.listChunks(knowledgeBase, { documentId });
  if (chunks.length === 0) {
    throw new NotFoundError(`Document '${documentId}' not found in '${knowledgeBase}'`);
  }

  const summary = summarize(knowledgeBase, documentId, chunks);
  if (!options.includeChunks) {
    return summary;
  }
  const ordered = [...chunks].sort((a, b) => a.metadata.chunkIndex - b.metadata.chunkIndex);
  return { ...summary, chunks: ordered.map(toChunkView) };
}
