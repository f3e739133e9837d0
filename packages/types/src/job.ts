import type { ExtractionTier } from "./extraction.js";

export type JobType = "ingest" | "delete-document";

export type JobStatus = "waiting" | "active" | "completed" | "failed" | "delayed";

export interface JobData {
  type: JobType;
  knowledgeBase: string;
  documentId: string;
}

export interface IngestJobData extends JobData {
  type: "ingest";
  fileName: string;
  mimeType: string;
  /** Base64-encoded document bytes. */
  contentBase64: string;
  targetQuality?: number;
  tiers?: ExtractionTier[];
  metadata?: Record<string, unknown>;
  /** Drop the document's existing chunks once the new ones are ready. */
  replace?: boolean;
}

export interface DeleteDocumentJobData extends JobData {
  type: "delete-document";
}

export type AnyJobData = IngestJobData | DeleteDocumentJobData;

export interface JobResult {
  success: boolean;
  processedAt: Date;
  duration: number;
  error?: string;
  metrics?: Record<string, number>;
}
