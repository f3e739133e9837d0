import { z } from "zod";
import type { ChunkPayload, ChunkRecord, StoredChunk } from "@stratarag/types";
import { EXTRACTION_TIERS } from "@stratarag/types";

const chunkPayloadSchema = z
  .object({
    sourceFile: z.string(),
    page: z.number().int().optional(),
    section: z.string().optional(),
    documentId: z.string().optional(),
    chunkIndex: z.number().int(),
    tier: z.enum(EXTRACTION_TIERS).optional(),
    qualityScore: z.number().optional(),
  })
  .passthrough();

const storedPayloadSchema = z.object({
  text: z.string(),
  documentId: z.string(),
  metadata: chunkPayloadSchema,
});

/** Payload stored next to each point. `documentId` is top-level so it can be indexed. */
export function toPayload(record: ChunkRecord): Record<string, unknown> {
  return {
    text: record.text,
    documentId: record.documentId,
    metadata: { ...record.metadata },
  };
}

/** Returns null when the stored payload is not one this service wrote. */
export function fromPayload(chunkId: string, payload: unknown): StoredChunk | null {
  const parsed = storedPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const metadata: ChunkPayload = parsed.data.metadata;
  return {
    chunkId,
    documentId: parsed.data.documentId,
    text: parsed.data.text,
    metadata,
  };
}
