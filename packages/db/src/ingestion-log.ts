import type { IIngestionLog, IngestionLogEntry } from "@stratarag/types";
import type { DbClient } from "./client.js";
import { ingestions } from "./schema/index.js";

export function toIngestionRow(entry: IngestionLogEntry): typeof ingestions.$inferInsert {
  return {
    documentId: entry.documentId,
    knowledgeBase: entry.knowledgeBase,
    fileName: entry.fileName,
    selectedTier: entry.selectedTier,
    tiersTried: [...entry.tiersTried],
    qualityScore: entry.qualityScore,
    costUsd: entry.costUsd,
    escalationReason: entry.escalationReason,
    chunkCount: entry.chunkCount,
    durationMs: Math.round(entry.durationMs),
  };
}

export class PgIngestionLog implements IIngestionLog {
  constructor(private readonly db: DbClient) {}

  async record(entry: IngestionLogEntry): Promise<void> {
    await this.db.insert(ingestions).values(toIngestionRow(entry));
  }
}
