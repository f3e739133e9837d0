import { pgTable, text, timestamp, jsonb, integer, real, index } from "drizzle-orm/pg-core";
import type { ExtractionTier } from "@stratarag/types";

export const ingestions = pgTable(
  "ingestions",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id").notNull(),
    knowledgeBase: text("knowledge_base").notNull(),
    fileName: text("file_name").notNull(),
    selectedTier: text("selected_tier").$type<ExtractionTier>().notNull(),
    tiersTried: jsonb("tiers_tried").$type<ExtractionTier[]>().notNull(),
    qualityScore: real("quality_score").notNull(),
    costUsd: real("cost_usd").notNull().default(0),
    escalationReason: text("escalation_reason").notNull(),
    chunkCount: integer("chunk_count").notNull().default(0),
    durationMs: integer("duration_ms").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index("ingestions_document_idx").on(table.knowledgeBase, table.documentId),
  }),
);
