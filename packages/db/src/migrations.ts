import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

/**
 * Idempotent DDL for the tables in ./schema. Kept in step with the drizzle
 * definitions by hand; run once at startup.
 */
const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS knowledge_bases (
    position serial PRIMARY KEY,
    name text NOT NULL UNIQUE,
    description text NOT NULL,
    category text NOT NULL DEFAULT 'general',
    description_embedding jsonb NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS ingestions (
    id text PRIMARY KEY,
    document_id text NOT NULL,
    knowledge_base text NOT NULL,
    file_name text NOT NULL,
    selected_tier text NOT NULL,
    tiers_tried jsonb NOT NULL,
    quality_score real NOT NULL,
    cost_usd real NOT NULL DEFAULT 0,
    escalation_reason text NOT NULL,
    chunk_count integer NOT NULL DEFAULT 0,
    duration_ms integer NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS ingestions_document_idx ON ingestions (knowledge_base, document_id)`,
] as const;

export function getSchemaSql(): string {
  return SCHEMA_STATEMENTS.map((statement) => `${statement};`).join("\n\n");
}

export async function ensureSchema(db: DbClient): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}
