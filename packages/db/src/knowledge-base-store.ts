import { asc, eq } from "drizzle-orm";
import type { IKnowledgeBaseStore, KnowledgeBaseDescriptor } from "@stratarag/types";
import type { DbClient } from "./client.js";
import { knowledgeBases } from "./schema/index.js";

type KnowledgeBaseRow = typeof knowledgeBases.$inferSelect;
type NewKnowledgeBaseRow = typeof knowledgeBases.$inferInsert;

export function toDescriptor(row: KnowledgeBaseRow): KnowledgeBaseDescriptor {
  return {
    name: row.name,
    description: row.description,
    category: row.category,
    descriptionEmbedding: [...row.descriptionEmbedding],
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toRow(descriptor: KnowledgeBaseDescriptor): NewKnowledgeBaseRow {
  return {
    name: descriptor.name,
    description: descriptor.description,
    category: descriptor.category,
    descriptionEmbedding: [...descriptor.descriptionEmbedding],
    createdAt: descriptor.createdAt,
    updatedAt: descriptor.updatedAt,
  };
}

/** Knowledge base descriptors in Postgres, listed in creation order. */
export class PgKnowledgeBaseStore implements IKnowledgeBaseStore {
  constructor(private readonly db: DbClient) {}

  async list(): Promise<KnowledgeBaseDescriptor[]> {
    const rows = await this.db.select().from(knowledgeBases).orderBy(asc(knowledgeBases.position));
    return rows.map(toDescriptor);
  }

  async get(name: string): Promise<KnowledgeBaseDescriptor | null> {
    const [row] = await this.db.select().from(knowledgeBases).where(eq(knowledgeBases.name, name)).limit(1);
    return row ? toDescriptor(row) : null;
  }

  async insert(descriptor: KnowledgeBaseDescriptor): Promise<boolean> {
    const inserted = await this.db
      .insert(knowledgeBases)
      .values(toRow(descriptor))
      .onConflictDoNothing({ target: knowledgeBases.name })
      .returning({ name: knowledgeBases.name });
    return inserted.length > 0;
  }

  async upsert(descriptor: KnowledgeBaseDescriptor): Promise<void> {
    const row = toRow(descriptor);
    // `position` is left alone on update so the creation order survives
    await this.db
      .insert(knowledgeBases)
      .values(row)
      .onConflictDoUpdate({
        target: knowledgeBases.name,
        set: {
          description: row.description,
          category: row.category,
          descriptionEmbedding: row.descriptionEmbedding,
          updatedAt: row.updatedAt,
        },
      });
  }

  async remove(name: string): Promise<boolean> {
    const deleted = await this.db
      .delete(knowledgeBases)
      .where(eq(knowledgeBases.name, name))
      .returning({ name: knowledgeBases.name });
    return deleted.length > 0;
  }
}
