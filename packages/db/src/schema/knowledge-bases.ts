import { pgTable, serial, text, timestamp, jsonb } from "drizzle-orm/pg-core";

export const knowledgeBases = pgTable("knowledge_bases", {
  // Creation order; routing ties go to the earliest knowledge base
  position: serial("position").primaryKey(),
  name: text("name").notNull().unique(),
  description: text("description").notNull(),
  category: text("category").notNull().default("general"),
  descriptionEmbedding: jsonb("description_embedding").$type<number[]>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
