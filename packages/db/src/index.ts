export * from "./schema/index.js";
export {
  createDbClient,
  type DbClient,
  type DbClientOptions,
  type DbHandle,
} from "./client.js";
export { PgKnowledgeBaseStore, toDescriptor, toRow } from "./knowledge-base-store.js";
export { PgIngestionLog, toIngestionRow } from "./ingestion-log.js";
export { ensureSchema, getSchemaSql } from "./migrations.js";
