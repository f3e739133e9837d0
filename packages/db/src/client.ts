import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_POOL_MAX = 20;

/** One pool per process; the API and the worker size it through DATABASE_POOL_MAX. */
export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL_MAX,
    idle_timeout: 20,
    connect_timeout: 10,
  });
  return { db: drizzle(connection, { schema }), close: () => connection.end() };
}

export type DbHandle = ReturnType<typeof createDbClient>;
export type DbClient = DbHandle["db"];
