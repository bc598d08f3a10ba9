import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_WORKER_POOL = { max: 10 };

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return { db: drizzle(connection, { schema }), close: () => connection.end() };
}

export type DbClient = ReturnType<typeof createDbClient>["db"];
