import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import { parseDatabaseUrl } from "@/db/database-url";
import * as schema from "@/db/schema";

export type BlogcastDatabase = PostgresJsDatabase<typeof schema>;

interface DatabaseHandle {
  url: string;
  db: BlogcastDatabase;
}

declare global {
  var __blogcastDb__: DatabaseHandle | undefined;
}

/** Pooler-friendly settings: one connection per instance, no prepared statements. */
function connect(databaseUrl: string): BlogcastDatabase {
  const sql = postgres({
    ...parseDatabaseUrl(databaseUrl),
    max: 1,
    prepare: false,
    idle_timeout: 20,
  });
  return drizzle(sql, { schema });
}

/**
 * Null without DATABASE_URL; repositories then fall back to the in-memory store. The handle
 * survives dev-server module reloads and is rebuilt if the URL changes.
 */
export function getDb(): BlogcastDatabase | null {
  const databaseUrl = process.env.DATABASE_URL?.trim();
  if (!databaseUrl) {
    return null;
  }

  const cached = globalThis.__blogcastDb__;
  if (cached && cached.url === databaseUrl) {
    return cached.db;
  }

  const db = connect(databaseUrl);
  globalThis.__blogcastDb__ = { url: databaseUrl, db };
  return db;
}
