import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { config } from "@/config/env";
import { logger } from "@/monitoring/logger";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | undefined;
let db: Database | undefined;

// Pool is created on first use so processes without a log store never open one
export const getPool = (): Pool => {
  if (!pool) {
    pool = new Pool({
      connectionString: config.database.url,
      max: config.database.poolSize,
      min: config.database.poolMinSize,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      application_name: config.incident.name,
    });
    pool.on("error", (error) => {
      logger.error("Idle log store connection failed", { error: error.message });
    });
  }
  return pool;
};

export const getDatabase = (): Database => {
  if (!db) {
    db = drizzle(getPool(), { schema });
  }
  return db;
};

export const closeDatabase = async (): Promise<void> => {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = undefined;
  db = undefined;
  await current.end();
};
