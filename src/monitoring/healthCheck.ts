import { getPool } from "@/database/connection";
import { logger } from "./logger";

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

// Log store connection check (for startup)
export const checkDatabaseConnection = async (): Promise<void> => {
  try {
    const client = await getPool().connect();
    try {
      await client.query("SELECT 1 FROM log_entries LIMIT 1");
    } finally {
      client.release();
    }
    logger.info("Log store connection verified");
  } catch (error) {
    if (hasErrorCode(error, "ECONNREFUSED")) {
      logger.error(
        "Log store connection refused. Is PostgreSQL running at DATABASE_URL?"
      );
    }
    if (hasErrorCode(error, "3D000")) {
      logger.error("Log store database not found. Run `npm run db:create` first.");
    }
    if (hasErrorCode(error, "42P01")) {
      logger.error("log_entries table missing. Run `npm run db:seed` first.");
    }
    throw error;
  }
};
