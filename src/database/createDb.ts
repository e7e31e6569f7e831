import { Client } from "pg";
import { logger } from "@/monitoring/logger";
import { config } from "@/config/env";

const quoteIdentifier = (name: string): string =>
  `"${name.replace(/"/g, '""')}"`;

// Creates the log store database when it does not exist yet
const createDatabase = async (): Promise<void> => {
  const url = new URL(config.database.url);
  const dbName = decodeURIComponent(url.pathname.slice(1));

  if (!dbName) {
    throw new Error("DATABASE_URL does not name a database");
  }

  const client = new Client({
    host: url.hostname,
    port: parseInt(url.port) || 5432,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: "postgres",
  });

  try {
    await client.connect();

    const { rows } = await client.query(
      "SELECT 1 FROM pg_database WHERE datname = $1",
      [dbName]
    );

    if (rows.length === 0) {
      await client.query(`CREATE DATABASE ${quoteIdentifier(dbName)}`);
      logger.info(`Log store database "${dbName}" created`);
    } else {
      logger.info(`Log store database "${dbName}" already exists`);
    }
  } finally {
    await client.end();
  }
};

if (require.main === module) {
  createDatabase().catch((error) => {
    logger.error("Failed to create log store database", {
      error: error instanceof Error ? error.message : error,
    });
    process.exit(1);
  });
}

export { createDatabase };
