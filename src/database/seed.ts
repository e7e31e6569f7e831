import { sql } from "drizzle-orm";
import { closeDatabase, getDatabase } from "./connection";
import { DrizzleLogStore } from "@/services/logStore";
import { logger } from "@/monitoring/logger";
import { LogEntry } from "@/types/incident";

const createTables = async () => {
  const db = getDatabase();

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS log_entries (
      id BIGSERIAL PRIMARY KEY,
      timestamp TIMESTAMPTZ NOT NULL,
      service VARCHAR(100) NOT NULL,
      level VARCHAR(20) NOT NULL,
      logger VARCHAR(255) NOT NULL DEFAULT '',
      message TEXT NOT NULL,
      data JSONB NOT NULL DEFAULT '{}'::jsonb,
      host VARCHAR(255),
      operation VARCHAR(255)
    )
  `);
  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS log_entries_timestamp_idx ON log_entries (timestamp)`
  );
  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS log_entries_service_level_idx ON log_entries (service, level)`
  );
};

const sampleEntries = (now: Date): LogEntry[] => {
  const minutesAgo = (minutes: number) =>
    new Date(now.getTime() - minutes * 60 * 1000);

  return [
    {
      timestamp: minutesAgo(2),
      service: "file-service",
      level: "ERROR",
      logger: "file_service.storage",
      message: "Failed to write upload chunk to disk",
      data: { fileId: "sample-file-1", bytes: 1048576 },
      host: "file-service-1",
      operation: "upload",
    },
    {
      timestamp: minutesAgo(5),
      service: "utility-service",
      level: "CRITICAL",
      logger: "utility_service.config",
      message: "Configuration reload left the service without a backend",
      data: { configKey: "backend.url" },
      host: "utility-service-1",
      operation: "reload_config",
    },
    {
      timestamp: minutesAgo(9),
      service: "analytics-service",
      level: "ERROR",
      logger: "analytics_service.aggregator",
      message: "Metric aggregation window overflowed",
      data: { window: "5m" },
      host: "analytics-service-1",
      operation: "aggregate",
    },
    {
      timestamp: minutesAgo(12),
      service: "file-service",
      level: "WARNING",
      logger: "file_service.api",
      message: "Slow request on file listing",
      data: { durationMs: 2400 },
      host: "file-service-1",
      operation: "list_files",
    },
  ];
};

const seedDatabase = async () => {
  try {
    logger.info("Seeding log store...");

    await createTables();

    const store = new DrizzleLogStore(getDatabase());
    for (const entry of sampleEntries(new Date())) {
      await store.write(entry);
    }

    logger.info("Log store seeded successfully");
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error("Log store seeding failed", {
      error: error instanceof Error ? error.message : error,
    });
    process.exit(1);
  }
};

if (require.main === module) {
  void seedDatabase();
}

export { seedDatabase };
