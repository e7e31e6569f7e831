import {
  pgTable,
  bigserial,
  varchar,
  text,
  jsonb,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

export const logEntries = pgTable(
  "log_entries",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    service: varchar("service", { length: 100 }).notNull(),
    level: varchar("level", { length: 20 }).notNull(),
    logger: varchar("logger", { length: 255 }).notNull().default(""),
    message: text("message").notNull(),
    data: jsonb("data").$type<Record<string, unknown>>().notNull().default({}),
    host: varchar("host", { length: 255 }),
    operation: varchar("operation", { length: 255 }),
  },
  (table) => ({
    timestampIdx: index("log_entries_timestamp_idx").on(table.timestamp),
    serviceLevelIdx: index("log_entries_service_level_idx").on(
      table.service,
      table.level
    ),
  })
);

export type LogEntryRow = typeof logEntries.$inferSelect;
export type NewLogEntryRow = typeof logEntries.$inferInsert;
