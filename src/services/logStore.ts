import { and, asc, desc, eq, gte, inArray, sql } from "drizzle-orm";
import { Database } from "@/database/connection";
import { logEntries, LogEntryRow } from "@/database/schema";
import { CircuitBreaker } from "@/utils/circuitBreaker";
import { AppError, LogStoreError, toErrorMessage } from "@/utils/errors";
import { ERROR_LEVELS, ErrorCount, LogEntry } from "@/types/incident";

/**
 * Read/write access to the time-series log store. Queries only ever look at
 * ERROR, CRITICAL and FATAL entries.
 */
export interface LogStore {
  queryErrorsSince(since: Date, limit: number): Promise<LogEntry[]>;
  /** Newest first. */
  queryRecentErrors(since: Date, limit: number): Promise<LogEntry[]>;
  queryServiceErrors(
    service: string,
    since: Date,
    limit: number
  ): Promise<LogEntry[]>;
  countErrorsByService(since: Date): Promise<ErrorCount[]>;
  write(entry: LogEntry): Promise<void>;
}

const toLogEntry = (row: LogEntryRow): LogEntry => ({
  timestamp: row.timestamp,
  service: row.service,
  level: row.level,
  logger: row.logger,
  message: row.message,
  data: row.data,
  host: row.host,
  operation: row.operation,
});

const isErrorLevel = inArray(logEntries.level, [...ERROR_LEVELS]);

export class DrizzleLogStore implements LogStore {
  constructor(private readonly db: Database) {}

  async queryErrorsSince(since: Date, limit: number): Promise<LogEntry[]> {
    const rows = await this.db
      .select()
      .from(logEntries)
      .where(and(isErrorLevel, gte(logEntries.timestamp, since)))
      .orderBy(asc(logEntries.timestamp))
      .limit(limit);

    return rows.map(toLogEntry);
  }

  async queryRecentErrors(since: Date, limit: number): Promise<LogEntry[]> {
    const rows = await this.db
      .select()
      .from(logEntries)
      .where(and(isErrorLevel, gte(logEntries.timestamp, since)))
      .orderBy(desc(logEntries.timestamp))
      .limit(limit);

    return rows.map(toLogEntry);
  }

  async queryServiceErrors(
    service: string,
    since: Date,
    limit: number
  ): Promise<LogEntry[]> {
    const rows = await this.db
      .select()
      .from(logEntries)
      .where(
        and(
          isErrorLevel,
          eq(logEntries.service, service),
          gte(logEntries.timestamp, since)
        )
      )
      .orderBy(desc(logEntries.timestamp))
      .limit(limit);

    return rows.map(toLogEntry);
  }

  async countErrorsByService(since: Date): Promise<ErrorCount[]> {
    return this.db
      .select({
        service: logEntries.service,
        level: logEntries.level,
        count: sql<number>`count(*)`.mapWith(Number),
      })
      .from(logEntries)
      .where(and(isErrorLevel, gte(logEntries.timestamp, since)))
      .groupBy(logEntries.service, logEntries.level);
  }

  async write(entry: LogEntry): Promise<void> {
    await this.db.insert(logEntries).values({
      timestamp: entry.timestamp,
      service: entry.service,
      level: entry.level.toUpperCase(),
      logger: entry.logger,
      message: entry.message,
      data: entry.data,
      host: entry.host,
      operation: entry.operation,
    });
  }
}

/**
 * Runs every store call through a breaker, which bounds each query by the
 * breaker's timeout and stops hammering a store that keeps failing.
 */
export class GuardedLogStore implements LogStore {
  constructor(
    private readonly inner: LogStore,
    private readonly breaker: CircuitBreaker
  ) {}

  queryErrorsSince(since: Date, limit: number): Promise<LogEntry[]> {
    return this.guard(() => this.inner.queryErrorsSince(since, limit));
  }

  queryRecentErrors(since: Date, limit: number): Promise<LogEntry[]> {
    return this.guard(() => this.inner.queryRecentErrors(since, limit));
  }

  queryServiceErrors(
    service: string,
    since: Date,
    limit: number
  ): Promise<LogEntry[]> {
    return this.guard(() => this.inner.queryServiceErrors(service, since, limit));
  }

  countErrorsByService(since: Date): Promise<ErrorCount[]> {
    return this.guard(() => this.inner.countErrorsByService(since));
  }

  write(entry: LogEntry): Promise<void> {
    return this.guard(() => this.inner.write(entry));
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await this.breaker.execute(operation);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new LogStoreError(`Log store query failed: ${toErrorMessage(error)}`);
    }
  }
}
