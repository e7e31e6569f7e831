import { logger } from "@/monitoring/logger";
import { CHANNELS, MESSAGE_TYPES } from "@/config/channels";
import { LogStore } from "@/services/logStore";
import { PubSubRelay } from "@/messaging/pubsubRelay";
import { generateIncidentId } from "@/utils/idGenerator";
import { toErrorMessage } from "@/utils/errors";
import { withTimeout } from "@/utils/timeout";
import {
  AnalyticsUpdate,
  DetectionCycleResult,
  Incident,
  LogEntry,
} from "@/types/incident";

export interface IncidentDetectorOptions {
  store: LogStore;
  relay: PubSubRelay;
  intervalMs: number;
  batchSize: number;
  overlapMs: number;
  shutdownTimeoutMs: number;
  now?: () => Date;
}

export interface DetectorStatus {
  running: boolean;
  checkpoint: string;
  lastCycleAt: string | null;
  lastResult: DetectionCycleResult | null;
  totals: {
    cycles: number;
    queryFailures: number;
    incidentsPublished: number;
    publishFailures: number;
  };
}

export const toIncident = (entry: LogEntry, detectionTime: Date): Incident => ({
  id: generateIncidentId(entry),
  timestamp: entry.timestamp.toISOString(),
  service: entry.service || "unknown",
  level: entry.level.toUpperCase(),
  logger: entry.logger,
  message: entry.message,
  host: entry.host,
  operation: entry.operation,
  data: entry.data,
  detectionTime: detectionTime.toISOString(),
});

export const serializeLogEntry = (entry: LogEntry) => ({
  ...entry,
  timestamp: entry.timestamp.toISOString(),
});

export class IncidentDetector {
  private isRunning = false;
  private intervalId?: NodeJS.Timeout;
  private currentCycle?: Promise<DetectionCycleResult>;
  private checkpoint: Date;
  private lastResult: DetectionCycleResult | null = null;
  // Incident id -> row time, for rows still inside the overlap window
  private readonly emitted = new Map<string, number>();
  private readonly now: () => Date;
  private readonly totals = {
    cycles: 0,
    queryFailures: 0,
    incidentsPublished: 0,
    publishFailures: 0,
  };
  private readonly log = logger.child({ component: "incident-detector" });

  constructor(private readonly options: IncidentDetectorOptions) {
    this.now = options.now ?? (() => new Date());
    // Only errors logged after startup are reported
    this.checkpoint = this.now();
  }

  start(): void {
    if (this.isRunning) {
      this.log.warn("Incident detector already running");
      return;
    }

    this.isRunning = true;
    this.log.info("Starting incident detector", {
      interval: this.options.intervalMs,
      batchSize: this.options.batchSize,
      checkpoint: this.checkpoint.toISOString(),
    });

    this.tick();
    this.intervalId = setInterval(() => this.tick(), this.options.intervalMs);
  }

  private tick(): void {
    this.runCycle().catch((error) => {
      this.log.error("Error in incident detector", {
        error: toErrorMessage(error),
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    if (this.currentCycle) {
      try {
        await withTimeout(
          this.currentCycle,
          this.options.shutdownTimeoutMs,
          "Detection cycle drain"
        );
      } catch (error) {
        this.log.warn("Gave up waiting for in-flight detection cycle", {
          error: toErrorMessage(error),
        });
      }
    }

    this.log.info("Incident detector stopped");
  }

  /**
   * Scans the store once. A timer tick and a manual trigger arriving while a
   * cycle is running both get that cycle's result.
   */
  runCycle(): Promise<DetectionCycleResult> {
    if (this.currentCycle) {
      return this.currentCycle;
    }

    const cycle = this.detect().finally(() => {
      this.currentCycle = undefined;
    });
    this.currentCycle = cycle;
    return cycle;
  }

  private async detect(): Promise<DetectionCycleResult> {
    const startedAt = this.now();
    const scannedFrom = new Date(
      this.checkpoint.getTime() - this.options.overlapMs
    );
    this.totals.cycles++;

    let entries: LogEntry[];
    try {
      entries = await this.options.store.queryErrorsSince(
        scannedFrom,
        this.options.batchSize
      );
    } catch (error) {
      this.totals.queryFailures++;
      this.log.error("Log store query failed, keeping checkpoint", {
        checkpoint: this.checkpoint.toISOString(),
        error: toErrorMessage(error),
      });
      return this.record({
        status: "query_failed",
        entriesFound: 0,
        incidentsPublished: 0,
        publishFailures: 0,
        checkpoint: this.checkpoint.toISOString(),
        scannedFrom: scannedFrom.toISOString(),
        startedAt: startedAt.toISOString(),
      });
    }

    if (startedAt.getTime() > this.checkpoint.getTime()) {
      this.checkpoint = startedAt;
    }

    for (const [id, seenAt] of this.emitted) {
      if (seenAt < scannedFrom.getTime()) {
        this.emitted.delete(id);
      }
    }

    let incidentsPublished = 0;
    let publishFailures = 0;
    let duplicatesSkipped = 0;
    const countsByService = new Map<string, number>();

    for (const entry of entries) {
      const incident = toIncident(entry, startedAt);
      if (this.emitted.has(incident.id)) {
        duplicatesSkipped++;
        continue;
      }
      this.emitted.set(incident.id, entry.timestamp.getTime());

      countsByService.set(
        incident.service,
        (countsByService.get(incident.service) ?? 0) + 1
      );

      if (await this.publish(CHANNELS.INCIDENTS, MESSAGE_TYPES.INCIDENT_DETECTED, incident)) {
        incidentsPublished++;
        this.log.warn(`Incident detected: ${incident.service} ${incident.level}`, {
          incidentId: incident.id,
          message: incident.message,
        });
      } else {
        publishFailures++;
      }

      if (
        !(await this.publish(
          CHANNELS.ERROR_LOGS,
          MESSAGE_TYPES.ERROR_LOG,
          serializeLogEntry(entry)
        ))
      ) {
        publishFailures++;
      }
    }

    for (const [service, errorCount] of countsByService) {
      const update: AnalyticsUpdate = {
        service,
        errorCount,
        timeRange: {
          start: scannedFrom.toISOString(),
          end: startedAt.toISOString(),
        },
        summary: `Detected ${errorCount} errors for ${service}`,
      };
      if (
        !(await this.publish(
          CHANNELS.ANALYTICS_UPDATES,
          MESSAGE_TYPES.ANALYTICS_UPDATE,
          update
        ))
      ) {
        publishFailures++;
      }
    }

    if (entries.length > 0) {
      this.log.info("Detection cycle completed", {
        entriesFound: entries.length,
        duplicatesSkipped,
        incidentsPublished,
        publishFailures,
      });
    }

    return this.record({
      status: "completed",
      entriesFound: entries.length,
      incidentsPublished,
      publishFailures,
      checkpoint: this.checkpoint.toISOString(),
      scannedFrom: scannedFrom.toISOString(),
      startedAt: startedAt.toISOString(),
    });
  }

  // Publish failures are logged and the event dropped
  private async publish<T>(
    channel: string,
    type: string,
    data: T
  ): Promise<boolean> {
    try {
      await this.options.relay.publish(channel, type, data);
      return true;
    } catch (error) {
      this.log.warn("Failed to publish detection event", {
        channel,
        type,
        error: toErrorMessage(error),
      });
      return false;
    }
  }

  private record(result: DetectionCycleResult): DetectionCycleResult {
    this.lastResult = result;
    this.totals.incidentsPublished += result.incidentsPublished;
    this.totals.publishFailures += result.publishFailures;
    return result;
  }

  getCheckpoint(): Date {
    return new Date(this.checkpoint.getTime());
  }

  getStatus(): DetectorStatus {
    return {
      running: this.isRunning,
      checkpoint: this.checkpoint.toISOString(),
      lastCycleAt: this.lastResult?.startedAt ?? null,
      lastResult: this.lastResult,
      totals: { ...this.totals },
    };
  }
}
