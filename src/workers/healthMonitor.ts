import { logger } from "@/monitoring/logger";
import { CHANNELS, MESSAGE_TYPES } from "@/config/channels";
import { probeService, HealthProber } from "@/services/healthProbe";
import { PubSubRelay } from "@/messaging/pubsubRelay";
import { toErrorMessage } from "@/utils/errors";
import { withTimeout } from "@/utils/timeout";
import {
  HEALTH_STATUS,
  HealthCheckResult,
  ServiceHealthRecord,
  SystemHealthSummary,
} from "@/types/health";
import { ServiceDescriptor, ServiceGroups } from "@/types/service";

export type HealthResultListener = (
  service: ServiceDescriptor,
  record: ServiceHealthRecord
) => void;

export interface HealthMonitorOptions {
  services: ServiceDescriptor[];
  intervalMs: number;
  shutdownTimeoutMs: number;
  relay?: PubSubRelay;
  groups?: ServiceGroups;
  prober?: HealthProber;
  onResult?: HealthResultListener;
}

const copyRecord = (record: ServiceHealthRecord): ServiceHealthRecord => ({
  ...record,
  details: { ...record.details },
});

export class HealthMonitor {
  private isRunning = false;
  private intervalId?: NodeJS.Timeout;
  private currentCycle?: Promise<void>;
  private abortController = new AbortController();
  private readonly records = new Map<string, ServiceHealthRecord>();
  private readonly services: Map<string, ServiceDescriptor>;
  private readonly prober: HealthProber;
  private readonly log = logger.child({ component: "health-monitor" });

  constructor(private readonly options: HealthMonitorOptions) {
    this.prober = options.prober ?? probeService;
    this.services = new Map(options.services.map((s) => [s.name, s]));

    for (const service of options.services) {
      this.records.set(service.name, {
        name: service.name,
        url: service.baseUrl,
        status: HEALTH_STATUS.UNKNOWN,
        responseTimeMs: 0,
        lastCheck: null,
        consecutiveFailures: 0,
        errorMessage: "",
        details: {},
      });
    }
  }

  start(): void {
    if (this.isRunning) {
      this.log.warn("Health monitor already running");
      return;
    }

    this.isRunning = true;
    this.abortController = new AbortController();
    this.log.info("Starting health monitor", {
      interval: this.options.intervalMs,
      services: this.services.size,
    });

    this.tick();
    this.intervalId = setInterval(() => this.tick(), this.options.intervalMs);
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
    this.abortController.abort();

    if (this.currentCycle) {
      try {
        await withTimeout(
          this.currentCycle,
          this.options.shutdownTimeoutMs,
          "Health cycle drain"
        );
      } catch (error) {
        this.log.warn("Gave up waiting for in-flight health cycle", {
          error: toErrorMessage(error),
        });
      }
    }

    this.log.info("Health monitor stopped");
  }

  private tick(): void {
    if (this.currentCycle) {
      this.log.warn("Previous health cycle still running, skipping tick");
      return;
    }

    this.runCycle().catch((error) => {
      this.log.error("Error in health monitor", {
        error: toErrorMessage(error),
      });
    });
  }

  /**
   * Probes every service concurrently and applies the results. Concurrent
   * callers share the cycle already in flight.
   */
  runCycle(): Promise<void> {
    if (this.currentCycle) {
      return this.currentCycle;
    }

    const cycle = this.checkAllServices().finally(() => {
      this.currentCycle = undefined;
    });
    this.currentCycle = cycle;
    return cycle;
  }

  private async checkAllServices(): Promise<void> {
    const services = Array.from(this.services.values());
    const signal = this.abortController.signal;

    this.log.debug("Running health check cycle", { services: services.length });

    const results = await Promise.allSettled(
      services.map((service) => this.prober(service, signal))
    );

    // Probes cut short by stop() say nothing about the services
    if (signal.aborted) {
      this.log.debug("Health cycle aborted, discarding results");
      return;
    }

    for (const [index, result] of results.entries()) {
      const service = services[index];

      if (result.status === "rejected") {
        this.log.error("Health probe crashed", {
          service: service.name,
          error: toErrorMessage(result.reason),
        });
        continue;
      }

      try {
        await this.applyResult(service, result.value);
      } catch (error) {
        this.log.error("Failed to process health result", {
          service: service.name,
          error: toErrorMessage(error),
        });
      }
    }
  }

  private async applyResult(
    service: ServiceDescriptor,
    result: HealthCheckResult
  ): Promise<void> {
    const record = this.records.get(service.name);
    if (!record) {
      return;
    }

    const previous = record.status;
    record.status = result.status;
    record.responseTimeMs = result.responseTimeMs;
    record.lastCheck = result.timestamp.toISOString();
    record.errorMessage = result.errorMessage;
    record.details = result.details;
    record.consecutiveFailures =
      result.status === HEALTH_STATUS.HEALTHY
        ? 0
        : record.consecutiveFailures + 1;

    if (previous !== result.status) {
      this.log.info(
        `Service ${service.name} status changed: ${previous} -> ${result.status}`,
        { errorMessage: result.errorMessage || undefined }
      );
    }

    const snapshot = copyRecord(record);
    this.options.onResult?.(service, snapshot);
    await this.publish(snapshot);
  }

  private async publish(record: ServiceHealthRecord): Promise<void> {
    if (!this.options.relay) {
      return;
    }

    try {
      await this.options.relay.publish(
        CHANNELS.HEALTH_UPDATES,
        MESSAGE_TYPES.HEALTH_UPDATE,
        record
      );
    } catch (error) {
      this.log.warn("Failed to publish health update", {
        service: record.name,
        error: toErrorMessage(error),
      });
    }
  }

  getServiceStatus(name: string): ServiceHealthRecord | undefined {
    const record = this.records.get(name);
    return record ? copyRecord(record) : undefined;
  }

  getAllServiceStatuses(): Record<string, ServiceHealthRecord> {
    const statuses: Record<string, ServiceHealthRecord> = {};
    for (const [name, record] of this.records) {
      statuses[name] = copyRecord(record);
    }
    return statuses;
  }

  getServiceGroupStatus(
    group: string
  ): Record<string, ServiceHealthRecord> | undefined {
    const members = this.options.groups?.[group];
    if (!members) {
      return undefined;
    }

    const statuses: Record<string, ServiceHealthRecord> = {};
    for (const name of members) {
      const record = this.records.get(name);
      if (record) {
        statuses[name] = copyRecord(record);
      }
    }
    return statuses;
  }

  getOverallHealth(): SystemHealthSummary {
    return summarizeHealth(Array.from(this.records.values()));
  }

  isMonitoring(): boolean {
    return this.isRunning;
  }
}

export const summarizeHealth = (
  records: Pick<ServiceHealthRecord, "status">[]
): SystemHealthSummary => {
  const count = (status: string) =>
    records.filter((record) => record.status === status).length;

  const healthy = count(HEALTH_STATUS.HEALTHY);
  const degraded = count(HEALTH_STATUS.DEGRADED);
  const unhealthy = count(HEALTH_STATUS.UNHEALTHY);
  const unknown = count(HEALTH_STATUS.UNKNOWN);

  let overallStatus: SystemHealthSummary["overallStatus"];
  if (unhealthy > 0) {
    overallStatus = HEALTH_STATUS.UNHEALTHY;
  } else if (degraded > 0) {
    overallStatus = HEALTH_STATUS.DEGRADED;
  } else if (records.length > 0 && healthy === records.length) {
    overallStatus = HEALTH_STATUS.HEALTHY;
  } else {
    overallStatus = HEALTH_STATUS.UNKNOWN;
  }

  return {
    overallStatus,
    totalServices: records.length,
    healthy,
    degraded,
    unhealthy,
    unknown,
    timestamp: new Date().toISOString(),
  };
};
