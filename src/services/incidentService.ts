import { LogStore } from "@/services/logStore";
import { toIncident } from "@/workers/incidentDetector";
import {
  Incident,
  IncidentSummary,
  ServiceErrorBreakdown,
} from "@/types/incident";

const HOUR_MS = 60 * 60 * 1000;
const RECENT_WINDOW_MS = 30 * 60 * 1000;
const RECENT_ERRORS_SHOWN = 10;

interface IncidentQueryOptions {
  batchSize: number;
  now?: () => Date;
}

export class IncidentService {
  private readonly now: () => Date;

  constructor(
    private readonly store: LogStore,
    private readonly options: IncidentQueryOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async getIncidentSummary(hours: number): Promise<IncidentSummary> {
    const end = this.now();
    const start = new Date(end.getTime() - hours * HOUR_MS);

    const counts = await this.store.countErrorsByService(start);

    const errorBreakdown: Record<string, ServiceErrorBreakdown> = {};
    let totalErrors = 0;
    for (const { service, level, count } of counts) {
      const breakdown = errorBreakdown[service] ?? {
        totalErrors: 0,
        errorLevels: {},
      };
      errorBreakdown[service] = breakdown;
      breakdown.totalErrors += count;
      breakdown.errorLevels[level] = (breakdown.errorLevels[level] ?? 0) + count;
      totalErrors += count;
    }

    const recent = await this.store.queryRecentErrors(
      new Date(end.getTime() - RECENT_WINDOW_MS),
      this.options.batchSize
    );
    const recentErrors = recent
      .slice(0, RECENT_ERRORS_SHOWN)
      .map((entry) => toIncident(entry, end));

    return {
      totalErrors,
      servicesAffected: Object.keys(errorBreakdown).length,
      errorBreakdown,
      timeRange: { start: start.toISOString(), end: end.toISOString() },
      recentErrorCount: recent.length,
      recentErrors,
    };
  }

  async getServiceErrors(service: string, hours: number): Promise<Incident[]> {
    const end = this.now();
    const entries = await this.store.queryServiceErrors(
      service,
      new Date(end.getTime() - hours * HOUR_MS),
      this.options.batchSize
    );
    return entries.map((entry) => toIncident(entry, end));
  }
}
