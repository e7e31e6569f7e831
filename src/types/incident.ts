export const ERROR_LEVELS = ["ERROR", "CRITICAL", "FATAL"] as const;

export interface LogEntry {
  timestamp: Date;
  service: string;
  level: string;
  logger: string;
  message: string;
  data: Record<string, unknown>;
  host: string | null;
  operation: string | null;
}

export interface Incident {
  id: string;
  timestamp: string;
  service: string;
  level: string;
  logger: string;
  message: string;
  host: string | null;
  operation: string | null;
  data: Record<string, unknown>;
  detectionTime: string;
}

export interface TimeRange {
  start: string;
  end: string;
}

export interface AnalyticsUpdate {
  service: string;
  errorCount: number;
  timeRange: TimeRange;
  summary: string;
}

export interface ErrorCount {
  service: string;
  level: string;
  count: number;
}

export interface ServiceErrorBreakdown {
  totalErrors: number;
  errorLevels: Record<string, number>;
}

export interface IncidentSummary {
  totalErrors: number;
  servicesAffected: number;
  errorBreakdown: Record<string, ServiceErrorBreakdown>;
  timeRange: TimeRange;
  recentErrorCount: number;
  recentErrors: Incident[];
}

export interface DetectionCycleResult {
  status: "completed" | "query_failed";
  entriesFound: number;
  incidentsPublished: number;
  publishFailures: number;
  checkpoint: string;
  scannedFrom: string;
  startedAt: string;
}
