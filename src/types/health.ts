export const HEALTH_STATUS = {
  HEALTHY: "healthy",
  DEGRADED: "degraded",
  UNHEALTHY: "unhealthy",
  UNKNOWN: "unknown",
} as const;

export type HealthStatus = (typeof HEALTH_STATUS)[keyof typeof HEALTH_STATUS];

export interface ServiceHealthRecord {
  name: string;
  url: string;
  status: HealthStatus;
  responseTimeMs: number;
  lastCheck: string | null;
  consecutiveFailures: number;
  errorMessage: string;
  details: Record<string, unknown>;
}

export interface HealthCheckResult {
  serviceName: string;
  status: HealthStatus;
  responseTimeMs: number;
  timestamp: Date;
  errorMessage: string;
  details: Record<string, unknown>;
}

export interface SystemHealthSummary {
  overallStatus: HealthStatus;
  totalServices: number;
  healthy: number;
  degraded: number;
  unhealthy: number;
  unknown: number;
  timestamp: string;
}

// Parsed self-reported status of a health endpoint body
export type ReportedHealth =
  | { kind: "healthy"; reported: boolean }
  | { kind: "degraded" }
  | { kind: "unhealthy" }
  | { kind: "unknown" };
