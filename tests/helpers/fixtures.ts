import { AxiosHeaders, AxiosResponse } from "axios";
import { ServiceDescriptor } from "../../src/types/service";
import { HealthCheckResult, HealthStatus } from "../../src/types/health";
import { LogEntry } from "../../src/types/incident";
import { LogStore } from "../../src/services/logStore";

export const serviceDescriptor = (
  overrides: Partial<ServiceDescriptor> = {}
): ServiceDescriptor => ({
  name: "file-service",
  baseUrl: "http://file-service:8001",
  healthPath: "/health",
  timeoutMs: 500,
  retries: 0,
  breakerThreshold: 3,
  ...overrides,
});

export const axiosResponse = <T>(
  status: number,
  data: T,
  headers: Record<string, string> = {}
): AxiosResponse<T> => ({
  status,
  statusText: "",
  headers,
  data,
  config: { headers: new AxiosHeaders() },
});

export const transportError = (message: string, code: string) =>
  Object.assign(new Error(message), { code });

export const healthResult = (
  serviceName: string,
  status: HealthStatus,
  errorMessage = ""
): HealthCheckResult => ({
  serviceName,
  status,
  responseTimeMs: 12,
  timestamp: new Date("2024-01-01T00:00:00.000Z"),
  errorMessage,
  details: {},
});

export const logEntry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  timestamp: new Date("2024-01-01T11:59:30.250Z"),
  service: "file-service",
  level: "ERROR",
  logger: "app.files",
  message: "Disk quota exceeded",
  data: { path: "/uploads" },
  host: "files-1",
  operation: "upload",
  ...overrides,
});

export const fakeLogStore = (): jest.Mocked<LogStore> => ({
  queryErrorsSince: jest.fn().mockResolvedValue([]),
  queryRecentErrors: jest.fn().mockResolvedValue([]),
  queryServiceErrors: jest.fn().mockResolvedValue([]),
  countErrorsByService: jest.fn().mockResolvedValue([]),
  write: jest.fn().mockResolvedValue(undefined),
});
