import { config } from "@/config/env";
import { RouteRule, ServiceDescriptor, ServiceGroups } from "@/types/service";

const descriptor = (
  name: string,
  baseUrl: string,
  overrides: Partial<ServiceDescriptor> = {}
): ServiceDescriptor => ({
  name,
  baseUrl: baseUrl.replace(/\/+$/, ""),
  healthPath: "/health",
  timeoutMs: config.circuitBreaker.timeout,
  retries: config.retry.maxRetries,
  breakerThreshold: config.circuitBreaker.failureThreshold,
  ...overrides,
});

// Upstreams reachable through the gateway
export const gatewayServices = (): ServiceDescriptor[] => [
  descriptor(
    "file-service",
    process.env.FILE_SERVICE_URL || "http://localhost:8001"
  ),
  descriptor(
    "utility-service",
    process.env.UTILITY_SERVICE_URL || "http://localhost:8002"
  ),
  descriptor(
    "analytics-service",
    process.env.ANALYTICS_SERVICE_URL || "http://localhost:8003"
  ),
  descriptor(
    "incident-service",
    process.env.INCIDENT_SERVICE_URL ||
      `http://localhost:${config.incident.port}`
  ),
];

export const gatewayRoutes = (): RouteRule[] => [
  { prefix: "/api/files", service: "file-service", stripPrefix: "/api" },
  { prefix: "/api/utils", service: "utility-service", stripPrefix: "/api" },
  {
    prefix: "/api/analytics",
    service: "analytics-service",
    stripPrefix: "/api",
  },
  { prefix: "/api/incidents", service: "incident-service", stripPrefix: "/api" },
];

// Everything the monitor polls, the gateway included
export const monitoredServices = (): ServiceDescriptor[] => [
  descriptor(
    "api-gateway",
    process.env.GATEWAY_URL || `http://localhost:${config.gateway.port}`,
    { timeoutMs: config.monitor.probeTimeout }
  ),
  ...gatewayServices().map((service) => ({
    ...service,
    timeoutMs: config.monitor.probeTimeout,
  })),
  descriptor("ui-service", process.env.UI_SERVICE_URL || "http://localhost:3000", {
    timeoutMs: config.monitor.probeTimeout,
  }),
  descriptor(
    "monitor-service",
    process.env.MONITOR_URL || `http://localhost:${config.monitor.port}`,
    { timeoutMs: config.monitor.probeTimeout }
  ),
];

export const serviceGroups: ServiceGroups = {
  core: ["api-gateway", "file-service", "utility-service"],
  analytics: ["analytics-service", "incident-service"],
  ui: ["ui-service"],
  monitoring: ["monitor-service"],
};
