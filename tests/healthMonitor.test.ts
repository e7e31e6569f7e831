import { HealthMonitor, summarizeHealth } from "../src/workers/healthMonitor";
import { InMemoryPubSubRelay } from "../src/messaging/pubsubRelay";
import { CHANNELS } from "../src/config/channels";
import { HealthCheckResult, HealthStatus } from "../src/types/health";
import { ServiceDescriptor } from "../src/types/service";
import { healthResult, serviceDescriptor } from "./helpers/fixtures";

jest.mock("../src/monitoring/logger", () => require("./helpers/mockLogger"));

const services = [
  serviceDescriptor({ name: "file-service" }),
  serviceDescriptor({
    name: "utility-service",
    baseUrl: "http://utility-service:8002",
  }),
];

describe("HealthMonitor", () => {
  let relay: InMemoryPubSubRelay;
  let statuses: Record<string, HealthStatus>;
  let prober: jest.Mock<Promise<HealthCheckResult>, [ServiceDescriptor, AbortSignal?]>;

  const createMonitor = (
    overrides: Partial<ConstructorParameters<typeof HealthMonitor>[0]> = {}
  ) =>
    new HealthMonitor({
      services,
      intervalMs: 1000,
      shutdownTimeoutMs: 500,
      relay,
      groups: { core: ["file-service", "api-gateway"] },
      prober,
      ...overrides,
    });

  beforeEach(async () => {
    relay = new InMemoryPubSubRelay();
    await relay.connect();
    statuses = { "file-service": "healthy", "utility-service": "healthy" };
    prober = jest.fn<Promise<HealthCheckResult>, [ServiceDescriptor, AbortSignal?]>(
      async (service) =>
        healthResult(
          service.name,
          statuses[service.name],
          statuses[service.name] === "unhealthy" ? "HTTP 500" : ""
        )
    );
  });

  it("should start every service as unknown", () => {
    const monitor = createMonitor();

    expect(monitor.getServiceStatus("file-service")).toMatchObject({
      name: "file-service",
      url: "http://file-service:8001",
      status: "unknown",
      lastCheck: null,
      consecutiveFailures: 0,
    });
    expect(monitor.getOverallHealth()).toMatchObject({
      overallStatus: "unknown",
      totalServices: 2,
      unknown: 2,
    });
  });

  it("should probe every service and publish every record", async () => {
    const monitor = createMonitor();

    await monitor.runCycle();

    expect(prober).toHaveBeenCalledTimes(2);
    expect(monitor.getServiceStatus("file-service")).toMatchObject({
      status: "healthy",
      responseTimeMs: 12,
      lastCheck: "2024-01-01T00:00:00.000Z",
    });

    const published = relay.getMessages(CHANNELS.HEALTH_UPDATES);
    expect(published).toHaveLength(2);
    expect(published.map((message) => message.type)).toEqual([
      "health_update",
      "health_update",
    ]);
    expect(published[0].data).toMatchObject({
      name: "file-service",
      status: "healthy",
    });
  });

  it("should publish on every cycle even when nothing changed", async () => {
    const monitor = createMonitor();

    await monitor.runCycle();
    await monitor.runCycle();

    expect(relay.getMessages(CHANNELS.HEALTH_UPDATES)).toHaveLength(4);
  });

  it("should count consecutive failures and reset on recovery", async () => {
    const monitor = createMonitor();
    statuses["file-service"] = "unhealthy";

    await monitor.runCycle();
    await monitor.runCycle();
    statuses["file-service"] = "degraded";
    await monitor.runCycle();

    expect(monitor.getServiceStatus("file-service")).toMatchObject({
      status: "degraded",
      consecutiveFailures: 3,
    });
    expect(monitor.getServiceStatus("utility-service")?.consecutiveFailures).toBe(0);

    statuses["file-service"] = "healthy";
    await monitor.runCycle();

    expect(monitor.getServiceStatus("file-service")).toMatchObject({
      status: "healthy",
      consecutiveFailures: 0,
      errorMessage: "",
    });
  });

  it("should keep the error message of an unhealthy result", async () => {
    const monitor = createMonitor();
    statuses["utility-service"] = "unhealthy";

    await monitor.runCycle();

    expect(monitor.getServiceStatus("utility-service")?.errorMessage).toBe(
      "HTTP 500"
    );
    expect(monitor.getOverallHealth()).toMatchObject({
      overallStatus: "unhealthy",
      healthy: 1,
      unhealthy: 1,
    });
  });

  it("should finish the cycle when one probe crashes", async () => {
    prober.mockImplementation(async (service: ServiceDescriptor) => {
      if (service.name === "file-service") {
        throw new Error("probe crashed");
      }
      return healthResult(service.name, "healthy");
    });
    const monitor = createMonitor();

    await monitor.runCycle();

    expect(monitor.getServiceStatus("file-service")?.status).toBe("unknown");
    expect(monitor.getServiceStatus("utility-service")?.status).toBe("healthy");
  });

  it("should keep updating records when publishing fails", async () => {
    await relay.disconnect();
    const monitor = createMonitor();

    await monitor.runCycle();

    expect(monitor.getServiceStatus("file-service")?.status).toBe("healthy");
    expect(relay.getMessages()).toHaveLength(0);
  });

  it("should notify the result listener with each record", async () => {
    const onResult = jest.fn();
    const monitor = createMonitor({ onResult });
    statuses["file-service"] = "unhealthy";

    await monitor.runCycle();

    expect(onResult).toHaveBeenCalledTimes(2);
    expect(onResult).toHaveBeenCalledWith(
      services[0],
      expect.objectContaining({ name: "file-service", status: "unhealthy" })
    );
  });

  it("should hand out copies of its records", async () => {
    const monitor = createMonitor();
    await monitor.runCycle();

    const record = monitor.getServiceStatus("file-service");
    if (record) {
      record.status = "unhealthy";
      record.details.injected = true;
    }
    const all = monitor.getAllServiceStatuses();
    all["utility-service"].status = "unhealthy";

    expect(monitor.getServiceStatus("file-service")).toMatchObject({
      status: "healthy",
      details: {},
    });
    expect(monitor.getServiceStatus("utility-service")?.status).toBe("healthy");
  });

  it("should return only known members of a group", async () => {
    const monitor = createMonitor();
    await monitor.runCycle();

    const group = monitor.getServiceGroupStatus("core");

    expect(Object.keys(group ?? {})).toEqual(["file-service"]);
    expect(monitor.getServiceGroupStatus("missing")).toBeUndefined();
  });

  it("should share the cycle already in flight", async () => {
    const monitor = createMonitor();

    const first = monitor.runCycle();
    const second = monitor.runCycle();

    expect(second).toBe(first);
    await first;
    expect(prober).toHaveBeenCalledTimes(2);
  });

  describe("lifecycle", () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it("should run immediately, skip overlapping ticks and abort on stop", async () => {
      jest.useFakeTimers();
      const signals: AbortSignal[] = [];
      prober.mockImplementation(
        (service: ServiceDescriptor, signal?: AbortSignal) =>
          new Promise<HealthCheckResult>((resolve) => {
            if (signal) {
              signals.push(signal);
              signal.addEventListener("abort", () =>
                resolve(healthResult(service.name, "unhealthy", "aborted"))
              );
            }
          })
      );
      const monitor = createMonitor();

      monitor.start();
      expect(prober).toHaveBeenCalledTimes(2);

      jest.advanceTimersByTime(3000);
      expect(prober).toHaveBeenCalledTimes(2);

      await monitor.stop();

      expect(signals).toHaveLength(2);
      expect(signals.every((signal) => signal.aborted)).toBe(true);
      expect(monitor.isMonitoring()).toBe(false);
    });

    it("should leave records untouched by probes cut short on stop", async () => {
      const onResult = jest.fn();
      prober.mockImplementation(
        (service: ServiceDescriptor, signal?: AbortSignal) =>
          new Promise<HealthCheckResult>((resolve) => {
            signal?.addEventListener("abort", () =>
              resolve(healthResult(service.name, "unhealthy", "canceled"))
            );
          })
      );
      const monitor = createMonitor({ onResult });

      monitor.start();
      await monitor.stop();

      expect(monitor.getServiceStatus("file-service")).toMatchObject({
        status: "unknown",
        consecutiveFailures: 0,
        errorMessage: "",
      });
      expect(monitor.getOverallHealth().unknown).toBe(2);
      expect(onResult).not.toHaveBeenCalled();
      expect(relay.getMessages(CHANNELS.HEALTH_UPDATES)).toHaveLength(0);
    });
  });
});

describe("summarizeHealth", () => {
  const summary = (...statuses: HealthStatus[]) =>
    summarizeHealth(statuses.map((status) => ({ status })));

  it("should be unhealthy when any service is unhealthy", () => {
    expect(summary("healthy", "degraded", "unhealthy").overallStatus).toBe(
      "unhealthy"
    );
  });

  it("should be degraded when any service is degraded", () => {
    expect(summary("healthy", "degraded", "unknown").overallStatus).toBe(
      "degraded"
    );
  });

  it("should be healthy only when every service is healthy", () => {
    expect(summary("healthy", "healthy").overallStatus).toBe("healthy");
    expect(summary("healthy", "unknown").overallStatus).toBe("unknown");
    expect(summary().overallStatus).toBe("unknown");
  });

  it("should count services per status", () => {
    expect(summary("healthy", "degraded", "degraded", "unknown")).toMatchObject({
      totalServices: 4,
      healthy: 1,
      degraded: 2,
      unhealthy: 0,
      unknown: 1,
    });
  });
});
