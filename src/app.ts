import express, { Express, Router } from "express";
import type http from "http";
import { config } from "@/config/env";
import {
  gatewayRoutes,
  gatewayServices,
  monitoredServices,
  serviceGroups,
} from "@/config/services";
import { correlationIdMiddleware } from "@/api/middleware/correlationId";
import { createRateLimiter } from "@/api/middleware/rateLimiter";
import { errorHandler, notFoundHandler } from "@/api/middleware/errorHandler";
import { createGatewayController } from "@/api/controllers/gatewayController";
import { createMonitorController } from "@/api/controllers/monitorController";
import { createIncidentController } from "@/api/controllers/incidentController";
import { createGatewayRoutes } from "@/api/routes/gatewayRoutes";
import { createMonitorRoutes } from "@/api/routes/monitorRoutes";
import { createIncidentRoutes } from "@/api/routes/incidentRoutes";
import { ServiceRegistry } from "@/services/serviceRegistry";
import { RequestRouter } from "@/services/requestRouter";
import { HealthProber } from "@/services/healthProbe";
import { DrizzleLogStore, GuardedLogStore, LogStore } from "@/services/logStore";
import { IncidentService } from "@/services/incidentService";
import { HealthMonitor } from "@/workers/healthMonitor";
import { IncidentDetector } from "@/workers/incidentDetector";
import { BroadcastServer } from "@/realtime/broadcastServer";
import { createPubSubRelay, PubSubRelay } from "@/messaging/pubsubRelay";
import { closeDatabase, getDatabase } from "@/database/connection";
import { checkDatabaseConnection } from "@/monitoring/healthCheck";
import { logger } from "@/monitoring/logger";
import { CircuitBreaker } from "@/utils/circuitBreaker";
import { toErrorMessage } from "@/utils/errors";
import { HEALTH_STATUS } from "@/types/health";
import { RouteRule, ServiceDescriptor } from "@/types/service";

export const SERVICE_ROLES = ["gateway", "monitor", "incident"] as const;

export type ServiceRole = (typeof SERVICE_ROLES)[number];

export interface ServiceRuntime {
  role: ServiceRole;
  port: number;
  app: Express;
  startWorkers(server: http.Server): Promise<void>;
  stopWorkers(): Promise<void>;
}

interface AppOptions {
  rateLimit?: boolean;
  json?: boolean;
}

const buildApp = (routes: Router, options: AppOptions = {}) => {
  const app = express();

  // Trust proxy for rate limiting
  app.set("trust proxy", 1);

  app.use(correlationIdMiddleware);
  if (options.json) {
    app.use(express.json({ limit: "1mb" }));
  }
  if (options.rateLimit) {
    app.use(createRateLimiter());
  }

  app.use(routes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export interface GatewayOptions {
  services?: ServiceDescriptor[];
  routes?: RouteRule[];
  prober?: HealthProber;
}

export const createGatewayRuntime = (
  options: GatewayOptions = {}
): ServiceRuntime & { registry: ServiceRegistry; monitor: HealthMonitor } => {
  const startedAt = new Date();
  const registry = new ServiceRegistry(options.services ?? gatewayServices());
  const router = new RequestRouter(registry, options.routes ?? gatewayRoutes());

  // Probe outcomes feed the same breakers the router consults
  const monitor = new HealthMonitor({
    services: registry.list(),
    intervalMs: config.gateway.healthCheckInterval,
    shutdownTimeoutMs: config.shutdown.timeout,
    prober: options.prober,
    onResult: (service, record) => {
      const breaker = registry.breaker(service.name);
      if (record.status === HEALTH_STATUS.UNHEALTHY) {
        breaker.onFailure();
      } else if (
        record.status === HEALTH_STATUS.HEALTHY ||
        record.status === HEALTH_STATUS.DEGRADED
      ) {
        breaker.onSuccess();
      }
    },
  });

  const controller = createGatewayController({
    router,
    registry,
    monitor,
    startedAt,
  });
  const app = buildApp(createGatewayRoutes(controller), { rateLimit: true });

  return {
    role: "gateway",
    port: config.gateway.port,
    app,
    registry,
    monitor,
    startWorkers: async () => {
      monitor.start();
    },
    stopWorkers: () => monitor.stop(),
  };
};

export interface MonitorOptions {
  services?: ServiceDescriptor[];
  relay?: PubSubRelay;
  prober?: HealthProber;
}

export const createMonitorRuntime = (
  options: MonitorOptions = {}
): ServiceRuntime & { monitor: HealthMonitor; broadcaster: BroadcastServer } => {
  const startedAt = new Date();
  const relay = options.relay ?? createPubSubRelay();

  const monitor = new HealthMonitor({
    services: options.services ?? monitoredServices(),
    intervalMs: config.monitor.healthCheckInterval,
    shutdownTimeoutMs: config.shutdown.timeout,
    relay,
    groups: serviceGroups,
    prober: options.prober,
  });

  const broadcaster = new BroadcastServer({
    relay,
    getInitialStatus: () => ({
      overall: monitor.getOverallHealth(),
      services: monitor.getAllServiceStatuses(),
    }),
    path: config.websocket.path,
    pingIntervalMs: config.websocket.pingInterval,
    sendTimeoutMs: config.websocket.sendTimeout,
    maxQueueSize: config.websocket.maxQueueSize,
    maxSendFailures: config.websocket.maxSendFailures,
    maxConnections: config.websocket.maxConnections,
    incidentDedupTtlMs: config.websocket.incidentDedupTtl,
  });

  const controller = createMonitorController({
    monitor,
    broadcaster,
    relay,
    startedAt,
  });
  const app = buildApp(createMonitorRoutes(controller));

  return {
    role: "monitor",
    port: config.monitor.port,
    app,
    monitor,
    broadcaster,
    startWorkers: async (server) => {
      await relay.connect();
      broadcaster.attach(server);
      await broadcaster.start();
      monitor.start();
    },
    stopWorkers: async () => {
      await monitor.stop();
      await broadcaster.stop();
      await relay.disconnect();
    },
  };
};

export interface IncidentOptions {
  store?: LogStore;
  relay?: PubSubRelay;
  now?: () => Date;
}

export const createIncidentRuntime = (
  options: IncidentOptions = {}
): ServiceRuntime & { detector: IncidentDetector } => {
  const startedAt = new Date();
  const relay = options.relay ?? createPubSubRelay();
  const usesDatabase = options.store === undefined;

  const storeBreaker = new CircuitBreaker("log-store", {
    failureThreshold: config.circuitBreaker.failureThreshold,
    timeout: config.incident.queryTimeout,
    resetTimeout: config.circuitBreaker.resetTimeout,
  });
  const store = new GuardedLogStore(
    options.store ?? new DrizzleLogStore(getDatabase()),
    storeBreaker
  );

  const detector = new IncidentDetector({
    store,
    relay,
    intervalMs: config.incident.monitoringInterval,
    batchSize: config.incident.queryBatchSize,
    overlapMs: config.incident.checkpointOverlap,
    shutdownTimeoutMs: config.shutdown.timeout,
    now: options.now,
  });
  const incidents = new IncidentService(store, {
    batchSize: config.incident.queryBatchSize,
    now: options.now,
  });

  const controller = createIncidentController({
    incidents,
    detector,
    relay,
    startedAt,
  });

  const app = buildApp(createIncidentRoutes(controller), { json: true });

  return {
    role: "incident",
    port: config.incident.port,
    app,
    detector,
    startWorkers: async () => {
      if (usesDatabase) {
        await checkDatabaseConnection();
      }
      await relay.connect();
      detector.start();
    },
    stopWorkers: async () => {
      await detector.stop();
      await relay.disconnect();
      if (usesDatabase) {
        await closeDatabase();
      }
    },
  };
};

export const createRuntime = (role: ServiceRole): ServiceRuntime => {
  switch (role) {
    case "gateway":
      return createGatewayRuntime();
    case "monitor":
      return createMonitorRuntime();
    case "incident":
      return createIncidentRuntime();
  }
};

interface RunningService {
  runtime: ServiceRuntime;
  server: http.Server;
}

const closeServer = (server: http.Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

export const stopBackgroundWorkers = async (services: RunningService[]) => {
  logger.info("Stopping background workers...");
  for (const { runtime } of services) {
    try {
      await runtime.stopWorkers();
    } catch (error) {
      logger.error(`Failed to stop ${runtime.role} workers`, {
        error: toErrorMessage(error),
      });
    }
  }
};

export const setupGracefulShutdown = (services: RunningService[]) => {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error(
        "Could not close connections in time, forcefully shutting down"
      );
      process.exit(1);
    }, 10000).unref();

    await stopBackgroundWorkers(services);
    await Promise.all(services.map(({ server }) => closeServer(server)));

    logger.info("HTTP servers closed");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error("Graceful shutdown failed", {
        error: toErrorMessage(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
};
