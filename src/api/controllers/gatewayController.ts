import { Request, Response, NextFunction } from "express";
import { config } from "@/config/env";
import { RequestRouter } from "@/services/requestRouter";
import { ServiceRegistry } from "@/services/serviceRegistry";
import { HealthMonitor } from "@/workers/healthMonitor";
import "@/types/express";

export interface GatewayControllerDeps {
  router: RequestRouter;
  registry: ServiceRegistry;
  monitor: HealthMonitor;
  startedAt: Date;
}

const rawQuery = (originalUrl: string): string => {
  const index = originalUrl.indexOf("?");
  return index === -1 ? "" : originalUrl.slice(index + 1);
};

export const createGatewayController = ({
  router,
  registry,
  monitor,
  startedAt,
}: GatewayControllerDeps) => {
  const getRoot = (req: Request, res: Response) => {
    res.json({
      service: config.gateway.name,
      version: config.gateway.version,
      status: "running",
      uptime: Math.round((Date.now() - startedAt.getTime()) / 1000),
      endpoints: {
        health: "/health",
        status: "/status",
        routes: "/api",
        services: "/api/services",
      },
    });
  };

  const listRoutes = (req: Request, res: Response) => {
    res.json({
      routes: router.getRoutes().map((rule) => ({
        prefix: rule.prefix,
        service: rule.service,
        upstream: registry.get(rule.service).baseUrl,
      })),
    });
  };

  const listServices = (req: Request, res: Response) => {
    res.json({
      services: registry.list().map((service) => ({
        name: service.name,
        url: service.baseUrl,
        timeoutMs: service.timeoutMs,
        retries: service.retries,
      })),
    });
  };

  const getHealth = (req: Request, res: Response) => {
    const summary = monitor.getOverallHealth();
    res.json({
      status: summary.overallStatus,
      service: config.gateway.name,
      version: config.gateway.version,
      services: summary,
      timestamp: new Date().toISOString(),
    });
  };

  const getStatus = (req: Request, res: Response) => {
    res.json({
      gateway: {
        name: config.gateway.name,
        version: config.gateway.version,
        uptime: Math.round((Date.now() - startedAt.getTime()) / 1000),
      },
      services: monitor.getAllServiceStatuses(),
      circuitBreakers: registry.breakerStates(),
      timestamp: new Date().toISOString(),
    });
  };

  const proxy = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const response = await router.route({
        method: req.method,
        path: req.path,
        query: rawQuery(req.originalUrl),
        headers: req.headers,
        body: Buffer.isBuffer(req.body) ? req.body : undefined,
        correlationId: req.correlationId,
      });

      res.status(response.status);
      for (const [name, value] of Object.entries(response.headers)) {
        res.setHeader(name, value);
      }
      res.send(response.body);
    } catch (error) {
      next(error);
    }
  };

  return { getRoot, listRoutes, listServices, getHealth, getStatus, proxy };
};

export type GatewayController = ReturnType<typeof createGatewayController>;
