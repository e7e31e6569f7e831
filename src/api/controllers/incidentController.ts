import { Request, Response, NextFunction } from "express";
import { config } from "@/config/env";
import { createContextLogger } from "@/monitoring/logger";
import { IncidentService } from "@/services/incidentService";
import { IncidentDetector } from "@/workers/incidentDetector";
import { PubSubRelay } from "@/messaging/pubsubRelay";
import {
  incidentQuerySchema,
  serviceErrorsParamsSchema,
} from "@/api/validation/incidentValidation";
import { HEALTH_STATUS } from "@/types/health";
import "@/types/express";

export interface IncidentControllerDeps {
  incidents: IncidentService;
  detector: IncidentDetector;
  relay: PubSubRelay;
  startedAt: Date;
}

export const createIncidentController = ({
  incidents,
  detector,
  relay,
  startedAt,
}: IncidentControllerDeps) => {
  const getIncidents = async (
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { hours } = incidentQuerySchema.parse(req.query);
      const summary = await incidents.getIncidentSummary(hours);

      createContextLogger(req.correlationId).info("Incident summary served", {
        hours,
        totalErrors: summary.totalErrors,
      });

      res.json({
        incidents: summary,
        timeRangeHours: hours,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  };

  const getServiceErrors = async (
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const { service } = serviceErrorsParamsSchema.parse(req.params);
      const { hours } = incidentQuerySchema.parse(req.query);
      const errors = await incidents.getServiceErrors(service, hours);

      res.json({
        service,
        errors,
        count: errors.length,
        timeRangeHours: hours,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  };

  const triggerCheck = async (
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const contextLogger = createContextLogger(req.correlationId);
      contextLogger.info("Manual detection cycle requested");

      const result = await detector.runCycle();

      res.status(result.status === "completed" ? 200 : 503).json({
        result,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  };

  const getHealth = (req: Request, res: Response) => {
    const detectorStatus = detector.getStatus();
    const brokerUp = relay.isConnected();
    const lastQueryFailed = detectorStatus.lastResult?.status === "query_failed";

    const status =
      brokerUp && detectorStatus.running && !lastQueryFailed
        ? HEALTH_STATUS.HEALTHY
        : HEALTH_STATUS.DEGRADED;

    res.json({
      status,
      service: config.incident.name,
      version: config.incident.version,
      broker: brokerUp ? "up" : "down",
      logStore: lastQueryFailed ? "down" : "up",
      monitoring: detectorStatus.running ? "running" : "stopped",
      uptime: Math.round((Date.now() - startedAt.getTime()) / 1000),
      timestamp: new Date().toISOString(),
    });
  };

  const getInfo = (req: Request, res: Response) => {
    res.json({
      service: config.incident.name,
      version: config.incident.version,
      monitoringInterval: config.incident.monitoringInterval,
      queryBatchSize: config.incident.queryBatchSize,
      detector: detector.getStatus(),
      startedAt: startedAt.toISOString(),
    });
  };

  return { getIncidents, getServiceErrors, triggerCheck, getHealth, getInfo };
};

export type IncidentController = ReturnType<typeof createIncidentController>;
