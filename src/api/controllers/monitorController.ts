import { Request, Response } from "express";
import { config } from "@/config/env";
import { HealthMonitor } from "@/workers/healthMonitor";
import { BroadcastServer } from "@/realtime/broadcastServer";
import { PubSubRelay } from "@/messaging/pubsubRelay";
import { HEALTH_STATUS } from "@/types/health";
import "@/types/express";

export interface MonitorControllerDeps {
  monitor: HealthMonitor;
  broadcaster: BroadcastServer;
  relay: PubSubRelay;
  startedAt: Date;
}

export const createMonitorController = ({
  monitor,
  broadcaster,
  relay,
  startedAt,
}: MonitorControllerDeps) => {
  const listServices = (req: Request, res: Response) => {
    res.json({
      services: monitor.getAllServiceStatuses(),
      timestamp: new Date().toISOString(),
    });
  };

  const getService = (req: Request, res: Response) => {
    const record = monitor.getServiceStatus(req.params.name);
    if (!record) {
      res.status(404).json({
        error: "Not Found",
        message: `Service ${req.params.name} is not monitored`,
        correlationId: req.correlationId,
      });
      return;
    }
    res.json(record);
  };

  const getGroup = (req: Request, res: Response) => {
    const services = monitor.getServiceGroupStatus(req.params.group);
    if (!services) {
      res.status(404).json({
        error: "Not Found",
        message: `Service group ${req.params.group} does not exist`,
        correlationId: req.correlationId,
      });
      return;
    }
    res.json({
      group: req.params.group,
      services,
      timestamp: new Date().toISOString(),
    });
  };

  const getSystemHealth = (req: Request, res: Response) => {
    res.json(monitor.getOverallHealth());
  };

  const getHealth = (req: Request, res: Response) => {
    const brokerUp = relay.isConnected();
    const monitoring = monitor.isMonitoring();

    res.json({
      status:
        brokerUp && monitoring ? HEALTH_STATUS.HEALTHY : HEALTH_STATUS.DEGRADED,
      service: config.monitor.name,
      version: config.monitor.version,
      broker: brokerUp ? "up" : "down",
      monitoring: monitoring ? "running" : "stopped",
      websocketConnections: broadcaster.getConnectionCount(),
      uptime: Math.round((Date.now() - startedAt.getTime()) / 1000),
      timestamp: new Date().toISOString(),
    });
  };

  const getInfo = (req: Request, res: Response) => {
    res.json({
      service: config.monitor.name,
      version: config.monitor.version,
      healthCheckInterval: config.monitor.healthCheckInterval,
      monitoredServices: Object.keys(monitor.getAllServiceStatuses()),
      websocket: broadcaster.getStats(),
      startedAt: startedAt.toISOString(),
    });
  };

  return {
    listServices,
    getService,
    getGroup,
    getSystemHealth,
    getHealth,
    getInfo,
  };
};

export type MonitorController = ReturnType<typeof createMonitorController>;
