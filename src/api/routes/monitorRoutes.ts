import { Router } from "express";
import { MonitorController } from "@/api/controllers/monitorController";

export const createMonitorRoutes = (controller: MonitorController): Router => {
  const router: Router = Router();

  router.get("/services", controller.listServices);
  // Registered before /services/:name so "groups" is not read as a name
  router.get("/services/groups/:group", controller.getGroup);
  router.get("/services/:name", controller.getService);
  router.get("/system/health", controller.getSystemHealth);

  router.get("/health", controller.getHealth);
  router.get("/info", controller.getInfo);

  return router;
};
