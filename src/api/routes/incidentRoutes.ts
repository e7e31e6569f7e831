import { Router } from "express";
import { IncidentController } from "@/api/controllers/incidentController";

export const createIncidentRoutes = (controller: IncidentController): Router => {
  const router: Router = Router();

  // GET /incidents?hours=N - Error summary for the last N hours
  router.get("/incidents", controller.getIncidents);

  // GET /errors/:service?hours=N - Recent errors of one service
  router.get("/errors/:service", controller.getServiceErrors);

  // POST /check - Run a detection cycle now
  router.post("/check", controller.triggerCheck);

  router.get("/health", controller.getHealth);
  router.get("/info", controller.getInfo);

  return router;
};
