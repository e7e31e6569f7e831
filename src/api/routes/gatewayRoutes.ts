import express, { Router } from "express";
import { GatewayController } from "@/api/controllers/gatewayController";

export const createGatewayRoutes = (controller: GatewayController): Router => {
  const router: Router = Router();

  router.get("/", controller.getRoot);
  router.get("/health", controller.getHealth);
  router.get("/status", controller.getStatus);
  router.get("/api", controller.listRoutes);
  router.get("/api/services", controller.listServices);

  // Everything else is forwarded with its body untouched
  router.use(express.raw({ type: () => true, limit: "10mb" }), controller.proxy);

  return router;
};
