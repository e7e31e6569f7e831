import type http from "http";
import {
  createRuntime,
  SERVICE_ROLES,
  ServiceRole,
  ServiceRuntime,
  setupGracefulShutdown,
} from "./app";
import { logger } from "@/monitoring/logger";
import { toErrorMessage } from "@/utils/errors";

const isServiceRole = (value: string): value is ServiceRole =>
  SERVICE_ROLES.some((role) => role === value);

export const parseRoles = (arg: string | undefined): ServiceRole[] => {
  const requested = (arg || process.env.SERVICE_ROLE || "all").toLowerCase();
  if (requested === "all") {
    return [...SERVICE_ROLES];
  }
  if (!isServiceRole(requested)) {
    throw new Error(
      `Unknown role "${requested}". Expected one of: ${[...SERVICE_ROLES, "all"].join(", ")}`
    );
  }
  return [requested];
};

const listen = (runtime: ServiceRuntime): Promise<http.Server> =>
  new Promise((resolve, reject) => {
    const server = runtime.app.listen(runtime.port, () => resolve(server));
    server.once("error", reject);
  });

const startServer = async () => {
  try {
    const roles = parseRoles(process.argv[2]);
    const services: { runtime: ServiceRuntime; server: http.Server }[] = [];

    for (const role of roles) {
      const runtime = createRuntime(role);
      const server = await listen(runtime);

      logger.info(`${role} started on port ${runtime.port}`, {
        environment: process.env.NODE_ENV || "development",
        port: runtime.port,
      });

      // Start background workers after server is ready
      await runtime.startWorkers(server);
      services.push({ runtime, server });
    }

    setupGracefulShutdown(services);
    return services;
  } catch (error) {
    logger.error("Failed to start server", { error: toErrorMessage(error) });
    process.exit(1);
  }
};

if (require.main === module) {
  void startServer();
}
