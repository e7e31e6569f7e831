import axios from "axios";
import request from "supertest";
import { createGatewayRuntime } from "../src/app";
import { HealthCheckResult, HealthStatus } from "../src/types/health";
import { ServiceDescriptor } from "../src/types/service";
import {
  axiosResponse,
  healthResult,
  serviceDescriptor,
} from "./helpers/fixtures";

jest.mock("axios");
jest.mock("../src/monitoring/logger", () => require("./helpers/mockLogger"));

const mockedAxios = jest.mocked(axios);

describe("API gateway", () => {
  let statuses: Record<string, HealthStatus>;
  let runtime: ReturnType<typeof createGatewayRuntime>;

  beforeEach(() => {
    mockedAxios.request.mockReset();
    statuses = { "file-service": "healthy", "utility-service": "healthy" };
    runtime = createGatewayRuntime({
      services: [
        serviceDescriptor({ name: "file-service" }),
        serviceDescriptor({
          name: "utility-service",
          baseUrl: "http://utility-service:8002",
        }),
      ],
      routes: [
        { prefix: "/api/files", service: "file-service", stripPrefix: "/api" },
        { prefix: "/api/utils", service: "utility-service", stripPrefix: "/api" },
      ],
      prober: jest.fn(
        async (service: ServiceDescriptor): Promise<HealthCheckResult> =>
          healthResult(
            service.name,
            statuses[service.name],
            statuses[service.name] === "unhealthy" ? "HTTP 500" : ""
          )
      ),
    });
  });

  describe("proxy", () => {
    it("should forward requests and relay the upstream response", async () => {
      mockedAxios.request.mockResolvedValue(
        axiosResponse(200, Buffer.from("hello"), { "content-type": "text/plain" })
      );

      const response = await request(runtime.app)
        .get("/api/files/report.txt?download=1")
        .set("x-correlation-id", "req-fixed");

      expect(response.status).toBe(200);
      expect(response.text).toBe("hello");
      expect(response.headers["x-correlation-id"]).toBe("req-fixed");
      expect(mockedAxios.request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: "GET",
          url: "http://file-service:8001/files/report.txt?download=1",
          headers: expect.objectContaining({ "x-correlation-id": "req-fixed" }),
        })
      );
    });

    it("should pass request bodies through untouched", async () => {
      mockedAxios.request.mockResolvedValue(
        axiosResponse(201, Buffer.from('{"id":"f1"}'), {
          "content-type": "application/json",
        })
      );

      const response = await request(runtime.app)
        .post("/api/files/upload")
        .set("content-type", "application/json")
        .send('{"name":"a"}');

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: "f1" });
      expect(mockedAxios.request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: "POST",
          data: Buffer.from('{"name":"a"}'),
        })
      );
    });

    it("should answer 404 for paths without a route", async () => {
      const response = await request(runtime.app).get("/api/unknown");

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: "Not Found",
        message: "No route for /api/unknown",
        correlationId: expect.stringMatching(/^req-/),
      });
    });

    it("should map upstream timeouts to 504", async () => {
      mockedAxios.request.mockRejectedValue(
        Object.assign(new Error("timeout of 500ms exceeded"), {
          code: "ECONNABORTED",
        })
      );

      const response = await request(runtime.app).get("/api/utils/ping");

      expect(response.status).toBe(504);
      expect(response.body).toMatchObject({
        error: "Gateway Timeout",
        message: "timeout after 500ms",
      });
    });
  });

  describe("health-driven circuit breaking", () => {
    it("should open the breaker after three failed probes and reject with 503", async () => {
      statuses["file-service"] = "unhealthy";

      await runtime.monitor.runCycle();
      await runtime.monitor.runCycle();
      expect(runtime.registry.breaker("file-service").getState().state).toBe(
        "CLOSED"
      );
      await runtime.monitor.runCycle();

      expect(runtime.registry.breaker("file-service").getState()).toMatchObject({
        state: "OPEN",
        failureCount: 3,
      });

      const response = await request(runtime.app).get("/api/files/report.txt");

      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        error: "Service Unavailable",
        message: "Service file-service is temporarily unavailable",
        correlationId: expect.stringMatching(/^req-/),
      });
      expect(mockedAxios.request).not.toHaveBeenCalled();
    });

    it("should close the breaker again once probes recover", async () => {
      statuses["file-service"] = "unhealthy";
      for (let cycle = 0; cycle < 3; cycle++) {
        await runtime.monitor.runCycle();
      }

      statuses["file-service"] = "degraded";
      await runtime.monitor.runCycle();

      expect(runtime.registry.breaker("file-service").getState().state).toBe(
        "CLOSED"
      );
    });

    it("should leave other services routable", async () => {
      statuses["file-service"] = "unhealthy";
      for (let cycle = 0; cycle < 3; cycle++) {
        await runtime.monitor.runCycle();
      }
      mockedAxios.request.mockResolvedValue(axiosResponse(200, Buffer.from("pong")));

      const response = await request(runtime.app).get("/api/utils/ping");

      expect(response.status).toBe(200);
    });
  });

  describe("own endpoints", () => {
    it("should describe itself at the root", async () => {
      const response = await request(runtime.app).get("/");

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        service: "OpsPulse API Gateway",
        status: "running",
      });
    });

    it("should summarise upstream health", async () => {
      statuses["utility-service"] = "degraded";
      await runtime.monitor.runCycle();

      const response = await request(runtime.app).get("/health");

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: "degraded",
        services: { totalServices: 2, healthy: 1, degraded: 1 },
      });
    });

    it("should report service records and breaker states", async () => {
      await runtime.monitor.runCycle();

      const response = await request(runtime.app).get("/status");

      expect(response.body.services["file-service"]).toMatchObject({
        status: "healthy",
        consecutiveFailures: 0,
      });
      expect(response.body.circuitBreakers["utility-service"]).toMatchObject({
        state: "CLOSED",
        failureCount: 0,
        threshold: 3,
      });
    });

    it("should list its routes", async () => {
      const response = await request(runtime.app).get("/api");

      expect(response.body).toEqual({
        routes: [
          {
            prefix: "/api/files",
            service: "file-service",
            upstream: "http://file-service:8001",
          },
          {
            prefix: "/api/utils",
            service: "utility-service",
            upstream: "http://utility-service:8002",
          },
        ],
      });
    });
  });
});
