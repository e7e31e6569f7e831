import axios, { AxiosResponse } from "axios";
import { RequestRouter } from "../src/services/requestRouter";
import { ServiceRegistry } from "../src/services/serviceRegistry";
import { createContextLogger } from "../src/monitoring/logger";
import {
  CircuitOpenError,
  ConfigurationError,
  TransportError,
} from "../src/utils/errors";
import {
  axiosResponse,
  serviceDescriptor,
  transportError,
} from "./helpers/fixtures";

jest.mock("axios");
jest.mock("../src/monitoring/logger", () => require("./helpers/mockLogger"));

const mockedAxios = jest.mocked(axios);

const routes = [
  { prefix: "/api/files", service: "file-service", stripPrefix: "/api" },
  {
    prefix: "/api/files/archive",
    service: "utility-service",
    stripPrefix: "/api",
  },
  { prefix: "/api/utils", service: "utility-service", stripPrefix: "/api" },
];

const request = (overrides: Partial<Parameters<RequestRouter["route"]>[0]> = {}) => ({
  method: "GET",
  path: "/api/files/report.txt",
  query: "",
  headers: {},
  correlationId: "req-test",
  ...overrides,
});

describe("RequestRouter", () => {
  let registry: ServiceRegistry;
  let router: RequestRouter;

  beforeEach(() => {
    mockedAxios.request.mockReset();
    registry = new ServiceRegistry(
      [
        serviceDescriptor({ name: "file-service", retries: 2 }),
        serviceDescriptor({
          name: "utility-service",
          baseUrl: "http://utility-service:8002",
          retries: 0,
        }),
      ],
      { resetTimeout: 60000 }
    );
    router = new RequestRouter(registry, routes, { baseDelay: 1, maxDelay: 4 });
  });

  describe("match", () => {
    it("should pick the longest matching prefix", () => {
      const matched = router.match("/api/files/archive/2024.zip");

      expect(matched?.service.name).toBe("utility-service");
      expect(matched?.upstreamPath).toBe("/files/archive/2024.zip");
    });

    it("should strip the configured prefix", () => {
      expect(router.match("/api/files/report.txt")?.upstreamPath).toBe(
        "/files/report.txt"
      );
      expect(router.match("/api/files")?.upstreamPath).toBe("/files");
    });

    it("should only match on path segment boundaries", () => {
      expect(router.match("/api/filesystem")).toBeUndefined();
      expect(router.match("/health")).toBeUndefined();
    });

    it("should reject routes to unknown services", () => {
      expect(
        () =>
          new RequestRouter(registry, [{ prefix: "/api/x", service: "nowhere" }])
      ).toThrow(ConfigurationError);
    });
  });

  describe("route", () => {
    it("should answer 404 for unmatched paths without an upstream call", async () => {
      const result = router.route(request({ path: "/api/unknown" }));

      await expect(result).rejects.toBeInstanceOf(ConfigurationError);
      await expect(result).rejects.toMatchObject({ statusCode: 404 });
      expect(mockedAxios.request).not.toHaveBeenCalled();
    });

    it("should forward method, query, filtered headers and body", async () => {
      mockedAxios.request.mockResolvedValue(
        axiosResponse(201, Buffer.from('{"id":"f1"}'), {
          "content-type": "application/json",
          "content-length": "11",
          "content-encoding": "gzip",
          "transfer-encoding": "chunked",
        })
      );
      const body = Buffer.from('{"name":"a"}');

      const response = await router.route(
        request({
          method: "POST",
          path: "/api/files/upload",
          query: "overwrite=true",
          headers: {
            host: "gateway:8000",
            connection: "keep-alive",
            "content-type": "application/json",
            "content-length": "12",
            "x-api-key": "test-secret",
          },
          body,
        })
      );

      expect(mockedAxios.request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: "POST",
          url: "http://file-service:8001/files/upload?overwrite=true",
          headers: {
            "content-type": "application/json",
            "x-api-key": "test-secret",
            "x-correlation-id": "req-test",
          },
          data: body,
          timeout: 500,
          maxRedirects: 0,
        })
      );
      expect(response.status).toBe(201);
      expect(response.headers).toEqual({
        "content-type": "application/json",
        "x-response-time": expect.stringMatching(/^\d+ms$/),
      });
      expect(response.body.toString()).toBe('{"id":"f1"}');
    });

    it("should relay upstream error statuses and count them as success", async () => {
      const breaker = registry.breaker("file-service");
      breaker.onFailure();
      breaker.onFailure();
      mockedAxios.request.mockResolvedValue(
        axiosResponse(503, Buffer.from("maintenance"))
      );

      const response = await router.route(request());

      expect(response.status).toBe(503);
      expect(response.body.toString()).toBe("maintenance");
      expect(breaker.getState()).toMatchObject({
        state: "CLOSED",
        failureCount: 0,
      });
    });

    it("should answer 503 without an upstream call while the breaker is open", async () => {
      const breaker = registry.breaker("file-service");
      breaker.onFailure();
      breaker.onFailure();
      breaker.onFailure();

      const result = router.route(request());

      await expect(result).rejects.toBeInstanceOf(CircuitOpenError);
      await expect(result).rejects.toMatchObject({ statusCode: 503 });
      expect(mockedAxios.request).not.toHaveBeenCalled();
    });

    it("should let a single trial through once the cooldown has passed", async () => {
      registry = new ServiceRegistry(
        [serviceDescriptor({ name: "file-service", retries: 0 })],
        { resetTimeout: 0 }
      );
      router = new RequestRouter(registry, routes, { baseDelay: 1, maxDelay: 4 });
      const breaker = registry.breaker("file-service");
      breaker.onFailure();
      breaker.onFailure();
      breaker.onFailure();

      let answerTrial: (value: AxiosResponse<Buffer>) => void = () => undefined;
      mockedAxios.request.mockReturnValueOnce(
        new Promise((resolve) => {
          answerTrial = resolve;
        })
      );

      const calls = Array.from({ length: 5 }, () => router.route(request()));
      const outcomes = Promise.allSettled(calls);
      answerTrial(axiosResponse(200, Buffer.from("ok")));
      const settled = await outcomes;

      expect(mockedAxios.request).toHaveBeenCalledTimes(1);
      expect(settled[0]).toMatchObject({
        status: "fulfilled",
        value: { status: 200 },
      });
      for (const outcome of settled.slice(1)) {
        expect(outcome.status).toBe("rejected");
        if (outcome.status === "rejected") {
          expect(outcome.reason).toBeInstanceOf(CircuitOpenError);
        }
      }
      expect(breaker.getState().state).toBe("CLOSED");
    });

    it("should map upstream timeouts to 504", async () => {
      mockedAxios.request.mockRejectedValue(
        transportError("timeout of 500ms exceeded", "ECONNABORTED")
      );

      const result = router.route(request({ path: "/api/utils/ping" }));

      await expect(result).rejects.toBeInstanceOf(TransportError);
      await expect(result).rejects.toMatchObject({
        statusCode: 504,
        message: "timeout after 500ms",
      });
      expect(registry.breaker("utility-service").getState().failureCount).toBe(1);
    });

    it("should map refused connections to 502", async () => {
      mockedAxios.request.mockRejectedValue(
        transportError("connect ECONNREFUSED", "ECONNREFUSED")
      );

      await expect(
        router.route(request({ path: "/api/utils/ping" }))
      ).rejects.toMatchObject({ statusCode: 502, message: "Connection refused" });
    });

    it("should retry idempotent requests on transport failure", async () => {
      mockedAxios.request
        .mockRejectedValueOnce(transportError("connect ECONNREFUSED", "ECONNREFUSED"))
        .mockRejectedValueOnce(transportError("connect ECONNREFUSED", "ECONNREFUSED"))
        .mockResolvedValueOnce(axiosResponse(200, Buffer.from("ok")));

      const response = await router.route(request());

      expect(response.status).toBe(200);
      expect(mockedAxios.request).toHaveBeenCalledTimes(3);
      expect(registry.breaker("file-service").getState().failureCount).toBe(0);
    });

    it("should never retry non-idempotent requests", async () => {
      mockedAxios.request.mockRejectedValue(
        transportError("connect ECONNREFUSED", "ECONNREFUSED")
      );

      await expect(
        router.route(request({ method: "POST" }))
      ).rejects.toMatchObject({ statusCode: 502 });
      expect(mockedAxios.request).toHaveBeenCalledTimes(1);
    });

    it("should stop retrying once the breaker opens", async () => {
      const breaker = registry.breaker("file-service");
      breaker.onFailure();
      breaker.onFailure();
      mockedAxios.request.mockRejectedValue(
        transportError("connect ECONNREFUSED", "ECONNREFUSED")
      );

      await expect(router.route(request())).rejects.toMatchObject({
        statusCode: 502,
        message: "Connection refused",
      });
      expect(mockedAxios.request).toHaveBeenCalledTimes(1);
      expect(breaker.getState().state).toBe("OPEN");
    });

    it("should write one log line per request", async () => {
      mockedAxios.request.mockRejectedValue(
        transportError("timeout of 500ms exceeded", "ECONNABORTED")
      );

      await expect(
        router.route(request({ path: "/api/utils/ping" }))
      ).rejects.toThrow("timeout after 500ms");

      const contextLogger = jest.mocked(createContextLogger).mock.results[0].value;
      expect(createContextLogger).toHaveBeenCalledWith("req-test");
      expect(contextLogger.info).toHaveBeenCalledTimes(1);
      expect(contextLogger.info).toHaveBeenCalledWith(
        "Gateway request",
        expect.objectContaining({
          method: "GET",
          path: "/api/utils/ping",
          target: "utility-service",
          status: 504,
        })
      );
    });
  });
});
