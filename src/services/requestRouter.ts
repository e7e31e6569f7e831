import axios, { AxiosResponse, RawAxiosRequestHeaders } from "axios";
import { IncomingHttpHeaders } from "http";
import { config } from "@/config/env";
import { createContextLogger } from "@/monitoring/logger";
import { ServiceRegistry } from "@/services/serviceRegistry";
import {
  AppError,
  CircuitOpenError,
  ConfigurationError,
  TransportError,
  classifyTransportError,
} from "@/utils/errors";
import { backoffDelay, sleep } from "@/utils/timeout";
import { RouteRule, ServiceDescriptor } from "@/types/service";

export interface GatewayRequest {
  method: string;
  path: string;
  query: string;
  headers: IncomingHttpHeaders;
  body?: Buffer;
  correlationId: string;
}

export interface GatewayResponse {
  status: number;
  headers: Record<string, string | string[]>;
  body: Buffer;
}

export interface RouteMatch {
  rule: RouteRule;
  service: ServiceDescriptor;
  upstreamPath: string;
}

interface RetryPolicy {
  baseDelay: number;
  maxDelay: number;
}

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "host",
]);

// The response is re-framed on the way back to the client
const STRIPPED_RESPONSE_HEADERS = new Set([
  ...HOP_BY_HOP_HEADERS,
  "content-encoding",
  "content-length",
]);

const IDEMPOTENT_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

const matchesPrefix = (path: string, prefix: string): boolean =>
  path === prefix ||
  path.startsWith(prefix.endsWith("/") ? prefix : `${prefix}/`);

export const filterRequestHeaders = (
  headers: IncomingHttpHeaders
): RawAxiosRequestHeaders => {
  const forwarded: RawAxiosRequestHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (value === undefined || HOP_BY_HOP_HEADERS.has(key)) {
      continue;
    }
    if (key === "content-length") {
      continue;
    }
    forwarded[key] = Array.isArray(value) ? value.join(", ") : value;
  }
  return forwarded;
};

export const filterResponseHeaders = (
  headers: AxiosResponse["headers"]
): Record<string, string | string[]> => {
  const relayed: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (STRIPPED_RESPONSE_HEADERS.has(key)) {
      continue;
    }
    if (typeof value === "string") {
      relayed[key] = value;
    } else if (Array.isArray(value)) {
      relayed[key] = value.map(String);
    } else if (typeof value === "number" || typeof value === "boolean") {
      relayed[key] = String(value);
    }
  }
  return relayed;
};

/**
 * Gateway routing: longest-prefix match, breaker guard, forward. Any response
 * from the upstream counts as a breaker success, whatever its status; only
 * transport failures count against the service.
 */
export class RequestRouter {
  private readonly rules: RouteRule[];
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly registry: ServiceRegistry,
    rules: RouteRule[],
    retryPolicy: RetryPolicy = config.retry
  ) {
    for (const rule of rules) {
      if (!registry.has(rule.service)) {
        throw new ConfigurationError(
          `Route ${rule.prefix} targets unknown service ${rule.service}`
        );
      }
    }
    this.rules = [...rules].sort((a, b) => b.prefix.length - a.prefix.length);
    this.retryPolicy = retryPolicy;
  }

  getRoutes(): RouteRule[] {
    return [...this.rules];
  }

  match(path: string): RouteMatch | undefined {
    const rule = this.rules.find((candidate) =>
      matchesPrefix(path, candidate.prefix)
    );
    if (!rule) {
      return undefined;
    }

    const strip = rule.stripPrefix ?? "";
    const stripped =
      strip && matchesPrefix(path, strip) ? path.slice(strip.length) : path;

    return {
      rule,
      service: this.registry.get(rule.service),
      upstreamPath: stripped.startsWith("/") ? stripped : `/${stripped}`,
    };
  }

  async route(request: GatewayRequest): Promise<GatewayResponse> {
    const log = createContextLogger(request.correlationId);
    const startTime = Date.now();
    let target: string | null = null;
    let status = 500;

    try {
      const matched = this.match(request.path);
      if (!matched) {
        throw new ConfigurationError(`No route for ${request.path}`);
      }
      target = matched.service.name;

      const response = await this.forward(request, matched);
      status = response.status;
      response.headers["x-response-time"] = `${Date.now() - startTime}ms`;
      return response;
    } catch (error) {
      status = error instanceof AppError ? error.statusCode : 500;
      throw error;
    } finally {
      log.info("Gateway request", {
        method: request.method,
        path: request.path,
        target,
        status,
        latencyMs: Date.now() - startTime,
      });
    }
  }

  private async forward(
    request: GatewayRequest,
    { service, upstreamPath }: RouteMatch
  ): Promise<GatewayResponse> {
    const breaker = this.registry.breaker(service.name);
    const method = request.method.toUpperCase();
    const maxAttempts = IDEMPOTENT_METHODS.has(method) ? 1 + service.retries : 1;
    const url = `${service.baseUrl}${upstreamPath}${
      request.query ? `?${request.query}` : ""
    }`;
    const headers = filterRequestHeaders(request.headers);
    headers["x-correlation-id"] = request.correlationId;

    let lastFailure: TransportError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (!breaker.canExecute()) {
        // A retry that finds the breaker open reports the failure it already has
        throw lastFailure ?? new CircuitOpenError(service.name);
      }

      try {
        const response = await axios.request<ArrayBuffer>({
          method,
          url,
          headers,
          data: request.body && request.body.length > 0 ? request.body : undefined,
          timeout: service.timeoutMs,
          responseType: "arraybuffer",
          validateStatus: () => true,
          maxRedirects: 0,
        });
        breaker.onSuccess();

        return {
          status: response.status,
          headers: filterResponseHeaders(response.headers),
          body: Buffer.from(response.data ?? new ArrayBuffer(0)),
        };
      } catch (error) {
        breaker.onFailure();
        lastFailure = classifyTransportError(error, service.timeoutMs);

        if (attempt < maxAttempts) {
          const delay = backoffDelay(
            attempt,
            this.retryPolicy.baseDelay,
            this.retryPolicy.maxDelay
          );
          createContextLogger(request.correlationId).warn(
            `Retrying ${method} to ${service.name}`,
            { attempt, delay, error: lastFailure.message }
          );
          await sleep(delay);
        }
      }
    }

    throw lastFailure ?? new CircuitOpenError(service.name);
  }
}
