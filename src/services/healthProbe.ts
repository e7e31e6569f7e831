import axios from "axios";
import { z } from "zod";
import { classifyTransportError } from "@/utils/errors";
import {
  HEALTH_STATUS,
  HealthCheckResult,
  HealthStatus,
  ReportedHealth,
} from "@/types/health";
import { ServiceDescriptor } from "@/types/service";

const reportedStatusSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["healthy", "degraded", "unhealthy", "unknown"]));

const healthBodySchema = z
  .object({
    status: z.unknown().optional(),
    service: z.object({ status: z.unknown().optional() }).passthrough().optional(),
  })
  .passthrough();

/**
 * Reads the self-reported status of a health body. A top-level `status`
 * wins over `service.status`; anything else falls back to healthy, since
 * many endpoints answer 200 without reporting a status.
 */
export const parseReportedHealth = (body: unknown): ReportedHealth => {
  const parsed = healthBodySchema.safeParse(body);
  if (!parsed.success) {
    return { kind: "healthy", reported: false };
  }

  for (const candidate of [parsed.data.status, parsed.data.service?.status]) {
    const status = reportedStatusSchema.safeParse(candidate);
    if (!status.success) {
      continue;
    }
    switch (status.data) {
      case "healthy":
        return { kind: "healthy", reported: true };
      case "degraded":
        return { kind: "degraded" };
      case "unhealthy":
        return { kind: "unhealthy" };
      case "unknown":
        return { kind: "unknown" };
    }
  }

  return { kind: "healthy", reported: false };
};

const toHealthStatus = (reported: ReportedHealth): HealthStatus => {
  switch (reported.kind) {
    case "healthy":
      return HEALTH_STATUS.HEALTHY;
    case "degraded":
      return HEALTH_STATUS.DEGRADED;
    case "unhealthy":
      return HEALTH_STATUS.UNHEALTHY;
    case "unknown":
      return HEALTH_STATUS.UNKNOWN;
  }
};

const parseBody = (raw: unknown): unknown => {
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

export const healthUrl = (service: ServiceDescriptor): string =>
  `${service.baseUrl}${service.healthPath}`;

/**
 * Probes one service. Never throws: transport failures and error statuses
 * come back as unhealthy results.
 */
export const probeService = async (
  service: ServiceDescriptor,
  signal?: AbortSignal
): Promise<HealthCheckResult> => {
  const startTime = Date.now();

  try {
    const response = await axios.get<unknown>(healthUrl(service), {
      timeout: service.timeoutMs,
      signal,
      responseType: "text",
      validateStatus: () => true,
    });
    const responseTimeMs = Date.now() - startTime;

    if (response.status >= 400) {
      return {
        serviceName: service.name,
        status: HEALTH_STATUS.UNHEALTHY,
        responseTimeMs,
        timestamp: new Date(),
        errorMessage: `HTTP ${response.status}`,
        details: { httpStatus: response.status },
      };
    }

    const reported = parseReportedHealth(parseBody(response.data));

    return {
      serviceName: service.name,
      status: toHealthStatus(reported),
      responseTimeMs,
      timestamp: new Date(),
      errorMessage: "",
      details: {
        httpStatus: response.status,
        selfReported: reported.kind !== "healthy" || reported.reported,
      },
    };
  } catch (error) {
    const failure = classifyTransportError(error, service.timeoutMs);

    return {
      serviceName: service.name,
      status: HEALTH_STATUS.UNHEALTHY,
      responseTimeMs: Date.now() - startTime,
      timestamp: new Date(),
      errorMessage:
        failure.kind === "timeout"
          ? `Health probe ${failure.message}`
          : failure.message,
      details: failure.code ? { errorCode: failure.code } : {},
    };
  }
};

export type HealthProber = typeof probeService;
