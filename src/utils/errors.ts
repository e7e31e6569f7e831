export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export type TransportFailureKind = "timeout" | "connection";

// Upstream never produced a response: timed out or refused/reset
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly kind: TransportFailureKind,
    public readonly code?: string
  ) {
    super(message, kind === "timeout" ? 504 : 502);
  }
}

// Unknown route or service; never retried
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class BrokerError extends AppError {
  constructor(message: string, public readonly channel?: string) {
    super(message, 503);
  }
}

// Log store query failed or timed out
export class LogStoreError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class CircuitOpenError extends AppError {
  constructor(public readonly service: string) {
    super(`Service ${service} is temporarily unavailable`, 503);
  }
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ESOCKETTIMEDOUT"]);

const hasCode = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string";

export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Maps a failed outbound HTTP call (axios or Node socket error) onto a
 * TransportError so callers can tell a timeout from a refused connection.
 */
export const classifyTransportError = (
  error: unknown,
  timeoutMs: number
): TransportError => {
  if (error instanceof TransportError) {
    return error;
  }

  const code = hasCode(error) ? error.code : undefined;
  const message = toErrorMessage(error);

  if ((code && TIMEOUT_CODES.has(code)) || /timeout/i.test(message)) {
    return new TransportError(`timeout after ${timeoutMs}ms`, "timeout", code);
  }

  if (code === "ECONNREFUSED") {
    return new TransportError("Connection refused", "connection", code);
  }

  return new TransportError(message, "connection", code);
};
