import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { createContextLogger } from "@/monitoring/logger";
import { AppError } from "@/utils/errors";
import "@/types/express";

interface ErrorBody {
  error: string;
  message: string;
  correlationId: string;
  details?: unknown;
  stack?: string;
}

const STATUS_LABELS: Record<number, string> = {
  400: "Bad Request",
  404: "Not Found",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const logger = createContextLogger(req.correlationId);

  if (error instanceof ZodError) {
    logger.warn("Request validation failed", {
      path: req.path,
      issues: error.errors.map((issue) => issue.message),
    });

    const body: ErrorBody = {
      error: "VALIDATION_ERROR",
      message: "Invalid request parameters",
      correlationId: req.correlationId,
      details: error.errors.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
    res.status(400).json(body);
    return;
  }

  let statusCode = 500;
  let message = "Internal Server Error";
  let isOperational = false;

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    message = error.message;
    isOperational = error.isOperational;
  }

  const meta = {
    error: error.message,
    statusCode,
    path: req.path,
    method: req.method,
    isOperational,
  };
  if (statusCode >= 500 && !isOperational) {
    logger.error("Request error", { ...meta, stack: error.stack });
  } else {
    logger.warn("Request failed", meta);
  }

  // Only operational errors carry their message to the client
  const body: ErrorBody = {
    error: STATUS_LABELS[statusCode] ?? "Error",
    message: isOperational ? message : "Internal Server Error",
    correlationId: req.correlationId,
  };

  if (process.env.NODE_ENV === "development") {
    body.stack = error.stack;
  }

  res.status(statusCode).json(body);
};

export const notFoundHandler = (req: Request, res: Response) => {
  const logger = createContextLogger(req.correlationId);

  logger.warn("Route not found", {
    path: req.path,
    method: req.method,
  });

  res.status(404).json({
    error: "Not Found",
    message: `Route ${req.method} ${req.path} not found`,
    correlationId: req.correlationId,
  });
};
