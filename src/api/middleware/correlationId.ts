import { Request, Response, NextFunction } from "express";
import { generateCorrelationId } from "@/utils/idGenerator";
import "@/types/express";

export const CORRELATION_HEADER = "x-correlation-id";

export const correlationIdMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const incoming = req.header(CORRELATION_HEADER);
  req.correlationId =
    incoming && incoming.trim().length > 0
      ? incoming.trim()
      : generateCorrelationId();

  res.setHeader(CORRELATION_HEADER, req.correlationId);
  next();
};
