import rateLimit from "express-rate-limit";
import { RequestHandler } from "express";
import { config } from "@/config/env";
import "@/types/express";

const passThrough: RequestHandler = (req, res, next) => next();

export const createRateLimiter = (
  options: typeof config.rateLimit = config.rateLimit
): RequestHandler => {
  if (!options.enabled) {
    return passThrough;
  }

  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    // Health probes must never be throttled
    skip: (req) => req.path === "/health" || req.path === "/status",
    handler: (req, res) => {
      res.status(429).json({
        error: "Too Many Requests",
        message: "Rate limit exceeded. Try again later.",
        correlationId: req.correlationId,
      });
    },
  });
};
