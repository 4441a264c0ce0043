import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";

/**
 * Request logging middleware with request ID correlation.
 *
 * Assigns a UUID to each request (req.requestId and the X-Request-Id response
 * header) and logs method, path, status and duration once the response is
 * finished.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    const level = res.statusCode >= 500 ? "error" : "info";

    logger[level]("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs,
    });
  });

  next();
}

export { requestLogger };
