import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";

interface AppError extends Error {
  statusCode?: number;
  code?: string;
}

/**
 * Body-parser marks its failures (malformed JSON, oversized payload) with a
 * 4xx `status`; everything else without a statusCode is a 500.
 */
function resolveStatus(err: AppError): number {
  if (err.statusCode) {
    return err.statusCode;
  }
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

function errorHandler(err: AppError, req: Request, res: Response, _next: NextFunction): void {
  const statusCode = resolveStatus(err);
  const message = statusCode === 500 ? "Internal server error" : err.message;
  const code = err.code || (statusCode === 500 ? "INTERNAL_ERROR" : "BAD_REQUEST");
  const requestId = req.requestId;

  if (statusCode === 500) {
    logger.error("server", "Unhandled error", {
      requestId,
      statusCode,
      error: err.message,
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
  } else {
    logger.warn("server", `${statusCode} - ${err.message}`, {
      requestId,
      statusCode,
      code,
    });
  }

  res.status(statusCode).json({
    error: message,
    code,
    requestId,
  });
}

export { errorHandler };
export type { AppError };
