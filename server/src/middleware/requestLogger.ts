import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

/**
 * Request logging middleware with request ID correlation.
 *
 * Assigns a UUID to each request (req.requestId and the X-Request-Id
 * response header). The id also names the request's transient generation
 * files. Logs method, path, status and duration once the response finishes.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;

    monitoringService.recordRequest(durationMs);

    logger.info("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
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
