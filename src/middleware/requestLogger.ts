import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

/**
 * Request logging middleware with request ID correlation.
 *
 * Assigns a UUID to each request (req.requestId and the X-Request-Id response
 * header), then logs method, path, status and duration when the response
 * finishes. Query strings are dropped from the logged path since paste
 * passwords may travel in `?password=`.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    const path = req.originalUrl.split("?")[0];

    monitoringService.recordRequest(durationMs);

    logger.info("http", `${req.method} ${path} ${res.statusCode}`, {
      requestId,
      method: req.method,
      path,
      statusCode: res.statusCode,
      durationMs,
    });
  });

  next();
}

export { requestLogger };
