import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";
import { AppError, ValidationError, type FieldError } from "../services/errors";

interface ErrorDescription {
  statusCode: number;
  code: string;
  message: string;
  details?: FieldError[];
}

/** body-parser tags its failures with a `type` string. */
function bodyParserType(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return null;
}

function describe(err: unknown): ErrorDescription {
  if (err instanceof ValidationError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message, details: err.details };
  }
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message };
  }

  switch (bodyParserType(err)) {
    case "entity.parse.failed":
      return { statusCode: 400, code: "INVALID_JSON", message: "Malformed JSON body" };
    case "entity.too.large":
      return { statusCode: 413, code: "PAYLOAD_TOO_LARGE", message: "Request body too large" };
    default:
      return { statusCode: 500, code: "INTERNAL_ERROR", message: "Internal server error" };
  }
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, code, message, details } = describe(err);
  const requestId = req.requestId;
  const isDevelopment = process.env.NODE_ENV === "development";
  const stack = err instanceof Error ? err.stack : undefined;

  // Track error metrics for monitoring
  monitoringService.recordError();

  if (statusCode === 500) {
    logger.error("server", "Unhandled error", {
      requestId,
      statusCode,
      error: err instanceof Error ? err.message : String(err),
      ...(isDevelopment && { stack }),
    });
  } else {
    logger.warn("server", `${statusCode} - ${message}`, {
      requestId,
      statusCode,
      code,
    });
  }

  res.status(statusCode).json({
    error: {
      message,
      code,
      ...(details && { details }),
      requestId,
      ...(isDevelopment && statusCode === 500 && { stack }),
    },
  });
}

export { errorHandler };
