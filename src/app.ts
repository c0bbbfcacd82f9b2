import "express-async-errors"; // Must be imported before any route handlers
import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { env } from "./config/env";
import { errorHandler } from "./middleware/errorHandler";
import { generalLimiter } from "./middleware/rateLimiter";
import { requestLogger } from "./middleware/requestLogger";
import { sanitizeBody } from "./middleware/sanitize";
import { createApiRouter, type ApiDependencies } from "./routes/index";

/**
 * Escaped as \u0000, a byte of content takes six on the wire. The limit sits
 * above that so oversized content gets the field-level 400, not a 413.
 */
const JSON_BODY_LIMIT = "8mb";

function createApp(deps: ApiDependencies): Express {
  const app = express();

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind nginx/load balancer.
  // Required for accurate IP detection in rate limiting and request logging.
  if (env.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Security headers
  app.use(helmet());

  app.use(cors({ origin: env.CORS_ORIGIN }));

  // Request logging (first, so rejected bodies are logged too)
  app.use(requestLogger);

  // Body parsing
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Metadata sanitization (trim, strip tags from labels; content untouched)
  app.use(sanitizeBody);

  app.use(generalLimiter);

  // API routes
  app.use("/api", createApiRouter(deps));

  // Catch-all 404 for any /api route that was not matched above
  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({
      error: {
        message: "Not found",
        code: "NOT_FOUND",
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

export { createApp };
