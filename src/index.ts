import dotenv from "dotenv";

// Load environment variables before anything else
dotenv.config();

// Import env config (validates required vars immediately)
import { env } from "./config/env";
import { logger, errorMessage } from "./config/logger";
import { closePool } from "./config/database";
import { createApp } from "./app";
import { createPasteService } from "./services/pasteService";
import { getPasteStore } from "./services/pasteStore";
import { scheduler } from "./services/scheduler";
import { BcryptSecretHasher } from "./services/secretHasher";

async function start(): Promise<void> {
  const store = getPasteStore();
  const pasteService = createPasteService({ store, hasher: new BcryptSecretHasher() });

  // Check store connectivity before starting the server
  logger.info("server", `Checking ${store.name} store...`);
  try {
    await store.ping();
    logger.info("server", "Store connection successful.");
  } catch (err) {
    logger.warn("server", "Store connection failed. Server will start but paste operations will fail.", {
      error: errorMessage(err),
    });
  }

  // Start the expiry sweep (skip in test environment)
  if (env.NODE_ENV !== "test") {
    await scheduler.startScheduler(pasteService);
  }

  const app = createApp({ pasteService, store });

  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      store: store.name,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    scheduler.stopScheduler();
    server.close(() => {
      closePool()
        .then(() => {
          logger.info("server", "Server shut down.");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error("server", "Error closing connection pool", { error: errorMessage(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
  logger.error("server", "Failed to start", { error: errorMessage(err) });
  process.exit(1);
});
