/**
 * Health check endpoint.
 *
 * Reports store connectivity, scheduler status, memory usage and uptime.
 *
 * Response shape:
 *   {
 *     status: "ok" | "degraded",
 *     timestamp: string,
 *     uptime: number,
 *     store: { name: string, connected: boolean },
 *     scheduler: { running: boolean, nextSweep: string | null },
 *     memory: { rss, heapUsed, heapTotal, external } (all in MB)
 *   }
 */

import { Router, Request, Response } from "express";
import { logger, errorMessage } from "../config/logger";
import type { PasteStore } from "../services/pasteStore";
import { scheduler } from "../services/scheduler";

async function probe(store: PasteStore): Promise<boolean> {
  try {
    return await store.ping();
  } catch (err) {
    logger.error("health", "Store ping failed", { store: store.name, error: errorMessage(err) });
    return false;
  }
}

export function createHealthRouter(store: PasteStore): Router {
  const healthRouter = Router();

  healthRouter.get("/", async (_req: Request, res: Response) => {
    const connected = await probe(store);
    const nextSweep = scheduler.getNextSweepTime();

    const mem = process.memoryUsage();
    const toMB = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

    res.status(connected ? 200 : 503).json({
      status: connected ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      store: {
        name: store.name,
        connected,
      },
      scheduler: {
        running: nextSweep !== null,
        nextSweep: nextSweep?.toISOString() ?? null,
      },
      memory: {
        rss: toMB(mem.rss),
        heapUsed: toMB(mem.heapUsed),
        heapTotal: toMB(mem.heapTotal),
        external: toMB(mem.external),
      },
    });
  });

  return healthRouter;
}
