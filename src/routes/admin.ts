/**
 * Admin routes. Every endpoint requires the X-Admin-Key header.
 *
 * Endpoints:
 *   POST /api/admin/sweep       -- Run the expiry sweep now
 *   GET  /api/admin/sweep/next  -- Next scheduled sweep time
 *   GET  /api/admin/metrics     -- In-memory application metrics
 */

import { Router, Request, Response } from "express";
import { requireAdminKey } from "../middleware/auth";
import { monitoringService } from "../services/monitoringService";
import type { PasteService } from "../services/pasteService";
import { scheduler } from "../services/scheduler";

export function createAdminRouter(pasteService: PasteService): Router {
  const adminRouter = Router();

  adminRouter.use(requireAdminKey);

  /**
   * Soft-deletes expired pastes immediately. Store errors reach the error
   * handler as 500s.
   */
  adminRouter.post("/sweep", async (_req: Request, res: Response) => {
    const deleted = await scheduler.runSweep(pasteService);

    res.json({
      message: "Sweep completed",
      deleted,
      nextSweepAt: scheduler.getNextSweepTime()?.toISOString() ?? null,
    });
  });

  adminRouter.get("/sweep/next", (_req: Request, res: Response) => {
    const nextSweep = scheduler.getNextSweepTime();

    res.json({
      nextSweepAt: nextSweep?.toISOString() ?? null,
      schedulerRunning: nextSweep !== null,
    });
  });

  adminRouter.get("/metrics", (_req: Request, res: Response) => {
    res.json(monitoringService.getMetrics());
  });

  return adminRouter;
}
