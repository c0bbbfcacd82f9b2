/**
 * Expiry sweep scheduler.
 *
 * Soft-deletes expired pastes once on startup and then every
 * SWEEP_INTERVAL_MINUTES (default: hourly). Each run is a single bulk
 * store update, never a loop over records.
 *
 * - Scheduler state (interval ID, next sweep time) lives in module scope.
 * - Errors during a sweep are logged and never crash the server; the next
 *   tick runs as usual.
 * - Safe to start twice; the second call is a no-op.
 */

import { env } from "../config/env";
import { logger, errorMessage } from "../config/logger";
import { monitoringService } from "./monitoringService";
import type { PasteService } from "./pasteService";

type Sweeper = Pick<PasteService, "sweepExpired">;

const log = logger.child("scheduler");

// ---------------------------------------------------------------------------
// Module-level scheduler state
// ---------------------------------------------------------------------------

let checkIntervalId: ReturnType<typeof setInterval> | null = null;
let nextSweepTime: Date | null = null;
let isRunning = false;

function intervalMs(): number {
  return env.SWEEP_INTERVAL_MINUTES * 60 * 1000;
}

// ---------------------------------------------------------------------------
// Sweep
// ---------------------------------------------------------------------------

/**
 * Run one sweep now and record it. Errors propagate to the caller.
 */
async function runSweep(sweeper: Sweeper): Promise<number> {
  const deleted = await sweeper.sweepExpired();
  monitoringService.recordSweep(deleted);

  if (deleted > 0) {
    log.info(`Cleaned up ${deleted} expired pastes`, { deleted });
  } else {
    log.debug("No expired pastes to clean up");
  }
  return deleted;
}

async function tick(sweeper: Sweeper): Promise<void> {
  try {
    await runSweep(sweeper);
  } catch (err) {
    log.error("Error during expiry sweep", { error: errorMessage(err) });
    // Do NOT rethrow -- the scheduler must keep running
  } finally {
    if (isRunning) {
      nextSweepTime = new Date(Date.now() + intervalMs());
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Start sweeping: one sweep immediately, then one per interval.
 */
async function startScheduler(sweeper: Sweeper): Promise<void> {
  if (isRunning) {
    log.info("Scheduler is already running.");
    return;
  }

  log.info("Starting scheduler", {
    sweepIntervalMinutes: env.SWEEP_INTERVAL_MINUTES,
  });

  isRunning = true;
  await tick(sweeper);

  checkIntervalId = setInterval(() => {
    void tick(sweeper);
  }, intervalMs());

  log.info("Scheduler started.");
}

/**
 * Stop the scheduler (for graceful shutdown).
 */
function stopScheduler(): void {
  if (checkIntervalId !== null) {
    clearInterval(checkIntervalId);
    checkIntervalId = null;
  }
  isRunning = false;
  nextSweepTime = null;
  log.info("Scheduler stopped.");
}

/**
 * When the next sweep will happen, or null if the scheduler is not running.
 */
function getNextSweepTime(): Date | null {
  return nextSweepTime;
}

export const scheduler = {
  startScheduler,
  stopScheduler,
  getNextSweepTime,
  runSweep,
};
