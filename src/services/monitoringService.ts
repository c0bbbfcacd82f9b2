/**
 * In-memory monitoring service.
 *
 * Counters accumulate in memory and reset on restart. Fed by the request
 * logger, the error handler and the expiry sweep.
 *
 * Exposed counters:
 *   - requestCount: total HTTP requests handled
 *   - errorCount: total errors processed by the error handler
 *   - totalResponseTimeMs: cumulative response time for average calculation
 *   - sweepCount / sweptPastes: completed expiry sweeps and pastes they soft-deleted
 *   - lastSweepTime: timestamp of the most recent completed sweep
 */

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let sweepCount = 0;
let sweptPastes = 0;
let lastSweepTime: Date | null = null;

export interface Metrics {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  uptime: number;
  sweepCount: number;
  sweptPastes: number;
  lastSweepTime: string | null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
}

function recordError(): void {
  errorCount++;
}

/**
 * Record a completed sweep and how many pastes it soft-deleted.
 */
function recordSweep(deleted: number): void {
  sweepCount++;
  sweptPastes += deleted;
  lastSweepTime = new Date();
}

function getMetrics(): Metrics {
  const avgResponseTimeMs =
    requestCount > 0
      ? Math.round((totalResponseTimeMs / requestCount) * 100) / 100
      : 0;

  return {
    requestCount,
    errorCount,
    avgResponseTimeMs,
    uptime: process.uptime(),
    sweepCount,
    sweptPastes,
    lastSweepTime: lastSweepTime?.toISOString() ?? null,
  };
}

/**
 * Reset all metrics to initial values (useful for testing).
 */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  sweepCount = 0;
  sweptPastes = 0;
  lastSweepTime = null;
}

export const monitoringService = {
  recordRequest,
  recordError,
  recordSweep,
  getMetrics,
  resetMetrics,
};
