/**
 * In-memory monitoring service.
 *
 * Counters accumulate in memory and reset on restart. Fed by the request
 * logger, the error handler and the chat-completions route; read by
 * GET /health/details.
 */

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let generationCount = 0;
let generationFailures = 0;
let totalGenerationTimeMs = 0;
let lastGenerationAt: Date | null = null;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Record a completed request with its response time.
 */
function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
}

/**
 * Record an error processed by the error handler.
 */
function recordError(): void {
  errorCount++;
}

/**
 * Record one generator run, successful or not.
 */
function recordGeneration(durationMs: number, succeeded: boolean): void {
  generationCount++;
  totalGenerationTimeMs += durationMs;
  lastGenerationAt = new Date();
  if (!succeeded) {
    generationFailures++;
  }
}

function average(total: number, count: number): number {
  return count > 0 ? Math.round((total / count) * 100) / 100 : 0;
}

/**
 * Get a snapshot of all current metrics.
 */
function getMetrics(): {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  generationCount: number;
  generationFailures: number;
  avgGenerationTimeMs: number;
  lastGenerationAt: string | null;
  uptime: number;
} {
  return {
    requestCount,
    errorCount,
    avgResponseTimeMs: average(totalResponseTimeMs, requestCount),
    generationCount,
    generationFailures,
    avgGenerationTimeMs: average(totalGenerationTimeMs, generationCount),
    lastGenerationAt: lastGenerationAt?.toISOString() ?? null,
    uptime: process.uptime(),
  };
}

/**
 * Reset all metrics to initial values (useful for testing).
 */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  generationCount = 0;
  generationFailures = 0;
  totalGenerationTimeMs = 0;
  lastGenerationAt = null;
}

export const monitoringService = {
  recordRequest,
  recordError,
  recordGeneration,
  getMetrics,
  resetMetrics,
};
