/**
 * Health check endpoints.
 *
 *   GET /health         200 "OK" (plain text), for load balancers
 *   GET /health/details JSON with queue state, metrics and memory usage
 */

import { Router, Request, Response } from "express";
import { env } from "../config/env";
import type { GenerationQueue } from "../services/generationQueue";
import { monitoringService } from "../services/monitoringService";

export function createHealthRouter(queue: GenerationQueue): Router {
  const healthRouter = Router();

  healthRouter.get("/", (_req: Request, res: Response) => {
    res.status(200).type("text/plain").send("OK");
  });

  healthRouter.get("/details", (_req: Request, res: Response) => {
    const mem = process.memoryUsage();
    const toMB = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      generator: env.IMAGE_GENERATOR,
      extractionStrategy: env.EXTRACTION_STRATEGY,
      responseFormat: env.RESPONSE_FORMAT,
      queue: {
        active: queue.activeCount,
        pending: queue.pendingCount,
      },
      metrics: monitoringService.getMetrics(),
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
