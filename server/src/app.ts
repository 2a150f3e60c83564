import "express-async-errors"; // Must be imported before any route handlers
import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { env, type ResponseFormat } from "./config/env";
import { errorHandler } from "./middleware/errorHandler";
import { apiLimiter } from "./middleware/rateLimiter";
import { requestLogger } from "./middleware/requestLogger";
import { createApiRouter, createHealthRouter } from "./routes";
import { getExtractor, type PromptImageExtractor } from "./services/extraction";
import { GenerationQueue } from "./services/generationQueue";
import { getImageGenerator, type ImageGenerator } from "./services/imageGeneration";

/**
 * Collaborators the app is assembled from. Anything left out is built from
 * env; tests pass in-process fakes.
 */
export interface AppDependencies {
  generator?: ImageGenerator;
  extractor?: PromptImageExtractor;
  queue?: GenerationQueue;
  outputDir?: string;
  responseFormat?: ResponseFormat;
}

export function createApp(deps: AppDependencies = {}): Express {
  const app = express();
  const queue = deps.queue ?? new GenerationQueue(1);
  const outputDir = deps.outputDir ?? env.OUTPUT_DIR;

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind nginx/load balancer.
  if (env.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Saved images are embedded by chat UIs served from other origins
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));

  app.use(cors({ origin: env.CORS_ORIGIN }));

  app.use(requestLogger);

  app.use("/health", createHealthRouter(queue));

  // Generated images, referenced by Markdown responses
  app.use(env.OUTPUT_URL_PREFIX, express.static(outputDir, { index: false }));

  app.use(
    "/v1",
    apiLimiter,
    createApiRouter({
      extractor: deps.extractor ?? getExtractor(),
      generator: deps.generator ?? getImageGenerator(),
      queue,
      responseFormat: deps.responseFormat ?? env.RESPONSE_FORMAT,
      storage: { outputDir, urlPrefix: env.OUTPUT_URL_PREFIX },
      defaultModel: env.DEFAULT_MODEL,
      bodyLimit: env.BODY_LIMIT,
    })
  );

  app.use((_req: Request, res: Response) => {
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
