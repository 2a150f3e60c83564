/**
 * API Route Index
 *
 * ┌───────────────────────────┬────────┬──────────────────────────────────────────────┐
 * │ Endpoint                  │ Method │ Description                                  │
 * ├───────────────────────────┼────────┼──────────────────────────────────────────────┤
 * │ /health                   │ GET    │ Plain "OK" liveness check                    │
 * │ /health/details           │ GET    │ Queue state, metrics, memory                 │
 * ├───────────────────────────┼────────┼──────────────────────────────────────────────┤
 * │ /v1/chat/completions      │ POST   │ Generate (or edit) an image from chat input  │
 * │ /v1/models                │ GET    │ Model list for OpenAI-compatible clients     │
 * ├───────────────────────────┼────────┼──────────────────────────────────────────────┤
 * │ <OUTPUT_URL_PREFIX>/*     │ GET    │ Saved images (static, mounted in app.ts)     │
 * └───────────────────────────┴────────┴──────────────────────────────────────────────┘
 *
 * Error responses follow the shape: { error: { message, code, requestId } }
 */

import { Router } from "express";
import { createChatCompletionsRouter, type ChatCompletionsOptions } from "./chatCompletions";
import { createModelsRouter } from "./models";

export { createHealthRouter } from "./health";

/** Routes mounted under /v1. */
export function createApiRouter(options: ChatCompletionsOptions): Router {
  const router = Router();

  router.use("/chat/completions", createChatCompletionsRouter(options));
  router.use("/models", createModelsRouter(options.defaultModel));

  return router;
}
