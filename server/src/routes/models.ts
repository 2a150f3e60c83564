/**
 * GET /v1/models
 *
 * OpenAI-style model list so chat clients can discover
 * the single model this gateway serves.
 */

import { Router, Request, Response } from "express";
import { buildModelList } from "../services/responseFormatter";

const startedAt = new Date();

export function createModelsRouter(defaultModel: string): Router {
  const modelsRouter = Router();

  modelsRouter.get("/", (_req: Request, res: Response) => {
    res.json(buildModelList(defaultModel, startedAt));
  });

  return modelsRouter;
}
