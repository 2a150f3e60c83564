/**
 * POST /v1/chat/completions
 *
 * normalize body → extract prompt/image → generate (one at a time) →
 * save or inline the image → chat.completion response.
 */

import express, { Router, Request, Response } from "express";
import { randomUUID } from "crypto";
import { logger } from "../config/logger";
import type { ResponseFormat } from "../config/env";
import { NoPromptProvidedError } from "../errors";
import type { PromptImageExtractor } from "../services/extraction";
import type { GenerationQueue } from "../services/generationQueue";
import type { ImageGenerationResult, ImageGenerator } from "../services/imageGeneration";
import { saveGeneratedImage, type ImageStorageOptions } from "../services/imageStorage";
import { monitoringService } from "../services/monitoringService";
import { normalizeChatRequest } from "../services/requestNormalizer";
import { buildChatCompletion, inlineImageTag, markdownImage } from "../services/responseFormatter";

export interface ChatCompletionsOptions {
  extractor: PromptImageExtractor;
  generator: ImageGenerator;
  queue: GenerationQueue;
  responseFormat: ResponseFormat;
  storage: ImageStorageOptions;
  defaultModel: string;
  bodyLimit: string;
}

const PROMPT_PREVIEW_LENGTH = 80;

export function createChatCompletionsRouter(options: ChatCompletionsOptions): Router {
  const { extractor, generator, queue, responseFormat, storage, defaultModel, bodyLimit } = options;
  const chatRouter = Router();

  // Clients do not always send Content-Type: application/json
  const parseJson = express.json({ type: () => true, limit: bodyLimit });

  chatRouter.post("/", parseJson, async (req: Request, res: Response): Promise<void> => {
    const requestId = req.requestId ?? randomUUID();

    // Closing the connection before the response is written cancels the run
    const cancellation = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        cancellation.abort();
      }
    });

    const chatRequest = normalizeChatRequest(req.body);
    const { prompt, imageBytes } = await extractor.extract(chatRequest.messages, {
      requestId,
      signal: cancellation.signal,
    });
    const inputImage = imageBytes && imageBytes.length > 0 ? imageBytes : undefined;

    logger.debug("chat", "Extracted prompt", {
      requestId,
      strategy: extractor.name,
      messages: chatRequest.messages.length,
      prompt: prompt.slice(0, PROMPT_PREVIEW_LENGTH),
      imageBytes: inputImage?.length ?? 0,
    });

    if (prompt === "") {
      throw new NoPromptProvidedError();
    }

    const content = await queue.run(async () => {
      const start = Date.now();
      let result: ImageGenerationResult;
      try {
        result = await generator.generate({
          prompt,
          inputImage,
          requestId,
          signal: cancellation.signal,
        });
        monitoringService.recordGeneration(Date.now() - start, true);
      } catch (err) {
        monitoringService.recordGeneration(Date.now() - start, false);
        throw err;
      }

      if (responseFormat === "inline") {
        return inlineImageTag(result.image);
      }
      const stored = await saveGeneratedImage(result.image, requestId, storage);
      return markdownImage(stored.url);
    }, cancellation.signal);

    res.json(buildChatCompletion(chatRequest.model || defaultModel, content));
  });

  return chatRouter;
}
