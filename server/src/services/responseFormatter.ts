/**
 * Builds chat-completion responses around a generated image.
 */

import { randomUUID } from "crypto";
import type { ChatCompletionResponse, ModelListResponse } from "../models/chat";
import { encodeImageDataUri } from "./extraction/dataUri";

/** Markdown image pointing at a saved file. */
export function markdownImage(url: string): string {
  return `![output](${url})`;
}

/** HTML image tag carrying the PNG inline. */
export function inlineImageTag(image: Buffer): string {
  return `<img src="${encodeImageDataUri(image, "image/png")}" alt="output" />`;
}

export function buildChatCompletion(
  model: string,
  content: string,
  now: Date = new Date()
): ChatCompletionResponse {
  return {
    id: `chatcmpl-${randomUUID()}`,
    object: "chat.completion",
    created: Math.floor(now.getTime() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
  };
}

export function buildModelList(model: string, created: Date): ModelListResponse {
  return {
    object: "list",
    data: [
      {
        id: model,
        object: "model",
        created: Math.floor(created.getTime() / 1000),
        owned_by: "local",
      },
    ],
  };
}
