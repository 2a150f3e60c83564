/**
 * Prompt/image extraction interface.
 *
 * Two strategies exist, reflecting two generations of the same contract:
 * "strict" (user text only, inline images only) and "lenient" (last text
 * wins, .png references are fetched). EXTRACTION_STRATEGY picks one.
 */

import type { Message } from "../../models/chat";

export interface ExtractionResult {
  /** Trimmed prompt text. Empty when nothing contributed any text. */
  prompt: string;
  /** Input image for edit mode, when one was supplied. */
  imageBytes?: Buffer;
}

export interface ExtractionContext {
  /** Correlates log lines with the request being handled. */
  requestId?: string;
  signal?: AbortSignal;
}

export interface PromptImageExtractor {
  /** Strategy name ("strict" or "lenient") */
  readonly name: string;

  /**
   * Walk the messages and produce the prompt and optional input image.
   *
   * @throws InvalidBase64Error (strict only) or ImageFetchFailedError (lenient only)
   */
  extract(messages: Message[], context?: ExtractionContext): Promise<ExtractionResult>;
}

/** Retrieves the bytes of a referenced image. */
export interface ImageFetcher {
  fetchImage(url: URL, signal?: AbortSignal): Promise<Buffer>;
}
