/**
 * Lenient extraction strategy.
 *
 * - The last text part seen, from any role, becomes the prompt.
 * - Every text part is scanned for .png URLs or paths; the last match is kept.
 * - image_url parts: inline base64 is decoded (malformed data is logged and
 *   skipped), a .png reference becomes the candidate URL.
 * - With no inline image but a candidate URL, the image is fetched. Bare
 *   paths are resolved against IMAGE_BASE_URL first.
 */

import { logger } from "../../config/logger";
import { ImageFetchFailedError, InvalidBase64Error } from "../../errors";
import type { Message } from "../../models/chat";
import { dataUriPayload, decodeBase64Strict, isImageDataUri } from "./dataUri";
import type { ExtractionContext, ExtractionResult, ImageFetcher, PromptImageExtractor } from "./types";

/**
 * Absolute http(s) URLs, or slash paths following a word character, ending in
 * .png. Only ASCII whitespace ends a URL; other Unicode spaces stay inside it.
 */
const PNG_REFERENCE_PATTERN = /(?:https?:\/\/[^\t\n\f\r ]+|\b\/[^ \n\t\r]+)\.png\b/g;

export interface LenientExtractorOptions {
  fetcher: ImageFetcher;
  /** Prefix for references that start with "/" */
  imageBaseUrl: string;
}

/** Last .png reference inside `text`, or null. */
export function lastPngReference(text: string): string | null {
  const matches = text.match(PNG_REFERENCE_PATTERN);
  return matches && matches.length > 0 ? matches[matches.length - 1] : null;
}

/**
 * Turn a candidate reference into an absolute http(s) URL, or null when it
 * does not parse as one.
 */
export function resolveImageUrl(reference: string, imageBaseUrl: string): URL | null {
  const candidate = reference.startsWith("/") ? imageBaseUrl + reference : reference;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return null;
  }
  return url.protocol === "http:" || url.protocol === "https:" ? url : null;
}

export class LenientExtractor implements PromptImageExtractor {
  readonly name = "lenient";
  private readonly fetcher: ImageFetcher;
  private readonly imageBaseUrl: string;

  constructor(options: LenientExtractorOptions) {
    this.fetcher = options.fetcher;
    this.imageBaseUrl = options.imageBaseUrl;
  }

  async extract(messages: Message[], context: ExtractionContext = {}): Promise<ExtractionResult> {
    let lastText = "";
    let imageBytes: Buffer | undefined;
    let candidateUrl: string | null = null;

    for (const message of messages) {
      for (const part of message.content) {
        if (part.type === "text") {
          lastText = part.text;
          candidateUrl = lastPngReference(part.text) ?? candidateUrl;
          continue;
        }
        if (part.type !== "image_reference") {
          continue;
        }

        const reference = part.imageReference;
        if (isImageDataUri(reference)) {
          const payload = dataUriPayload(reference);
          if (payload === null) {
            continue;
          }
          try {
            imageBytes = decodeBase64Strict(payload);
          } catch (err) {
            if (!(err instanceof InvalidBase64Error)) {
              throw err;
            }
            logger.warn("extractor", "Invalid base64 image skipped", {
              requestId: context.requestId,
              detail: err.detail,
            });
          }
        } else if (reference.endsWith(".png")) {
          candidateUrl = reference;
        }
      }
    }

    const prompt = lastText.trim();

    if ((!imageBytes || imageBytes.length === 0) && candidateUrl) {
      const url = resolveImageUrl(candidateUrl, this.imageBaseUrl);
      if (url) {
        logger.debug("extractor", "Fetching referenced image", {
          requestId: context.requestId,
          url: url.toString(),
        });
        try {
          imageBytes = await this.fetcher.fetchImage(url, context.signal);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new ImageFetchFailedError(message, prompt, url.toString());
        }
      }
    }

    return { prompt, imageBytes };
  }
}
