/**
 * Prompt/image extraction: factory and re-exports.
 *
 * Returns the strategy named by EXTRACTION_STRATEGY.
 */

import { env } from "../../config/env";
import { HttpImageFetcher } from "./imageFetcher";
import { LenientExtractor } from "./lenientExtractor";
import { StrictExtractor } from "./strictExtractor";
import type { ImageFetcher, PromptImageExtractor } from "./types";

export type { ExtractionContext, ExtractionResult, ImageFetcher, PromptImageExtractor } from "./types";

export interface ExtractorFactoryOptions {
  /** Fetcher used by the lenient strategy for referenced images */
  fetcher?: ImageFetcher;
  imageBaseUrl?: string;
}

/**
 * Create an extractor by strategy name.
 *
 * @throws Error if the strategy name is not recognized
 */
export function createExtractor(
  strategyName: string,
  options: ExtractorFactoryOptions = {}
): PromptImageExtractor {
  switch (strategyName.toLowerCase()) {
    case "strict":
      return new StrictExtractor();

    case "lenient":
      return new LenientExtractor({
        fetcher: options.fetcher ?? new HttpImageFetcher({ insecureTls: env.IMAGE_FETCH_INSECURE_TLS }),
        imageBaseUrl: options.imageBaseUrl ?? env.IMAGE_BASE_URL,
      });

    default:
      throw new Error(
        `Unknown extraction strategy: "${strategyName}". ` +
          `Supported strategies: strict, lenient. ` +
          `Set EXTRACTION_STRATEGY in your environment or .env file.`
      );
  }
}

/** Extractor for the strategy configured in env. */
export function getExtractor(options: ExtractorFactoryOptions = {}): PromptImageExtractor {
  return createExtractor(env.EXTRACTION_STRATEGY, options);
}
