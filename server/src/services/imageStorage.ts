/**
 * Image storage service.
 *
 * Persists generated images under OUTPUT_DIR, which app.ts serves statically
 * at OUTPUT_URL_PREFIX, and returns the URL path the image is reachable at.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { env } from "../config/env";
import { logger } from "../config/logger";
import { OutputUnavailableError } from "../errors";

export interface StoredImage {
  filename: string;
  /** Server-relative URL, e.g. "/generated/output_1700000000000_1a2b3c4d.png" */
  url: string;
}

export interface ImageStorageOptions {
  outputDir: string;
  urlPrefix: string;
}

/** output_<epoch-ms>_<first 8 id characters>.png */
export function outputFilename(requestId: string, now: number = Date.now()): string {
  const suffix = requestId.replace(/[^A-Za-z0-9]/g, "").slice(0, 8) || "image";
  return `output_${now}_${suffix}.png`;
}

/**
 * Save a generated PNG.
 *
 * @throws OutputUnavailableError when the directory cannot be created or the file written
 */
export async function saveGeneratedImage(
  image: Buffer,
  requestId: string,
  options: ImageStorageOptions = { outputDir: env.OUTPUT_DIR, urlPrefix: env.OUTPUT_URL_PREFIX }
): Promise<StoredImage> {
  try {
    await fs.mkdir(options.outputDir, { recursive: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new OutputUnavailableError("Failed to create output directory", message);
  }

  const filename = outputFilename(requestId);
  const filepath = path.join(options.outputDir, filename);

  try {
    await fs.writeFile(filepath, image);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new OutputUnavailableError("Failed to save generated image", message);
  }

  const url = `${options.urlPrefix.replace(/\/+$/, "")}/${filename}`;
  logger.info("imageStorage", `Saved generated image as ${filename}`, {
    requestId,
    bytes: image.length,
    url,
  });

  return { filename, url };
}
