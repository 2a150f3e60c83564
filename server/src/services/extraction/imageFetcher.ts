/**
 * HTTP image fetcher used by the lenient extractor.
 *
 * Uses undici so TLS verification can be switched off per client instead of
 * process-wide (NODE_TLS_REJECT_UNAUTHORIZED). Insecure mode only exists for
 * deployments that serve referenced images from hosts with self-signed
 * certificates; it is off unless IMAGE_FETCH_INSECURE_TLS=true.
 */

import { Agent, fetch } from "undici";
import type { ImageFetcher } from "./types";

export interface HttpImageFetcherOptions {
  insecureTls: boolean;
}

export class HttpImageFetcher implements ImageFetcher {
  private readonly dispatcher?: Agent;

  constructor(options: HttpImageFetcherOptions) {
    if (options.insecureTls) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
  }

  async fetchImage(url: URL, signal?: AbortSignal): Promise<Buffer> {
    let response: Awaited<ReturnType<typeof fetch>>;

    try {
      response = await fetch(url, { dispatcher: this.dispatcher, signal });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`failed to fetch image from URL: ${message}`);
    }

    if (response.status !== 200) {
      // Drain so the connection can be reused
      await response.body?.cancel();
      throw new Error(`image URL returned status: ${response.status} ${response.statusText}`.trim());
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`failed to read image data from response: ${message}`);
    }
  }

  /** Release pooled connections (only held in insecure mode). */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
