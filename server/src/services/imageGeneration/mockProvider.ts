/**
 * Mock image generation provider.
 *
 * Returns a fixed 1x1 PNG for development and testing without the
 * stable-diffusion binary or model files.
 */

import type { ImageGenerationRequest, ImageGenerationResult, ImageGenerator } from "./types";

const PLACEHOLDER_PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

export class MockImageGenerator implements ImageGenerator {
  readonly name = "mock";

  async generate(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
    return {
      image: Buffer.from(PLACEHOLDER_PNG_BASE64, "base64"),
      provider: this.name,
      metadata: {
        prompt: request.prompt,
        edit: request.inputImage !== undefined,
        note: "Mock provider - placeholder image for development",
      },
    };
  }
}
