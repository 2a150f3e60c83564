/**
 * Image generation service: factory and re-exports.
 *
 * Returns the provider named by IMAGE_GENERATOR. The sd-cli provider is the
 * default; "mock" serves a placeholder image for development.
 */

import { env } from "../../config/env";
import { MockImageGenerator } from "./mockProvider";
import { SdCliImageGenerator } from "./sdCliProvider";
import type { ImageGenerationRequest, ImageGenerationResult, ImageGenerator } from "./types";

export type { ImageGenerationRequest, ImageGenerationResult, ImageGenerator };

/**
 * Create an image generator by name.
 *
 * @param providerName - "sd-cli" or "mock"
 * @throws Error if the provider name is not recognized
 */
export function createImageGenerator(providerName: string): ImageGenerator {
  switch (providerName.toLowerCase()) {
    case "mock":
      return new MockImageGenerator();

    case "sd-cli":
      return new SdCliImageGenerator({
        binPath: env.SD_BIN,
        diffusionModel: env.DIFFUSION_MODEL,
        vae: env.VAE,
        clipL: env.CLIP_L,
        t5xxl: env.T5XXL,
        cfgScale: env.SD_CFG_SCALE,
        samplingMethod: env.SD_SAMPLING_METHOD,
        seed: env.SD_SEED,
        verbose: env.SD_VERBOSE,
        workDir: env.WORK_DIR,
      });

    default:
      throw new Error(
        `Unknown image generator: "${providerName}". ` +
          `Supported generators: sd-cli, mock. ` +
          `Set IMAGE_GENERATOR in your environment or .env file.`
      );
  }
}

/** Generator configured by IMAGE_GENERATOR. */
export function getImageGenerator(): ImageGenerator {
  return createImageGenerator(env.IMAGE_GENERATOR);
}
