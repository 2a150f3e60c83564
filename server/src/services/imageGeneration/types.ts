/**
 * Provider-agnostic image generation interface.
 *
 * The chat-completions route only talks to an ImageGenerator, so the
 * stable-diffusion executable can be swapped for the mock provider via
 * IMAGE_GENERATOR without changing consuming code.
 */

export interface ImageGenerationRequest {
  /** Text prompt extracted from the chat messages */
  prompt: string;
  /** Image to edit. Absent for plain text-to-image generation. */
  inputImage?: Buffer;
  /** Used to name transient files and correlate logs */
  requestId: string;
  /** Aborted when the client goes away */
  signal?: AbortSignal;
}

export interface ImageGenerationResult {
  /** PNG bytes of the generated image */
  image: Buffer;
  /** Name of the provider that produced this image */
  provider: string;
  /** Optional provider-specific metadata */
  metadata?: Record<string, unknown>;
}

export interface ImageGenerator {
  /** Human-readable name of this provider (e.g. "sd-cli", "mock") */
  readonly name: string;

  /**
   * Generate an image, or edit `inputImage` when one is given.
   *
   * @throws GenerationFailedError or OutputUnavailableError
   */
  generate(request: ImageGenerationRequest): Promise<ImageGenerationResult>;
}
