/**
 * stable-diffusion command-line provider.
 *
 * Runs the sd executable once per request. Input and output images live in
 * WORK_DIR under names derived from the request id, so two runs never share
 * a file even if the generation queue is ever widened beyond one slot.
 *
 * No timeout is applied: a hung process holds the generation slot until the
 * client disconnects and the abort signal kills it.
 */

import { spawn } from "child_process";
import { promises as fs } from "fs";
import * as path from "path";
import { logger } from "../../config/logger";
import { GenerationFailedError, OutputUnavailableError } from "../../errors";
import type { ImageGenerationRequest, ImageGenerationResult, ImageGenerator } from "./types";

export interface SdCliOptions {
  binPath: string;
  diffusionModel: string;
  vae: string;
  clipL: string;
  t5xxl: string;
  cfgScale: string;
  samplingMethod: string;
  seed: string;
  verbose: boolean;
  workDir: string;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessRunOptions {
  signal?: AbortSignal;
  onOutput?: (stream: "stdout" | "stderr", line: string) => void;
}

/** Runs a command to completion. Rejects only when it cannot be started or is aborted. */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: ProcessRunOptions
) => Promise<ProcessExit>;

// ---------------------------------------------------------------------------
// Process plumbing
// ---------------------------------------------------------------------------

function lineSplitter(emit: (line: string) => void): { push(chunk: Buffer): void; flush(): void } {
  let buffered = "";
  return {
    push(chunk: Buffer) {
      buffered += chunk.toString("utf8");
      const lines = buffered.split(/\r\n|\r|\n/);
      buffered = lines.pop() ?? "";
      for (const line of lines) {
        if (line.trim() !== "") emit(line);
      }
    },
    flush() {
      if (buffered.trim() !== "") emit(buffered);
      buffered = "";
    },
  };
}

export const spawnProcess: ProcessRunner = (command, args, options) =>
  new Promise<ProcessExit>((resolve, reject) => {
    const child = spawn(command, args, {
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout = lineSplitter((line) => options.onOutput?.("stdout", line));
    const stderr = lineSplitter((line) => options.onOutput?.("stderr", line));
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", reject);
    child.once("close", (code, signal) => {
      stdout.flush();
      stderr.flush();
      resolve({ code, signal });
    });
  });

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

/**
 * Build the sd argument list. Edit mode (`-M edit -r <input>`) is appended
 * only when an input image path is given.
 */
export function buildSdArgs(
  options: SdCliOptions,
  prompt: string,
  files: { output: string; input?: string }
): string[] {
  const args = [
    "--diffusion-model", options.diffusionModel,
    "--vae", options.vae,
    "--clip_l", options.clipL,
    "--t5xxl", options.t5xxl,
    "-p", prompt,
    "--cfg-scale", options.cfgScale,
    "--sampling-method", options.samplingMethod,
    "--seed", options.seed,
    "-o", files.output,
  ];

  if (options.verbose) {
    args.push("-v");
  }

  if (files.input) {
    args.push("-M", "edit", "-r", files.input);
  }

  return args;
}

/** Request ids end up in file names. */
function fileSafe(requestId: string): string {
  return requestId.replace(/[^A-Za-z0-9_-]/g, "_");
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class SdCliImageGenerator implements ImageGenerator {
  readonly name = "sd-cli";
  private readonly options: SdCliOptions;
  private readonly runner: ProcessRunner;

  constructor(options: SdCliOptions, runner: ProcessRunner = spawnProcess) {
    this.options = options;
    this.runner = runner;
  }

  async generate(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
    const { prompt, inputImage, requestId, signal } = request;
    const stem = fileSafe(requestId);
    const outputPath = path.join(this.options.workDir, `${stem}-output.png`);
    const inputPath = inputImage ? path.join(this.options.workDir, `${stem}-input.png`) : undefined;

    try {
      try {
        await fs.mkdir(this.options.workDir, { recursive: true });
        if (inputPath && inputImage) {
          await fs.writeFile(inputPath, inputImage);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new GenerationFailedError(`failed to prepare transient files: ${message}`);
      }

      const args = buildSdArgs(this.options, prompt, { output: outputPath, input: inputPath });
      const start = Date.now();

      logger.info("generator", "Running stable-diffusion", {
        requestId,
        edit: inputPath !== undefined,
        promptLength: prompt.length,
      });

      let exit: ProcessExit;
      try {
        exit = await this.runner(this.options.binPath, args, {
          signal,
          onOutput: (stream, line) => logger.debug("sd", line, { requestId, stream }),
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new GenerationFailedError(message);
      }

      if (exit.code !== 0) {
        throw new GenerationFailedError(
          exit.signal ? `terminated by ${exit.signal}` : `exited with code ${exit.code}`
        );
      }

      let image: Buffer;
      try {
        image = await fs.readFile(outputPath);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new OutputUnavailableError("Failed to read generated image", message);
      }
      if (image.length === 0) {
        throw new OutputUnavailableError("Failed to read generated image", `${outputPath} is empty`);
      }

      return {
        image,
        provider: this.name,
        metadata: { durationMs: Date.now() - start, edit: inputPath !== undefined },
      };
    } finally {
      await this.removeTransient([outputPath, inputPath], requestId);
    }
  }

  private async removeTransient(files: Array<string | undefined>, requestId: string): Promise<void> {
    for (const file of files) {
      if (!file) continue;
      try {
        await fs.rm(file, { force: true });
      } catch (err) {
        logger.warn("generator", "Failed to remove transient file", {
          requestId,
          file,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
