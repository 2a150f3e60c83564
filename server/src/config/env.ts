/**
 * Centralized environment configuration.
 * Validates environment variables at startup and exports typed config.
 * Import this module early to fail fast on missing or invalid configuration.
 */

import dotenv from "dotenv";
import * as os from "os";
import * as path from "path";

// Auto-load .env from the server root directory
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

const IMAGE_GENERATORS = ["sd-cli", "mock"] as const;
const RESPONSE_FORMATS = ["markdown", "inline"] as const;
const EXTRACTION_STRATEGIES = ["strict", "lenient"] as const;

type ImageGeneratorName = (typeof IMAGE_GENERATORS)[number];
type ResponseFormat = (typeof RESPONSE_FORMATS)[number];
type ExtractionStrategyName = (typeof EXTRACTION_STRATEGIES)[number];

interface EnvConfig {
  /** Server port (default: 8080) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Which generator backs /v1/chat/completions (default: sd-cli) */
  IMAGE_GENERATOR: ImageGeneratorName;
  /** Path to the stable-diffusion executable */
  SD_BIN: string;
  /** Model component files handed to the executable */
  DIFFUSION_MODEL: string;
  VAE: string;
  CLIP_L: string;
  T5XXL: string;
  /** Sampling flags (defaults: 1.0, euler, -1) */
  SD_CFG_SCALE: string;
  SD_SAMPLING_METHOD: string;
  SD_SEED: string;
  /** Pass -v to the executable (default: true) */
  SD_VERBOSE: boolean;
  /** Directory for per-request transient input/output files */
  WORK_DIR: string;
  /** Directory where generated images are saved and served from */
  OUTPUT_DIR: string;
  /** URL prefix under which OUTPUT_DIR is served (default: /generated) */
  OUTPUT_URL_PREFIX: string;
  /** markdown: link to the saved file; inline: base64 <img> tag */
  RESPONSE_FORMAT: ResponseFormat;
  /** Prompt/image extraction behaviour (default: lenient) */
  EXTRACTION_STRATEGY: ExtractionStrategyName;
  /** Base that bare image paths found in messages are resolved against */
  IMAGE_BASE_URL: string;
  /** Skip TLS certificate checks when fetching referenced images (default: false) */
  IMAGE_FETCH_INSECURE_TLS: boolean;
  /** Model name echoed in responses and listed by /v1/models */
  DEFAULT_MODEL: string;
  /** Maximum JSON body size accepted by body-parser (default: 50mb) */
  BODY_LIMIT: string;
  /** CORS origin (default: *) */
  CORS_ORIGIN: string;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) when behind nginx/load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window duration in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum number of requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
}

/**
 * Variables the sd-cli generator cannot run without.
 * The mock generator needs none of them.
 */
const SD_REQUIRED_VARS = ["SD_BIN", "DIFFUSION_MODEL", "VAE", "CLIP_L", "T5XXL"] as const;

function readString(name: string, fallback: string): string {
  const value = process.env[name];
  return value === undefined || value.trim() === "" ? fallback : value.trim();
}

function readFlag(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return value === "true" || value === "1";
}

function readChoice<T extends string>(
  name: string,
  choices: readonly T[],
  fallback: T,
  problems: string[]
): T {
  const raw = readString(name, fallback).toLowerCase();
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    problems.push(`${name} must be one of: ${choices.join(", ")} (got "${raw}")`);
    return fallback;
  }
  return match;
}

/**
 * Load and validate environment configuration.
 * Throws a descriptive error listing every problem found.
 */
function loadEnvConfig(): EnvConfig {
  const problems: string[] = [];

  const port = parseInt(readString("PORT", "8080"), 10);
  if (Number.isNaN(port) || port <= 0) {
    problems.push(`PORT must be a positive integer (got "${process.env.PORT}")`);
  }

  const imageGenerator = readChoice("IMAGE_GENERATOR", IMAGE_GENERATORS, "sd-cli", problems);
  if (imageGenerator === "sd-cli") {
    for (const varName of SD_REQUIRED_VARS) {
      if (readString(varName, "") === "") {
        problems.push(`${varName} is required when IMAGE_GENERATOR=sd-cli`);
      }
    }
  }

  const config: EnvConfig = {
    PORT: port,
    NODE_ENV: readString("NODE_ENV", "development"),
    LOG_LEVEL: readString("LOG_LEVEL", "info").toLowerCase(),
    IMAGE_GENERATOR: imageGenerator,
    SD_BIN: readString("SD_BIN", ""),
    DIFFUSION_MODEL: readString("DIFFUSION_MODEL", ""),
    VAE: readString("VAE", ""),
    CLIP_L: readString("CLIP_L", ""),
    T5XXL: readString("T5XXL", ""),
    SD_CFG_SCALE: readString("SD_CFG_SCALE", "1.0"),
    SD_SAMPLING_METHOD: readString("SD_SAMPLING_METHOD", "euler"),
    SD_SEED: readString("SD_SEED", "-1"),
    SD_VERBOSE: readFlag("SD_VERBOSE", true),
    WORK_DIR: path.resolve(readString("WORK_DIR", path.join(os.tmpdir(), "diffusion-chat-gateway"))),
    OUTPUT_DIR: path.resolve(readString("OUTPUT_DIR", "generated")),
    OUTPUT_URL_PREFIX: "/" + readString("OUTPUT_URL_PREFIX", "/generated").replace(/^\/+|\/+$/g, ""),
    RESPONSE_FORMAT: readChoice("RESPONSE_FORMAT", RESPONSE_FORMATS, "markdown", problems),
    EXTRACTION_STRATEGY: readChoice("EXTRACTION_STRATEGY", EXTRACTION_STRATEGIES, "lenient", problems),
    IMAGE_BASE_URL: readString("IMAGE_BASE_URL", `http://localhost:${port}/generated`).replace(/\/+$/, ""),
    IMAGE_FETCH_INSECURE_TLS: readFlag("IMAGE_FETCH_INSECURE_TLS", false),
    DEFAULT_MODEL: readString("DEFAULT_MODEL", "stable-diffusion"),
    BODY_LIMIT: readString("BODY_LIMIT", "50mb"),
    CORS_ORIGIN: readString("CORS_ORIGIN", "*"),
    TRUST_PROXY: readFlag("TRUST_PROXY", false),
    RATE_LIMIT_WINDOW_MS: parseInt(readString("RATE_LIMIT_WINDOW_MS", "900000"), 10),
    RATE_LIMIT_MAX: parseInt(readString("RATE_LIMIT_MAX", "300"), 10),
  };

  if (problems.length > 0) {
    const message = [
      "",
      "=== Invalid Environment Configuration ===",
      "",
      ...problems.map((p) => `  - ${p}`),
      "",
      "Please set these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }

  return config;
}

// Validate and export config as a singleton
const env = loadEnvConfig();

export { env, loadEnvConfig, IMAGE_GENERATORS, RESPONSE_FORMATS, EXTRACTION_STRATEGIES };
export type { EnvConfig, ImageGeneratorName, ResponseFormat, ExtractionStrategyName };
