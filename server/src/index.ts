import dotenv from "dotenv";

// Load environment variables before anything else
dotenv.config();

// Import env config (validates required vars immediately)
import { env } from "./config/env";
import { logger } from "./config/logger";
import { createApp } from "./app";

function start(): void {
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      generator: env.IMAGE_GENERATOR,
      extractionStrategy: env.EXTRACTION_STRATEGY,
      responseFormat: env.RESPONSE_FORMAT,
      outputDir: env.OUTPUT_DIR,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/health`);
    if (env.IMAGE_FETCH_INSECURE_TLS) {
      logger.warn("server", "TLS certificate verification is disabled for referenced image fetches");
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    server.close(() => {
      logger.info("server", "Server shut down.");
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  start();
} catch (err) {
  logger.error("server", "Failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}
