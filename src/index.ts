import { serve } from "@hono/node-server";
import { app } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  // Don't exit; other deployments keep being served
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // Exit after logging (Winston Console transport is synchronous).
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

if (!config.tapis.token) {
  logger.warn("TAPIS_TOKEN is not set; deployment requests will fail until it is configured");
}

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info(`flexserv-deployer listening on http://${config.host}:${info.port}`);
});
