import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import { deploymentRoutes } from "./routes/deployments.js";
import { healthRoutes } from "./routes/health.js";

// /health and /backends are public; /api/deployments drives the Tapis tenant
// with the service's own token, so expose it only on a trusted network.

export const app = new Hono();

app.use("/*", secureHeaders());

app.route("/", healthRoutes);
app.route("/api/deployments", deploymentRoutes);

// Global error handler for anything a route does not map itself.
export const errorHandler: Parameters<typeof app.onError>[0] = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      success: false,
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

app.onError(errorHandler);
