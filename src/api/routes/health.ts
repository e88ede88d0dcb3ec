import { Hono } from "hono";
import { BACKEND_KINDS } from "../../deployment/backend.js";

export const SERVICE_NAME = "flexserv-deployer";

// Public, unauthenticated, used by load balancers and monitoring.
export function createHealthRoutes(): Hono {
  const routes = new Hono();

  routes.get("/health", (c) => c.json({ status: "healthy", service: SERVICE_NAME }));

  /** GET /backends — serving backends a descriptor may name */
  routes.get("/backends", (c) => c.json({ backends: [...BACKEND_KINDS] }));

  return routes;
}

export const healthRoutes = createHealthRoutes();
