import type { Context } from "hono";
import { Hono } from "hono";
import { z } from "zod";
import { config } from "../../config/index.js";
import { logger } from "../../config/logger.js";
import type { PlatformTarget } from "../../deployment/backend.js";
import { resolveDeploymentRef } from "../../deployment/deployer.js";
import type { DeploymentErrorKind } from "../../deployment/errors.js";
import { DeploymentError, TerminationIncompleteError, ValidationError } from "../../deployment/errors.js";
import type { ServerInstance } from "../../deployment/server-instance.js";
import { createServerInstance, normalizeTenantUrl } from "../../deployment/server-instance.js";
import { getConfiguredTenantUrl, getDeployer } from "../../deployment/services.js";
import type { DeploymentRef, FlexServDeployer } from "../../deployment/types.js";
import { parseDeploymentOptions } from "../../deployment/types.js";

export type DeployerResolver = (target: PlatformTarget) => FlexServDeployer;

/**
 * Values a request may omit from its server descriptor. A `tenantUrl` here is
 * also the only tenant a request may name.
 */
export interface DescriptorDefaults {
  tenantUrl?: string;
  tapisUser?: string;
}

const requestSchema = z.object({
  target: z.enum(["pod", "hpc"]).default("pod"),
  server: z.record(z.unknown()),
  options: z.record(z.unknown()).optional(),
  ids: z
    .object({
      podId: z.string().min(1),
      volumeId: z.string().min(1),
    })
    .optional(),
});

type DeploymentRequest = z.infer<typeof requestSchema>;

const lifecycleOptionsSchema = z.object({ deploymentId: z.string().optional() });

const LIFECYCLE_ACTIONS = ["start", "stop", "terminate", "monitor"] as const;

const STATUS_BY_KIND = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  unimplemented: 501,
  platform: 502,
} as const satisfies Record<DeploymentErrorKind, number>;

export function statusForError(err: DeploymentError): (typeof STATUS_BY_KIND)[DeploymentErrorKind] {
  return STATUS_BY_KIND[err.kind];
}

export function createDeploymentRoutes(
  resolveDeployer: DeployerResolver = getDeployer,
  defaults: DescriptorDefaults = { tenantUrl: getConfiguredTenantUrl(), tapisUser: config.tapis.user },
): Hono {
  const routes = new Hono();
  const pinnedTenant = defaults.tenantUrl === undefined ? undefined : normalizeTenantUrl(defaults.tenantUrl);

  async function readRequest(c: Context): Promise<DeploymentRequest> {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new ValidationError("Invalid JSON body");
    }
    const parsed = requestSchema.safeParse(body);
    if (!parsed.success) {
      throw ValidationError.fromZod("Invalid deployment request", parsed.error);
    }
    return parsed.data;
  }

  function readInstance(req: DeploymentRequest): ServerInstance {
    const instance = createServerInstance({ ...defaults, ...req.server });
    if (pinnedTenant !== undefined && instance.tenantUrl !== pinnedTenant) {
      throw new ValidationError("Invalid server instance", [`tenantUrl: must be ${pinnedTenant}`]);
    }
    return instance;
  }

  function toRef(req: DeploymentRequest): DeploymentRef {
    const instance = readInstance(req);
    if (req.ids) return { instance, ids: req.ids };
    const options = lifecycleOptionsSchema.safeParse(req.options ?? {});
    if (!options.success) {
      throw ValidationError.fromZod("Invalid deployment options", options.error);
    }
    return resolveDeploymentRef(instance, options.data);
  }

  function errorResponse(c: Context, err: unknown): Response {
    if (!(err instanceof DeploymentError)) throw err;
    const status = statusForError(err);
    if (status >= 500) {
      logger.error(`Deployment request failed: ${err.message}`, { path: c.req.path, kind: err.kind, err });
    } else {
      logger.warn(`Deployment request rejected: ${err.message}`, { path: c.req.path, kind: err.kind });
    }
    return c.json(
      {
        success: false,
        error: err.kind,
        message: err.message,
        ...(err instanceof ValidationError && err.issues.length > 0 ? { issues: err.issues } : {}),
        ...(err instanceof TerminationIncompleteError
          ? { podId: err.podId, orphanedVolumeId: err.orphanedVolumeId }
          : {}),
      },
      status,
    );
  }

  /** POST /api/deployments — create the volume and pod for a server descriptor */
  routes.post("/", async (c) => {
    try {
      const req = await readRequest(c);
      const instance = readInstance(req);
      const options = parseDeploymentOptions(req.options);
      const deployment = await resolveDeployer(req.target).create(instance, options);
      return c.json({ success: true, deployment }, 201);
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  for (const action of LIFECYCLE_ACTIONS) {
    /** POST /api/deployments/{action} — addressed by explicit ids or re-derived from the descriptor */
    routes.post(`/${action}`, async (c) => {
      try {
        const req = await readRequest(c);
        const ref = toRef(req);
        const deployment = await resolveDeployer(req.target)[action](ref);
        return c.json({ success: true, deployment });
      } catch (err) {
        return errorResponse(c, err);
      }
    });
  }

  return routes;
}

/** Pre-built deployment routes backed by the configured Tapis tenant. */
export const deploymentRoutes = createDeploymentRoutes();
