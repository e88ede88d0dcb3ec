import { config } from "../config/index.js";
import { TapisPodsClient } from "../platform/tapis-pods-client.js";
import type { PodsPlatform } from "../platform/types.js";
import type { PlatformTarget } from "./backend.js";
import { createDeployer } from "./deployer.js";
import { normalizeTenantUrl } from "./server-instance.js";
import type { FlexServDeployer } from "./types.js";

/**
 * Shared lazy-initialized platform client and deployers for the configured
 * tenant. Nothing runs at import time; the client is built on first use.
 */

let _platform: PodsPlatform | null = null;
const _deployers = new Map<PlatformTarget, FlexServDeployer>();

/** The configured tenant, normalized the way server descriptors are. */
export function getConfiguredTenantUrl(): string | undefined {
  const tenantUrl = config.tapis.tenantUrl;
  return tenantUrl === undefined ? undefined : normalizeTenantUrl(tenantUrl);
}

export function getPodsPlatform(): PodsPlatform {
  if (!_platform) {
    const tenantUrl = getConfiguredTenantUrl();
    const token = config.tapis.token;
    if (!tenantUrl || !token) {
      throw new Error("TAPIS_TENANT_URL and TAPIS_TOKEN environment variables are required");
    }
    _platform = new TapisPodsClient({ tenantUrl, token, requestTimeoutMs: config.tapis.requestTimeoutMs });
  }
  return _platform;
}

export function getDeployer(target: PlatformTarget): FlexServDeployer {
  const existing = _deployers.get(target);
  if (existing) return existing;
  const deployer = createDeployer(target, getPodsPlatform, {
    flexservSecret: config.flexserv.secret,
    hfToken: config.flexserv.hfToken,
  });
  _deployers.set(target, deployer);
  return deployer;
}

/** Reset all singletons (for testing). */
export function resetDeploymentServices(): void {
  _platform = null;
  _deployers.clear();
}
