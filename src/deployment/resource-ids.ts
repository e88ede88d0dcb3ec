import { createHash } from "node:crypto";
import { encodeBase62 } from "./base62.js";

export const POD_ID_PREFIX = "p";
export const VOLUME_ID_PREFIX = "v";
const HASH_LENGTH = 12;

export interface ResourceIds {
  podId: string;
  volumeId: string;
}

/** The fields of a server descriptor that address a deployment. */
export interface DeploymentAddress {
  tenantUrl: string;
  tapisUser: string;
  modelId: string;
}

/** Lowercase ASCII alphanumerics only, e.g. a UUID with its dashes stripped. */
export function normalizeDeploymentId(value: string): string {
  return value.replace(/[^a-zA-Z0-9]/g, "").toLowerCase();
}

/** Stable 12-character hash of tenant, user and model. */
export function deploymentHash(address: DeploymentAddress): string {
  const digest = createHash("sha256")
    .update(`${address.tapisUser}@${address.tenantUrl}-${address.modelId}`)
    .digest();
  return encodeBase62(digest).slice(0, HASH_LENGTH).toLowerCase();
}

/**
 * Pod and volume ids for a deployment. An explicit deployment id lets the
 * same user run the same model more than once; without one, the ids are
 * derived from the descriptor so a user gets one deployment per model.
 */
export function deriveResourceIds(options: { deploymentId?: string }, address: DeploymentAddress): ResourceIds {
  const explicit = options.deploymentId === undefined ? "" : normalizeDeploymentId(options.deploymentId);
  const suffix = explicit === "" ? deploymentHash(address) : explicit;
  return {
    podId: `${POD_ID_PREFIX}${suffix}`,
    volumeId: `${VOLUME_ID_PREFIX}${suffix}`,
  };
}
