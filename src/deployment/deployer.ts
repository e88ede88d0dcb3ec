import type { PodsPlatform } from "../platform/types.js";
import type { PlatformTarget } from "./backend.js";
import { HpcDeployer } from "./hpc-deployer.js";
import type { DeployerSettings } from "./pod-deployer.js";
import { PodDeployer } from "./pod-deployer.js";
import { deriveResourceIds } from "./resource-ids.js";
import type { ServerInstance } from "./server-instance.js";
import type { DeploymentRef, FlexServDeployer } from "./types.js";

/** The platform is only built for targets that run on it. */
export function createDeployer(
  target: PlatformTarget,
  getPlatform: () => PodsPlatform,
  settings: DeployerSettings = {},
): FlexServDeployer {
  switch (target) {
    case "pod":
      return new PodDeployer(getPlatform(), settings);
    case "hpc":
      return new HpcDeployer();
  }
}

/** The ref a lifecycle call needs, derived the same way `create` derived it. */
export function resolveDeploymentRef(instance: ServerInstance, options: { deploymentId?: string } = {}): DeploymentRef {
  return { instance, ids: deriveResourceIds(options, instance) };
}
