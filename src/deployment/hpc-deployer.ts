import { UnimplementedError } from "./errors.js";
import type { ServerInstance } from "./server-instance.js";
import type { DeploymentRef, DeploymentResult, FlexServDeployer } from "./types.js";

/**
 * Placeholder for batch-scheduled cluster deployments. The launch parameters
 * for this target already exist (`buildParameters(..., "hpc")`); job
 * submission does not.
 */
export class HpcDeployer implements FlexServDeployer {
  async create(_instance: ServerInstance): Promise<DeploymentResult> {
    throw new UnimplementedError("create", "hpc");
  }

  async start(_ref: DeploymentRef): Promise<DeploymentResult> {
    throw new UnimplementedError("start", "hpc");
  }

  async stop(_ref: DeploymentRef): Promise<DeploymentResult> {
    throw new UnimplementedError("stop", "hpc");
  }

  async terminate(_ref: DeploymentRef): Promise<DeploymentResult> {
    throw new UnimplementedError("terminate", "hpc");
  }

  async monitor(_ref: DeploymentRef): Promise<DeploymentResult> {
    throw new UnimplementedError("monitor", "hpc");
  }
}
