import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { ResourceIds } from "./resource-ids.js";
import type { ServerInstance } from "./server-instance.js";

export const DEFAULT_IMAGE = "tapis/flexserv:1.0";

const positiveInt = z.number().int().positive();

/** Per-call pod deployment options. Every field has a default. */
export const deploymentOptionsSchema = z
  .object({
    /** e.g. a UUID from the calling application; ids are derived from it when set */
    deploymentId: z.string().optional(),
    volumeSizeMb: positiveInt.default(10 * 1024),
    image: z.string().trim().min(1).default(DEFAULT_IMAGE),
    /** millicpus, 1000 = one CPU */
    cpuRequest: positiveInt.default(1000),
    cpuLimit: positiveInt.default(2000),
    memRequestMb: positiveInt.default(4096),
    memLimitMb: positiveInt.default(8192),
    gpus: z.number().int().min(0).default(0),
    /** prepended to the instance auth token; falls back to the deployer's configured secret */
    flexservSecret: z.string().optional(),
  })
  .superRefine((opts, ctx) => {
    if (opts.cpuRequest > opts.cpuLimit) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["cpuRequest"], message: "must not exceed cpuLimit" });
    }
    if (opts.memRequestMb > opts.memLimitMb) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["memRequestMb"], message: "must not exceed memLimitMb" });
    }
  });

export type DeploymentOptionsInput = z.input<typeof deploymentOptionsSchema>;
export type DeploymentOptions = z.output<typeof deploymentOptionsSchema>;

export function parseDeploymentOptions(input: unknown = {}): DeploymentOptions {
  const parsed = deploymentOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid deployment options", parsed.error);
  }
  return parsed.data;
}

export type DeploymentStatus = "pending" | "running" | "stopped" | "failed" | "terminated" | "unknown";

export interface PodDeploymentResult {
  target: "pod";
  /** use for start/stop/terminate/monitor */
  podId: string;
  volumeId: string;
  /** where health and inference endpoints are reachable */
  podUrl: string | null;
  status: DeploymentStatus;
  /** status string as reported by the platform */
  remoteStatus: string | null;
  tapisUser: string;
  tapisTenant: string;
  modelId: string;
}

export interface HpcDeploymentResult {
  target: "hpc";
  jobId: string;
  tapisUser: string;
  tapisTenant: string;
  modelId: string;
}

export type DeploymentResult = PodDeploymentResult | HpcDeploymentResult;

/** Everything a lifecycle call needs: the descriptor and the ids it was deployed under. */
export interface DeploymentRef {
  instance: ServerInstance;
  ids: ResourceIds;
}

export interface FlexServDeployer {
  create(instance: ServerInstance, options?: DeploymentOptionsInput): Promise<DeploymentResult>;
  start(ref: DeploymentRef): Promise<DeploymentResult>;
  stop(ref: DeploymentRef): Promise<DeploymentResult>;
  terminate(ref: DeploymentRef): Promise<DeploymentResult>;
  monitor(ref: DeploymentRef): Promise<DeploymentResult>;
}
