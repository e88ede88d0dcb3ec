import { logger } from "../config/logger.js";
import type { PodRecord, PodsPlatform } from "../platform/types.js";
import { buildParameters, MODEL_REPO_PATH, SERVER_PORT } from "./backend.js";
import {
  ConflictError,
  NotFoundError,
  TerminationIncompleteError,
  toDeploymentError,
  ValidationError,
} from "./errors.js";
import type { ResourceIds } from "./resource-ids.js";
import { deriveResourceIds } from "./resource-ids.js";
import type { ServerInstance } from "./server-instance.js";
import { isAbsoluteHttpUrl } from "./server-instance.js";
import type {
  DeploymentOptionsInput,
  DeploymentRef,
  DeploymentStatus,
  FlexServDeployer,
  PodDeploymentResult,
} from "./types.js";
import { parseDeploymentOptions } from "./types.js";

/** Fallback credentials for instances that do not carry their own. */
export interface DeployerSettings {
  flexservSecret?: string;
  hfToken?: string;
}

const REMOTE_STATUS_MAP: Readonly<Record<string, DeploymentStatus>> = {
  REQUESTED: "pending",
  SPAWNER_SETUP: "pending",
  CREATING: "pending",
  AVAILABLE: "running",
  RUNNING: "running",
  SHUTTING_DOWN: "stopped",
  STOPPED: "stopped",
  COMPLETE: "stopped",
  ERROR: "failed",
  FAILED: "failed",
};

export function mapPodStatus(remoteStatus: string | null): DeploymentStatus {
  if (remoteStatus === null) return "unknown";
  return REMOTE_STATUS_MAP[remoteStatus.toUpperCase()] ?? "unknown";
}

/**
 * Where the pod's HTTP endpoint is reachable. Prefers the URL the platform
 * reports for the default network, else the tenant's pods subdomain.
 */
export function podUrlFor(record: PodRecord | null, podId: string, tenantUrl: string): string {
  const reported = record?.networking.default?.url;
  if (reported) {
    return /^https?:\/\//.test(reported) ? reported : `https://${reported}`;
  }
  return `https://${podId}.pods.${new URL(tenantUrl).host}`;
}

/** Instances built by hand skip `createServerInstance`; check the URL before touching the platform. */
function assertTenantUrl(instance: ServerInstance): void {
  if (!isAbsoluteHttpUrl(instance.tenantUrl)) {
    throw new ValidationError("Invalid server instance", [
      `tenantUrl: must be an http(s) URL, got "${instance.tenantUrl}"`,
    ]);
  }
}

/**
 * Runs FlexServ on the Tapis Pods service: one volume holding the model
 * files, one pod mounting it. No local state; the platform is the record.
 */
export class PodDeployer implements FlexServDeployer {
  private readonly platform: PodsPlatform;
  private readonly settings: DeployerSettings;

  constructor(platform: PodsPlatform, settings: DeployerSettings = {}) {
    this.platform = platform;
    this.settings = settings;
  }

  /**
   * Provision a new deployment.
   * Steps:
   * 1. Validate the tenant URL and options, derive pod/volume ids
   * 2. Refuse if either resource already exists
   * 3. Create the volume
   * 4. Create the pod mounting it; on failure delete the volume again
   */
  async create(instance: ServerInstance, optionsInput: DeploymentOptionsInput = {}): Promise<PodDeploymentResult> {
    assertTenantUrl(instance);
    const options = parseDeploymentOptions(optionsInput);
    const { podId, volumeId } = deriveResourceIds(options, instance);
    const owner = `${instance.tapisUser}@${instance.modelId}`;

    await this.ensureAbsent(podId, (id) => this.platform.getPod(id));
    await this.ensureAbsent(volumeId, (id) => this.platform.getVolume(id));

    try {
      await this.platform.createVolume({
        volumeId,
        description: `Volume for ${owner}`,
        sizeLimitMb: options.volumeSizeMb,
      });
    } catch (err) {
      throw toDeploymentError(err, volumeId);
    }
    logger.info(`Created volume ${volumeId}`, { volumeId, tapisUser: instance.tapisUser });

    const params = buildParameters(instance.backend, instance, "pod", {
      flexservSecret: options.flexservSecret ?? this.settings.flexservSecret,
      hfToken: instance.hfToken ?? this.settings.hfToken,
    });

    let pod: PodRecord;
    try {
      pod = await this.platform.createPod({
        podId,
        image: options.image,
        description: `FlexServ pod for ${owner}`,
        command: [...params.commandPrefix],
        arguments: [...params.args],
        environmentVariables: { ...params.env },
        statusRequested: "ON",
        volumeMounts: {
          [MODEL_REPO_PATH]: { type: "tapisvolume", sourceId: volumeId, subPath: "" },
        },
        timeToStopDefault: -1,
        timeToStopInstance: -1,
        networking: { default: { protocol: "http", port: SERVER_PORT } },
        resources: {
          cpuRequest: options.cpuRequest,
          cpuLimit: options.cpuLimit,
          memRequest: options.memRequestMb,
          memLimit: options.memLimitMb,
          gpus: options.gpus,
        },
      });
    } catch (err) {
      logger.error(`Failed to create pod ${podId}, rolling back volume ${volumeId}`, { podId, volumeId, err });
      await this.rollbackVolume(volumeId);
      throw toDeploymentError(err, podId);
    }

    logger.info(`Created pod ${podId}`, { podId, volumeId, backend: instance.backend.kind });
    return this.toResult(instance, { podId, volumeId }, pod);
  }

  async start(ref: DeploymentRef): Promise<PodDeploymentResult> {
    assertTenantUrl(ref.instance);
    const { podId } = ref.ids;
    const pod = await this.fetchPod(podId);
    if (mapPodStatus(pod.status) === "running") {
      return this.toResult(ref.instance, ref.ids, pod);
    }
    try {
      const started = await this.platform.startPod(podId);
      logger.info(`Started pod ${podId}`);
      return this.toResult(ref.instance, ref.ids, started);
    } catch (err) {
      throw toDeploymentError(err, podId);
    }
  }

  async stop(ref: DeploymentRef): Promise<PodDeploymentResult> {
    assertTenantUrl(ref.instance);
    const { podId } = ref.ids;
    const pod = await this.fetchPod(podId);
    if (mapPodStatus(pod.status) === "stopped") {
      return this.toResult(ref.instance, ref.ids, pod);
    }
    try {
      const stopped = await this.platform.stopPod(podId);
      logger.info(`Stopped pod ${podId}`);
      return this.toResult(ref.instance, ref.ids, stopped);
    } catch (err) {
      throw toDeploymentError(err, podId);
    }
  }

  /** Deletes the pod, then its volume. A leftover volume is reported; one already gone is not. */
  async terminate(ref: DeploymentRef): Promise<PodDeploymentResult> {
    const { podId, volumeId } = ref.ids;
    try {
      await this.platform.deletePod(podId);
    } catch (err) {
      throw toDeploymentError(err, podId);
    }
    logger.info(`Deleted pod ${podId}`);

    try {
      await this.platform.deleteVolume(volumeId);
      logger.info(`Deleted volume ${volumeId}`);
    } catch (err) {
      const volumeError = toDeploymentError(err, volumeId);
      if (!(volumeError instanceof NotFoundError)) {
        logger.error(`Pod ${podId} deleted but volume ${volumeId} was not`, { podId, volumeId, err });
        throw new TerminationIncompleteError(podId, volumeId, volumeError);
      }
      logger.info(`Volume ${volumeId} already gone`);
    }

    return {
      ...this.identity(ref.instance, ref.ids),
      podUrl: null,
      status: "terminated",
      remoteStatus: null,
    };
  }

  async monitor(ref: DeploymentRef): Promise<PodDeploymentResult> {
    assertTenantUrl(ref.instance);
    const pod = await this.fetchPod(ref.ids.podId);
    return this.toResult(ref.instance, ref.ids, pod);
  }

  private async fetchPod(podId: string): Promise<PodRecord> {
    try {
      return await this.platform.getPod(podId);
    } catch (err) {
      throw toDeploymentError(err, podId);
    }
  }

  private async ensureAbsent(resourceId: string, probe: (id: string) => Promise<unknown>): Promise<void> {
    try {
      await probe(resourceId);
    } catch (err) {
      const mapped = toDeploymentError(err, resourceId);
      if (mapped instanceof NotFoundError) return;
      throw mapped;
    }
    throw new ConflictError(resourceId);
  }

  private async rollbackVolume(volumeId: string): Promise<void> {
    try {
      await this.platform.deleteVolume(volumeId);
      logger.info(`Rolled back volume ${volumeId}`);
    } catch (err) {
      logger.error(`Failed to roll back volume ${volumeId}`, { volumeId, err });
    }
  }

  private identity(instance: ServerInstance, ids: ResourceIds) {
    return {
      target: "pod" as const,
      podId: ids.podId,
      volumeId: ids.volumeId,
      tapisUser: instance.tapisUser,
      tapisTenant: instance.tenantUrl,
      modelId: instance.modelId,
    };
  }

  private toResult(
    instance: ServerInstance,
    ids: ResourceIds,
    pod: PodRecord,
  ): PodDeploymentResult {
    return {
      ...this.identity(instance, ids),
      podUrl: podUrlFor(pod, ids.podId, instance.tenantUrl),
      status: mapPodStatus(pod.status),
      remoteStatus: pod.status,
    };
  }
}
