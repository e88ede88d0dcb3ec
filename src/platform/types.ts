/**
 * Contract of the remote container platform the deployers drive.
 *
 * Implementations perform exactly one attempt per call and reject with
 * {@link PodsApiError} on failure. The platform is the sole source of truth
 * for whether a pod or volume exists.
 */

export interface NewVolume {
  volumeId: string;
  description?: string;
  sizeLimitMb: number;
}

export interface VolumeRecord {
  volumeId: string;
  status: string | null;
  sizeLimitMb: number | null;
}

export interface VolumeMount {
  type: "tapisvolume";
  sourceId: string;
  subPath: string;
}

export interface PodNetworking {
  protocol: "http" | "tcp";
  port: number;
  url?: string | null;
}

export interface PodResources {
  /** millicpus, 1000 = one CPU */
  cpuRequest: number;
  cpuLimit: number;
  /** MB */
  memRequest: number;
  memLimit: number;
  gpus: number;
}

export interface NewPod {
  podId: string;
  image: string;
  description: string;
  command: string[];
  arguments: string[];
  environmentVariables: Record<string, string>;
  statusRequested: "ON" | "OFF";
  /** keyed by mount path inside the container */
  volumeMounts: Record<string, VolumeMount>;
  /** -1 keeps the pod up until it is stopped explicitly */
  timeToStopDefault: number;
  timeToStopInstance: number;
  networking: Record<string, PodNetworking>;
  resources: PodResources;
}

export interface PodRecord {
  podId: string;
  status: string | null;
  statusRequested: string | null;
  networking: Record<string, { protocol?: string | null; port?: number | null; url?: string | null }>;
}

export interface PodsPlatform {
  createVolume(volume: NewVolume): Promise<VolumeRecord>;
  getVolume(volumeId: string): Promise<VolumeRecord>;
  deleteVolume(volumeId: string): Promise<void>;
  createPod(pod: NewPod): Promise<PodRecord>;
  getPod(podId: string): Promise<PodRecord>;
  startPod(podId: string): Promise<PodRecord>;
  stopPod(podId: string): Promise<PodRecord>;
  deletePod(podId: string): Promise<void>;
}

export class PodsApiError extends Error {
  constructor(
    /** HTTP status, or null when the request never got a response */
    public readonly statusCode: number | null,
    public readonly platformMessage: string,
    public readonly timedOut = false,
  ) {
    super(
      statusCode === null
        ? `Pods API request failed: ${platformMessage}`
        : `Pods API error ${statusCode}: ${platformMessage}`,
    );
    this.name = "PodsApiError";
  }
}
