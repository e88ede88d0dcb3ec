import { z } from "zod";
import type { NewPod, NewVolume, PodRecord, PodsPlatform, VolumeRecord } from "./types.js";
import { PodsApiError } from "./types.js";

/** Tapis response types (only what we need) */
const podResultSchema = z.object({
  pod_id: z.string(),
  status: z.string().nullish(),
  status_requested: z.string().nullish(),
  networking: z
    .record(
      z.object({
        protocol: z.string().nullish(),
        port: z.number().nullish(),
        url: z.string().nullish(),
      }),
    )
    .nullish(),
});

const volumeResultSchema = z.object({
  volume_id: z.string(),
  status: z.string().nullish(),
  size_limit: z.number().nullish(),
});

const podEnvelopeSchema = z.object({ result: podResultSchema });
const volumeEnvelopeSchema = z.object({ result: volumeResultSchema });
const errorBodySchema = z.object({ message: z.string() });

export interface TapisPodsClientOptions {
  /** Tenant base URL, e.g. https://tacc.tapis.io */
  tenantUrl: string;
  /** JWT sent as X-Tapis-Token */
  token: string;
  requestTimeoutMs?: number;
}

export class TapisPodsClient implements PodsPlatform {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;

  constructor(options: TapisPodsClientOptions) {
    this.baseUrl = `${options.tenantUrl.replace(/\/+$/, "")}/v3`;
    this.token = options.token;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  async createVolume(volume: NewVolume): Promise<VolumeRecord> {
    const body = await this.post("/pods/volumes", {
      volume_id: volume.volumeId,
      description: volume.description,
      size_limit: volume.sizeLimitMb,
    });
    return toVolumeRecord(body);
  }

  async getVolume(volumeId: string): Promise<VolumeRecord> {
    return toVolumeRecord(await this.get(`/pods/volumes/${encodeURIComponent(volumeId)}`));
  }

  async deleteVolume(volumeId: string): Promise<void> {
    await this.del(`/pods/volumes/${encodeURIComponent(volumeId)}`);
  }

  async createPod(pod: NewPod): Promise<PodRecord> {
    const body = await this.post("/pods", {
      pod_id: pod.podId,
      image: pod.image,
      description: pod.description,
      command: pod.command,
      arguments: pod.arguments,
      environment_variables: pod.environmentVariables,
      status_requested: pod.statusRequested,
      volume_mounts: Object.fromEntries(
        Object.entries(pod.volumeMounts).map(([path, mount]) => [
          path,
          { type: mount.type, source_id: mount.sourceId, sub_path: mount.subPath },
        ]),
      ),
      time_to_stop_default: pod.timeToStopDefault,
      time_to_stop_instance: pod.timeToStopInstance,
      networking: Object.fromEntries(
        Object.entries(pod.networking).map(([name, net]) => [name, { protocol: net.protocol, port: net.port }]),
      ),
      resources: {
        cpu_request: pod.resources.cpuRequest,
        cpu_limit: pod.resources.cpuLimit,
        mem_request: pod.resources.memRequest,
        mem_limit: pod.resources.memLimit,
        gpus: pod.resources.gpus,
      },
    });
    return toPodRecord(body);
  }

  async getPod(podId: string): Promise<PodRecord> {
    return toPodRecord(await this.get(`/pods/${encodeURIComponent(podId)}`));
  }

  /** Tapis exposes start/stop as GET actions on the pod. */
  async startPod(podId: string): Promise<PodRecord> {
    return toPodRecord(await this.get(`/pods/${encodeURIComponent(podId)}/start`));
  }

  async stopPod(podId: string): Promise<PodRecord> {
    return toPodRecord(await this.get(`/pods/${encodeURIComponent(podId)}/stop`));
  }

  async deletePod(podId: string): Promise<void> {
    await this.del(`/pods/${encodeURIComponent(podId)}`);
  }

  private headers(): Record<string, string> {
    return {
      "X-Tapis-Token": this.token,
      "Content-Type": "application/json",
    };
  }

  private async get(path: string): Promise<unknown> {
    const res = await this.send(path, { method: "GET", headers: this.headers() });
    return res.json();
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const res = await this.send(path, { method: "POST", headers: this.headers(), body: JSON.stringify(body) });
    return res.json();
  }

  private async del(path: string): Promise<void> {
    await this.send(path, { method: "DELETE", headers: this.headers() });
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, { ...init, signal: AbortSignal.timeout(this.requestTimeoutMs) });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      throw new PodsApiError(null, err instanceof Error ? err.message : String(err), timedOut);
    }
    if (!res.ok) {
      const errBody: unknown = await res.json().catch(() => ({ message: res.statusText }));
      const parsed = errorBodySchema.safeParse(errBody);
      throw new PodsApiError(res.status, parsed.success ? parsed.data.message : res.statusText);
    }
    return res;
  }
}

function toPodRecord(body: unknown): PodRecord {
  const { result } = parseEnvelope(podEnvelopeSchema, body);
  return {
    podId: result.pod_id,
    status: result.status ?? null,
    statusRequested: result.status_requested ?? null,
    networking: result.networking ?? {},
  };
}

function toVolumeRecord(body: unknown): VolumeRecord {
  const { result } = parseEnvelope(volumeEnvelopeSchema, body);
  return {
    volumeId: result.volume_id,
    status: result.status ?? null,
    sizeLimitMb: result.size_limit ?? null,
  };
}

function parseEnvelope<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new PodsApiError(null, `Unexpected response shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}
