import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HpcDeployer } from "../../deployment/hpc-deployer.js";
import { PodDeployer } from "../../deployment/pod-deployer.js";
import { TapisPodsClient } from "../../platform/tapis-pods-client.js";
import { PodsApiError } from "../../platform/types.js";
import { FakePodsPlatform } from "../../test/fake-pods-platform.js";
import { createDeploymentRoutes } from "./deployments.js";

vi.mock("../../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const PODID = "phibrux8mj5zc";
const VOLID = "vhibrux8mj5zc";

const server = {
  tenantUrl: "https://tacc.tapis.io",
  tapisUser: "alice",
  modelId: "openai-community/gpt2",
  backend: { kind: "transformers" },
};

describe("deployment routes", () => {
  let platform: FakePodsPlatform;
  let routes: ReturnType<typeof createDeploymentRoutes>;
  const resolved: string[] = [];

  beforeEach(() => {
    platform = new FakePodsPlatform();
    resolved.length = 0;
    routes = createDeploymentRoutes((target) => {
      resolved.push(target);
      return target === "pod" ? new PodDeployer(platform, { flexservSecret: "test-secret" }) : new HpcDeployer();
    }, {});
  });

  function post(path: string, body: unknown) {
    return routes.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  describe("POST /", () => {
    it("creates a deployment and returns 201", async () => {
      const res = await post("/", { server });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        success: true,
        deployment: { target: "pod", podId: PODID, volumeId: VOLID, status: "pending" },
      });
      expect(resolved).toEqual(["pod"]);
    });

    it("passes options through", async () => {
      await post("/", { server, options: { gpus: 1, deploymentId: "run-1" } });
      expect(platform.pods.get("prun1")?.resources.gpus).toBe(1);
    });

    it("fills the tenant and user from the configured defaults", async () => {
      routes = createDeploymentRoutes(() => new PodDeployer(platform), {
        tenantUrl: "https://tacc.tapis.io",
        tapisUser: "alice",
      });
      const res = await post("/", { server: { modelId: "openai-community/gpt2", backend: { kind: "vllm" } } });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ deployment: { podId: PODID, tapisUser: "alice" } });
    });

    it("returns 409 when the deployment already exists", async () => {
      await post("/", { server });
      const res = await post("/", { server });
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        success: false,
        error: "conflict",
        message: `${PODID} already exists`,
      });
    });

    it("returns 400 for a body that is not JSON", async () => {
      const res = await routes.request("/", { method: "POST", body: "{not json" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: "validation", message: "Invalid JSON body" });
    });

    it("returns 400 with the offending fields", async () => {
      const res = await post("/", { server: { ...server, tapisUser: "" } });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "validation", issues: ["tapisUser: must be non-empty"] });
    });

    it("returns 400 for invalid options", async () => {
      const res = await post("/", { server, options: { memRequestMb: 9000 } });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ issues: ["memRequestMb: must not exceed memLimitMb"] });
    });

    it("returns 501 for the hpc target", async () => {
      const res = await post("/", { target: "hpc", server });
      expect(res.status).toBe(501);
      expect(await res.json()).toMatchObject({
        error: "unimplemented",
        message: "create is not implemented for hpc deployments",
      });
    });

    it("returns 502 when the platform fails", async () => {
      platform.failNext("createPod", new PodsApiError(500, "spawner down"));
      const res = await post("/", { server });
      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({ error: "platform" });
      expect(platform.volumes.size).toBe(0);
    });
  });

  describe("tenant pinning", () => {
    const fetchMock = vi.fn();

    beforeEach(() => {
      fetchMock.mockReset();
      vi.stubGlobal("fetch", fetchMock);
      const client = new TapisPodsClient({ tenantUrl: "https://tacc.tapis.io", token: "test-token" });
      routes = createDeploymentRoutes(() => new PodDeployer(client), { tenantUrl: "tacc.tapis.io" });
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("rejects a foreign tenant before any request leaves the service", async () => {
      const res = await post("/monitor", { server: { ...server, tenantUrl: "https://attacker.example" } });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "validation",
        issues: ["tenantUrl: must be https://tacc.tapis.io"],
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("rejects a foreign tenant on create", async () => {
      const res = await post("/", { server: { ...server, tenantUrl: "attacker.example" } });
      expect(res.status).toBe(400);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("accepts the configured tenant however it is written", async () => {
      fetchMock.mockResolvedValue({
        ok: true,
        status: 200,
        statusText: "OK",
        json: async () => ({ result: { pod_id: PODID, status: "RUNNING" } }),
      });

      const res = await post("/monitor", { server: { ...server, tenantUrl: " tacc.tapis.io " } });
      expect(res.status).toBe(200);
      expect(fetchMock.mock.calls[0]?.[0]).toBe(`https://tacc.tapis.io/v3/pods/${PODID}`);
    });
  });

  describe("lifecycle", () => {
    it("stops a deployment addressed by its descriptor", async () => {
      await post("/", { server });
      platform.setPodStatus(PODID, "RUNNING");

      const res = await post("/stop", { server });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ success: true, deployment: { podId: PODID, status: "stopped" } });
    });

    it("monitors a deployment addressed by explicit ids", async () => {
      await post("/", { server, options: { deploymentId: "run-7" } });

      const res = await post("/monitor", { server, ids: { podId: "prun7", volumeId: "vrun7" } });
      expect(await res.json()).toMatchObject({ deployment: { podId: "prun7", remoteStatus: "REQUESTED" } });
    });

    it("re-derives ids from the deployment id option", async () => {
      await post("/", { server, options: { deploymentId: "run-7" } });

      const res = await post("/start", { server, options: { deploymentId: "run-7" } });
      expect(res.status).toBe(200);
      expect(platform.callsTo("startPod")).toEqual(["prun7"]);
    });

    it("returns 404 for a deployment that does not exist", async () => {
      const res = await post("/start", { server });
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: "not_found" });
    });

    it("terminates and then reports the deployment gone", async () => {
      await post("/", { server });

      const first = await post("/terminate", { server });
      expect(first.status).toBe(200);
      expect(await first.json()).toMatchObject({ deployment: { status: "terminated", podUrl: null } });

      const second = await post("/terminate", { server });
      expect(second.status).toBe(404);
    });

    it("reports the orphaned volume when termination is incomplete", async () => {
      await post("/", { server });
      platform.failNext("deleteVolume", new PodsApiError(500, "volume busy"));

      const res = await post("/terminate", { server });
      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({
        success: false,
        error: "platform",
        podId: PODID,
        orphanedVolumeId: VOLID,
      });
    });
  });
});
