import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import type { app as App } from "./app.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("app", () => {
  let app: typeof App;

  beforeAll(async () => {
    // Config is parsed at import time: a tenant without a token.
    vi.stubEnv("TAPIS_TENANT_URL", "tacc.tapis.io");
    vi.stubEnv("TAPIS_TOKEN", "");
    ({ app } = await import("./app.js"));
  });

  afterAll(() => {
    vi.unstubAllEnvs();
  });

  it("serves the health check", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });

  it("sets secure headers", async () => {
    const res = await app.request("/health");
    expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
  });

  it("mounts deployment routes under /api/deployments", async () => {
    const res = await app.request("/api/deployments/start", { method: "POST", body: "{" });
    expect(res.status).toBe(400);
  });

  const server = {
    tenantUrl: "https://tacc.tapis.io",
    tapisUser: "alice",
    modelId: "openai-community/gpt2",
    backend: { kind: "transformers" },
  };

  function createDeployment(body: { target?: "pod" | "hpc"; server?: Partial<typeof server> }) {
    return app.request("/api/deployments", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ server: { ...server, ...body.server }, target: body.target }),
    });
  }

  it("answers the hpc target with 501 when no Tapis token is configured", async () => {
    const res = await createDeployment({ target: "hpc" });
    expect(res.status).toBe(501);
    expect(await res.json()).toMatchObject({ success: false, error: "unimplemented" });
  });

  it("rejects a tenant other than the configured one", async () => {
    const res = await createDeployment({ server: { tenantUrl: "https://attacker.example" } });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ issues: ["tenantUrl: must be https://tacc.tapis.io"] });
  });

  it("answers unexpected failures with a generic 500", async () => {
    const res = await createDeployment({});
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      success: false,
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    });
  });
});
