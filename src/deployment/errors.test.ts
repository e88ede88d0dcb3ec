import { describe, expect, it } from "vitest";
import { PodsApiError } from "../platform/types.js";
import {
  ConflictError,
  NotFoundError,
  PlatformError,
  TerminationIncompleteError,
  toDeploymentError,
  UnimplementedError,
  ValidationError,
} from "./errors.js";

describe("toDeploymentError", () => {
  it("maps 404 to NotFoundError", () => {
    const err = toDeploymentError(new PodsApiError(404, "pod missing"), "pabc");
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ kind: "not_found", resourceId: "pabc" });
  });

  it("maps a 400 that says the resource does not exist to NotFoundError", () => {
    expect(toDeploymentError(new PodsApiError(400, "Pod pabc does not exist"), "pabc")).toBeInstanceOf(NotFoundError);
  });

  it("maps 409 and UniqueViolation messages to ConflictError", () => {
    expect(toDeploymentError(new PodsApiError(409, "taken"), "vabc")).toBeInstanceOf(ConflictError);
    expect(toDeploymentError(new PodsApiError(400, "UniqueViolation on pod_id"), "pabc")).toBeInstanceOf(
      ConflictError,
    );
  });

  it.each([
    [400, "bad_request"],
    [401, "auth"],
    [403, "auth"],
    [500, "server"],
    [503, "server"],
    [418, "unknown"],
  ] as const)("maps status %i to a platform error with reason %s", (status, reason) => {
    const err = toDeploymentError(new PodsApiError(status, "nope"), "pabc");
    expect(err).toBeInstanceOf(PlatformError);
    expect(err).toMatchObject({ kind: "platform", reason, statusCode: status });
  });

  it("distinguishes timeouts from unreachable hosts", () => {
    expect(toDeploymentError(new PodsApiError(null, "aborted", true), "pabc")).toMatchObject({ reason: "timeout" });
    expect(toDeploymentError(new PodsApiError(null, "ECONNREFUSED"), "pabc")).toMatchObject({
      reason: "unreachable",
      statusCode: null,
    });
  });

  it("passes deployment errors through unchanged", () => {
    const original = new ValidationError("bad");
    expect(toDeploymentError(original, "pabc")).toBe(original);
  });

  it("wraps anything else as an unknown platform error", () => {
    const err = toDeploymentError(new TypeError("boom"), "pabc");
    expect(err).toMatchObject({ kind: "platform", reason: "unknown", message: "boom" });
  });
});

describe("error classes", () => {
  it("formats validation issues into the message", () => {
    const err = new ValidationError("Invalid deployment options", ["cpuRequest: must not exceed cpuLimit"]);
    expect(err.message).toBe("Invalid deployment options: cpuRequest: must not exceed cpuLimit");
    expect(err.name).toBe("ValidationError");
  });

  it("names the operation and target when unimplemented", () => {
    expect(new UnimplementedError("start", "hpc").message).toBe("start is not implemented for hpc deployments");
  });

  it("reports an incomplete termination as a platform failure", () => {
    const cause = new PlatformError("Pods API error 500: down", "server", 500);
    const err = new TerminationIncompleteError("pabc", "vabc", cause);
    expect(err.kind).toBe("platform");
    expect(err.orphanedVolumeId).toBe("vabc");
    expect(err.cause).toBe(cause);
  });

  it("keeps the platform kind whatever the volume failure was", () => {
    const err = new TerminationIncompleteError("pabc", "vabc", new ConflictError("vabc", "volume in use"));
    expect(err.kind).toBe("platform");
    expect(err.volumeError.kind).toBe("conflict");
  });
});
