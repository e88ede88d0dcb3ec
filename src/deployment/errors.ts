import type { ZodError } from "zod";
import { PodsApiError } from "../platform/types.js";
import type { PlatformTarget } from "./backend.js";

export type DeploymentErrorKind = "validation" | "not_found" | "conflict" | "platform" | "unimplemented";

export type PlatformFailureReason = "auth" | "bad_request" | "server" | "timeout" | "unreachable" | "unknown";

/** Base of every failure a deployer reports. `kind` is the stable discriminator. */
export abstract class DeploymentError extends Error {
  abstract readonly kind: DeploymentErrorKind;
}

export class ValidationError extends DeploymentError {
  readonly kind = "validation";

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ValidationError";
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return new ValidationError(message, issues);
  }
}

export class NotFoundError extends DeploymentError {
  readonly kind = "not_found";

  constructor(
    public readonly resourceId: string,
    detail?: string,
  ) {
    super(detail ? `${resourceId} not found: ${detail}` : `${resourceId} not found`);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends DeploymentError {
  readonly kind = "conflict";

  constructor(
    public readonly resourceId: string,
    detail?: string,
  ) {
    super(detail ? `${resourceId} already exists: ${detail}` : `${resourceId} already exists`);
    this.name = "ConflictError";
  }
}

export class PlatformError extends DeploymentError {
  readonly kind = "platform";

  constructor(
    message: string,
    public readonly reason: PlatformFailureReason,
    public readonly statusCode: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PlatformError";
  }
}

export class UnimplementedError extends DeploymentError {
  readonly kind = "unimplemented";

  constructor(
    public readonly operation: string,
    public readonly target: PlatformTarget,
  ) {
    super(`${operation} is not implemented for ${target} deployments`);
    this.name = "UnimplementedError";
  }
}

/**
 * The pod is gone but its volume could not be deleted. Always a platform
 * failure; the volume failure itself is the `cause`.
 */
export class TerminationIncompleteError extends DeploymentError {
  readonly kind = "platform";

  constructor(
    public readonly podId: string,
    public readonly orphanedVolumeId: string,
    public readonly volumeError: DeploymentError,
  ) {
    super(`Pod ${podId} deleted but volume ${orphanedVolumeId} was not: ${volumeError.message}`, {
      cause: volumeError,
    });
    this.name = "TerminationIncompleteError";
  }
}

const NOT_FOUND_PATTERN = /not found|does not exist/i;
const CONFLICT_PATTERN = /already exists|UniqueViolation/i;

/** Map a failure from the platform collaborator onto the local taxonomy. */
export function toDeploymentError(err: unknown, resourceId: string): DeploymentError {
  if (err instanceof DeploymentError) return err;

  if (err instanceof PodsApiError) {
    const { statusCode, platformMessage } = err;
    if (statusCode === null) {
      return new PlatformError(err.message, err.timedOut ? "timeout" : "unreachable", null, { cause: err });
    }
    if (statusCode === 404 || (statusCode === 400 && NOT_FOUND_PATTERN.test(platformMessage))) {
      return new NotFoundError(resourceId, platformMessage);
    }
    if (statusCode === 409 || CONFLICT_PATTERN.test(platformMessage)) {
      return new ConflictError(resourceId, platformMessage);
    }
    return new PlatformError(err.message, reasonForStatus(statusCode), statusCode, { cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new PlatformError(message, "unknown", null, { cause: err });
}

function reasonForStatus(statusCode: number): PlatformFailureReason {
  if (statusCode === 401 || statusCode === 403) return "auth";
  if (statusCode === 400) return "bad_request";
  if (statusCode >= 500 && statusCode < 600) return "server";
  return "unknown";
}
