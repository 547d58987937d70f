/**
 * Error taxonomy for polling, extraction and verification.
 *
 * Every error a caller can see extends ConvergenceError and carries a `kind`
 * discriminant plus the context needed to diagnose it without re-querying
 * the orchestration system.
 */

import type { WorkloadIdentity } from "./schemas/index.js";
import { formatIdentity } from "./schemas/index.js";

export type ConvergenceErrorKind =
  | "NotYetReady"
  | "ConditionFailed"
  | "Timeout"
  | "MissingResult"
  | "ResultConflict"
  | "UnreferencedResult"
  | "VerificationMismatch"
  | "EmptyProbeOutput"
  | "Transport";

export abstract class ConvergenceError extends Error {
  abstract readonly kind: ConvergenceErrorKind;
}

/**
 * Raised by orchestration adapters while an object is not yet visible.
 * The poller treats it as "not yet satisfied"; callers never see it from a wait.
 */
export class NotFoundError extends ConvergenceError {
  readonly kind = "NotYetReady";

  constructor(public readonly identity: WorkloadIdentity) {
    super(`${formatIdentity(identity)} not found`);
    this.name = "NotFoundError";
  }
}

export class ConditionFailedError extends ConvergenceError {
  readonly kind = "ConditionFailed";

  constructor(
    public readonly identity: WorkloadIdentity,
    public readonly description: string,
    public readonly reason: string,
    public readonly lastSnapshot: unknown,
  ) {
    super(
      `${formatIdentity(identity)} failed while waiting for ${description}: ${reason}`,
    );
    this.name = "ConditionFailedError";
  }
}

export class WaitTimeoutError extends ConvergenceError {
  readonly kind = "Timeout";

  constructor(
    public readonly identity: WorkloadIdentity,
    public readonly description: string,
    public readonly elapsedMs: number,
    public readonly attempts: number,
    public readonly cancelled: boolean,
    public readonly lastSnapshot: unknown,
  ) {
    super(
      cancelled
        ? `Waiting for ${description} on ${formatIdentity(identity)} was cancelled after ${elapsedMs}ms`
        : `Timed out after ${elapsedMs}ms waiting for ${description} on ${formatIdentity(identity)}`,
    );
    this.name = "WaitTimeoutError";
  }
}

export class MissingResultError extends ConvergenceError {
  readonly kind = "MissingResult";

  constructor(
    public readonly key: string,
    public readonly missingKeys: readonly string[],
    public readonly identity: WorkloadIdentity,
  ) {
    super(
      `Result "${key}" not found with a resource reference in ${formatIdentity(identity)} (missing: ${missingKeys.join(", ")})`,
    );
    this.name = "MissingResultError";
  }
}

export class ResultConflictError extends ConvergenceError {
  readonly kind = "ResultConflict";

  constructor(
    public readonly key: string,
    public readonly values: readonly string[],
    public readonly identity: WorkloadIdentity,
  ) {
    super(
      `Result "${key}" reported with conflicting values in ${formatIdentity(identity)}: ${values.join(", ")}`,
    );
    this.name = "ResultConflictError";
  }
}

export class UnreferencedResultError extends ConvergenceError {
  readonly kind = "UnreferencedResult";

  constructor(
    public readonly keys: readonly string[],
    public readonly identity: WorkloadIdentity,
  ) {
    super(
      `Resource ref not set for results in ${formatIdentity(identity)}: ${keys.join(", ")}`,
    );
    this.name = "UnreferencedResultError";
  }
}

export class VerificationMismatchError extends ConvergenceError {
  readonly kind = "VerificationMismatch";

  constructor(
    public readonly expected: string,
    public readonly actual: string,
    public readonly field: string,
  ) {
    super(`Expected ${field} "${expected}" to match "${actual}"`);
    this.name = "VerificationMismatchError";
  }
}

export class EmptyProbeOutputError extends ConvergenceError {
  readonly kind = "EmptyProbeOutput";

  constructor(
    public readonly probe: WorkloadIdentity,
    public readonly rawOutput: string,
  ) {
    super(`Probe ${formatIdentity(probe)} produced no comparable output`);
    this.name = "EmptyProbeOutputError";
  }
}

export class TransportError extends ConvergenceError {
  readonly kind = "Transport";

  constructor(
    public readonly operation: string,
    public readonly identity: WorkloadIdentity,
    cause: unknown,
  ) {
    super(
      `${operation} ${formatIdentity(identity)} failed: ${errorMessage(cause)}`,
      { cause },
    );
    this.name = "TransportError";
  }
}

export type AnyConvergenceError =
  | NotFoundError
  | ConditionFailedError
  | WaitTimeoutError
  | MissingResultError
  | ResultConflictError
  | UnreferencedResultError
  | VerificationMismatchError
  | EmptyProbeOutputError
  | TransportError;

export function isConvergenceError(
  error: unknown,
): error is AnyConvergenceError {
  return error instanceof ConvergenceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP-like status carried by an API client error, if any.
 */
function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  for (const prop of ["statusCode", "status", "code"] as const) {
    if (prop in error) {
      const value: unknown = Reflect.get(error, prop);
      if (typeof value === "number") return value;
    }
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof NotFoundError || statusOf(error) === 404;
}

/** The object was deleted and will never become visible again. */
export function isGone(error: unknown): boolean {
  return statusOf(error) === 410;
}
