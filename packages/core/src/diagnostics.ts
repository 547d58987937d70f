/**
 * Human-readable diagnosis for verification failures
 */

import type { AnyConvergenceError } from "./errors.js";
import { errorMessage } from "./errors.js";
import { formatIdentity } from "./schemas/index.js";

const SNAPSHOT_LIMIT = 2000;

/**
 * Compact JSON of the last observed snapshot, truncated for log output.
 */
export function summarizeSnapshot(snapshot: unknown): string {
  if (snapshot === null || snapshot === undefined) return "none observed";
  const json = JSON.stringify(snapshot);
  return json.length > SNAPSHOT_LIMIT
    ? `${json.slice(0, SNAPSHOT_LIMIT)}...`
    : json;
}

function detailLines(error: AnyConvergenceError): string[] {
  switch (error.kind) {
    case "NotYetReady":
      return [`  Object: ${formatIdentity(error.identity)}`];
    case "ConditionFailed":
      return [
        `  Object: ${formatIdentity(error.identity)}`,
        `  Waiting For: ${error.description}`,
        `  Reason: ${error.reason}`,
        `  Last Snapshot: ${summarizeSnapshot(error.lastSnapshot)}`,
      ];
    case "Timeout":
      return [
        `  Object: ${formatIdentity(error.identity)}`,
        `  Waiting For: ${error.description}`,
        `  Elapsed: ${error.elapsedMs}ms over ${error.attempts} poll(s)`,
        `  Cancelled: ${error.cancelled ? "yes" : "no"}`,
        `  Last Snapshot: ${summarizeSnapshot(error.lastSnapshot)}`,
      ];
    case "MissingResult":
      return [
        `  Object: ${formatIdentity(error.identity)}`,
        `  Missing Keys: ${error.missingKeys.join(", ")}`,
      ];
    case "ResultConflict":
      return [
        `  Object: ${formatIdentity(error.identity)}`,
        `  Key: ${error.key}`,
        `  Values: ${error.values.join(", ")}`,
      ];
    case "UnreferencedResult":
      return [
        `  Object: ${formatIdentity(error.identity)}`,
        `  Keys: ${error.keys.join(", ")}`,
      ];
    case "VerificationMismatch":
      return [
        `  Field: ${error.field}`,
        `  Expected: ${error.expected}`,
        `  Actual: ${error.actual}`,
      ];
    case "EmptyProbeOutput":
      return [
        `  Probe: ${formatIdentity(error.probe)}`,
        `  Raw Output: ${JSON.stringify(error.rawOutput)}`,
      ];
    case "Transport":
      return [
        `  Operation: ${error.operation}`,
        `  Object: ${formatIdentity(error.identity)}`,
        `  Cause: ${errorMessage(error.cause)}`,
      ];
  }
}

export function formatFailure(error: AnyConvergenceError): string {
  return [`Kind: ${error.kind}`, `Error: ${error.message}`, "", "Details:"]
    .concat(detailLines(error))
    .join("\n");
}
