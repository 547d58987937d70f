/**
 * Cross-system verification: check a value asserted by a workload against
 * the same value observed independently by a probe.
 */

import { EmptyProbeOutputError, VerificationMismatchError } from "./errors.js";
import type { Logger } from "./logger.js";
import { actionsLogger } from "./logger.js";
import type { PollerConfig } from "./poller.js";
import type {
  ProbeRequest,
  ProbeRunner,
} from "./probe.js";
import type { TerminalPodPhase } from "./schemas/index.js";
import { formatIdentity } from "./schemas/index.js";

export interface VerifyRemoteValueOptions {
  runner: ProbeRunner;
  probe: ProbeRequest;
  /** Value reported by the primary workload */
  expected: string;
  /** Name of the compared field, used in mismatch errors */
  field?: string;
  signal?: AbortSignal;
  logger?: Logger;
  poller?: Partial<PollerConfig>;
}

export interface VerificationReport {
  field: string;
  expected: string;
  actual: string;
  /** Failed means the probe exited non-zero but still printed a matching value */
  probePhase: TerminalPodPhase;
}

/**
 * Reduce raw probe log output to a bare comparison value: every double
 * quote removed, surrounding whitespace trimmed.
 */
export function normalizeProbeOutput(output: string): string {
  return output.replaceAll('"', "").trim();
}

/**
 * Run one probe and compare its normalized output byte-for-byte with
 * `expected`. A Failed probe phase is logged and still compared.
 *
 * @throws WaitTimeoutError when the probe never terminates
 * @throws EmptyProbeOutputError when the probe printed nothing usable
 * @throws VerificationMismatchError when the values differ
 */
export async function verifyRemoteValue(
  options: VerifyRemoteValueOptions,
): Promise<VerificationReport> {
  const {
    runner,
    probe,
    expected,
    field = "value",
    signal,
    logger = actionsLogger,
    poller,
  } = options;

  const result = await runner.runProbe(probe, { signal, logger, poller });
  if (result.phase === "Failed") {
    logger.warning(
      `Probe ${formatIdentity(result.identity)} failed; comparing its output anyway`,
    );
  }

  const actual = normalizeProbeOutput(result.output);
  if (actual === "") {
    throw new EmptyProbeOutputError(result.identity, result.output);
  }
  if (actual !== expected) {
    throw new VerificationMismatchError(expected, actual, field);
  }

  logger.info(`Remote ${field} matches: ${actual}`);
  return { field, expected, actual, probePhase: result.phase };
}
