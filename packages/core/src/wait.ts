/**
 * Typed waits over the orchestration client.
 *
 * These turn a PollOutcome into either the satisfying snapshot or one of the
 * ConditionFailed / Timeout / Transport errors.
 */

import type { OrchestratorLike } from "./client.js";
import type { Condition } from "./conditions.js";
import {
  ConditionFailedError,
  ConvergenceError,
  TransportError,
  WaitTimeoutError,
  isGone,
  isNotFound,
} from "./errors.js";
import { actionsLogger } from "./logger.js";
import type { FetchFn, PollOptions, PollSatisfied } from "./poller.js";
import { pollUntil } from "./poller.js";
import type {
  PodSnapshot,
  WorkloadIdentity,
  WorkloadKind,
  WorkloadSnapshot,
} from "./schemas/index.js";
import {
  PodSnapshotSchema,
  WorkloadSnapshotSchema,
  formatIdentity,
} from "./schemas/index.js";

export type WaitOptions<T> = PollOptions<T>;

/**
 * Read a workload and validate its shape. Not-found errors pass through
 * untouched so the poller can keep waiting.
 */
export function fetchWorkload(
  client: OrchestratorLike,
  kind: Exclude<WorkloadKind, "Pod">,
  identity: WorkloadIdentity,
): FetchFn<WorkloadSnapshot> {
  return async (signal) => {
    const raw = await client.get(kind, identity, { signal });
    const parsed = WorkloadSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError(`decode ${kind}`, identity, parsed.error);
    }
    return parsed.data;
  };
}

export function fetchPod(
  client: OrchestratorLike,
  identity: WorkloadIdentity,
): FetchFn<PodSnapshot> {
  return async (signal) => {
    const raw = await client.get("Pod", identity, { signal });
    const parsed = PodSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError("decode Pod", identity, parsed.error);
    }
    return parsed.data;
  };
}

/**
 * Wait for `condition` to hold on the object behind `fetchFn`.
 *
 * @param description What is being waited for, e.g. "TaskRunCompleted"
 * @returns The satisfied outcome, including any warning the condition raised
 */
export async function waitFor<T>(
  identity: WorkloadIdentity,
  fetchFn: FetchFn<T>,
  condition: Condition<T>,
  description: string,
  options: WaitOptions<T> = {},
): Promise<PollSatisfied<T>> {
  const logger = options.logger ?? actionsLogger;

  const guardedFetch: FetchFn<T> = async (signal) => {
    try {
      return await fetchFn(signal);
    } catch (error) {
      if (
        error instanceof ConvergenceError ||
        isNotFound(error) ||
        isGone(error)
      ) {
        throw error;
      }
      throw new TransportError("get", identity, error);
    }
  };

  logger.info(
    `Waiting for ${condition.description} (${description}) on ${formatIdentity(identity)}`,
  );
  const outcome = await pollUntil(guardedFetch, condition, {
    label: description,
    ...options,
  });

  switch (outcome.status) {
    case "satisfied":
      if (outcome.warning) logger.warning(outcome.warning);
      logger.info(
        `${description} reached on ${formatIdentity(identity)} after ${outcome.attempts} poll(s)`,
      );
      return outcome;
    case "failed":
      throw new ConditionFailedError(
        identity,
        condition.description,
        outcome.reason,
        outcome.snapshot,
      );
    case "timedOut":
      throw new WaitTimeoutError(
        identity,
        condition.description,
        outcome.totalTimeMs,
        outcome.attempts,
        outcome.cancelled,
        outcome.snapshot,
      );
  }
}

export function waitForTaskRunState(
  client: OrchestratorLike,
  identity: WorkloadIdentity,
  condition: Condition<WorkloadSnapshot>,
  description: string,
  options?: WaitOptions<WorkloadSnapshot>,
): Promise<PollSatisfied<WorkloadSnapshot>> {
  return waitFor(
    identity,
    fetchWorkload(client, "TaskRun", identity),
    condition,
    description,
    options,
  );
}

export function waitForPodState(
  client: OrchestratorLike,
  identity: WorkloadIdentity,
  condition: Condition<PodSnapshot>,
  description: string,
  options?: WaitOptions<PodSnapshot>,
): Promise<PollSatisfied<PodSnapshot>> {
  return waitFor(
    identity,
    fetchPod(client, identity),
    condition,
    description,
    options,
  );
}
