/**
 * Condition predicates evaluated by the poller on every snapshot.
 *
 * Conditions are stateless: the same snapshot always yields the same result.
 */

import type { PodSnapshot, WorkloadSnapshot } from "./schemas/index.js";
import { SUCCEEDED_CONDITION, findCondition } from "./schemas/index.js";

export type ConditionResult =
  | { status: "pending" }
  | { status: "satisfied"; warning?: string }
  | { status: "failed"; reason: string };

export interface Condition<T> {
  /** Short machine-friendly name, e.g. "TaskRunSucceeded" */
  name: string;
  /** Human-readable description used in error messages */
  description: string;
  check(snapshot: T): ConditionResult;
}

const PENDING: ConditionResult = { status: "pending" };

function describeFailure(reason?: string, message?: string): string {
  if (reason && message) return `${reason}: ${message}`;
  return reason || message || "no reason reported";
}

/**
 * Satisfied once the workload's Succeeded condition is True; terminal failure
 * once it is False.
 */
export function workloadSucceeded(name: string): Condition<WorkloadSnapshot> {
  return {
    name: "WorkloadSucceeded",
    description: `${name} to succeed`,
    check(snapshot) {
      const condition = findCondition(snapshot, SUCCEEDED_CONDITION);
      if (!condition) return PENDING;
      switch (condition.status) {
        case "True":
          return { status: "satisfied" };
        case "False":
          return {
            status: "failed",
            reason: describeFailure(condition.reason, condition.message),
          };
        default:
          return PENDING;
      }
    },
  };
}

/**
 * Inverse of workloadSucceeded, for checks that expect a workload to fail.
 */
export function workloadFailed(name: string): Condition<WorkloadSnapshot> {
  return {
    name: "WorkloadFailed",
    description: `${name} to fail`,
    check(snapshot) {
      const condition = findCondition(snapshot, SUCCEEDED_CONDITION);
      if (!condition) return PENDING;
      switch (condition.status) {
        case "False":
          return { status: "satisfied" };
        case "True":
          return { status: "failed", reason: "succeeded unexpectedly" };
        default:
          return PENDING;
      }
    },
  };
}

/**
 * Satisfied once the pod's containers have terminated, whatever the exit
 * status. A Failed phase still counts as done but carries a warning.
 */
export function podTerminated(name: string): Condition<PodSnapshot> {
  return {
    name: "PodTerminated",
    description: `${name} containers to terminate`,
    check(snapshot) {
      const { phase, reason, message } = snapshot.status;
      if (phase === "Succeeded") return { status: "satisfied" };
      if (phase === "Failed") {
        return {
          status: "satisfied",
          warning: `Pod ${name} finished in phase Failed (${describeFailure(reason, message)})`,
        };
      }
      return PENDING;
    },
  };
}
