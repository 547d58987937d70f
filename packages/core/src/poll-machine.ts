/**
 * Poll lifecycle state machine.
 *
 * pending --OBSERVED(pending)--> pending
 * pending --OBSERVED(satisfied)--> satisfied
 * pending --OBSERVED(failed)--> failed
 * pending --DEADLINE | CANCEL--> timedOut
 *
 * All three outcomes are final: once the actor is done, later events are
 * ignored, so a late observation can never overturn a timeout.
 */

import { assign, setup } from "xstate";
import type { ConditionResult } from "./conditions.js";

export interface PollMachineContext {
  attempts: number;
  reason: string | null;
  warning: string | null;
  cancelled: boolean;
}

export type PollMachineEvent =
  | { type: "OBSERVED"; result: ConditionResult }
  | { type: "DEADLINE" }
  | { type: "CANCEL" };

export const pollMachine = setup({
  types: {
    // eslint-disable-next-line @typescript-eslint/consistent-type-assertions -- XState setup requires type assertions for machine type declarations
    context: {} as PollMachineContext,
    // eslint-disable-next-line @typescript-eslint/consistent-type-assertions -- XState setup requires type assertions for machine type declarations
    events: {} as PollMachineEvent,
  },
  guards: {
    isSatisfied: ({ event }) =>
      event.type === "OBSERVED" && event.result.status === "satisfied",
    isFailed: ({ event }) =>
      event.type === "OBSERVED" && event.result.status === "failed",
  },
  actions: {
    countAttempt: assign({
      attempts: ({ context }) => context.attempts + 1,
    }),
    recordWarning: assign({
      warning: ({ context, event }) =>
        event.type === "OBSERVED" && event.result.status === "satisfied"
          ? (event.result.warning ?? null)
          : context.warning,
    }),
    recordFailure: assign({
      reason: ({ context, event }) =>
        event.type === "OBSERVED" && event.result.status === "failed"
          ? event.result.reason
          : context.reason,
    }),
    markCancelled: assign({ cancelled: true }),
  },
}).createMachine({
  id: "poll",
  initial: "pending",
  context: {
    attempts: 0,
    reason: null,
    warning: null,
    cancelled: false,
  },
  states: {
    pending: {
      on: {
        OBSERVED: [
          {
            guard: "isSatisfied",
            target: "satisfied",
            actions: ["countAttempt", "recordWarning"],
          },
          {
            guard: "isFailed",
            target: "failed",
            actions: ["countAttempt", "recordFailure"],
          },
          { actions: "countAttempt" },
        ],
        DEADLINE: { target: "timedOut" },
        CANCEL: { target: "timedOut", actions: "markCancelled" },
      },
    },
    satisfied: { type: "final" },
    failed: { type: "final" },
    timedOut: { type: "final" },
  },
});
