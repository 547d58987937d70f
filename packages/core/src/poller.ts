/**
 * Exponential backoff polling with deadline and cancellation support
 */

import { createActor } from "xstate";
import type { Condition, ConditionResult } from "./conditions.js";
import { errorMessage, isGone, isNotFound } from "./errors.js";
import type { Logger } from "./logger.js";
import { actionsLogger } from "./logger.js";
import { pollMachine } from "./poll-machine.js";

/**
 * Configuration for the exponential backoff poller
 */
export interface PollerConfig {
  /** Initial poll interval in milliseconds, also the floor for jittered intervals */
  initialIntervalMs: number;
  /** Maximum poll interval in milliseconds */
  maxIntervalMs: number;
  /** Multiplier for exponential backoff */
  multiplier: number;
  /** Jitter factor for randomization (0 disables jitter) */
  jitterFactor: number;
  /** Total timeout in milliseconds */
  timeoutMs: number;
}

export const DEFAULT_POLLER_CONFIG: PollerConfig = {
  initialIntervalMs: 1000,
  maxIntervalMs: 15000,
  multiplier: 1.5,
  jitterFactor: 0.1,
  timeoutMs: 600000, // 10 minutes
};

export interface PollOptions<T> extends Partial<PollerConfig> {
  /** Caller cancellation; aborting resolves the poll as timed out */
  signal?: AbortSignal;
  logger?: Logger;
  /** Label used in debug output */
  label?: string;
  /** Called after each snapshot is fetched */
  onPoll?: (snapshot: T, attempt: number, elapsedMs: number) => void;
}

interface PollStats {
  /** Number of fetches that completed */
  attempts: number;
  /** Total time spent polling in milliseconds */
  totalTimeMs: number;
}

export interface PollSatisfied<T> extends PollStats {
  status: "satisfied";
  snapshot: T;
  /** Anomaly the condition reported alongside success */
  warning: string | null;
}

export interface PollFailed<T> extends PollStats {
  status: "failed";
  reason: string;
  snapshot: T | null;
}

export interface PollTimedOut<T> extends PollStats {
  status: "timedOut";
  /** True when the caller's signal ended the poll rather than the deadline */
  cancelled: boolean;
  snapshot: T | null;
}

export type PollOutcome<T> = PollSatisfied<T> | PollFailed<T> | PollTimedOut<T>;

export type FetchFn<T> = (signal: AbortSignal) => Promise<T>;

type Observation<T> =
  | { found: true; snapshot: T; result: ConditionResult }
  | { found: false; result: ConditionResult };

const INTERRUPTED = Symbol("interrupted");

/** Longest delay setTimeout honours; larger values fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Settle with the work's result, or with INTERRUPTED as soon as the signal
 * aborts. A rejection arriving after the interruption is ignored.
 */
function untilAborted<T>(
  work: Promise<T>,
  signal: AbortSignal,
): Promise<T | typeof INTERRUPTED> {
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(INTERRUPTED);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Sleep for a specified duration. Resolves false if the signal aborts first.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve(false);
    };
    const timeoutId = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Calculate next interval with exponential backoff and jitter
 */
export function calculateNextInterval(
  currentInterval: number,
  config: PollerConfig,
): number {
  let nextInterval = Math.min(
    currentInterval * config.multiplier,
    config.maxIntervalMs,
  );

  const jitterRange = nextInterval * config.jitterFactor;
  const jitter = (Math.random() * 2 - 1) * jitterRange;
  nextInterval = Math.max(config.initialIntervalMs, nextInterval + jitter);

  return nextInterval;
}

async function observe<T>(
  fetchFn: FetchFn<T>,
  condition: Condition<T>,
  signal: AbortSignal,
): Promise<Observation<T>> {
  try {
    const snapshot = await fetchFn(signal);
    return { found: true, snapshot, result: condition.check(snapshot) };
  } catch (error) {
    if (isNotFound(error)) {
      return { found: false, result: { status: "pending" } };
    }
    if (isGone(error)) {
      return {
        found: false,
        result: {
          status: "failed",
          reason: `object will never appear: ${errorMessage(error)}`,
        },
      };
    }
    throw error;
  }
}

/**
 * Poll until a condition is satisfied, reports terminal failure, the
 * deadline elapses, or the caller cancels.
 *
 * Not-found fetch errors count as "not yet satisfied"; gone (410) errors
 * resolve as failed; any other fetch error is rethrown unchanged. Both the
 * in-flight fetch and the backoff sleep are abandoned at the deadline, and
 * no fetch is started once an outcome is reached.
 */
export async function pollUntil<T>(
  fetchFn: FetchFn<T>,
  condition: Condition<T>,
  options: PollOptions<T> = {},
): Promise<PollOutcome<T>> {
  const {
    signal,
    logger = actionsLogger,
    label = condition.name,
    onPoll,
    ...overrides
  } = options;
  const config: PollerConfig = { ...DEFAULT_POLLER_CONFIG, ...overrides };

  const startTime = Date.now();
  const deadline = startTime + config.timeoutMs;
  const actor = createActor(pollMachine);
  actor.start();

  // Aborted at the deadline, on caller cancellation, and once polling ends
  const run = new AbortController();
  const onCancel = () => {
    actor.send({ type: "CANCEL" });
    run.abort();
  };
  if (signal?.aborted) {
    onCancel();
  } else {
    signal?.addEventListener("abort", onCancel, { once: true });
  }
  let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  const armDeadline = () => {
    const remaining = deadline - Date.now();
    if (remaining > MAX_TIMER_DELAY_MS) {
      deadlineTimer = setTimeout(armDeadline, MAX_TIMER_DELAY_MS);
      return;
    }
    deadlineTimer = setTimeout(() => {
      actor.send({ type: "DEADLINE" });
      run.abort();
    }, remaining);
  };
  armDeadline();

  // Boxed so that a fetch resolving null still counts as observed
  let last: { snapshot: T } | null = null;
  let interval = config.initialIntervalMs;

  try {
    while (actor.getSnapshot().status !== "done") {
      if (Date.now() >= deadline) {
        actor.send({ type: "DEADLINE" });
        break;
      }

      const observation = await untilAborted(
        observe(fetchFn, condition, run.signal),
        run.signal,
      );
      if (observation === INTERRUPTED) break;

      // The fetch may have returned after the deadline but before the timer ran
      if (Date.now() >= deadline) {
        actor.send({ type: "DEADLINE" });
        break;
      }

      if (observation.found) last = { snapshot: observation.snapshot };
      actor.send({ type: "OBSERVED", result: observation.result });

      const attempts = actor.getSnapshot().context.attempts;
      const elapsed = Date.now() - startTime;
      logger.debug(
        `[${label}] poll ${attempts} (${Math.round(elapsed / 1000)}s): ${observation.found ? observation.result.status : "not found"}`,
      );
      if (observation.found && onPoll) {
        onPoll(observation.snapshot, attempts, elapsed);
      }

      if (actor.getSnapshot().status === "done") break;

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        actor.send({ type: "DEADLINE" });
        break;
      }
      const slept = await sleep(
        Math.min(interval, remaining, MAX_TIMER_DELAY_MS),
        run.signal,
      );
      if (!slept) break;
      interval = calculateNextInterval(interval, config);
    }
  } finally {
    clearTimeout(deadlineTimer);
    signal?.removeEventListener("abort", onCancel);
    run.abort();
  }

  const final = actor.getSnapshot();
  actor.stop();

  const stats: PollStats = {
    attempts: final.context.attempts,
    totalTimeMs: Date.now() - startTime,
  };

  const lastSnapshot = last === null ? null : last.snapshot;

  if (final.matches("satisfied") && last !== null) {
    return {
      status: "satisfied",
      snapshot: last.snapshot,
      warning: final.context.warning,
      ...stats,
    };
  }
  if (final.matches("failed")) {
    return {
      status: "failed",
      reason: final.context.reason ?? "condition reported failure",
      snapshot: lastSnapshot,
      ...stats,
    };
  }
  return {
    status: "timedOut",
    cancelled: final.context.cancelled,
    snapshot: lastSnapshot,
    ...stats,
  };
}
