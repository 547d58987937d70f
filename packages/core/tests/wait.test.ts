import { describe, it, expect, vi } from "vitest";
import {
  FakeOrchestrator,
  HANG,
  taskRunSnapshot,
  DEFAULT_NAMESPACE,
} from "@converge/testing";
import { waitForTaskRunState, waitFor } from "../src/wait.js";
import { workloadSucceeded } from "../src/conditions.js";
import {
  ConditionFailedError,
  TransportError,
  WaitTimeoutError,
} from "../src/errors.js";
import type { Logger } from "../src/logger.js";

const FAST = {
  initialIntervalMs: 10,
  maxIntervalMs: 20,
  multiplier: 1.5,
  jitterFactor: 0,
};

const run = { name: "kanikotask-run", namespace: DEFAULT_NAMESPACE };

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warning: vi.fn(), error: vi.fn() };
}

describe("waitForTaskRunState", () => {
  it("returns the snapshot once the run succeeds", async () => {
    const client = new FakeOrchestrator().script(
      "TaskRun",
      run,
      taskRunSnapshot({ name: run.name, succeeded: "Unknown" }),
      taskRunSnapshot({ name: run.name, succeeded: "True" }),
    );

    const outcome = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      { ...FAST, timeoutMs: 5000, logger: createLogger() },
    );

    expect(outcome.snapshot.status.conditions[0]?.status).toBe("True");
    expect(outcome.attempts).toBe(2);
    expect(client.countCalls("get", run.name)).toBe(2);
  });

  it("keeps waiting while the run is not yet visible", async () => {
    const client = new FakeOrchestrator();
    setTimeout(() => {
      client.script(
        "TaskRun",
        run,
        taskRunSnapshot({ name: run.name, succeeded: "True" }),
      );
    }, 30);

    const outcome = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      { ...FAST, timeoutMs: 5000, logger: createLogger() },
    );

    expect(outcome.status).toBe("satisfied");
    expect(outcome.attempts).toBeGreaterThan(1);
  });

  it("throws ConditionFailed with the last snapshot when the run fails", async () => {
    const failed = taskRunSnapshot({
      name: run.name,
      succeeded: "False",
      reason: "Failed",
      message: "build step failed",
    });
    const client = new FakeOrchestrator().script("TaskRun", run, failed);

    const error = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      { ...FAST, timeoutMs: 5000, logger: createLogger() },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConditionFailedError);
    expect(error).toMatchObject({
      kind: "ConditionFailed",
      identity: run,
      description: "kanikotask-run to succeed",
      reason: "Failed: build step failed",
      lastSnapshot: failed,
    });
  });

  it("throws Timeout when the run never finishes", async () => {
    const client = new FakeOrchestrator().script(
      "TaskRun",
      run,
      taskRunSnapshot({ name: run.name, succeeded: "Unknown" }),
    );

    const error = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      { ...FAST, timeoutMs: 60, logger: createLogger() },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({ kind: "Timeout", cancelled: false });
  });

  it("abandons an in-flight read when the caller cancels", async () => {
    const client = new FakeOrchestrator().script("TaskRun", run, HANG);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const error = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      {
        ...FAST,
        timeoutMs: 5000,
        signal: controller.signal,
        logger: createLogger(),
      },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({ cancelled: true, attempts: 0 });
    expect(client.countCalls("get", run.name)).toBe(1);
  });

  it("wraps API failures as Transport errors", async () => {
    const client = new FakeOrchestrator().script(
      "TaskRun",
      run,
      Object.assign(new Error("unauthorized"), { statusCode: 401 }),
    );

    const error = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      { ...FAST, timeoutMs: 5000, logger: createLogger() },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "get converge-test/kanikotask-run failed: unauthorized",
    });
  });

  it("rejects snapshots that do not look like a workload", async () => {
    const client = new FakeOrchestrator().script("TaskRun", run, {
      metadata: { name: run.name },
    });

    const error = await waitForTaskRunState(
      client,
      run,
      workloadSucceeded(run.name),
      "TaskRunCompleted",
      { ...FAST, timeoutMs: 5000, logger: createLogger() },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ operation: "decode TaskRun" });
  });
});

describe("waitFor", () => {
  it("logs the condition's warning", async () => {
    const logger = createLogger();

    await waitFor(
      run,
      async () => "done",
      {
        name: "Done",
        description: "done",
        check: () => ({ status: "satisfied", warning: "odd exit" }),
      },
      "Done",
      { ...FAST, timeoutMs: 1000, logger },
    );

    expect(logger.warning).toHaveBeenCalledWith("odd exit");
  });
});
