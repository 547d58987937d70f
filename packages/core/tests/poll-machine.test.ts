import { describe, it, expect } from "vitest";
import { createActor } from "xstate";
import { pollMachine } from "../src/poll-machine.js";

function start() {
  const actor = createActor(pollMachine);
  actor.start();
  return actor;
}

describe("pollMachine", () => {
  it("stays pending and counts attempts while observations are pending", () => {
    const actor = start();
    actor.send({ type: "OBSERVED", result: { status: "pending" } });
    actor.send({ type: "OBSERVED", result: { status: "pending" } });

    const snapshot = actor.getSnapshot();
    expect(snapshot.value).toBe("pending");
    expect(snapshot.context.attempts).toBe(2);
  });

  it("records the warning of a satisfied observation", () => {
    const actor = start();
    actor.send({
      type: "OBSERVED",
      result: { status: "satisfied", warning: "exited non-zero" },
    });

    const snapshot = actor.getSnapshot();
    expect(snapshot.value).toBe("satisfied");
    expect(snapshot.status).toBe("done");
    expect(snapshot.context).toMatchObject({
      attempts: 1,
      warning: "exited non-zero",
    });
  });

  it("records the reason of a failed observation", () => {
    const actor = start();
    actor.send({ type: "OBSERVED", result: { status: "pending" } });
    actor.send({
      type: "OBSERVED",
      result: { status: "failed", reason: "Failed: oops" },
    });

    const snapshot = actor.getSnapshot();
    expect(snapshot.value).toBe("failed");
    expect(snapshot.context).toMatchObject({
      attempts: 2,
      reason: "Failed: oops",
    });
  });

  it("times out on the deadline", () => {
    const actor = start();
    actor.send({ type: "DEADLINE" });

    expect(actor.getSnapshot().value).toBe("timedOut");
    expect(actor.getSnapshot().context.cancelled).toBe(false);
  });

  it("marks cancellation", () => {
    const actor = start();
    actor.send({ type: "CANCEL" });

    expect(actor.getSnapshot().value).toBe("timedOut");
    expect(actor.getSnapshot().context.cancelled).toBe(true);
  });

  it("ignores observations after the deadline", () => {
    const actor = start();
    actor.send({ type: "DEADLINE" });
    actor.send({ type: "OBSERVED", result: { status: "satisfied" } });

    expect(actor.getSnapshot().value).toBe("timedOut");
    expect(actor.getSnapshot().context.attempts).toBe(0);
  });
});
