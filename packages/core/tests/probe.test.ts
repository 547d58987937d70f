import { describe, it, expect, vi } from "vitest";
import {
  FakeOrchestrator,
  podSnapshot,
  DEFAULT_NAMESPACE,
} from "@converge/testing";
import { PodProbeRunner, probePod } from "../src/probe.js";
import type { ProbeRequest } from "../src/probe.js";
import { TransportError, WaitTimeoutError } from "../src/errors.js";
import type { Logger } from "../src/logger.js";

const FAST = {
  initialIntervalMs: 10,
  maxIntervalMs: 20,
  multiplier: 1.5,
  jitterFactor: 0,
  timeoutMs: 5000,
};

const request: ProbeRequest = {
  identity: { name: "skopeo-jq", namespace: DEFAULT_NAMESPACE },
  image: "probe-image:latest",
  container: "skopeo",
  command: "echo sha256:abc",
};

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warning: vi.fn(), error: vi.fn() };
}

describe("probePod", () => {
  it("runs the command once through a shell", () => {
    expect(probePod(request)).toEqual({
      apiVersion: "v1",
      kind: "Pod",
      metadata: { name: "skopeo-jq", namespace: DEFAULT_NAMESPACE },
      spec: {
        containers: [
          {
            name: "skopeo",
            image: "probe-image:latest",
            command: ["/bin/sh", "-c"],
            args: ["echo sha256:abc"],
          },
        ],
        restartPolicy: "Never",
      },
    });
  });
});

describe("PodProbeRunner", () => {
  it("creates the pod, waits for it, then reads the container log", async () => {
    const client = new FakeOrchestrator()
      .script(
        "Pod",
        request.identity,
        podSnapshot("skopeo-jq", "Pending"),
        podSnapshot("skopeo-jq", "Running"),
        podSnapshot("skopeo-jq", "Succeeded"),
      )
      .setLogs(request.identity, "skopeo", '"sha256:abc"\n');

    const result = await new PodProbeRunner(client).runProbe(request, {
      logger: createLogger(),
      poller: FAST,
    });

    expect(result).toEqual({
      identity: request.identity,
      phase: "Succeeded",
      output: '"sha256:abc"\n',
    });
    expect(client.calls.map((call) => call.method)).toEqual([
      "create",
      "get",
      "get",
      "get",
      "getLogs",
    ]);
  });

  it("returns a Failed phase and still reads the log", async () => {
    const client = new FakeOrchestrator()
      .script("Pod", request.identity, podSnapshot("skopeo-jq", "Failed"))
      .setLogs(request.identity, "skopeo", "error: manifest unknown\n");
    const logger = createLogger();

    const result = await new PodProbeRunner(client).runProbe(request, {
      logger,
      poller: FAST,
    });

    expect(result.phase).toBe("Failed");
    expect(result.output).toBe("error: manifest unknown\n");
    expect(logger.warning).toHaveBeenCalledWith(
      "Pod skopeo-jq finished in phase Failed (no reason reported)",
    );
  });

  it("wraps a rejected create as a Transport error", async () => {
    const client = new FakeOrchestrator().failCreate(
      "Pod",
      request.identity,
      new Error("quota exceeded"),
    );

    await expect(
      new PodProbeRunner(client).runProbe(request, {
        logger: createLogger(),
        poller: FAST,
      }),
    ).rejects.toThrow(TransportError);
    expect(client.countCalls("get")).toBe(0);
  });

  it("times out when the pod never terminates", async () => {
    const client = new FakeOrchestrator().script(
      "Pod",
      request.identity,
      podSnapshot("skopeo-jq", "Running"),
    );

    await expect(
      new PodProbeRunner(client).runProbe(request, {
        logger: createLogger(),
        poller: { ...FAST, timeoutMs: 50 },
      }),
    ).rejects.toThrow(WaitTimeoutError);
    expect(client.countCalls("getLogs")).toBe(0);
  });

  it("wraps a failed log read as a Transport error", async () => {
    const client = new FakeOrchestrator().script(
      "Pod",
      request.identity,
      podSnapshot("skopeo-jq", "Succeeded"),
    );

    await expect(
      new PodProbeRunner(client).runProbe(request, {
        logger: createLogger(),
        poller: FAST,
      }),
    ).rejects.toThrow(
      "get logs of container skopeo in converge-test/skopeo-jq failed",
    );
  });
});
