/**
 * Probe capability: launch a short-lived job, wait for it, read its log.
 *
 * The verifier only depends on ProbeRunner, so it can be exercised against a
 * fake runner; PodProbeRunner is the orchestration-backed implementation.
 */

import type { OrchestratorLike, WorkloadObject } from "./client.js";
import { TransportError } from "./errors.js";
import type { Logger } from "./logger.js";
import { actionsLogger } from "./logger.js";
import type { PollerConfig } from "./poller.js";
import { podTerminated } from "./conditions.js";
import type {
  TerminalPodPhase,
  WorkloadIdentity,
} from "./schemas/index.js";
import { formatIdentity, isTerminalPodPhase } from "./schemas/index.js";
import { waitForPodState } from "./wait.js";

export interface ProbeRequest {
  /** Identity of the probe pod to create */
  identity: WorkloadIdentity;
  /** Image providing the inspection tooling */
  image: string;
  /** Container whose log carries the probe's answer */
  container: string;
  /** Shell command; its stdout is the probe's return value */
  command: string;
}

export interface ProbeResult {
  identity: WorkloadIdentity;
  phase: TerminalPodPhase;
  output: string;
}

export interface ProbeRunOptions {
  signal?: AbortSignal;
  logger?: Logger;
  poller?: Partial<PollerConfig>;
}

export interface ProbeRunner {
  runProbe(request: ProbeRequest, options?: ProbeRunOptions): Promise<ProbeResult>;
}

/**
 * Pod that runs `command` once through `/bin/sh -c` and never restarts.
 */
export function probePod(request: ProbeRequest): WorkloadObject {
  return {
    apiVersion: "v1",
    kind: "Pod",
    metadata: {
      name: request.identity.name,
      namespace: request.identity.namespace,
    },
    spec: {
      containers: [
        {
          name: request.container,
          image: request.image,
          command: ["/bin/sh", "-c"],
          args: [request.command],
        },
      ],
      restartPolicy: "Never",
    },
  };
}

export class PodProbeRunner implements ProbeRunner {
  constructor(private readonly client: OrchestratorLike) {}

  async runProbe(
    request: ProbeRequest,
    options: ProbeRunOptions = {},
  ): Promise<ProbeResult> {
    const { signal, logger = actionsLogger, poller } = options;
    const { identity } = request;

    logger.info(`Creating probe pod ${formatIdentity(identity)}`);
    try {
      await this.client.create(probePod(request), { signal });
    } catch (error) {
      throw new TransportError("create Pod", identity, error);
    }

    const outcome = await waitForPodState(
      this.client,
      identity,
      podTerminated(identity.name),
      "PodContainersTerminated",
      { ...poller, signal, logger },
    );
    const { phase } = outcome.snapshot.status;
    if (!isTerminalPodPhase(phase)) {
      // podTerminated only accepts terminal phases
      throw new TransportError(
        "read Pod",
        identity,
        new Error(`pod reported non-terminal phase ${phase} after terminating`),
      );
    }

    let output: string;
    try {
      output = await this.client.getLogs(identity, request.container, {
        signal,
      });
    } catch (error) {
      throw new TransportError(
        `get logs of container ${request.container} in`,
        identity,
        error,
      );
    }

    return { identity, phase, output };
  }
}
