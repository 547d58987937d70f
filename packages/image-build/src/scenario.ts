/**
 * End-to-end image-build verification.
 *
 * Builds an image in-cluster from a pinned commit, then checks that the
 * digest the build reported matches the digest the registry serves.
 */

import {
  PodProbeRunner,
  TransportError,
  actionsLogger,
  expectResultValue,
  extractResults,
  fetchWorkload,
  formatFailure,
  formatIdentity,
  identityOf,
  isConvergenceError,
  isNotFound,
  verifyRemoteValue,
  waitForTaskRunState,
  workloadSucceeded,
} from "@converge/core";
import type {
  Logger,
  OrchestratorLike,
  PollerConfig,
  ProbeRunner,
  TerminalPodPhase,
  WorkloadObject,
  WorkloadSnapshot,
} from "@converge/core";
import {
  TASK_RUN_NAME,
  buildTask,
  buildTaskRun,
  gitResource,
  imageResource,
  registryRepository,
  taskRunIdentity,
} from "./builders.js";
import type { ImageBuildConfig } from "./env.js";

export const RESULT_KEYS = ["digest", "commit", "url"] as const;
export const PROBE_POD_NAME = "skopeo-jq";
export const PROBE_CONTAINER = "skopeo";

export interface ImageBuildOptions {
  namespace: string;
  config: ImageBuildConfig;
  /** Defaults to a PodProbeRunner over `client` */
  runner?: ProbeRunner;
  logger?: Logger;
  signal?: AbortSignal;
  /** Overrides the poll settings derived from `config` */
  poller?: Partial<PollerConfig>;
}

export type ImageBuildReport =
  | { status: "skipped"; reason: string }
  | {
      status: "verified";
      repository: string;
      results: Record<string, string>;
      remoteDigest: string;
      probePhase: TerminalPodPhase;
    };

/** Shell pipeline printing the digest the registry serves for `repository` */
export function remoteDigestCommand(repository: string): string {
  return `skopeo inspect --tls-verify=false docker://${repository}:latest | jq '.Digest'`;
}

async function createObject(
  client: OrchestratorLike,
  object: WorkloadObject,
  logger: Logger,
  signal?: AbortSignal,
): Promise<void> {
  const identity = identityOf(object);
  logger.info(`Creating ${object.kind} ${formatIdentity(identity)}`);
  try {
    await client.create(object, { signal });
  } catch (error) {
    throw new TransportError(`create ${object.kind}`, identity, error);
  }
}

async function readTaskRun(
  client: OrchestratorLike,
  namespace: string,
  signal: AbortSignal,
): Promise<WorkloadSnapshot> {
  const identity = taskRunIdentity(namespace);
  try {
    return await fetchWorkload(client, "TaskRun", identity)(signal);
  } catch (error) {
    // The run was seen a moment ago, so a missing run is a read failure
    if (isConvergenceError(error) && !isNotFound(error)) throw error;
    throw new TransportError("get", identity, error);
  }
}

export async function runImageBuildVerification(
  client: OrchestratorLike,
  options: ImageBuildOptions,
): Promise<ImageBuildReport> {
  const {
    namespace,
    config,
    runner = new PodProbeRunner(client),
    logger = actionsLogger,
    signal = new AbortController().signal,
  } = options;

  if (config.skipRootUserTests) {
    logger.info("Skipping image build verification: root user tests disabled");
    return { status: "skipped", reason: "root user tests disabled" };
  }

  const poller: Partial<PollerConfig> = {
    timeoutMs: config.pollTimeoutMs,
    initialIntervalMs: config.pollIntervalMs,
    ...options.poller,
  };
  const repository = registryRepository(namespace, config.imageName);

  try {
    await createObject(
      client,
      gitResource(namespace, config.gitUrl, config.revision),
      logger,
      signal,
    );
    await createObject(client, imageResource(namespace, repository), logger, signal);
    await createObject(
      client,
      buildTask({
        namespace,
        repository,
        kanikoImage: config.kanikoImage,
        registryImage: config.registryImage,
      }),
      logger,
      signal,
    );
    await createObject(
      client,
      buildTaskRun(namespace, config.taskRunTimeout),
      logger,
      signal,
    );

    await waitForTaskRunState(
      client,
      taskRunIdentity(namespace),
      workloadSucceeded(TASK_RUN_NAME),
      "TaskRunCompleted",
      { ...poller, signal, logger },
    );

    const taskRun = await readTaskRun(client, namespace, signal);
    const results = extractResults(taskRun, RESULT_KEYS);
    expectResultValue(results, "commit", config.revision);

    const report = await verifyRemoteValue({
      runner,
      probe: {
        identity: { name: PROBE_POD_NAME, namespace },
        image: config.probeImage,
        container: PROBE_CONTAINER,
        command: remoteDigestCommand(repository),
      },
      expected: results.digest ?? "",
      field: "digest",
      signal,
      logger,
      poller,
    });

    return {
      status: "verified",
      repository,
      results,
      remoteDigest: report.actual,
      probePhase: report.probePhase,
    };
  } catch (error) {
    if (isConvergenceError(error)) logger.error(formatFailure(error));
    throw error;
  }
}
