import { z } from "zod";
import { parseEnv } from "znv";
import { MAX_TIMER_DELAY_MS } from "@converge/core";

const KANIKO_IMAGE = "gcr.io/kaniko-project/executor:v1.3.0";
const PROBE_IMAGE = "gcr.io/tekton-releases/dogfooding/skopeo:latest";
const GIT_URL = "https://github.com/GoogleContainerTools/kaniko";
// Fixed commit of the build context, so the reported commit is predictable
const GIT_REVISION = "a310cc6d1cd449f95cedd23393de766fdc649651";

export interface ImageBuildConfig {
  kanikoImage: string;
  registryImage: string;
  probeImage: string;
  imageName: string;
  gitUrl: string;
  revision: string;
  skipRootUserTests: boolean;
  /** Duration string handed to the task run, e.g. "2m" */
  taskRunTimeout: string;
  pollTimeoutMs: number;
  pollIntervalMs: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ImageBuildConfig {
  const parsed = parseEnv(env, {
    CONVERGE_KANIKO_IMAGE: z.string().min(1).default(KANIKO_IMAGE),
    CONVERGE_REGISTRY_IMAGE: z.string().min(1).default("registry"),
    CONVERGE_PROBE_IMAGE: z.string().min(1).default(PROBE_IMAGE),
    CONVERGE_IMAGE_NAME: z.string().min(1).default("kanikotasktest"),
    CONVERGE_GIT_URL: z.string().url().default(GIT_URL),
    CONVERGE_GIT_REVISION: z.string().min(1).default(GIT_REVISION),
    CONVERGE_SKIP_ROOT_USER_TESTS: z.boolean().default(false),
    CONVERGE_TASKRUN_TIMEOUT: z
      .string()
      .regex(/^(\d+(ns|us|ms|s|m|h))+$/)
      .default("2m"),
    CONVERGE_POLL_TIMEOUT_MS: z
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_DELAY_MS)
      .default(600_000),
    CONVERGE_POLL_INTERVAL_MS: z
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_DELAY_MS)
      .default(1000),
  });

  return {
    kanikoImage: parsed.CONVERGE_KANIKO_IMAGE,
    registryImage: parsed.CONVERGE_REGISTRY_IMAGE,
    probeImage: parsed.CONVERGE_PROBE_IMAGE,
    imageName: parsed.CONVERGE_IMAGE_NAME,
    gitUrl: parsed.CONVERGE_GIT_URL,
    revision: parsed.CONVERGE_GIT_REVISION,
    skipRootUserTests: parsed.CONVERGE_SKIP_ROOT_USER_TESTS,
    taskRunTimeout: parsed.CONVERGE_TASKRUN_TIMEOUT,
    pollTimeoutMs: parsed.CONVERGE_POLL_TIMEOUT_MS,
    pollIntervalMs: parsed.CONVERGE_POLL_INTERVAL_MS,
  };
}
