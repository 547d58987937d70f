/**
 * Object builders for the image-build workloads.
 */

import type { WorkloadIdentity, WorkloadObject } from "@converge/core";

export const TASK_NAME = "kanikotask";
export const TASK_RUN_NAME = "kanikotask-run";
export const GIT_RESOURCE_NAME = "go-example-git";
export const IMAGE_RESOURCE_NAME = "go-example-image";

const PIPELINE_API = "tekton.dev/v1beta1";
const RESOURCE_API = "tekton.dev/v1alpha1";

const GIT_INPUT = "gitsource";
const IMAGE_OUTPUT = "builtImage";

/** Registry address reachable from inside `namespace` */
export function registryHost(namespace: string): string {
  return `registry.${namespace}:5000`;
}

export function registryRepository(namespace: string, imageName: string): string {
  return `${registryHost(namespace)}/${imageName}`;
}

export function gitResource(
  namespace: string,
  url: string,
  revision: string,
): WorkloadObject {
  return {
    apiVersion: RESOURCE_API,
    kind: "PipelineResource",
    metadata: { name: GIT_RESOURCE_NAME, namespace },
    spec: {
      type: "git",
      params: [
        { name: "url", value: url },
        { name: "revision", value: revision },
      ],
    },
  };
}

export function imageResource(namespace: string, repository: string): WorkloadObject {
  return {
    apiVersion: RESOURCE_API,
    kind: "PipelineResource",
    metadata: { name: IMAGE_RESOURCE_NAME, namespace },
    spec: {
      type: "image",
      params: [{ name: "url", value: repository }],
    },
  };
}

export interface BuildTaskInput {
  namespace: string;
  repository: string;
  kanikoImage: string;
  registryImage: string;
}

/**
 * Task that builds the checked-out sources with kaniko and pushes the image
 * to a registry sidecar. The build step runs as root.
 */
export function buildTask(input: BuildTaskInput): WorkloadObject {
  const { namespace, repository, kanikoImage, registryImage } = input;
  return {
    apiVersion: PIPELINE_API,
    kind: "Task",
    metadata: { name: TASK_NAME, namespace },
    spec: {
      resources: {
        inputs: [{ name: GIT_INPUT, type: "git" }],
        outputs: [{ name: IMAGE_OUTPUT, type: "image" }],
      },
      steps: [
        {
          name: "kaniko",
          image: kanikoImage,
          args: [
            `--dockerfile=/workspace/${GIT_INPUT}/integration/dockerfiles/Dockerfile_test_label`,
            `--destination=${repository}`,
            `--context=/workspace/${GIT_INPUT}`,
            `--oci-layout-path=/workspace/output/${IMAGE_OUTPUT}`,
            "--insecure",
            "--insecure-pull",
            `--insecure-registry=${registryHost(namespace)}/`,
          ],
          securityContext: { runAsUser: 0 },
        },
      ],
      sidecars: [{ name: "registry", image: registryImage }],
    },
  };
}

export function buildTaskRun(namespace: string, timeout: string): WorkloadObject {
  return {
    apiVersion: PIPELINE_API,
    kind: "TaskRun",
    metadata: { name: TASK_RUN_NAME, namespace },
    spec: {
      taskRef: { name: TASK_NAME },
      timeout,
      resources: {
        inputs: [{ name: GIT_INPUT, resourceRef: { name: GIT_RESOURCE_NAME } }],
        outputs: [
          { name: IMAGE_OUTPUT, resourceRef: { name: IMAGE_RESOURCE_NAME } },
        ],
      },
    },
  };
}

export function taskRunIdentity(namespace: string): WorkloadIdentity {
  return { name: TASK_RUN_NAME, namespace };
}
