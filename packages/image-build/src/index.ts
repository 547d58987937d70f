export { loadConfig } from "./env.js";
export type { ImageBuildConfig } from "./env.js";
export {
  TASK_NAME,
  TASK_RUN_NAME,
  GIT_RESOURCE_NAME,
  IMAGE_RESOURCE_NAME,
  registryHost,
  registryRepository,
  gitResource,
  imageResource,
  buildTask,
  buildTaskRun,
  taskRunIdentity,
} from "./builders.js";
export type { BuildTaskInput } from "./builders.js";
export {
  runImageBuildVerification,
  remoteDigestCommand,
  RESULT_KEYS,
  PROBE_POD_NAME,
  PROBE_CONTAINER,
} from "./scenario.js";
export type { ImageBuildOptions, ImageBuildReport } from "./scenario.js";
