export {
  WorkloadIdentitySchema,
  WorkloadKindSchema,
  ObjectMetaSchema,
  formatIdentity,
} from "./identity.js";
export type { WorkloadIdentity, WorkloadKind } from "./identity.js";

export {
  ConditionStatusSchema,
  WorkloadConditionSchema,
  ResultEntrySchema,
  WorkloadStatusSchema,
  WorkloadSnapshotSchema,
  SUCCEEDED_CONDITION,
  findCondition,
} from "./workload.js";
export type {
  ConditionStatus,
  WorkloadCondition,
  ResultEntry,
  WorkloadSnapshot,
} from "./workload.js";

export {
  PodPhaseSchema,
  PodSnapshotSchema,
  isTerminalPodPhase,
} from "./pod.js";
export type { PodPhase, TerminalPodPhase, PodSnapshot } from "./pod.js";
