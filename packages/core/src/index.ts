// Schemas
export {
  WorkloadIdentitySchema,
  WorkloadKindSchema,
  ObjectMetaSchema,
  formatIdentity,
  ConditionStatusSchema,
  WorkloadConditionSchema,
  ResultEntrySchema,
  WorkloadStatusSchema,
  WorkloadSnapshotSchema,
  SUCCEEDED_CONDITION,
  findCondition,
  PodPhaseSchema,
  PodSnapshotSchema,
  isTerminalPodPhase,
} from "./schemas/index.js";
export type {
  WorkloadIdentity,
  WorkloadKind,
  ConditionStatus,
  WorkloadCondition,
  ResultEntry,
  WorkloadSnapshot,
  PodPhase,
  TerminalPodPhase,
  PodSnapshot,
} from "./schemas/index.js";

// Client
export { identityOf } from "./client.js";
export type {
  OrchestratorLike,
  RequestOptions,
  WorkloadObject,
} from "./client.js";

// Errors
export {
  ConvergenceError,
  NotFoundError,
  ConditionFailedError,
  WaitTimeoutError,
  MissingResultError,
  ResultConflictError,
  UnreferencedResultError,
  VerificationMismatchError,
  EmptyProbeOutputError,
  TransportError,
  isConvergenceError,
  isNotFound,
  isGone,
  errorMessage,
} from "./errors.js";
export type { ConvergenceErrorKind, AnyConvergenceError } from "./errors.js";

// Logging
export { actionsLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Conditions
export { workloadSucceeded, workloadFailed, podTerminated } from "./conditions.js";
export type { Condition, ConditionResult } from "./conditions.js";

// Poller
export { pollMachine } from "./poll-machine.js";
export type { PollMachineContext, PollMachineEvent } from "./poll-machine.js";
export {
  pollUntil,
  calculateNextInterval,
  DEFAULT_POLLER_CONFIG,
  MAX_TIMER_DELAY_MS,
} from "./poller.js";
export type {
  PollerConfig,
  PollOptions,
  PollOutcome,
  PollSatisfied,
  PollFailed,
  PollTimedOut,
  FetchFn,
} from "./poller.js";

// Waits
export {
  waitFor,
  waitForTaskRunState,
  waitForPodState,
  fetchWorkload,
  fetchPod,
} from "./wait.js";
export type { WaitOptions } from "./wait.js";

// Extraction
export { extractResults, expectResultValue } from "./extractor.js";

// Probe and verification
export { PodProbeRunner, probePod } from "./probe.js";
export type {
  ProbeRequest,
  ProbeResult,
  ProbeRunner,
  ProbeRunOptions,
} from "./probe.js";
export { verifyRemoteValue, normalizeProbeOutput } from "./verifier.js";
export type {
  VerifyRemoteValueOptions,
  VerificationReport,
} from "./verifier.js";

// Diagnostics
export { formatFailure, summarizeSnapshot } from "./diagnostics.js";
