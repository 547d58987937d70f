/**
 * Minimal orchestration-client interface.
 *
 * The consumer passes an adapter over their own API client. This keeps the
 * core free of a hard dependency on any particular orchestration SDK.
 */

import type { WorkloadIdentity, WorkloadKind } from "./schemas/index.js";

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Declarative object submitted to the orchestration API.
 */
export interface WorkloadObject {
  apiVersion: string;
  kind: WorkloadKind;
  metadata: WorkloadIdentity & {
    labels?: Record<string, string>;
  };
  spec: Record<string, unknown>;
}

export interface OrchestratorLike {
  create(object: WorkloadObject, options?: RequestOptions): Promise<unknown>;
  /**
   * Reads one object. Rejects with a not-found error (see `isNotFound`)
   * while the object is not yet visible.
   */
  get(
    kind: WorkloadKind,
    identity: WorkloadIdentity,
    options?: RequestOptions,
  ): Promise<unknown>;
  getLogs(
    pod: WorkloadIdentity,
    container: string,
    options?: RequestOptions,
  ): Promise<string>;
}

export function identityOf(object: WorkloadObject): WorkloadIdentity {
  return { name: object.metadata.name, namespace: object.metadata.namespace };
}
