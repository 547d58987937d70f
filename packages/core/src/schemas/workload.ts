import { z } from "zod";
import { ObjectMetaSchema } from "./identity.js";

export const ConditionStatusSchema = z.enum(["True", "False", "Unknown"]);

export type ConditionStatus = z.infer<typeof ConditionStatusSchema>;

/**
 * A single entry of `status.conditions` on a workload.
 */
export const WorkloadConditionSchema = z
  .object({
    type: z.string(),
    status: ConditionStatusSchema,
    reason: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type WorkloadCondition = z.infer<typeof WorkloadConditionSchema>;

/**
 * Named, referenced key/value fact reported by a completed workload.
 *
 * `resourceRef.name` is the reference identity; an entry without one is
 * invalid once the workload has succeeded.
 */
export const ResultEntrySchema = z
  .object({
    key: z.string(),
    value: z.string(),
    resourceRef: z
      .object({ name: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ResultEntry = z.infer<typeof ResultEntrySchema>;

export const WorkloadStatusSchema = z
  .object({
    conditions: z.array(WorkloadConditionSchema).default([]),
    resourcesResult: z.array(ResultEntrySchema).default([]),
  })
  .passthrough();

export const WorkloadSnapshotSchema = z
  .object({
    metadata: ObjectMetaSchema,
    spec: z.record(z.string(), z.unknown()).optional(),
    status: WorkloadStatusSchema.default({}),
  })
  .passthrough();

export type WorkloadSnapshot = z.infer<typeof WorkloadSnapshotSchema>;

/** The condition type that carries a workload's terminal outcome. */
export const SUCCEEDED_CONDITION = "Succeeded";

export function findCondition(
  snapshot: WorkloadSnapshot,
  type: string,
): WorkloadCondition | undefined {
  return snapshot.status.conditions.find((c) => c.type === type);
}
