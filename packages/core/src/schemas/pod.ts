import { z } from "zod";
import { ObjectMetaSchema } from "./identity.js";

export const PodPhaseSchema = z.enum([
  "Pending",
  "Running",
  "Succeeded",
  "Failed",
  "Unknown",
]);

export type PodPhase = z.infer<typeof PodPhaseSchema>;

/** Phases after which a pod's containers never run again. */
export type TerminalPodPhase = Extract<PodPhase, "Succeeded" | "Failed">;

export const PodSnapshotSchema = z
  .object({
    metadata: ObjectMetaSchema,
    status: z
      .object({
        phase: PodPhaseSchema.default("Pending"),
        message: z.string().optional(),
        reason: z.string().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type PodSnapshot = z.infer<typeof PodSnapshotSchema>;

export function isTerminalPodPhase(phase: PodPhase): phase is TerminalPodPhase {
  return phase === "Succeeded" || phase === "Failed";
}
