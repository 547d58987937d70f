import { z } from "zod";

/**
 * (name, namespace) pair identifying an orchestration object.
 */
export const WorkloadIdentitySchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
});

export type WorkloadIdentity = z.infer<typeof WorkloadIdentitySchema>;

export const WorkloadKindSchema = z.enum([
  "PipelineResource",
  "Task",
  "TaskRun",
  "Pod",
]);

export type WorkloadKind = z.infer<typeof WorkloadKindSchema>;

export const ObjectMetaSchema = z
  .object({
    name: z.string(),
    namespace: z.string(),
  })
  .passthrough();

export function formatIdentity(identity: WorkloadIdentity): string {
  return `${identity.namespace}/${identity.name}`;
}
