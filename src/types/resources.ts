// Minimal shapes of the live-resource documents (only fields we read).
// Every field may be absent or null, and so may array entries; a field
// present with the wrong JSON type fails the decode.

import { z } from "zod";

/**
 * Typed value of one feedback entry. The tag is free-form: `Integer`,
 * `Boolean` and `JsonRaw` read their own field, anything else reads `string`.
 * Integers outside the safe range fail the decode.
 */
export const FieldValueSchema = z.object({
  type: z.string().nullish(),
  string: z.string().nullish(),
  integer: z.number().int().safe().nullish(),
  boolean: z.boolean().nullish(),
  jsonRaw: z.string().nullish(),
});

export const FeedbackValueSchema = z.object({
  name: z.string().nullish(),
  fieldValue: FieldValueSchema.nullish(),
});

export type FieldValue = z.infer<typeof FieldValueSchema>;
export type FeedbackValue = z.infer<typeof FeedbackValueSchema>;

// Arrays may hold null entries; readers skip them.
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.array(item.nullable()).nullish();
}

const ResourceMetaSchema = z.object({
  group: z.string().nullish(),
  kind: z.string().nullish(),
  name: z.string().nullish(),
  resource: z.string().nullish(),
});

const ManifestConditionSchema = z.object({
  resourceMeta: ResourceMetaSchema.nullish(),
  statusFeedback: z
    .object({ values: listOf(FeedbackValueSchema) })
    .nullish(),
});

const WorkConditionSchema = z.object({
  type: z.string().nullish(),
  status: z.string().nullish(),
  lastTransitionTime: z.string().nullish(),
});

export const ManifestWorkSchema = z.object({
  metadata: z
    .object({
      name: z.string().nullish(),
      labels: z.record(z.string().nullable()).nullish(),
    })
    .nullish(),
  status: z
    .object({
      conditions: listOf(WorkConditionSchema),
      resourceStatus: z
        .object({ manifests: listOf(ManifestConditionSchema) })
        .nullish(),
    })
    .nullish(),
});

export type ManifestWork = z.infer<typeof ManifestWorkSchema>;
export type ManifestCondition = z.infer<typeof ManifestConditionSchema>;

export const CertificateSchema = z.object({
  spec: z.object({ dnsNames: listOf(z.string()) }).nullish(),
  status: z
    .object({
      conditions: listOf(
        z.object({
          type: z.string().nullish(),
          status: z.string().nullish(),
        }),
      ),
      notAfter: z.string().nullish(),
      renewalTime: z.string().nullish(),
    })
    .nullish(),
});

export type Certificate = z.infer<typeof CertificateSchema>;

export const RESOURCE_KINDS = {
  controlPlane: "HostedCluster",
  workerPool: "NodePool",
  certificate: "Certificate",
} as const;

export const MANAGEMENT_CLUSTER_LABEL = "api.openshift.com/management-cluster";
