/**
 * Valibot schemas for the subset of Kubernetes core/v1 objects the check reads.
 *
 * The client deserializes timestamps into Date instances; raw JSON carries
 * RFC 3339 strings. Both are accepted.
 */

import * as v from "valibot";

const labelMapSchema = v.record(v.string(), v.string());

const timestampSchema = v.union([
  v.date(),
  v.pipe(
    v.string(),
    v.isoTimestamp(),
    v.transform((input) => new Date(input)),
  ),
]);

export const KubeObjectMetaSchema = v.object({
  uid: v.nullish(v.string()),
  name: v.nullish(v.string()),
  namespace: v.nullish(v.string()),
  labels: v.nullish(labelMapSchema),
});

export const KubeServiceSchema = v.object({
  metadata: v.nullish(KubeObjectMetaSchema),
  spec: v.nullish(
    v.object({
      selector: v.nullish(labelMapSchema),
    }),
  ),
});

export const KubePodConditionSchema = v.object({
  type: v.string(),
  status: v.string(),
});

export const KubePodSchema = v.object({
  metadata: v.object({
    name: v.string(),
    namespace: v.string(),
    labels: v.nullish(labelMapSchema),
  }),
  status: v.nullish(
    v.object({
      phase: v.nullish(v.string()),
      startTime: v.nullish(timestampSchema),
      conditions: v.nullish(v.array(KubePodConditionSchema)),
    }),
  ),
});

export const KubeServiceListSchema = v.object({
  items: v.array(v.unknown()),
});

export const KubePodListSchema = v.object({
  items: v.array(v.unknown()),
});

/** `Status` body returned by the API server on errors. */
export const KubeStatusSchema = v.object({
  kind: v.literal("Status"),
  message: v.pipe(v.string(), v.minLength(1)),
  reason: v.optional(v.string()),
});

export type KubePod = v.InferOutput<typeof KubePodSchema>;
