/**
 * Normalizers for converting Kubernetes API objects to domain records.
 *
 * All normalizers validate input with Valibot schemas to catch API drift.
 */

import * as v from "valibot";

import {
  type ConditionStatus,
  type PodCondition,
  type PodPhase,
  type PodRecord,
  type PodStatus,
  isConditionStatus,
  isPodPhase,
} from "@/domains/pod";
import type { ServiceRecord } from "@/domains/service";
import {
  type KubePod,
  KubePodListSchema,
  KubePodSchema,
  KubeServiceListSchema,
  KubeServiceSchema,
} from "./schemas";

/** Unrecognised phases collapse to Unknown. */
export const normalizePhase = (phase: string | null | undefined): PodPhase =>
  isPodPhase(phase) ? phase : "Unknown";

/** Unrecognised condition statuses collapse to Unknown. */
export const normalizeConditionStatus = (status: string): ConditionStatus =>
  isConditionStatus(status) ? status : "Unknown";

const normalizePodStatus = (status: KubePod["status"]): PodStatus => {
  const phase = normalizePhase(status?.phase);

  switch (phase) {
    case "Pending":
      return { phase, startTime: status?.startTime ?? null };
    case "Running":
      return {
        phase,
        conditions: (status?.conditions ?? []).map(
          (condition): PodCondition => ({
            type: condition.type,
            status: normalizeConditionStatus(condition.status),
          }),
        ),
      };
    default:
      return { phase };
  }
};

export const normalizeService = (response: unknown): ServiceRecord => {
  const parsed = v.parse(KubeServiceSchema, response);

  return {
    uid: parsed.metadata?.uid ?? null,
    namespace: parsed.metadata?.namespace ?? null,
    name: parsed.metadata?.name ?? null,
    selector: { ...(parsed.spec?.selector ?? {}) },
  };
};

export const normalizePod = (response: unknown): PodRecord => {
  const parsed = v.parse(KubePodSchema, response);

  return {
    namespace: parsed.metadata.namespace,
    name: parsed.metadata.name,
    labels: { ...(parsed.metadata.labels ?? {}) },
    status: normalizePodStatus(parsed.status),
  };
};

export const normalizeServiceList = (response: unknown): ServiceRecord[] =>
  v.parse(KubeServiceListSchema, response).items.map(normalizeService);

export const normalizePodList = (response: unknown): PodRecord[] =>
  v.parse(KubePodListSchema, response).items.map(normalizePod);
