/**
 * Pod records, status variants, and readiness verdicts.
 */

import * as v from "valibot";

export type PodPhase = "Pending" | "Running" | "Succeeded" | "Failed" | "Unknown";

export type ConditionStatus = "True" | "False" | "Unknown";

export interface PodCondition {
  type: string;
  status: ConditionStatus;
}

/**
 * Pod status as a closed union over the phase. Only the data each branch of
 * the readiness state machine reads is carried.
 */
export type PodStatus =
  | { phase: "Pending"; startTime: Date | null }
  | { phase: "Running"; conditions: readonly PodCondition[] }
  | { phase: "Succeeded" | "Failed" | "Unknown" };

export interface PodRecord {
  namespace: string;
  name: string;
  labels: Readonly<Record<string, string>>;
  status: PodStatus;
}

/**
 * SKIPPED: the pod gives no evidence either way (Pending without a start time).
 */
export type PodVerdict = "AVAILABLE" | "UNAVAILABLE" | "SKIPPED";

/** Wall-clock source, injected so evaluation is deterministic under test. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const podPhaseSchema = v.picklist(["Pending", "Running", "Succeeded", "Failed", "Unknown"]);

export const conditionStatusSchema = v.picklist(["True", "False", "Unknown"]);

export const isPodPhase = (value: unknown): value is PodPhase => v.is(podPhaseSchema, value);

export const isConditionStatus = (value: unknown): value is ConditionStatus =>
  v.is(conditionStatusSchema, value);

/** `namespace.name`, the identifier reported for an unavailable pod. */
export const podIdentifier = (pod: PodRecord): string => `${pod.namespace}.${pod.name}`;
