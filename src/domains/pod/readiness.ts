/**
 * Pod readiness state machine.
 *
 * - Pending: no start time -> SKIPPED. Otherwise AVAILABLE while the time
 *   since start (whole seconds) is below the grace period, UNAVAILABLE after.
 * - Running: AVAILABLE only with a Ready condition whose status is True.
 * - Anything else: UNAVAILABLE.
 */

import type { Clock, PodCondition, PodRecord, PodVerdict } from "./types";

const READY_CONDITION = "Ready";

export const findReadyCondition = (
  conditions: readonly PodCondition[],
): PodCondition | undefined => conditions.find((condition) => condition.type === READY_CONDITION);

/** Whole seconds elapsed since `startTime`, truncated toward zero. */
export const elapsedSeconds = (startTime: Date, now: Date): number =>
  Math.trunc((now.getTime() - startTime.getTime()) / 1000);

export const evaluatePodReadiness = (
  pod: PodRecord,
  pendingGraceSeconds: number,
  clock: Clock,
): PodVerdict => {
  const { status } = pod;

  switch (status.phase) {
    case "Pending": {
      if (status.startTime === null) {
        return "SKIPPED";
      }
      return elapsedSeconds(status.startTime, clock()) < pendingGraceSeconds
        ? "AVAILABLE"
        : "UNAVAILABLE";
    }
    case "Running": {
      const ready = findReadyCondition(status.conditions);
      return ready?.status === "True" ? "AVAILABLE" : "UNAVAILABLE";
    }
    case "Succeeded":
    case "Failed":
    case "Unknown":
      return "UNAVAILABLE";
    default: {
      const exhaustive: never = status;
      return exhaustive;
    }
  }
};

/** A service is available when at least one of its pods is. */
export const isServiceAvailable = (verdicts: readonly PodVerdict[]): boolean =>
  verdicts.includes("AVAILABLE");
