/**
 * Pod domain: status model and readiness evaluation.
 */

export type {
  Clock,
  ConditionStatus,
  PodCondition,
  PodPhase,
  PodRecord,
  PodStatus,
  PodVerdict,
} from "./types";

export {
  conditionStatusSchema,
  isConditionStatus,
  isPodPhase,
  podIdentifier,
  podPhaseSchema,
  systemClock,
} from "./types";

export {
  elapsedSeconds,
  evaluatePodReadiness,
  findReadyCondition,
  isServiceAvailable,
} from "./readiness";
