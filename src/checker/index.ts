/**
 * Checker module: service evaluation, full check pass, and verdict.
 */

export { executeCheck, type CheckDeps } from "./check";

export { checkService, runAvailabilityCheck } from "./run";

export { MESSAGES, describeOutcome, toVerdict } from "./verdict";

export {
  CheckConfigSchema,
  DEFAULT_CHECK_CONFIG,
  emptySelectorPolicySchema,
  type AvailabilityDeps,
  type CheckConfig,
  type CheckResult,
  type EmptySelectorPolicy,
  type RunOutcome,
  type ServiceCheckResult,
  type UnresolvedReason,
  type Verdict,
  type VerdictStatus,
} from "./types";
