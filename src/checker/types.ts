/**
 * Check configuration, per-service results, and run outcome.
 */

import * as v from "valibot";

import type { ClusterApiError } from "@/adapters/errors";
import type { ClusterClient } from "@/adapters/types";
import type { Clock } from "@/domains/pod";
import type { Logger } from "@/lib/logger";

/**
 * What to do with a service whose selector is empty.
 * - unresolved: report it as a service that could not be checked
 * - skip: leave it out of the report entirely
 */
export const emptySelectorPolicySchema = v.picklist(["unresolved", "skip"]);

export type EmptySelectorPolicy = v.InferOutput<typeof emptySelectorPolicySchema>;

const nameListSchema = v.array(v.pipe(v.string(), v.trim(), v.minLength(1)));

export const CheckConfigSchema = v.object({
  serviceNames: v.optional(nameListSchema, []),
  includeNamespaces: v.optional(nameListSchema, []),
  excludeNamespaces: v.optional(nameListSchema, []),
  pendingGraceSeconds: v.optional(
    v.pipe(
      v.number(),
      v.integer("Pending grace must be a whole number of seconds"),
      v.minValue(0, "Pending grace cannot be negative"),
    ),
    0,
  ),
  emptySelectorPolicy: v.optional(emptySelectorPolicySchema, "unresolved"),
});

export type CheckConfig = v.InferOutput<typeof CheckConfigSchema>;

export const DEFAULT_CHECK_CONFIG: CheckConfig = v.parse(CheckConfigSchema, {});

/**
 * Dependencies for evaluating filtered services.
 */
export interface AvailabilityDeps {
  client: ClusterClient;
  pendingGraceSeconds: number;
  emptySelectorPolicy: EmptySelectorPolicy;
  clock: Clock;
  logger: Logger;
}

export type UnresolvedReason = "NO_IDENTITY" | "EMPTY_SELECTOR" | "NO_PODS";

/**
 * Result of checking one service.
 */
export type ServiceCheckResult =
  | { kind: "AVAILABLE"; service: string }
  | { kind: "UNAVAILABLE"; service: string; failedPods: string[] }
  | { kind: "LOOKUP_FAILED"; service: string; error: Error }
  | { kind: "UNRESOLVED"; service: string; reason: UnresolvedReason }
  /** Every pod is Pending without a start time, so there is no evidence either way. */
  | { kind: "NO_VERDICT"; service: string }
  | { kind: "SKIPPED"; service: string };

/**
 * Aggregate of a run. OK only when both lists are empty.
 *
 * - failed: `namespace.name` of unavailable pods, or the service name when its
 *   pod lookup failed
 * - unresolved: services whose pods could not be determined
 */
export interface RunOutcome {
  failed: string[];
  unresolved: string[];
}

/**
 * Result of a full check: the service listing either failed, produced nothing
 * in scope, or every in-scope service was evaluated.
 */
export type CheckResult =
  | { kind: "API_ERROR"; error: ClusterApiError }
  | { kind: "NOTHING_TO_CHECK" }
  | { kind: "COMPLETED"; outcome: RunOutcome };

export type VerdictStatus = "OK" | "WARNING" | "CRITICAL" | "UNKNOWN";

export interface Verdict {
  status: VerdictStatus;
  message: string;
}
