/**
 * Per-service availability evaluation and aggregation.
 *
 * Services are checked one at a time, in order. A failed pod lookup is
 * recorded against that service and never stops the run.
 */

import {
  type PodRecord,
  evaluatePodReadiness,
  isServiceAvailable,
  podIdentifier,
} from "@/domains/pod";
import {
  type ServiceRecord,
  describeService,
  formatLabelSelector,
  resolveLabelQuery,
} from "@/domains/service";
import type { AvailabilityDeps, RunOutcome, ServiceCheckResult } from "./types";

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Check a single service: resolve its selector, look up its pods and
 * evaluate their readiness.
 */
export const checkService = async (
  service: ServiceRecord,
  deps: AvailabilityDeps,
): Promise<ServiceCheckResult> => {
  const identifier = describeService(service);

  if (service.name === null) {
    return { kind: "UNRESOLVED", service: identifier, reason: "NO_IDENTITY" };
  }

  const query = resolveLabelQuery(service);
  if (!query) {
    return deps.emptySelectorPolicy === "skip"
      ? { kind: "SKIPPED", service: identifier }
      : { kind: "UNRESOLVED", service: identifier, reason: "EMPTY_SELECTOR" };
  }

  let pods: PodRecord[];
  try {
    pods = await deps.client.listPods(formatLabelSelector(query));
  } catch (error) {
    return { kind: "LOOKUP_FAILED", service: identifier, error: toError(error) };
  }

  if (pods.length === 0) {
    return { kind: "UNRESOLVED", service: identifier, reason: "NO_PODS" };
  }

  const evaluated = pods.map((pod) => ({
    pod,
    verdict: evaluatePodReadiness(pod, deps.pendingGraceSeconds, deps.clock),
  }));

  if (isServiceAvailable(evaluated.map(({ verdict }) => verdict))) {
    return { kind: "AVAILABLE", service: identifier };
  }

  const failedPods = evaluated
    .filter(({ verdict }) => verdict === "UNAVAILABLE")
    .map(({ pod }) => podIdentifier(pod));

  if (failedPods.length === 0) {
    return { kind: "NO_VERDICT", service: identifier };
  }
  return { kind: "UNAVAILABLE", service: identifier, failedPods };
};

/**
 * Evaluate every service and collect failed and unresolved identifiers.
 */
export const runAvailabilityCheck = async (
  services: readonly ServiceRecord[],
  deps: AvailabilityDeps,
): Promise<RunOutcome> => {
  const { logger } = deps;
  const outcome: RunOutcome = { failed: [], unresolved: [] };

  for (const service of services) {
    const result = await checkService(service, deps);

    switch (result.kind) {
      case "AVAILABLE":
        logger.debug("Service available", { service: result.service });
        break;
      case "UNAVAILABLE":
        logger.info("Service has no available pods", {
          service: result.service,
          pods: result.failedPods,
        });
        outcome.failed.push(...result.failedPods);
        break;
      case "LOOKUP_FAILED":
        logger.warn("Pod lookup failed", { service: result.service, error: result.error.message });
        outcome.failed.push(result.service);
        break;
      case "UNRESOLVED":
        logger.info("Service could not be resolved", {
          service: result.service,
          reason: result.reason,
        });
        outcome.unresolved.push(result.service);
        break;
      case "NO_VERDICT":
        logger.debug("Service pods have not started", { service: result.service });
        break;
      case "SKIPPED":
        logger.debug("Skipping service without selector", { service: result.service });
        break;
    }
  }

  logger.info("Availability check complete", {
    services: services.length,
    failed: outcome.failed.length,
    unresolved: outcome.unresolved.length,
  });

  return outcome;
};
