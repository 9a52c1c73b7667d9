/**
 * Full check: list services, filter, evaluate.
 */

import { asClusterApiError } from "@/adapters/errors";
import type { ClusterClient } from "@/adapters/types";
import type { Clock } from "@/domains/pod";
import { type ServiceRecord, filterServices } from "@/domains/service";
import type { Logger } from "@/lib/logger";
import { runAvailabilityCheck } from "./run";
import type { CheckConfig, CheckResult } from "./types";

export interface CheckDeps {
  client: ClusterClient;
  config: CheckConfig;
  clock: Clock;
  logger: Logger;
}

/**
 * Run one check pass.
 *
 * A failure to list services is the only fatal error; it is returned as
 * API_ERROR rather than thrown. An empty filtered set returns
 * NOTHING_TO_CHECK without any pod lookups.
 */
export const executeCheck = async (deps: CheckDeps): Promise<CheckResult> => {
  const { client, config, clock, logger } = deps;

  let services: ServiceRecord[];
  try {
    services = await client.listServices();
  } catch (error) {
    const apiError = asClusterApiError(error, "listServices");
    logger.error("Unable to list services", apiError, { code: apiError.code });
    return { kind: "API_ERROR", error: apiError };
  }

  const inScope = filterServices(services, {
    serviceNames: config.serviceNames,
    includeNamespaces: config.includeNamespaces,
    excludeNamespaces: config.excludeNamespaces,
  });

  logger.debug("Filtered services", { listed: services.length, inScope: inScope.length });

  if (inScope.length === 0) {
    return { kind: "NOTHING_TO_CHECK" };
  }

  const outcome = await runAvailabilityCheck(inScope, {
    client,
    pendingGraceSeconds: config.pendingGraceSeconds,
    emptySelectorPolicy: config.emptySelectorPolicy,
    clock,
    logger,
  });

  return { kind: "COMPLETED", outcome };
};
