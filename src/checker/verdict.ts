/**
 * Map a check result to the status and message a monitoring system sees.
 */

import type { CheckResult, RunOutcome, Verdict } from "./types";

export const MESSAGES = {
  allUp: "All services are reporting as up",
  nothingToCheck: "No services to check",
  unresolved: "Some services could not be checked",
  failed: "All services are not ready",
  apiError: "API error",
} as const;

/**
 * Unresolved services are listed before unavailable ones; when both are
 * present the message carries both parts.
 */
export const describeOutcome = (outcome: RunOutcome): Verdict => {
  const parts: string[] = [];

  if (outcome.unresolved.length > 0) {
    parts.push(`${MESSAGES.unresolved}: ${outcome.unresolved.join(" ")}`);
  }
  if (outcome.failed.length > 0) {
    parts.push(`${MESSAGES.failed}: ${outcome.failed.join(" ")}`);
  }

  if (parts.length === 0) {
    return { status: "OK", message: MESSAGES.allUp };
  }
  return { status: "CRITICAL", message: parts.join("; ") };
};

export const toVerdict = (result: CheckResult): Verdict => {
  switch (result.kind) {
    case "API_ERROR":
      return { status: "CRITICAL", message: `${MESSAGES.apiError}: ${result.error.message}` };
    case "NOTHING_TO_CHECK":
      return { status: "WARNING", message: MESSAGES.nothingToCheck };
    case "COMPLETED":
      return describeOutcome(result.outcome);
  }
};
