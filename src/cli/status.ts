/**
 * Status line and exit code in the Sensu plugin convention.
 */

import type { Verdict, VerdictStatus } from "@/checker";

export const CHECK_NAME = "CheckKubeServiceAvailable";

export const EXIT_CODES: Record<VerdictStatus, number> = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3,
};

export const formatStatusLine = (verdict: Verdict): string =>
  `${CHECK_NAME} ${verdict.status}: ${verdict.message}`;

export const exitCodeFor = (status: VerdictStatus): number => EXIT_CODES[status];
