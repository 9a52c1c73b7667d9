/**
 * Cluster client error types.
 */

import type { ClusterOperation } from "./types";

export type ClusterErrorCode =
  | "AUTHENTICATION_FAILED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "TIMEOUT"
  | "INVALID_RESPONSE"
  | "NETWORK_ERROR"
  | "UNKNOWN";

export class ClusterApiError extends Error {
  public override readonly name = "ClusterApiError";

  constructor(
    message: string,
    public readonly code: ClusterErrorCode,
    public readonly operation: ClusterOperation,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Wrap an arbitrary failure from `operation` in a ClusterApiError, keeping an
 * existing ClusterApiError as is.
 */
export const asClusterApiError = (error: unknown, operation: ClusterOperation): ClusterApiError => {
  if (error instanceof ClusterApiError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ClusterApiError(message, "UNKNOWN", operation, error);
};
