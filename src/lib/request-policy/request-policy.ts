/**
 * Request policy for cluster API calls: a cockatiel timeout around each call
 * plus simple request counters.
 *
 * No retries. A call that exceeds the timeout rejects with RequestTimeoutError
 * and the caller treats it like any other failed request.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";

import type { Logger } from "../logger";

export interface RequestPolicyConfig {
  /** Request timeout in ms */
  timeoutMs: number;
  /** Logger for per-request diagnostics */
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Operation name, used in errors and logs */
  operation: string;
}

export interface RequestPolicyMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  timedOutRequests: number;
}

export interface RequestPolicy {
  /** Per-request timeout in ms, also applied by transports that can enforce it */
  readonly timeoutMs: number;
  execute: <T>(fn: () => Promise<T>, options: ExecuteOptions) => Promise<T>;
  getMetrics: () => RequestPolicyMetrics;
  resetMetrics: () => void;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export class RequestTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "RequestTimeoutError";
  }
}

const emptyMetrics = (): RequestPolicyMetrics => ({
  totalRequests: 0,
  successfulRequests: 0,
  failedRequests: 0,
  timedOutRequests: 0,
});

export const createRequestPolicy = (
  config: RequestPolicyConfig = { timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS },
): RequestPolicy => {
  const { timeoutMs, logger } = config;
  const policy = timeout(timeoutMs, TimeoutStrategy.Aggressive);
  let metrics = emptyMetrics();

  const execute = async <T>(fn: () => Promise<T>, options: ExecuteOptions): Promise<T> => {
    const startedAt = Date.now();
    metrics.totalRequests++;

    try {
      const result = await policy.execute(() => fn());
      metrics.successfulRequests++;
      logger?.debug("Request completed", {
        operation: options.operation,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      metrics.failedRequests++;
      if (error instanceof TaskCancelledError) {
        metrics.timedOutRequests++;
        throw new RequestTimeoutError(`${options.operation} timed out after ${timeoutMs}ms`, timeoutMs);
      }
      throw error;
    }
  };

  return {
    timeoutMs,
    execute,
    getMetrics: () => ({ ...metrics }),
    resetMetrics: () => {
      metrics = emptyMetrics();
    },
  };
};
