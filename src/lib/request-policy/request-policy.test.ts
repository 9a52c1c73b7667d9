import { describe, expect, it, vi } from "vitest";

import { RequestTimeoutError, createRequestPolicy } from "./request-policy";

describe("createRequestPolicy", () => {
  it("should return the result of successful calls", async () => {
    const policy = createRequestPolicy({ timeoutMs: 1_000 });

    await expect(policy.execute(async () => "ok", { operation: "listServices" })).resolves.toBe(
      "ok",
    );
    expect(policy.getMetrics()).toEqual({
      totalRequests: 1,
      successfulRequests: 1,
      failedRequests: 0,
      timedOutRequests: 0,
    });
  });

  it("should propagate errors from the call unchanged", async () => {
    const policy = createRequestPolicy({ timeoutMs: 1_000 });
    const failure = new Error("connection refused");

    await expect(
      policy.execute(
        async () => {
          throw failure;
        },
        { operation: "listPods" },
      ),
    ).rejects.toBe(failure);
    expect(policy.getMetrics().failedRequests).toBe(1);
    expect(policy.getMetrics().timedOutRequests).toBe(0);
  });

  it("should reject with RequestTimeoutError when the call exceeds the timeout", async () => {
    const policy = createRequestPolicy({ timeoutMs: 20 });
    const never = new Promise<string>(() => {});

    const result = policy.execute(() => never, { operation: "listPods" });

    await expect(result).rejects.toThrow(RequestTimeoutError);
    await expect(result).rejects.toThrow("listPods timed out after 20ms");
    expect(policy.getMetrics()).toMatchObject({ failedRequests: 1, timedOutRequests: 1 });
  });

  it("should log completed requests at debug level", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const policy = createRequestPolicy({ timeoutMs: 1_000, logger });

    await policy.execute(async () => [], { operation: "listServices" });

    expect(logger.debug).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ operation: "listServices" }),
    );
  });

  it("should reset metrics", async () => {
    const policy = createRequestPolicy({ timeoutMs: 1_000 });
    await policy.execute(async () => 1, { operation: "listServices" });

    policy.resetMetrics();

    expect(policy.getMetrics().totalRequests).toBe(0);
  });

  it("exposes the configured timeout", () => {
    expect(createRequestPolicy({ timeoutMs: 750 }).timeoutMs).toBe(750);
  });
});
