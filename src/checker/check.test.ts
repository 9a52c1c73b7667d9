import { describe, expect, it, vi } from "vitest";

import { ClusterApiError } from "@/adapters/errors";
import { createMemoryClusterClient } from "@/adapters/memory";
import type { PodRecord } from "@/domains/pod";
import type { ServiceRecord } from "@/domains/service";
import { silentLogger } from "@/lib/logger";
import { executeCheck } from "./check";
import { DEFAULT_CHECK_CONFIG, type CheckConfig } from "./types";

const fixedClock = (): Date => new Date("2026-03-01T12:00:00.000Z");

const service = (namespace: string, name: string): ServiceRecord => ({
  uid: `uid-${namespace}-${name}`,
  namespace,
  name,
  selector: { app: name },
});

const readyPod = (namespace: string, name: string, app: string): PodRecord => ({
  namespace,
  name,
  labels: { app },
  status: { phase: "Running", conditions: [{ type: "Ready", status: "True" }] },
});

const failedPod = (namespace: string, name: string, app: string): PodRecord => ({
  namespace,
  name,
  labels: { app },
  status: { phase: "Failed" },
});

const withConfig = (overrides: Partial<CheckConfig>): CheckConfig => ({
  ...DEFAULT_CHECK_CONFIG,
  ...overrides,
});

describe("executeCheck", () => {
  const services = [service("default", "web"), service("kube-system", "dns"), service("jobs", "worker")];
  const pods = [
    readyPod("default", "web-1", "web"),
    readyPod("kube-system", "dns-1", "dns"),
    failedPod("jobs", "worker-1", "worker"),
  ];

  it("returns API_ERROR when services cannot be listed", async () => {
    const client = createMemoryClusterClient(
      { services, pods },
      { listServices: new ClusterApiError("Failed to list services: Unauthorized", "AUTHENTICATION_FAILED", "listServices") },
    );
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = await executeCheck({ client, config: DEFAULT_CHECK_CONFIG, clock: fixedClock, logger });

    expect(result.kind).toBe("API_ERROR");
    if (result.kind === "API_ERROR") {
      expect(result.error.code).toBe("AUTHENTICATION_FAILED");
      expect(result.error.message).toBe("Failed to list services: Unauthorized");
    }
    expect(logger.error).toHaveBeenCalledWith("Unable to list services", expect.any(ClusterApiError), {
      code: "AUTHENTICATION_FAILED",
    });
    expect(client.getPodQueries()).toEqual([]);
  });

  it("wraps unexpected listing failures", async () => {
    const client = createMemoryClusterClient({ services, pods }, { listServices: new Error("socket hang up") });

    const result = await executeCheck({
      client,
      config: DEFAULT_CHECK_CONFIG,
      clock: fixedClock,
      logger: silentLogger,
    });

    expect(result).toMatchObject({
      kind: "API_ERROR",
      error: { code: "UNKNOWN", operation: "listServices", message: "socket hang up" },
    });
  });

  it("returns NOTHING_TO_CHECK without looking up pods when the filter matches nothing", async () => {
    const client = createMemoryClusterClient({ services, pods });

    const result = await executeCheck({
      client,
      config: withConfig({ serviceNames: ["missing"] }),
      clock: fixedClock,
      logger: silentLogger,
    });

    expect(result).toEqual({ kind: "NOTHING_TO_CHECK" });
    expect(client.getPodQueries()).toEqual([]);
  });

  it("returns NOTHING_TO_CHECK for an empty cluster", async () => {
    const client = createMemoryClusterClient({ services: [], pods: [] });

    await expect(
      executeCheck({ client, config: DEFAULT_CHECK_CONFIG, clock: fixedClock, logger: silentLogger }),
    ).resolves.toEqual({ kind: "NOTHING_TO_CHECK" });
  });

  it("evaluates every service in scope", async () => {
    const client = createMemoryClusterClient({ services, pods });

    const result = await executeCheck({
      client,
      config: DEFAULT_CHECK_CONFIG,
      clock: fixedClock,
      logger: silentLogger,
    });

    expect(result).toEqual({ kind: "COMPLETED", outcome: { failed: ["jobs.worker-1"], unresolved: [] } });
    expect(client.getPodQueries()).toEqual(["app=web", "app=dns", "app=worker"]);
  });

  it("only looks up pods for services that pass the filter", async () => {
    const client = createMemoryClusterClient({ services, pods });

    const result = await executeCheck({
      client,
      config: withConfig({ excludeNamespaces: ["jobs"] }),
      clock: fixedClock,
      logger: silentLogger,
    });

    expect(result).toEqual({ kind: "COMPLETED", outcome: { failed: [], unresolved: [] } });
    expect(client.getPodQueries()).toEqual(["app=web", "app=dns"]);
  });

  it("applies exclusion after inclusion", async () => {
    const client = createMemoryClusterClient({ services, pods });

    const result = await executeCheck({
      client,
      config: withConfig({ includeNamespaces: ["default", "jobs"], excludeNamespaces: ["jobs"] }),
      clock: fixedClock,
      logger: silentLogger,
    });

    expect(result.kind).toBe("COMPLETED");
    expect(client.getPodQueries()).toEqual(["app=web"]);
  });
});
