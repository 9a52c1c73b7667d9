/**
 * In-memory cluster client.
 *
 * Serves a fixed snapshot of services and pods, matching label selectors
 * against pod labels the way the API server does for equality selectors.
 * Failures can be injected per call.
 */

import type { PodRecord } from "@/domains/pod";
import { matchesLabels, parseLabelSelector, type ServiceRecord } from "@/domains/service";
import { ClusterApiError } from "../errors";
import type { ClusterClient } from "../types";

export interface MemoryClusterSnapshot {
  services: readonly ServiceRecord[];
  pods: readonly PodRecord[];
}

export interface MemoryClusterFailures {
  /** Error thrown by listServices. */
  listServices?: Error;
  /** Errors thrown by listPods, keyed by the exact label selector string. */
  listPods?: Readonly<Record<string, Error>>;
}

export interface MemoryClusterClient extends ClusterClient {
  /** Label selectors passed to listPods, in call order. */
  getPodQueries: () => readonly string[];
}

export const createMemoryClusterClient = (
  snapshot: MemoryClusterSnapshot,
  failures: MemoryClusterFailures = {},
): MemoryClusterClient => {
  const podQueries: string[] = [];

  return {
    listServices: async (): Promise<ServiceRecord[]> => {
      if (failures.listServices) {
        throw failures.listServices;
      }
      return snapshot.services.map((service) => ({ ...service }));
    },

    listPods: async (labelSelector: string): Promise<PodRecord[]> => {
      podQueries.push(labelSelector);

      const failure = failures.listPods?.[labelSelector];
      if (failure) {
        throw failure;
      }

      const selector = parseLabelSelector(labelSelector);
      if (!selector) {
        throw new ClusterApiError(
          `Failed to list pods: unsupported label selector "${labelSelector}"`,
          "UNKNOWN",
          "listPods",
        );
      }
      return snapshot.pods.filter((pod) => matchesLabels(pod.labels, selector));
    },

    getPodQueries: () => [...podQueries],
  };
};
