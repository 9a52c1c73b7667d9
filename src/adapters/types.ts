/**
 * Cluster client port: the two API calls the check depends on.
 */

import type { PodRecord } from "@/domains/pod";
import type { ServiceRecord } from "@/domains/service";

export interface ClusterClient {
  /** Every service in the cluster. Failure is fatal for the run. */
  listServices(): Promise<ServiceRecord[]>;
  /** Pods in any namespace matching an equality label selector (`a=b,c=d`). */
  listPods(labelSelector: string): Promise<PodRecord[]>;
}

export type ClusterOperation = keyof ClusterClient;
