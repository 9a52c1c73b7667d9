/**
 * Cluster client adapters.
 */

export type { ClusterClient, ClusterOperation } from "./types";

export { ClusterApiError, asClusterApiError } from "./errors";
export type { ClusterErrorCode } from "./errors";

export {
  ConnectionConfigSchema,
  createKubeConfig,
  createKubernetesClusterClient,
  isConnectionConfig,
  parseConnectionConfig,
} from "./kubernetes";
export type { ConnectionConfig, KubeConfigDeps, KubernetesClusterClientConfig } from "./kubernetes";

export { createMemoryClusterClient } from "./memory";
export type { MemoryClusterClient, MemoryClusterFailures, MemoryClusterSnapshot } from "./memory";
