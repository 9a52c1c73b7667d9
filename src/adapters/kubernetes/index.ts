/**
 * Kubernetes adapter exports.
 */

export { createKubernetesClusterClient, toClusterApiError } from "./adapter";
export type { KubernetesClusterClientConfig } from "./adapter";

export { ConnectionConfigSchema, isConnectionConfig, parseConnectionConfig } from "./config";
export type { ConnectionConfig } from "./config";

export { createKubeConfig } from "./kube-config";
export type { KubeConfigDeps } from "./kube-config";

export {
  normalizeConditionStatus,
  normalizePhase,
  normalizePod,
  normalizePodList,
  normalizeService,
  normalizeServiceList,
} from "./normalizers";
