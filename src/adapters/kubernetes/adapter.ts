/**
 * Kubernetes cluster client backed by @kubernetes/client-node.
 *
 * Lists services and pods across all namespaces through CoreV1Api, with each
 * call bounded by the request policy's timeout. The same timeout is set on the
 * underlying HTTP request so an abandoned call does not keep its socket open.
 */

import * as k8s from "@kubernetes/client-node";
import * as v from "valibot";

import type { Logger } from "@/lib/logger";
import { RequestTimeoutError, type RequestPolicy } from "@/lib/request-policy";
import { ClusterApiError, type ClusterErrorCode } from "../errors";
import type { ClusterClient, ClusterOperation } from "../types";
import { normalizePodList, normalizeServiceList } from "./normalizers";
import { KubeStatusSchema } from "./schemas";

export interface KubernetesClusterClientConfig {
  kubeConfig: k8s.KubeConfig;
  requestPolicy: RequestPolicy;
  logger?: Logger;
}

const OPERATION_LABELS: Record<ClusterOperation, string> = {
  listServices: "list services",
  listPods: "list pods",
};

const codeForStatus = (statusCode: number | undefined): ClusterErrorCode => {
  switch (statusCode) {
    case 401:
      return "AUTHENTICATION_FAILED";
    case 403:
      return "FORBIDDEN";
    case 404:
      return "NOT_FOUND";
    default:
      return "UNKNOWN";
  }
};

const SOCKET_TIMEOUT_CODES: ReadonlySet<unknown> = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);

const isSocketTimeout = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && SOCKET_TIMEOUT_CODES.has(error.code);

const describeHttpError = (error: k8s.HttpError): string => {
  const body: unknown = error.body;
  if (v.is(KubeStatusSchema, body)) {
    return body.message;
  }
  return error.statusCode === undefined ? error.message : `HTTP ${error.statusCode}`;
};

/**
 * Map anything thrown by a cluster call to a ClusterApiError.
 */
export const toClusterApiError = (error: unknown, operation: ClusterOperation): ClusterApiError => {
  if (error instanceof ClusterApiError) {
    return error;
  }

  const prefix = `Failed to ${OPERATION_LABELS[operation]}`;

  if (error instanceof k8s.HttpError) {
    return new ClusterApiError(
      `${prefix}: ${describeHttpError(error)}`,
      codeForStatus(error.statusCode),
      operation,
      error,
    );
  }
  if (error instanceof RequestTimeoutError || isSocketTimeout(error)) {
    return new ClusterApiError(`${prefix}: ${error.message}`, "TIMEOUT", operation, error);
  }
  if (v.isValiError(error)) {
    return new ClusterApiError(
      `${prefix}: unexpected response (${error.message})`,
      "INVALID_RESPONSE",
      operation,
      error,
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ClusterApiError(`${prefix}: ${message}`, "NETWORK_ERROR", operation, error);
};

/**
 * Create a ClusterClient for the cluster described by `config.kubeConfig`.
 */
export const createKubernetesClusterClient = (
  config: KubernetesClusterClientConfig,
): ClusterClient => {
  const { kubeConfig, requestPolicy, logger } = config;
  const core = kubeConfig.makeApiClient(k8s.CoreV1Api);
  core.addInterceptor((options) => {
    options.timeout = requestPolicy.timeoutMs;
  });

  return {
    listServices: async () => {
      try {
        const { body } = await requestPolicy.execute(() => core.listServiceForAllNamespaces(), {
          operation: "listServices",
        });
        const services = normalizeServiceList(body);
        logger?.debug("Listed services", { count: services.length });
        return services;
      } catch (error) {
        throw toClusterApiError(error, "listServices");
      }
    },

    listPods: async (labelSelector: string) => {
      try {
        const { body } = await requestPolicy.execute(
          () => core.listPodForAllNamespaces(undefined, undefined, undefined, labelSelector),
          { operation: "listPods" },
        );
        const pods = normalizePodList(body);
        logger?.debug("Listed pods", { labelSelector, count: pods.length });
        return pods;
      } catch (error) {
        throw toClusterApiError(error, "listPods");
      }
    },
  };
};
