/**
 * KubeConfig construction from an explicit ConnectionConfig.
 */

import { readFileSync } from "node:fs";

import * as k8s from "@kubernetes/client-node";

import { ConfigError } from "@/lib/errors";
import type { ConnectionConfig } from "./config";

const CONTEXT_NAME = "kube-service-check";

export interface KubeConfigDeps {
  readFile: (path: string) => string;
}

const defaultDeps: KubeConfigDeps = {
  readFile: (path) => readFileSync(path, "utf8"),
};

const readToken = (tokenFile: string, deps: KubeConfigDeps): string => {
  let token: string;
  try {
    token = deps.readFile(tokenFile).trim();
  } catch (error) {
    throw new ConfigError(`Unable to read token file ${tokenFile}`, [], error);
  }
  if (!token) {
    throw new ConfigError(`Token file ${tokenFile} is empty`);
  }
  return token;
};

/**
 * Build a KubeConfig for `connection`.
 *
 * @throws ConfigError when the token file cannot be read or the requested
 *   kubeconfig context does not exist
 */
export const createKubeConfig = (
  connection: ConnectionConfig,
  deps: KubeConfigDeps = defaultDeps,
): k8s.KubeConfig => {
  const kubeConfig = new k8s.KubeConfig();

  switch (connection.mode) {
    case "in-cluster":
      kubeConfig.loadFromCluster();
      return kubeConfig;

    case "kubeconfig": {
      if (connection.path) {
        kubeConfig.loadFromFile(connection.path);
      } else {
        kubeConfig.loadFromDefault();
      }
      if (connection.context) {
        if (!kubeConfig.getContextObject(connection.context)) {
          throw new ConfigError(`Context ${connection.context} not found in kubeconfig`);
        }
        kubeConfig.setCurrentContext(connection.context);
      }
      return kubeConfig;
    }

    case "server": {
      const token = connection.tokenFile ? readToken(connection.tokenFile, deps) : connection.token;

      kubeConfig.loadFromOptions({
        clusters: [
          {
            name: CONTEXT_NAME,
            server: connection.server,
            caFile: connection.caFile,
            skipTLSVerify: connection.skipTlsVerify,
          },
        ],
        users: [
          {
            name: CONTEXT_NAME,
            token,
            certFile: connection.certFile,
            keyFile: connection.keyFile,
            username: connection.username,
            password: connection.password,
          },
        ],
        contexts: [{ name: CONTEXT_NAME, cluster: CONTEXT_NAME, user: CONTEXT_NAME }],
        currentContext: CONTEXT_NAME,
      });
      return kubeConfig;
    }
  }
};
