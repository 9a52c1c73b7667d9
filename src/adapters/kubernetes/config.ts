/**
 * Cluster connection configuration.
 *
 * - in-cluster: service account token and CA mounted into the pod.
 * - kubeconfig: a kubeconfig file (default loading rules when no path).
 * - server: explicit API server URL with optional TLS material and credentials.
 */

import * as v from "valibot";

import { parseConfig } from "@/lib/errors";

const nonEmptyString = v.pipe(v.string(), v.trim(), v.minLength(1));

export const ConnectionConfigSchema = v.pipe(
  v.variant("mode", [
    v.object({
      mode: v.literal("in-cluster"),
    }),
    v.object({
      mode: v.literal("kubeconfig"),
      path: v.optional(nonEmptyString),
      context: v.optional(nonEmptyString),
    }),
    v.object({
      mode: v.literal("server"),
      server: v.pipe(v.string(), v.url("API server must be a URL")),
      caFile: v.optional(nonEmptyString),
      certFile: v.optional(nonEmptyString),
      keyFile: v.optional(nonEmptyString),
      username: v.optional(nonEmptyString),
      password: v.optional(v.string()),
      token: v.optional(nonEmptyString),
      tokenFile: v.optional(nonEmptyString),
      skipTlsVerify: v.optional(v.boolean(), false),
    }),
  ]),
  v.check(
    (config) =>
      config.mode !== "server" || (config.certFile === undefined) === (config.keyFile === undefined),
    "Client certificate and key must be given together",
  ),
  v.check(
    (config) =>
      config.mode !== "server" || config.password === undefined || config.username !== undefined,
    "Password requires a user",
  ),
  v.check(
    (config) =>
      config.mode !== "server" || config.token === undefined || config.tokenFile === undefined,
    "Give either a token or a token file, not both",
  ),
);

export type ConnectionConfig = v.InferOutput<typeof ConnectionConfigSchema>;

export const parseConnectionConfig = (config: unknown): ConnectionConfig =>
  parseConfig(ConnectionConfigSchema, config, "Invalid connection options");

export const isConnectionConfig = (value: unknown): value is ConnectionConfig =>
  v.is(ConnectionConfigSchema, value);
