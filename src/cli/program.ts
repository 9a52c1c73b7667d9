/**
 * Command-line surface: commander definition plus validation of the parsed
 * options into check and connection settings.
 */

import { Command } from "commander";
import * as v from "valibot";

import { type ConnectionConfig, parseConnectionConfig } from "@/adapters/kubernetes";
import { type CheckConfig, CheckConfigSchema } from "@/checker";
import { ConfigError, parseConfig } from "@/lib/errors";

export const PROGRAM_NAME = "check-kube-service-available";
export const PROGRAM_VERSION = "0.1.0";

const DEFAULT_TIMEOUT_SECONDS = 10;

export interface CliOptions {
  check: CheckConfig;
  connection: ConnectionConfig;
  timeoutMs: number;
}

const RawOptionsSchema = v.object({
  list: v.optional(v.string()),
  includeNamespace: v.optional(v.string()),
  excludeNamespace: v.optional(v.string()),
  pending: v.optional(v.string()),
  selectorless: v.optional(v.string()),
  timeout: v.optional(v.string()),
  apiServer: v.optional(v.string()),
  inCluster: v.optional(v.boolean(), false),
  kubeconfig: v.optional(v.string()),
  context: v.optional(v.string()),
  caFile: v.optional(v.string()),
  cert: v.optional(v.string()),
  key: v.optional(v.string()),
  insecureSkipTlsVerify: v.optional(v.boolean(), false),
  user: v.optional(v.string()),
  password: v.optional(v.string()),
  token: v.optional(v.string()),
  tokenFile: v.optional(v.string()),
});

type RawOptions = v.InferOutput<typeof RawOptionsSchema>;

const TimeoutSchema = v.pipe(
  v.number("Timeout must be a number of seconds"),
  v.gtValue(0, "Timeout must be greater than zero"),
);

/** Split a comma-separated list, dropping blank entries. */
export const splitList = (value: string | undefined): string[] =>
  value === undefined
    ? []
    : value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);

/** Blank strings become NaN so they fail numeric validation. */
const toNumber = (value: string): number => (value.trim() === "" ? Number.NaN : Number(value));

const SERVER_ONLY_OPTIONS = [
  ["caFile", "--ca-file"],
  ["cert", "--cert"],
  ["key", "--key"],
  ["user", "--user"],
  ["password", "--password"],
  ["token", "--token"],
  ["tokenFile", "--token-file"],
] as const satisfies readonly (readonly [keyof RawOptions, string])[];

const toConnectionConfig = (raw: RawOptions): ConnectionConfig => {
  if (raw.inCluster && raw.apiServer !== undefined) {
    throw new ConfigError("Give either --in-cluster or --api-server, not both");
  }

  if (raw.apiServer !== undefined) {
    if (raw.kubeconfig !== undefined || raw.context !== undefined) {
      throw new ConfigError("--kubeconfig and --context cannot be used with --api-server");
    }
    return parseConnectionConfig({
      mode: "server",
      server: raw.apiServer,
      caFile: raw.caFile,
      certFile: raw.cert,
      keyFile: raw.key,
      username: raw.user,
      password: raw.password,
      token: raw.token,
      tokenFile: raw.tokenFile,
      skipTlsVerify: raw.insecureSkipTlsVerify,
    });
  }

  const serverOnly: string[] = SERVER_ONLY_OPTIONS.filter(([key]) => raw[key] !== undefined).map(
    ([, flag]) => flag,
  );
  if (raw.insecureSkipTlsVerify) {
    serverOnly.push("--insecure-skip-tls-verify");
  }
  if (serverOnly.length > 0) {
    throw new ConfigError(`${serverOnly.join(", ")} can only be used with --api-server`);
  }

  if (raw.inCluster) {
    if (raw.kubeconfig !== undefined || raw.context !== undefined) {
      throw new ConfigError("--kubeconfig and --context cannot be used with --in-cluster");
    }
    return parseConnectionConfig({ mode: "in-cluster" });
  }

  return parseConnectionConfig({ mode: "kubeconfig", path: raw.kubeconfig, context: raw.context });
};

/**
 * Validate commander's parsed option values.
 *
 * @throws ConfigError listing every invalid option
 */
export const toCliOptions = (values: unknown): CliOptions => {
  const raw = parseConfig(RawOptionsSchema, values, "Invalid options");

  const check = parseConfig(
    CheckConfigSchema,
    {
      serviceNames: splitList(raw.list),
      includeNamespaces: splitList(raw.includeNamespace),
      excludeNamespaces: splitList(raw.excludeNamespace),
      pendingGraceSeconds: raw.pending === undefined ? undefined : toNumber(raw.pending),
      emptySelectorPolicy: raw.selectorless,
    },
    "Invalid check options",
  );

  const timeoutSeconds = parseConfig(
    TimeoutSchema,
    raw.timeout === undefined ? DEFAULT_TIMEOUT_SECONDS : toNumber(raw.timeout),
    "Invalid --timeout",
  );

  return {
    check,
    connection: toConnectionConfig(raw),
    timeoutMs: Math.round(timeoutSeconds * 1000),
  };
};

export const createProgram = (): Command =>
  new Command()
    .name(PROGRAM_NAME)
    .description("Check that every Kubernetes service has at least one available pod")
    .version(PROGRAM_VERSION)
    .option("-l, --list <services>", "comma-separated list of services to check")
    .option("-i, --include-namespace <namespaces>", "only check services in these namespaces")
    .option("-n, --exclude-namespace <namespaces>", "skip services in these namespaces")
    .option("-p, --pending <seconds>", "seconds a started pod may stay Pending and still count as available")
    .option("--selectorless <policy>", "how to report services without a selector: unresolved or skip")
    .option("--timeout <seconds>", "per-request timeout in seconds")
    .option("-s, --api-server <url>", "Kubernetes API server URL")
    .option("--in-cluster", "use the pod's service account")
    .option("--kubeconfig <file>", "kubeconfig file")
    .option("--context <name>", "kubeconfig context")
    .option("--ca-file <file>", "CA certificate for the API server")
    .option("--cert <file>", "client certificate")
    .option("--key <file>", "client key")
    .option("--insecure-skip-tls-verify", "do not verify the API server certificate")
    .option("-u, --user <user>", "user for basic auth")
    .option("--password <password>", "password for basic auth")
    .option("--token <token>", "bearer token")
    .option("--token-file <file>", "file containing a bearer token")
    .exitOverride();
