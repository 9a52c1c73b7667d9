/**
 * CLI runner: options -> logger -> cluster client -> check -> status line.
 */

import { CommanderError } from "commander";

import type { ClusterClient } from "@/adapters";
import {
  type ConnectionConfig,
  createKubeConfig,
  createKubernetesClusterClient,
} from "@/adapters/kubernetes";
import { executeCheck, toVerdict, type Verdict } from "@/checker";
import { type Clock, systemClock } from "@/domains/pod";
import { ConfigError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import { createRequestPolicy, type RequestPolicy } from "@/lib/request-policy";
import { createProgram, toCliOptions } from "./program";
import { exitCodeFor, formatStatusLine } from "./status";

export interface ClientFactoryOptions {
  connection: ConnectionConfig;
  requestPolicy: RequestPolicy;
  logger: Logger;
}

export interface CliDeps {
  /** Writes the status line. */
  write: (line: string) => void;
  /** Receives commander's help and version text; process stdout when omitted. */
  writeHelp?: (text: string) => void;
  createClient?: (options: ClientFactoryOptions) => ClusterClient;
  clock?: Clock;
  logger?: Logger;
}

const createClusterClient = ({ connection, requestPolicy, logger }: ClientFactoryOptions): ClusterClient =>
  createKubernetesClusterClient({ kubeConfig: createKubeConfig(connection), requestPolicy, logger });

const unknown = (message: string): Verdict => ({ status: "UNKNOWN", message });

const describeSetupFailure = (error: unknown): Verdict => {
  if (error instanceof ConfigError) {
    return unknown(`Invalid configuration: ${error.message}`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return unknown(`Unable to load cluster configuration: ${message}`);
};

/**
 * Run one check for `argv` (arguments after the script name) and return the
 * process exit code. Exactly one status line is written, except for help and
 * version requests.
 */
export const runCli = async (argv: readonly string[], deps: CliDeps): Promise<number> => {
  const report = (verdict: Verdict): number => {
    deps.write(formatStatusLine(verdict));
    return exitCodeFor(verdict.status);
  };

  const program = createProgram().configureOutput({
    ...(deps.writeHelp && { writeOut: deps.writeHelp }),
    outputError: () => undefined,
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0
        ? 0
        : report(unknown(`Invalid configuration: ${error.message.replace(/^error: /, "")}`));
    }
    throw error;
  }

  let logger: Logger;
  let requestPolicy: RequestPolicy;
  let client: ClusterClient;
  let options: ReturnType<typeof toCliOptions>;
  try {
    options = toCliOptions(program.opts());
    logger = deps.logger ?? createLogger();
    requestPolicy = createRequestPolicy({ timeoutMs: options.timeoutMs, logger });
    client = (deps.createClient ?? createClusterClient)({
      connection: options.connection,
      requestPolicy,
      logger,
    });
  } catch (error) {
    return report(describeSetupFailure(error));
  }

  logger.debug("Starting availability check", {
    connection: options.connection.mode,
    timeoutMs: options.timeoutMs,
  });

  const result = await executeCheck({
    client,
    config: options.check,
    clock: deps.clock ?? systemClock,
    logger,
  });

  logger.debug("Request metrics", { ...requestPolicy.getMetrics() });

  return report(toVerdict(result));
};
