/**
 * Kubernetes service availability check.
 *
 * Prints one status line and exits with the monitoring status code.
 */

import { runCli } from "./cli";

const main = async (): Promise<void> => {
  process.exitCode = await runCli(process.argv.slice(2), {
    write: (line) => {
      console.log(line);
    },
  });
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.log(`CheckKubeServiceAvailable UNKNOWN: ${message}`);
  process.exitCode = 3;
});
