export { runCli, type CliDeps, type ClientFactoryOptions } from "./run-cli";
export {
  PROGRAM_NAME,
  PROGRAM_VERSION,
  createProgram,
  splitList,
  toCliOptions,
  type CliOptions,
} from "./program";
export { CHECK_NAME, EXIT_CODES, exitCodeFor, formatStatusLine } from "./status";
