/**
 * CLI utility exports.
 * @module cli/utils
 */

export {
  CLIError,
  ExitCode,
  formatError,
  handleError,
  serverStartError,
} from "./errors.js";
export type { ExitCode as ExitCodeType } from "./errors.js";

export { output, info, formatConfig } from "./output.js";
export type { OutputOptions } from "./output.js";
