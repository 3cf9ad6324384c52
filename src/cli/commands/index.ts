/**
 * CLI command exports.
 * @module cli/commands
 */

export { registerServeCommand, toConfigOverrides } from "./serve.js";
export { registerConfigCommand, loadCliConfig } from "./config.js";
