#!/usr/bin/env node
/**
 * CLI entry point for todo-item-store.
 * @module cli
 */

import { cac, type CAC } from "cac";
import { handleError } from "./utils/index.js";
import { registerConfigCommand, registerServeCommand } from "./commands/index.js";

const VERSION = "0.1.0";

/**
 * Create and configure the CLI.
 */
function createCLI(): CAC {
  const cli = cac("item-store");

  registerServeCommand(cli);
  registerConfigCommand(cli);

  cli.help();
  cli.version(VERSION);

  return cli;
}

/**
 * Run the CLI.
 */
async function main(): Promise<void> {
  const cli = createCLI();

  try {
    cli.parse(process.argv, { run: false });
    if (!cli.matchedCommand && cli.args.length > 0) {
      handleError(`Unknown command: ${cli.args.join(" ")}`);
    }
    await cli.runMatchedCommand();
  } catch (error) {
    handleError(error);
  }
}

main().catch((error: unknown) => {
  handleError(error);
});
