/**
 * CLI config command - show configuration.
 * @module cli/commands/config
 */

import type { CAC } from "cac";
import { loadConfig } from "../../config.js";
import type { ItemStoreConfig } from "../../types.js";
import { CLIError, ExitCode, formatConfig, output } from "../utils/index.js";

interface ConfigOptions {
  project?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Load configuration, turning validation failures into a CONFIG_ERROR.
 */
export async function loadCliConfig(
  projectPath: string,
  overrides?: Parameters<typeof loadConfig>[1],
): Promise<ItemStoreConfig> {
  try {
    return await loadConfig(projectPath, overrides);
  } catch (error) {
    throw new CLIError(
      error instanceof Error ? error.message : String(error),
      ExitCode.CONFIG_ERROR,
      "Check .itemstorerc, the \"itemstore\" key in package.json and ITEM_STORE_* variables",
    );
  }
}

/**
 * Register the config command.
 */
export function registerConfigCommand(cli: CAC): void {
  cli
    .command("config", "Show current configuration")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ConfigOptions) => {
      const projectPath = options.project ?? process.cwd();

      const config = await loadCliConfig(projectPath);

      output(config, formatConfig, options);
    });
}
