/**
 * CLI serve command - start the HTTP server.
 * @module cli/commands/serve
 */

import type { CAC } from "cac";
import type { PartialConfig } from "../../config.js";
import { ItemStoreServer } from "../../http/index.js";
import { ItemService } from "../../service.js";
import {
  CLIError,
  ExitCode,
  handleError,
  info,
  serverStartError,
} from "../utils/index.js";
import { loadCliConfig } from "./config.js";

interface ServeOptions {
  project?: string;
  host?: string;
  port?: number | string;
  cors?: boolean;
  defaultLimit?: number | string;
  quiet?: boolean;
}

/**
 * Read an integer flag. cac hands numeric-looking values over as numbers.
 * @internal
 */
function integerOption(
  value: number | string | undefined,
  flag: string,
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new CLIError(
      `Invalid value for --${flag}: ${value}`,
      ExitCode.CONFIG_ERROR,
      `--${flag} takes an integer`,
    );
  }
  return parsed;
}

/**
 * Turn command-line flags into configuration overrides.
 */
export function toConfigOverrides(options: ServeOptions): PartialConfig {
  const overrides: PartialConfig = {};

  const server: NonNullable<PartialConfig["server"]> = {};
  if (options.host !== undefined) server.host = options.host;
  const port = integerOption(options.port, "port");
  if (port !== undefined) server.port = port;
  if (options.cors !== undefined) server.cors = options.cors;
  if (Object.keys(server).length > 0) overrides.server = server;

  const defaultLimit = integerOption(options.defaultLimit, "default-limit");
  if (defaultLimit !== undefined) overrides.items = { defaultLimit };

  return overrides;
}

/**
 * Register the serve command.
 */
export function registerServeCommand(cli: CAC): void {
  cli
    .command("serve", "Start the item store HTTP server")
    .option(
      "--project <path>",
      "Project directory holding configuration (default: current directory)",
    )
    .option("--host <host>", "HTTP host (default: 127.0.0.1)")
    .option("--port <port>", "HTTP port (default: 8000)")
    .option("--cors", "Enable CORS")
    .option(
      "--default-limit <n>",
      "Items returned by GET /items without a limit (default: 10)",
    )
    .option("--quiet", "Suppress output")
    .action(async (options: ServeOptions) => {
      const projectPath = options.project ?? process.cwd();
      const config = await loadCliConfig(projectPath, toConfigOverrides(options));

      const service = new ItemService({
        defaultLimit: config.items.defaultLimit,
      });

      const server = new ItemStoreServer({
        service,
        host: config.server.host,
        port: config.server.port,
        cors: config.server.cors,
        logRequests: config.logging.requests,
        quiet: options.quiet ?? false,
      });

      try {
        await server.start();
      } catch (error) {
        throw serverStartError(error, `${config.server.host}:${config.server.port}`);
      }

      const shutdown = (): void => {
        info("\nShutting down...", options);
        server.stop().then(
          () => process.exit(ExitCode.SUCCESS),
          (error: unknown) => handleError(error),
        );
      };

      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
}
