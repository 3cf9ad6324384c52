/**
 * Console output for the item-store CLI. Results go to stdout and progress
 * messages to stderr, so `item-store config --json` can be piped.
 * @module cli/utils/output
 */

import type { ItemStoreConfig } from "../../types.js";

/**
 * Flags shared by every command that prints.
 */
export interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Print a command result, as JSON under --json and through the formatter otherwise.
 */
export function output<T>(
  data: T,
  formatter: (data: T) => string,
  options: OutputOptions = {},
): void {
  if (options.quiet) return;
  console.log(options.json ? JSON.stringify(data, null, 2) : formatter(data));
}

/**
 * Print a progress message to stderr. Silent under --quiet and --json.
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.quiet || options.json) return;
  console.error(message);
}

// ============================================
// Formatters
// ============================================

/**
 * Human-readable view of a resolved configuration.
 */
export function formatConfig({ server, items, logging }: ItemStoreConfig): string {
  return [
    "Server:",
    `  Host: ${server.host}`,
    `  Port: ${server.port}`,
    `  CORS: ${server.cors ? "enabled" : "disabled"}`,
    "",
    "Items:",
    `  Default limit: ${items.defaultLimit}`,
    "",
    "Logging:",
    `  Requests: ${logging.requests ? "on" : "off"}`,
  ].join("\n");
}
