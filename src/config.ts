/**
 * Configuration loading for todo-item-store.
 * Uses Zod schemas for validation and deep merging.
 * @module config
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { ItemStoreConfig } from "./types.js";

// ============================================
// Zod Schemas
// ============================================

const serverSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  cors: z.boolean(),
});

const itemsSchema = z.object({
  defaultLimit: z.number().int().min(0),
});

const loggingSchema = z.object({
  requests: z.boolean(),
});

/** Full config schema, used for final validation. */
const configSchema = z.object({
  server: serverSchema,
  items: itemsSchema,
  logging: loggingSchema,
});

// ============================================
// Defaults
// ============================================

/**
 * Default configuration values.
 */
const DEFAULT_CONFIG: ItemStoreConfig = {
  server: {
    host: "127.0.0.1",
    port: 8000,
    cors: false,
  },
  items: {
    defaultLimit: 10,
  },
  logging: {
    requests: true,
  },
};

// ============================================
// Partial Config Type
// ============================================

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type PartialConfig = DeepPartial<ItemStoreConfig>;

// ============================================
// Deep Merge Utility
// ============================================

/**
 * Check if a value is a plain object (not array, null, etc.).
 * @internal
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not merged.
 * @internal
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }

  return result;
}

// ============================================
// File Loaders
// ============================================

/**
 * Read and parse a JSON file.
 * Returns undefined if the file doesn't exist or is invalid JSON.
 * @internal
 */
async function readJsonFile(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    return JSON.parse(content) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Load configuration from the package.json "itemstore" key.
 * @internal
 */
async function loadPackageJsonConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const pkg = await readJsonFile(join(projectPath, "package.json"));

  if (isPlainObject(pkg) && isPlainObject(pkg["itemstore"])) {
    return pkg["itemstore"];
  }

  return undefined;
}

/**
 * Load configuration from the .itemstorerc file.
 * @internal
 */
async function loadRcConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const rc = await readJsonFile(join(projectPath, ".itemstorerc"));
  return isPlainObject(rc) ? rc : undefined;
}

// ============================================
// Environment Variables
// ============================================

/**
 * Parse a decimal integer, returning undefined for anything else.
 * @internal
 */
function parseInteger(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Parse a boolean flag ("true"/"false"/"1"/"0").
 * @internal
 */
function parseFlag(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      return undefined;
  }
}

/**
 * Build a partial config from environment variables.
 * Invalid values are ignored.
 * @internal
 */
function getEnvConfig(): PartialConfig {
  const partial: PartialConfig = {};

  const host = process.env["ITEM_STORE_HOST"];
  if (host) {
    partial.server = { ...partial.server, host };
  }

  const port = process.env["ITEM_STORE_PORT"];
  if (port) {
    const parsed = parseInteger(port);
    if (parsed !== undefined && parsed > 0 && parsed < 65536) {
      partial.server = { ...partial.server, port: parsed };
    }
  }

  const defaultLimit = process.env["ITEM_STORE_DEFAULT_LIMIT"];
  if (defaultLimit) {
    const parsed = parseInteger(defaultLimit);
    if (parsed !== undefined) {
      partial.items = { defaultLimit: parsed };
    }
  }

  const logRequests = process.env["ITEM_STORE_LOG_REQUESTS"];
  if (logRequests) {
    const parsed = parseFlag(logRequests);
    if (parsed !== undefined) {
      partial.logging = { requests: parsed };
    }
  }

  return partial;
}

// ============================================
// Public API
// ============================================

/**
 * Load configuration from multiple sources with priority order:
 *
 * 1. Explicit overrides (highest priority)
 * 2. Environment variables
 * 3. .itemstorerc file
 * 4. package.json "itemstore" key
 * 5. Default values (lowest priority)
 *
 * @param projectPath - Directory holding package.json / .itemstorerc (default: process.cwd())
 * @param overrides - Explicit configuration overrides
 * @throws {Error} If the merged configuration is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 *
 * const config = await loadConfig('/srv/items', {
 *   server: { port: 9000 },
 * });
 * ```
 */
export async function loadConfig(
  projectPath: string = process.cwd(),
  overrides?: PartialConfig,
): Promise<ItemStoreConfig> {
  // Collect all config sources (lowest to highest priority)
  const sources: Record<string, unknown>[] = [];

  const pkgConfig = await loadPackageJsonConfig(projectPath);
  if (pkgConfig) {
    sources.push(pkgConfig);
  }

  const rcConfig = await loadRcConfig(projectPath);
  if (rcConfig) {
    sources.push(rcConfig);
  }

  const envConfig = getEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    sources.push(envConfig);
  }

  if (overrides) {
    sources.push(overrides);
  }

  let merged: Record<string, unknown> = { ...getDefaultConfig() };
  for (const source of sources) {
    merged = deepMerge(merged, source);
  }

  const parseResult = configSchema.safeParse(merged);

  if (!parseResult.success) {
    throw new Error(
      `Invalid configuration: ${parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
    );
  }

  return parseResult.data;
}

/**
 * Get default configuration without loading from files.
 * Useful for testing or when you want explicit control.
 */
export function getDefaultConfig(): ItemStoreConfig {
  return structuredClone(DEFAULT_CONFIG);
}
