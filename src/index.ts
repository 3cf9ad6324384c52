/**
 * todo-item-store - an in-memory to-do item store served over REST.
 *
 * @example
 * ```typescript
 * import { ItemService, ItemStoreServer, loadConfig } from 'todo-item-store';
 *
 * const config = await loadConfig();
 * const service = new ItemService({ defaultLimit: config.items.defaultLimit });
 *
 * const server = new ItemStoreServer({
 *   service,
 *   host: config.server.host,
 *   port: config.server.port,
 * });
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Service
export { ItemService, DEFAULT_LIST_LIMIT } from "./service.js";
export type { ItemServiceOptions } from "./service.js";

// Store
export { ItemStore } from "./store/index.js";

// Event system
export { TypedEventEmitter } from "./events.js";
export type { StoreEventMap, StoreEventName } from "./events.js";

// Configuration
export { loadConfig, getDefaultConfig } from "./config.js";
export type { PartialConfig } from "./config.js";

// Logging
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// Error handling
export {
  ItemStoreError,
  itemNotFound,
  toItemStoreError,
  toValidationDetails,
} from "./errors.js";
export type { RequestSource } from "./errors.js";

// HTTP
export { ItemStoreServer, createApp, createServer } from "./http/index.js";
export type {
  AppOptions,
  ErrorResponse,
  ItemStoreServerOptions,
} from "./http/index.js";

// Types
export { ItemStoreErrorCode } from "./types.js";
export type {
  Greeting,
  Item,
  ItemInput,
  ItemsConfig,
  ItemStoreConfig,
  LoggingConfig,
  ServerConfig,
  ValidationDetail,
} from "./types.js";
