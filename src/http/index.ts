/**
 * HTTP surface for todo-item-store.
 * @module http
 */

// Server
export { ItemStoreServer } from "./server.js";

// Application
export { createApp } from "./app.js";

// Schemas
export {
  integerStringSchema,
  itemInputSchema,
  itemParamsSchema,
  listQuerySchema,
  parseRequest,
} from "./schemas.js";
export type { ItemInputBody, ItemParams, ListQuery } from "./schemas.js";

// Types
export type { AppOptions, ErrorResponse, ItemStoreServerOptions } from "./types.js";

// ============================================
// Factory Function
// ============================================

import { ItemStoreServer } from "./server.js";
import type { ItemStoreServerOptions } from "./types.js";

/**
 * Factory function to create and start a server.
 *
 * @example
 * ```typescript
 * const server = await createServer({ service: new ItemService(), port: 0 });
 * console.log(server.getUrl());
 * ```
 */
export async function createServer(
  options: ItemStoreServerOptions,
): Promise<ItemStoreServer> {
  const server = new ItemStoreServer(options);
  await server.start();
  return server;
}
