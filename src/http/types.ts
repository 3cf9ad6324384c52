/**
 * Type definitions for the HTTP layer.
 * @module http/types
 */

import type { Logger } from "../logger.js";
import type { ItemService } from "../service.js";

// ============================================
// Application Options
// ============================================

/**
 * Options for building the express application.
 */
export interface AppOptions {
  /** Add permissive CORS headers (default: false) */
  cors?: boolean;
  /** Log one line per handled request (default: false) */
  logRequests?: boolean;
  /** Destination for request lines and unexpected errors (default: stderr) */
  logger?: Logger;
}

// ============================================
// Server Options
// ============================================

/**
 * Options for creating the HTTP server.
 */
export interface ItemStoreServerOptions {
  /** Service answering requests */
  service: ItemService;
  /** Host to bind to (default: "127.0.0.1") */
  host?: string;
  /** Port to listen on; 0 picks a free port (default: 8000) */
  port?: number;
  /** Add permissive CORS headers (default: false) */
  cors?: boolean;
  /** Log requests and store events (default: true) */
  logRequests?: boolean;
  /** Suppress all log output (default: false) */
  quiet?: boolean;
  /** Logger to use instead of the default stderr logger */
  logger?: Logger;
  /** Server name used in log lines (default: "item-store") */
  name?: string;
}

/**
 * Body of the 404/405/422/500 responses.
 */
export interface ErrorResponse {
  detail: unknown;
}
