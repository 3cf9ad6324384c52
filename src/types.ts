/**
 * Core type definitions for todo-item-store.
 * @module types
 */

// ============================================
// Item Types
// ============================================

/**
 * A to-do entry as stored and served.
 *
 * Field names follow the wire format, so an Item serializes to JSON as-is.
 */
export interface Item {
  /** Descriptive text; null when the item was created without any */
  text: string | null;
  /** Completion flag */
  is_done: boolean;
}

/**
 * Input accepted when creating an item. Omitted fields take their defaults.
 */
export interface ItemInput {
  text?: string | null;
  is_done?: boolean;
}

/**
 * Response of the greet operation.
 */
export interface Greeting {
  Hello: "World";
}

// ============================================
// Error Codes
// ============================================

/**
 * Error codes for programmatic handling.
 */
export const ItemStoreErrorCode = {
  ITEM_NOT_FOUND: "ITEM_NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  ROUTE_NOT_FOUND: "ROUTE_NOT_FOUND",
  METHOD_NOT_ALLOWED: "METHOD_NOT_ALLOWED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ItemStoreErrorCode =
  (typeof ItemStoreErrorCode)[keyof typeof ItemStoreErrorCode];

/**
 * One entry of a validation failure, in the shape sent to HTTP clients.
 */
export interface ValidationDetail {
  /** Machine-readable failure kind (e.g. "invalid_type", "int_parsing") */
  type: string;
  /** Where the failure happened, starting with "body", "query" or "path" */
  loc: Array<string | number>;
  /** Human-readable message */
  msg: string;
}

// ============================================
// Configuration
// ============================================

/**
 * HTTP server settings.
 */
export interface ServerConfig {
  /** Host to bind to (default: "127.0.0.1") */
  host: string;
  /** Port to listen on (default: 8000) */
  port: number;
  /** Add permissive CORS headers (default: false) */
  cors: boolean;
}

/**
 * Item listing settings.
 */
export interface ItemsConfig {
  /** Limit used by list operations when none is given (default: 10) */
  defaultLimit: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Log one line per handled request (default: true) */
  requests: boolean;
}

/**
 * Full configuration for todo-item-store.
 */
export interface ItemStoreConfig {
  server: ServerConfig;
  items: ItemsConfig;
  logging: LoggingConfig;
}
