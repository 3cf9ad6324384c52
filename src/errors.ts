/**
 * Error handling for todo-item-store.
 * @module errors
 */

import type { ZodError, ZodIssue } from "zod";
import type { ItemStoreErrorCode, ValidationDetail } from "./types.js";

/**
 * Where a validated request value came from.
 */
export type RequestSource = "body" | "query" | "path";

/**
 * Base error class for all item store errors.
 *
 * Carries an error code for programmatic handling and the HTTP status
 * the error maps to when it reaches a client.
 *
 * @example
 * ```typescript
 * try {
 *   service.getItem(7);
 * } catch (error) {
 *   if (ItemStoreError.isItemStoreError(error) && error.isNotFound) {
 *     console.error(error.message); // "Item id 7 not found"
 *   }
 * }
 * ```
 */
export class ItemStoreError extends Error {
  /** Error code for programmatic handling */
  readonly code: ItemStoreErrorCode;

  /** HTTP status code sent to clients */
  readonly statusCode: number;

  /** Per-field failures, for validation errors */
  readonly details?: ValidationDetail[];

  constructor(
    message: string,
    code: ItemStoreErrorCode,
    options: {
      cause?: unknown;
      statusCode?: number;
      details?: ValidationDetail[];
    } = {},
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "ItemStoreError";
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }

  /**
   * Type guard to check if an error is an ItemStoreError.
   */
  static isItemStoreError(error: unknown): error is ItemStoreError {
    return error instanceof ItemStoreError;
  }

  /** Check if a requested item does not exist */
  get isNotFound(): boolean {
    return this.code === "ITEM_NOT_FOUND";
  }

  /** Check if this is a validation error */
  get isValidationError(): boolean {
    return this.code === "VALIDATION_ERROR";
  }
}

/**
 * Create the error raised when an index is outside the store's bounds.
 */
export function itemNotFound(index: number | bigint): ItemStoreError {
  return new ItemStoreError(`Item id ${index} not found`, "ITEM_NOT_FOUND", {
    statusCode: 404,
  });
}

/**
 * Create the error raised when no endpoint matches a request.
 */
export function routeNotFound(method: string, path: string): ItemStoreError {
  return new ItemStoreError(`No route for ${method} ${path}`, "ROUTE_NOT_FOUND", {
    statusCode: 404,
  });
}

/**
 * Create the error raised when a path exists but not for this method.
 */
export function methodNotAllowed(method: string, path: string): ItemStoreError {
  return new ItemStoreError(
    `Method ${method} not allowed for ${path}`,
    "METHOD_NOT_ALLOWED",
    { statusCode: 405 },
  );
}

/**
 * Client-facing wording for a value of the wrong JSON type, by expected type.
 * @internal
 */
const TYPE_MISMATCH: Record<string, { type: string; msg: string }> = {
  string: { type: "string_type", msg: "Input should be a valid string" },
  boolean: { type: "bool_type", msg: "Input should be a valid boolean" },
  object: {
    type: "model_attributes_type",
    msg: "Input should be a valid dictionary or object to extract fields from",
  },
};

/**
 * Pick the detail type and message for a zod issue. Custom issues name
 * their own type through `params.type`.
 * @internal
 */
function describeIssue(issue: ZodIssue): { type: string; msg: string } {
  if (issue.code === "invalid_type") {
    if (issue.received === "undefined") {
      return { type: "missing", msg: "Field required" };
    }
    const mismatch = TYPE_MISMATCH[issue.expected];
    if (mismatch) return mismatch;
  }
  if (issue.code === "custom") {
    const custom: unknown = issue.params?.["type"];
    if (typeof custom === "string") return { type: custom, msg: issue.message };
  }
  return { type: issue.code, msg: issue.message };
}

/**
 * Convert zod issues into client-facing validation details.
 */
export function toValidationDetails(
  source: RequestSource,
  error: ZodError,
): ValidationDetail[] {
  return error.issues.map((issue) => {
    const { type, msg } = describeIssue(issue);
    return { type, loc: [source, ...issue.path], msg };
  });
}

/**
 * Create a validation error for a request part that failed its schema.
 */
export function validationFailed(
  source: RequestSource,
  error: ZodError,
): ItemStoreError {
  const details = toValidationDetails(source, error);
  return new ItemStoreError(
    `Invalid request ${source}: ${details.map((d) => `${d.loc.join(".")}: ${d.msg}`).join(", ")}`,
    "VALIDATION_ERROR",
    { statusCode: 422, details, cause: error },
  );
}

/**
 * Create a validation error for a request body that is not valid JSON.
 */
export function invalidJson(cause: unknown): ItemStoreError {
  return new ItemStoreError("Invalid request body: JSON decode error", "VALIDATION_ERROR", {
    statusCode: 422,
    cause,
    details: [{ type: "json_invalid", loc: ["body"], msg: "JSON decode error" }],
  });
}

/**
 * Normalize any thrown value into an ItemStoreError.
 * Unknown failures become INTERNAL_ERROR (500) with the original as cause.
 */
export function toItemStoreError(error: unknown): ItemStoreError {
  if (ItemStoreError.isItemStoreError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ItemStoreError(message, "INTERNAL_ERROR", {
    statusCode: 500,
    cause: error,
  });
}
