/**
 * Zod schemas for request validation.
 * @module http/schemas
 */

import { z } from "zod";
import { validationFailed, type RequestSource } from "../errors.js";

// ============================================
// Scalars
// ============================================

const INTEGER_PATTERN = /^[+-]?\d+$/;

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Integer written as a URL string: optional sign, then digits.
 * Parsed to a bigint so that no valid integer is rejected for its size.
 */
export const integerStringSchema = z.string().transform((value, ctx) => {
  const trimmed = value.trim();

  if (!INTEGER_PATTERN.test(trimmed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "Input should be a valid integer, unable to parse string as an integer",
      params: { type: "int_parsing" },
    });
    return z.NEVER;
  }

  return BigInt(trimmed);
});

/**
 * A limit past the safe range still means "all items" (or none, when negative).
 * @internal
 */
function clampLimit(value: bigint): number {
  if (value > MAX_SAFE) return Number.MAX_SAFE_INTEGER;
  if (value < -MAX_SAFE) return 0;
  return Number(value);
}

/**
 * Indexes past the safe range can never address an item. They stay bigint
 * so the not-found message can repeat them exactly.
 * @internal
 */
function toIndex(value: bigint): number | bigint {
  return value > MAX_SAFE || value < -MAX_SAFE ? value : Number(value);
}

const TRUE_STRINGS = new Set(["1", "on", "t", "true", "y", "yes"]);
const FALSE_STRINGS = new Set(["0", "off", "f", "false", "n", "no"]);

/**
 * Lenient boolean: accepts true/false, 0/1 and the usual yes/no words.
 */
export const booleanInputSchema = z
  .unknown()
  .transform((value, ctx): boolean => {
    if (typeof value === "boolean") return value;

    if (typeof value === "number" || typeof value === "string") {
      const key = String(value).toLowerCase();
      if (TRUE_STRINGS.has(key)) return true;
      if (FALSE_STRINGS.has(key)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Input should be a valid boolean, unable to interpret input",
        params: { type: "bool_parsing" },
      });
      return z.NEVER;
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Input should be a valid boolean",
      params: { type: "bool_type" },
    });
    return z.NEVER;
  });

/**
 * Repeated query parameters arrive as arrays; the last value wins.
 * @internal
 */
function lastValue(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

// ============================================
// Request Schemas
// ============================================

/**
 * Body of POST /items. Unknown fields are dropped.
 */
export const itemInputSchema = z.object({
  text: z.string().nullable().default(null),
  is_done: booleanInputSchema.default(false),
});

/**
 * Query string of GET /items. A missing limit is left to the service default.
 */
export const listQuerySchema = z.object({
  limit: z
    .preprocess(lastValue, integerStringSchema.transform(clampLimit))
    .optional(),
});

/**
 * Path parameters of GET /items/:item_id. Out-of-range ids come back as bigint.
 */
export const itemParamsSchema = z.object({
  item_id: integerStringSchema.transform(toIndex),
});

export type ItemInputBody = z.infer<typeof itemInputSchema>;
export type ListQuery = z.infer<typeof listQuerySchema>;
export type ItemParams = z.infer<typeof itemParamsSchema>;

// ============================================
// Parsing
// ============================================

/**
 * Validate one part of a request.
 *
 * @throws {ItemStoreError} VALIDATION_ERROR (422) with per-field details
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  source: RequestSource,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw validationFailed(source, result.error);
  }
  return result.data;
}
