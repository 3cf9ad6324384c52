/**
 * Tests for error handling.
 * @module tests/unit/core/errors
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  ItemStoreError,
  invalidJson,
  itemNotFound,
  methodNotAllowed,
  routeNotFound,
  toItemStoreError,
  toValidationDetails,
  validationFailed,
} from "../../../src/errors.js";

function zodError(schema: z.ZodTypeAny, value: unknown): z.ZodError {
  const result = schema.safeParse(value);
  if (result.success) {
    throw new Error("expected the value to fail validation");
  }
  return result.error;
}

describe("ItemStoreError", () => {
  it("should carry code, status and name", () => {
    const error = new ItemStoreError("nope", "ITEM_NOT_FOUND", {
      statusCode: 404,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ItemStoreError);
    expect(error.name).toBe("ItemStoreError");
    expect(error.message).toBe("nope");
    expect(error.code).toBe("ITEM_NOT_FOUND");
    expect(error.statusCode).toBe(404);
    expect(error.details).toBeUndefined();
  });

  it("should default to status 500", () => {
    expect(new ItemStoreError("x", "INTERNAL_ERROR").statusCode).toBe(500);
  });

  it("should preserve the cause", () => {
    const cause = new Error("root");
    const error = new ItemStoreError("wrapped", "INTERNAL_ERROR", { cause });

    expect(error.cause).toBe(cause);
  });

  it("should expose type guard and code getters", () => {
    const notFound = itemNotFound(1);

    expect(ItemStoreError.isItemStoreError(notFound)).toBe(true);
    expect(ItemStoreError.isItemStoreError(new Error("x"))).toBe(false);
    expect(notFound.isNotFound).toBe(true);
    expect(notFound.isValidationError).toBe(false);
  });
});

describe("error factories", () => {
  it("itemNotFound() should print bigint indexes in full", () => {
    expect(itemNotFound(99999999999999999999n).message).toBe(
      "Item id 99999999999999999999 not found",
    );
  });

  it("itemNotFound() should format the index", () => {
    const error = itemNotFound(7);

    expect(error.message).toBe("Item id 7 not found");
    expect(error.code).toBe("ITEM_NOT_FOUND");
    expect(error.statusCode).toBe(404);
  });

  it("routeNotFound() should answer 404", () => {
    const error = routeNotFound("GET", "/nope");

    expect(error.message).toBe("No route for GET /nope");
    expect(error.code).toBe("ROUTE_NOT_FOUND");
    expect(error.statusCode).toBe(404);
  });

  it("methodNotAllowed() should answer 405", () => {
    const error = methodNotAllowed("DELETE", "/items");

    expect(error.message).toBe("Method DELETE not allowed for /items");
    expect(error.code).toBe("METHOD_NOT_ALLOWED");
    expect(error.statusCode).toBe(405);
  });

  it("invalidJson() should point at the body", () => {
    const error = invalidJson(new SyntaxError("Unexpected token"));

    expect(error.statusCode).toBe(422);
    expect(error.isValidationError).toBe(true);
    expect(error.details).toEqual([
      { type: "json_invalid", loc: ["body"], msg: "JSON decode error" },
    ]);
  });
});

describe("validation details", () => {
  const schema = z.object({ text: z.string(), is_done: z.boolean() });

  it("should prefix the location with the request source", () => {
    const details = toValidationDetails(
      "body",
      zodError(schema, { text: 1, is_done: true }),
    );

    expect(details).toEqual([
      {
        type: "string_type",
        loc: ["body", "text"],
        msg: "Input should be a valid string",
      },
    ]);
  });

  it("should describe wrong boolean and object types", () => {
    expect(
      toValidationDetails("body", zodError(schema, { text: "x", is_done: 1 })),
    ).toEqual([
      {
        type: "bool_type",
        loc: ["body", "is_done"],
        msg: "Input should be a valid boolean",
      },
    ]);

    expect(toValidationDetails("body", zodError(schema, 5))).toEqual([
      {
        type: "model_attributes_type",
        loc: ["body"],
        msg: "Input should be a valid dictionary or object to extract fields from",
      },
    ]);
  });

  it("should keep zod's wording for other issues", () => {
    const short = z.object({ text: z.string().min(2) });

    expect(toValidationDetails("body", zodError(short, { text: "x" }))).toEqual([
      {
        type: "too_small",
        loc: ["body", "text"],
        msg: "String must contain at least 2 character(s)",
      },
    ]);
  });

  it("should report missing fields as required", () => {
    const details = toValidationDetails(
      "body",
      zodError(schema, { text: "x" }),
    );

    expect(details).toEqual([
      { type: "missing", loc: ["body", "is_done"], msg: "Field required" },
    ]);
  });

  it("should use a custom issue's own type", () => {
    const custom = z.string().superRefine((_value, ctx) => {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "bad",
        params: { type: "int_parsing" },
      });
    });

    expect(toValidationDetails("query", zodError(custom, "x"))).toEqual([
      { type: "int_parsing", loc: ["query"], msg: "bad" },
    ]);
  });

  it("validationFailed() should build a 422 error with a summary", () => {
    const error = validationFailed(
      "body",
      zodError(schema, { text: 1, is_done: true }),
    );

    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.statusCode).toBe(422);
    expect(error.message).toBe(
      "Invalid request body: body.text: Input should be a valid string",
    );
    expect(error.details).toHaveLength(1);
  });
});

describe("toItemStoreError()", () => {
  it("should pass ItemStoreErrors through", () => {
    const original = itemNotFound(3);

    expect(toItemStoreError(original)).toBe(original);
  });

  it("should wrap other errors as INTERNAL_ERROR", () => {
    const cause = new Error("boom");
    const error = toItemStoreError(cause);

    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe("boom");
    expect(error.cause).toBe(cause);
  });

  it("should wrap non-Error values", () => {
    const error = toItemStoreError("plain string");

    expect(error.message).toBe("plain string");
    expect(error.cause).toBe("plain string");
  });
});
