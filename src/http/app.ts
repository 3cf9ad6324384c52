/**
 * Express application exposing the item store over HTTP.
 * @module http/app
 */

import type { IncomingMessage } from "node:http";
import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import {
  ItemStoreError,
  invalidJson,
  itemNotFound,
  methodNotAllowed,
  routeNotFound,
  toItemStoreError,
} from "../errors.js";
import { createLogger } from "../logger.js";
import type { ItemService } from "../service.js";
import {
  itemInputSchema,
  itemParamsSchema,
  listQuerySchema,
  parseRequest,
} from "./schemas.js";
import type { AppOptions } from "./types.js";

/** Request body size limit for JSON payloads */
const BODY_LIMIT = "100kb";

// ============================================
// Error Responses
// ============================================

/**
 * Body-parser failures carry a `type` string and an HTTP status.
 * @internal
 */
function bodyParserFailure(
  error: unknown,
): { type: string; status: number } | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if (!("type" in error) || !("status" in error)) return undefined;
  const { type, status } = error;
  if (typeof type !== "string" || typeof status !== "number") return undefined;
  return { type, status };
}

/**
 * Body sent to the client for an error.
 * @internal
 */
function errorBody(error: ItemStoreError): { detail: unknown } {
  switch (error.code) {
    case "VALIDATION_ERROR":
      return { detail: error.details ?? [] };
    case "ROUTE_NOT_FOUND":
      return { detail: "Not Found" };
    case "METHOD_NOT_ALLOWED":
      return { detail: "Method Not Allowed" };
    case "INTERNAL_ERROR":
      return { detail: "Internal Server Error" };
    default:
      return { detail: error.message };
  }
}

/**
 * Answer 405 for methods a route does not serve.
 * @internal
 */
function rejectMethod(allowed: string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    res.setHeader("Allow", allowed.join(", "));
    next(methodNotAllowed(req.method, req.path));
  };
}

// ============================================
// Application Factory
// ============================================

/**
 * Build the express application for an ItemService.
 *
 * Routes:
 * - GET  /                 greeting
 * - POST /items            append an item, answer with every item
 * - GET  /items?limit=n    first n items (default from the service)
 * - GET  /items/:item_id   one item by position, 404 when out of range
 *
 * @example
 * ```typescript
 * const app = createApp(new ItemService(), { cors: true });
 * app.listen(8000);
 * ```
 */
export function createApp(service: ItemService, options: AppOptions = {}): Express {
  const logger = options.logger ?? createLogger();
  const app = express();

  // Requests that carried a non-empty JSON body
  const jsonBodies = new WeakSet<IncomingMessage>();

  app.disable("x-powered-by");
  app.use(
    express.json({
      limit: BODY_LIMIT,
      strict: false,
      verify: (req, _res, buf) => {
        if (buf.length > 0) jsonBodies.add(req);
      },
    }),
  );

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    next();
  });

  // WARNING: cors: true enables Access-Control-Allow-Origin: *
  if (options.cors) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      res.header("Access-Control-Allow-Origin", "*");
      res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
      res.header("Access-Control-Allow-Headers", "Content-Type");
      if (req.method === "OPTIONS") {
        res.sendStatus(200);
        return;
      }
      next();
    });
  }

  if (options.logRequests) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const startedAt = Date.now();
      res.on("finish", () => {
        logger.info(
          `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`,
        );
      });
      next();
    });
  }

  app
    .route("/")
    .get((_req: Request, res: Response) => {
      res.json(service.greet());
    })
    .all(rejectMethod(["GET"]));

  app
    .route("/items")
    .get((req: Request, res: Response) => {
      const query = parseRequest(listQuerySchema, req.query, "query");
      res.json(service.listItems(query.limit));
    })
    .post((req: Request, res: Response) => {
      // express.json() leaves {} behind when there is no JSON body; null counts as none
      const raw: unknown =
        jsonBodies.has(req) && req.body !== null ? req.body : undefined;
      const body = parseRequest(itemInputSchema, raw, "body");
      res.json(service.createItem(body));
    })
    .all(rejectMethod(["GET", "POST"]));

  app
    .route("/items/:item_id")
    .get((req: Request, res: Response) => {
      const { item_id: itemId } = parseRequest(itemParamsSchema, req.params, "path");
      if (typeof itemId === "bigint") throw itemNotFound(itemId);
      res.json(service.getItem(itemId));
    })
    .all(rejectMethod(["GET"]));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(routeNotFound(req.method, req.path));
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const failure = bodyParserFailure(error);
    let storeError: ItemStoreError;
    if (failure?.type === "entity.parse.failed") {
      storeError = invalidJson(error);
    } else if (failure && failure.status >= 400 && failure.status < 500) {
      const message = error instanceof Error ? error.message : failure.type;
      res.status(failure.status).json({ detail: message });
      return;
    } else {
      storeError = toItemStoreError(error);
    }

    if (storeError.code === "INTERNAL_ERROR") {
      logger.error(storeError.message, storeError.cause);
    }

    res.status(storeError.statusCode).json(errorBody(storeError));
  };
  app.use(handleError);

  return app;
}
