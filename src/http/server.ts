/**
 * HTTP server for the item store.
 * @module http/server
 */

import type { Server } from "node:http";
import { createLogger, type Logger } from "../logger.js";
import type { ItemService } from "../service.js";
import type { Item } from "../types.js";
import { createApp } from "./app.js";
import type { ItemStoreServerOptions } from "./types.js";

// ============================================
// Constants
// ============================================

/** Default server configuration */
const DEFAULTS = {
  name: "item-store",
  host: "127.0.0.1",
  port: 8000,
};

// ============================================
// Server Class
// ============================================

/**
 * ItemStoreServer binds the express application to a port and manages
 * its lifecycle.
 *
 * @example
 * ```typescript
 * const server = new ItemStoreServer({
 *   service: new ItemService(),
 *   port: 8000,
 * });
 *
 * await server.start();
 * // ...
 * await server.stop();
 * ```
 */
export class ItemStoreServer {
  private readonly service: ItemService;
  private readonly name: string;
  private readonly host: string;
  private readonly port: number;
  private readonly cors: boolean;
  private readonly logRequests: boolean;
  private readonly logger: Logger;

  private httpServer: Server | null = null;
  private running = false;

  private readonly onItemCreated = (item: Readonly<Item>, index: number): void => {
    this.logger.info(`Created item ${index}: ${JSON.stringify(item)}`);
  };

  private readonly onItemNotFound = (index: number): void => {
    this.logger.info(`Item ${index} not found (store size ${this.service.store.size})`);
  };

  constructor(options: ItemStoreServerOptions) {
    this.service = options.service;
    this.name = options.name ?? DEFAULTS.name;
    this.host = options.host ?? DEFAULTS.host;
    this.port = options.port ?? DEFAULTS.port;
    this.cors = options.cors ?? false;
    this.logRequests = options.logRequests ?? true;
    this.logger =
      options.logger ??
      createLogger({ quiet: options.quiet ?? false, prefix: `[${this.name}]` });
  }

  /**
   * Start listening.
   *
   * @throws {Error} If the server is already running or the port cannot be bound
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error("Item store server is already running");
    }

    const app = createApp(this.service, {
      cors: this.cors,
      logRequests: this.logRequests,
      logger: this.logger,
    });

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(this.port, this.host);
      listening.once("error", reject);
      listening.once("listening", () => {
        listening.off("error", reject);
        resolve(listening);
      });
    });

    this.httpServer = server;
    this.running = true;

    if (this.logRequests) {
      this.service.store.on("item:created", this.onItemCreated);
      this.service.store.on("item:not-found", this.onItemNotFound);
    }

    this.logger.info(`Server started at ${this.getUrl()}`);
  }

  /**
   * Stop the server.
   *
   * Always cleans up state even if close fails.
   * Throws after cleanup if there was an error.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    let closeError: Error | null = null;
    const server = this.httpServer;

    if (server) {
      try {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => {
            if (err) reject(err);
            else resolve();
          });
          server.closeAllConnections();
        });
      } catch (err) {
        closeError = err instanceof Error ? err : new Error(String(err));
      }
      this.httpServer = null;
    }

    this.service.store.off("item:created", this.onItemCreated);
    this.service.store.off("item:not-found", this.onItemNotFound);
    this.running = false;
    this.logger.info("Server stopped");

    // Re-throw error after cleanup is complete
    if (closeError) throw closeError;
  }

  /**
   * Check if the server is running.
   */
  isRunning(): boolean {
    return this.running;
  }

  /**
   * Get the bound port. Before start() this is the configured port.
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.port;
  }

  /**
   * Get the host the server binds to.
   */
  getHost(): string {
    return this.host;
  }

  /**
   * Get the base URL of the running server.
   */
  getUrl(): string {
    return `http://${this.host}:${this.getPort()}`;
  }
}
