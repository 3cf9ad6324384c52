/**
 * Item Store Service - the operations exposed to clients.
 * @module service
 */

import { ItemStore } from "./store/index.js";
import type { Greeting, Item, ItemInput } from "./types.js";

/** Limit applied by listItems() when the caller gives none */
export const DEFAULT_LIST_LIMIT = 10;

const GREETING: Readonly<Greeting> = Object.freeze({ Hello: "World" });

/**
 * Options for creating the service.
 */
export interface ItemServiceOptions {
  /** Store to operate on (default: a new empty store) */
  store?: ItemStore;
  /** Limit applied by listItems() when none is given (default: 10) */
  defaultLimit?: number;
}

/**
 * ItemService implements greet, create, list and get over an ItemStore.
 *
 * The store is owned by whoever builds the service, so each application
 * context (a server, a test) works on its own sequence.
 *
 * @example
 * ```typescript
 * const service = new ItemService();
 *
 * service.createItem({ text: 'Buy groceries' });
 * service.listItems(); // [{ text: 'Buy groceries', is_done: false }]
 * service.getItem(0);  // { text: 'Buy groceries', is_done: false }
 * ```
 */
export class ItemService {
  readonly store: ItemStore;
  readonly defaultLimit: number;

  constructor(options: ItemServiceOptions = {}) {
    this.store = options.store ?? new ItemStore();
    this.defaultLimit = options.defaultLimit ?? DEFAULT_LIST_LIMIT;
  }

  /**
   * Constant liveness message.
   */
  greet(): Readonly<Greeting> {
    return GREETING;
  }

  /**
   * Append an item, filling in defaults for omitted fields.
   *
   * @returns The full item list, not just the created item
   */
  createItem(input: ItemInput = {}): ReadonlyArray<Readonly<Item>> {
    return this.store.append({
      text: input.text ?? null,
      is_done: input.is_done ?? false,
    });
  }

  /**
   * List the first `limit` items in insertion order.
   */
  listItems(limit: number = this.defaultLimit): ReadonlyArray<Readonly<Item>> {
    return this.store.list(limit);
  }

  /**
   * Get the item at position `itemId`.
   *
   * @throws {ItemStoreError} ITEM_NOT_FOUND with message "Item id {itemId} not found"
   */
  getItem(itemId: number): Readonly<Item> {
    return this.store.get(itemId);
  }
}
