/**
 * In-memory, append-only item store.
 * @module store/item-store
 */

import { itemNotFound } from "../errors.js";
import { TypedEventEmitter } from "../events.js";
import type { Item } from "../types.js";

/**
 * Ordered sequence of items held in process memory.
 *
 * An item's identity is its zero-based position. The sequence only grows,
 * so a position stays valid for the lifetime of the store. Stored items are
 * frozen copies; callers never hold a reference that can alter the store.
 *
 * All operations are synchronous. Node runs them to completion one at a
 * time, so concurrent requests never observe a partially applied append.
 *
 * @example
 * ```typescript
 * const store = new ItemStore();
 * store.append({ text: 'Buy groceries', is_done: false });
 * store.get(0); // { text: 'Buy groceries', is_done: false }
 * store.get(1); // throws ItemStoreError("Item id 1 not found")
 * ```
 */
export class ItemStore extends TypedEventEmitter {
  private readonly items: Array<Readonly<Item>> = [];

  /**
   * Current number of items.
   */
  get size(): number {
    return this.items.length;
  }

  /**
   * Append an item at the end of the sequence.
   *
   * @returns Snapshot of the full sequence after the append
   */
  append(item: Item): ReadonlyArray<Readonly<Item>> {
    const stored = Object.freeze({ text: item.text, is_done: item.is_done });
    this.items.push(stored);
    this.emit("item:created", stored, this.items.length - 1);
    return this.items.slice();
  }

  /**
   * Get the first `limit` items in insertion order.
   * A limit past the end returns every item; zero or less returns none.
   */
  list(limit: number): ReadonlyArray<Readonly<Item>> {
    if (limit <= 0) {
      return [];
    }
    return this.items.slice(0, limit);
  }

  /**
   * Get the item at a position.
   *
   * @throws {ItemStoreError} ITEM_NOT_FOUND when index is outside [0, size)
   */
  get(index: number): Readonly<Item> {
    const item = Number.isInteger(index) && index >= 0 ? this.items[index] : undefined;
    if (item === undefined) {
      this.emit("item:not-found", index);
      throw itemNotFound(index);
    }
    return item;
  }
}
