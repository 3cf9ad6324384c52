/**
 * Event system for the item store.
 * @module events
 */

import { EventEmitter } from "node:events";
import type { Item } from "./types.js";

// ============================================
// Event Types
// ============================================

/**
 * Event map defining all store events and their payload types.
 *
 * Each event is defined as a tuple of arguments that will be passed
 * to listeners when the event is emitted.
 */
export interface StoreEventMap {
  /** Emitted after an item is appended */
  "item:created": [item: Readonly<Item>, index: number];

  /** Emitted when a lookup falls outside the store's bounds */
  "item:not-found": [index: number];
}

/**
 * Event names as a union type.
 */
export type StoreEventName = keyof StoreEventMap;

// ============================================
// Typed EventEmitter
// ============================================

/**
 * Type-safe EventEmitter for the item store.
 *
 * Provides compile-time checking for event names and listener signatures.
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter();
 *
 * emitter.on('item:created', (item, index) => {
 *   console.log(`Item ${index}: ${item.text}`);
 * });
 *
 * // Compile error: wrong argument type
 * emitter.emit('item:not-found', 'three'); // Error!
 * ```
 */
export class TypedEventEmitter extends EventEmitter {
  on<K extends StoreEventName>(
    event: K,
    listener: (...args: StoreEventMap[K]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  /**
   * Add a one-time listener for the specified event.
   * The listener is removed after the first invocation.
   */
  once<K extends StoreEventName>(
    event: K,
    listener: (...args: StoreEventMap[K]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  off<K extends StoreEventName>(
    event: K,
    listener: (...args: StoreEventMap[K]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  /**
   * Emit an event with type-safe arguments.
   *
   * @returns True if the event had listeners, false otherwise
   */
  emit<K extends StoreEventName>(
    event: K,
    ...args: StoreEventMap[K]
  ): boolean {
    return super.emit(event, ...args);
  }

  removeAllListeners(event?: StoreEventName): this {
    // EventEmitter only clears every event when called without an argument
    return event === undefined
      ? super.removeAllListeners()
      : super.removeAllListeners(event);
  }

  listenerCount(event: StoreEventName): number {
    return super.listenerCount(event);
  }
}
