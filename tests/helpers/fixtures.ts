/**
 * Shared test data builders.
 * @module tests/helpers/fixtures
 */

import { vi } from "vitest";
import type { Logger } from "../../src/logger.js";
import type { Item } from "../../src/types.js";

/**
 * Create an Item.
 */
export function createTestItem(overrides: Partial<Item> = {}): Item {
  return {
    text: "Test item",
    is_done: false,
    ...overrides,
  };
}

/**
 * Create `count` distinct items: "Item 0", "Item 1", ...
 * Every third item is done.
 */
export function createTestItems(count: number): Item[] {
  return Array.from({ length: count }, (_, i) => ({
    text: `Item ${i}`,
    is_done: i % 3 === 2,
  }));
}

/**
 * Create a logger whose methods are spies.
 */
export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}
