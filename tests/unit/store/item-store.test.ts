/**
 * Tests for the ItemStore class.
 * @module tests/unit/store/item-store
 */

import { describe, it, expect, vi } from "vitest";
import { ItemStore } from "../../../src/store/index.js";
import { ItemStoreError } from "../../../src/errors.js";
import { createTestItem, createTestItems } from "../../helpers/fixtures.js";

describe("ItemStore", () => {
  describe("append()", () => {
    it("should start empty", () => {
      const store = new ItemStore();

      expect(store.size).toBe(0);
      expect(store.list(10)).toEqual([]);
    });

    it("should return the full sequence after each append", () => {
      const store = new ItemStore();
      const first = createTestItem({ text: "first" });
      const second = createTestItem({ text: "second", is_done: true });

      expect(store.append(first)).toEqual([first]);
      expect(store.append(second)).toEqual([first, second]);
      expect(store.size).toBe(2);
    });

    it("should return a snapshot unaffected by later appends", () => {
      const store = new ItemStore();

      const snapshot = store.append(createTestItem({ text: "a" }));
      store.append(createTestItem({ text: "b" }));

      expect(snapshot).toHaveLength(1);
    });

    it("should keep submission order for many items", () => {
      const store = new ItemStore();
      const items = createTestItems(25);

      for (const item of items) {
        store.append(item);
      }

      expect(store.size).toBe(25);
      expect(store.list(25)).toEqual(items);
    });

    it("should store a frozen copy of the item", () => {
      const store = new ItemStore();
      const input = createTestItem({ text: "original" });

      store.append(input);
      input.text = "changed";

      const stored = store.get(0);
      expect(stored.text).toBe("original");
      expect(Object.isFrozen(stored)).toBe(true);
    });

    it("should emit item:created with the item and its index", () => {
      const store = new ItemStore();
      const listener = vi.fn();
      store.on("item:created", listener);

      store.append(createTestItem({ text: "a" }));
      store.append(createTestItem({ text: "b" }));

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener).toHaveBeenNthCalledWith(
        2,
        { text: "b", is_done: false },
        1,
      );
    });
  });

  describe("list()", () => {
    const filled = (): ItemStore => {
      const store = new ItemStore();
      for (const item of createTestItems(5)) {
        store.append(item);
      }
      return store;
    };

    it("should return the first limit items", () => {
      const result = filled().list(3);

      expect(result.map((item) => item.text)).toEqual([
        "Item 0",
        "Item 1",
        "Item 2",
      ]);
    });

    it("should return every item when limit exceeds size", () => {
      expect(filled().list(100)).toHaveLength(5);
    });

    it("should return an empty list for a zero limit", () => {
      expect(filled().list(0)).toEqual([]);
    });

    it("should return an empty list for a negative limit", () => {
      expect(filled().list(-2)).toEqual([]);
    });
  });

  describe("get()", () => {
    it("should return the item at each position", () => {
      const store = new ItemStore();
      const items = createTestItems(3);
      for (const item of items) {
        store.append(item);
      }

      expect(store.get(0)).toEqual(items[0]);
      expect(store.get(1)).toEqual(items[1]);
      expect(store.get(2)).toEqual(items[2]);
    });

    it("should return the same item on repeated calls", () => {
      const store = new ItemStore();
      store.append(createTestItem());

      expect(store.get(0)).toBe(store.get(0));
    });

    it("should throw ITEM_NOT_FOUND past the end", () => {
      const store = new ItemStore();
      store.append(createTestItem());
      store.append(createTestItem());

      expect(() => store.get(2)).toThrow("Item id 2 not found");
    });

    it("should throw on an empty store", () => {
      const store = new ItemStore();

      let caught: unknown;
      try {
        store.get(99);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ItemStoreError);
      expect(caught).toMatchObject({
        message: "Item id 99 not found",
        code: "ITEM_NOT_FOUND",
        statusCode: 404,
      });
    });

    it("should throw for a negative index", () => {
      const store = new ItemStore();
      store.append(createTestItem());

      expect(() => store.get(-1)).toThrow("Item id -1 not found");
    });

    it("should throw for a fractional index", () => {
      const store = new ItemStore();
      store.append(createTestItem());
      store.append(createTestItem());

      expect(() => store.get(0.5)).toThrow("Item id 0.5 not found");
    });

    it("should emit item:not-found before throwing", () => {
      const store = new ItemStore();
      const listener = vi.fn();
      store.on("item:not-found", listener);

      expect(() => store.get(4)).toThrow(ItemStoreError);
      expect(listener).toHaveBeenCalledWith(4);
    });
  });
});
