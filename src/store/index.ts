/**
 * Item store exports.
 * @module store
 */

export { ItemStore } from "./item-store.js";
