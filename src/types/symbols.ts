/**
 * Internal brand symbols used to tag created objects at runtime and help with
 * type-narrowing. Prefer `isOrderedList()` instead of touching these directly.
 * @internal
 */
export const symbolOrderedList: unique symbol = Symbol.for("orderedList.list");

/** @internal Marks error helpers produced by the error builder */
export const symbolError: unique symbol = Symbol.for("orderedList.error");
