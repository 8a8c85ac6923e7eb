import {
  indexOutOfRangeError,
  invalidDataTypeError,
  itemNotFoundError,
  readOnlyAlreadySetError,
  readOnlyError,
} from "../errors";
import { describeValue } from "../tools/describeValue";
import { toBoolean } from "../tools/toBoolean";
import { symbolOrderedList } from "../types/symbols";
import type { Logger } from "./Logger";
import {
  ReadOnlyState,
  collapseReadOnlyState,
  readOnlyStateOf,
} from "./ReadOnlyState";

/** Accepted by `setReadOnly()`. Strings and numbers are coerced like config flags. */
export type ReadOnlyFlag = boolean | string | number | null | undefined;

export interface OrderedListOptions {
  /** Used in error messages and as the log source. */
  name?: string;
  logger?: Logger;
}

/**
 * An integer-indexed collection.
 *
 * Items are kept in insertion order and compared with `===`. The list can be
 * locked once through `setReadOnly(true)`; after that every mutation throws.
 *
 * Subclasses that need to react to additions or removals override
 * `insertAt()` and `removeAt()`: every other mutator goes through them.
 */
export class OrderedList<T> implements Iterable<T> {
  readonly [symbolOrderedList] = true as const;
  readonly name: string;

  protected items: T[] = [];
  protected readOnlyFlag: ReadOnlyState = ReadOnlyState.Unset;

  private readonly logger?: Logger;

  /**
   * @param data initial items. When given, the read-only flag is settled
   * right away (`readOnly` missing means writable).
   * @param readOnly forwarded to `setReadOnly()`.
   */
  constructor(
    data?: Iterable<T> | null,
    readOnly?: ReadOnlyFlag,
    options: OrderedListOptions = {},
  ) {
    this.name = options.name ?? "OrderedList";
    this.logger = options.logger?.with({ source: this.name });

    if (data !== null && data !== undefined) {
      this.copyFrom(data);
      this.applyReadOnly(readOnly ?? false);
      return;
    }
    this.setReadOnly(readOnly);
  }

  get count(): number {
    return this.items.length;
  }

  get size(): number {
    return this.items.length;
  }

  get length(): number {
    return this.items.length;
  }

  /** Whether mutations are rejected. An unset flag reads as writable. */
  get readOnly(): boolean {
    return this.readOnlyFlag === ReadOnlyState.Locked;
  }

  get readOnlyState(): ReadOnlyState {
    return this.readOnlyFlag;
  }

  /**
   * Settles the read-only flag. Only the first call from outside the list
   * counts; `null`/`undefined` are ignored.
   * @throws readOnlyAlreadySetError once the flag left the unset state
   * @throws invalidDataTypeError for values that are not boolean-like
   */
  public setReadOnly(value: ReadOnlyFlag): void {
    if (value === null || value === undefined) {
      return;
    }
    if (this.readOnlyFlag !== ReadOnlyState.Unset) {
      readOnlyAlreadySetError.throw({ listName: this.name });
    }
    this.applyReadOnly(value);
  }

  /**
   * Sets the flag without the "only once" guard, for subclasses that manage
   * their own locking.
   */
  protected applyReadOnly(value: Exclude<ReadOnlyFlag, null | undefined>) {
    const flag = toBoolean(value);
    if (flag === undefined) {
      return invalidDataTypeError.throw({
        listName: this.name,
        expected: "a boolean-like read-only flag",
        received: describeValue(value),
      });
    }

    const from = this.readOnlyFlag;
    this.readOnlyFlag = readOnlyStateOf(flag);
    this.logger?.debug("read-only state set", {
      data: { from, to: this.readOnlyFlag },
    });
  }

  /** Resolves an unset flag to writable. Runs before every mutation. */
  protected collapseReadOnly(): void {
    if (this.readOnlyFlag !== ReadOnlyState.Unset) {
      return;
    }
    const from = this.readOnlyFlag;
    this.readOnlyFlag = collapseReadOnlyState(from);
    this.logger?.debug("read-only state collapsed", {
      data: { from, to: this.readOnlyFlag },
    });
  }

  protected assertWritable(): void {
    this.collapseReadOnly();
    if (this.readOnlyFlag === ReadOnlyState.Locked) {
      readOnlyError.throw({ listName: this.name });
    }
  }

  protected isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  private throwIndexOutOfRange(index: number): never {
    return indexOutOfRangeError.throw({
      listName: this.name,
      index,
      count: this.items.length,
    });
  }

  /**
   * @throws indexOutOfRangeError unless `0 <= index < count`
   */
  public itemAt(index: number): T {
    if (!this.isValidIndex(index)) {
      this.throwIndexOutOfRange(index);
    }
    return this.items[index];
  }

  /**
   * Appends an item.
   * @returns the index at which the item was added
   */
  public add(item: T): number {
    this.insertAt(this.items.length, item);
    return this.items.length - 1;
  }

  /**
   * Inserts an item at `index`; the item previously there and every later
   * one move one step towards the end. `index === count` appends.
   */
  public insertAt(index: number, item: T): void {
    this.assertWritable();
    if (index === this.items.length) {
      this.items.push(item);
    } else if (this.isValidIndex(index)) {
      this.items.splice(index, 0, item);
    } else {
      this.throwIndexOutOfRange(index);
    }
  }

  /**
   * Removes the first occurrence of `item`.
   * @returns the index the item was removed from
   */
  public remove(item: T): number {
    this.assertWritable();
    const index = this.indexOf(item);
    if (index === -1) {
      itemNotFoundError.throw({ listName: this.name });
    }
    this.removeAt(index);
    return index;
  }

  /**
   * Removes the item at `index`; later items move one step back.
   * @returns the removed item
   */
  public removeAt(index: number): T {
    this.assertWritable();
    if (!this.isValidIndex(index)) {
      this.throwIndexOutOfRange(index);
    }
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  /** Removes every item, last one first. */
  public clear(): void {
    this.assertWritable();
    for (let i = this.items.length - 1; i >= 0; --i) {
      this.removeAt(i);
    }
  }

  public contains(item: T): boolean {
    return this.indexOf(item) !== -1;
  }

  /** @returns the first index of `item`, or -1 */
  public indexOf(item: T): number {
    return this.items.indexOf(item);
  }

  /**
   * Inserts `item` right before the first occurrence of `baseItem`.
   * @returns the index `item` now has
   */
  public insertBefore(baseItem: T, item: T): number {
    this.assertWritable();
    const index = this.indexOf(baseItem);
    if (index === -1) {
      itemNotFoundError.throw({ listName: this.name });
    }
    this.insertAt(index, item);
    return index;
  }

  /**
   * Inserts `item` right after the first occurrence of `baseItem`.
   * @returns the index `item` now has
   */
  public insertAfter(baseItem: T, item: T): number {
    this.assertWritable();
    const index = this.indexOf(baseItem);
    if (index === -1) {
      itemNotFoundError.throw({ listName: this.name });
    }
    this.insertAt(index + 1, item);
    return index + 1;
  }

  /** A copy of the current items. */
  public toArray(): T[] {
    return this.items.slice();
  }

  /**
   * Replaces the contents with the items of `data`, in order.
   * `null`/`undefined` leave the list as it is.
   */
  public copyFrom(data: Iterable<T> | null | undefined): void {
    const incoming = this.readIterable(data);
    this.assertWritable();
    if (!incoming) {
      return;
    }
    if (this.items.length > 0) {
      this.clear();
    }
    for (const item of incoming) {
      this.add(item);
    }
  }

  /**
   * Appends the items of `data`, in order.
   * `null`/`undefined` leave the list as it is.
   */
  public mergeWith(data: Iterable<T> | null | undefined): void {
    const incoming = this.readIterable(data);
    this.assertWritable();
    if (!incoming) {
      return;
    }
    for (const item of incoming) {
      this.add(item);
    }
  }

  /**
   * Drains `data` up front, so an iterable that throws half-way (or the list
   * itself) never leaves a partially copied list behind.
   */
  private readIterable(data: Iterable<T> | null | undefined): T[] | null {
    if (data === null || data === undefined) {
      return null;
    }
    if (typeof data !== "object" || !(Symbol.iterator in data)) {
      return invalidDataTypeError.throw({
        listName: this.name,
        expected: "an iterable object or null",
        received: describeValue(data),
      });
    }
    return Array.from(data);
  }

  // Array-like offset access

  public existsAt(offset: number): boolean {
    return this.isValidIndex(offset);
  }

  public at(offset: number): T {
    return this.itemAt(offset);
  }

  /**
   * Writes `item` at `offset`. A missing offset, or one equal to `count`,
   * appends; an existing offset is replaced through `removeAt` + `insertAt`.
   */
  public setAt(offset: number | null | undefined, item: T): void {
    if (offset === null || offset === undefined || offset === this.count) {
      this.insertAt(this.items.length, item);
      return;
    }
    this.removeAt(offset);
    this.insertAt(offset, item);
  }

  public deleteAt(offset: number): T {
    return this.removeAt(offset);
  }

  /** Iterates a snapshot; every call starts a fresh pass over current items. */
  public *[Symbol.iterator](): Iterator<T> {
    yield* this.toArray();
  }

  public entries(): IterableIterator<[number, T]> {
    return this.toArray().entries();
  }
}

export function isOrderedList(value: unknown): value is OrderedList<unknown> {
  return (
    typeof value === "object" && value !== null && symbolOrderedList in value
  );
}
