import { error } from "./definers/builders/error";
import type { DefaultErrorType } from "./types/error";

// Index outside the bounds accepted by the operation
export const indexOutOfRangeError = error<
  { listName: string; index: number; count: number } & DefaultErrorType
>("orderedList.errors.indexOutOfRange")
  .format(
    ({ listName, index, count }) =>
      `Index ${index} is out of range for "${listName}" (count: ${count}).`,
  )
  .remediation(
    "Reads and removals accept integers in [0, count). Insertions also accept count itself, which appends.",
  )
  .build();

// Lookup by value given an item that is not in the list
export const itemNotFoundError = error<{ listName: string } & DefaultErrorType>(
  "orderedList.errors.itemNotFound",
)
  .format(({ listName }) => `The item does not exist in "${listName}".`)
  .remediation(
    "Items are matched with strict equality (===). Check contains() first, or pass the same reference that was added.",
  )
  .build();

// Copy/merge or flag setter given a value of the wrong shape
export const invalidDataTypeError = error<
  { listName: string; expected: string; received: string } & DefaultErrorType
>("orderedList.errors.invalidDataType")
  .format(
    ({ listName, expected, received }) =>
      `"${listName}" expected ${expected}, received ${received}.`,
  )
  .build();

// Mutation attempted while locked
export const readOnlyError = error<{ listName: string } & DefaultErrorType>(
  "orderedList.errors.readOnly",
)
  .format(
    ({ listName }) => `Cannot modify "${listName}" when it is read-only.`,
  )
  .remediation(
    ({ listName }) =>
      `"${listName}" was locked. Perform all modifications before locking it, or create a new list from toArray().`,
  )
  .build();

// Second external attempt to set the read-only flag
export const readOnlyAlreadySetError = error<
  { listName: string } & DefaultErrorType
>("orderedList.errors.readOnlyAlreadySet")
  .format(
    ({ listName }) =>
      `The read-only flag of "${listName}" has already been set and cannot be changed.`,
  )
  .remediation(
    "The flag is settled by the first setReadOnly() call or by the first mutation, whichever comes first. Subclasses may use applyReadOnly().",
  )
  .build();
