import { Errors, ListError } from "..";
import { thrownBy } from "./test-utils";

const {
  indexOutOfRangeError,
  itemNotFoundError,
  invalidDataTypeError,
  readOnlyError,
  readOnlyAlreadySetError,
} = Errors;

describe("Errors", () => {
  it("uses stable ids", () => {
    expect(indexOutOfRangeError.id).toBe("orderedList.errors.indexOutOfRange");
    expect(itemNotFoundError.id).toBe("orderedList.errors.itemNotFound");
    expect(invalidDataTypeError.id).toBe("orderedList.errors.invalidDataType");
    expect(readOnlyError.id).toBe("orderedList.errors.readOnly");
    expect(readOnlyAlreadySetError.id).toBe(
      "orderedList.errors.readOnlyAlreadySet",
    );
  });

  it("throws ListError instances carrying id, data and remediation", () => {
    const err = thrownBy(() => readOnlyError.throw({ listName: "tags" }));

    expect(err).toBeInstanceOf(ListError);
    expect(err).toBeInstanceOf(Error);
    if (!readOnlyError.is(err)) {
      throw new Error("Expected a read-only error");
    }
    expect(err.name).toBe("orderedList.errors.readOnly");
    expect(err.data).toEqual({ listName: "tags" });
    expect(err.message).toBe('Cannot modify "tags" when it is read-only.');
    expect(err.remediation).toBe(
      '"tags" was locked. Perform all modifications before locking it, or create a new list from toArray().',
    );
    expect(String(err)).toBe(
      'Cannot modify "tags" when it is read-only.\n\nRemediation: "tags" was locked. Perform all modifications before locking it, or create a new list from toArray().',
    );
  });

  it("formats index errors", () => {
    expect(() =>
      indexOutOfRangeError.throw({ listName: "rows", index: -1, count: 2 }),
    ).toThrow('Index -1 is out of range for "rows" (count: 2).');
  });

  it("stringifies to the bare message without remediation", () => {
    const err = thrownBy(() =>
      invalidDataTypeError.throw({
        listName: "rows",
        expected: "an iterable object or null",
        received: "number",
      }),
    );
    expect(String(err)).toBe(
      '"rows" expected an iterable object or null, received number.',
    );
  });

  it("is() only matches its own error", () => {
    const err = thrownBy(() => itemNotFoundError.throw({ listName: "rows" }));
    expect(itemNotFoundError.is(err)).toBe(true);
    expect(readOnlyError.is(err)).toBe(false);
    expect(itemNotFoundError.is(new Error("other"))).toBe(false);
    expect(itemNotFoundError.is("orderedList.errors.itemNotFound")).toBe(false);
  });

  it("freezes the built helpers", () => {
    expect(Object.isFrozen(readOnlyError)).toBe(true);
  });
});
