import { OrderedList } from "../../models/OrderedList";
import { ReadOnlyState } from "../../models/ReadOnlyState";
import { Logger, type ILog } from "../../models/Logger";
import { Errors } from "../..";
import { thrownBy } from "../test-utils";

const { readOnlyError, readOnlyAlreadySetError } = Errors;

class AuditedList extends OrderedList<string> {
  public readonly events: string[] = [];

  override insertAt(index: number, item: string): void {
    super.insertAt(index, item);
    this.events.push(`insert:${index}:${item}`);
  }

  override removeAt(index: number): string {
    const item = super.removeAt(index);
    this.events.push(`remove:${index}:${item}`);
    return item;
  }

  lockFromInside(value: boolean) {
    this.applyReadOnly(value);
  }
}

describe("OrderedList read-only state", () => {
  // ── Explicit setting ──────────────────────────────────────────────

  it("starts unset and reads as writable", () => {
    const list = new OrderedList<string>();
    expect(list.readOnlyState).toBe(ReadOnlyState.Unset);
    expect(list.readOnly).toBe(false);
  });

  it("ignores null and undefined", () => {
    const list = new OrderedList<string>();
    list.setReadOnly(null);
    list.setReadOnly(undefined);
    expect(list.readOnlyState).toBe(ReadOnlyState.Unset);
  });

  it("accepts exactly one external setting", () => {
    const list = new OrderedList<string>();
    list.setReadOnly(false);
    expect(list.readOnlyState).toBe(ReadOnlyState.Unlocked);

    expect(() => list.setReadOnly(true)).toThrow(
      'The read-only flag of "OrderedList" has already been set and cannot be changed.',
    );
    expect(list.readOnly).toBe(false);
  });

  it("rejects a second setting even with the same value", () => {
    const list = new OrderedList<string>();
    list.setReadOnly(true);
    const err = thrownBy(() => list.setReadOnly(true));
    expect(readOnlyAlreadySetError.is(err)).toBe(true);
  });

  it("coerces boolean-like strings and numbers", () => {
    const cases: Array<[string | number, boolean]> = [
      ["TRUE", true],
      ["true", true],
      ["1", true],
      ["false", false],
      ["0", false],
      ["", false],
      [2, true],
      [0, false],
    ];

    for (const [value, expected] of cases) {
      const list = new OrderedList<string>();
      list.setReadOnly(value);
      expect(list.readOnly).toBe(expected);
    }
  });

  // ── Collapse ──────────────────────────────────────────────────────

  it("collapses to unlocked on the first mutation", () => {
    const list = new OrderedList<string>();
    list.add("a");
    expect(list.readOnlyState).toBe(ReadOnlyState.Unlocked);

    const err = thrownBy(() => list.setReadOnly(true));
    expect(readOnlyAlreadySetError.is(err)).toBe(true);
    expect(list.readOnly).toBe(false);
  });

  it("collapses even when the mutation itself fails", () => {
    const list = new OrderedList<string>();
    expect(() => list.removeAt(0)).toThrow();
    expect(list.readOnlyState).toBe(ReadOnlyState.Unlocked);
  });

  it("does not collapse on reads", () => {
    const list = new OrderedList<string>();
    list.contains("a");
    list.indexOf("a");
    list.toArray();
    expect(list.readOnlyState).toBe(ReadOnlyState.Unset);
  });

  // ── Constructor ───────────────────────────────────────────────────

  it("settles the flag when seeded with data", () => {
    const writable = new OrderedList(["a"]);
    expect(writable.readOnlyState).toBe(ReadOnlyState.Unlocked);
    expect(() => writable.setReadOnly(true)).toThrow();

    const locked = new OrderedList(["a", "b"], true);
    expect(locked.readOnly).toBe(true);
    expect(locked.toArray()).toEqual(["a", "b"]);
  });

  it("settles the flag for an empty seed too", () => {
    const list = new OrderedList<string>([]);
    expect(list.readOnlyState).toBe(ReadOnlyState.Unlocked);
  });

  it("forwards readOnly to setReadOnly when there is no data", () => {
    const list = new OrderedList<string>(null, true);
    expect(list.readOnlyState).toBe(ReadOnlyState.Locked);
    expect(list.count).toBe(0);
  });

  // ── Locked lists ──────────────────────────────────────────────────

  it("rejects every mutation once locked and keeps the contents", () => {
    const list = new OrderedList(["a", "b"], true);

    const attempts = [
      () => list.add("c"),
      () => list.insertAt(0, "c"),
      () => list.insertAt(99, "c"),
      () => list.removeAt(0),
      () => list.remove("a"),
      () => list.remove("missing"),
      () => list.clear(),
      () => list.copyFrom(["x"]),
      () => list.copyFrom(null),
      () => list.mergeWith(["x"]),
      () => list.insertBefore("a", "c"),
      () => list.insertAfter("a", "c"),
      () => list.setAt(0, "c"),
      () => list.setAt(null, "c"),
      () => list.deleteAt(0),
    ];

    for (const attempt of attempts) {
      expect(readOnlyError.is(thrownBy(attempt))).toBe(true);
    }
    expect(list.toArray()).toEqual(["a", "b"]);
    expect(list.count).toBe(2);
  });

  it("rejects clear() on an empty locked list", () => {
    const list = new OrderedList<string>(null, true);
    expect(() => list.clear()).toThrow(
      'Cannot modify "OrderedList" when it is read-only.',
    );
  });

  it("keeps reads available once locked", () => {
    const list = new OrderedList(["a", "b"], true);
    expect(list.itemAt(1)).toBe("b");
    expect(list.contains("a")).toBe(true);
    expect([...list]).toEqual(["a", "b"]);
  });

  // ── Subclasses ────────────────────────────────────────────────────

  it("routes every mutation through insertAt and removeAt", () => {
    const list = new AuditedList();
    list.add("a");
    list.add("b");
    list.insertBefore("b", "x");
    list.clear();

    expect(list.events).toEqual([
      "insert:0:a",
      "insert:1:b",
      "insert:1:x",
      "remove:2:b",
      "remove:1:x",
      "remove:0:a",
    ]);
  });

  it("routes offset replacement through removeAt then insertAt", () => {
    const list = new AuditedList();
    list.add("a");
    list.setAt(0, "q");
    expect(list.events).toEqual(["insert:0:a", "remove:0:a", "insert:0:q"]);
    expect(list.toArray()).toEqual(["q"]);
  });

  it("lets subclasses change the flag after it was set", () => {
    const list = new AuditedList();
    list.setReadOnly(false);

    list.lockFromInside(true);
    expect(list.readOnly).toBe(true);
    expect(() => list.add("a")).toThrow();

    list.lockFromInside(false);
    list.add("a");
    expect(list.toArray()).toEqual(["a"]);
  });

  // ── Logging ───────────────────────────────────────────────────────

  it("logs transitions through the optional logger", () => {
    const logger = new Logger({
      printThreshold: null,
      printStrategy: "plain",
      bufferLogs: false,
    });
    const logs: ILog[] = [];
    logger.onLog((log) => {
      logs.push(log);
    });

    const collapsed = new OrderedList<string>(null, null, {
      name: "tags",
      logger,
    });
    collapsed.add("a");
    new OrderedList<string>(null, true, { name: "locked", logger });

    expect(
      logs.map(({ level, source, message, data }) => ({
        level,
        source,
        message,
        data,
      })),
    ).toEqual([
      {
        level: "debug",
        source: "tags",
        message: "read-only state collapsed",
        data: { from: "unset", to: "unlocked" },
      },
      {
        level: "debug",
        source: "locked",
        message: "read-only state set",
        data: { from: "unset", to: "locked" },
      },
    ]);
  });
});
