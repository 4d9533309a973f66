import { describe, expect, it } from "vitest";
import { closestAnchor, splitByWeeks } from "../src/rules/week-splitter.js";
import type { Item } from "../src/types.js";

function doneItem(id: string, completedAt: string | undefined, status = "Done"): Item {
  return {
    id,
    archived: false,
    kind: "issue",
    number: 1,
    url: "",
    ...(completedAt ? { completedAt } : {}),
    labels: [],
    fields: { Status: { kind: "text", name: "Status", text: status } }
  };
}

function bounds(windows: ReturnType<typeof splitByWeeks>): Array<[string, string, string[]]> {
  return windows.map((window) => [
    window.start.toISOString().slice(0, 10),
    window.end.toISOString().slice(0, 10),
    window.items.map((item) => item.id)
  ]);
}

const now = new Date("2022-08-07T12:00:00Z");

describe("closestAnchor", () => {
  it("truncates to the anchor day at midnight UTC", () => {
    expect(closestAnchor(now).toISOString()).toBe("2022-08-07T00:00:00.000Z");
    expect(closestAnchor(new Date("2022-08-10T23:59:00Z")).toISOString()).toBe("2022-08-07T00:00:00.000Z");
  });

  it("honours another anchor weekday", () => {
    expect(closestAnchor(new Date("2022-08-10T08:00:00Z"), "monday").toISOString()).toBe(
      "2022-08-08T00:00:00.000Z"
    );
    expect(closestAnchor(new Date("2022-08-08T08:00:00Z"), "tuesday").toISOString()).toBe(
      "2022-08-02T00:00:00.000Z"
    );
  });
});

describe("splitByWeeks", () => {
  it("buckets items into weeks newest first", () => {
    const windows = splitByWeeks(
      [
        doneItem("a", "2022-08-01T10:00:00Z"),
        doneItem("b", "2022-08-03T10:00:00Z"),
        doneItem("c", "2022-07-20T10:00:00Z")
      ],
      now
    );

    expect(bounds(windows)).toEqual([
      ["2022-07-31", "2022-08-07", ["a", "b"]],
      ["2022-07-17", "2022-07-24", ["c"]]
    ]);
  });

  it("emits empty weeks in between when asked", () => {
    const windows = splitByWeeks(
      [doneItem("a", "2022-08-01T10:00:00Z"), doneItem("c", "2022-07-20T10:00:00Z")],
      now,
      { includeEmptyWeeks: true }
    );

    expect(bounds(windows)).toEqual([
      ["2022-07-31", "2022-08-07", ["a"]],
      ["2022-07-24", "2022-07-31", []],
      ["2022-07-17", "2022-07-24", ["c"]]
    ]);
  });

  it("puts an item completed exactly at a week start into that week", () => {
    const windows = splitByWeeks(
      [doneItem("edge", "2022-07-31T00:00:00Z"), doneItem("before", "2022-07-30T23:59:59Z")],
      now
    );

    expect(bounds(windows)).toEqual([
      ["2022-07-31", "2022-08-07", ["edge"]],
      ["2022-07-24", "2022-07-31", ["before"]]
    ]);
  });

  it("drops items from the week still in progress", () => {
    const windows = splitByWeeks(
      [
        doneItem("at-boundary", "2022-08-07T00:00:00Z"),
        doneItem("later", "2022-08-07T11:00:00Z"),
        doneItem("kept", "2022-08-06T23:00:00Z")
      ],
      now
    );

    expect(bounds(windows)).toEqual([["2022-07-31", "2022-08-07", ["kept"]]]);
  });

  it("ignores items that are not done or have no usable timestamp", () => {
    const windows = splitByWeeks(
      [
        doneItem("todo", "2022-08-01T10:00:00Z", "Todo"),
        doneItem("missing", undefined),
        doneItem("garbled", "last tuesday"),
        doneItem("ok", "2022-08-02T10:00:00Z", "DONE")
      ],
      now
    );

    expect(bounds(windows)).toEqual([["2022-07-31", "2022-08-07", ["ok"]]]);
  });

  it("sorts by completion time and keeps ties in input order", () => {
    const windows = splitByWeeks(
      [
        doneItem("x", "2022-08-02T10:00:00Z"),
        doneItem("y", "2022-08-02T10:00:00Z"),
        doneItem("first", "2022-08-01T10:00:00Z"),
        doneItem("z", "2022-08-02T10:00:00Z")
      ],
      now
    );

    expect(windows[0]?.items.map((item) => item.id)).toEqual(["first", "x", "y", "z"]);
  });

  it("returns nothing for an empty list", () => {
    expect(splitByWeeks([], now)).toEqual([]);
  });

  it("covers every item exactly once with contiguous weeks", () => {
    const base = Date.parse("2022-05-01T03:00:00Z");
    const items = Array.from({ length: 40 }, (_, index) =>
      doneItem(`item-${index}`, new Date(base + index * 37 * 60 * 60 * 1000).toISOString())
    );

    const windows = splitByWeeks(items, now, { includeEmptyWeeks: true });
    const seen = windows.flatMap((window) => window.items.map((item) => item.id));
    expect([...seen].sort()).toEqual(items.map((item) => item.id).sort());
    expect(new Set(seen).size).toBe(seen.length);

    windows.forEach((window, index) => {
      expect(window.end.getTime() - window.start.getTime()).toBe(7 * 24 * 60 * 60 * 1000);
      expect(window.end.getUTCDay()).toBe(0);
      const next = windows[index + 1];
      if (next) {
        expect(next.end.getTime()).toBe(window.start.getTime());
      }
      for (const item of window.items) {
        const at = Date.parse(item.completedAt ?? "");
        expect(at).toBeGreaterThanOrEqual(window.start.getTime());
        expect(at).toBeLessThan(window.end.getTime());
      }
    });
  });
});
