import { describe, expect, it, vi } from "vitest";
import { collectDayCounts } from "./collector.js";
import type { HistorySource } from "./history.js";

function sourceOf(lines: string[]) {
  let read = 0;
  const source: HistorySource = {
    shortlog: async () => [],
    async *commitLines() {
      for (const line of lines) {
        read++;
        yield line;
      }
    },
  };
  return { source, linesRead: () => read };
}

describe("collectDayCounts", () => {
  it("counts only commits by the selected emails", async () => {
    const { source } = sourceOf(["2024-01-05 a@x", "2024-01-05 b@x", "2024-01-06 a@x"]);
    expect(await collectDayCounts(source, ["a@x"])).toEqual([
      { date: "2024-01-05", count: 1 },
      { date: "2024-01-06", count: 1 },
    ]);
  });

  it("buckets several commits on one day and sorts by date", async () => {
    const { source } = sourceOf([
      "2024-03-02 a@x",
      "2023-11-20 b@x",
      "2024-03-02 b@x",
      "2024-03-02 a@x",
    ]);
    expect(await collectDayCounts(source, new Set(["a@x", "b@x"]))).toEqual([
      { date: "2023-11-20", count: 1 },
      { date: "2024-03-02", count: 3 },
    ]);
  });

  it("returns nothing for an empty selection without reading history", async () => {
    const commitLines = vi.fn();
    const source: HistorySource = { shortlog: async () => [], commitLines };
    expect(await collectDayCounts(source, [])).toEqual([]);
    expect(commitLines).not.toHaveBeenCalled();
  });

  it("skips malformed lines", async () => {
    const { source } = sourceOf([
      "",
      "   ",
      "2024-01-05",
      "garbage a@x",
      "2024-02-30 a@x",
      "  2024-01-07 a@x  ",
    ]);
    expect(await collectDayCounts(source, ["a@x"])).toEqual([{ date: "2024-01-07", count: 1 }]);
  });

  it("matches emails case-sensitively", async () => {
    const { source } = sourceOf(["2024-01-05 A@x", "2024-01-06 a@x"]);
    expect(await collectDayCounts(source, ["a@x"])).toEqual([{ date: "2024-01-06", count: 1 }]);
  });

  it("reads the whole history", async () => {
    const { source, linesRead } = sourceOf([
      "2024-01-01 a@x",
      "2024-01-02 b@x",
      "2024-01-03 c@x",
      "2024-01-04 a@x",
    ]);
    await collectDayCounts(source, ["a@x"]);
    expect(linesRead()).toBe(4);
  });
});
