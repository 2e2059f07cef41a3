import { beforeEach, describe, expect, it } from "vitest";
import { HeatmapSession } from "./session.js";
import type { AuthorRecord, DayCount } from "./types.js";

const authors: AuthorRecord[] = [
  { commitCount: 20, displayString: "Alice <a@x>" },
  { commitCount: 11, displayString: "Bob <b@x>" },
];

const series: DayCount[] = [
  { date: "2021-06-01", count: 1 },
  { date: "2023-02-10", count: 2 },
  { date: "2022-08-15", count: 4 },
];

describe("HeatmapSession", () => {
  let session: HeatmapSession;

  beforeEach(() => {
    session = new HeatmapSession();
  });

  it("starts empty", () => {
    expect(session.state).toEqual({ kind: "empty" });
    expect(session.authors).toEqual([]);
    expect(session.currentYear).toBeUndefined();
  });

  it("refuses commit data before authors are loaded", () => {
    expect(() => session.loadData(series)).toThrow("authors must be loaded");
  });

  it("loads data at the earliest year", () => {
    session.loadAuthors(authors);
    expect(session.loadData(series)).toBe(true);
    const state = session.state;
    expect(state.kind).toBe("dataLoaded");
    if (state.kind !== "dataLoaded") return;
    expect(state.years).toEqual([2021, 2022, 2023]);
    expect(state.yearIndex).toBe(0);
    expect(session.currentYear).toBe(2021);
  });

  it("stays with authors only when the series is empty", () => {
    session.loadAuthors(authors);
    session.loadData(series);
    expect(session.loadData([])).toBe(false);
    expect(session.state).toEqual({ kind: "authorsLoaded", authors });
  });

  it("navigates within bounds without wrapping", () => {
    session.loadAuthors(authors);
    session.loadData(series);

    expect(session.canPrev).toBe(false);
    expect(session.prev()).toBe(false);
    expect(session.currentYear).toBe(2021);

    expect(session.next()).toBe(true);
    expect(session.next()).toBe(true);
    expect(session.currentYear).toBe(2023);
    expect(session.canNext).toBe(false);
    expect(session.next()).toBe(false);
    expect(session.currentYear).toBe(2023);

    expect(session.prev()).toBe(true);
    expect(session.currentYear).toBe(2022);
  });

  it("ignores navigation outside the data-loaded state", () => {
    expect(session.next()).toBe(false);
    session.loadAuthors(authors);
    expect(session.prev()).toBe(false);
    expect(session.state.kind).toBe("authorsLoaded");
  });

  it("jumps only to years present in the series", () => {
    session.loadAuthors(authors);
    session.loadData(series);
    expect(session.goToYear(2023)).toBe(true);
    expect(session.currentYear).toBe(2023);
    expect(session.goToYear(2019)).toBe(false);
    expect(session.currentYear).toBe(2023);
  });

  it("drops the series when authors are reloaded", () => {
    session.loadAuthors(authors);
    session.loadData(series);
    session.loadAuthors(authors.slice(1));
    expect(session.state).toEqual({ kind: "authorsLoaded", authors: authors.slice(1) });
  });
});
