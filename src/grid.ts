import {
  daysOfYear,
  formatDateKey,
  isoWeekNumber,
  sundayWeekday,
  yearOfKey,
} from "./dates.js";
import { GridInvariantError } from "./errors.js";
import type { DayCount, YearGrid } from "./types.js";

export const WEEKDAYS = 7;

interface DayCell {
  readonly day: number;
  readonly month: number;
  readonly weekday: number;
  week: number;
  readonly count: number;
}

// Late-December days in ISO week 1 of the next year get their own trailing
// column instead of wrapping back to week 1.
export function buildYearGrid(series: readonly DayCount[], year: number): YearGrid {
  const perDate = new Map<string, number>();
  for (const { date, count } of series) {
    if (yearOfKey(date) !== year) continue;
    perDate.set(date, (perDate.get(date) ?? 0) + count);
  }

  const cells: DayCell[] = daysOfYear(year).map((d) => ({
    day: d.getUTCDate(),
    month: d.getUTCMonth(),
    weekday: sundayWeekday(d),
    week: isoWeekNumber(d),
    count: perDate.get(formatDateKey(d)) ?? 0,
  }));

  const isOverflow = (c: DayCell) => c.month === 11 && c.week === 1;
  const overflow = cells.filter(isOverflow);
  if (overflow.length > 0) {
    // Week 1 always contains January 4th, so at most Dec 29-31 can spill over.
    if (overflow.length > 3 || overflow.some((c) => c.day < 29)) {
      throw new GridInvariantError(year, "more than one week spills into the next ISO year");
    }
    const lastWeek = Math.max(...cells.filter((c) => !isOverflow(c)).map((c) => c.week));
    for (const c of overflow) c.week = lastWeek + 1;
  }

  const weeks = [...new Set(cells.map((c) => c.week))].sort((a, b) => a - b);
  const column = new Map(weeks.map((w, i) => [w, i]));
  const rows = Array.from({ length: WEEKDAYS }, () => weeks.map(() => 0));
  for (const c of cells) {
    const col = column.get(c.week);
    if (col !== undefined) rows[c.weekday][col] += c.count;
  }

  return { year, weeks, rows };
}

export function yearsOf(series: readonly DayCount[]): number[] {
  return [...new Set(series.map((d) => yearOfKey(d.date)))].sort((a, b) => a - b);
}

export function cellAt(grid: YearGrid, weekday: number, week: number): number | undefined {
  const col = grid.weeks.indexOf(week);
  if (col < 0 || weekday < 0 || weekday >= WEEKDAYS) return undefined;
  return grid.rows[weekday][col];
}

export function gridTotal(grid: YearGrid): number {
  return grid.rows.reduce((sum, row) => sum + row.reduce((a, b) => a + b, 0), 0);
}

export function gridMax(grid: YearGrid): number {
  return Math.max(0, ...grid.rows.flat());
}
