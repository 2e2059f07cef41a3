import { yearsOf } from "./grid.js";
import type { AuthorRecord, DayCount } from "./types.js";

export type SessionState =
  | { readonly kind: "empty" }
  | { readonly kind: "authorsLoaded"; readonly authors: readonly AuthorRecord[] }
  | {
      readonly kind: "dataLoaded";
      readonly authors: readonly AuthorRecord[];
      readonly series: readonly DayCount[];
      readonly years: readonly number[];
      readonly yearIndex: number;
    };

// Each transition replaces the whole state in one assignment.
export class HeatmapSession {
  private current: SessionState = { kind: "empty" };

  get state(): SessionState {
    return this.current;
  }

  get authors(): readonly AuthorRecord[] {
    return this.current.kind === "empty" ? [] : this.current.authors;
  }

  get currentYear(): number | undefined {
    const s = this.current;
    return s.kind === "dataLoaded" ? s.years[s.yearIndex] : undefined;
  }

  get canPrev(): boolean {
    return this.current.kind === "dataLoaded" && this.current.yearIndex > 0;
  }

  get canNext(): boolean {
    const s = this.current;
    return s.kind === "dataLoaded" && s.yearIndex < s.years.length - 1;
  }

  loadAuthors(authors: readonly AuthorRecord[]): void {
    this.current = { kind: "authorsLoaded", authors: [...authors] };
  }

  // An empty series drops back to authors only and returns false.
  loadData(series: readonly DayCount[]): boolean {
    if (this.current.kind === "empty") {
      throw new Error("authors must be loaded before commit data");
    }
    const authors = this.current.authors;
    if (series.length === 0) {
      this.current = { kind: "authorsLoaded", authors };
      return false;
    }
    this.current = {
      kind: "dataLoaded",
      authors,
      series: [...series],
      years: yearsOf(series),
      yearIndex: 0,
    };
    return true;
  }

  prev(): boolean {
    return this.moveTo(this.current.kind === "dataLoaded" ? this.current.yearIndex - 1 : -1);
  }

  next(): boolean {
    return this.moveTo(this.current.kind === "dataLoaded" ? this.current.yearIndex + 1 : -1);
  }

  goToYear(year: number): boolean {
    return this.moveTo(this.current.kind === "dataLoaded" ? this.current.years.indexOf(year) : -1);
  }

  private moveTo(yearIndex: number): boolean {
    const s = this.current;
    if (s.kind !== "dataLoaded") return false;
    if (yearIndex < 0 || yearIndex >= s.years.length || yearIndex === s.yearIndex) return false;
    this.current = { ...s, yearIndex };
    return true;
  }
}
