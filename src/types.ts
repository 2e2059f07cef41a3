// ── Records ────────────────────────────────────────────────────────

export interface AuthorRecord {
  readonly commitCount: number;
  // `Name <email>` as git prints it
  readonly displayString: string;
}

export interface DayCount {
  readonly date: string;
  readonly count: number;
}

// rows[weekday][column] counts (weekday, weeks[column]); weekday 0 is Sunday.
export interface YearGrid {
  readonly year: number;
  readonly weeks: readonly number[];
  readonly rows: readonly (readonly number[])[];
}

// ── Notices ────────────────────────────────────────────────────────

export type NoticeLevel = "info" | "warn" | "error";

export interface Notice {
  readonly level: NoticeLevel;
  readonly message: string;
}
