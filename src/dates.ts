// Calendar arithmetic on UTC midnights. Commit dates arrive as plain
// `YYYY-MM-DD` days, so no timezone is ever applied.

const DAY_MS = 86_400_000;
const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isDateKey(value: string): boolean {
  const m = DATE_KEY.exec(value);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return formatDateKey(d) === value;
}

export function formatDateKey(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function yearOfKey(key: string): number {
  return Number(key.slice(0, 4));
}

// Monday = 0 … Sunday = 6
export function mondayWeekday(d: Date): number {
  return (d.getUTCDay() + 6) % 7;
}

// Sunday = 0 … Saturday = 6, the heatmap's row order
export function sundayWeekday(d: Date): number {
  return (mondayWeekday(d) + 1) % 7;
}

// Monday-start weeks; week 1 holds the year's first Thursday.
export function isoWeekNumber(d: Date): number {
  const date = new Date(d.getTime());
  date.setUTCHours(0, 0, 0, 0);
  date.setUTCDate(date.getUTCDate() + 3 - mondayWeekday(date));
  const yearStart = new Date(Date.UTC(date.getUTCFullYear(), 0, 1));
  return Math.ceil(((date.getTime() - yearStart.getTime()) / DAY_MS + 1) / 7);
}

export function daysOfYear(year: number): Date[] {
  const days: Date[] = [];
  const end = Date.UTC(year, 11, 31);
  for (let t = Date.UTC(year, 0, 1); t <= end; t += DAY_MS) {
    days.push(new Date(t));
  }
  return days;
}
