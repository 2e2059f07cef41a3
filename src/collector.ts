import { isDateKey } from "./dates.js";
import type { HistorySource } from "./history.js";
import type { DayCount } from "./types.js";

/**
 * Count commits per day for the given author emails.
 *
 * The whole history is read once; matching is exact and case-sensitive.
 * Lines that are not `"<date> <email>"` are skipped.
 */
export async function collectDayCounts(
  source: HistorySource,
  emails: Iterable<string>,
): Promise<DayCount[]> {
  const wanted = new Set(emails);
  if (wanted.size === 0) return [];

  const perDay = new Map<string, number>();
  for await (const raw of source.commitLines()) {
    const line = raw.trim();
    if (!line) continue;

    const space = line.indexOf(" ");
    if (space < 0) continue;
    const date = line.slice(0, space);
    const email = line.slice(space + 1);
    if (!isDateKey(date)) continue;

    if (wanted.has(email)) {
      perDay.set(date, (perDay.get(date) ?? 0) + 1);
    }
  }

  return [...perDay]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, count]) => ({ date, count }));
}
