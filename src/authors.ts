import type { HistorySource } from "./history.js";
import type { AuthorRecord } from "./types.js";

export const DEFAULT_MIN_COMMITS = 10;

const COUNT = /^[+-]?\d+$/;
const EMAIL = /<([^>]+)>/;

export function parseShortlogLine(line: string): AuthorRecord | undefined {
  const trimmed = line.trim();
  const tab = trimmed.indexOf("\t");
  if (tab < 0) return undefined;

  const countStr = trimmed.slice(0, tab).trim();
  if (!COUNT.test(countStr)) return undefined;

  return {
    commitCount: Number(countStr),
    displayString: trimmed.slice(tab + 1).trim(),
  };
}

export async function listAuthors(
  source: HistorySource,
  minCommits: number = DEFAULT_MIN_COMMITS,
): Promise<AuthorRecord[]> {
  const lines = await source.shortlog();
  const authors: AuthorRecord[] = [];
  for (const line of lines) {
    if (!line.trim()) continue;
    const author = parseShortlogLine(line);
    if (author && author.commitCount >= minCommits) authors.push(author);
  }
  return authors;
}

export function extractEmail(displayString: string): string | undefined {
  return EMAIL.exec(displayString)?.[1];
}

export function authorLabel(author: AuthorRecord): string {
  return `${author.displayString} (${author.commitCount} commits)`;
}
