import { resolve } from "node:path";
import minimist from "minimist";
import { DEFAULT_MIN_COMMITS } from "./authors.js";
import { UsageError } from "./errors.js";

export const OUT_DIR = "heatmaps";

export interface CliOptions {
  minCommits: number;
  cwd: string;
  outDir: string;
  // empty means prompt
  authors: string[];
  year?: number;
  save: boolean;
  help: boolean;
}

export const USAGE = `Usage: commit-heatmap [options]

Without --author, lists authors and prompts for a selection.

Options:
  --min-commits <n>  only list authors with at least n commits (default ${DEFAULT_MIN_COMMITS})
  --cwd <dir>        repository to read (default: current directory)
  --out-dir <dir>    where PNG exports go (default: ./${OUT_DIR})
  --author <email>   select an author by email; repeatable
  --year <yyyy>      with --author, show only this year
  --save             with --author, export every shown year as PNG
  -h, --help         show this help`;

const STRING_FLAGS = ["min-commits", "cwd", "out-dir", "author", "year"];
const BOOLEAN_FLAGS = ["save", "help"];

function stringList(value: unknown): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map(String);
}

function lastString(flag: string, value: unknown): string | undefined {
  const values = stringList(value);
  if (values.length === 0) return undefined;
  const last = values[values.length - 1];
  if (!last) throw new UsageError(`--${flag} needs a value`);
  return last;
}

export function parseOptions(argv: readonly string[], baseDir: string = process.cwd()): CliOptions {
  const flags = minimist([...argv], {
    string: STRING_FLAGS,
    boolean: BOOLEAN_FLAGS,
    alias: { h: "help" },
    default: { save: false, help: false },
    unknown: (arg) => {
      if (arg.startsWith("-")) throw new UsageError(`Unknown option: ${arg}`);
      return true;
    },
  });
  if (flags._.length > 0) {
    throw new UsageError(`Unexpected argument: ${flags._[0]}`);
  }

  let minCommits = DEFAULT_MIN_COMMITS;
  const minStr = lastString("min-commits", flags["min-commits"]);
  if (minStr !== undefined) {
    if (!/^\d+$/.test(minStr)) {
      throw new UsageError(`--min-commits must be a non-negative integer, got "${minStr}"`);
    }
    minCommits = Number(minStr);
  }

  let year: number | undefined;
  const yearStr = lastString("year", flags["year"]);
  if (yearStr !== undefined) {
    if (!/^\d{4}$/.test(yearStr)) {
      throw new UsageError(`--year must be a four-digit year, got "${yearStr}"`);
    }
    year = Number(yearStr);
  }

  const authors = stringList(flags["author"]);
  if (authors.some((a) => !a)) throw new UsageError("--author needs an email");

  const cwd = resolve(baseDir, lastString("cwd", flags["cwd"]) ?? ".");
  const outDir = resolve(cwd, lastString("out-dir", flags["out-dir"]) ?? OUT_DIR);

  return {
    minCommits,
    cwd,
    outDir,
    authors,
    year,
    save: Boolean(flags["save"]),
    help: Boolean(flags["help"]),
  };
}
