import $ from "dax-sh";
import { errorMessage, SourceUnavailableError } from "./errors.js";

export interface HistorySource {
  // "<count>\t<Name> <email>", busiest first
  shortlog(): Promise<string[]>;
  // "<YYYY-MM-DD> <email>" per commit, any order
  commitLines(): AsyncIterable<string>;
}

const SHORTLOG = "git shortlog -sne HEAD";
const LOG = "git log --pretty=format:%ad %ae --date=short";
const LOG_FORMAT = "--pretty=format:%ad %ae";

// ── git via dax ────────────────────────────────────────────────────

export class GitHistorySource implements HistorySource {
  constructor(private readonly cwd: string) {}

  async shortlog(): Promise<string[]> {
    let result;
    try {
      result = await $`git shortlog -sne HEAD`
        .cwd(this.cwd)
        .stdout("piped")
        .stderr("piped")
        .noThrow();
    } catch (e) {
      throw new SourceUnavailableError(SHORTLOG, errorMessage(e));
    }
    if (result.code !== 0) {
      throw new SourceUnavailableError(SHORTLOG, result.stderr.trim());
    }
    return result.stdout.split("\n");
  }

  async *commitLines(): AsyncGenerator<string> {
    let child;
    try {
      child = $`git log ${LOG_FORMAT} --date=short`
        .cwd(this.cwd)
        .stdout("piped")
        .stderr("piped")
        .noThrow()
        .spawn();
    } catch (e) {
      throw new SourceUnavailableError(LOG, errorMessage(e));
    }

    const reader = child.stdout().getReader();
    const decoder = new TextDecoder();
    let pending = "";
    let drained = false;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        pending += decoder.decode(value, { stream: true });
        const lines = pending.split("\n");
        pending = lines.pop() ?? "";
        yield* lines;
      }
      pending += decoder.decode();
      if (pending) yield pending;
      drained = true;
    } finally {
      reader.releaseLock();
      if (!drained) {
        child.kill();
        await child;
      }
    }

    const result = await child;
    if (result.code !== 0) {
      throw new SourceUnavailableError(LOG, result.stderr.trim());
    }
  }
}
