import { DEFAULT_MIN_COMMITS, extractEmail, listAuthors } from "./authors.js";
import { collectDayCounts } from "./collector.js";
import { errorMessage } from "./errors.js";
import { buildYearGrid } from "./grid.js";
import type { HistorySource } from "./history.js";
import { exportPng, renderHeatmap, type HeatmapImage } from "./render.js";
import { HeatmapSession } from "./session.js";
import type { AuthorRecord, Notice, NoticeLevel } from "./types.js";

export type MenuAction = "prev" | "next" | "save" | "select" | "quit";

export interface HeatmapAppOptions {
  source: HistorySource;
  outDir: string;
  minCommits?: number;
  exporter?: (image: HeatmapImage, outDir: string) => Promise<string>;
}

/**
 * Drives a {@link HeatmapSession} from user actions. History and export
 * failures come back as error notices, never as exceptions.
 */
export class HeatmapApp {
  readonly session = new HeatmapSession();
  readonly minCommits: number;
  private readonly source: HistorySource;
  private readonly outDir: string;
  private readonly exporter: (image: HeatmapImage, outDir: string) => Promise<string>;
  private shown: HeatmapImage | undefined;

  constructor(options: HeatmapAppOptions) {
    this.source = options.source;
    this.outDir = options.outDir;
    this.minCommits = options.minCommits ?? DEFAULT_MIN_COMMITS;
    this.exporter = options.exporter ?? exportPng;
  }

  get image(): HeatmapImage | undefined {
    return this.shown;
  }

  // Prev/Next only inside the loaded years, Save once something is shown.
  menuActions(): MenuAction[] {
    const actions: MenuAction[] = [];
    if (this.session.canPrev) actions.push("prev");
    if (this.session.canNext) actions.push("next");
    if (this.shown) actions.push("save");
    actions.push("select", "quit");
    return actions;
  }

  async loadAuthors(): Promise<Notice> {
    let authors: AuthorRecord[];
    try {
      authors = await listAuthors(this.source, this.minCommits);
    } catch (e) {
      return notice("error", `Error: ${errorMessage(e)}`);
    }

    this.session.loadAuthors(authors);
    this.shown = undefined;
    if (authors.length === 0) {
      return notice("warn", `No authors with >=${this.minCommits} commits found.`);
    }
    return notice("info", `Loaded ${authors.length} authors.`);
  }

  // `selected` indexes into the loaded author list
  async showHeatmap(selected: readonly number[]): Promise<Notice> {
    const authors = this.session.authors;
    const emails = selected
      .map((i) => authors[i])
      .flatMap((author) => {
        const email = author ? extractEmail(author.displayString) : undefined;
        return email ? [email] : [];
      });
    return this.showEmails(emails);
  }

  async showEmails(emails: readonly string[]): Promise<Notice> {
    if (this.session.state.kind === "empty") {
      return notice("warn", "Load authors first.");
    }
    if (emails.length === 0) {
      return notice("warn", "Please select at least one author.");
    }

    let series;
    try {
      series = await collectDayCounts(this.source, emails);
    } catch (e) {
      return notice("error", `Error: ${errorMessage(e)}`);
    }

    if (!this.session.loadData(series)) {
      this.shown = undefined;
      return notice("warn", "No commits found for selected authors.");
    }
    return this.plotCurrentYear();
  }

  prevYear(): Notice {
    if (this.session.state.kind !== "dataLoaded") return notice("warn", "No heatmap loaded.");
    if (!this.session.prev()) return notice("warn", "Already at the earliest year.");
    return this.plotCurrentYear();
  }

  nextYear(): Notice {
    if (this.session.state.kind !== "dataLoaded") return notice("warn", "No heatmap loaded.");
    if (!this.session.next()) return notice("warn", "Already at the latest year.");
    return this.plotCurrentYear();
  }

  // A year without commits renders all zero and keeps the navigation index.
  showYear(year: number): Notice {
    const state = this.session.state;
    if (state.kind !== "dataLoaded") {
      return notice("warn", "No heatmap loaded.");
    }
    if (this.session.currentYear === year || this.session.goToYear(year)) {
      return this.plotCurrentYear();
    }
    this.shown = renderHeatmap(buildYearGrid(state.series, year));
    return notice("warn", `No commits in ${year}.`);
  }

  async saveCurrent(): Promise<Notice> {
    const image = this.shown;
    if (!image) return notice("warn", "No heatmap to save!");

    try {
      const outPath = await this.exporter(image, this.outDir);
      return notice("info", `Saved heatmap for ${image.year} to: ${outPath}`);
    } catch (e) {
      return notice("error", `Could not save heatmap for ${image.year}: ${errorMessage(e)}`);
    }
  }

  private plotCurrentYear(): Notice {
    const state = this.session.state;
    const year = this.session.currentYear;
    if (state.kind !== "dataLoaded" || year === undefined) {
      return notice("warn", "No heatmap loaded.");
    }
    this.shown = renderHeatmap(buildYearGrid(state.series, year));
    return notice("info", `Showing heatmap for year ${year}`);
  }
}

function notice(level: NoticeLevel, message: string): Notice {
  return { level, message };
}
