#!/usr/bin/env node
import $ from "dax-sh";
import { HeatmapApp, type MenuAction } from "./app.js";
import { authorLabel } from "./authors.js";
import { UsageError } from "./errors.js";
import { GitHistorySource } from "./history.js";
import { parseOptions, USAGE, type CliOptions } from "./options.js";
import { toTerminal } from "./render.js";
import type { Notice } from "./types.js";

// ── Output ─────────────────────────────────────────────────────────

function report(notice: Notice): void {
  switch (notice.level) {
    case "info":
      $.logStep(notice.message);
      break;
    case "warn":
      $.logWarn(notice.message);
      break;
    case "error":
      $.logError(notice.message);
      break;
  }
}

function draw(app: HeatmapApp): void {
  if (app.image) console.log("\n" + toTerminal(app.image) + "\n");
}

// ── Scripted run ───────────────────────────────────────────────────

async function runScripted(app: HeatmapApp, options: CliOptions): Promise<boolean> {
  const listed = await app.loadAuthors();
  if (listed.level === "error") {
    report(listed);
    return false;
  }

  const loaded = await app.showEmails(options.authors);
  report(loaded);
  if (loaded.level !== "info") return false;

  const state = app.session.state;
  const years = options.year !== undefined
    ? [options.year]
    : state.kind === "dataLoaded" ? state.years : [];

  for (const year of years) {
    report(app.showYear(year));
    draw(app);
    if (options.save) {
      const saved = await app.saveCurrent();
      report(saved);
      if (saved.level === "error") return false;
    }
  }
  return true;
}

// ── Interactive run ────────────────────────────────────────────────

const ACTION_LABELS: Record<MenuAction, string> = {
  prev: "<< Prev Year",
  next: "Next Year >>",
  save: "Save Current Heatmap as PNG",
  select: "Select Other Authors",
  quit: "Quit",
};

async function browseYears(app: HeatmapApp): Promise<"select" | "quit"> {
  while (true) {
    draw(app);
    const actions = app.menuActions();
    const picked = await $.select({
      message: `Year ${app.session.currentYear ?? "?"}`,
      options: actions.map((action) => ACTION_LABELS[action]),
    });
    switch (actions[picked]) {
      case "prev":
        report(app.prevYear());
        break;
      case "next":
        report(app.nextYear());
        break;
      case "save":
        report(await app.saveCurrent());
        break;
      case "select":
        return "select";
      default:
        return "quit";
    }
  }
}

async function runInteractive(app: HeatmapApp): Promise<boolean> {
  $.logLight("Loading authors...");
  const listed = await app.loadAuthors();
  report(listed);
  if (listed.level !== "info") return listed.level !== "error";

  while (true) {
    const selected = await $.multiSelect({
      message: "Select authors (space to toggle, enter to confirm)",
      options: app.session.authors.map(authorLabel),
    });

    $.logLight("Loading commit data for selected authors...");
    const shown = await app.showHeatmap(selected);
    report(shown);

    if (shown.level === "info") {
      if ((await browseYears(app)) === "quit") return true;
    } else if (!(await $.confirm({ message: "Pick other authors?", default: true }))) {
      return shown.level !== "error";
    }
  }
}

// ── Main ───────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseOptions(process.argv.slice(2));
  } catch (e) {
    if (e instanceof UsageError) {
      $.logError(e.message);
      $.log(USAGE);
      process.exit(1);
    }
    throw e;
  }

  if (options.help) {
    $.log(USAGE);
    return;
  }

  const app = new HeatmapApp({
    source: new GitHistorySource(options.cwd),
    outDir: options.outDir,
    minCommits: options.minCommits,
  });

  const ok = options.authors.length > 0
    ? await runScripted(app, options)
    : await runInteractive(app);
  if (!ok) process.exitCode = 1;
}

await main();
