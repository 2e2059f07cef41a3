import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import chalk, { type ChalkInstance } from "chalk";
import sharp from "sharp";
import { gridMax } from "./grid.js";
import type { YearGrid } from "./types.js";

// ── Color scale ────────────────────────────────────────────────────

// Light-to-dark greens over [0, vmax]
export const COLOR_RAMP = [
  "#f7fcf5", "#e5f5e0", "#c7e9c0", "#a1d99b", "#74c476",
  "#41ab5d", "#238b45", "#006d2c", "#00441b",
] as const;

export const MIN_VMAX = 5;
export const DAY_LABELS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
export const LEGEND_LABEL = "Number of commits";
export const EXPORT_DENSITY = 300;

export interface HeatmapImage {
  readonly year: number;
  readonly title: string;
  readonly grid: YearGrid;
  readonly vmax: number;
  readonly colors: readonly (readonly string[])[];
}

function hexToRgb(hex: string): [number, number, number] {
  const n = parseInt(hex.slice(1), 16);
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

function rgbToHex(rgb: readonly number[]): string {
  return "#" + rgb.map((v) => Math.round(v).toString(16).padStart(2, "0")).join("");
}

export function colorFor(count: number, vmax: number): string {
  const t = vmax > 0 ? Math.min(Math.max(count / vmax, 0), 1) : 0;
  const pos = t * (COLOR_RAMP.length - 1);
  const i = Math.floor(pos);
  if (i >= COLOR_RAMP.length - 1) return COLOR_RAMP[COLOR_RAMP.length - 1];

  const from = hexToRgb(COLOR_RAMP[i]);
  const to = hexToRgb(COLOR_RAMP[i + 1]);
  const frac = pos - i;
  return rgbToHex(from.map((v, k) => v + (to[k] - v) * frac));
}

export function renderHeatmap(grid: YearGrid): HeatmapImage {
  const vmax = Math.max(MIN_VMAX, gridMax(grid));
  return {
    year: grid.year,
    title: `GitHub-style Commit Heatmap - ${grid.year}`,
    grid,
    vmax,
    colors: grid.rows.map((row) => row.map((count) => colorFor(count, vmax))),
  };
}

// ── Terminal ───────────────────────────────────────────────────────

const LABEL_WIDTH = 5;
const CELL = "  ";

export function toTerminal(image: HeatmapImage, ink: ChalkInstance = chalk): string {
  const lines = [ink.bold(image.title), ""];
  image.colors.forEach((row, weekday) => {
    const cells = row.map((color) => ink.bgHex(color)(CELL)).join("");
    lines.push(ink.dim(DAY_LABELS[weekday].padEnd(LABEL_WIDTH)) + cells);
  });

  const ramp = COLOR_RAMP.map((color) => ink.bgHex(color)(CELL)).join("");
  lines.push("");
  lines.push(
    " ".repeat(LABEL_WIDTH) +
      ink.dim("0 ") + ramp + ink.dim(` ${image.vmax}  ${LEGEND_LABEL}`),
  );
  return lines.join("\n");
}

// ── SVG / PNG ──────────────────────────────────────────────────────

const SVG_CELL = 12;
const SVG_GAP = 2;
const SVG_LEFT = 40;
const SVG_TOP = 40;
const SVG_LEGEND_GAP = 24;
const SVG_LEGEND_WIDTH = 12;

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function toSvg(image: HeatmapImage): string {
  const step = SVG_CELL + SVG_GAP;
  const gridWidth = image.grid.weeks.length * step;
  const gridHeight = DAY_LABELS.length * step;
  const legendX = SVG_LEFT + gridWidth + SVG_LEGEND_GAP;
  const width = legendX + SVG_LEGEND_WIDTH + 60;
  const height = SVG_TOP + gridHeight + 16;

  const labels = DAY_LABELS.map(
    (label, weekday) =>
      `<text x="${SVG_LEFT - 6}" y="${SVG_TOP + weekday * step + SVG_CELL - 2}" text-anchor="end">${label}</text>`,
  ).join("\n    ");

  const cells = image.colors
    .flatMap((row, weekday) =>
      row.map(
        (color, col) =>
          `<rect class="cell" x="${SVG_LEFT + col * step}" y="${SVG_TOP + weekday * step}" width="${SVG_CELL}" height="${SVG_CELL}" fill="${color}"><title>${image.grid.rows[weekday][col]}</title></rect>`,
      ),
    )
    .join("\n    ");

  // Darkest stop at the top, like a vertical colorbar.
  const stops = COLOR_RAMP.map(
    (color, i) => `<stop offset="${((i / (COLOR_RAMP.length - 1)) * 100).toFixed(1)}%" stop-color="${color}"/>`,
  )
    .reverse()
    .join("");

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
  <defs><linearGradient id="ramp" x1="0" y1="1" x2="0" y2="0">${stops}</linearGradient></defs>
  <rect width="100%" height="100%" fill="#ffffff"/>
  <text x="${width / 2}" y="22" text-anchor="middle" font-family="sans-serif" font-size="14">${escapeXml(image.title)}</text>
  <g font-family="sans-serif" font-size="9" fill="#24292f">
    ${labels}
  </g>
  <g>
    ${cells}
  </g>
  <rect x="${legendX}" y="${SVG_TOP}" width="${SVG_LEGEND_WIDTH}" height="${gridHeight - SVG_GAP}" fill="url(#ramp)"/>
  <g font-family="sans-serif" font-size="8" fill="#24292f">
    <text x="${legendX + SVG_LEGEND_WIDTH + 3}" y="${SVG_TOP + 8}">${image.vmax}</text>
    <text x="${legendX + SVG_LEGEND_WIDTH + 3}" y="${SVG_TOP + gridHeight - SVG_GAP}">0</text>
    <text transform="translate(${legendX + SVG_LEGEND_WIDTH + 28} ${SVG_TOP + gridHeight / 2}) rotate(90)" text-anchor="middle">${LEGEND_LABEL}</text>
  </g>
</svg>
`;
}

export function exportFileName(year: number): string {
  return `heatmap_${year}.png`;
}

// Overwrites an existing export for the same year.
export async function exportPng(image: HeatmapImage, outDir: string): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const outPath = join(outDir, exportFileName(image.year));
  await sharp(Buffer.from(toSvg(image)), { density: EXPORT_DENSITY }).png().toFile(outPath);
  return outPath;
}
